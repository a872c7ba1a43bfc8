export interface TriggerMessage {
  body: string
  receivedAt: string
}

/** Work queue carrying status-check requests; the body is never interpreted. */
export interface TriggerQueue {
  publish(body: string): Promise<void>
  receive(blockSeconds: number): Promise<TriggerMessage | null>
  close(): Promise<void>
}

export function buildTriggerBody(source: string, sentAt: Date = new Date()): string {
  return JSON.stringify({ type: 'status-check', source, sentAt: sentAt.toISOString() })
}
