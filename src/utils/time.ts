export function nowIso(): string {
  return new Date().toISOString()
}

export function toUnixSeconds(value: string): number {
  return new Date(value).getTime() / 1000
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms)
  })
}
