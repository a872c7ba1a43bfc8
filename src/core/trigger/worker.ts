import { asErrorMessage, logger as rootLogger } from '../../utils/logger.js'
import { sleep } from '../../utils/time.js'
import type { TriggerMessage, TriggerQueue } from './queue.js'

const logger = rootLogger.child('queue-worker')

export interface QueueWorkerOptions {
  queue: TriggerQueue
  blockSeconds: number
  handler: (message: TriggerMessage) => Promise<void>
  retryBackoffMs?: number
}

/**
 * Supervised consumer loop. A failed receive or handler run is logged and
 * followed by a backoff; the loop only ends through `stop()`.
 */
export class QueueWorker {
  private readonly queue: TriggerQueue
  private readonly blockSeconds: number
  private readonly handler: (message: TriggerMessage) => Promise<void>
  private readonly retryBackoffMs: number
  private running = false
  private loop: Promise<void> | null = null

  constructor(options: QueueWorkerOptions) {
    this.queue = options.queue
    this.blockSeconds = options.blockSeconds
    this.handler = options.handler
    this.retryBackoffMs = options.retryBackoffMs ?? 1_000
  }

  isRunning(): boolean {
    return this.running
  }

  /** Receives at most one message and handles it. Resolves true if one was handled. */
  async runOnce(): Promise<boolean> {
    let message: TriggerMessage | null
    try {
      message = await this.queue.receive(this.blockSeconds)
    }
    catch (error) {
      if (!this.running) return false
      logger.warn('Queue receive failed', { error: asErrorMessage(error), backoffMs: this.retryBackoffMs })
      await sleep(this.retryBackoffMs)
      return false
    }

    if (!message) return false

    logger.debug('Trigger message received', { receivedAt: message.receivedAt })
    try {
      await this.handler(message)
    }
    catch (error) {
      logger.error('Trigger handler failed', { error, backoffMs: this.retryBackoffMs })
      await sleep(this.retryBackoffMs)
    }
    return true
  }

  start(): Promise<void> {
    if (this.loop) return this.loop
    this.running = true
    logger.info('Waiting for messages...')
    this.loop = this.consume()
    return this.loop
  }

  async stop(): Promise<void> {
    this.running = false
    const loop = this.loop
    this.loop = null
    if (loop) await loop
    logger.info('Queue worker stopped')
  }

  private async consume(): Promise<void> {
    while (this.running) {
      await this.runOnce()
    }
  }
}
