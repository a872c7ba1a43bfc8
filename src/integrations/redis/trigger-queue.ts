import type { TriggerMessage, TriggerQueue } from '../../core/trigger/queue.js'
import { nowIso } from '../../utils/time.js'
import type { AppRedisClient } from './client.js'
import { closeRedisClient } from './client.js'

export interface RedisTriggerQueueOptions {
  client: AppRedisClient
  queueName: string
}

/**
 * Trigger queue on a Redis list: RPUSH to publish, BLPOP to receive. A
 * blocking receive holds its connection, so consumers get a client of their own.
 */
export class RedisTriggerQueue implements TriggerQueue {
  private readonly client: AppRedisClient
  private readonly queueName: string

  constructor(options: RedisTriggerQueueOptions) {
    this.client = options.client
    this.queueName = options.queueName
  }

  async publish(body: string): Promise<void> {
    await this.client.rPush(this.queueName, body)
  }

  async receive(blockSeconds: number): Promise<TriggerMessage | null> {
    const reply = await this.client.blPop(this.queueName, blockSeconds)
    if (!reply) return null
    return { body: reply.element, receivedAt: nowIso() }
  }

  async close(): Promise<void> {
    if (!this.client.isOpen) return
    await closeRedisClient(this.client)
  }
}
