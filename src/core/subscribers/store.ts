import path from 'node:path'
import { z } from 'zod'
import type { Subscriber } from '../../types/index.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { readJsonFile, writeJsonFileAtomic } from '../storage/json-file.js'
import { FileLease } from '../storage/lease.js'

const logger = rootLogger.child('subscriber-store')

const subscriberSchema = z.object({
  id: z.number().int().positive(),
  teamId: z.string().min(1),
  channelId: z.string().min(1),
  encryptedUrl: z.string().min(1),
  added: z.string().min(1),
  lastNotified: z.string().nullable().default(null),
  inactive: z.boolean().default(false),
})

const subscribersFileSchema = z.object({
  version: z.number().default(1),
  nextId: z.number().int().positive().default(1),
  subscribers: z.array(subscriberSchema).default([]),
})

type SubscribersFile = z.output<typeof subscribersFileSchema>

function emptyFile(): SubscribersFile {
  return { version: 1, nextId: 1, subscribers: [] }
}

function isSameChannel(subscriber: Subscriber, input: SubscriberUpsertInput): boolean {
  return subscriber.teamId === input.teamId && subscriber.channelId === input.channelId
}

export interface SubscriberStoreOptions {
  dataPath: string
  lockTimeoutMs: number
}

export interface SubscriberUpsertInput {
  teamId: string
  channelId: string
  encryptedUrl: string
}

export interface SubscriberUpsertResult {
  subscriber: Subscriber
  created: boolean
}

export class SubscriberStore {
  readonly subscribersPath: string
  private readonly lease: FileLease

  constructor(options: SubscriberStoreOptions) {
    this.subscribersPath = path.join(options.dataPath, 'subscribers.json')
    this.lease = new FileLease({
      lockPath: path.join(options.dataPath, 'subscribers.lock'),
      waitTimeoutMs: options.lockTimeoutMs,
    })
  }

  async list(): Promise<Subscriber[]> {
    const file = await this.read()
    return file.subscribers
  }

  async listActive(): Promise<Subscriber[]> {
    const subscribers = await this.list()
    return subscribers.filter(subscriber => !subscriber.inactive)
  }

  /** Creates the team/channel subscriber, or refreshes its URL and reactivates it. */
  async upsert(input: SubscriberUpsertInput, now: string): Promise<SubscriberUpsertResult> {
    return this.mutate((file) => {
      const existing = file.subscribers.find(subscriber => isSameChannel(subscriber, input))
      if (existing) {
        existing.encryptedUrl = input.encryptedUrl
        existing.inactive = false
        return { subscriber: { ...existing }, created: false }
      }

      const subscriber: Subscriber = {
        id: file.nextId,
        teamId: input.teamId,
        channelId: input.channelId,
        encryptedUrl: input.encryptedUrl,
        added: now,
        lastNotified: null,
        inactive: false,
      }
      file.nextId += 1
      file.subscribers.push(subscriber)
      return { subscriber: { ...subscriber }, created: true }
    })
  }

  async markNotified(id: number, timestamp: string): Promise<Subscriber | undefined> {
    return this.updateOne(id, (subscriber) => {
      subscriber.lastNotified = timestamp
    })
  }

  /**
   * Deactivates the subscriber. With `encryptedUrl`, only while that is still
   * the stored URL: a re-registration since the failed delivery wins.
   */
  async markInactive(id: number, encryptedUrl?: string): Promise<Subscriber | undefined> {
    return this.updateOne(id, (subscriber) => {
      if (encryptedUrl !== undefined && subscriber.encryptedUrl !== encryptedUrl) {
        logger.info('Subscriber URL replaced since delivery; deactivation skipped', { id })
        return
      }
      subscriber.inactive = true
    })
  }

  private async updateOne(id: number, apply: (subscriber: Subscriber) => void): Promise<Subscriber | undefined> {
    return this.mutate((file) => {
      const subscriber = file.subscribers.find(item => item.id === id)
      if (!subscriber) {
        logger.warn('Subscriber not found for update', { id })
        return undefined
      }
      apply(subscriber)
      return { ...subscriber }
    })
  }

  private async read(): Promise<SubscribersFile> {
    return readJsonFile(this.subscribersPath, subscribersFileSchema, emptyFile)
  }

  private async mutate<T>(apply: (file: SubscribersFile) => T): Promise<T> {
    return this.lease.run(async () => {
      const file = await this.read()
      const result = apply(file)
      await writeJsonFileAtomic(this.subscribersPath, file)
      return result
    })
  }
}
