import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { loadConfig } from '../../src/config/index.js'
import type { AppConfig } from '../../src/config/index.js'
import type { DiagnosticEventName, DiagnosticPayload, DiagnosticReporter } from '../../src/core/diagnostics/reporter.js'
import type { WebhookPoster } from '../../src/core/notifications/dispatcher.js'
import type { SubscriberStore } from '../../src/core/subscribers/store.js'
import type { TriggerMessage, TriggerQueue } from '../../src/core/trigger/queue.js'
import type { SlackMessage } from '../../src/integrations/slack/format.js'
import type { WebhookResponse } from '../../src/integrations/slack/webhook.js'
import type { StatusSource } from '../../src/integrations/toast/source.js'
import type { Subscriber } from '../../src/types/index.js'
import { setLogLevel } from '../../src/utils/logger.js'
import { nowIso, sleep } from '../../src/utils/time.js'

setLogLevel('error')

// 32 bytes of placeholder key material, base64 encoded.
export const TEST_KEY = Buffer.from('test-secret-test-secret-test-sec').toString('base64')
export const TEST_LINK_URL = 'https://toast.test/about'

export async function createTempDataPath(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'french-toast-test-'))
}

export async function removeTempDataPath(dataPath: string): Promise<void> {
  await fs.rm(dataPath, { recursive: true, force: true })
}

export function testConfig(dataPath: string, overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    DATA_PATH: dataPath,
    TOAST_API_URL: 'https://toast.test/status.xml',
    TOAST_LINK_URL: TEST_LINK_URL,
    TOKEN_KEY: TEST_KEY,
    DELIVERY_CONCURRENCY: '2',
    ...overrides,
  })
}

export async function findSubscriber(store: SubscriberStore, id: number): Promise<Subscriber | undefined> {
  const subscribers = await store.list()
  return subscribers.find(subscriber => subscriber.id === id)
}

export interface RecordedEvent {
  name: DiagnosticEventName
  payload: DiagnosticPayload
}

export class RecordingReporter implements DiagnosticReporter {
  readonly events: RecordedEvent[] = []

  report(name: DiagnosticEventName, payload: DiagnosticPayload): void {
    this.events.push({ name, payload })
  }

  names(): DiagnosticEventName[] {
    return this.events.map(event => event.name)
  }
}

/** Replays queued results: a string is returned, an Error is thrown. */
export class ScriptedStatusSource implements StatusSource {
  private readonly results: Array<string | Error>
  calls = 0

  constructor(...results: Array<string | Error>) {
    this.results = results
  }

  async fetch(): Promise<string> {
    this.calls += 1
    const next = this.results.length > 1 ? this.results.shift() : this.results[0]
    if (next === undefined) throw new Error('No scripted status left')
    if (next instanceof Error) throw next
    return next
  }
}

export interface RecordedPost {
  url: string
  message: SlackMessage
}

export class FakeWebhook implements WebhookPoster {
  readonly posts: RecordedPost[] = []
  readonly responses = new Map<string, number | Error>()
  delayMs = 0
  inFlight = 0
  maxInFlight = 0
  onPost?: (url: string) => Promise<void>

  async post(url: string, message: SlackMessage): Promise<WebhookResponse> {
    this.posts.push({ url, message })
    this.inFlight += 1
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight)
    try {
      if (this.delayMs > 0) await sleep(this.delayMs)
      if (this.onPost) await this.onPost(url)
      const response = this.responses.get(url) ?? 200
      if (response instanceof Error) throw response
      return { status: response, body: response === 200 ? 'ok' : 'no_service' }
    }
    finally {
      this.inFlight -= 1
    }
  }

  postsTo(url: string): RecordedPost[] {
    return this.posts.filter(post => post.url === url)
  }
}

export class InMemoryTriggerQueue implements TriggerQueue {
  readonly messages: string[] = []
  failReceives = 0
  closed = false

  async publish(body: string): Promise<void> {
    this.messages.push(body)
  }

  async receive(_blockSeconds: number): Promise<TriggerMessage | null> {
    if (this.failReceives > 0) {
      this.failReceives -= 1
      throw new Error('connection lost')
    }
    const body = this.messages.shift()
    if (body === undefined) {
      await sleep(5)
      return null
    }
    return { body, receivedAt: nowIso() }
  }

  async close(): Promise<void> {
    this.closed = true
  }
}

export interface RecordedRequest {
  url: string
  method: string
  body?: string
}

export function createFakeFetch(
  respond: (request: RecordedRequest, init?: RequestInit) => Promise<Response> | Response,
): { fetchImpl: typeof fetch; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = []
  const fetchImpl = async (input: Parameters<typeof fetch>[0], init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
    const request: RecordedRequest = {
      url,
      method: init?.method ?? 'GET',
      body: typeof init?.body === 'string' ? init.body : undefined,
    }
    requests.push(request)
    return respond(request, init)
  }
  return { fetchImpl, requests }
}

export async function waitFor(predicate: () => boolean, timeoutMs = 1_000): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error('Condition not met in time')
    await sleep(5)
  }
}
