import { z } from 'zod'
import type { DeliveryOutcome, Subscriber, SubscriberRegistrationInput } from '../../types/index.js'
import { nowIso } from '../../utils/time.js'
import type { DiagnosticReporter } from '../diagnostics/reporter.js'
import type { UrlCipher } from './cipher.js'
import type { SubscriberStore } from './store.js'

const registrationSchema = z.object({
  teamId: z.string().trim().min(1),
  channelId: z.string().trim().min(1),
  url: z.string().trim().url(),
})

export interface RegistrationResult {
  subscriber: Subscriber
  created: boolean
  initialDelivery: DeliveryOutcome
}

export interface SubscriberRegistrationOptions {
  store: SubscriberStore
  cipher: UrlCipher
  reporter: DiagnosticReporter
  onRegistered: (subscriber: Subscriber) => Promise<DeliveryOutcome>
  clock?: () => string
}

export class SubscriberRegistration {
  private readonly store: SubscriberStore
  private readonly cipher: UrlCipher
  private readonly reporter: DiagnosticReporter
  private readonly onRegistered: (subscriber: Subscriber) => Promise<DeliveryOutcome>
  private readonly clock: () => string

  constructor(options: SubscriberRegistrationOptions) {
    this.store = options.store
    this.cipher = options.cipher
    this.reporter = options.reporter
    this.onRegistered = options.onRegistered
    this.clock = options.clock ?? nowIso
  }

  /**
   * Upserts the team/channel subscriber, reactivating it if needed, then
   * sends it the current status. Invalid input throws a ZodError.
   */
  async register(input: SubscriberRegistrationInput): Promise<RegistrationResult> {
    const info = registrationSchema.parse(input)
    const { subscriber, created } = await this.store.upsert({
      teamId: info.teamId,
      channelId: info.channelId,
      encryptedUrl: this.cipher.encrypt(info.url),
    }, this.clock())

    this.reporter.report(created ? 'subscriber_added' : 'subscriber_updated', {
      subscriberId: subscriber.id,
      teamId: subscriber.teamId,
      channelId: subscriber.channelId,
    })

    const initialDelivery = await this.onRegistered(subscriber)
    return { subscriber, created, initialDelivery }
  }
}
