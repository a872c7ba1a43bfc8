import type {
  DeliveryOutcome,
  DeliverySummary,
  StatusSnapshot,
  Subscriber,
} from '../../types/index.js'
import { buildAlertMessage } from '../../integrations/slack/format.js'
import type { SlackMessage } from '../../integrations/slack/format.js'
import { sanitizeWebhookUrl } from '../../integrations/slack/webhook.js'
import type { WebhookResponse } from '../../integrations/slack/webhook.js'
import { settleWithConcurrency } from '../../utils/concurrency.js'
import { asErrorMessage, logger as rootLogger } from '../../utils/logger.js'
import type { DiagnosticReporter } from '../diagnostics/reporter.js'
import { DeliveryError } from '../errors.js'
import type { UrlCipher } from '../subscribers/cipher.js'
import type { SubscriberStore } from '../subscribers/store.js'

const logger = rootLogger.child('dispatcher')

const BODY_PREVIEW_LENGTH = 180

export interface WebhookPoster {
  post(webhookUrl: string, message: SlackMessage): Promise<WebhookResponse>
}

export interface NotificationDispatcherOptions {
  store: SubscriberStore
  cipher: UrlCipher
  webhook: WebhookPoster
  reporter: DiagnosticReporter
  linkUrl: string
  concurrency: number
}

function preview(body: string): string {
  return body.length > BODY_PREVIEW_LENGTH ? `${body.slice(0, BODY_PREVIEW_LENGTH)}...` : body
}

function classifyResponse(response: WebhookResponse): DeliveryError | null {
  if (response.status === 200) return null
  if (response.status === 404) {
    return new DeliveryError('notFound', 'Webhook endpoint not found', { httpStatus: response.status })
  }
  return new DeliveryError('otherHTTP', `Webhook returned HTTP ${response.status}`, { httpStatus: response.status })
}

/** Subscribers owed the given status: active and not yet sent this `updated` stamp. */
export function isOwedDelivery(subscriber: Subscriber, updated: string, force = false): boolean {
  if (subscriber.inactive) return false
  return force || subscriber.lastNotified !== updated
}

export class NotificationDispatcher {
  private readonly store: SubscriberStore
  private readonly cipher: UrlCipher
  private readonly webhook: WebhookPoster
  private readonly reporter: DiagnosticReporter
  private readonly linkUrl: string
  private readonly concurrency: number

  constructor(options: NotificationDispatcherOptions) {
    this.store = options.store
    this.cipher = options.cipher
    this.webhook = options.webhook
    this.reporter = options.reporter
    this.linkUrl = options.linkUrl
    this.concurrency = Math.max(1, options.concurrency)
  }

  /**
   * Delivers `snapshot` to one subscriber. Unless `force` is set, inactive
   * subscribers and those already holding this `updated` stamp are skipped.
   * Delivery failures resolve to an outcome; store failures reject.
   */
  async deliver(subscriber: Subscriber, snapshot: StatusSnapshot, force = false): Promise<DeliveryOutcome> {
    if (!force && (subscriber.inactive || subscriber.lastNotified === snapshot.updated)) {
      logger.debug('Delivery skipped', {
        subscriberId: subscriber.id,
        inactive: subscriber.inactive,
        lastNotified: subscriber.lastNotified,
      })
      return 'skipped'
    }

    let url: string
    try {
      url = this.cipher.decrypt(subscriber.encryptedUrl)
    }
    catch (error) {
      this.reporter.report('delivery_request_failed', {
        subscriberId: subscriber.id,
        teamId: subscriber.teamId,
        error: `Delivery URL could not be decrypted: ${asErrorMessage(error)}`,
      })
      return 'failed'
    }

    logger.info('Alerting subscriber', {
      subscriberId: subscriber.id,
      teamId: subscriber.teamId,
      channelId: subscriber.channelId,
      status: snapshot.status,
      forced: force,
    })

    const message = buildAlertMessage(snapshot.level, snapshot.updated, this.linkUrl)
    let response: WebhookResponse
    try {
      response = await this.webhook.post(url, message)
    }
    catch (error) {
      this.reporter.report('delivery_request_failed', {
        subscriberId: subscriber.id,
        teamId: subscriber.teamId,
        url: sanitizeWebhookUrl(url),
        error: asErrorMessage(error),
      })
      return 'failed'
    }

    const failure = classifyResponse(response)
    if (failure?.kind === 'notFound') {
      const stored = await this.store.markInactive(subscriber.id, subscriber.encryptedUrl)
      if (stored?.inactive) {
        this.reporter.report('subscriber_marked_inactive', {
          subscriberId: subscriber.id,
          teamId: subscriber.teamId,
          httpStatus: failure.httpStatus,
          text: preview(response.body),
        })
        return 'deactivated'
      }
    }
    if (failure) {
      this.reporter.report('bad_delivery_response', {
        subscriberId: subscriber.id,
        teamId: subscriber.teamId,
        httpStatus: failure.httpStatus,
        text: preview(response.body),
        url: sanitizeWebhookUrl(url),
      })
      return 'failed'
    }

    await this.store.markNotified(subscriber.id, snapshot.updated)
    return 'delivered'
  }

  /**
   * Fans `snapshot` out to every subscriber owed it. Each subscriber is
   * isolated; if any delivery rejected, the first rejection is rethrown once
   * all of them have settled.
   */
  async deliverAll(snapshot: StatusSnapshot, force = false): Promise<DeliverySummary> {
    const active = await this.store.listActive()
    const selected = active.filter(subscriber => isOwedDelivery(subscriber, snapshot.updated, force))
    logger.info('Fanout started', {
      status: snapshot.status,
      updated: snapshot.updated,
      active: active.length,
      selected: selected.length,
      forced: force,
    })

    const results = await settleWithConcurrency(
      selected,
      this.concurrency,
      subscriber => this.deliver(subscriber, snapshot, force),
    )

    const summary: DeliverySummary = { selected: selected.length, delivered: 0, deactivated: 0, failed: 0 }
    const rejections: unknown[] = []
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        summary.failed += 1
        rejections.push(result.reason)
        logger.error('Delivery aborted', {
          subscriberId: selected[index]?.id,
          error: result.reason,
        })
        return
      }
      if (result.value === 'delivered') summary.delivered += 1
      else if (result.value === 'deactivated') summary.deactivated += 1
      else if (result.value === 'failed') summary.failed += 1
    })

    logger.info('Fanout completed', { status: snapshot.status, ...summary })

    if (rejections.length > 0) {
      throw rejections[0]
    }
    return summary
  }
}
