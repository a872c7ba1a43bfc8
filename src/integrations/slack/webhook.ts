import { logger as rootLogger } from '../../utils/logger.js'
import type { SlackMessage } from './format.js'

const logger = rootLogger.child('slack-webhook')

export interface WebhookResponse {
  status: number
  body: string
}

export interface WebhookClientOptions {
  timeoutMs: number
  fetchImpl?: typeof fetch
}

export function sanitizeWebhookUrl(url: string): string {
  try {
    const parsed = new URL(url)
    const parts = parsed.pathname.split('/').filter(Boolean)
    if (parts.length >= 3 && parts[0] === 'services') {
      return `${parsed.origin}/services/${parts[1]}/***`
    }
    return `${parsed.origin}/***`
  }
  catch {
    return '[invalid-url]'
  }
}

/**
 * Posts one message to an incoming webhook and reports the HTTP outcome.
 * Transport failures and timeouts reject; any HTTP status resolves.
 */
export class WebhookClient {
  private readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(options: WebhookClientOptions) {
    this.timeoutMs = options.timeoutMs
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async post(webhookUrl: string, message: SlackMessage): Promise<WebhookResponse> {
    const safeUrl = sanitizeWebhookUrl(webhookUrl)
    logger.debug('Webhook request', {
      method: 'POST',
      url: safeUrl,
      attachments: message.attachments.length,
    })

    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await this.fetchImpl(webhookUrl, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
        },
        body: JSON.stringify(message),
        signal: controller.signal,
      })
      const body = await response.text()
      logger.debug('Webhook response', { status: response.status, url: safeUrl })
      return { status: response.status, body }
    }
    catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Webhook request timed out after ${this.timeoutMs}ms`, { cause: error })
      }
      throw error
    }
    finally {
      clearTimeout(timeout)
    }
  }
}
