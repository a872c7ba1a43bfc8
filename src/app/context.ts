import type { AppConfig } from '../config/index.js'
import { LoggerDiagnosticReporter } from '../core/diagnostics/reporter.js'
import type { DiagnosticReporter } from '../core/diagnostics/reporter.js'
import { NotificationDispatcher } from '../core/notifications/dispatcher.js'
import type { WebhookPoster } from '../core/notifications/dispatcher.js'
import { ChangeDetector } from '../core/status/detector.js'
import { StatusStore } from '../core/status/store.js'
import { UrlCipher } from '../core/subscribers/cipher.js'
import { SubscriberRegistration } from '../core/subscribers/registration.js'
import { SubscriberStore } from '../core/subscribers/store.js'
import { TriggerListener } from '../core/trigger/listener.js'
import { WebhookClient } from '../integrations/slack/webhook.js'
import { ToastStatusSource } from '../integrations/toast/source.js'
import type { StatusSource } from '../integrations/toast/source.js'

export interface AlertContext {
  config: AppConfig
  reporter: DiagnosticReporter
  statusStore: StatusStore
  subscriberStore: SubscriberStore
  cipher: UrlCipher
  detector: ChangeDetector
  dispatcher: NotificationDispatcher
  listener: TriggerListener
  registration: SubscriberRegistration
}

export interface AlertContextOverrides {
  source?: StatusSource
  webhook?: WebhookPoster
  reporter?: DiagnosticReporter
}

/** Builds every alerting component once, wired explicitly from `config`. */
export function createAlertContext(config: AppConfig, overrides: AlertContextOverrides = {}): AlertContext {
  const reporter = overrides.reporter ?? new LoggerDiagnosticReporter()
  const storeOptions = { dataPath: config.DATA_PATH, lockTimeoutMs: config.STORE_LOCK_TIMEOUT_MS }
  const statusStore = new StatusStore(storeOptions)
  const subscriberStore = new SubscriberStore(storeOptions)
  const cipher = new UrlCipher(config.TOKEN_KEY)

  const detector = new ChangeDetector({
    source: overrides.source ?? new ToastStatusSource({
      url: config.TOAST_API_URL,
      timeoutMs: config.SOURCE_TIMEOUT_MS,
    }),
    store: statusStore,
    reporter,
  })
  const dispatcher = new NotificationDispatcher({
    store: subscriberStore,
    cipher,
    webhook: overrides.webhook ?? new WebhookClient({ timeoutMs: config.DELIVERY_TIMEOUT_MS }),
    reporter,
    linkUrl: config.TOAST_LINK_URL,
    concurrency: config.DELIVERY_CONCURRENCY,
  })
  const listener = new TriggerListener({ detector, dispatcher, statusStore })
  const registration = new SubscriberRegistration({
    store: subscriberStore,
    cipher,
    reporter,
    onRegistered: subscriber => listener.onSubscriberRegistered(subscriber),
  })

  return {
    config,
    reporter,
    statusStore,
    subscriberStore,
    cipher,
    detector,
    dispatcher,
    listener,
    registration,
  }
}
