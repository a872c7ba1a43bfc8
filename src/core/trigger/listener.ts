import type {
  DeliveryOutcome,
  DeliverySummary,
  StatusSnapshot,
  Subscriber,
  TriggerReason,
} from '../../types/index.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { resolveAlertLevel } from '../alerts/levels.js'
import type { ChangeDetector, NoChangeReason } from '../status/detector.js'
import type { StatusStore } from '../status/store.js'
import type { NotificationDispatcher } from '../notifications/dispatcher.js'

const logger = rootLogger.child('trigger')

export type TriggerResult =
  | { changed: true; snapshot: StatusSnapshot; delivery: DeliverySummary }
  | { changed: false; reason: NoChangeReason }

export interface TriggerListenerOptions {
  detector: ChangeDetector
  dispatcher: NotificationDispatcher
  statusStore: StatusStore
}

export class TriggerListener {
  private readonly detector: ChangeDetector
  private readonly dispatcher: NotificationDispatcher
  private readonly statusStore: StatusStore

  constructor(options: TriggerListenerOptions) {
    this.detector = options.detector
    this.dispatcher = options.dispatcher
    this.statusStore = options.statusStore
  }

  async onTrigger(reason: TriggerReason): Promise<TriggerResult> {
    const startedAt = Date.now()
    const check = await this.detector.checkForChange()
    logger.info('Status check finished', { reason, changed: check.changed })
    if (!check.changed) {
      return { changed: false, reason: check.reason }
    }

    logger.info('Sending alerts', { reason, status: check.snapshot.status })
    const delivery = await this.dispatcher.deliverAll(check.snapshot)
    logger.info('Trigger cycle completed', {
      reason,
      status: check.snapshot.status,
      durationMs: Date.now() - startedAt,
      ...delivery,
    })
    return { changed: true, snapshot: check.snapshot, delivery }
  }

  /** Sends the current status to a newly registered or reactivated subscriber. */
  async onSubscriberRegistered(subscriber: Subscriber): Promise<DeliveryOutcome> {
    const record = await this.statusStore.load()
    const level = resolveAlertLevel(record.status)
    if (!level || record.updated === null) {
      logger.info('Initial alert skipped; no status observed yet', { subscriberId: subscriber.id })
      return 'skipped'
    }

    return this.dispatcher.deliver(
      subscriber,
      { status: level.code, level, updated: record.updated },
      true,
    )
  }
}
