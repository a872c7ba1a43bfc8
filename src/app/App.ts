import { loadConfig } from '../config/index.js'
import type { AppConfig } from '../config/index.js'
import { SchedulerService } from '../core/scheduler/service.js'
import type { TriggerQueue } from '../core/trigger/queue.js'
import { QueueWorker } from '../core/trigger/worker.js'
import { createConnectedRedisClient } from '../integrations/redis/client.js'
import { RedisTriggerQueue } from '../integrations/redis/trigger-queue.js'
import { asErrorMessage, closeLogStreams, logger } from '../utils/logger.js'
import { createAlertContext } from './context.js'
import type { AlertContextOverrides } from './context.js'
import { configureAppLogger } from './logging.js'

export interface AppOptions {
  /** Opens the trigger queue; resolves null when the queue is not configured. */
  openTriggerQueue?: (config: AppConfig) => Promise<TriggerQueue | null>
  overrides?: AlertContextOverrides
}

async function openRedisTriggerQueue(config: AppConfig): Promise<TriggerQueue | null> {
  if (!config.REDIS_URL) return null
  const client = await createConnectedRedisClient({
    url: config.REDIS_URL,
    clientName: 'french-toast-worker',
  })
  return new RedisTriggerQueue({ client, queueName: config.TRIGGER_QUEUE_NAME })
}

export class App {
  private readonly openTriggerQueue: (config: AppConfig) => Promise<TriggerQueue | null>
  private readonly overrides: AlertContextOverrides
  private scheduler: SchedulerService | null = null
  private worker: QueueWorker | null = null
  private queue: TriggerQueue | null = null
  private stopping = false
  private readonly onSignal = (signal: NodeJS.Signals) => this.handleSignal(signal)

  constructor(options: AppOptions = {}) {
    this.openTriggerQueue = options.openTriggerQueue ?? openRedisTriggerQueue
    this.overrides = options.overrides ?? {}
  }

  async start(config: AppConfig = loadConfig()): Promise<void> {
    await configureAppLogger(config)
    logger.info('App starting')
    logger.debug('App config', {
      dataPath: config.DATA_PATH,
      statusCheckCron: config.STATUS_CHECK_CRON,
      statusCheckOnStartup: config.STATUS_CHECK_ON_STARTUP,
      sourceTimeoutMs: config.SOURCE_TIMEOUT_MS,
      deliveryTimeoutMs: config.DELIVERY_TIMEOUT_MS,
      deliveryConcurrency: config.DELIVERY_CONCURRENCY,
      queueEnabled: Boolean(config.REDIS_URL),
      queueName: config.TRIGGER_QUEUE_NAME,
      timezone: config.timezone,
      logLevel: config.LOG_LEVEL,
    })

    try {
      const context = createAlertContext(config, this.overrides)
      const listener = context.listener
      // Validates the cron expression before any connection is opened.
      this.scheduler = new SchedulerService({
        cronSchedule: config.STATUS_CHECK_CRON,
        timezone: config.timezone,
        startupCheck: config.STATUS_CHECK_ON_STARTUP,
        runCheck: async (reason) => {
          await listener.onTrigger(reason)
        },
      })

      const status = await context.statusStore.initialize()
      logger.info('Current status loaded', { status: status.status || '(none)', updated: status.updated })

      this.queue = await this.openTriggerQueue(config)
      if (this.queue) {
        this.worker = new QueueWorker({
          queue: this.queue,
          blockSeconds: config.TRIGGER_QUEUE_BLOCK_SECONDS,
          handler: async () => {
            await listener.onTrigger('queue')
          },
        })
        this.worker.start().catch((error: unknown) => {
          logger.error('Queue worker crashed', { error: asErrorMessage(error) })
        })
        logger.info('Queue worker started', { queue: config.TRIGGER_QUEUE_NAME })
      }
      else {
        logger.info('Queue worker not configured; REDIS_URL is empty')
      }

      await this.scheduler.start()
    }
    catch (error) {
      logger.error('App start failed', { error: asErrorMessage(error) })
      await this.stop()
      throw error
    }

    process.once('SIGINT', this.onSignal)
    process.once('SIGTERM', this.onSignal)
    logger.info('App started')
  }

  async stop(): Promise<void> {
    if (this.stopping) return
    this.stopping = true
    process.off('SIGINT', this.onSignal)
    process.off('SIGTERM', this.onSignal)
    this.scheduler?.stop()
    const worker = this.worker
    const queue = this.queue
    const stopped = worker?.stop()
    if (queue) await queue.close()
    if (stopped) await stopped
    logger.info('App stopped')
    await closeLogStreams()
  }

  private handleSignal(signal: NodeJS.Signals): void {
    logger.info('Shutdown signal received', { signal })
    this.stop().catch((error: unknown) => {
      logger.error('Shutdown failed', { error: asErrorMessage(error) })
      process.exitCode = 1
    })
  }
}
