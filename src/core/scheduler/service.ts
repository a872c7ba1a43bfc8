import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'
import type { TriggerReason } from '../../types/index.js'
import { asErrorMessage, logger as rootLogger } from '../../utils/logger.js'

const logger = rootLogger.child('scheduler')

export interface SchedulerOptions {
  cronSchedule: string
  timezone: string
  startupCheck: boolean
  runCheck: (reason: TriggerReason) => Promise<void>
}

export class SchedulerService {
  private readonly cronSchedule: string
  private readonly timezone: string
  private readonly startupCheck: boolean
  private readonly runCheck: (reason: TriggerReason) => Promise<void>
  private readonly tasks: ScheduledTask[] = []

  constructor(options: SchedulerOptions) {
    if (!cron.validate(options.cronSchedule)) {
      throw new Error(`Invalid cron schedule: ${options.cronSchedule}`)
    }
    this.cronSchedule = options.cronSchedule
    this.timezone = options.timezone
    this.startupCheck = options.startupCheck
    this.runCheck = options.runCheck
  }

  async start(): Promise<void> {
    logger.info('Scheduler starting', {
      cronSchedule: this.cronSchedule,
      timezone: this.timezone,
      startupCheck: this.startupCheck,
    })

    if (this.startupCheck) {
      logger.info('Startup status check triggered')
      await this.runSafely('startup')
    }

    this.tasks.push(cron.schedule(this.cronSchedule, async () => {
      logger.info('Scheduled status check triggered')
      await this.runSafely('scheduled')
    }, { timezone: this.timezone }))

    logger.info('Scheduler started')
  }

  stop(): void {
    for (const task of this.tasks.splice(0)) {
      task.stop()
    }
    logger.info('Scheduler stopped')
  }

  private async runSafely(reason: TriggerReason): Promise<void> {
    try {
      await this.runCheck(reason)
    }
    catch (error) {
      logger.warn('Status check failed', { reason, error: asErrorMessage(error) })
    }
  }
}
