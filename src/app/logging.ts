import type { AppConfig } from '../config/index.js'
import { closeLogStreams, configureLogger } from '../utils/logger.js'

export async function configureAppLogger(config: AppConfig): Promise<void> {
  await configureLogger({
    level: config.LOG_LEVEL,
    summaryPath: config.logSummaryPath,
    detailPath: config.logDetailPath,
  })
}

/** Runs a one-shot command with file logging configured, closing the log files afterwards. */
export async function withAppLogging<T>(config: AppConfig, task: () => Promise<T>): Promise<T> {
  await configureAppLogger(config)
  try {
    return await task()
  }
  finally {
    await closeLogStreams()
  }
}
