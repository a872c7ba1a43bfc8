import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

const DEFAULT_TOAST_LINK_URL = 'http://www.universalhub.com/french-toast'

const optionalString = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().optional())

const boolSchema = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value === 'boolean') return value
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase()
    if (normalized === '') return undefined
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  }
  return value
}, z.boolean().default(defaultValue))

const integerSchema = (defaultValue: number, minValue: number) => z.preprocess((value) => {
  if (typeof value === 'string') {
    if (value.trim().length === 0) return undefined
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : value
  }
  return value
}, z.number().int().min(minValue).default(defaultValue))

const logLevelSchema = z.preprocess((value) => {
  if (typeof value === 'string') return value.toLowerCase()
  return value
}, z.enum(['debug', 'info', 'warn', 'error']).default('info'))

const envSchema = z.object({
  DATA_PATH: z.string().default('.data'),
  TOAST_API_URL: z.string().url(),
  TOAST_LINK_URL: z.string().url().default(DEFAULT_TOAST_LINK_URL),
  TOKEN_KEY: z.string().min(1),
  STATUS_CHECK_CRON: z.string().default('*/10 * * * *'),
  STATUS_CHECK_ON_STARTUP: boolSchema(true),
  SOURCE_TIMEOUT_MS: integerSchema(10000, 1000),
  DELIVERY_TIMEOUT_MS: integerSchema(10000, 1000),
  DELIVERY_CONCURRENCY: integerSchema(8, 1),
  STORE_LOCK_TIMEOUT_MS: integerSchema(5000, 100),
  REDIS_URL: optionalString,
  TRIGGER_QUEUE_NAME: z.string().min(1).default('french-toast:status-check'),
  TRIGGER_QUEUE_BLOCK_SECONDS: integerSchema(5, 1),
  LOG_LEVEL: logLevelSchema,
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
  TZ: optionalString,
})

export type AppConfig = z.infer<typeof envSchema> & {
  logSummaryPath: string
  logDetailPath: string
  timezone: string
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env)
  const logsPath = path.join(parsed.DATA_PATH, 'logs')
  const logSummaryPath = parsed.LOG_SUMMARY_PATH
    ? parsed.LOG_SUMMARY_PATH
    : path.join(logsPath, 'summary.log')
  const logDetailPath = parsed.LOG_DETAIL_PATH
    ? parsed.LOG_DETAIL_PATH
    : path.join(logsPath, 'detail.log')

  return {
    ...parsed,
    logSummaryPath,
    logDetailPath,
    timezone: parsed.TZ ?? 'America/New_York',
  }
}
