import fs from 'node:fs'
import path from 'node:path'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogMeta = Record<string, unknown> | undefined

export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
  child(scope: string): Logger
}

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let currentLevel: LogLevel = 'info'
let summaryStream: fs.WriteStream | null = null
let detailStream: fs.WriteStream | null = null

export interface LoggerOptions {
  level: LogLevel
  summaryPath: string
  detailPath: string
}

export async function configureLogger(options: LoggerOptions): Promise<void> {
  currentLevel = options.level

  await fs.promises.mkdir(path.dirname(options.summaryPath), { recursive: true })
  await fs.promises.mkdir(path.dirname(options.detailPath), { recursive: true })

  await closeLogStreams()

  summaryStream = fs.createWriteStream(options.summaryPath, { flags: 'a' })
  detailStream = fs.createWriteStream(options.detailPath, { flags: 'a' })
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level
}

function endStream(stream: fs.WriteStream | null): Promise<void> {
  if (!stream) return Promise.resolve()
  return new Promise((resolve) => {
    stream.end(() => resolve())
  })
}

/** Flushes and closes the log files; console output continues. */
export async function closeLogStreams(): Promise<void> {
  const streams = [summaryStream, detailStream]
  summaryStream = null
  detailStream = null
  await Promise.all(streams.map(endStream))
}

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] >= levelOrder[currentLevel]
}

function serializeError(error: Error): Record<string, unknown> {
  const cause = error.cause
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    cause: cause instanceof Error ? serializeError(cause) : cause,
  }
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) return serializeError(value)
  if (value instanceof Map) return Object.fromEntries(value.entries())
  if (value instanceof Set) return Array.from(value.values())
  if (typeof value === 'bigint') return value.toString()
  return value
}

function safeJson(value: unknown, pretty: boolean): string {
  const seen = new WeakSet<object>()
  const replacer = (_key: string, val: unknown) => {
    if (typeof val === 'object' && val !== null) {
      if (seen.has(val)) return '[Circular]'
      seen.add(val)
    }
    return toSerializable(val)
  }
  return JSON.stringify(value, replacer, pretty ? 2 : 0)
}

function formatMeta(meta: LogMeta, detail: boolean): string | null {
  if (!meta || Object.keys(meta).length === 0) return null
  const compact = safeJson(meta, false)
  if (!detail) return compact
  if (compact.length > 200) {
    return safeJson(meta, true)
  }
  return compact
}

function indentLines(value: string, prefix = '  '): string {
  return value
    .split('\n')
    .map(line => `${prefix}${line}`)
    .join('\n')
}

export function formatLine(level: LogLevel, scope: string | undefined, message: string, meta: LogMeta, detail: boolean): string {
  const scopeText = scope ? ` [${scope}]` : ''
  const base = `[${new Date().toISOString()}] [${level}]${scopeText} ${message}`
  const metaText = formatMeta(meta, detail)
  if (!metaText) return base
  if (!metaText.includes('\n')) return `${base} | ${metaText}`
  return `${base}\n${indentLines(metaText)}`
}

function writeSummary(line: string, level: LogLevel): void {
  if (level === 'error') {
    console.error(line)
  }
  else if (level === 'warn') {
    console.warn(line)
  }
  else {
    console.log(line)
  }

  summaryStream?.write(`${line}\n`)
}

function log(level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta): void {
  if (!shouldLog(level)) return
  writeSummary(formatLine(level, scope, message, meta, false), level)
  detailStream?.write(`${formatLine(level, scope, message, meta, true)}\n`)
}

function createLogger(scope?: string): Logger {
  return {
    debug: (message, meta) => log('debug', scope, message, meta),
    info: (message, meta) => log('info', scope, message, meta),
    warn: (message, meta) => log('warn', scope, message, meta),
    error: (message, meta) => log('error', scope, message, meta),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  }
}

export const logger = createLogger()

export function asErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
