import { randomUUID } from 'node:crypto'
import fs from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { z } from 'zod'
import { logger as rootLogger } from '../../utils/logger.js'
import { sleep } from '../../utils/time.js'
import { PersistenceError } from '../errors.js'

const logger = rootLogger.child('lease')

const DEFAULT_TTL_MS = 30_000
const DEFAULT_RETRY_DELAY_MS = 25

const leaseSchema = z.object({
  holder: z.string().min(1),
  expiresAt: z.string().min(1),
  acquiredAt: z.string().min(1),
})

export interface FileLeaseOptions {
  lockPath: string
  waitTimeoutMs: number
  ttlMs?: number
  retryDelayMs?: number
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

/**
 * Expiring lock file guarding one store file. Every acquisition gets its own
 * holder token, so concurrent callers inside one process exclude each other
 * as well as other processes sharing the data directory.
 */
export class FileLease {
  private readonly lockPath: string
  private readonly waitTimeoutMs: number
  private readonly ttlMs: number
  private readonly retryDelayMs: number

  constructor(options: FileLeaseOptions) {
    this.lockPath = options.lockPath
    this.waitTimeoutMs = options.waitTimeoutMs
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const holder = await this.acquire()
    try {
      return await task()
    }
    finally {
      await this.release(holder)
    }
  }

  async acquire(): Promise<string> {
    const holder = `${os.hostname()}-${process.pid}-${randomUUID()}`
    const deadline = Date.now() + this.waitTimeoutMs

    try {
      await fs.mkdir(path.dirname(this.lockPath), { recursive: true })
    }
    catch (error) {
      throw new PersistenceError('Lease directory could not be created', this.lockPath, error)
    }

    while (true) {
      if (await this.tryAcquire(holder)) return holder
      if (Date.now() >= deadline) {
        throw new PersistenceError(`Lease not acquired within ${this.waitTimeoutMs}ms`, this.lockPath)
      }
      await sleep(this.retryDelayMs)
    }
  }

  async release(holder: string): Promise<void> {
    try {
      const raw = await fs.readFile(this.lockPath, 'utf8')
      const existing = leaseSchema.parse(JSON.parse(raw))
      if (existing.holder !== holder) return
      await fs.rm(this.lockPath)
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return
      logger.debug('Lease release skipped', { path: this.lockPath, error })
    }
  }

  private async tryAcquire(holder: string): Promise<boolean> {
    const now = Date.now()
    const lease = {
      holder,
      acquiredAt: new Date(now).toISOString(),
      expiresAt: new Date(now + this.ttlMs).toISOString(),
    }

    try {
      const handle = await fs.open(this.lockPath, 'wx')
      try {
        await handle.writeFile(JSON.stringify(lease), 'utf8')
      }
      finally {
        await handle.close()
      }
      return true
    }
    catch (error) {
      if (!isNodeError(error) || error.code !== 'EEXIST') {
        throw new PersistenceError('Lease file could not be created', this.lockPath, error)
      }
    }

    try {
      const raw = await fs.readFile(this.lockPath, 'utf8')
      const existing = leaseSchema.parse(JSON.parse(raw))
      const expiresAt = new Date(existing.expiresAt).getTime()
      if (Number.isFinite(expiresAt) && expiresAt > now) {
        return false
      }
      logger.warn('Expired lease found; removing', {
        path: this.lockPath,
        holder: existing.holder,
        expiresAt: existing.expiresAt,
      })
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return false
      // The holder may still be writing its lease; only stale unreadable files are removed.
      const stat = await fs.stat(this.lockPath).catch(() => null)
      if (!stat || now - stat.mtimeMs < this.ttlMs) return false
      logger.warn('Unreadable lease found; removing', { path: this.lockPath, error })
    }

    await fs.rm(this.lockPath, { force: true })
    return false
  }
}
