import fs from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import type { StatusRecord } from '../../types/index.js'
import { logger as rootLogger } from '../../utils/logger.js'
import { PersistenceError } from '../errors.js'
import { readJsonFile, writeJsonFileAtomic } from '../storage/json-file.js'
import { FileLease, isNodeError } from '../storage/lease.js'

const logger = rootLogger.child('status-store')

export const SENTINEL_STATUS = ''

const statusSchema = z.object({
  id: z.literal(1),
  status: z.string(),
  updated: z.string().nullable(),
})

function sentinelRecord(): StatusRecord {
  return { id: 1, status: SENTINEL_STATUS, updated: null }
}

export interface StatusStoreOptions {
  dataPath: string
  lockTimeoutMs: number
}

export interface StatusCommitResult {
  committed: boolean
  record: StatusRecord
}

export class StatusStore {
  readonly statusPath: string
  private readonly lease: FileLease

  constructor(options: StatusStoreOptions) {
    this.statusPath = path.join(options.dataPath, 'status.json')
    this.lease = new FileLease({
      lockPath: path.join(options.dataPath, 'status.lock'),
      waitTimeoutMs: options.lockTimeoutMs,
    })
  }

  /** Fresh read of the singleton row; the sentinel row when nothing is stored yet. */
  async load(): Promise<StatusRecord> {
    return readJsonFile(this.statusPath, statusSchema, sentinelRecord)
  }

  async initialize(): Promise<StatusRecord> {
    return this.lease.run(async () => {
      try {
        await fs.access(this.statusPath)
      }
      catch (error) {
        if (!isNodeError(error) || error.code !== 'ENOENT') {
          throw new PersistenceError('Status row check failed', this.statusPath, error)
        }
        const record = sentinelRecord()
        await writeJsonFileAtomic(this.statusPath, record)
        logger.info('Status row created', { path: this.statusPath })
        return record
      }
      return this.load()
    })
  }

  /**
   * Stores `status` with `updated` unless the row already holds that status,
   * in which case another writer got there first and nothing is written.
   */
  async commitChange(status: string, updated: string): Promise<StatusCommitResult> {
    return this.lease.run(async () => {
      const current = await this.load()
      if (current.status === status) {
        logger.debug('Status already stored; commit skipped', { status, updated: current.updated })
        return { committed: false, record: current }
      }

      const record: StatusRecord = { id: 1, status, updated }
      await writeJsonFileAtomic(this.statusPath, record)
      logger.debug('Status committed', { previous: current.status, status, updated })
      return { committed: true, record }
    })
  }
}
