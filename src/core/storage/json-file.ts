import { randomUUID } from 'node:crypto'
import fs from 'node:fs/promises'
import path from 'node:path'
import type { z } from 'zod'
import { PersistenceError } from '../errors.js'
import { isNodeError } from './lease.js'

/**
 * Reads and validates a JSON document. A missing file yields `fallback()`;
 * unreadable or invalid content is a PersistenceError, never a silent reset.
 */
export async function readJsonFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  fallback: () => z.output<T>,
): Promise<z.output<T>> {
  let raw: string
  try {
    raw = await fs.readFile(filePath, 'utf8')
  }
  catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return fallback()
    throw new PersistenceError('Store read failed', filePath, error)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  }
  catch (error) {
    throw new PersistenceError('Store file is not valid JSON', filePath, error)
  }

  const result = schema.safeParse(parsed)
  if (!result.success) {
    throw new PersistenceError('Store file failed validation', filePath, result.error)
  }
  return result.data
}

// Readers see either the previous document or the new one, never a partial write.
export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true })
    await fs.writeFile(tempPath, JSON.stringify(value, null, 2), 'utf8')
    await fs.rename(tempPath, filePath)
  }
  catch (error) {
    await fs.rm(tempPath, { force: true })
    throw new PersistenceError('Store write failed', filePath, error)
  }
}
