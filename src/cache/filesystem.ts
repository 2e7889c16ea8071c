/**
 * Filesystem Table Storage
 *
 * One pretty-printed JSON object per function: `<cacheDir>/<functionName>.json`.
 * Writes go to a temp file that is then renamed over the table, so a failed
 * write never leaves a truncated table behind.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { CorruptTableError } from './errors'
import { DEFAULT_CACHE_DIR, TABLE_EXTENSION } from './types'

/** Table contents as read from disk; entries are validated on deserialize. */
export type RawTable = Record<string, unknown>

const FUNCTION_NAME_PATTERN = /^[\w$.-]+$/

/**
 * Throws if tests try to use the working-directory cache.
 * Tests must use isolated temp directories.
 */
export function guardAgainstWorkingCache(cacheDir: string): void {
  const isTest = process.env['VITEST'] === 'true' || process.env['NODE_ENV'] === 'test'
  if (!isTest) return

  if (resolve(cacheDir) === resolve(DEFAULT_CACHE_DIR)) {
    throw new Error(
      `TEST ERROR: Attempted to use the default cache directory!\n` +
        `  Cache dir: ${resolve(cacheDir)}\n` +
        `  Tests must use isolated temp directories.`
    )
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Table file path for a function. The name becomes a file name, so it must be
 * non-empty and free of path separators.
 */
export function tablePath(cacheDir: string, functionName: string): string {
  assertFunctionName(functionName)
  return join(cacheDir, `${functionName}${TABLE_EXTENSION}`)
}

export function assertFunctionName(functionName: string): void {
  if (!FUNCTION_NAME_PATTERN.test(functionName)) {
    throw new Error(
      `Invalid cache function name "${functionName}": use letters, digits, _, $, . or -`
    )
  }
}

/**
 * Read a table.
 *
 * @returns null when the file does not exist
 * @throws CorruptTableError when the file is not a JSON object
 */
export function readTable(path: string): RawTable | null {
  if (!existsSync(path)) {
    return null
  }

  const raw = readFileSync(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new CorruptTableError(path, error instanceof Error ? error.message : String(error))
  }

  if (!isRecord(parsed)) {
    throw new CorruptTableError(path, 'top-level value is not an object')
  }
  return parsed
}

/**
 * Write a whole table: temp file in the same directory, then rename.
 */
export function writeTable(path: string, table: RawTable, cacheDir: string): void {
  if (!existsSync(cacheDir)) {
    mkdirSync(cacheDir, { recursive: true })
  }

  const tempPath = `${path}.${process.pid}.${Date.now()}.tmp`
  try {
    writeFileSync(tempPath, JSON.stringify(table, null, 2), 'utf-8')
    renameSync(tempPath, path)
  } catch (error) {
    rmSync(tempPath, { force: true })
    throw error
  }
}
