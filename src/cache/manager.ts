/**
 * Cache Manager
 *
 * Persistent lookup/store of function results. No module-level instance:
 * construct one per cache directory and pass it to the call sites that cache.
 */

import type { Logger } from '../logger'
import { silentLogger } from '../logger'
import { CorruptTableError } from './errors'
import { guardAgainstWorkingCache, type RawTable, readTable, tablePath, writeTable } from './filesystem'
import { fingerprint } from './key'
import { clearAll, clearFunction, inspectCache } from './maintenance'
import { deserializePayload, serializeValue } from './serialize'
import {
  type CachedValue,
  type CacheInfo,
  type CacheManagerOptions,
  DEFAULT_CACHE_DIR,
  type FingerprintOptions,
  type NamedArgs
} from './types'

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class CacheManager {
  readonly cacheDir: string
  private readonly logger: Logger
  private readonly onFallback: ((functionName: string, value: unknown) => void) | undefined

  constructor(options: CacheManagerOptions = {}) {
    this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR
    this.logger = options.logger ?? silentLogger
    this.onFallback = options.onFallback
    guardAgainstWorkingCache(this.cacheDir)
  }

  /**
   * Get a cached result.
   *
   * An unreadable or unparsable table is logged and treated as a miss.
   *
   * @returns The cached value wrapped in `{ value }`, or null if there is no entry
   * @throws DeserializationError when the entry exists but cannot be decoded
   */
  lookup(
    functionName: string,
    args: readonly unknown[],
    named: NamedArgs = {},
    options: FingerprintOptions = {}
  ): CachedValue | null {
    const key = fingerprint(args, named, options)
    const path = tablePath(this.cacheDir, functionName)

    let table: RawTable | null
    try {
      table = readTable(path)
    } catch (error) {
      this.logger.warn(`Error reading cache for ${functionName}: ${errorMessage(error)}`)
      return null
    }

    if (!table || !Object.hasOwn(table, key)) {
      return null
    }
    return { value: deserializePayload(table[key]) }
  }

  /**
   * Store a result, keeping every other entry of the function's table.
   * Write failures are logged and the entry is dropped.
   */
  store(
    functionName: string,
    args: readonly unknown[],
    named: NamedArgs,
    value: unknown,
    options: FingerprintOptions = {}
  ): void {
    const key = fingerprint(args, named, options)
    const path = tablePath(this.cacheDir, functionName)

    const payload = serializeValue(value)
    if (payload.type === 'string') {
      this.logger.warn(`Result of ${functionName} is not serializable, caching its string form`)
      this.onFallback?.(functionName, value)
    }

    try {
      let table: RawTable
      try {
        table = readTable(path) ?? {}
      } catch (error) {
        if (!(error instanceof CorruptTableError)) throw error
        this.logger.warn(`Replacing corrupt cache table for ${functionName}`)
        table = {}
      }

      table[key] = payload
      writeTable(path, table, this.cacheDir)
      this.logger.verbose(`Cached ${functionName} [${key}] as ${payload.type}`)
    } catch (error) {
      this.logger.error(`Error saving cache for ${functionName}: ${errorMessage(error)}`)
    }
  }

  /** Delete every table in this manager's directory */
  clear(): void {
    clearAll(this.cacheDir)
  }

  /** Delete one function's table */
  clearFunction(functionName: string): void {
    clearFunction(functionName, this.cacheDir)
  }

  inspect(): CacheInfo {
    return inspectCache(this.cacheDir)
  }
}

/**
 * Build an isolated cache manager.
 */
export function createCacheManager(options: CacheManagerOptions = {}): CacheManager {
  return new CacheManager(options)
}
