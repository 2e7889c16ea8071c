/**
 * Function Result Caching Types
 *
 * Persistent memoization: one JSON table per function name, keyed by a
 * fingerprint of the call arguments, holding tagged payloads.
 */

import type { Logger } from '../logger'

/**
 * A value that survives JSON.stringify / JSON.parse unchanged.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue }

/**
 * Serialized result, tagged with the strategy that produced it.
 *
 * - json: the value itself, embedded in the table
 * - pickle: hex of the V8 structured-clone bytes (Map, Set, Date, bigint, undefined, cycles...)
 *   for object graphs built only from types the clone restores with their prototype
 * - string: lossy text fallback for values neither of the above can hold
 */
export type SerializedPayload =
  | { readonly type: 'json'; readonly value: JsonValue }
  | { readonly type: 'pickle'; readonly value: string }
  | { readonly type: 'string'; readonly value: string }

export type PayloadType = SerializedPayload['type']

/**
 * Persisted table for one function: fingerprint -> payload.
 */
export type CacheTable = Record<string, SerializedPayload>

/**
 * Wrapper so that cached null/undefined results are still hits.
 */
export interface CachedValue<T = unknown> {
  readonly value: T
}

/**
 * Named arguments, hashed sorted by name.
 */
export type NamedArgs = Readonly<Record<string, unknown>>

export interface FingerprintOptions {
  /**
   * Drop the first positional argument when it is an object instance
   * (receiver-first functions such as `(client, prompt) => ...`).
   */
  readonly skipReceiver?: boolean | undefined
}

export interface CacheManagerOptions {
  /** Directory holding the <function>.json tables (default: 'cache') */
  readonly cacheDir?: string | undefined
  readonly logger?: Logger | undefined
  /** Called when a result could only be stored as its lossy string form */
  readonly onFallback?: ((functionName: string, value: unknown) => void) | undefined
}

export interface MemoizeOptions extends FingerprintOptions {
  /** Table name; defaults to the wrapped function's own name */
  readonly name?: string | undefined
}

export interface MemoizedRecord<R> {
  readonly result: R
  readonly servedFromCache: boolean
}

/**
 * Per-file detail reported by inspectCache. `entryCount` is 'error' for
 * tables that fail to parse.
 */
export interface CacheFileInfo {
  readonly name: string
  readonly size: number
  readonly entryCount: number | 'error'
}

export interface CacheInfo {
  readonly fileCount: number
  readonly totalBytes: number
  readonly files: readonly CacheFileInfo[]
}

export const DEFAULT_CACHE_DIR = 'cache'

export const TABLE_EXTENSION = '.json'
