/**
 * Cache Module
 *
 * Persistent per-function result caching with deterministic argument fingerprints.
 */

export { CorruptTableError, DeserializationError } from './errors'
export { describeValue, fingerprint, isReceiver, typeName } from './key'
export { clearAll, clearFunction, inspectCache } from './maintenance'
export { CacheManager, createCacheManager } from './manager'
export { memoize, memoizeAsync, memoizeAsyncRecord, memoizeRecord, withCacheDir } from './memoize'
export { deserializePayload, isJsonValue, serializeValue } from './serialize'
export type {
  CachedValue,
  CacheFileInfo,
  CacheInfo,
  CacheManagerOptions,
  CacheTable,
  FingerprintOptions,
  JsonValue,
  MemoizedRecord,
  MemoizeOptions,
  NamedArgs,
  PayloadType,
  SerializedPayload
} from './types'
export { DEFAULT_CACHE_DIR } from './types'
