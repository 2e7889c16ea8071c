/**
 * genai-kit Core Library
 *
 * Persistent per-function result caching, plus the API clients, task runner,
 * stats counter and CSV converter that use it.
 *
 * @license AGPL-3.0
 */

// Cache module
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
} from './cache/index'
export {
  CacheManager,
  CorruptTableError,
  clearAll,
  clearFunction,
  createCacheManager,
  DEFAULT_CACHE_DIR,
  DeserializationError,
  fingerprint,
  inspectCache,
  memoize,
  memoizeAsync,
  memoizeAsyncRecord,
  memoizeRecord,
  withCacheDir
} from './cache/index'
// CSV module
export {
  CsvConversionError,
  parseCsvRecords,
  readCsvRecords,
  toCsv,
  writeCsvRecords
} from './csv/converter'
// HTTP helpers
export {
  ApiCallError,
  BlockedHttpRequestError,
  emptyResponseError,
  guardedFetch,
  handleHttpError,
  handleNetworkError,
  unwrapResult
} from './http'
// Gemini module
export {
  type GeneratedImage,
  type GenerateImageOptions,
  GEMINI_IMAGE_MODEL,
  generateImage,
  imageExtension
} from './llm/gemini/image'
// OpenRouter module
export {
  type CompletionOptions,
  cachedCompletion,
  OpenRouterClient,
  type OpenRouterClientOptions
} from './llm/openrouter/client'
export {
  type CompletionResponse,
  calculateCost,
  customModel as customOpenRouterModel,
  type ModelConfig,
  OPENROUTER_MODELS,
  type OpenRouterModelKey,
  type TokenUsage
} from './llm/openrouter/models'
// Replicate module
export {
  ReplicateClient,
  type ReplicateClientOptions,
  type RunOptions
} from './llm/replicate/client'
export {
  customModel as customReplicateModel,
  type FluxKontextParams,
  type FluxProUltraParams,
  inputParams,
  REPLICATE_MODELS,
  type ReplicateInput,
  type ReplicateModelConfig,
  type ReplicateModelKey,
  withParams
} from './llm/replicate/models'
// Retries
export { type RetryOptions, withRetries } from './llm/retry'
// Logging
export { createLogger, type Logger, silentLogger } from './logger'
// Stats module
export { type Metrics, type MetricValue, StatsCounter } from './stats/counter'
// Tasks module
export {
  DEFAULT_STRATEGY,
  isLaunchStrategy,
  LAUNCH_STRATEGIES,
  type LaunchStrategy,
  type RunTasksOptions,
  type RunTasksResult,
  releaseGroups,
  runTasks
} from './tasks/runner'
export {
  runWorkerPool,
  type TaskError,
  type TaskProcessor,
  type WorkerPoolOptions,
  type WorkerPoolResult
} from './tasks/worker-pool'
// Types
export type { ApiError, ApiErrorType, FetchFn, Result } from './types'

export const VERSION = '0.1.0'
