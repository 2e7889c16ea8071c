/**
 * Retries with exponential backoff for Result-returning API calls.
 *
 * Only transient failures are retried: rate limits, network errors and
 * unparsable responses. Auth, quota and request errors return immediately.
 */

import type { Logger } from '../logger'
import { silentLogger } from '../logger'
import type { ApiError, ApiErrorType, Result } from '../types'

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_BASE_DELAY_MS = 1000

const RETRYABLE_ERRORS: ReadonlySet<ApiErrorType> = new Set([
  'rate_limit',
  'network',
  'invalid_response'
])

export interface RetryOptions {
  /** Total attempts, including the first (default 3) */
  readonly maxRetries?: number | undefined
  /** Wait before retry n is baseDelayMs * 2^(n-1) (default 1000) */
  readonly baseDelayMs?: number | undefined
  readonly logger?: Logger | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms))

function backoffMs(error: ApiError, retryIndex: number, baseDelayMs: number): number {
  if (error.retryAfter !== undefined && Number.isFinite(error.retryAfter)) {
    return error.retryAfter * 1000
  }
  return baseDelayMs * 2 ** retryIndex
}

/**
 * Run `call` until it succeeds, fails with a non-retryable error, or runs out
 * of attempts. The final error message names the attempt count.
 */
export async function withRetries<T>(
  call: (attempt: number) => Promise<Result<T>>,
  options: RetryOptions = {}
): Promise<Result<T>> {
  const maxAttempts = Math.max(1, options.maxRetries ?? DEFAULT_MAX_ATTEMPTS)
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS
  const logger = options.logger ?? silentLogger
  const wait = options.sleep ?? sleep

  let attempt = 0
  for (;;) {
    const result = await call(attempt)
    if (result.ok || !RETRYABLE_ERRORS.has(result.error.type)) {
      return result
    }

    logger.warn(`Attempt ${attempt + 1} failed with error: ${result.error.message}`)
    attempt++

    if (attempt >= maxAttempts) {
      return {
        ok: false,
        error: {
          ...result.error,
          message: `Failed after ${maxAttempts} attempts. Last error: ${result.error.message}`
        }
      }
    }
    await wait(backoffMs(result.error, attempt - 1, baseDelayMs))
  }
}
