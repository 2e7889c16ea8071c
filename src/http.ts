/**
 * HTTP Utilities
 *
 * Guarded fetch and uniform mapping of HTTP failures to Result errors.
 */

import type { ApiError, FetchFn, Result } from './types'

/**
 * Check if running in CI environment.
 */
function isCI(): boolean {
  return process.env['CI'] === 'true'
}

/**
 * Check if running tests.
 */
function isTestMode(): boolean {
  return process.env['NODE_ENV'] === 'test' || process.env['VITEST'] === 'true'
}

/**
 * Real HTTP requests are blocked when tests run in CI.
 * Tests inject their own fetch function instead.
 */
function shouldBlockHttpRequests(): boolean {
  return isCI() && isTestMode()
}

/**
 * Error thrown when a real HTTP request is made from tests in CI.
 */
export class BlockedHttpRequestError extends Error {
  constructor(url: string) {
    super(
      `HTTP request to ${url} blocked: running tests in CI. ` +
        'Inject a fetch function into the client under test.'
    )
    this.name = 'BlockedHttpRequestError'
  }
}

/**
 * Standard HTTP response interface for API calls.
 */
export interface HttpResponse {
  ok: boolean
  status: number
  headers: {
    get(name: string): string | null
  }
  text(): Promise<string>
  json(): Promise<unknown>
}

/**
 * Default fetch for the API clients - throws when HTTP requests are blocked.
 */
export const guardedFetch: FetchFn = (input, init) => {
  let url: string
  if (typeof input === 'string') {
    url = input
  } else if (input instanceof URL) {
    url = input.href
  } else {
    url = input.url
  }
  if (shouldBlockHttpRequests()) {
    throw new BlockedHttpRequestError(url)
  }
  return fetch(input, init)
}

/**
 * Handle HTTP error responses uniformly across all API modules.
 */
export async function handleHttpError(response: HttpResponse): Promise<Result<never>> {
  const errorText = await response.text()

  if (response.status === 429) {
    const retryAfter = response.headers.get('retry-after')
    return {
      ok: false,
      error: {
        type: 'rate_limit',
        message: `Rate limited: ${errorText}`,
        retryAfter: retryAfter ? Number.parseInt(retryAfter, 10) : undefined
      }
    }
  }

  if (response.status === 401 || response.status === 403) {
    return { ok: false, error: { type: 'auth', message: `Authentication failed: ${errorText}` } }
  }

  if (response.status === 402) {
    return { ok: false, error: { type: 'quota', message: `Insufficient credits: ${errorText}` } }
  }

  if (response.status === 400 || response.status === 422) {
    return {
      ok: false,
      error: { type: 'invalid_request', message: `Invalid request ${response.status}: ${errorText}` }
    }
  }

  return {
    ok: false,
    error: { type: 'network', message: `API error ${response.status}: ${errorText}` }
  }
}

/**
 * Handle network errors uniformly across all API modules.
 */
export function handleNetworkError(error: unknown): Result<never> {
  const message = error instanceof Error ? error.message : String(error)
  return { ok: false, error: { type: 'network', message: `Network error: ${message}` } }
}

/**
 * Create an error result for empty API responses.
 */
export function emptyResponseError(): Result<never> {
  return { ok: false, error: { type: 'invalid_response', message: 'Empty response from API' } }
}

/**
 * Thrown where a failed Result has to become an exception, e.g. inside a
 * memoized call so that failures are never cached.
 */
export class ApiCallError extends Error {
  constructor(readonly apiError: ApiError) {
    super(apiError.message)
    this.name = 'ApiCallError'
  }
}

/**
 * Unwrap a Result, throwing ApiCallError on failure.
 */
export function unwrapResult<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new ApiCallError(result.error)
  }
  return result.value
}
