/**
 * Memoization Wrappers
 *
 * Wrap a function with a CacheManager: look up, call on a miss, store, and
 * report whether the result came from the cache. Two result shapes:
 *
 * ```ts
 * const [summary, fromCache] = memoize(cache, summarize)(text)
 * const { result, servedFromCache } = memoizeRecord(cache, summarize)(text)
 * ```
 *
 * The table is named after the function (or `options.name`), so anonymous
 * functions need an explicit name. `this` is passed through and never hashed.
 */

import { assertFunctionName } from './filesystem'
import { CacheManager } from './manager'
import type { CacheManagerOptions, FingerprintOptions, MemoizedRecord, MemoizeOptions } from './types'

type Fn<This, A extends unknown[], R> = (this: This, ...args: A) => R

function resolveName(fn: { readonly name: string }, options: MemoizeOptions): string {
  const name = options.name ?? fn.name
  if (!name) {
    throw new Error('Cannot memoize an anonymous function without a name option')
  }
  assertFunctionName(name)
  return name
}

function fingerprintOptions(options: MemoizeOptions): FingerprintOptions {
  return { skipReceiver: options.skipReceiver }
}

/**
 * Wrap a function; calls return `{ result, servedFromCache }`.
 */
export function memoizeRecord<This, A extends unknown[], R>(
  cache: CacheManager,
  fn: Fn<This, A, R>,
  options: MemoizeOptions = {}
): Fn<This, A, MemoizedRecord<R>> {
  const name = resolveName(fn, options)
  const keyOptions = fingerprintOptions(options)

  return function (this: This, ...args: A): MemoizedRecord<R> {
    const cached = cache.lookup(name, args, {}, keyOptions)
    if (cached) {
      // The table only holds what this function returned
      return { result: cached.value as R, servedFromCache: true }
    }

    const result = fn.apply(this, args)
    cache.store(name, args, {}, result, keyOptions)
    return { result, servedFromCache: false }
  }
}

/**
 * Wrap a function; calls return `[result, servedFromCache]`.
 */
export function memoize<This, A extends unknown[], R>(
  cache: CacheManager,
  fn: Fn<This, A, R>,
  options: MemoizeOptions = {}
): Fn<This, A, [result: R, servedFromCache: boolean]> {
  const wrapped = memoizeRecord(cache, fn, { ...options, name: resolveName(fn, options) })
  return function (this: This, ...args: A): [R, boolean] {
    const { result, servedFromCache } = wrapped.apply(this, args)
    return [result, servedFromCache]
  }
}

/**
 * Async variant of memoizeRecord. Only fulfilled results are stored.
 */
export function memoizeAsyncRecord<This, A extends unknown[], R>(
  cache: CacheManager,
  fn: Fn<This, A, Promise<R>>,
  options: MemoizeOptions = {}
): Fn<This, A, Promise<MemoizedRecord<R>>> {
  const name = resolveName(fn, options)
  const keyOptions = fingerprintOptions(options)

  return async function (this: This, ...args: A): Promise<MemoizedRecord<R>> {
    const cached = cache.lookup(name, args, {}, keyOptions)
    if (cached) {
      return { result: cached.value as R, servedFromCache: true }
    }

    const result = await fn.apply(this, args)
    cache.store(name, args, {}, result, keyOptions)
    return { result, servedFromCache: false }
  }
}

/**
 * Async variant of memoize. Only fulfilled results are stored.
 */
export function memoizeAsync<This, A extends unknown[], R>(
  cache: CacheManager,
  fn: Fn<This, A, Promise<R>>,
  options: MemoizeOptions = {}
): Fn<This, A, Promise<[result: R, servedFromCache: boolean]>> {
  const wrapped = memoizeAsyncRecord(cache, fn, { ...options, name: resolveName(fn, options) })
  return async function (this: This, ...args: A): Promise<[R, boolean]> {
    const { result, servedFromCache } = await wrapped.apply(this, args)
    return [result, servedFromCache]
  }
}

/**
 * Memoizers bound to a fresh manager rooted at `cacheDir`.
 */
export function withCacheDir(
  cacheDir: string,
  options: Omit<CacheManagerOptions, 'cacheDir'> = {}
) {
  const cache = new CacheManager({ ...options, cacheDir })
  return {
    cache,
    memoize: <This, A extends unknown[], R>(fn: Fn<This, A, R>, opts?: MemoizeOptions) =>
      memoize(cache, fn, opts),
    memoizeRecord: <This, A extends unknown[], R>(fn: Fn<This, A, R>, opts?: MemoizeOptions) =>
      memoizeRecord(cache, fn, opts),
    memoizeAsync: <This, A extends unknown[], R>(
      fn: Fn<This, A, Promise<R>>,
      opts?: MemoizeOptions
    ) => memoizeAsync(cache, fn, opts),
    memoizeAsyncRecord: <This, A extends unknown[], R>(
      fn: Fn<This, A, Promise<R>>,
      opts?: MemoizeOptions
    ) => memoizeAsyncRecord(cache, fn, opts)
  }
}
