import { describe, expect, it, vi } from 'vitest'
import type { Result } from '../types'
import { withRetries } from './retry'

const rateLimited: Result<string> = {
  ok: false,
  error: { type: 'rate_limit', message: 'Rate limited: slow down' }
}

describe('withRetries', () => {
  it('returns the first success without waiting', async () => {
    const sleep = vi.fn(async () => {})
    const call = vi.fn(async (): Promise<Result<string>> => ({ ok: true, value: 'done' }))

    const result = await withRetries(call, { sleep })

    expect(result).toEqual({ ok: true, value: 'done' })
    expect(call).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('retries transient errors with exponential backoff', async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const call = vi
      .fn<(attempt: number) => Promise<Result<string>>>()
      .mockResolvedValueOnce(rateLimited)
      .mockResolvedValueOnce({ ok: false, error: { type: 'network', message: 'reset' } })
      .mockResolvedValueOnce({ ok: true, value: 'done' })

    const result = await withRetries(call, { maxRetries: 3, baseDelayMs: 100, sleep })

    expect(result).toEqual({ ok: true, value: 'done' })
    expect(call.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2])
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200])
  })

  it('honours retry-after', async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const call = vi
      .fn<(attempt: number) => Promise<Result<string>>>()
      .mockResolvedValueOnce({
        ok: false,
        error: { type: 'rate_limit', message: 'wait', retryAfter: 7 }
      })
      .mockResolvedValueOnce({ ok: true, value: 'done' })

    await withRetries(call, { sleep })

    expect(sleep).toHaveBeenCalledWith(7000)
  })

  it('gives up after the last attempt', async () => {
    const sleep = vi.fn(async () => {})
    const call = vi.fn(async () => rateLimited)

    const result = await withRetries(call, { maxRetries: 2, sleep })

    expect(call).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(result).toEqual({
      ok: false,
      error: {
        type: 'rate_limit',
        message: 'Failed after 2 attempts. Last error: Rate limited: slow down'
      }
    })
  })

  it('does not retry auth errors', async () => {
    const sleep = vi.fn(async () => {})
    const call = vi.fn(
      async (): Promise<Result<string>> => ({
        ok: false,
        error: { type: 'auth', message: 'Authentication failed: bad key' }
      })
    )

    const result = await withRetries(call, { sleep })

    expect(call).toHaveBeenCalledTimes(1)
    expect(result.ok).toBe(false)
  })

  it('logs each failed attempt', async () => {
    const warn = vi.fn()
    const logger = {
      log: vi.fn(),
      verbose: vi.fn(),
      warn,
      success: vi.fn(),
      error: vi.fn(),
      progress: vi.fn()
    }

    await withRetries(async () => rateLimited, { maxRetries: 1, logger })

    expect(warn).toHaveBeenCalledWith('Attempt 1 failed with error: Rate limited: slow down')
  })
})
