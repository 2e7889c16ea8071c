import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { FetchFn } from '../../types'
import { ReplicateClient } from './client'
import { customModel, inputParams, REPLICATE_MODELS, withParams } from './models'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  })
}

const noSleep = async (): Promise<void> => {}

describe('replicate models', () => {
  it('should build input from defined params and the prompt', () => {
    expect(inputParams(REPLICATE_MODELS.FLUX_1_1_PRO_ULTRA, 'a lighthouse at dusk')).toEqual({
      aspect_ratio: '1:1',
      output_format: 'jpg',
      safety_tolerance: 2,
      prompt: 'a lighthouse at dusk'
    })
  })

  it('should drop undefined params', () => {
    const model = customModel('owner/model', { seed: undefined, steps: 20 })

    expect(inputParams(model)).toEqual({ steps: 20 })
  })

  it('should override params without touching the preset', () => {
    const seeded = withParams(REPLICATE_MODELS.FLUX_KONTEXT_PRO, { seed: 42 })

    expect(seeded.params.seed).toBe(42)
    expect(seeded.name).toBe('black-forest-labs/flux-kontext-pro')
    expect(REPLICATE_MODELS.FLUX_KONTEXT_PRO.params.seed).toBeUndefined()
  })
})

describe('ReplicateClient', () => {
  it('should return the output of a prediction that finishes while waiting', async () => {
    const fetchMock = vi.fn<FetchFn>().mockResolvedValue(
      jsonResponse({ id: 'p1', status: 'succeeded', output: 'https://example.com/out.jpg' })
    )
    const client = new ReplicateClient({ apiToken: 'test-token', fetch: fetchMock })

    const result = await client.run('a lighthouse')

    expect(result).toEqual({ ok: true, value: ['https://example.com/out.jpg'] })
    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe(
      'https://api.replicate.com/v1/models/black-forest-labs/flux-1.1-pro-ultra/predictions'
    )
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
      Prefer: 'wait'
    })
    expect(JSON.parse(String(init?.body))).toEqual({
      input: {
        aspect_ratio: '1:1',
        output_format: 'jpg',
        safety_tolerance: 2,
        prompt: 'a lighthouse'
      }
    })
  })

  it('should send pinned versions to the generic endpoint', async () => {
    const fetchMock = vi
      .fn<FetchFn>()
      .mockResolvedValue(jsonResponse({ id: 'p1', status: 'succeeded', output: ['a.png'] }))
    const client = new ReplicateClient({ apiToken: 'test-token', fetch: fetchMock })

    await client.run('a lighthouse', { model: customModel('owner/model:abc123', {}) })

    const [url, init] = fetchMock.mock.calls[0] ?? []
    expect(url).toBe('https://api.replicate.com/v1/predictions')
    expect(JSON.parse(String(init?.body))).toEqual({
      version: 'abc123',
      input: { prompt: 'a lighthouse' }
    })
  })

  it('should poll until the prediction settles', async () => {
    const sleep = vi.fn(async (_ms: number) => {})
    const getUrl = 'https://api.replicate.com/v1/predictions/p2'
    const fetchMock = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(jsonResponse({ id: 'p2', status: 'starting', urls: { get: getUrl } }))
      .mockResolvedValueOnce(jsonResponse({ id: 'p2', status: 'processing' }))
      .mockResolvedValueOnce(
        jsonResponse({ id: 'p2', status: 'succeeded', output: ['one.jpg', 'two.jpg'] })
      )
    const client = new ReplicateClient({
      apiToken: 'test-token',
      fetch: fetchMock,
      pollIntervalMs: 5,
      sleep
    })

    const result = await client.run('a lighthouse')

    expect(result).toEqual({ ok: true, value: ['one.jpg', 'two.jpg'] })
    expect(fetchMock).toHaveBeenCalledTimes(3)
    expect(fetchMock.mock.calls[1]?.[0]).toBe(getUrl)
    expect(fetchMock.mock.calls[2]?.[0]).toBe(getUrl)
    expect(sleep.mock.calls).toEqual([[5], [5]])
  })

  it('should report failed predictions', async () => {
    const fetchMock = vi
      .fn<FetchFn>()
      .mockResolvedValue(jsonResponse({ id: 'p3', status: 'failed', error: 'flagged as sensitive' }))
    const client = new ReplicateClient({ apiToken: 'test-token', fetch: fetchMock, sleep: noSleep })

    const result = await client.run('a lighthouse', { maxRetries: 1 })

    expect(result).toEqual({
      ok: false,
      error: {
        type: 'invalid_response',
        message: 'Failed after 1 attempts. Last error: Prediction p3 failed: flagged as sensitive'
      }
    })
  })

  it('should give up after the poll limit', async () => {
    const fetchMock = vi
      .fn<FetchFn>()
      .mockImplementation(async () => jsonResponse({ id: 'p4', status: 'processing' }))
    const client = new ReplicateClient({
      apiToken: 'test-token',
      fetch: fetchMock,
      maxPolls: 2,
      sleep: noSleep
    })

    const result = await client.run('a lighthouse', { maxRetries: 1 })

    expect(fetchMock).toHaveBeenCalledTimes(3)
    expect(result).toEqual({
      ok: false,
      error: {
        type: 'network',
        message: 'Failed after 1 attempts. Last error: Prediction p4 did not finish after 2 polls'
      }
    })
  })

  it('should fail without retrying on a bad token', async () => {
    const fetchMock = vi
      .fn<FetchFn>()
      .mockResolvedValue(new Response('Unauthenticated', { status: 401 }))
    const client = new ReplicateClient({ apiToken: 'test-token', fetch: fetchMock, sleep: noSleep })

    const result = await client.run('a lighthouse')

    expect(fetchMock).toHaveBeenCalledTimes(1)
    expect(result).toEqual({
      ok: false,
      error: { type: 'auth', message: 'Authentication failed: Unauthenticated' }
    })
  })

  describe('downloadFile', () => {
    let testDir: string

    beforeEach(() => {
      testDir = join(tmpdir(), `replicate-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
      mkdirSync(testDir, { recursive: true })
    })

    afterEach(() => {
      if (existsSync(testDir)) {
        rmSync(testDir, { recursive: true, force: true })
      }
    })

    it('should save the response body', async () => {
      const fetchMock = vi
        .fn<FetchFn>()
        .mockResolvedValue(new Response(new Uint8Array([1, 2, 3]), { status: 200 }))
      const client = new ReplicateClient({ apiToken: 'test-token', fetch: fetchMock })
      const path = join(testDir, 'images', 'out.jpg')

      const result = await client.downloadFile('https://example.com/out.jpg', path)

      expect(result).toEqual({ ok: true, value: path })
      expect([...readFileSync(path)]).toEqual([1, 2, 3])
    })

    it('should return HTTP errors', async () => {
      const fetchMock = vi.fn<FetchFn>().mockResolvedValue(new Response('missing', { status: 404 }))
      const client = new ReplicateClient({ apiToken: 'test-token', fetch: fetchMock })

      const result = await client.downloadFile('https://example.com/out.jpg', join(testDir, 'x.jpg'))

      expect(result).toEqual({
        ok: false,
        error: { type: 'network', message: 'API error 404: missing' }
      })
      expect(existsSync(join(testDir, 'x.jpg'))).toBe(false)
    })
  })
})
