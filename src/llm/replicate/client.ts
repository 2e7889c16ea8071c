/**
 * Replicate Client
 *
 * Runs a model prediction over Replicate's HTTP API and returns its output
 * URLs. Predictions are created with `Prefer: wait`, so fast models finish in
 * the first response; slower ones are polled until they settle.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import {
  emptyResponseError,
  guardedFetch,
  handleHttpError,
  handleNetworkError
} from '../../http'
import type { Logger } from '../../logger'
import { silentLogger } from '../../logger'
import type { FetchFn, Result } from '../../types'
import { sleep, withRetries } from '../retry'
import { inputParams, REPLICATE_MODELS, type ReplicateModelConfig } from './models'

export const REPLICATE_API_URL = 'https://api.replicate.com/v1'

const DEFAULT_POLL_INTERVAL_MS = 1000
const DEFAULT_MAX_POLLS = 300

type PredictionStatus = 'starting' | 'processing' | 'succeeded' | 'failed' | 'canceled'

interface Prediction {
  id: string
  status: PredictionStatus
  output?: string | string[] | null
  error?: string | null
  urls?: { get?: string }
}

export interface ReplicateClientOptions {
  readonly apiToken: string
  readonly fetch?: FetchFn | undefined
  readonly logger?: Logger | undefined
  /** Base backoff between retries (default 1000ms) */
  readonly retryDelayMs?: number | undefined
  readonly pollIntervalMs?: number | undefined
  /** Give up on a prediction after this many polls (default 300) */
  readonly maxPolls?: number | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

export interface RunOptions {
  readonly model?: ReplicateModelConfig | undefined
  /** Total attempts (default 3) */
  readonly maxRetries?: number | undefined
}

function isSettled(status: PredictionStatus): boolean {
  return status === 'succeeded' || status === 'failed' || status === 'canceled'
}

/**
 * Endpoint and body for a new prediction. Pinned versions go through the
 * generic endpoint, official models through their own.
 */
function createRequest(
  model: ReplicateModelConfig,
  input: Record<string, unknown>
): { url: string; body: Record<string, unknown> } {
  const [path, version] = model.name.split(':')
  if (version) {
    return { url: `${REPLICATE_API_URL}/predictions`, body: { version, input } }
  }
  return { url: `${REPLICATE_API_URL}/models/${path}/predictions`, body: { input } }
}

function outputUrls(prediction: Prediction): Result<string[]> {
  if (prediction.status !== 'succeeded') {
    return {
      ok: false,
      error: {
        type: 'invalid_response',
        message: `Prediction ${prediction.id} ${prediction.status}: ${prediction.error ?? 'no error given'}`
      }
    }
  }
  const { output } = prediction
  if (typeof output === 'string' && output) return { ok: true, value: [output] }
  if (Array.isArray(output) && output.length > 0) return { ok: true, value: output }
  return emptyResponseError()
}

export class ReplicateClient {
  private readonly fetchFn: FetchFn
  private readonly logger: Logger
  private readonly wait: (ms: number) => Promise<void>
  private readonly headers: Record<string, string>

  constructor(private readonly options: ReplicateClientOptions) {
    this.fetchFn = options.fetch ?? guardedFetch
    this.logger = options.logger ?? silentLogger
    this.wait = options.sleep ?? sleep
    this.headers = {
      Authorization: `Bearer ${options.apiToken}`,
      'Content-Type': 'application/json'
    }
  }

  /**
   * Run a prediction and return its output URLs, retrying transient failures.
   */
  async run(prompt: string, options: RunOptions = {}): Promise<Result<string[]>> {
    const model = options.model ?? REPLICATE_MODELS.FLUX_1_1_PRO_ULTRA

    this.logger.verbose(`Running Replicate model: ${model.name}`)
    return withRetries(() => this.runOnce(prompt, model), {
      maxRetries: options.maxRetries,
      baseDelayMs: this.options.retryDelayMs,
      logger: this.logger,
      sleep: this.wait
    })
  }

  /**
   * Save an output URL to `path`, creating parent directories.
   */
  async downloadFile(url: string, path: string): Promise<Result<string>> {
    try {
      const response = await this.fetchFn(url)
      if (!response.ok) return handleHttpError(response)

      const data = new Uint8Array(await response.arrayBuffer())
      if (data.length === 0) return emptyResponseError()

      await mkdir(dirname(path), { recursive: true })
      await writeFile(path, data)
      return { ok: true, value: path }
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  private async runOnce(prompt: string, model: ReplicateModelConfig): Promise<Result<string[]>> {
    try {
      const { url, body } = createRequest(model, inputParams(model, prompt))
      const response = await this.fetchFn(url, {
        method: 'POST',
        headers: { ...this.headers, Prefer: 'wait' },
        body: JSON.stringify(body)
      })
      if (!response.ok) return handleHttpError(response)

      const prediction = (await response.json()) as Prediction
      if (isSettled(prediction.status)) return outputUrls(prediction)
      return this.poll(prediction)
    } catch (error) {
      return handleNetworkError(error)
    }
  }

  private async poll(created: Prediction): Promise<Result<string[]>> {
    const pollUrl = created.urls?.get ?? `${REPLICATE_API_URL}/predictions/${created.id}`
    const interval = this.options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    const maxPolls = this.options.maxPolls ?? DEFAULT_MAX_POLLS

    for (let polls = 0; polls < maxPolls; polls++) {
      await this.wait(interval)
      const response = await this.fetchFn(pollUrl, { headers: this.headers })
      if (!response.ok) return handleHttpError(response)

      const prediction = (await response.json()) as Prediction
      this.logger.verbose(`Prediction ${prediction.id}: ${prediction.status}`)
      if (isSettled(prediction.status)) return outputUrls(prediction)
    }

    return {
      ok: false,
      error: {
        type: 'network',
        message: `Prediction ${created.id} did not finish after ${maxPolls} polls`
      }
    }
  }
}
