/**
 * OpenRouter Client
 *
 * Chat completions through OpenRouter's OpenAI-compatible API, with token
 * usage, cost and optional JSON output.
 */

import type { CacheManager } from '../../cache/manager'
import { memoizeAsyncRecord } from '../../cache/memoize'
import type { MemoizedRecord } from '../../cache/types'
import {
  emptyResponseError,
  guardedFetch,
  handleHttpError,
  handleNetworkError,
  unwrapResult
} from '../../http'
import type { Logger } from '../../logger'
import { silentLogger } from '../../logger'
import type { FetchFn, Result } from '../../types'
import { withRetries } from '../retry'
import {
  type CompletionResponse,
  calculateCost,
  type ModelConfig,
  OPENROUTER_MODELS,
  type TokenUsage
} from './models'

export const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions'

export interface OpenRouterClientOptions {
  readonly apiKey: string
  /** Sent as HTTP-Referer, for rankings on openrouter.ai */
  readonly siteUrl?: string | undefined
  /** Sent as X-Title */
  readonly siteName?: string | undefined
  readonly fetch?: FetchFn | undefined
  readonly logger?: Logger | undefined
  /** Base backoff between retries (default 1000ms) */
  readonly retryDelayMs?: number | undefined
}

export interface CompletionOptions {
  readonly model?: ModelConfig | undefined
  /** Request a JSON object and parse it */
  readonly jsonOutput?: boolean | undefined
  /** Total attempts (default 3) */
  readonly maxRetries?: number | undefined
}

interface OpenRouterResponse {
  choices?: Array<{ message?: { content?: string | null } }>
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number } | null
}

function toUsage(usage: OpenRouterResponse['usage'], model: ModelConfig): TokenUsage {
  const promptTokens = usage?.prompt_tokens ?? 0
  const completionTokens = usage?.completion_tokens ?? 0
  return {
    promptTokens,
    completionTokens,
    totalTokens: usage?.total_tokens ?? 0,
    costUsd: calculateCost(promptTokens, completionTokens, model)
  }
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(text)
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed))
    }
    return null
  } catch {
    return null
  }
}

export class OpenRouterClient {
  private readonly fetchFn: FetchFn
  private readonly logger: Logger
  private readonly headers: Record<string, string>

  constructor(private readonly options: OpenRouterClientOptions) {
    this.fetchFn = options.fetch ?? guardedFetch
    this.logger = options.logger ?? silentLogger
    this.headers = {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${options.apiKey}`,
      ...(options.siteUrl && { 'HTTP-Referer': options.siteUrl }),
      ...(options.siteName && { 'X-Title': options.siteName })
    }
  }

  /**
   * Get a completion, retrying transient failures with exponential backoff.
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<Result<CompletionResponse>> {
    const model = options.model ?? OPENROUTER_MODELS.GEMINI_FLASH
    const jsonOutput = options.jsonOutput ?? false

    this.logger.verbose(`Requesting completion from model: ${model.name}`)
    return withRetries(() => this.requestCompletion(prompt, model, jsonOutput), {
      maxRetries: options.maxRetries,
      baseDelayMs: this.options.retryDelayMs,
      logger: this.logger
    })
  }

  private async requestCompletion(
    prompt: string,
    model: ModelConfig,
    jsonOutput: boolean
  ): Promise<Result<CompletionResponse>> {
    try {
      const response = await this.fetchFn(OPENROUTER_API_URL, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify({
          model: model.name,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: model.maxTokens,
          temperature: model.temperature,
          ...(jsonOutput && { response_format: { type: 'json_object' } })
        })
      })

      if (!response.ok) return handleHttpError(response)

      const data = (await response.json()) as OpenRouterResponse
      const text = data.choices?.[0]?.message?.content
      if (!text) return emptyResponseError()

      const usage = toUsage(data.usage, model)
      if (!jsonOutput) {
        return { ok: true, value: { content: text, usage } }
      }

      const parsed = parseJsonObject(text)
      if (!parsed) {
        return {
          ok: false,
          error: { type: 'invalid_response', message: `Failed to parse JSON response: ${text}` }
        }
      }
      return { ok: true, value: { content: parsed, usage } }
    } catch (error) {
      return handleNetworkError(error)
    }
  }
}

/**
 * Completion memoized in `cache` under the table 'openrouter_completion',
 * keyed by prompt, the full model config and JSON mode. Failures are thrown as
 * ApiCallError and never cached.
 */
export function cachedCompletion(
  client: OpenRouterClient,
  cache: CacheManager
): (
  prompt: string,
  model?: ModelConfig,
  jsonOutput?: boolean
) => Promise<MemoizedRecord<CompletionResponse>> {
  const complete = memoizeAsyncRecord(
    cache,
    async (prompt: string, model: ModelConfig, jsonOutput: boolean) =>
      unwrapResult(await client.complete(prompt, { model, jsonOutput })),
    { name: 'openrouter_completion' }
  )

  return (prompt, model = OPENROUTER_MODELS.GEMINI_FLASH, jsonOutput = false) =>
    complete(prompt, model, jsonOutput)
}
