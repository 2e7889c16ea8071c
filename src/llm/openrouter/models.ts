/**
 * OpenRouter Models
 *
 * Model presets with their token pricing (USD per million tokens).
 * Pricing source: https://openrouter.ai/models
 */

export interface ModelConfig {
  /** OpenRouter model id: 'google/gemini-2.5-flash' */
  readonly name: string
  readonly maxTokens: number
  readonly temperature: number
  readonly inputCostPerMillion: number
  readonly outputCostPerMillion: number
}

export interface TokenUsage {
  readonly promptTokens: number
  readonly completionTokens: number
  readonly totalTokens: number
  readonly costUsd: number
}

export interface CompletionResponse {
  /** Reply text, or the parsed object when JSON output was requested */
  readonly content: string | Record<string, unknown>
  readonly usage: TokenUsage
}

const DEFAULT_MODEL_CONFIG: ModelConfig = {
  name: 'google/gemini-2.5-flash',
  maxTokens: 4096,
  temperature: 1.0,
  inputCostPerMillion: 0.3,
  outputCostPerMillion: 2.5
}

export const OPENROUTER_MODELS = {
  GEMINI_FLASH: { ...DEFAULT_MODEL_CONFIG, maxTokens: 32768 },
  GEMINI_PRO: {
    ...DEFAULT_MODEL_CONFIG,
    name: 'google/gemini-2.5-pro',
    maxTokens: 32768,
    inputCostPerMillion: 1.25,
    outputCostPerMillion: 10.0
  }
} as const satisfies Record<string, ModelConfig>

export type OpenRouterModelKey = keyof typeof OPENROUTER_MODELS

/**
 * Build a config for any OpenRouter model, starting from the defaults.
 */
export function customModel(name: string, overrides: Partial<Omit<ModelConfig, 'name'>> = {}): ModelConfig {
  return { ...DEFAULT_MODEL_CONFIG, ...overrides, name }
}

/**
 * Cost of a request in USD.
 */
export function calculateCost(
  promptTokens: number,
  completionTokens: number,
  config: Pick<ModelConfig, 'inputCostPerMillion' | 'outputCostPerMillion'>
): number {
  const inputCost = (promptTokens / 1_000_000) * config.inputCostPerMillion
  const outputCost = (completionTokens / 1_000_000) * config.outputCostPerMillion
  return inputCost + outputCost
}
