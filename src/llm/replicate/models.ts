/**
 * Replicate Models
 *
 * Model presets with their default inputs. Input keys use Replicate's own
 * snake_case names and are sent as-is.
 */

export type ReplicateInputValue = string | number | boolean

export type ReplicateInput = Readonly<Record<string, ReplicateInputValue | undefined>>

export interface ReplicateModelConfig<P extends ReplicateInput = ReplicateInput> {
  /** 'owner/name', or 'owner/name:version' to pin a version */
  readonly name: string
  readonly params: P
}

export interface FluxProUltraParams extends ReplicateInput {
  /** Less processed, more natural-looking images */
  readonly raw?: boolean | undefined
  readonly seed?: number | undefined
  readonly aspect_ratio?: string | undefined
  /** Image URL that guides the composition (Flux Redux) */
  readonly image_prompt?: string | undefined
  readonly image_prompt_strength?: number | undefined
  readonly output_format?: 'jpg' | 'png' | undefined
  /** 1 is most strict, 6 most permissive */
  readonly safety_tolerance?: number | undefined
}

export interface FluxKontextParams extends ReplicateInput {
  readonly seed?: number | undefined
  /** Reference image to edit */
  readonly input_image?: string | undefined
  readonly aspect_ratio?: string | undefined
  readonly output_format?: 'jpg' | 'png' | undefined
  /** 0 is most strict, 6 most permissive; at most 2 with an input image */
  readonly safety_tolerance?: number | undefined
  readonly prompt_upsampling?: boolean | undefined
}

const KONTEXT_DEFAULTS: FluxKontextParams = {
  aspect_ratio: 'match_input_image',
  output_format: 'jpg',
  safety_tolerance: 2
}

const FLUX_1_1_PRO_ULTRA: ReplicateModelConfig<FluxProUltraParams> = {
  name: 'black-forest-labs/flux-1.1-pro-ultra',
  params: { aspect_ratio: '1:1', output_format: 'jpg', safety_tolerance: 2 }
}

const FLUX_KONTEXT_MAX: ReplicateModelConfig<FluxKontextParams> = {
  name: 'black-forest-labs/flux-kontext-max',
  params: KONTEXT_DEFAULTS
}

const FLUX_KONTEXT_PRO: ReplicateModelConfig<FluxKontextParams> = {
  name: 'black-forest-labs/flux-kontext-pro',
  params: KONTEXT_DEFAULTS
}

export const REPLICATE_MODELS = { FLUX_1_1_PRO_ULTRA, FLUX_KONTEXT_MAX, FLUX_KONTEXT_PRO } as const

export type ReplicateModelKey = keyof typeof REPLICATE_MODELS

/**
 * Config for any Replicate model.
 */
export function customModel<P extends ReplicateInput>(name: string, params: P): ReplicateModelConfig<P> {
  return { name, params }
}

/**
 * Copy of a config with some inputs replaced, e.g. a fixed seed.
 */
export function withParams<P extends ReplicateInput>(
  config: ReplicateModelConfig<P>,
  overrides: Partial<P>
): ReplicateModelConfig<P> {
  return { name: config.name, params: { ...config.params, ...overrides } }
}

/**
 * Request input for a model: its defined params plus the prompt.
 */
export function inputParams(
  config: ReplicateModelConfig,
  prompt?: string
): Record<string, ReplicateInputValue> {
  const input: Record<string, ReplicateInputValue> = {}
  for (const [key, value] of Object.entries(config.params)) {
    if (value !== undefined) input[key] = value
  }
  if (prompt !== undefined) input['prompt'] = prompt
  return input
}
