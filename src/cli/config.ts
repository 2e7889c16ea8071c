/**
 * CLI Configuration
 *
 * API keys and paths from, highest priority first: explicit overrides,
 * environment variables, the config file, defaults.
 *
 * The config file is JSON with camelCase keys, at --config-file, else
 * GENAI_KIT_CONFIG, else ~/.config/genai-kit/config.json (XDG standard).
 */

import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import { DEFAULT_CACHE_DIR } from '../cache/types'

export interface Config {
  readonly cacheDir: string
  readonly openrouterApiKey?: string | undefined
  readonly replicateApiToken?: string | undefined
  readonly geminiApiKey?: string | undefined
  /** Sent to OpenRouter as HTTP-Referer */
  readonly openrouterSiteUrl?: string | undefined
  /** Sent to OpenRouter as X-Title */
  readonly openrouterSiteName?: string | undefined
}

export type ConfigOverrides = { readonly [K in keyof Config]?: Config[K] | undefined }

export type Env = Readonly<Record<string, string | undefined>>

/** Unknown keys are dropped. */
const ConfigFileSchema = z.object({
  cacheDir: z.string().optional(),
  openrouterApiKey: z.string().optional(),
  replicateApiToken: z.string().optional(),
  geminiApiKey: z.string().optional(),
  openrouterSiteUrl: z.string().optional(),
  openrouterSiteName: z.string().optional()
})

export type ConfigFile = z.infer<typeof ConfigFileSchema>

const ENV_KEYS = {
  cacheDir: 'GENAI_KIT_CACHE_DIR',
  openrouterApiKey: 'OPENROUTER_API_KEY',
  replicateApiToken: 'REPLICATE_API_TOKEN',
  geminiApiKey: 'GEMINI_API_KEY',
  openrouterSiteUrl: 'OPENROUTER_SITE_URL',
  openrouterSiteName: 'OPENROUTER_SITE_NAME'
} as const satisfies Record<keyof Config, string>

function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'genai-kit')
}

/**
 * Get the config file path.
 * Priority: configFile arg > GENAI_KIT_CONFIG env var > default XDG path
 */
export function getConfigPath(env: Env, configFile?: string): string {
  return configFile || env['GENAI_KIT_CONFIG'] || join(getDefaultConfigDir(), 'config.json')
}

/**
 * Read the config file. A missing file is empty config.
 *
 * @throws Error when the file is not valid JSON or has values of the wrong type
 */
export async function readConfigFile(path: string): Promise<ConfigFile> {
  if (!existsSync(path)) {
    return {}
  }

  const content = await readFile(path, 'utf-8')
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    throw new Error(`Invalid config file ${path}: ${msg}`)
  }

  const parsed = ConfigFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid config file ${path}: ${issues}`)
  }
  return parsed.data
}

function firstDefined(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value !== '')
}

/**
 * Resolve configuration.
 */
export async function loadConfig(
  env: Env = process.env,
  configFile?: string,
  overrides: ConfigOverrides = {}
): Promise<Config> {
  const file = await readConfigFile(getConfigPath(env, configFile))

  const pick = (key: keyof Config): string | undefined =>
    firstDefined(overrides[key], env[ENV_KEYS[key]], file[key])

  return {
    cacheDir: pick('cacheDir') ?? DEFAULT_CACHE_DIR,
    openrouterApiKey: pick('openrouterApiKey'),
    replicateApiToken: pick('replicateApiToken'),
    geminiApiKey: pick('geminiApiKey'),
    openrouterSiteUrl: pick('openrouterSiteUrl'),
    openrouterSiteName: pick('openrouterSiteName')
  }
}

/**
 * A configured secret, or an error naming the variable that provides it.
 */
export function requireKey(
  config: Config,
  key: Exclude<keyof Config, 'cacheDir'>
): string {
  const value = config[key]
  if (!value) {
    throw new Error(`Missing ${ENV_KEYS[key]}: set it in the environment or the config file`)
  }
  return value
}
