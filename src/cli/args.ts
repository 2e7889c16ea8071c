/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command, Option } from 'commander'
import { VERSION } from '../index'

export type CompletionModel = 'flash' | 'pro'
export type ImageProvider = 'replicate' | 'gemini'

export interface CLIArgs {
  /** 'cache-info', 'cache-clear', 'complete', 'image' or 'help' */
  command: string
  quiet: boolean
  verbose: boolean
  cacheDir: string | undefined
  configFile: string | undefined
  /** For complete and image */
  prompt: string
  /** For cache clear: one function's table, or all when undefined */
  functionName: string | undefined
  model: CompletionModel
  json: boolean
  provider: ImageProvider
  outputDir: string
  count: number
}

const DEFAULT_OUTPUT_DIR = './output'

const DESCRIPTION = `Cached LLM completions and image generation.

Results of API calls are cached per function under the cache directory, so
repeating a prompt costs nothing.

Examples:
  $ genai-kit complete "Name three rivers in Europe"
  $ genai-kit complete "List three rivers as JSON" --json --model pro
  $ genai-kit image "a lighthouse at dusk" --provider gemini -o ./images
  $ genai-kit cache info
  $ genai-kit cache clear openrouter_completion`

function createProgram(): Command {
  const program = new Command()
    .name('genai-kit')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--cache-dir <dir>', 'Cache directory (or set GENAI_KIT_CACHE_DIR)')
    .option('--config-file <path>', 'Config file path (or set GENAI_KIT_CONFIG)')

  // ============ CACHE ============
  const cache = program.command('cache').description('Inspect or clear cached results')
  cache.command('info').description('Show cache files, sizes and entry counts')
  cache
    .command('clear')
    .description('Delete cached results')
    .argument('[function]', 'Only clear this function (default: everything)')

  // ============ COMPLETE ============
  program
    .command('complete')
    .description('Get a cached OpenRouter completion')
    .argument('<prompt>', 'Prompt text')
    .addOption(
      new Option('-m, --model <model>', 'Model preset').choices(['flash', 'pro']).default('flash')
    )
    .option('--json', 'Request a JSON object')

  // ============ IMAGE ============
  program
    .command('image')
    .description('Generate images and save them')
    .argument('<prompt>', 'Prompt text')
    .addOption(
      new Option('-p, --provider <provider>', 'Image provider')
        .choices(['replicate', 'gemini'])
        .default('replicate')
    )
    .option('-o, --output-dir <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
    .option('-n, --count <num>', 'Number of images', '1')

  return program
}

function parseModel(value: unknown): CompletionModel {
  return value === 'pro' ? 'pro' : 'flash'
}

function parseProvider(value: unknown): ImageProvider {
  return value === 'gemini' ? 'gemini' : 'replicate'
}

function parseCount(value: unknown): number {
  const count = Number.parseInt(String(value ?? '1'), 10)
  return Number.isFinite(count) && count > 0 ? count : 1
}

function buildCLIArgs(
  command: string,
  positional: string | undefined,
  opts: Record<string, unknown>
): CLIArgs {
  return {
    command,
    quiet: opts['quiet'] === true,
    verbose: opts['verbose'] === true,
    cacheDir: typeof opts['cacheDir'] === 'string' ? opts['cacheDir'] : undefined,
    configFile: typeof opts['configFile'] === 'string' ? opts['configFile'] : undefined,
    prompt: command === 'complete' || command === 'image' ? (positional ?? '') : '',
    functionName: command === 'cache-clear' ? positional : undefined,
    model: parseModel(opts['model']),
    json: opts['json'] === true,
    provider: parseProvider(opts['provider']),
    outputDir: typeof opts['outputDir'] === 'string' ? opts['outputDir'] : DEFAULT_OUTPUT_DIR,
    count: parseCount(opts['count'])
  }
}

function findCommand(parent: Command, name: string): Command | undefined {
  return parent.commands.find((c) => c.name() === name)
}

/**
 * Parse CLI arguments (without the node and script entries).
 * With exitOnHelp, --help, --version and usage errors exit the process;
 * without it they return the 'help' command.
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()

  if (!exitOnHelp) {
    program.exitOverride()
    for (const cmd of program.commands) {
      cmd.exitOverride()
      for (const sub of cmd.commands) sub.exitOverride()
    }
  }

  let result: CLIArgs | null = null

  // Use optsWithGlobals() to include global options from parent commands
  for (const name of ['complete', 'image']) {
    const cmd = findCommand(program, name)
    if (!cmd) continue
    cmd.action((prompt: string) => {
      result = buildCLIArgs(name, prompt, cmd.optsWithGlobals())
    })
  }

  const cacheCmd = findCommand(program, 'cache')
  if (cacheCmd) {
    const info = findCommand(cacheCmd, 'info')
    if (info) {
      info.action(() => {
        result = buildCLIArgs('cache-info', undefined, info.optsWithGlobals())
      })
    }
    const clear = findCommand(cacheCmd, 'clear')
    if (clear) {
      clear.action((functionName?: string) => {
        result = buildCLIArgs('cache-clear', functionName, clear.optsWithGlobals())
      })
    }
  }

  try {
    program.parse(argv, { from: 'user' })
  } catch {
    // exitOverride throws on help, version and usage errors
    return buildCLIArgs('help', undefined, {})
  }

  if (!result && exitOnHelp) {
    program.help()
  }

  return result ?? buildCLIArgs('help', undefined, {})
}
