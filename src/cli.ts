#!/usr/bin/env node
/**
 * genai-kit CLI
 *
 * Cached completions, image generation and cache maintenance.
 *
 * @license AGPL-3.0
 */

import { parseArgs } from './cli/args'
import { cmdCacheClear, cmdCacheInfo } from './cli/commands/cache'
import { cmdComplete } from './cli/commands/complete'
import { cmdImage } from './cli/commands/image'
import { loadConfig } from './cli/config'
import { createLogger } from './logger'

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2))
  const logger = createLogger(args.quiet, args.verbose)

  try {
    const config = await loadConfig(process.env, args.configFile, { cacheDir: args.cacheDir })

    switch (args.command) {
      case 'cache-info':
        cmdCacheInfo(config, logger)
        break

      case 'cache-clear':
        cmdCacheClear(args, config, logger)
        break

      case 'complete':
        await cmdComplete(args, config, logger)
        break

      case 'image':
        await cmdImage(args, config, logger)
        break

      default:
        logger.error(`Unknown command: ${args.command}. Run 'genai-kit --help' for usage.`)
        process.exit(1)
    }
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

void main()
