/**
 * Cache Commands
 *
 * Inspect and clear cached results.
 */

import { createCacheManager } from '../../cache/index'
import type { Logger } from '../../logger'
import type { CLIArgs } from '../args'
import type { Config } from '../config'

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

export function cmdCacheInfo(config: Config, logger: Logger): void {
  const info = createCacheManager({ cacheDir: config.cacheDir, logger }).inspect()

  logger.log(`\nCache: ${config.cacheDir}`)
  if (info.fileCount === 0) {
    logger.log('   (empty)')
    return
  }

  const width = Math.max(...info.files.map((file) => file.name.length))
  for (const file of info.files) {
    const entries = file.entryCount === 'error' ? 'unreadable' : `${file.entryCount} entries`
    logger.log(`   ${file.name.padEnd(width)}  ${formatBytes(file.size).padStart(9)}  ${entries}`)
  }
  logger.log(`\n   ${info.fileCount} files, ${formatBytes(info.totalBytes)}`)
}

export function cmdCacheClear(args: CLIArgs, config: Config, logger: Logger): void {
  const cache = createCacheManager({ cacheDir: config.cacheDir, logger })

  if (args.functionName) {
    cache.clearFunction(args.functionName)
    logger.success(`Cleared cached results of ${args.functionName}`)
  } else {
    cache.clear()
    logger.success(`Cleared all cached results in ${config.cacheDir}`)
  }
}
