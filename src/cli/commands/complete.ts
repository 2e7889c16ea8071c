/**
 * Complete Command
 *
 * One OpenRouter completion through the result cache, with usage stats.
 */

import { createCacheManager } from '../../cache/index'
import { cachedCompletion, OpenRouterClient } from '../../llm/openrouter/client'
import { OPENROUTER_MODELS } from '../../llm/openrouter/models'
import type { Logger } from '../../logger'
import { StatsCounter } from '../../stats/counter'
import type { CLIArgs } from '../args'
import { type Config, requireKey } from '../config'

export async function cmdComplete(args: CLIArgs, config: Config, logger: Logger): Promise<void> {
  if (!args.prompt) {
    throw new Error('No prompt specified')
  }

  const client = new OpenRouterClient({
    apiKey: requireKey(config, 'openrouterApiKey'),
    siteUrl: config.openrouterSiteUrl,
    siteName: config.openrouterSiteName,
    logger
  })
  const complete = cachedCompletion(client, createCacheManager({ cacheDir: config.cacheDir, logger }))
  const model = args.model === 'pro' ? OPENROUTER_MODELS.GEMINI_PRO : OPENROUTER_MODELS.GEMINI_FLASH

  const { result, servedFromCache } = await complete(args.prompt, model, args.json)

  // Content goes to stdout even in quiet mode
  console.log(
    typeof result.content === 'string' ? result.content : JSON.stringify(result.content, null, 2)
  )

  if (servedFromCache) {
    logger.success('Served from cache (no cost)')
  }

  const stats = new StatsCounter()
  stats.add(model.name, {
    requests: 1,
    cachedRequests: servedFromCache ? 1 : 0,
    promptTokens: result.usage.promptTokens,
    completionTokens: result.usage.completionTokens,
    costUsd: servedFromCache ? 0 : result.usage.costUsd
  })
  stats.printSummary(logger, 'USAGE')
}
