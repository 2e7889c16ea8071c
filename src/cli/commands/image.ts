/**
 * Image Command
 *
 * Generate images with Replicate or Gemini and save them to the output
 * directory. Several images run in parallel through the task runner.
 */

import { writeFile } from 'node:fs/promises'
import { unwrapResult } from '../../http'
import { generateImage, imageExtension } from '../../llm/gemini/image'
import { ReplicateClient } from '../../llm/replicate/client'
import type { Logger } from '../../logger'
import { runTasks } from '../../tasks/runner'
import type { CLIArgs } from '../args'
import { type Config, requireKey } from '../config'
import { ensureDir, slugify, uniqueOutputPath, urlExtension } from '../io'

/** Saves the images for one prompt as `<stem>.<ext>` and returns their paths. */
type ImageGenerator = (prompt: string, stem: string) => Promise<string[]>

function replicateGenerator(config: Config, outputDir: string, logger: Logger): ImageGenerator {
  const client = new ReplicateClient({ apiToken: requireKey(config, 'replicateApiToken'), logger })

  return async (prompt, stem) => {
    const urls = unwrapResult(await client.run(prompt))
    const paths: string[] = []
    for (const [i, url] of urls.entries()) {
      const name = urls.length > 1 ? `${stem}-${i + 1}` : stem
      const path = uniqueOutputPath(outputDir, `${name}.${urlExtension(url) || 'jpg'}`)
      paths.push(unwrapResult(await client.downloadFile(url, path)))
    }
    return paths
  }
}

function geminiGenerator(config: Config, outputDir: string, logger: Logger): ImageGenerator {
  const apiKey = requireKey(config, 'geminiApiKey')

  return async (prompt, stem) => {
    const image = unwrapResult(await generateImage(prompt, { apiKey }))
    if (image.text) {
      logger.verbose(`Gemini: ${image.text}`)
    }
    const path = uniqueOutputPath(outputDir, `${stem}.${imageExtension(image.mimeType)}`)
    await writeFile(path, image.data)
    return [path]
  }
}

export async function cmdImage(args: CLIArgs, config: Config, logger: Logger): Promise<void> {
  if (!args.prompt) {
    throw new Error('No prompt specified')
  }

  await ensureDir(args.outputDir)
  const generate =
    args.provider === 'gemini'
      ? geminiGenerator(config, args.outputDir, logger)
      : replicateGenerator(config, args.outputDir, logger)

  const stem = slugify(args.prompt)
  const prompts = Array.from({ length: args.count }, () => args.prompt)
  const { results, errors } = await runTasks(
    prompts,
    (prompt, index) => generate(prompt, args.count > 1 ? `${stem}-${index + 1}` : stem),
    { strategy: 'immediate_all', logger }
  )

  for (const path of results.flatMap((paths) => paths ?? [])) {
    logger.success(`Saved ${path}`)
  }

  if (errors.length > 0) {
    throw new Error(`${errors.length} of ${args.count} images failed`)
  }
}
