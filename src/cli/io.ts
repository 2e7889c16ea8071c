/**
 * CLI File I/O
 *
 * Output file naming for generated files.
 */

import { existsSync } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { extname, join } from 'node:path'

/**
 * Ensure a directory exists.
 */
export async function ensureDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true })
}

/**
 * File-name-safe stem from a prompt: lowercase words joined by dashes.
 */
export function slugify(text: string, maxLength = 40): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '')
  return slug || 'output'
}

/**
 * Path in `dir` for `filename` that does not exist yet: underscores are
 * prefixed until the name is free (`image.png`, `_image.png`, `__image.png`).
 */
export function uniqueOutputPath(dir: string, filename: string): string {
  let candidate = join(dir, filename)
  let prefix = ''
  while (existsSync(candidate)) {
    prefix += '_'
    candidate = join(dir, `${prefix}${filename}`)
  }
  return candidate
}

/**
 * File extension of a URL's path, without the dot ('' when it has none).
 */
export function urlExtension(url: string): string {
  try {
    return extname(new URL(url).pathname).slice(1).toLowerCase()
  } catch {
    return ''
  }
}
