import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { slugify, uniqueOutputPath, urlExtension } from './io'

describe('slugify', () => {
  it('joins lowercase words with dashes', () => {
    expect(slugify('A Lighthouse, at Dusk!')).toBe('a-lighthouse-at-dusk')
  })

  it('cuts long prompts without a trailing dash', () => {
    expect(slugify('one two three', 8)).toBe('one-two')
  })

  it('falls back for prompts without letters or digits', () => {
    expect(slugify('!!!')).toBe('output')
  })
})

describe('uniqueOutputPath', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'genai-kit-io-test-'))
  })

  afterEach(() => {
    if (existsSync(tempDir)) {
      rmSync(tempDir, { recursive: true, force: true })
    }
  })

  it('keeps a free name', () => {
    expect(uniqueOutputPath(tempDir, 'image.png')).toBe(join(tempDir, 'image.png'))
  })

  it('prefixes underscores until the name is free', () => {
    writeFileSync(join(tempDir, 'image.png'), '')
    writeFileSync(join(tempDir, '_image.png'), '')

    expect(uniqueOutputPath(tempDir, 'image.png')).toBe(join(tempDir, '__image.png'))
  })
})

describe('urlExtension', () => {
  it('reads the extension from the path', () => {
    expect(urlExtension('https://example.com/files/out.WEBP?sig=abc')).toBe('webp')
  })

  it('returns empty for no extension or an invalid URL', () => {
    expect(urlExtension('https://example.com/files/out')).toBe('')
    expect(urlExtension('not a url')).toBe('')
  })
})
