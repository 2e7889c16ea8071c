import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { CorruptTableError } from './errors'
import { guardAgainstWorkingCache, readTable, tablePath, writeTable } from './filesystem'

describe('table storage', () => {
  let testDir: string

  beforeEach(() => {
    testDir = join(tmpdir(), `cache-test-${Date.now()}-${Math.random().toString(36).slice(2)}`)
    mkdirSync(testDir, { recursive: true })
  })

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true })
    }
  })

  describe('tablePath', () => {
    it('should name the table after the function', () => {
      expect(tablePath(testDir, 'summarize')).toBe(join(testDir, 'summarize.json'))
    })

    it('should reject empty names', () => {
      expect(() => tablePath(testDir, '')).toThrow('Invalid cache function name')
    })

    it('should reject names with path separators', () => {
      expect(() => tablePath(testDir, '../escape')).toThrow('Invalid cache function name')
      expect(() => tablePath(testDir, 'a/b')).toThrow('Invalid cache function name')
    })
  })

  describe('readTable', () => {
    it('should return null for a missing table', () => {
      expect(readTable(join(testDir, 'missing.json'))).toBeNull()
    })

    it('should return the parsed object', () => {
      const path = join(testDir, 'fn.json')
      writeFileSync(path, JSON.stringify({ abc: { type: 'json', value: 1 } }))

      expect(readTable(path)).toEqual({ abc: { type: 'json', value: 1 } })
    })

    it('should throw CorruptTableError for invalid JSON', () => {
      const path = join(testDir, 'fn.json')
      writeFileSync(path, 'not valid json{{{')

      expect(() => readTable(path)).toThrow(CorruptTableError)
    })

    it('should throw CorruptTableError when the top level is not an object', () => {
      const path = join(testDir, 'fn.json')
      writeFileSync(path, '[1, 2, 3]')

      expect(() => readTable(path)).toThrow('top-level value is not an object')
    })
  })

  describe('writeTable', () => {
    it('should create the cache directory if not exists', () => {
      const cacheDir = join(testDir, 'nested', 'cache')
      const path = join(cacheDir, 'fn.json')

      writeTable(path, { k: { type: 'json', value: 'v' } }, cacheDir)

      expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual({ k: { type: 'json', value: 'v' } })
    })

    it('should pretty-print with two spaces', () => {
      const path = join(testDir, 'fn.json')
      writeTable(path, { k: { type: 'json', value: 1 } }, testDir)

      expect(readFileSync(path, 'utf-8')).toBe(
        '{\n  "k": {\n    "type": "json",\n    "value": 1\n  }\n}'
      )
    })

    it('should leave no temp files behind', () => {
      const path = join(testDir, 'fn.json')
      writeTable(path, {}, testDir)
      writeTable(path, { a: { type: 'string', value: 'x' } }, testDir)

      expect(readdirSync(testDir)).toEqual(['fn.json'])
    })

    it('should keep the previous table when the write fails', () => {
      const path = join(testDir, 'fn.json')
      writeTable(path, { a: { type: 'json', value: 1 } }, testDir)

      // A directory where the table should be makes the rename fail
      const blocked = join(testDir, 'blocked.json')
      mkdirSync(blocked)
      expect(() => writeTable(blocked, { b: { type: 'json', value: 2 } }, testDir)).toThrow()

      expect(readTable(path)).toEqual({ a: { type: 'json', value: 1 } })
      expect(readdirSync(testDir).sort()).toEqual(['blocked.json', 'fn.json'])
    })
  })

  describe('guardAgainstWorkingCache', () => {
    it('should refuse the default cache directory in tests', () => {
      expect(() => guardAgainstWorkingCache('cache')).toThrow('TEST ERROR')
    })

    it('should allow temp directories', () => {
      expect(() => guardAgainstWorkingCache(testDir)).not.toThrow()
    })
  })
})
