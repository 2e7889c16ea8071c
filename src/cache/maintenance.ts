/**
 * Cache Maintenance
 *
 * Bulk clear, per-function clear and a read-only inspection of a cache directory.
 * Only `*.json` files directly inside the directory are tables.
 */

import { existsSync, readdirSync, rmSync, statSync } from 'node:fs'
import { join } from 'node:path'
import { readTable, tablePath } from './filesystem'
import { type CacheFileInfo, type CacheInfo, DEFAULT_CACHE_DIR, TABLE_EXTENSION } from './types'

function listTables(cacheDir: string): string[] {
  if (!existsSync(cacheDir)) {
    return []
  }
  return readdirSync(cacheDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(TABLE_EXTENSION))
    .map((entry) => entry.name)
    .sort()
}

/**
 * Delete every table file in the directory. Other files are left alone.
 */
export function clearAll(cacheDir: string = DEFAULT_CACHE_DIR): void {
  for (const name of listTables(cacheDir)) {
    rmSync(join(cacheDir, name), { force: true })
  }
}

/**
 * Delete one function's table. No error if it does not exist.
 */
export function clearFunction(functionName: string, cacheDir: string = DEFAULT_CACHE_DIR): void {
  rmSync(tablePath(cacheDir, functionName), { force: true })
}

/**
 * Snapshot of the tables in a directory. A table that fails to parse is
 * reported with `entryCount: 'error'`; the rest are still counted.
 */
export function inspectCache(cacheDir: string = DEFAULT_CACHE_DIR): CacheInfo {
  const files: CacheFileInfo[] = listTables(cacheDir).map((name) => {
    const path = join(cacheDir, name)
    const size = statSync(path).size

    let entryCount: number | 'error'
    try {
      const table = readTable(path)
      entryCount = table ? Object.keys(table).length : 0
    } catch {
      entryCount = 'error'
    }
    return { name, size, entryCount }
  })

  return {
    fileCount: files.length,
    totalBytes: files.reduce((sum, file) => sum + file.size, 0),
    files
  }
}
