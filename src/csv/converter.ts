/**
 * CSV Converter
 *
 * Reads CSV files into records validated by a zod schema, and writes records
 * back out. The schema may rename columns, coerce numbers and fill defaults:
 *
 * ```ts
 * const Sample = z
 *   .object({ 'Sample ID': z.string(), 'Lat.': z.coerce.number(), Notes: z.string().default('') })
 *   .transform((row) => ({ id: row['Sample ID'], latitude: row['Lat.'], notes: row.Notes }))
 *
 * const samples = readCsvRecords('data/samples.csv', Sample)
 * ```
 *
 * Empty fields reach the schema as undefined, so `.default()` and `.optional()`
 * apply to them.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname } from 'node:path'
import { parse } from 'csv-parse/sync'
import type { z } from 'zod'
import type { Logger } from '../logger'
import { silentLogger } from '../logger'

export class CsvConversionError extends Error {
  constructor(
    message: string,
    readonly source: string,
    /** 1-based record number, header excluded (quoted fields may span several lines) */
    readonly record?: number | undefined
  ) {
    super(message)
    this.name = 'CsvConversionError'
  }
}

export interface CsvOptions {
  readonly logger?: Logger | undefined
}

export interface WriteCsvOptions extends CsvOptions {
  /** Column order (default: the first record's keys) */
  readonly columns?: readonly string[] | undefined
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

function parseRows(text: string, source: string): Array<Record<string, string | undefined>> {
  let parsed: unknown
  try {
    parsed = parse(text, {
      columns: (header: string[]) => header.map((name) => name.trim()),
      bom: true,
      skip_empty_lines: true
    })
  } catch (error) {
    throw new CsvConversionError(`Could not parse ${source}: ${errorMessage(error)}`, source)
  }
  if (!Array.isArray(parsed)) {
    throw new CsvConversionError(`Could not parse ${source}: no rows`, source)
  }

  return parsed.map((row: unknown) => {
    const fields: Record<string, string | undefined> = {}
    if (typeof row === 'object' && row !== null) {
      for (const [name, value] of Object.entries(row)) {
        fields[name] = typeof value === 'string' && value !== '' ? value : undefined
      }
    }
    return fields
  })
}

/**
 * Validate CSV text into records.
 *
 * @throws CsvConversionError on malformed CSV or the first invalid row
 */
export function parseCsvRecords<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  source = '<input>'
): Array<z.output<S>> {
  return parseRows(text, source).map((row, index) => {
    const result = schema.safeParse(row)
    if (!result.success) {
      const record = index + 1
      throw new CsvConversionError(
        `Invalid record ${record} of ${source}: ${formatIssues(result.error)}`,
        source,
        record
      )
    }
    return result.data
  })
}

/**
 * Read and validate a CSV file.
 *
 * @throws CsvConversionError on malformed CSV or the first invalid row
 */
export function readCsvRecords<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  options: CsvOptions = {}
): Array<z.output<S>> {
  const logger = options.logger ?? silentLogger
  logger.verbose(`Converting CSV ${path}`)

  try {
    const records = parseCsvRecords(readFileSync(path, 'utf-8'), schema, path)
    logger.success(`Converted ${records.length} records from ${path}`)
    return records
  } catch (error) {
    logger.error(`Error converting CSV ${path}: ${errorMessage(error)}`)
    throw error
  }
}

/**
 * Escape a value for CSV (handle quotes and commas).
 */
function escapeCSV(value: unknown): string {
  if (value === undefined || value === null) {
    return ''
  }

  let str: string
  if (value instanceof Date) {
    str = value.toISOString()
  } else if (typeof value === 'object') {
    str = JSON.stringify(value)
  } else {
    str = String(value)
  }

  if (str.includes(',') || str.includes('\n') || str.includes('"') || str.includes('\r')) {
    return `"${str.replace(/"/g, '""')}"`
  }

  return str
}

/**
 * Records as CSV text: a header row, then one row per record.
 */
export function toCsv<T extends object>(records: readonly T[], columns?: readonly string[]): string {
  const first = records[0]
  const header = columns ?? (first ? Object.keys(first) : [])
  if (header.length === 0) return ''

  const rows = [header.map(escapeCSV).join(',')]
  for (const record of records) {
    const values = new Map(Object.entries(record))
    rows.push(header.map((column) => escapeCSV(values.get(column))).join(','))
  }
  return `${rows.join('\n')}\n`
}

/**
 * Write records to a CSV file, creating parent directories.
 */
export function writeCsvRecords<T extends object>(
  records: readonly T[],
  path: string,
  options: WriteCsvOptions = {}
): void {
  const logger = options.logger ?? silentLogger
  logger.verbose(`Writing CSV ${path}`)

  try {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(path, toCsv(records, options.columns))
    logger.success(`Saved ${records.length} records to ${path}`)
  } catch (error) {
    logger.error(`Error writing CSV ${path}: ${errorMessage(error)}`)
    throw error
  }
}
