/**
 * Stats Counter
 *
 * Accumulates metrics per category, e.g. token usage per prompt:
 *
 * ```ts
 * const stats = new StatsCounter()
 * stats.add('summarize', { requests: 1, costUsd: 0.0021, model: 'google/gemini-2.5-flash' })
 * stats.printSummary(logger, 'USAGE')
 * ```
 *
 * Merge rules by value kind: numbers add, strings replace, arrays concatenate,
 * plain objects shallow-merge. A value of a different kind replaces the stored one.
 */

import type { Logger } from '../logger'

export type MetricValue =
  | number
  | string
  | boolean
  | null
  | readonly unknown[]
  | Readonly<Record<string, unknown>>

export type Metrics = Readonly<Record<string, MetricValue>>

const DEFAULT_TITLE = 'STATISTICS'
const SUMMARY_RULE = '='.repeat(50)

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 })
const decimalFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 4,
  maximumFractionDigits: 4
})

function isPlainRecord(value: MetricValue): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function merge(current: MetricValue | undefined, value: MetricValue): MetricValue {
  if (typeof value === 'number' && typeof current === 'number') {
    return current + value
  }
  if (Array.isArray(value) && Array.isArray(current)) {
    return [...current, ...value]
  }
  if (isPlainRecord(value) && current !== undefined && isPlainRecord(current)) {
    return { ...current, ...value }
  }
  if (Array.isArray(value)) return [...value]
  if (isPlainRecord(value)) return { ...value }
  return value
}

function formatMetric(value: MetricValue): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? integerFormat.format(value) : decimalFormat.format(value)
  }
  if (typeof value === 'string') return value
  return JSON.stringify(value)
}

export class StatsCounter {
  private readonly categories = new Map<string, Map<string, MetricValue>>()

  /**
   * Merge metrics into a category, creating it on first use.
   */
  add(category: string, metrics: Metrics): void {
    let stored = this.categories.get(category)
    if (!stored) {
      stored = new Map()
      this.categories.set(category, stored)
    }
    for (const [name, value] of Object.entries(metrics)) {
      stored.set(name, merge(stored.get(name), value))
    }
  }

  /** Copy of one category's metrics ({} when absent). */
  get(category: string): Record<string, MetricValue>
  /** Copy of every category. */
  get(): Record<string, Record<string, MetricValue>>
  get(category?: string): Record<string, MetricValue> | Record<string, Record<string, MetricValue>> {
    if (category !== undefined) {
      const metrics = this.categories.get(category)
      return metrics ? Object.fromEntries(metrics) : {}
    }
    const all: Record<string, Record<string, MetricValue>> = {}
    for (const [name, metrics] of this.categories) {
      all[name] = Object.fromEntries(metrics)
    }
    return all
  }

  has(category: string): boolean {
    return this.categories.has(category)
  }

  /**
   * Remove one category, or everything.
   */
  clear(category?: string): void {
    if (category === undefined) {
      this.categories.clear()
    } else {
      this.categories.delete(category)
    }
  }

  /**
   * Numeric value of a metric; 0 when absent or not a number.
   */
  total(category: string, metric: string): number {
    const value = this.categories.get(category)?.get(metric)
    return typeof value === 'number' ? value : 0
  }

  /**
   * Summary lines: a title rule, then each category with its metrics.
   */
  summary(title: string = DEFAULT_TITLE): string[] {
    if (this.categories.size === 0) {
      return [`${title}: no data`]
    }

    const lines = [`=== ${title} ===`]
    for (const [category, metrics] of this.categories) {
      lines.push('', `${category.toUpperCase()}:`)
      for (const [name, value] of metrics) {
        lines.push(`  ${name}: ${formatMetric(value)}`)
      }
    }
    lines.push(SUMMARY_RULE)
    return lines
  }

  printSummary(logger: Logger, title?: string): void {
    logger.log('')
    for (const line of this.summary(title)) {
      logger.log(line)
    }
  }
}
