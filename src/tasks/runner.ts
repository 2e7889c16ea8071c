/**
 * Task Runner
 *
 * Runs tasks through the worker pool under a launch strategy that spaces out
 * when tasks may start. Spacing identical requests lets the first one reach
 * the result cache before the rest look it up.
 */

import type { Logger } from '../logger'
import { silentLogger } from '../logger'
import { sleep } from '../llm/retry'
import { DEFAULT_CONCURRENCY, runWorkerPool, type TaskError, type TaskProcessor } from './worker-pool'

export const LAUNCH_STRATEGIES = ['immediate_all', 'sequential_with_delay', 'batched'] as const

export type LaunchStrategy = (typeof LAUNCH_STRATEGIES)[number]

export const DEFAULT_STRATEGY: LaunchStrategy = 'sequential_with_delay'
export const DEFAULT_DELAY_MS = 1000
export const DEFAULT_BATCH_SIZE = 2

export interface RunTasksOptions {
  /** Default 'sequential_with_delay' */
  readonly strategy?: LaunchStrategy | undefined
  /** Between task releases, or between batches (default 1000) */
  readonly delayMs?: number | undefined
  /** Tasks per batch for 'batched' (default 2) */
  readonly batchSize?: number | undefined
  /** Concurrency bound (default 4) */
  readonly maxWorkers?: number | undefined
  readonly logger?: Logger | undefined
  readonly sleep?: ((ms: number) => Promise<void>) | undefined
}

export interface RunTasksResult<R> {
  /** In task order, undefined where the task failed */
  readonly results: Array<R | undefined>
  readonly durationMs: number
  readonly errors: readonly TaskError[]
}

export function isLaunchStrategy(value: string): value is LaunchStrategy {
  return LAUNCH_STRATEGIES.some((strategy) => strategy === value)
}

/**
 * Group task indices by release: each group is released `delayMs` after the
 * previous one.
 */
export function releaseGroups(
  taskCount: number,
  strategy: LaunchStrategy,
  batchSize: number = DEFAULT_BATCH_SIZE
): number[][] {
  const indices = Array.from({ length: taskCount }, (_, i) => i)
  switch (strategy) {
    case 'immediate_all':
      return taskCount > 0 ? [indices] : []
    case 'sequential_with_delay':
      return indices.map((i) => [i])
    case 'batched': {
      const size = Math.max(1, Math.floor(batchSize))
      const groups: number[][] = []
      for (let i = 0; i < taskCount; i += size) {
        groups.push(indices.slice(i, i + size))
      }
      return groups
    }
  }
}

/**
 * Run every task, returning results in task order with failures captured.
 *
 * @throws Error for an unknown strategy, before any task runs
 */
export async function runTasks<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: RunTasksOptions = {}
): Promise<RunTasksResult<R>> {
  const requested: string = options.strategy ?? DEFAULT_STRATEGY
  if (!isLaunchStrategy(requested)) {
    throw new Error(
      `Unknown launch strategy "${requested}". Expected one of: ${LAUNCH_STRATEGIES.join(', ')}`
    )
  }
  const strategy: LaunchStrategy = requested
  const delayMs = options.delayMs ?? DEFAULT_DELAY_MS
  const maxWorkers = options.maxWorkers ?? DEFAULT_CONCURRENCY
  const logger = options.logger ?? silentLogger
  const wait = options.sleep ?? sleep

  const startTime = Date.now()
  if (tasks.length === 0) {
    return { results: [], durationMs: 0, errors: [] }
  }

  logger.log(
    `Processing ${tasks.length} tasks (strategy: ${strategy}, delay: ${delayMs}ms, workers: ${Math.min(maxWorkers, tasks.length)})`
  )

  const openers: Array<() => void> = []
  const gates = tasks.map(
    () =>
      new Promise<void>((resolve) => {
        openers.push(resolve)
      })
  )

  async function release(): Promise<void> {
    const groups = releaseGroups(tasks.length, strategy, options.batchSize)
    for (const [g, group] of groups.entries()) {
      if (g > 0 && delayMs > 0) await wait(delayMs)
      for (const index of group) {
        openers[index]?.()
        logger.verbose(`Released task ${index + 1}/${tasks.length}`)
      }
    }
  }

  const [pool] = await Promise.all([
    runWorkerPool(
      tasks,
      async (task, index) => {
        await gates[index]
        return processor(task, index)
      },
      {
        concurrency: maxWorkers,
        onProgress: ({ index, completed, total }) => {
          logger.verbose(`Task ${index + 1} done`)
          logger.progress('Processing tasks', completed, total)
        },
        onError: ({ index, error }) => {
          logger.warn(`Task ${index + 1} failed: ${error.message}`)
          return true
        }
      }
    ),
    release()
  ])

  const durationMs = Date.now() - startTime
  logger.log(`Processed ${tasks.length} tasks in ${(durationMs / 1000).toFixed(2)}s`)
  return { results: pool.results, durationMs, errors: pool.errors }
}
