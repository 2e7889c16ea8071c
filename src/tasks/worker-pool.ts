/**
 * Worker Pool
 *
 * N workers pull tasks from a shared queue until it is empty. Results keep
 * task order; a failed task leaves `undefined` in its slot.
 *
 * ```ts
 * const { results, errors } = await runWorkerPool(prompts, (prompt) => complete(prompt), {
 *   concurrency: 4,
 *   onProgress: ({ completed, total }) => logger.progress('Completing', completed, total)
 * })
 * ```
 */

export const DEFAULT_CONCURRENCY = 4

export type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>

export interface WorkerProgressInfo<R> {
  readonly index: number
  readonly total: number
  readonly completed: number
  readonly result: R
  readonly durationMs: number
}

export interface WorkerErrorInfo<T> {
  readonly task: T
  readonly index: number
  readonly error: Error
  readonly total: number
  readonly completed: number
}

export interface TaskError {
  readonly index: number
  readonly error: Error
}

export interface WorkerPoolOptions<T, R> {
  /** Concurrent workers (default 4, never more than the task count) */
  readonly concurrency?: number | undefined
  /** Called when a worker picks up a task */
  readonly onStart?: ((index: number, task: T) => void) | undefined
  readonly onProgress?: ((info: WorkerProgressInfo<R>) => void) | undefined
  /** Return false to stop all workers after this failure. */
  readonly onError?: ((info: WorkerErrorInfo<T>) => boolean) | undefined
}

export interface WorkerPoolResult<R> {
  /** In task order, undefined for failed or skipped tasks */
  readonly results: Array<R | undefined>
  readonly successes: R[]
  /** In completion order */
  readonly errors: readonly TaskError[]
}

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions<T, R> = {}
): Promise<WorkerPoolResult<R>> {
  if (tasks.length === 0) {
    return { results: [], successes: [], errors: [] }
  }

  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY)
  const settled: Array<{ result: R } | undefined> = new Array(tasks.length)
  const errors: TaskError[] = []

  const queue = tasks.entries()
  let completed = 0
  let stopped = false

  async function worker(): Promise<void> {
    // Workers share one iterator, so each task is taken exactly once
    for (const [index, task] of queue) {
      if (stopped) break

      options.onStart?.(index, task)
      const startTime = Date.now()

      try {
        const result = await processor(task, index)
        settled[index] = { result }
        completed++
        options.onProgress?.({
          index,
          total: tasks.length,
          completed,
          result,
          durationMs: Date.now() - startTime
        })
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e))
        errors.push({ index, error })
        completed++
        const keepGoing =
          options.onError?.({ task, index, error, total: tasks.length, completed }) ?? true
        if (!keepGoing) stopped = true
      }
    }
  }

  const workerCount = Math.min(concurrency, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  const results = Array.from(settled, (entry) => entry?.result)
  const successes = settled.flatMap((entry) => (entry ? [entry.result] : []))
  return { results, successes, errors }
}
