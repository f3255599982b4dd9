/**
 * Parallel Executor
 *
 * Bounded worker pool used for per-candidate reclamation and for running
 * independent named tasks (inventory listings, detectors) side by side.
 */

import { logger } from '../logging.js';

export type PoolSlot<R> = { status: 'done'; value: R } | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  /** Checked before each item is started; started items run to completion */
  signal?: AbortSignal;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Output is
 * in input order. Workers write only to their own slot, and the caller sees
 * the slots after every worker has joined.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions
): Promise<PoolSlot<R>[]> {
  const slots: PoolSlot<R>[] = items.map(() => ({ status: 'skipped' }));
  const workerCount = Math.max(1, Math.min(Math.floor(options.concurrency), items.length));
  let next = 0;

  const drain = async (): Promise<void> => {
    while (next < items.length) {
      if (options.signal?.aborted) {
        return;
      }
      const index = next++;
      slots[index] = { status: 'done', value: await worker(items[index], index) };
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => drain()));
  return slots;
}

export interface NamedTask<T> {
  name: string;
  execute: () => Promise<T>;
}

export type TaskResult<T> =
  | { name: string; success: true; value: T; duration: number }
  | { name: string; success: false; error: unknown; duration: number };

export interface ExecutionSummary<T> {
  totalTasks: number;
  completedTasks: number;
  failedTasks: number;
  totalDuration: number;
  taskResults: TaskResult<T>[];
}

/**
 * Execute independent tasks in parallel. A failing task is recorded and
 * never affects its siblings.
 */
export async function executeParallel<T>(
  tasks: readonly NamedTask<T>[],
  options: { maxConcurrency?: number } = {}
): Promise<ExecutionSummary<T>> {
  const { maxConcurrency = 5 } = options;
  const startTime = Date.now();

  const slots = await runPool(
    tasks,
    async (task): Promise<TaskResult<T>> => {
      const taskStart = Date.now();
      try {
        const value = await task.execute();
        return { name: task.name, success: true, value, duration: Date.now() - taskStart };
      } catch (error: unknown) {
        logger.warn(`Task ${task.name} failed`, {
          error: error instanceof Error ? error.message : String(error),
          duration: Date.now() - taskStart,
        });
        return { name: task.name, success: false, error, duration: Date.now() - taskStart };
      }
    },
    { concurrency: maxConcurrency }
  );

  const taskResults = slots.flatMap(slot => (slot.status === 'done' ? [slot.value] : []));
  const completedTasks = taskResults.filter(r => r.success).length;

  logger.debug('Parallel execution completed', {
    totalTasks: tasks.length,
    completedTasks,
    failedTasks: taskResults.length - completedTasks,
    totalDuration: Date.now() - startTime,
  });

  return {
    totalTasks: tasks.length,
    completedTasks,
    failedTasks: taskResults.length - completedTasks,
    totalDuration: Date.now() - startTime,
    taskResults,
  };
}
