/**
 * Bounded async worker pool
 *
 * A fixed number of workers pull the next item off a shared cursor. Every task
 * settles into an outcome slot keyed by its position, so one failure never
 * stops sibling tasks and never leaves a gap.
 */

import { availableParallelism } from 'os';
import { MAX_POOL_SIZE, POOL_SIZE_CORE_BONUS } from '../../utils/constants.js';

export type TaskOutcome<R> = { ok: true; value: R } | { ok: false; error: Error };

export class TaskAbortedError extends Error {
  constructor() {
    super('Task abandoned before it started (operation aborted)');
    this.name = 'TaskAbortedError';
  }
}

/**
 * min(8, cores + 2)
 */
export function defaultPoolSize(): number {
  return Math.min(MAX_POOL_SIZE, availableParallelism() + POOL_SIZE_CORE_BONUS);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs `task` over every item with at most `limit` tasks in flight
 *
 * Once `signal` aborts, tasks already running finish; the rest are recorded as
 * {@link TaskAbortedError} without being started.
 *
 * @returns One outcome per item, in input order
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, position: number) => Promise<R>,
  signal?: AbortSignal
): Promise<TaskOutcome<R>[]> {
  const outcomes = new Array<TaskOutcome<R>>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  let cursor = 0;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const position = cursor++;

      if (signal?.aborted) {
        outcomes[position] = { ok: false, error: new TaskAbortedError() };
        continue;
      }

      try {
        outcomes[position] = { ok: true, value: await task(items[position], position) };
      } catch (error) {
        outcomes[position] = { ok: false, error: toError(error) };
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return outcomes;
}
