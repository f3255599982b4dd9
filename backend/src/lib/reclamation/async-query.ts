/**
 * Await an asynchronous metrics/log query: poll on an interval until it
 * completes, fails, or the total wait reaches the timeout.
 */

import { QueryTimeoutError } from './errors.js';
import { systemClock, type AnomalyObservation, type Clock, type MetricsSource, type QueryHandle } from './types.js';

export interface AwaitQueryOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  clock?: Clock;
  signal?: AbortSignal;
}

export class QueryFailedError extends Error {
  constructor(
    public readonly queryId: string,
    message: string
  ) {
    super(`Query ${queryId} failed: ${message}`);
    this.name = 'QueryFailedError';
  }
}

/**
 * @throws QueryTimeoutError when the query is still pending at the deadline
 * @throws QueryFailedError when the backend reports the query failed
 */
export async function awaitQueryCompletion(
  source: MetricsSource,
  handle: QueryHandle,
  options: AwaitQueryOptions
): Promise<AnomalyObservation[]> {
  const clock = options.clock ?? systemClock;
  const deadline = clock.now() + options.timeoutMs;

  for (;;) {
    const result = await source.poll(handle);

    if (result.status === 'Complete') {
      return result.series;
    }
    if (result.status === 'Failed') {
      throw new QueryFailedError(handle.id, result.message);
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0 || options.signal?.aborted) {
      throw new QueryTimeoutError(handle.id, options.timeoutMs);
    }

    await clock.sleep(Math.min(options.pollIntervalMs, remaining));
  }
}
