/**
 * Retry Strategy
 * Exponential backoff with jitter for cloud API calls. Only errors the caller
 * classifies as retryable are retried; everything else is rethrown at once.
 */

import { logger as defaultLogger, type Logger } from './logging.js';
import { RetryExhaustedError } from './reclamation/errors.js';
import { systemClock, type Clock } from './reclamation/types.js';

export interface RetryConfig {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 20000,
  jitterFactor: 0.2,
};

export interface RetryOptions {
  config?: RetryConfig;
  isRetryable: (error: unknown) => boolean;
  clock?: Clock;
  logger?: Logger;
  /** Included in retry log lines */
  operation?: string;
  random?: () => number;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

export function calculateDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = exponentialDelay * config.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.min(exponentialDelay + jitter, config.maxDelayMs));
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * runs out of attempts.
 *
 * @throws RetryExhaustedError once every attempt failed with a retryable error
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const config = options.config ?? DEFAULT_RETRY_CONFIG;
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? defaultLogger;
  const maxAttempts = Math.max(1, config.maxAttempts);

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const value = await operation(attempt + 1);
      return { value, attempts: attempt + 1 };
    } catch (err: unknown) {
      if (!options.isRetryable(err)) {
        throw err;
      }
      lastError = err;

      if (attempt + 1 < maxAttempts) {
        const delayMs = calculateDelay(attempt, config, options.random);

        log.warn('Transient API error, retrying', {
          operation: options.operation,
          error: err instanceof Error ? err.message : String(err),
          attempt: attempt + 1,
          maxAttempts,
          delayMs: Math.round(delayMs),
        });

        await clock.sleep(delayMs);
      }
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
