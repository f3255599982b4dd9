import { describe, it, expect } from 'vitest';
import { silentLogger } from '../../src/lib/logging.js';
import { RetryExhaustedError, TransientApiError } from '../../src/lib/reclamation/errors.js';
import { calculateDelay, DEFAULT_RETRY_CONFIG, withRetry } from '../../src/lib/retry.js';
import { FakeClock } from '../helpers/fakes.js';

const config = { maxAttempts: 3, baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0 };
const isRetryable = (err: unknown) => err instanceof TransientApiError;

describe('calculateDelay', () => {
  it('doubles the base delay per attempt', () => {
    expect(calculateDelay(0, config)).toBe(100);
    expect(calculateDelay(1, config)).toBe(200);
    expect(calculateDelay(3, config)).toBe(800);
  });

  it('caps at the maximum delay', () => {
    expect(calculateDelay(10, config)).toBe(1000);
  });

  it('spreads the delay by the jitter factor', () => {
    const jittery = { ...DEFAULT_RETRY_CONFIG, jitterFactor: 0.2 };
    expect(calculateDelay(0, jittery, () => 0)).toBe(400);
    expect(calculateDelay(0, jittery, () => 1)).toBe(600);
  });
});

describe('withRetry', () => {
  it('returns the value and attempt count on success', async () => {
    const clock = new FakeClock();
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new TransientApiError('Throttling');
        return 'ok';
      },
      { config, isRetryable, clock, logger: silentLogger }
    );

    expect(result).toEqual({ value: 'ok', attempts: 3 });
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('rethrows non-retryable errors without retrying', async () => {
    const clock = new FakeClock();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('AccessDenied');
        },
        { config, isRetryable, clock, logger: silentLogger }
      )
    ).rejects.toThrow('AccessDenied');
    expect(calls).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('gives up with RetryExhaustedError after maxAttempts', async () => {
    const clock = new FakeClock();
    const error = await withRetry(
      async () => {
        throw new TransientApiError('RequestLimitExceeded');
      },
      { config, isRetryable, clock, logger: silentLogger }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, message: 'Gave up after 3 attempts: RequestLimitExceeded' });
    // No sleep after the final attempt
    expect(clock.sleeps).toEqual([100, 200]);
  });

  it('passes the 1-based attempt number to the operation', async () => {
    const seen: number[] = [];
    await withRetry(
      async attempt => {
        seen.push(attempt);
        if (attempt === 1) throw new TransientApiError('Throttling');
        return attempt;
      },
      { config, isRetryable, clock: new FakeClock(), logger: silentLogger }
    );
    expect(seen).toEqual([1, 2]);
  });
});
