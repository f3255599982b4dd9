import { describe, it, expect } from 'vitest';
import { awaitQueryCompletion, QueryFailedError } from '../../../src/lib/reclamation/async-query.js';
import { QueryTimeoutError } from '../../../src/lib/reclamation/errors.js';
import type { MetricQuery } from '../../../src/lib/reclamation/types.js';
import { FakeClock, FakeMetricsSource } from '../../helpers/fakes.js';

const query: MetricQuery = {
  metric: 'bytesOut',
  window: { start: new Date('2024-06-01T00:00:00Z'), end: new Date('2024-06-02T00:00:00Z') },
  groupBy: ['srcAddr'],
};
const series = [{ timestamp: 1, groupKey: '10.0.0.1', value: 5 }];

describe('awaitQueryCompletion', () => {
  it('polls on the interval until the query completes', async () => {
    const clock = new FakeClock();
    const source = new FakeMetricsSource({ bytesOut: series }, { bytesOut: 2 });
    const handle = await source.query(query);

    await expect(awaitQueryCompletion(source, handle, { pollIntervalMs: 100, timeoutMs: 1000, clock })).resolves.toEqual(
      series
    );
    expect(source.polls).toEqual(['q-1', 'q-1', 'q-1']);
    expect(clock.sleeps).toEqual([100, 100]);
  });

  it('never waits past the timeout', async () => {
    const clock = new FakeClock();
    const source = new FakeMetricsSource({ bytesOut: series }, { bytesOut: 100 });
    const handle = await source.query(query);

    const error = await awaitQueryCompletion(source, handle, { pollIntervalMs: 300, timeoutMs: 1000, clock }).catch(
      (err: unknown) => err
    );

    expect(error).toBeInstanceOf(QueryTimeoutError);
    expect(error).toMatchObject({ queryId: 'q-1', timeoutMs: 1000 });
    expect(clock.sleeps).toEqual([300, 300, 300, 100]);
    expect(source.polls).toHaveLength(5);
  });

  it('raises QueryFailedError when the backend reports failure', async () => {
    const source = new FakeMetricsSource({ bytesOut: { failed: 'syntax error' } });
    const handle = await source.query(query);

    await expect(
      awaitQueryCompletion(source, handle, { pollIntervalMs: 100, timeoutMs: 1000, clock: new FakeClock() })
    ).rejects.toThrow(new QueryFailedError('q-1', 'syntax error'));
  });

  it('stops waiting once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const source = new FakeMetricsSource({ bytesOut: series }, { bytesOut: 5 });
    const handle = await source.query(query);

    await expect(
      awaitQueryCompletion(source, handle, {
        pollIntervalMs: 100,
        timeoutMs: 1000,
        clock: new FakeClock(),
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(QueryTimeoutError);
    expect(source.polls).toHaveLength(1);
  });
});
