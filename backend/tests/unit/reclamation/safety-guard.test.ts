import { describe, it, expect } from 'vitest';
import { silentLogger } from '../../../src/lib/logging.js';
import { RetryExhaustedError, SafetyPrecheckFailedError } from '../../../src/lib/reclamation/errors.js';
import { SafetyGuard, type SafetyHandle } from '../../../src/lib/reclamation/safety-guard.js';
import { FakeActionService, FakeClock, FakeSnapshotService, address, volume } from '../../helpers/fakes.js';

const kinds = {
  Volume: { requiresSafetySnapshot: true },
  ElasticIP: { requiresSafetySnapshot: false },
  Snapshot: { requiresSafetySnapshot: false },
  Instance: { requiresSafetySnapshot: false },
};
const retry = { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitterFactor: 0 };

function setup() {
  const snapshots = new FakeSnapshotService();
  const actions = new FakeActionService();
  const guard = new SafetyGuard({ snapshots, actions, kinds, retry, clock: new FakeClock(), logger: silentLogger });
  return { snapshots, actions, guard };
}

describe('SafetyGuard', () => {
  it('snapshots before handing out a handle', async () => {
    const { snapshots, guard } = setup();
    const handle = await guard.acquire(volume('vol-1'));

    expect(snapshots.calls).toEqual(['vol-1']);
    expect(handle.snapshotId).toBe('snap-vol-1');
    expect(handle.exempt).toBe(false);
    expect(handle.lifecycle).toEqual(['Discovered', 'SafetyChecked']);
    expect(handle.attempts).toBe(1);
    expect(Object.isFrozen(handle)).toBe(true);
  });

  it('skips the snapshot for exempt kinds', async () => {
    const { snapshots, guard } = setup();
    const handle = await guard.acquire(address('eipalloc-1'));

    expect(snapshots.calls).toEqual([]);
    expect(handle.exempt).toBe(true);
    expect(handle.lifecycle).toEqual(['Discovered']);
  });

  it('retries transient snapshot failures', async () => {
    const { snapshots, guard } = setup();
    snapshots.script('vol-1', 'transient', 'snap-ok');

    const handle = await guard.acquire(volume('vol-1'));
    expect(handle.snapshotId).toBe('snap-ok');
    expect(handle.attempts).toBe(2);
  });

  it('fails the precheck after exhausting retries and never deletes', async () => {
    const { snapshots, actions, guard } = setup();
    snapshots.script('vol-1', 'transient', 'transient', 'transient');

    const error = await guard.acquire(volume('vol-1')).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SafetyPrecheckFailedError);
    expect(error).toMatchObject({ candidateId: 'vol-1', attempts: 3 });
    expect(actions.calls).toEqual([]);
  });

  it('fails the precheck at once on a permanent snapshot error', async () => {
    const { snapshots, guard } = setup();
    snapshots.script('vol-1', new Error('IncorrectState'));

    await expect(guard.acquire(volume('vol-1'))).rejects.toThrow('Safety precheck failed for vol-1: IncorrectState');
    expect(snapshots.calls).toEqual(['vol-1']);
  });

  it('deletes through a released handle', async () => {
    const { actions, guard } = setup();
    const handle = await guard.acquire(volume('vol-1'));

    await expect(guard.release(handle)).resolves.toEqual({
      outcome: 'Deleted',
      lifecycle: ['Discovered', 'SafetyChecked', 'Deleted'],
      attempts: 1,
    });
    expect(actions.deleted).toEqual(['vol-1']);
  });

  it('reports NotFound without appending Deleted', async () => {
    const { actions, guard } = setup();
    actions.script('eipalloc-1', 'NotFound');
    const handle = await guard.acquire(address('eipalloc-1'));

    await expect(guard.release(handle)).resolves.toEqual({
      outcome: 'NotFound',
      lifecycle: ['Discovered'],
      attempts: 1,
    });
  });

  it('refuses handles it did not issue', async () => {
    const { actions, guard } = setup();
    const forged: SafetyHandle = {
      candidate: volume('vol-1'),
      snapshotId: 'snap-x',
      exempt: false,
      lifecycle: ['Discovered', 'SafetyChecked'],
      attempts: 1,
    };

    await expect(guard.release(forged)).rejects.toThrow('handle was not issued by this guard');
    expect(actions.calls).toEqual([]);
  });

  it('refuses a handle from another guard', async () => {
    const first = setup();
    const second = setup();
    const handle = await first.guard.acquire(volume('vol-1'));

    await expect(second.guard.release(handle)).rejects.toThrow('Refusing to delete vol-1');
  });

  it('spends a handle on the first release', async () => {
    const { actions, guard } = setup();
    const handle = await guard.acquire(volume('vol-1'));
    await guard.release(handle);

    await expect(guard.release(handle)).rejects.toThrow('already released');
    expect(actions.calls).toEqual(['vol-1']);
  });

  it('surfaces RetryExhaustedError when the delete keeps throttling', async () => {
    const { actions, guard } = setup();
    actions.script('vol-1', 'transient', 'transient', 'transient');
    const handle = await guard.acquire(volume('vol-1'));

    const error = await guard.release(handle).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(actions.calls).toEqual(['vol-1', 'vol-1', 'vol-1']);
  });
});
