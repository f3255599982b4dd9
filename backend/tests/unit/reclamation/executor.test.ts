import { describe, it, expect } from 'vitest';
import { silentLogger } from '../../../src/lib/logging.js';
import { policySchema } from '../../../src/lib/reclamation/config.js';
import { ResourceNotFoundError } from '../../../src/lib/reclamation/errors.js';
import { ReclamationExecutor, summarizeResults } from '../../../src/lib/reclamation/executor.js';
import { SafetyGuard } from '../../../src/lib/reclamation/safety-guard.js';
import type {
  DeleteOutcome,
  DestructiveActionService,
  ReclaimCandidate,
} from '../../../src/lib/reclamation/types.js';
import { FakeActionService, FakeClock, FakeSnapshotService, address, volume } from '../../helpers/fakes.js';

const policy = policySchema.parse({});
const retry = { maxAttempts: 2, baseDelayMs: 10, maxDelayMs: 100, jitterFactor: 0 };

function executorFor(actions: DestructiveActionService, snapshots = new FakeSnapshotService(), concurrency = 4) {
  const guard = new SafetyGuard({
    snapshots,
    actions,
    kinds: policy.kinds,
    retry,
    clock: new FakeClock(),
    logger: silentLogger,
  });
  return new ReclamationExecutor({ guard, concurrency, logger: silentLogger });
}

const candidates: ReclaimCandidate[] = [
  volume('vol-1'),
  address('eipalloc-1'),
  volume('vol-2'),
  volume('vol-3'),
  volume('vol-young', { ageDays: 2 }),
  volume('vol-bad', { sizeOrCapacity: undefined }),
];

describe('ReclamationExecutor', () => {
  describe('live mode', () => {
    it('resolves every candidate to exactly one entry', async () => {
      const snapshots = new FakeSnapshotService().script('vol-2', new Error('IncorrectState'));
      const actions = new FakeActionService()
        .script('eipalloc-1', 'NotFound')
        .script('vol-3', new Error('VolumeInUse'));

      const batch = await executorFor(actions, snapshots).runBatch(candidates, policy, 'Live');

      expect(batch.results.map(r => [r.candidateId, r.outcome])).toEqual([
        ['vol-1', 'Reclaimed'],
        ['eipalloc-1', 'AlreadyGone'],
        ['vol-2', 'Failed'],
        ['vol-3', 'Failed'],
      ]);
      expect(batch.notEligible).toEqual([{ candidateId: 'vol-young', kind: 'Volume', reason: 'BelowAgeThreshold' }]);
      expect(batch.excluded).toEqual([
        {
          candidateId: 'vol-bad',
          kind: 'Volume',
          reason: 'MissingAttribute',
          detail: 'Candidate vol-bad is missing sizeOrCapacity',
        },
      ]);
      expect(batch.skipped).toEqual([]);
      expect(batch.cancelled).toBe(false);
      expect(batch.counts).toEqual({ Reclaimed: 1, SimulatedDryRun: 0, Failed: 2, AlreadyGone: 1 });
      expect(batch.totalSavings).toBe(8);
      expect(actions.deleted).toEqual(['vol-1']);
    });

    it('records the lifecycle and safety snapshot of a reclaimed volume', async () => {
      const batch = await executorFor(new FakeActionService()).runBatch([volume('vol-1')], policy, 'Live');

      expect(batch.results[0]).toEqual({
        candidateId: 'vol-1',
        kind: 'Volume',
        outcome: 'Reclaimed',
        savings: 8,
        lifecycle: ['Discovered', 'SafetyChecked', 'Deleted'],
        attempts: 1,
        safetySnapshotId: 'snap-vol-1',
      });
    });

    it('never calls delete when the safety precheck fails', async () => {
      const snapshots = new FakeSnapshotService().script('vol-1', 'transient', 'transient');
      const actions = new FakeActionService();

      const batch = await executorFor(actions, snapshots).runBatch([volume('vol-1')], policy, 'Live');

      expect(actions.calls).toEqual([]);
      expect(batch.results[0]).toMatchObject({
        outcome: 'Failed',
        reason: 'SafetyPrecheckFailed',
        savings: 0,
        lifecycle: ['Discovered', 'SafetyCheckFailed', 'Failed'],
        attempts: 2,
      });
    });

    it('reports a volume that vanished before its snapshot as AlreadyGone', async () => {
      const snapshots = new FakeSnapshotService().script('vol-1', 'transient', new ResourceNotFoundError('vol-1'));
      const actions = new FakeActionService();

      const batch = await executorFor(actions, snapshots).runBatch([volume('vol-1')], policy, 'Live');

      expect(actions.calls).toEqual([]);
      expect(batch.results).toEqual([
        {
          candidateId: 'vol-1',
          kind: 'Volume',
          outcome: 'AlreadyGone',
          savings: 0,
          lifecycle: ['Discovered'],
          attempts: 2,
        },
      ]);
      expect(batch.counts).toEqual({ Reclaimed: 0, SimulatedDryRun: 0, Failed: 0, AlreadyGone: 1 });
      expect(batch.totalSavings).toBe(0);
    });

    it('distinguishes exhausted retries from a failed action', async () => {
      const actions = new FakeActionService()
        .script('eipalloc-1', 'transient', 'transient')
        .script('eipalloc-2', new Error('AuthFailure'));

      const batch = await executorFor(actions).runBatch([address('eipalloc-1'), address('eipalloc-2')], policy, 'Live');

      expect(batch.results).toEqual([
        expect.objectContaining({ outcome: 'Failed', reason: 'RetriesExhausted', attempts: 2, lifecycle: ['Discovered', 'Failed'] }),
        expect.objectContaining({ outcome: 'Failed', reason: 'ActionFailed', attempts: 1, message: 'AuthFailure' }),
      ]);
    });
  });

  describe('dry run', () => {
    it('simulates every eligible candidate without touching the action service', async () => {
      const snapshots = new FakeSnapshotService();
      const actions = new FakeActionService();

      const batch = await executorFor(actions, snapshots).runBatch(candidates, policy, 'DryRun');

      expect(actions.calls).toEqual([]);
      expect(snapshots.calls).toEqual([]);
      expect(batch.counts).toEqual({ Reclaimed: 0, SimulatedDryRun: 4, Failed: 0, AlreadyGone: 0 });
      expect(batch.totalSavings).toBe(27.6);
      expect(batch.results.every(r => r.lifecycle.join() === 'Discovered,Simulated')).toBe(true);
    });
  });

  describe('bounded concurrency', () => {
    it('never has more than `concurrency` actions in flight', async () => {
      const actions = new FakeActionService(5);
      const addresses = Array.from({ length: 10 }, (_, i) => address(`eipalloc-${i}`));

      const batch = await executorFor(actions, new FakeSnapshotService(), 3).runBatch(addresses, policy, 'Live');

      expect(actions.maxInFlight).toBe(3);
      expect(batch.counts.Reclaimed).toBe(10);
    });
  });

  describe('cancellation', () => {
    it('skips every candidate when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const actions = new FakeActionService();
      const batch = await executorFor(actions).runBatch([volume('vol-1'), volume('vol-2')], policy, 'Live', {
        signal: controller.signal,
      });

      expect(batch.results).toEqual([]);
      expect(batch.skipped).toEqual(['vol-1', 'vol-2']);
      expect(batch.cancelled).toBe(true);
      expect(actions.calls).toEqual([]);
    });

    it('finishes in-flight candidates and skips the rest', async () => {
      const controller = new AbortController();
      const actions: DestructiveActionService & { calls: string[] } = {
        calls: [],
        async delete(candidate): Promise<DeleteOutcome> {
          this.calls.push(candidate.id);
          controller.abort();
          return 'Deleted';
        },
      };

      const batch = await executorFor(actions, new FakeSnapshotService(), 1).runBatch(
        [address('eipalloc-1'), address('eipalloc-2'), address('eipalloc-3')],
        policy,
        'Live',
        { signal: controller.signal }
      );

      expect(actions.calls).toEqual(['eipalloc-1']);
      expect(batch.results.map(r => r.outcome)).toEqual(['Reclaimed']);
      expect(batch.skipped).toEqual(['eipalloc-2', 'eipalloc-3']);
      expect(batch.totalSavings).toBe(3.6);
    });
  });
});

describe('summarizeResults', () => {
  it('only counts savings from reclaimed and simulated results', () => {
    expect(
      summarizeResults([
        { candidateId: 'a', kind: 'Volume', outcome: 'Reclaimed', savings: 1.1, lifecycle: [], attempts: 1 },
        { candidateId: 'b', kind: 'Volume', outcome: 'SimulatedDryRun', savings: 2.2, lifecycle: [], attempts: 0 },
        { candidateId: 'c', kind: 'Volume', outcome: 'AlreadyGone', savings: 0, lifecycle: [], attempts: 1 },
      ])
    ).toEqual({ counts: { Reclaimed: 1, SimulatedDryRun: 1, Failed: 0, AlreadyGone: 1 }, totalSavings: 3.3 });
  });
});
