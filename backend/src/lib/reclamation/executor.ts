/**
 * Reclamation Executor
 *
 * Runs policy evaluation and the guarded destructive action over a batch of
 * candidates on a bounded worker pool. Every candidate resolves to exactly one
 * entry (result, exclusion, not-eligible or skipped); nothing a single
 * candidate does can abort the batch.
 */

import { runPool } from '../execution/index.js';
import { logger as defaultLogger, type Logger } from '../logging.js';
import {
  errorMessage,
  MissingAttributeError,
  PolicyViolationError,
  ResourceNotFoundError,
  RetryExhaustedError,
  SafetyPrecheckFailedError,
} from './errors.js';
import { evaluateCandidate } from './policy-evaluator.js';
import type { SafetyGuard, SafetyHandle } from './safety-guard.js';
import type {
  Decision,
  ExcludedCandidate,
  ExecutionMode,
  NotEligibleCandidate,
  Policy,
  ReclaimCandidate,
  ReclamationBatchResult,
  ReclamationOutcome,
  ReclamationResult,
} from './types.js';

export interface ReclamationExecutorOptions {
  guard: SafetyGuard;
  concurrency: number;
  logger?: Logger;
}

export interface RunBatchOptions {
  signal?: AbortSignal;
}

type CandidateEntry =
  | { type: 'result'; result: ReclamationResult }
  | { type: 'excluded'; excluded: ExcludedCandidate }
  | { type: 'notEligible'; notEligible: NotEligibleCandidate };

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function summarizeResults(results: readonly ReclamationResult[]): {
  counts: Record<ReclamationOutcome, number>;
  totalSavings: number;
} {
  const counts: Record<ReclamationOutcome, number> = {
    Reclaimed: 0,
    SimulatedDryRun: 0,
    Failed: 0,
    AlreadyGone: 0,
  };
  let totalSavings = 0;

  for (const result of results) {
    counts[result.outcome]++;
    if (result.outcome === 'Reclaimed' || result.outcome === 'SimulatedDryRun') {
      totalSavings += result.savings;
    }
  }

  return { counts, totalSavings: round2(totalSavings) };
}

export class ReclamationExecutor {
  constructor(private readonly options: ReclamationExecutorOptions) {}

  private get log(): Logger {
    return this.options.logger ?? defaultLogger;
  }

  async runBatch(
    candidates: readonly ReclaimCandidate[],
    policy: Policy,
    mode: ExecutionMode,
    runOptions: RunBatchOptions = {}
  ): Promise<ReclamationBatchResult> {
    const startTime = Date.now();

    const slots = await runPool(candidates, candidate => this.processCandidate(candidate, policy, mode), {
      concurrency: this.options.concurrency,
      signal: runOptions.signal,
    });

    // Reduce after join: no totals are read while workers are in flight
    const results: ReclamationResult[] = [];
    const excluded: ExcludedCandidate[] = [];
    const notEligible: NotEligibleCandidate[] = [];
    const skipped: string[] = [];

    slots.forEach((slot, index) => {
      if (slot.status === 'skipped') {
        skipped.push(candidates[index].id);
        return;
      }
      const entry = slot.value;
      if (entry.type === 'result') results.push(entry.result);
      else if (entry.type === 'excluded') excluded.push(entry.excluded);
      else notEligible.push(entry.notEligible);
    });

    const { counts, totalSavings } = summarizeResults(results);
    const cancelled = skipped.length > 0;

    if (cancelled) {
      this.log.warn('Reclamation batch cancelled before completion', {
        mode,
        started: candidates.length - skipped.length,
        skipped: skipped.length,
      });
    }

    this.log.performance('reclamation batch', Date.now() - startTime, {
      mode,
      candidates: candidates.length,
      ...counts,
      excluded: excluded.length,
      notEligible: notEligible.length,
      totalSavings,
    });

    return { mode, results, excluded, notEligible, skipped, cancelled, counts, totalSavings };
  }

  private async processCandidate(
    candidate: ReclaimCandidate,
    policy: Policy,
    mode: ExecutionMode
  ): Promise<CandidateEntry> {
    let decision: Decision;
    try {
      decision = evaluateCandidate(candidate, policy);
    } catch (err: unknown) {
      if (err instanceof MissingAttributeError || err instanceof PolicyViolationError) {
        this.log.warn('Candidate excluded', { candidateId: candidate.id, kind: candidate.kind, error: err.message });
        return {
          type: 'excluded',
          excluded: {
            candidateId: candidate.id,
            kind: candidate.kind,
            reason: err instanceof MissingAttributeError ? 'MissingAttribute' : 'PolicyViolation',
            detail: err.message,
          },
        };
      }
      throw err;
    }

    if (decision.status === 'NotEligible') {
      return {
        type: 'notEligible',
        notEligible: { candidateId: candidate.id, kind: candidate.kind, reason: decision.reason },
      };
    }

    const savings = decision.estimatedMonthlyCost;

    if (mode === 'DryRun') {
      this.log.info('[DRY RUN] Would reclaim resource', {
        candidateId: candidate.id,
        kind: candidate.kind,
        savings,
      });
      return {
        type: 'result',
        result: {
          candidateId: candidate.id,
          kind: candidate.kind,
          outcome: 'SimulatedDryRun',
          savings,
          lifecycle: ['Discovered', 'Simulated'],
          attempts: 0,
        },
      };
    }

    return { type: 'result', result: await this.reclaim(candidate, savings) };
  }

  private async reclaim(candidate: ReclaimCandidate, savings: number): Promise<ReclamationResult> {
    const base = { candidateId: candidate.id, kind: candidate.kind };
    const { guard } = this.options;

    let handle: SafetyHandle;
    try {
      handle = await guard.acquire(candidate);
    } catch (err: unknown) {
      if (err instanceof ResourceNotFoundError) {
        return { ...base, outcome: 'AlreadyGone', savings: 0, lifecycle: ['Discovered'], attempts: err.attempts };
      }
      const attempts = err instanceof SafetyPrecheckFailedError ? err.attempts : 1;
      return {
        ...base,
        outcome: 'Failed',
        savings: 0,
        reason: 'SafetyPrecheckFailed',
        message: errorMessage(err),
        lifecycle: ['Discovered', 'SafetyCheckFailed', 'Failed'],
        attempts,
      };
    }

    const safetySnapshotId = handle.snapshotId;

    try {
      const released = await guard.release(handle);
      if (released.outcome === 'NotFound') {
        this.log.info('Resource already gone', { candidateId: candidate.id, kind: candidate.kind });
        return {
          ...base,
          outcome: 'AlreadyGone',
          savings: 0,
          lifecycle: released.lifecycle,
          attempts: released.attempts,
          safetySnapshotId,
        };
      }
      return {
        ...base,
        outcome: 'Reclaimed',
        savings,
        lifecycle: released.lifecycle,
        attempts: released.attempts,
        safetySnapshotId,
      };
    } catch (err: unknown) {
      this.log.error('Failed to reclaim resource', err, { candidateId: candidate.id, kind: candidate.kind });
      return {
        ...base,
        outcome: 'Failed',
        savings: 0,
        reason: err instanceof RetryExhaustedError ? 'RetriesExhausted' : 'ActionFailed',
        message: errorMessage(err),
        lifecycle: [...handle.lifecycle, 'Failed'],
        attempts: err instanceof RetryExhaustedError ? err.attempts : 1,
        safetySnapshotId,
      };
    }
  }
}
