/**
 * Safety Guard
 *
 * Sequences check-then-act for one candidate at a time:
 *
 *   Discovered -> SafetyChecked -> Deleted              (snapshot-requiring kinds)
 *   Discovered -> SafetyCheckFailed -> Failed           (precheck failed, nothing deleted)
 *   Discovered                                          (resource gone before its snapshot)
 *   Discovered -> Deleted                               (exempt kinds, e.g. addresses)
 *
 * A destructive call can only be made through `release`, and `release` only
 * accepts a handle minted by a successful `acquire` on the same guard.
 */

import { logger as defaultLogger, type Logger } from '../logging.js';
import { withRetry, type RetryConfig } from '../retry.js';
import {
  errorMessage,
  isTransient,
  ResourceNotFoundError,
  RetryExhaustedError,
  SafetyPrecheckFailedError,
} from './errors.js';
import type {
  Clock,
  DeleteOutcome,
  DestructiveActionService,
  KindPolicy,
  ReclaimCandidate,
  ResourceKind,
  SafetySnapshotService,
  SafetyState,
} from './types.js';

export interface SafetyHandle {
  readonly candidate: ReclaimCandidate;
  readonly snapshotId?: string;
  readonly exempt: boolean;
  readonly lifecycle: readonly SafetyState[];
  /** Attempts spent on the precheck */
  readonly attempts: number;
}

export interface ReleaseResult {
  outcome: DeleteOutcome;
  lifecycle: SafetyState[];
  attempts: number;
}

export interface SafetyGuardOptions {
  snapshots: SafetySnapshotService;
  actions: DestructiveActionService;
  kinds: Readonly<Record<ResourceKind, Pick<KindPolicy, 'requiresSafetySnapshot'>>>;
  retry?: RetryConfig;
  clock?: Clock;
  logger?: Logger;
}

export class SafetyGuard {
  private readonly issued = new WeakSet<SafetyHandle>();

  constructor(private readonly options: SafetyGuardOptions) {}

  private get log(): Logger {
    return this.options.logger ?? defaultLogger;
  }

  requiresSnapshot(kind: ResourceKind): boolean {
    return this.options.kinds[kind].requiresSafetySnapshot;
  }

  /**
   * Establish the precondition for deleting `candidate`.
   *
   * @throws ResourceNotFoundError if the resource vanished before it could be snapshotted
   * @throws SafetyPrecheckFailedError if the snapshot could not be created and confirmed
   */
  async acquire(candidate: ReclaimCandidate): Promise<SafetyHandle> {
    if (!this.requiresSnapshot(candidate.kind)) {
      return this.mint({ candidate, exempt: true, lifecycle: ['Discovered'], attempts: 0 });
    }

    let attempts = 0;
    try {
      const { value: snapshotId } = await withRetry(
        attempt => {
          attempts = attempt;
          return this.options.snapshots.create(candidate);
        },
        {
          config: this.options.retry,
          isRetryable: isTransient,
          clock: this.options.clock,
          logger: this.log,
          operation: `snapshot ${candidate.id}`,
        }
      );

      if (!snapshotId) {
        throw new Error('snapshot service returned no snapshot id');
      }

      this.log.audit('safety_snapshot_created', { candidateId: candidate.id, kind: candidate.kind, snapshotId });

      return this.mint({
        candidate,
        snapshotId,
        exempt: false,
        lifecycle: ['Discovered', 'SafetyChecked'],
        attempts,
      });
    } catch (err: unknown) {
      if (err instanceof ResourceNotFoundError) {
        this.log.info('Resource gone before safety snapshot', { candidateId: candidate.id, kind: candidate.kind });
        throw new ResourceNotFoundError(candidate.id, attempts, { cause: err.cause });
      }
      const cause = err instanceof RetryExhaustedError ? err.lastError : err;
      this.log.warn('Safety precheck failed', {
        candidateId: candidate.id,
        kind: candidate.kind,
        attempts,
        error: errorMessage(cause),
      });
      throw new SafetyPrecheckFailedError(candidate.id, errorMessage(cause), attempts, { cause: err });
    }
  }

  /**
   * Perform the destructive action. Transient errors are retried; the
   * handle is spent on the first call whatever the outcome.
   *
   * @throws RetryExhaustedError when every attempt hit a transient error
   */
  async release(handle: SafetyHandle): Promise<ReleaseResult> {
    if (!this.issued.has(handle)) {
      throw new Error(`Refusing to delete ${handle.candidate.id}: handle was not issued by this guard or was already released`);
    }
    this.issued.delete(handle);

    const { candidate } = handle;
    const { value: outcome, attempts } = await withRetry(() => this.options.actions.delete(candidate), {
      config: this.options.retry,
      isRetryable: isTransient,
      clock: this.options.clock,
      logger: this.log,
      operation: `delete ${candidate.id}`,
    });

    this.log.audit(outcome === 'Deleted' ? 'resource_deleted' : 'resource_already_gone', {
      candidateId: candidate.id,
      kind: candidate.kind,
      safetySnapshotId: handle.snapshotId,
    });

    return {
      outcome,
      lifecycle: outcome === 'Deleted' ? [...handle.lifecycle, 'Deleted'] : [...handle.lifecycle],
      attempts,
    };
  }

  private mint(handle: SafetyHandle): SafetyHandle {
    const frozen = Object.freeze({ ...handle, lifecycle: Object.freeze([...handle.lifecycle]) });
    this.issued.add(frozen);
    return frozen;
  }
}
