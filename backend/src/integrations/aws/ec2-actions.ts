/**
 * EC2 reclaim actions: safety snapshots and the destructive call per kind.
 */

import {
  CreateSnapshotCommand,
  type CreateSnapshotCommandOutput,
  DeleteSnapshotCommand,
  DeleteVolumeCommand,
  EC2Client,
  ReleaseAddressCommand,
  StopInstancesCommand,
  waitUntilSnapshotCompleted,
} from '@aws-sdk/client-ec2';
import { ResourceNotFoundError } from '../../lib/reclamation/errors.js';
import type {
  DeleteOutcome,
  DestructiveActionService,
  ReclaimCandidate,
  SafetySnapshotService,
} from '../../lib/reclamation/types.js';
import { classifyAwsError, isNotFoundError } from './errors.js';

export interface Ec2ReclaimActionsOptions {
  /** Seconds to wait for a safety snapshot to reach `completed` */
  snapshotWaitSeconds?: number;
  now?: () => Date;
}

export class Ec2ReclaimActions implements SafetySnapshotService, DestructiveActionService {
  constructor(
    private readonly client: EC2Client,
    private readonly options: Ec2ReclaimActionsOptions = {}
  ) {}

  async create(candidate: ReclaimCandidate): Promise<string> {
    if (candidate.kind !== 'Volume') {
      throw new Error(`Safety snapshots are only supported for volumes, not ${candidate.kind}`);
    }

    const now = this.options.now?.() ?? new Date();

    try {
      let response: CreateSnapshotCommandOutput;
      try {
        response = await this.client.send(
          new CreateSnapshotCommand({
            VolumeId: candidate.id,
            Description: `Pre-deletion snapshot of ${candidate.id}`,
            TagSpecifications: [
              {
                ResourceType: 'snapshot',
                Tags: [
                  { Key: 'Purpose', Value: 'PreDeletionSnapshot' },
                  { Key: 'SourceVolume', Value: candidate.id },
                  { Key: 'CreatedAt', Value: now.toISOString() },
                ],
              },
            ],
          })
        );
      } catch (err: unknown) {
        // The volume went away after inventory listed it
        if (isNotFoundError(err)) throw new ResourceNotFoundError(candidate.id, 1, { cause: err });
        throw err;
      }

      const snapshotId = response.SnapshotId;
      if (!snapshotId) {
        throw new Error(`CreateSnapshot returned no snapshot id for ${candidate.id}`);
      }

      await waitUntilSnapshotCompleted(
        { client: this.client, maxWaitTime: this.options.snapshotWaitSeconds ?? 600 },
        { SnapshotIds: [snapshotId] }
      );

      return snapshotId;
    } catch (err: unknown) {
      if (err instanceof ResourceNotFoundError) throw err;
      throw classifyAwsError(err, `CreateSnapshot ${candidate.id}`);
    }
  }

  async delete(candidate: ReclaimCandidate): Promise<DeleteOutcome> {
    try {
      switch (candidate.kind) {
        case 'Volume':
          await this.client.send(new DeleteVolumeCommand({ VolumeId: candidate.id }));
          break;
        case 'ElasticIP':
          await this.client.send(new ReleaseAddressCommand({ AllocationId: candidate.id }));
          break;
        case 'Snapshot':
          await this.client.send(new DeleteSnapshotCommand({ SnapshotId: candidate.id }));
          break;
        case 'Instance':
          // Stopped, not terminated: the EBS root volume stays recoverable
          await this.client.send(new StopInstancesCommand({ InstanceIds: [candidate.id] }));
          break;
      }
      return 'Deleted';
    } catch (err: unknown) {
      if (isNotFoundError(err)) {
        return 'NotFound';
      }
      throw classifyAwsError(err, `reclaim ${candidate.kind} ${candidate.id}`);
    }
  }
}
