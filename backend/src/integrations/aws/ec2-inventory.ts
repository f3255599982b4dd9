/**
 * EC2 inventory
 *
 * Lists reclaim candidates per kind: unattached volumes, unassociated
 * Elastic IPs, account-owned snapshots and running instances (with their
 * CPU utilization over the policy lookback window).
 */

import {
  DescribeAddressesCommand,
  DescribeInstancesCommand,
  DescribeSnapshotsCommand,
  DescribeVolumesCommand,
  EC2Client,
  type Instance,
  type Tag,
} from '@aws-sdk/client-ec2';
import { runPool } from '../../lib/execution/index.js';
import { logger as defaultLogger, type Logger } from '../../lib/logging.js';
import { errorMessage, isTransient } from '../../lib/reclamation/errors.js';
import type {
  Clock,
  Inventory,
  InventoryFilter,
  ReclaimCandidate,
  ResourceKind,
  UtilizationSample,
} from '../../lib/reclamation/types.js';
import { withRetry, type RetryConfig } from '../../lib/retry.js';
import type { CloudWatchUtilizationSource } from './cloudwatch-utilization.js';
import { classifyAwsError } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface Ec2InventoryOptions {
  region?: string;
  /** Required to list instances */
  utilization?: CloudWatchUtilizationSource;
  utilizationLookbackDays?: number;
  utilizationConcurrency?: number;
  /** Backoff for transient CloudWatch errors, per instance */
  retry?: RetryConfig;
  clock?: Clock;
  logger?: Logger;
}

export function tagsToRecord(tags: readonly Tag[] | undefined): Record<string, string> {
  const record: Record<string, string> = {};
  for (const tag of tags ?? []) {
    if (tag.Key) record[tag.Key] = tag.Value ?? '';
  }
  return record;
}

export function ageInDays(created: Date | undefined, now: Date): number | undefined {
  if (!created) return undefined;
  return Math.max(0, Math.floor((now.getTime() - created.getTime()) / DAY_MS));
}

function vcpuCount(instance: Instance): number | undefined {
  const cores = instance.CpuOptions?.CoreCount;
  if (cores === undefined) return undefined;
  return cores * (instance.CpuOptions?.ThreadsPerCore ?? 1);
}

export class Ec2Inventory implements Inventory {
  constructor(
    private readonly client: EC2Client,
    private readonly options: Ec2InventoryOptions = {}
  ) {}

  async list(kind: ResourceKind, filter: InventoryFilter): Promise<ReclaimCandidate[]> {
    try {
      switch (kind) {
        case 'Volume':
          return await this.listVolumes(filter);
        case 'ElasticIP':
          return await this.listAddresses(filter);
        case 'Snapshot':
          return await this.listSnapshots(filter);
        case 'Instance':
          return await this.listInstances(filter);
      }
    } catch (err: unknown) {
      throw classifyAwsError(err, `list ${kind}`);
    }
  }

  private region(filter: InventoryFilter): string | undefined {
    return filter.region ?? this.options.region;
  }

  private async listVolumes(filter: InventoryFilter): Promise<ReclaimCandidate[]> {
    const candidates: ReclaimCandidate[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new DescribeVolumesCommand({
          Filters: [{ Name: 'status', Values: ['available'] }],
          NextToken: nextToken,
        })
      );
      for (const volume of response.Volumes ?? []) {
        if (!volume.VolumeId) continue;
        candidates.push({
          id: volume.VolumeId,
          kind: 'Volume',
          region: this.region(filter),
          ageDays: ageInDays(volume.CreateTime, filter.now),
          sizeOrCapacity: volume.Size,
          tags: tagsToRecord(volume.Tags),
        });
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return candidates;
  }

  private async listAddresses(filter: InventoryFilter): Promise<ReclaimCandidate[]> {
    // DescribeAddresses is not paginated
    const response = await this.client.send(new DescribeAddressesCommand({}));

    return (response.Addresses ?? []).flatMap(address =>
      // Associated addresses are in use; EC2-Classic addresses have no allocation id to release
      address.AssociationId || !address.AllocationId
        ? []
        : [
            {
              id: address.AllocationId,
              kind: 'ElasticIP' as const,
              region: this.region(filter),
              sizeOrCapacity: 1,
              tags: tagsToRecord(address.Tags),
            },
          ]
    );
  }

  private async listSnapshots(filter: InventoryFilter): Promise<ReclaimCandidate[]> {
    const candidates: ReclaimCandidate[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new DescribeSnapshotsCommand({
          OwnerIds: ['self'],
          Filters: [{ Name: 'status', Values: ['completed'] }],
          NextToken: nextToken,
        })
      );
      for (const snapshot of response.Snapshots ?? []) {
        if (!snapshot.SnapshotId) continue;
        candidates.push({
          id: snapshot.SnapshotId,
          kind: 'Snapshot',
          region: this.region(filter),
          ageDays: ageInDays(snapshot.StartTime, filter.now),
          sizeOrCapacity: snapshot.VolumeSize,
          tags: tagsToRecord(snapshot.Tags),
        });
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return candidates;
  }

  private async listInstances(filter: InventoryFilter): Promise<ReclaimCandidate[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;

    do {
      const response = await this.client.send(
        new DescribeInstancesCommand({
          Filters: [{ Name: 'instance-state-name', Values: ['running'] }],
          NextToken: nextToken,
        })
      );
      for (const reservation of response.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []).filter(instance => instance.InstanceId));
      }
      nextToken = response.NextToken;
    } while (nextToken);

    const { utilization, utilizationLookbackDays = 14, utilizationConcurrency = 5 } = this.options;

    const slots = await runPool(
      instances,
      async (instance): Promise<ReclaimCandidate> => {
        const id = instance.InstanceId ?? '';
        return {
          id,
          kind: 'Instance',
          region: this.region(filter),
          ageDays: ageInDays(instance.LaunchTime, filter.now),
          sizeOrCapacity: vcpuCount(instance),
          instanceType: instance.InstanceType,
          tags: tagsToRecord(instance.Tags),
          // Without utilization the evaluator excludes the instance as MissingAttribute
          utilization: utilization
            ? await this.fetchUtilization(utilization, id, utilizationLookbackDays, filter.now)
            : undefined,
        };
      },
      { concurrency: utilizationConcurrency }
    );

    return slots.flatMap(slot => (slot.status === 'done' ? [slot.value] : []));
  }

  /**
   * One instance's metrics failing must not lose the rest of the listing:
   * after retries the instance is returned without utilization.
   */
  private async fetchUtilization(
    source: CloudWatchUtilizationSource,
    instanceId: string,
    lookbackDays: number,
    now: Date
  ): Promise<UtilizationSample | undefined> {
    const log = this.options.logger ?? defaultLogger;
    try {
      const { value } = await withRetry(() => source.getInstanceUtilization(instanceId, lookbackDays, now), {
        config: this.options.retry,
        isRetryable: isTransient,
        clock: this.options.clock,
        logger: log,
        operation: `utilization ${instanceId}`,
      });
      return value;
    } catch (err: unknown) {
      log.warn('CPU utilization unavailable', { instanceId, error: errorMessage(err) });
      return undefined;
    }
  }
}
