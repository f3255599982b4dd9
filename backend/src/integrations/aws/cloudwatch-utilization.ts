/**
 * CloudWatch utilization source
 *
 * Reduces hourly CPUUtilization averages over the lookback window to a mean
 * and a nearest-rank 95th percentile.
 */

import {
  CloudWatchClient,
  GetMetricStatisticsCommand,
  type GetMetricStatisticsCommandOutput,
} from '@aws-sdk/client-cloudwatch';
import type { UtilizationSample } from '../../lib/reclamation/types.js';
import { classifyAwsError } from './errors.js';

const HOUR_SECONDS = 3600;
const DAY_MS = 24 * 60 * 60 * 1000;

export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class CloudWatchUtilizationSource {
  constructor(private readonly client: CloudWatchClient) {}

  async getInstanceUtilization(instanceId: string, lookbackDays: number, now: Date): Promise<UtilizationSample> {
    const startTime = new Date(now.getTime() - lookbackDays * DAY_MS);

    let response: GetMetricStatisticsCommandOutput;
    try {
      response = await this.client.send(
        new GetMetricStatisticsCommand({
          Namespace: 'AWS/EC2',
          MetricName: 'CPUUtilization',
          Dimensions: [{ Name: 'InstanceId', Value: instanceId }],
          StartTime: startTime,
          EndTime: now,
          Period: HOUR_SECONDS,
          Statistics: ['Average'],
        })
      );
    } catch (err: unknown) {
      throw classifyAwsError(err, 'GetMetricStatistics');
    }

    const values = (response.Datapoints ?? []).flatMap(dp => (dp.Average === undefined ? [] : [dp.Average]));
    const average = values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : 0;

    return {
      average: round2(average),
      p95: round2(percentile(values, 95)),
      datapoints: values.length,
      lookbackDays,
    };
  }
}
