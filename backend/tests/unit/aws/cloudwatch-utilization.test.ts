import { describe, it, expect, vi } from 'vitest';
import { CloudWatchClient, GetMetricStatisticsCommand } from '@aws-sdk/client-cloudwatch';
import { CloudWatchUtilizationSource, percentile } from '../../../src/integrations/aws/cloudwatch-utilization.js';

const now = new Date('2024-06-15T00:00:00Z');

describe('percentile', () => {
  it('uses the nearest rank', () => {
    const values = Array.from({ length: 20 }, (_, i) => 20 - i);
    expect(percentile(values, 95)).toBe(19);
    expect(percentile(values, 100)).toBe(20);
    expect(percentile([7], 95)).toBe(7);
  });

  it('returns 0 for no values', () => {
    expect(percentile([], 95)).toBe(0);
  });
});

describe('CloudWatchUtilizationSource', () => {
  it('requests hourly CPU averages over the lookback window', async () => {
    const client = new CloudWatchClient({ region: 'us-east-1' });
    const send = vi.spyOn(client, 'send').mockImplementation(async () => ({
      Datapoints: [{ Average: 1 }, { Average: 2 }, {}, { Average: 2.5 }],
    }));

    const sample = await new CloudWatchUtilizationSource(client).getInstanceUtilization('i-1', 14, now);

    expect(sample).toEqual({ average: 1.83, p95: 2.5, datapoints: 3, lookbackDays: 14 });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(GetMetricStatisticsCommand);
    if (command instanceof GetMetricStatisticsCommand) {
      expect(command.input).toEqual({
        Namespace: 'AWS/EC2',
        MetricName: 'CPUUtilization',
        Dimensions: [{ Name: 'InstanceId', Value: 'i-1' }],
        StartTime: new Date('2024-06-01T00:00:00Z'),
        EndTime: now,
        Period: 3600,
        Statistics: ['Average'],
      });
    }
  });

  it('reports zero datapoints when CloudWatch has none', async () => {
    const client = new CloudWatchClient({ region: 'us-east-1' });
    vi.spyOn(client, 'send').mockImplementation(async () => ({}));

    await expect(new CloudWatchUtilizationSource(client).getInstanceUtilization('i-2', 7, now)).resolves.toEqual({
      average: 0,
      p95: 0,
      datapoints: 0,
      lookbackDays: 7,
    });
  });
});
