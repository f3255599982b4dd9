/**
 * Cost Explorer metrics source
 *
 * Cost Explorer answers synchronously, so `query` fetches the whole series up
 * front and `poll` hands back an already-complete job.
 */

import {
  CostExplorerClient,
  GetCostAndUsageCommand,
  type Expression,
  type ResultByTime,
} from '@aws-sdk/client-cost-explorer';
import type {
  AnomalyObservation,
  CostContext,
  CostContextSource,
  MetricQuery,
  MetricsSource,
  PollResult,
  QueryHandle,
  TimeWindow,
} from '../../lib/reclamation/types.js';
import { classifyAwsError } from './errors.js';

export interface CostExplorerSourceOptions {
  /** Resources without this tag count as untagged spend */
  allocationTagKey?: string;
}

/** Cost Explorer dates are YYYY-MM-DD with an exclusive end */
export function toCostExplorerDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function parseAmount(amount: string | undefined): number {
  const value = Number(amount ?? 0);
  return Number.isFinite(value) ? value : 0;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class CostExplorerMetricsSource implements MetricsSource, CostContextSource {
  private readonly completed = new Map<string, AnomalyObservation[]>();
  private sequence = 0;

  constructor(
    private readonly client: CostExplorerClient,
    private readonly options: CostExplorerSourceOptions = {}
  ) {}

  async query(query: MetricQuery): Promise<QueryHandle> {
    const groupKey = query.groupBy[0] ?? 'SERVICE';
    const results = await this.fetchDaily(query.window, query.metric, groupKey);

    const series: AnomalyObservation[] = [];
    for (const day of results) {
      const timestamp = Date.parse(`${day.TimePeriod?.Start ?? ''}T00:00:00Z`);
      if (Number.isNaN(timestamp)) continue;
      for (const group of day.Groups ?? []) {
        const key = group.Keys?.[0];
        if (!key) continue;
        series.push({ timestamp, groupKey: key, value: parseAmount(group.Metrics?.[query.metric]?.Amount) });
      }
    }

    const id = `ce-${++this.sequence}`;
    this.completed.set(id, series);
    return { id };
  }

  async poll(handle: QueryHandle): Promise<PollResult> {
    const series = this.completed.get(handle.id);
    if (!series) {
      return { status: 'Failed', message: `Unknown query ${handle.id}` };
    }
    this.completed.delete(handle.id);
    return { status: 'Complete', series };
  }

  async getCostContext(window: TimeWindow): Promise<CostContext> {
    const tagKey = this.options.allocationTagKey ?? 'Environment';
    const untaggedFilter: Expression = { Tags: { Key: tagKey, MatchOptions: ['ABSENT'] } };

    const [all, untagged] = await Promise.all([
      this.fetchDaily(window, 'UnblendedCost'),
      this.fetchDaily(window, 'UnblendedCost', undefined, untaggedFilter),
    ]);

    const total = (results: ResultByTime[]) =>
      round2(results.reduce((sum, day) => sum + parseAmount(day.Total?.UnblendedCost?.Amount), 0));

    return { totalCost: total(all), untaggedCost: total(untagged) };
  }

  private async fetchDaily(
    window: TimeWindow,
    metric: string,
    groupKey?: string,
    filter?: Expression
  ): Promise<ResultByTime[]> {
    const results: ResultByTime[] = [];
    let nextPageToken: string | undefined;

    try {
      do {
        const response = await this.client.send(
          new GetCostAndUsageCommand({
            TimePeriod: { Start: toCostExplorerDate(window.start), End: toCostExplorerDate(window.end) },
            Granularity: 'DAILY',
            Metrics: [metric],
            GroupBy: groupKey ? [{ Type: 'DIMENSION', Key: groupKey }] : undefined,
            Filter: filter,
            NextPageToken: nextPageToken,
          })
        );
        results.push(...(response.ResultsByTime ?? []));
        nextPageToken = response.NextPageToken;
      } while (nextPageToken);
    } catch (err: unknown) {
      throw classifyAwsError(err, 'GetCostAndUsage');
    }

    return results;
  }
}
