/**
 * CloudWatch Logs Insights metrics source over VPC flow logs.
 *
 * `query` starts an Insights query and returns its id; `poll` maps
 * GetQueryResults onto Pending / Complete / Failed. Each metric name maps to
 * a prebuilt query whose rows become anomaly observations. A result set that
 * hits the row limit is reported as Failed rather than classified.
 */

import {
  CloudWatchLogsClient,
  GetQueryResultsCommand,
  StartQueryCommand,
  type GetQueryResultsCommandOutput,
  type ResultField,
} from '@aws-sdk/client-cloudwatch-logs';
import type {
  AnomalyObservation,
  MetricQuery,
  MetricsSource,
  PollResult,
  QueryHandle,
} from '../../lib/reclamation/types.js';
import { classifyAwsError } from './errors.js';

interface FlowLogQuery {
  queryString: string;
  toObservation(row: Record<string, string>): AnomalyObservation | undefined;
}

/**
 * Logs Insights renders `bin()` buckets as "YYYY-MM-DD HH:mm:ss.SSS" in UTC.
 */
export function parseInsightsTimestamp(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const millis = Date.parse(`${value.trim().replace(' ', 'T')}Z`);
  return Number.isNaN(millis) ? undefined : millis;
}

export const FLOW_LOG_QUERIES: Readonly<Record<string, FlowLogQuery>> = {
  // One row per (window, source, destination port) among rejected connections
  portScan: {
    queryString: [
      'fields @timestamp, srcAddr, dstPort',
      '| filter action = "REJECT"',
      '| stats count(*) as attempts by bin(1h) as window, srcAddr, dstPort',
    ].join('\n'),
    toObservation: row => {
      const timestamp = parseInsightsTimestamp(row.window);
      if (timestamp === undefined || !row.srcAddr || !row.dstPort) return undefined;
      return { timestamp, groupKey: row.srcAddr, secondaryKey: row.dstPort, value: Number(row.attempts ?? 0) };
    },
  },
  // Accepted bytes per (window, source)
  bytesOut: {
    queryString: [
      'fields @timestamp, srcAddr, bytes',
      '| filter action = "ACCEPT"',
      '| stats sum(bytes) as totalBytes by bin(1h) as window, srcAddr',
    ].join('\n'),
    toObservation: row => {
      const timestamp = parseInsightsTimestamp(row.window);
      const value = Number(row.totalBytes);
      if (timestamp === undefined || !row.srcAddr || !Number.isFinite(value)) return undefined;
      return { timestamp, groupKey: row.srcAddr, value };
    },
  },
  // Rejected connections per (window, destination endpoint), busiest first
  deniedTraffic: {
    queryString: [
      'fields @timestamp, dstAddr, dstPort',
      '| filter action = "REJECT"',
      '| stats count(*) as denials by bin(1h) as window, dstAddr, dstPort',
      '| sort denials desc',
    ].join('\n'),
    toObservation: row => {
      const timestamp = parseInsightsTimestamp(row.window);
      const value = Number(row.denials);
      if (timestamp === undefined || !row.dstAddr || !row.dstPort || !Number.isFinite(value)) return undefined;
      return { timestamp, groupKey: `${row.dstAddr}:${row.dstPort}`, value };
    },
  },
};

const PENDING_STATUSES: ReadonlySet<string> = new Set(['Scheduled', 'Running', 'Unknown']);

/** Most rows a single Insights query returns; a full page may have been cut off */
export const MAX_QUERY_ROWS = 10_000;

function rowToRecord(row: readonly ResultField[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const field of row) {
    if (field.field && field.value !== undefined) record[field.field] = field.value;
  }
  return record;
}

export class LogsInsightsMetricsSource implements MetricsSource {
  private readonly queries = new Map<string, FlowLogQuery>();

  constructor(
    private readonly client: CloudWatchLogsClient,
    private readonly logGroupName: string
  ) {}

  async query(query: MetricQuery): Promise<QueryHandle> {
    const flowLogQuery = FLOW_LOG_QUERIES[query.metric];
    if (!flowLogQuery) {
      throw new Error(`No flow log query defined for metric ${query.metric}`);
    }

    let queryId: string | undefined;
    try {
      const response = await this.client.send(
        new StartQueryCommand({
          logGroupName: this.logGroupName,
          startTime: Math.floor(query.window.start.getTime() / 1000),
          endTime: Math.floor(query.window.end.getTime() / 1000),
          queryString: flowLogQuery.queryString,
          limit: MAX_QUERY_ROWS,
        })
      );
      queryId = response.queryId;
    } catch (err: unknown) {
      throw classifyAwsError(err, 'StartQuery');
    }

    if (!queryId) {
      throw new Error('StartQuery returned no query id');
    }
    this.queries.set(queryId, flowLogQuery);
    return { id: queryId };
  }

  async poll(handle: QueryHandle): Promise<PollResult> {
    const flowLogQuery = this.queries.get(handle.id);
    if (!flowLogQuery) {
      return { status: 'Failed', message: `Unknown query ${handle.id}` };
    }

    let response: GetQueryResultsCommandOutput;
    try {
      response = await this.client.send(new GetQueryResultsCommand({ queryId: handle.id }));
    } catch (err: unknown) {
      throw classifyAwsError(err, 'GetQueryResults');
    }

    const status = response.status ?? 'Unknown';
    if (PENDING_STATUSES.has(status)) {
      return { status: 'Pending' };
    }
    this.queries.delete(handle.id);

    if (status !== 'Complete') {
      return { status: 'Failed', message: `Query ended with status ${status}` };
    }

    const rows = response.results ?? [];
    if (rows.length >= MAX_QUERY_ROWS) {
      return {
        status: 'Failed',
        message: `Query ${handle.id} returned ${rows.length} rows, the Logs Insights limit; results are truncated`,
      };
    }

    const series = rows.flatMap(row => {
      const observation = flowLogQuery.toObservation(rowToRecord(row));
      return observation ? [observation] : [];
    });
    return { status: 'Complete', series };
  }
}
