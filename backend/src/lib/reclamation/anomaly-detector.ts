/**
 * Anomaly Detector
 *
 * Every detection mode is the same routine: group observations, let the mode
 * aggregate each group into measurements, compare each measurement to the
 * mode's thresholds, emit the ones that cross. Modes differ only in their
 * aggregate and classify steps.
 */

import { runPool } from '../execution/index.js';
import { logger as defaultLogger, type Logger } from '../logging.js';
import { awaitQueryCompletion, type AwaitQueryOptions } from './async-query.js';
import { errorMessage, QueryTimeoutError } from './errors.js';
import type {
  Anomaly,
  AnomalyObservation,
  AnomalySeverity,
  DetectorConfig,
  DetectorMode,
  MetricQuery,
  MetricsSource,
} from './types.js';

interface Measurement {
  groupKey: string;
  timestamp: number;
  current: number;
  baseline?: number;
}

interface Classification {
  severity: AnomalySeverity;
  threshold: number;
  pctChange?: number;
}

interface ModeStrategy {
  aggregate(group: readonly AnomalyObservation[]): Measurement[];
  classify(measurement: Measurement): Classification | undefined;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Split a time-ordered group into tumbling windows aligned to the epoch.
 * Without a window size the whole group is one window.
 */
function windows(group: readonly AnomalyObservation[], windowMs?: number): Map<number, AnomalyObservation[]> {
  const buckets = new Map<number, AnomalyObservation[]>();
  for (const obs of group) {
    const start = windowMs && windowMs > 0 ? Math.floor(obs.timestamp / windowMs) * windowMs : group[0].timestamp;
    const bucket = buckets.get(start);
    if (bucket) bucket.push(obs);
    else buckets.set(start, [obs]);
  }
  return buckets;
}

function exceeds(threshold: number, severity: AnomalySeverity = 'High') {
  return (measurement: Measurement): Classification | undefined =>
    measurement.current > threshold ? { severity, threshold } : undefined;
}

function strategyFor(config: DetectorConfig): ModeStrategy {
  switch (config.mode) {
    case 'delta': {
      const { mediumThresholdPct, highThresholdPct } = config;
      return {
        aggregate: group =>
          group.slice(1).map((obs, i) => ({
            groupKey: obs.groupKey,
            timestamp: obs.timestamp,
            current: obs.value,
            baseline: group[i].value,
          })),
        classify: ({ current, baseline }) => {
          // No usable baseline: nothing to compare against
          if (baseline === undefined || baseline === 0) return undefined;
          const pctChange = ((current - baseline) / baseline) * 100;
          const magnitude = Math.abs(pctChange);
          if (magnitude < mediumThresholdPct) return undefined;
          return magnitude >= highThresholdPct
            ? { severity: 'High', threshold: highThresholdPct, pctChange: round2(pctChange) }
            : { severity: 'Medium', threshold: mediumThresholdPct, pctChange: round2(pctChange) };
        },
      };
    }

    case 'cardinality': {
      const { windowMs } = config;
      return {
        aggregate: group =>
          [...windows(group, windowMs)].map(([start, obs]) => ({
            groupKey: obs[0].groupKey,
            timestamp: start,
            current: new Set(obs.flatMap(o => (o.secondaryKey === undefined ? [] : [o.secondaryKey]))).size,
          })),
        classify: exceeds(config.threshold, config.severity),
      };
    }

    case 'volume': {
      const { windowMs } = config;
      return {
        aggregate: group =>
          [...windows(group, windowMs)].map(([start, obs]) => ({
            groupKey: obs[0].groupKey,
            timestamp: start,
            current: obs.reduce((sum, o) => sum + o.value, 0),
          })),
        classify: exceeds(config.threshold, config.severity),
      };
    }
  }
}

function groupByKey(series: readonly AnomalyObservation[]): Map<string, AnomalyObservation[]> {
  const groups = new Map<string, AnomalyObservation[]>();
  for (const obs of series) {
    const group = groups.get(obs.groupKey);
    if (group) group.push(obs);
    else groups.set(obs.groupKey, [obs]);
  }
  // Stable sort keeps arrival order for equal timestamps
  for (const group of groups.values()) {
    group.sort((a, b) => a.timestamp - b.timestamp);
  }
  return groups;
}

/**
 * Detect anomalies in `series` using the comparison described by `config`.
 */
export function detectAnomalies(
  series: readonly AnomalyObservation[],
  config: DetectorConfig,
  detector: string = config.mode
): Anomaly[] {
  const strategy = strategyFor(config);
  const anomalies: Anomaly[] = [];

  for (const group of groupByKey(series).values()) {
    for (const measurement of strategy.aggregate(group)) {
      const classification = strategy.classify(measurement);
      if (!classification) continue;

      anomalies.push({
        detector,
        mode: config.mode,
        groupKey: measurement.groupKey,
        timestamp: measurement.timestamp,
        current: measurement.current,
        ...(measurement.baseline !== undefined && { baseline: measurement.baseline }),
        ...(classification.pctChange !== undefined
          ? { pctChange: classification.pctChange }
          : { absoluteValue: measurement.current }),
        threshold: classification.threshold,
        severity: classification.severity,
      });
    }
  }

  return anomalies;
}

// ============================================================================
// DETECTOR RUNS AGAINST AN ASYNC METRICS BACKEND
// ============================================================================

export interface DetectorDefinition {
  name: string;
  query: MetricQuery;
  config: DetectorConfig;
  /** Falls back to the runner's source when omitted */
  source?: MetricsSource;
}

export type DetectorSkipReason = 'QueryTimeout' | 'Cancelled';

export type DetectorOutcome =
  | { name: string; mode: DetectorMode; status: 'Completed'; anomalies: Anomaly[]; observations: number }
  | { name: string; mode: DetectorMode; status: 'Skipped'; reason: DetectorSkipReason; anomalies: [] }
  | { name: string; mode: DetectorMode; status: 'Failed'; reason: string; anomalies: [] };

export interface RunDetectorsOptions extends AwaitQueryOptions {
  concurrency?: number;
  logger?: Logger;
}

/**
 * Submit every detector's query, wait for each independently and classify
 * the results. A timed-out query marks its detector as skipped; it is never
 * reported as "no anomaly". Once the signal is aborted no further query is
 * submitted.
 */
export async function runDetectors(
  defaultSource: MetricsSource | undefined,
  detectors: readonly DetectorDefinition[],
  options: RunDetectorsOptions
): Promise<DetectorOutcome[]> {
  const log = options.logger ?? defaultLogger;

  const slots = await runPool(
    detectors,
    async (detector): Promise<DetectorOutcome> => {
      const base = { name: detector.name, mode: detector.config.mode };
      const source = detector.source ?? defaultSource;
      if (!source) {
        return { ...base, status: 'Failed', reason: 'No metrics source configured', anomalies: [] };
      }

      if (options.signal?.aborted) {
        log.warn('Detector skipped: run cancelled before its query was submitted', { detector: detector.name });
        return { ...base, status: 'Skipped', reason: 'Cancelled', anomalies: [] };
      }

      try {
        const handle = await source.query(detector.query);
        const series = await awaitQueryCompletion(source, handle, options);
        const anomalies = detectAnomalies(series, detector.config, detector.name);

        log.info('Detector completed', { detector: detector.name, observations: series.length, anomalies: anomalies.length });
        return { ...base, status: 'Completed', anomalies, observations: series.length };
      } catch (err: unknown) {
        if (err instanceof QueryTimeoutError) {
          log.warn('Detector skipped: query timed out', { detector: detector.name, timeoutMs: err.timeoutMs });
          return { ...base, status: 'Skipped', reason: 'QueryTimeout', anomalies: [] };
        }
        log.error('Detector failed', err, { detector: detector.name });
        return { ...base, status: 'Failed', reason: errorMessage(err), anomalies: [] };
      }
    },
    { concurrency: options.concurrency ?? detectors.length }
  );

  return slots.flatMap(slot => (slot.status === 'done' ? [slot.value] : []));
}
