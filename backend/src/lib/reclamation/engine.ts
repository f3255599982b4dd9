/**
 * Run orchestrator: inventory -> batch -> detectors -> report -> notify.
 */

import { executeParallel } from '../execution/index.js';
import { logger as defaultLogger, type Logger } from '../logging.js';
import { runDetectors, type DetectorDefinition } from './anomaly-detector.js';
import { parseEngineConfig, type EngineConfig, type EngineConfigInput } from './config.js';
import { errorMessage, InventoryListError } from './errors.js';
import { ReclamationExecutor } from './executor.js';
import { adjacentInstanceType } from './instance-sizing.js';
import { classifyUtilization, missingRequiredTags, monthlyCost } from './policy-evaluator.js';
import {
  mergeReport,
  type Report,
  type RightsizingRecommendation,
  type UntaggedResource,
} from './report-aggregator.js';
import { SafetyGuard } from './safety-guard.js';
import {
  systemClock,
  type Clock,
  type CostContext,
  type CostContextSource,
  type DestructiveActionService,
  type Inventory,
  type MetricsSource,
  type NotificationSeverity,
  type Notifier,
  type Policy,
  type ReclaimCandidate,
  type SafetySnapshotService,
  type TimeWindow,
} from './types.js';

export interface EngineDependencies {
  inventory: Inventory;
  snapshots: SafetySnapshotService;
  actions: DestructiveActionService;
  /** Daily cost series for the cost delta detector */
  costMetrics?: MetricsSource;
  /** Flow-log queries for the port scan and exfiltration detectors */
  flowLogMetrics?: MetricsSource;
  costContext?: CostContextSource;
  notifier?: Notifier;
  clock?: Clock;
  logger?: Logger;
}

export interface EngineRunOptions {
  signal?: AbortSignal;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
/** Average CPU below which a downsize is high priority */
const IDLE_CPU_PERCENT = 5;

export function buildDetectors(
  config: EngineConfig,
  deps: Pick<EngineDependencies, 'costMetrics' | 'flowLogMetrics'>,
  now: Date
): DetectorDefinition[] {
  const { anomaly } = config;
  const detectors: DetectorDefinition[] = [];

  if (deps.costMetrics) {
    detectors.push({
      name: 'cost-delta',
      config: anomaly.costDelta,
      source: deps.costMetrics,
      query: {
        metric: 'UnblendedCost',
        window: { start: new Date(now.getTime() - anomaly.costLookbackDays * DAY_MS), end: now },
        groupBy: ['SERVICE'],
      },
    });
  }

  if (deps.flowLogMetrics) {
    const window: TimeWindow = { start: new Date(now.getTime() - anomaly.flowLogLookbackHours * HOUR_MS), end: now };
    detectors.push(
      {
        name: 'port-scan',
        config: anomaly.portScan,
        source: deps.flowLogMetrics,
        query: { metric: 'portScan', window, groupBy: ['srcAddr', 'dstPort'] },
      },
      {
        name: 'exfiltration',
        config: anomaly.exfiltration,
        source: deps.flowLogMetrics,
        query: { metric: 'bytesOut', window, groupBy: ['srcAddr'] },
      },
      {
        name: 'denied-traffic',
        config: anomaly.deniedTraffic,
        source: deps.flowLogMetrics,
        query: { metric: 'deniedTraffic', window, groupBy: ['dstAddr', 'dstPort'] },
      }
    );
  }

  return detectors;
}

export function recommendRightsizing(
  candidates: readonly ReclaimCandidate[],
  policy: Policy
): RightsizingRecommendation[] {
  const recommendations: RightsizingRecommendation[] = [];
  for (const candidate of candidates) {
    const sample = candidate.utilization;
    if (candidate.kind !== 'Instance' || !sample || sample.datapoints < 1) continue;

    const utilization = classifyUtilization(sample, policy.utilization);
    if (!utilization) continue;

    const direction = utilization === 'Low' ? 'Downsize' : 'Upsize';
    recommendations.push({
      candidateId: candidate.id,
      direction,
      currentType: candidate.instanceType,
      suggestedType: candidate.instanceType ? adjacentInstanceType(candidate.instanceType, direction) : undefined,
      priority: direction === 'Upsize' || sample.average < IDLE_CPU_PERCENT ? 'High' : 'Medium',
      averagePercent: sample.average,
      p95Percent: sample.p95,
      estimatedMonthlyCost: monthlyCost(candidate.sizeOrCapacity ?? 0, policy.kinds.Instance.ratePerUnit),
    });
  }
  return recommendations;
}

export function findUntaggedResources(
  candidates: readonly ReclaimCandidate[],
  policy: Policy
): UntaggedResource[] {
  return candidates.flatMap(candidate => {
    const missingTags = missingRequiredTags(candidate, policy);
    return missingTags.length > 0 ? [{ candidateId: candidate.id, kind: candidate.kind, missingTags }] : [];
  });
}

function notificationSeverity(report: Report): NotificationSeverity {
  if (report.anomalies.some(a => a.severity === 'High') || report.reclamation.counts.Failed > 0) {
    return 'High';
  }
  return report.anomalies.length > 0 ? 'Medium' : 'Info';
}

/**
 * Run one full reclamation and detection pass.
 *
 * @throws ConfigurationError before any collaborator is called
 */
export async function runReclamationEngine(
  deps: EngineDependencies,
  rawConfig: EngineConfigInput,
  options: EngineRunOptions = {}
): Promise<Report> {
  const config = parseEngineConfig(rawConfig);
  const log = deps.logger ?? defaultLogger;
  const clock = deps.clock ?? systemClock;
  const now = new Date(clock.now());
  const incompleteReasons: string[] = [];

  log.info('Reclamation run started', { mode: config.mode, kinds: config.kinds, region: config.region });

  // 1. Inventory
  const listing = await executeParallel(
    config.kinds.map(kind => ({
      name: kind,
      execute: () => deps.inventory.list(kind, { region: config.region, now }),
    })),
    { maxConcurrency: config.kinds.length }
  );
  const candidates: ReclaimCandidate[] = [];
  listing.taskResults.forEach((result, index) => {
    if (result.success) {
      candidates.push(...result.value);
      return;
    }
    const error = new InventoryListError(config.kinds[index], { cause: result.error });
    log.error('Inventory listing failed', error, { kind: config.kinds[index] });
    incompleteReasons.push(error.message);
  });

  // 2. Batch
  const guard = new SafetyGuard({
    snapshots: deps.snapshots,
    actions: deps.actions,
    kinds: config.policy.kinds,
    retry: config.retry,
    clock,
    logger: log,
  });
  const executor = new ReclamationExecutor({ guard, concurrency: config.concurrency, logger: log });
  const batch = await executor.runBatch(candidates, config.policy, config.mode, { signal: options.signal });

  const rightsizing = recommendRightsizing(candidates, config.policy);
  const untaggedResources = findUntaggedResources(candidates, config.policy);

  // 3. Detectors and cost context
  const detectors = await runDetectors(undefined, buildDetectors(config, deps, now), {
    ...config.query,
    clock,
    signal: options.signal,
    logger: log,
  });

  let costContext: CostContext | undefined;
  if (deps.costContext) {
    try {
      costContext = await deps.costContext.getCostContext({
        start: new Date(now.getTime() - config.anomaly.costLookbackDays * DAY_MS),
        end: now,
      });
    } catch (err: unknown) {
      log.error('Cost context unavailable', err);
      incompleteReasons.push(`cost context unavailable: ${errorMessage(err)}`);
    }
  }

  // 4. Report and notification
  const report = mergeReport({
    batch,
    detectors,
    costContext,
    rightsizing,
    untaggedResources,
    incompleteReasons,
    generatedAt: now,
  });

  log.audit('reclamation.run', {
    mode: report.mode,
    complete: report.complete,
    totalSavings: report.reclamation.totalSavings,
    anomalies: report.anomalies.length,
  });

  if (deps.notifier) {
    const severity = notificationSeverity(report);
    const subject = `Resource reclamation ${report.mode}: $${report.reclamation.totalSavings.toFixed(2)}/month, ${report.anomalies.length} anomalies`;
    try {
      await deps.notifier.send(severity, subject, JSON.stringify(report, null, 2));
    } catch (err: unknown) {
      log.error('Failed to send report notification', err, { severity });
    }
  }

  return report;
}
