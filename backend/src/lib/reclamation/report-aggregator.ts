/**
 * Report Aggregator
 *
 * Assembles the batch result and detector outcomes into one immutable report
 * and computes the derived ratios. Savings are taken from the batch as-is.
 */

import type { DetectorOutcome } from './anomaly-detector.js';
import type {
  Anomaly,
  CostContext,
  DetectorMode,
  ExcludedCandidate,
  ExecutionMode,
  FailureReason,
  ReclamationBatchResult,
  ReclamationOutcome,
  ReclamationResult,
  ResourceKind,
} from './types.js';

export type RightsizingPriority = 'High' | 'Medium';

export interface RightsizingRecommendation {
  candidateId: string;
  direction: 'Downsize' | 'Upsize';
  currentType?: string;
  /** Next size down or up in the same family, when there is one */
  suggestedType?: string;
  priority: RightsizingPriority;
  averagePercent: number;
  p95Percent: number;
  /** Current monthly cost of the instance at the policy rate */
  estimatedMonthlyCost: number;
}

export interface UntaggedResource {
  candidateId: string;
  kind: ResourceKind;
  missingTags: string[];
}

export interface ReportFailure {
  candidateId: string;
  kind: ResourceKind;
  reason: FailureReason;
  message: string;
}

export interface DetectorSummary {
  name: string;
  mode: DetectorMode;
  status: DetectorOutcome['status'];
  anomalyCount: number;
  reason?: string;
}

export interface Report {
  readonly generatedAt: string;
  readonly mode: ExecutionMode;
  /** False whenever any part of the run was skipped, cancelled or failed to list */
  readonly complete: boolean;
  readonly incompleteReasons: readonly string[];
  readonly reclamation: {
    readonly counts: Readonly<Record<ReclamationOutcome, number>>;
    readonly totalSavings: number;
    readonly annualSavings: number;
    readonly results: readonly ReclamationResult[];
    readonly failures: readonly ReportFailure[];
    readonly excluded: readonly ExcludedCandidate[];
    readonly skipped: readonly string[];
  };
  readonly anomalies: readonly Anomaly[];
  readonly detectors: readonly DetectorSummary[];
  readonly skippedDetectors: readonly string[];
  readonly rightsizing: readonly RightsizingRecommendation[];
  readonly untaggedResources: readonly UntaggedResource[];
  readonly metrics: {
    readonly totalCost: number;
    readonly untaggedCost: number;
    readonly untaggedPercentage: number;
    /** Monthly savings as a share of total cost */
    readonly savingsPercentage: number;
    /** Failed results over all attempted results */
    readonly failureRate: number;
  };
}

export interface MergeReportInput {
  batch: ReclamationBatchResult;
  detectors?: readonly DetectorOutcome[];
  costContext?: CostContext;
  rightsizing?: readonly RightsizingRecommendation[];
  untaggedResources?: readonly UntaggedResource[];
  incompleteReasons?: readonly string[];
  generatedAt: Date;
}

/**
 * numerator / denominator as a percentage rounded to 2 decimals; 0 whenever
 * the ratio would not be a finite number.
 */
export function safePercentage(numerator: number, denominator: number): number {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return 0;
  }
  const pct = (numerator / denominator) * 100;
  return Number.isFinite(pct) ? Math.round(pct * 100) / 100 : 0;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function mergeReport(input: MergeReportInput): Report {
  // Cloned so freezing the report never reaches the caller's objects
  const batch = structuredClone(input.batch);
  const detectors = structuredClone(input.detectors ?? []);
  const totalCost = input.costContext?.totalCost ?? 0;
  const untaggedCost = input.costContext?.untaggedCost ?? 0;

  const failures: ReportFailure[] = batch.results.flatMap(result =>
    result.outcome === 'Failed'
      ? [{ candidateId: result.candidateId, kind: result.kind, reason: result.reason, message: result.message }]
      : []
  );

  const incompleteReasons = [...(input.incompleteReasons ?? [])];
  if (batch.cancelled) {
    incompleteReasons.push(`cancelled: ${batch.skipped.length} candidate(s) not processed`);
  }
  const skippedDetectors = detectors.filter(d => d.status === 'Skipped').map(d => d.name);
  for (const detector of detectors) {
    if (detector.status === 'Skipped') {
      const why = detector.reason === 'Cancelled' ? 'run cancelled' : 'query timed out';
      incompleteReasons.push(`detector ${detector.name} skipped: ${why}`);
    } else if (detector.status === 'Failed') {
      incompleteReasons.push(`detector ${detector.name} failed: ${detector.reason}`);
    }
  }

  const report: Report = {
    generatedAt: input.generatedAt.toISOString(),
    mode: batch.mode,
    complete: incompleteReasons.length === 0,
    incompleteReasons,
    reclamation: {
      counts: batch.counts,
      totalSavings: batch.totalSavings,
      annualSavings: Math.round(batch.totalSavings * 12 * 100) / 100,
      results: batch.results,
      failures,
      excluded: batch.excluded,
      skipped: batch.skipped,
    },
    anomalies: detectors.flatMap(d => d.anomalies),
    detectors: detectors.map(d => ({
      name: d.name,
      mode: d.mode,
      status: d.status,
      anomalyCount: d.anomalies.length,
      ...(d.status !== 'Completed' && { reason: d.reason }),
    })),
    skippedDetectors,
    rightsizing: structuredClone(input.rightsizing ?? []),
    untaggedResources: structuredClone(input.untaggedResources ?? []),
    metrics: {
      totalCost,
      untaggedCost,
      untaggedPercentage: safePercentage(untaggedCost, totalCost),
      savingsPercentage: safePercentage(batch.totalSavings, totalCost),
      failureRate: safePercentage(batch.counts.Failed, batch.results.length),
    },
  };

  return deepFreeze(report);
}
