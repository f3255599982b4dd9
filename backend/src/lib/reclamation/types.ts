/**
 * Shared types for the reclamation and anomaly detection engine.
 */

// ============================================================================
// CANDIDATES & POLICY
// ============================================================================

export const RESOURCE_KINDS = ['Volume', 'ElasticIP', 'Snapshot', 'Instance'] as const;

export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export interface UtilizationSample {
  /** Mean of the metric over the lookback window (percent) */
  average: number;
  /** 95th percentile over the same window (percent) */
  p95: number;
  datapoints: number;
  lookbackDays: number;
}

export interface ReclaimCandidate {
  readonly id: string;
  readonly kind: ResourceKind;
  readonly region?: string;
  /** Whole days since creation, computed at discovery time */
  readonly ageDays?: number;
  /** GB for volumes and snapshots, 1 for addresses, vCPUs for instances */
  readonly sizeOrCapacity?: number;
  /** EC2 instance type, e.g. `m5.large` (instances only) */
  readonly instanceType?: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly utilization?: UtilizationSample;
}

export interface KindPolicy {
  minAgeDays: number;
  ratePerUnit: number;
  requiresSafetySnapshot: boolean;
}

export interface UtilizationThresholds {
  lookbackDays: number;
  lowAveragePercent: number;
  lowP95Percent: number;
  highAveragePercent: number;
  highP95Percent: number;
}

export interface Policy {
  readonly kinds: Readonly<Record<ResourceKind, KindPolicy>>;
  readonly utilization: UtilizationThresholds;
  /** Any of these tag keys makes a candidate untouchable */
  readonly protectedTagKeys: readonly string[];
  /** Tag keys every resource is expected to carry for cost allocation */
  readonly requiredTagKeys: readonly string[];
}

// ============================================================================
// DECISIONS
// ============================================================================

export type UtilizationClass = 'Low' | 'High';

export type NotEligibleReason =
  | 'BelowAgeThreshold'
  | 'WithinUtilizationBand'
  | 'UnderProvisioned'
  | 'InsufficientData'
  | 'Protected';

export type Decision =
  | { status: 'Eligible'; estimatedMonthlyCost: number; utilization?: UtilizationClass }
  | { status: 'NotEligible'; reason: NotEligibleReason };

// ============================================================================
// EXECUTION
// ============================================================================

export type ExecutionMode = 'DryRun' | 'Live';

export type SafetyState = 'Discovered' | 'SafetyChecked' | 'SafetyCheckFailed' | 'Deleted' | 'Simulated' | 'Failed';

export type ReclamationOutcome = 'Reclaimed' | 'SimulatedDryRun' | 'Failed' | 'AlreadyGone';

export type FailureReason = 'SafetyPrecheckFailed' | 'RetriesExhausted' | 'ActionFailed';

interface ResultBase {
  candidateId: string;
  kind: ResourceKind;
  lifecycle: SafetyState[];
  attempts: number;
}

export type ReclamationResult =
  | (ResultBase & { outcome: 'Reclaimed'; savings: number; safetySnapshotId?: string })
  | (ResultBase & { outcome: 'SimulatedDryRun'; savings: number })
  | (ResultBase & { outcome: 'Failed'; savings: 0; reason: FailureReason; message: string; safetySnapshotId?: string })
  | (ResultBase & { outcome: 'AlreadyGone'; savings: 0; safetySnapshotId?: string });

export type ExclusionReason = 'MissingAttribute' | 'PolicyViolation';

export interface ExcludedCandidate {
  candidateId: string;
  kind: ResourceKind;
  reason: ExclusionReason;
  detail: string;
}

export interface NotEligibleCandidate {
  candidateId: string;
  kind: ResourceKind;
  reason: NotEligibleReason;
}

export interface ReclamationBatchResult {
  mode: ExecutionMode;
  results: ReclamationResult[];
  excluded: ExcludedCandidate[];
  notEligible: NotEligibleCandidate[];
  /** Candidates never started because the run was cancelled */
  skipped: string[];
  cancelled: boolean;
  counts: Record<ReclamationOutcome, number>;
  totalSavings: number;
}

// ============================================================================
// ANOMALIES
// ============================================================================

export interface AnomalyObservation {
  timestamp: number;
  groupKey: string;
  value: number;
  /** Second dimension for cardinality counting (e.g. destination port) */
  secondaryKey?: string;
}

export type AnomalySeverity = 'Medium' | 'High';

export type DetectorMode = 'delta' | 'cardinality' | 'volume';

export type DetectorConfig =
  | { mode: 'delta'; mediumThresholdPct: number; highThresholdPct: number }
  | { mode: 'cardinality'; threshold: number; windowMs?: number; severity?: AnomalySeverity }
  | { mode: 'volume'; threshold: number; windowMs?: number; severity?: AnomalySeverity };

export interface Anomaly {
  detector: string;
  mode: DetectorMode;
  groupKey: string;
  /** Epoch millis of the observation (delta) or window start (threshold modes) */
  timestamp: number;
  current: number;
  baseline?: number;
  pctChange?: number;
  absoluteValue?: number;
  threshold: number;
  severity: AnomalySeverity;
}

// ============================================================================
// EXTERNAL COLLABORATORS
// ============================================================================

export interface InventoryFilter {
  region?: string;
  /** Reference instant used to compute candidate ages */
  now: Date;
}

export interface Inventory {
  list(kind: ResourceKind, filter: InventoryFilter): Promise<ReclaimCandidate[]>;
}

export interface SafetySnapshotService {
  /**
   * Resolves with the id of a completed snapshot. Rejects with
   * ResourceNotFoundError when the resource no longer exists.
   */
  create(candidate: ReclaimCandidate): Promise<string>;
}

export type DeleteOutcome = 'Deleted' | 'NotFound';

export interface DestructiveActionService {
  delete(candidate: ReclaimCandidate): Promise<DeleteOutcome>;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface MetricQuery {
  metric: string;
  window: TimeWindow;
  groupBy: string[];
}

export interface QueryHandle {
  id: string;
}

export type PollResult =
  | { status: 'Pending' }
  | { status: 'Complete'; series: AnomalyObservation[] }
  | { status: 'Failed'; message: string };

export interface MetricsSource {
  query(query: MetricQuery): Promise<QueryHandle>;
  poll(handle: QueryHandle): Promise<PollResult>;
}

export type NotificationSeverity = 'Info' | 'Medium' | 'High';

export interface Notifier {
  send(severity: NotificationSeverity, subject: string, body: string): Promise<void>;
}

export interface CostContext {
  totalCost: number;
  untaggedCost: number;
}

export interface CostContextSource {
  getCostContext(window: TimeWindow): Promise<CostContext>;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};
