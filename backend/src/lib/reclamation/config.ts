/**
 * Engine configuration: zod schemas, defaults, and the environment mapping
 * used by the scheduled handler.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';

// ============================================================================
// SCHEMAS
// ============================================================================

const nonNegative = z.number().finite().nonnegative();
const percent = z.number().finite().min(0).max(100);

const kindPolicySchema = z.object({
  minAgeDays: nonNegative,
  ratePerUnit: nonNegative,
  requiresSafetySnapshot: z.boolean(),
});

export const policySchema = z.object({
  kinds: z.object({
    // gp3: $0.08/GB-month, 7 days unattached before delete
    Volume: kindPolicySchema.default({ minAgeDays: 7, ratePerUnit: 0.08, requiresSafetySnapshot: true }),
    // $0.005/hour idle address
    ElasticIP: kindPolicySchema.default({ minAgeDays: 0, ratePerUnit: 3.6, requiresSafetySnapshot: false }),
    // $0.05/GB-month, 90 days
    Snapshot: kindPolicySchema.default({ minAgeDays: 90, ratePerUnit: 0.05, requiresSafetySnapshot: false }),
    // per vCPU-month, reclaimed by stopping
    Instance: kindPolicySchema.default({ minAgeDays: 0, ratePerUnit: 30.37, requiresSafetySnapshot: false }),
  }).default({}),
  utilization: z
    .object({
      lookbackDays: z.number().int().min(1).max(63).default(14),
      lowAveragePercent: percent.default(10),
      lowP95Percent: percent.default(20),
      highAveragePercent: percent.default(80),
      highP95Percent: percent.default(90),
    })
    .default({})
    .refine(u => u.lowAveragePercent < u.highAveragePercent, {
      message: 'lowAveragePercent must be below highAveragePercent',
    })
    .refine(u => u.lowP95Percent < u.highP95Percent, {
      message: 'lowP95Percent must be below highP95Percent',
    }),
  protectedTagKeys: z.array(z.string().min(1)).default(['DoNotDelete']),
  requiredTagKeys: z.array(z.string().min(1)).default(['Environment', 'CostCenter', 'Owner', 'Project']),
});

const severitySchema = z.enum(['Medium', 'High']);

export const detectorConfigSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('delta'),
    mediumThresholdPct: nonNegative,
    highThresholdPct: nonNegative,
  }),
  z.object({
    mode: z.literal('cardinality'),
    threshold: nonNegative,
    windowMs: z.number().int().positive().optional(),
    severity: severitySchema.optional(),
  }),
  z.object({
    mode: z.literal('volume'),
    threshold: nonNegative,
    windowMs: z.number().int().positive().optional(),
    severity: severitySchema.optional(),
  }),
]);

export const anomalyConfigSchema = z
  .object({
    costDelta: detectorConfigSchema.default({ mode: 'delta', mediumThresholdPct: 20, highThresholdPct: 50 }),
    portScan: detectorConfigSchema.default({ mode: 'cardinality', threshold: 20, windowMs: 3_600_000 }),
    // 10 GB outbound per source
    exfiltration: detectorConfigSchema.default({ mode: 'volume', threshold: 10 * 1024 ** 3 }),
    // Rejected connections per destination endpoint over the lookback
    deniedTraffic: detectorConfigSchema.default({ mode: 'volume', threshold: 10_000, severity: 'Medium' }),
    costLookbackDays: z.number().int().min(2).max(365).default(30),
    flowLogLookbackHours: z.number().int().min(1).max(168).default(24),
    flowLogGroup: z.string().min(1).optional(),
  })
  .default({})
  .superRefine((cfg, ctx) => {
    for (const key of ['costDelta', 'portScan', 'exfiltration', 'deniedTraffic'] as const) {
      const detector = cfg[key];
      if (detector.mode === 'delta' && detector.mediumThresholdPct > detector.highThresholdPct) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key, 'mediumThresholdPct'],
          message: 'mediumThresholdPct must not exceed highThresholdPct',
        });
      }
    }
  });

export const retryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(4),
    baseDelayMs: z.number().int().nonnegative().default(500),
    maxDelayMs: z.number().int().positive().default(20000),
    jitterFactor: z.number().min(0).max(1).default(0.2),
  })
  .default({});

export const engineConfigSchema = z.object({
  mode: z.enum(['DryRun', 'Live']).default('DryRun'),
  region: z.string().min(1).optional(),
  kinds: z
    .array(z.enum(['Volume', 'ElasticIP', 'Snapshot', 'Instance']))
    .min(1)
    .refine(kinds => new Set(kinds).size === kinds.length, { message: 'kinds must not list a kind twice' })
    .default(['Volume', 'ElasticIP', 'Snapshot', 'Instance']),
  policy: policySchema.default({}),
  anomaly: anomalyConfigSchema,
  concurrency: z.number().int().min(1).max(64).default(5),
  retry: retryConfigSchema,
  query: z
    .object({
      pollIntervalMs: z.number().int().positive().default(1000),
      timeoutMs: z.number().int().positive().default(60000),
    })
    .default({}),
  notification: z
    .object({
      topicArn: z.string().min(1).optional(),
    })
    .default({}),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

// ============================================================================
// PARSING
// ============================================================================

/**
 * Validate raw configuration and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const parsed = engineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid engine configuration: ${details.join('; ')}`, parsed.error.issues);
  }
  return parsed.data;
}

function envNumber(value: string | undefined): number | string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const num = Number(value);
  // Leave unparsable values as strings so the schema reports them
  return Number.isNaN(num) ? value : num;
}

function envList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, v]) => v !== undefined));
}

/**
 * Map environment variables onto the configuration schema. Live mode must be
 * requested explicitly with DRY_RUN=false.
 */
export function loadEngineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const dryRun = (env.DRY_RUN ?? 'true').toLowerCase() !== 'false';
  const defaults = policySchema.parse({});

  const volumeMinAge = envNumber(env.MIN_DAYS_BEFORE_DELETE);
  const snapshotMinAge = envNumber(env.SNAPSHOT_MIN_AGE_DAYS);

  const raw = {
    mode: dryRun ? 'DryRun' : 'Live',
    region: env.AWS_REGION,
    kinds: envList(env.RECLAIM_KINDS),
    policy: compact({
      kinds: {
        ...defaults.kinds,
        Volume: { ...defaults.kinds.Volume, ...compact({ minAgeDays: volumeMinAge }) },
        Snapshot: { ...defaults.kinds.Snapshot, ...compact({ minAgeDays: snapshotMinAge }) },
      },
      protectedTagKeys: envList(env.PROTECTED_TAG_KEYS),
      requiredTagKeys: envList(env.REQUIRED_TAG_KEYS),
    }),
    anomaly: compact({
      flowLogGroup: env.FLOW_LOG_GROUP,
    }),
    concurrency: envNumber(env.RECLAIM_CONCURRENCY),
    retry: compact({
      maxAttempts: envNumber(env.RETRY_MAX_ATTEMPTS),
      baseDelayMs: envNumber(env.RETRY_BASE_DELAY_MS),
    }),
    query: compact({
      pollIntervalMs: envNumber(env.QUERY_POLL_INTERVAL_MS),
      timeoutMs: envNumber(env.QUERY_TIMEOUT_MS),
    }),
    notification: compact({ topicArn: env.SNS_TOPIC_ARN }),
  };

  return parseEngineConfig(compact(raw));
}
