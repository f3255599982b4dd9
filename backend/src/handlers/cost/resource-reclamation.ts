/**
 * Resource Reclamation Handler
 *
 * Scheduled job that reclaims idle EC2 resources (unattached volumes, idle
 * Elastic IPs, old snapshots, underused instances), runs the cost and flow
 * log anomaly detectors, and publishes the report to SNS.
 *
 * Runs in dry-run mode unless DRY_RUN=false.
 *
 * @endpoint N/A (scheduled job)
 * @schedule Daily via EventBridge
 */

import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { CloudWatchLogsClient } from '@aws-sdk/client-cloudwatch-logs';
import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import { EC2Client } from '@aws-sdk/client-ec2';
import { SNSClient } from '@aws-sdk/client-sns';
import { CloudWatchUtilizationSource } from '../../integrations/aws/cloudwatch-utilization.js';
import { CostExplorerMetricsSource } from '../../integrations/aws/cost-explorer-source.js';
import { Ec2ReclaimActions } from '../../integrations/aws/ec2-actions.js';
import { Ec2Inventory } from '../../integrations/aws/ec2-inventory.js';
import { LogsInsightsMetricsSource } from '../../integrations/aws/logs-insights-source.js';
import { SnsNotifier } from '../../integrations/aws/sns-notifier.js';
import { logger } from '../../lib/logging.js';
import {
  ConfigurationError,
  loadEngineConfigFromEnv,
  runReclamationEngine,
  type EngineConfig,
  type EngineDependencies,
} from '../../lib/reclamation/index.js';
import { badRequest, error, success } from '../../lib/response.js';
import type { LambdaContext, LambdaResult, ScheduledEvent } from '../../types/lambda.js';

/** Stop starting new candidates this long before the Lambda deadline */
const DEADLINE_MARGIN_MS = 15_000;

// Cost Explorer is served from us-east-1 only
const COST_EXPLORER_REGION = 'us-east-1';

export type DependencyFactory = (config: EngineConfig) => EngineDependencies;

export function createAwsDependencies(config: EngineConfig): EngineDependencies {
  const region = config.region;
  const ec2 = new EC2Client({ region });
  const costExplorer = new CostExplorerMetricsSource(new CostExplorerClient({ region: COST_EXPLORER_REGION }), {
    allocationTagKey: config.policy.requiredTagKeys[0],
  });
  const actions = new Ec2ReclaimActions(ec2);

  return {
    inventory: new Ec2Inventory(ec2, {
      region,
      utilization: new CloudWatchUtilizationSource(new CloudWatchClient({ region })),
      utilizationLookbackDays: config.policy.utilization.lookbackDays,
      utilizationConcurrency: config.concurrency,
      retry: config.retry,
      logger,
    }),
    snapshots: actions,
    actions,
    costMetrics: costExplorer,
    costContext: costExplorer,
    flowLogMetrics: config.anomaly.flowLogGroup
      ? new LogsInsightsMetricsSource(new CloudWatchLogsClient({ region }), config.anomaly.flowLogGroup)
      : undefined,
    notifier: config.notification.topicArn
      ? new SnsNotifier(new SNSClient({ region }), config.notification.topicArn)
      : undefined,
    logger,
  };
}

export function createHandler(
  createDependencies: DependencyFactory,
  env: NodeJS.ProcessEnv = process.env
): (event: ScheduledEvent | Record<string, unknown>, context: LambdaContext) => Promise<LambdaResult> {
  return async (_event, context) => {
    const startTime = Date.now();

    let config: EngineConfig;
    try {
      config = loadEngineConfigFromEnv(env);
    } catch (err: unknown) {
      if (err instanceof ConfigurationError) {
        logger.error('Invalid reclamation configuration', err, { requestId: context.awsRequestId });
        return badRequest(err.message, err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
      }
      throw err;
    }

    logger.info('Resource reclamation job started', {
      requestId: context.awsRequestId,
      mode: config.mode,
      region: config.region,
    });

    const controller = new AbortController();
    const budgetMs = context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS;
    const timer = setTimeout(() => {
      logger.warn('Approaching Lambda deadline, cancelling remaining work', { requestId: context.awsRequestId });
      controller.abort();
    }, Math.max(0, budgetMs));

    try {
      const report = await runReclamationEngine(createDependencies(config), config, { signal: controller.signal });

      logger.info('Resource reclamation job completed', {
        requestId: context.awsRequestId,
        complete: report.complete,
        totalSavings: report.reclamation.totalSavings,
        anomalies: report.anomalies.length,
        durationMs: Date.now() - startTime,
      });

      return success(report);
    } catch (err: unknown) {
      logger.error('Resource reclamation job failed', err, { requestId: context.awsRequestId });
      return error('Resource reclamation failed', 500);
    } finally {
      clearTimeout(timer);
    }
  };
}

export const handler = createHandler(createAwsDependencies);
