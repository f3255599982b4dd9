/**
 * Minimal Lambda runtime types for scheduled handlers.
 */

/** EventBridge scheduled event */
export interface ScheduledEvent {
  'detail-type': string;
  source: string;
  time: string;
  region: string;
  resources: string[];
  detail: Record<string, unknown>;
}

export interface LambdaResult {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
}

export interface LambdaContext {
  functionName: string;
  functionVersion: string;
  invokedFunctionArn: string;
  memoryLimitInMB: string;
  awsRequestId: string;
  logGroupName: string;
  logStreamName: string;
  getRemainingTimeInMillis(): number;
}

export type LambdaHandler<TEvent = ScheduledEvent, TResult = LambdaResult> = (
  event: TEvent,
  context: LambdaContext
) => Promise<TResult>;
