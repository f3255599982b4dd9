/**
 * Classification of AWS SDK v3 service errors for the reclamation engine.
 */

import { TransientApiError } from '../../lib/reclamation/errors.js';

const THROTTLING_ERROR_NAMES = new Set([
  'Throttling',
  'ThrottlingException',
  'ThrottledException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'TooManyRequestsException',
  'ProvisionedThroughputExceededException',
  'SlowDown',
  'LimitExceededException',
]);

function httpStatusCode(error: Error): number | undefined {
  if (!('$metadata' in error) || typeof error.$metadata !== 'object' || error.$metadata === null) {
    return undefined;
  }
  const metadata = error.$metadata;
  return 'httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number'
    ? metadata.httpStatusCode
    : undefined;
}

/**
 * EC2 reports a missing resource as `Invalid<Type>.NotFound`
 * (e.g. InvalidVolume.NotFound, InvalidAllocationID.NotFound).
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && (error.name.endsWith('.NotFound') || error.name === 'ResourceNotFoundException');
}

export function isTransientAwsError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (THROTTLING_ERROR_NAMES.has(error.name)) return true;
  if ('$retryable' in error && error.$retryable) return true;
  const status = httpStatusCode(error);
  return status !== undefined && (status >= 500 || status === 429);
}

/**
 * Wrap transient failures so the retry layer picks them up; everything else
 * passes through unchanged.
 */
export function classifyAwsError(error: unknown, operation: string): unknown {
  if (isTransientAwsError(error)) {
    const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return new TransientApiError(`${operation} failed transiently (${message})`, { cause: error });
  }
  return error;
}
