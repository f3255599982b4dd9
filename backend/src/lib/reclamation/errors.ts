/**
 * Error taxonomy for the reclamation engine.
 *
 * Candidate-level errors never escape a batch: the executor turns them into
 * ReclamationResult / ExcludedCandidate entries. Only ConfigurationError is
 * fatal for a whole run.
 */

import type { ZodIssue } from 'zod';
import type { ResourceKind } from './types.js';

export type ReclamationErrorCode =
  | 'TRANSIENT_API_ERROR'
  | 'RETRY_EXHAUSTED'
  | 'SAFETY_PRECHECK_FAILED'
  | 'RESOURCE_NOT_FOUND'
  | 'MISSING_ATTRIBUTE'
  | 'POLICY_VIOLATION'
  | 'QUERY_TIMEOUT'
  | 'CONFIGURATION_ERROR'
  | 'INVENTORY_LIST_ERROR';

export class ReclamationError extends Error {
  constructor(
    message: string,
    public readonly code: ReclamationErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReclamationError';
  }
}

/**
 * Throttling, timeouts and 5xx from an upstream API. Retried with backoff.
 */
export class TransientApiError extends ReclamationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSIENT_API_ERROR', options);
    this.name = 'TransientApiError';
  }
}

export function isTransient(error: unknown): boolean {
  return error instanceof TransientApiError;
}

export class RetryExhaustedError extends ReclamationError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    const lastMessage = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Gave up after ${attempts} attempts: ${lastMessage}`, 'RETRY_EXHAUSTED', { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

export class SafetyPrecheckFailedError extends ReclamationError {
  constructor(
    public readonly candidateId: string,
    message: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`Safety precheck failed for ${candidateId}: ${message}`, 'SAFETY_PRECHECK_FAILED', options);
    this.name = 'SafetyPrecheckFailedError';
  }
}

/**
 * The resource disappeared between inventory and the guarded action.
 */
export class ResourceNotFoundError extends ReclamationError {
  constructor(
    public readonly candidateId: string,
    public readonly attempts = 1,
    options?: { cause?: unknown }
  ) {
    super(`Resource ${candidateId} no longer exists`, 'RESOURCE_NOT_FOUND', options);
    this.name = 'ResourceNotFoundError';
  }
}

export class MissingAttributeError extends ReclamationError {
  constructor(
    public readonly candidateId: string,
    public readonly attribute: string
  ) {
    super(`Candidate ${candidateId} is missing ${attribute}`, 'MISSING_ATTRIBUTE');
    this.name = 'MissingAttributeError';
  }
}

export class PolicyViolationError extends ReclamationError {
  constructor(
    public readonly candidateId: string,
    message: string
  ) {
    super(`Candidate ${candidateId} violates policy: ${message}`, 'POLICY_VIOLATION');
    this.name = 'PolicyViolationError';
  }
}

export class QueryTimeoutError extends ReclamationError {
  constructor(
    public readonly queryId: string,
    public readonly timeoutMs: number
  ) {
    super(`Query ${queryId} did not complete within ${timeoutMs}ms`, 'QUERY_TIMEOUT');
    this.name = 'QueryTimeoutError';
  }
}

export class ConfigurationError extends ReclamationError {
  constructor(
    message: string,
    public readonly issues: ZodIssue[] = []
  ) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class InventoryListError extends ReclamationError {
  constructor(
    public readonly kind: ResourceKind,
    options?: { cause?: unknown }
  ) {
    const causeMessage = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to list ${kind} resources${causeMessage}`, 'INVENTORY_LIST_ERROR', options);
    this.name = 'InventoryListError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
