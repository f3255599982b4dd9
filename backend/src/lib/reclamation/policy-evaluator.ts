/**
 * Policy Evaluator
 *
 * Classifies a candidate against the configured thresholds. Pure: the same
 * (candidate, policy) pair always yields the same Decision, and nothing here
 * reads a clock.
 */

import { MissingAttributeError, PolicyViolationError } from './errors.js';
import type {
  Decision,
  Policy,
  ReclaimCandidate,
  UtilizationClass,
  UtilizationSample,
  UtilizationThresholds,
} from './types.js';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function assertNonNegative(candidate: ReclaimCandidate, field: 'ageDays' | 'sizeOrCapacity'): void {
  const value = candidate[field];
  if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
    throw new PolicyViolationError(candidate.id, `${field} must be a non-negative number, got ${value}`);
  }
}

export function monthlyCost(size: number, ratePerUnit: number): number {
  return round2(size * ratePerUnit);
}

/**
 * Low: both average and p95 sit under their low thresholds (downsize).
 * High: either one goes over its high threshold (upsize).
 */
export function classifyUtilization(
  sample: UtilizationSample,
  thresholds: UtilizationThresholds
): UtilizationClass | undefined {
  if (sample.average < thresholds.lowAveragePercent && sample.p95 < thresholds.lowP95Percent) {
    return 'Low';
  }
  if (sample.average > thresholds.highAveragePercent || sample.p95 > thresholds.highP95Percent) {
    return 'High';
  }
  return undefined;
}

/**
 * Classify a pre-aggregated utilization sample. Eligible means the resource
 * sits outside the configured band in either direction.
 */
export function evaluateUtilization(
  sample: UtilizationSample,
  thresholds: UtilizationThresholds,
  ratePerUnit = 0,
  size = 0
): Decision {
  if (sample.datapoints < 1) {
    return { status: 'NotEligible', reason: 'InsufficientData' };
  }

  const utilization = classifyUtilization(sample, thresholds);
  if (!utilization) {
    return { status: 'NotEligible', reason: 'WithinUtilizationBand' };
  }

  return {
    status: 'Eligible',
    estimatedMonthlyCost: monthlyCost(size, ratePerUnit),
    utilization,
  };
}

/**
 * Decide whether a discovered candidate should be reclaimed.
 *
 * @throws MissingAttributeError when an attribute the kind needs is absent
 * @throws PolicyViolationError when an attribute is present but nonsensical
 */
export function evaluateCandidate(candidate: ReclaimCandidate, policy: Policy): Decision {
  if (policy.protectedTagKeys.some(key => Object.hasOwn(candidate.tags, key))) {
    return { status: 'NotEligible', reason: 'Protected' };
  }

  assertNonNegative(candidate, 'ageDays');
  assertNonNegative(candidate, 'sizeOrCapacity');

  const kindPolicy = policy.kinds[candidate.kind];

  if (candidate.sizeOrCapacity === undefined) {
    throw new MissingAttributeError(candidate.id, 'sizeOrCapacity');
  }

  if (candidate.kind === 'Instance') {
    if (!candidate.utilization) {
      throw new MissingAttributeError(candidate.id, 'utilization');
    }
    const decision = evaluateUtilization(
      candidate.utilization,
      policy.utilization,
      kindPolicy.ratePerUnit,
      candidate.sizeOrCapacity
    );
    // Over-provisioned instances are reclaimable, under-provisioned ones only get a recommendation
    if (decision.status === 'Eligible' && decision.utilization === 'High') {
      return { status: 'NotEligible', reason: 'UnderProvisioned' };
    }
    return decision;
  }

  if (kindPolicy.minAgeDays > 0) {
    if (candidate.ageDays === undefined) {
      throw new MissingAttributeError(candidate.id, 'ageDays');
    }
    if (candidate.ageDays < kindPolicy.minAgeDays) {
      return { status: 'NotEligible', reason: 'BelowAgeThreshold' };
    }
  }

  return {
    status: 'Eligible',
    estimatedMonthlyCost: monthlyCost(candidate.sizeOrCapacity, kindPolicy.ratePerUnit),
  };
}

/**
 * Candidate tags missing from the policy's required set.
 */
export function missingRequiredTags(candidate: ReclaimCandidate, policy: Policy): string[] {
  return policy.requiredTagKeys.filter(key => !Object.hasOwn(candidate.tags, key));
}

export class PolicyEvaluator {
  constructor(public readonly policy: Policy) {}

  evaluate(candidate: ReclaimCandidate): Decision {
    return evaluateCandidate(candidate, this.policy);
  }

  evaluateUtilization(sample: UtilizationSample, size?: number): Decision {
    return evaluateUtilization(sample, this.policy.utilization, this.policy.kinds.Instance.ratePerUnit, size);
  }
}
