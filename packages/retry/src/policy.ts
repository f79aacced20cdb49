import { ValidationError } from '@switchyard/errors';

import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './types.js';

/**
 * List everything wrong with a policy; empty when it is valid
 */
export function validateRetryPolicy(policy: RetryPolicy): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(policy.maxAttempts) || policy.maxAttempts < 1) {
    errors.push('maxAttempts must be an integer of at least 1');
  }
  if (!Number.isFinite(policy.baseDelayMs) || policy.baseDelayMs < 0) {
    errors.push('baseDelayMs must be a non-negative number');
  }
  if (!Number.isFinite(policy.maxBackoffMs) || policy.maxBackoffMs < 0) {
    errors.push('maxBackoffMs must be a non-negative number');
  }

  return errors;
}

/**
 * Fill in defaults, validate, and freeze a retry policy
 */
export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy: RetryPolicy = {
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxAttempts: overrides.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    maxBackoffMs: overrides.maxBackoffMs ?? DEFAULT_RETRY_POLICY.maxBackoffMs,
  };

  const errors = validateRetryPolicy(policy);
  if (errors.length > 0) {
    throw new ValidationError(`Invalid retry policy: ${errors.join(', ')}`, {
      code: 'INVALID_RETRY_POLICY',
      data: { ...policy },
    });
  }

  return Object.freeze(policy);
}
