/**
 * Retry policy and attempt outcome types
 */

import type { FailureOrigin } from '@switchyard/errors';

/**
 * Retry parameters, fixed for the lifetime of an executor
 */
export interface RetryPolicy {
  /** Delay before the first retry; doubled for every further retry */
  readonly baseDelayMs: number;
  /** Total attempts per logical call, first one included (>= 1) */
  readonly maxAttempts: number;
  /** Upper bound for a single backoff wait */
  readonly maxBackoffMs: number;
}

/**
 * Uniform random number in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Result of a single attempt, stripped of payload
 */
export type AttemptOutcome =
  | { readonly kind: 'success'; readonly statusCode: number }
  | {
      readonly kind: 'failure';
      readonly origin: FailureOrigin;
      readonly statusCode?: number;
      readonly cause?: unknown;
    };

/**
 * What the classifier says about an outcome.
 * `success` ends the call, `retryable` may be retried within budget,
 * `terminal` ends the call with the failure.
 */
export type RetryDecision = 'success' | 'retryable' | 'terminal';

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  baseDelayMs: 1000,
  maxAttempts: 3,
  maxBackoffMs: 30_000,
});
