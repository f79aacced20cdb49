/**
 * Retry building blocks for upstream calls
 *
 * - Exponential backoff with +/-20% jitter and a cap
 * - Outcome classification (transient vs. permanent)
 * - Cancellable waits
 */

export {
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RandomSource,
  type AttemptOutcome,
  type RetryDecision,
} from './types.js';

export { createRetryPolicy, validateRetryPolicy } from './policy.js';

export { BackoffCalculator, calculateBackoff, JITTER_MIN, JITTER_MAX } from './backoff.js';

export { isSuccessStatus, isRetryableStatus, classifyOutcome, hasAttemptsRemaining } from './classifier.js';

export { sleep } from './sleep.js';
