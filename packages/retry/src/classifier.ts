/**
 * Decides whether an attempt outcome may be retried
 */

import type { AttemptOutcome, RetryDecision } from './types.js';

export function isSuccessStatus(code: number): boolean {
  return code >= 200 && code < 300;
}

/**
 * 429 and every 5xx (503 and 504 included) are transient
 */
export function isRetryableStatus(code: number): boolean {
  return code === 429 || code === 503 || code === 504 || code >= 500;
}

/**
 * Classify one outcome. A call whose signal has aborted is terminal no matter
 * what the outcome was, so cancellation short-circuits immediately.
 */
export function classifyOutcome(outcome: AttemptOutcome, signal?: AbortSignal): RetryDecision {
  if (outcome.kind === 'success') {
    return 'success';
  }

  if (signal?.aborted) {
    return 'terminal';
  }

  switch (outcome.origin) {
    case 'transport':
    case 'decode':
      return 'retryable';
    case 'status':
      return outcome.statusCode !== undefined && isRetryableStatus(outcome.statusCode)
        ? 'retryable'
        : 'terminal';
  }
}

/**
 * Whether another attempt may follow attempt `attempt` (0-based)
 */
export function hasAttemptsRemaining(attempt: number, maxAttempts: number): boolean {
  return attempt < maxAttempts - 1;
}
