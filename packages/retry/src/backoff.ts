/**
 * Exponential backoff with multiplicative jitter
 */

import { ValidationError } from '@switchyard/errors';

import { DEFAULT_RETRY_POLICY, type RandomSource } from './types.js';

/** Lowest jitter factor (-20%) */
export const JITTER_MIN = 0.8;
/** Highest jitter factor (+20%) */
export const JITTER_MAX = 1.2;

/**
 * Computes the wait before a retry: `base * 2^attempt`, scaled by a random
 * factor in [0.8, 1.2] and clamped to `maxBackoffMs`. Never sleeps.
 */
export class BackoffCalculator {
  constructor(
    private readonly maxBackoffMs: number = DEFAULT_RETRY_POLICY.maxBackoffMs,
    private readonly random: RandomSource = Math.random
  ) {
    if (!Number.isFinite(maxBackoffMs) || maxBackoffMs < 0) {
      throw new ValidationError(`maxBackoffMs must be a non-negative number, got ${maxBackoffMs}`);
    }
  }

  /**
   * Delay in milliseconds before the retry that follows attempt `attempt` (0-based)
   */
  delay(attempt: number, baseDelayMs: number): number {
    if (!Number.isInteger(attempt) || attempt < 0) {
      throw new ValidationError(`attempt must be a non-negative integer, got ${attempt}`);
    }
    if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
      throw new ValidationError(`baseDelayMs must be a non-negative number, got ${baseDelayMs}`);
    }
    if (baseDelayMs === 0) {
      return 0;
    }

    // 2 ** attempt turns into Infinity for large attempts, which lands here too
    const nominal = baseDelayMs * 2 ** attempt;
    if (nominal * JITTER_MIN >= this.maxBackoffMs) {
      return this.maxBackoffMs;
    }

    const jittered = nominal * this.jitterFactor();
    return Math.min(this.maxBackoffMs, Math.max(0, jittered));
  }

  private jitterFactor(): number {
    const r = Math.min(Math.max(this.random(), 0), 1);
    return JITTER_MIN + r * (JITTER_MAX - JITTER_MIN);
  }
}

/**
 * One-off delay calculation with the default cap
 */
export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  options: { maxBackoffMs?: number; random?: RandomSource } = {}
): number {
  return new BackoffCalculator(options.maxBackoffMs, options.random).delay(attempt, baseDelayMs);
}
