import { describe, expect, it } from 'vitest';

import {
  classifyOutcome,
  hasAttemptsRemaining,
  isRetryableStatus,
  isSuccessStatus,
} from '../index.js';

describe('isRetryableStatus', () => {
  it('retries 429 and every 5xx code', () => {
    const retryable = [429, 503, 504];
    for (let code = 500; code <= 599; code++) {
      retryable.push(code);
    }

    for (const code of retryable) {
      expect(isRetryableStatus(code)).toBe(true);
    }
  });

  it('treats every other non-2xx code as terminal', () => {
    const terminal: number[] = [];
    for (let code = 100; code < 500; code++) {
      if ((code < 200 || code >= 300) && code !== 429) {
        terminal.push(code);
      }
    }

    for (const code of terminal) {
      expect(isRetryableStatus(code)).toBe(false);
    }
  });
});

describe('isSuccessStatus', () => {
  it('accepts exactly the 2xx range', () => {
    expect(isSuccessStatus(200)).toBe(true);
    expect(isSuccessStatus(204)).toBe(true);
    expect(isSuccessStatus(299)).toBe(true);
    expect(isSuccessStatus(199)).toBe(false);
    expect(isSuccessStatus(300)).toBe(false);
  });
});

describe('classifyOutcome', () => {
  it('never retries success', () => {
    expect(classifyOutcome({ kind: 'success', statusCode: 200 })).toBe('success');
  });

  it('retries transport and decode failures', () => {
    expect(classifyOutcome({ kind: 'failure', origin: 'transport', cause: new Error('ECONNREFUSED') })).toBe(
      'retryable'
    );
    expect(classifyOutcome({ kind: 'failure', origin: 'decode', statusCode: 200 })).toBe('retryable');
  });

  it('follows the status table for status failures', () => {
    expect(classifyOutcome({ kind: 'failure', origin: 'status', statusCode: 503 })).toBe('retryable');
    expect(classifyOutcome({ kind: 'failure', origin: 'status', statusCode: 404 })).toBe('terminal');
    expect(classifyOutcome({ kind: 'failure', origin: 'status', statusCode: 302 })).toBe('terminal');
    expect(classifyOutcome({ kind: 'failure', origin: 'status' })).toBe('terminal');
  });

  it('short-circuits once the call is cancelled', () => {
    const controller = new AbortController();
    controller.abort();

    expect(classifyOutcome({ kind: 'failure', origin: 'transport' }, controller.signal)).toBe('terminal');
    expect(classifyOutcome({ kind: 'failure', origin: 'status', statusCode: 503 }, controller.signal)).toBe(
      'terminal'
    );
  });
});

describe('hasAttemptsRemaining', () => {
  it('counts attempts from zero', () => {
    expect(hasAttemptsRemaining(0, 3)).toBe(true);
    expect(hasAttemptsRemaining(1, 3)).toBe(true);
    expect(hasAttemptsRemaining(2, 3)).toBe(false);
    expect(hasAttemptsRemaining(0, 1)).toBe(false);
  });
});
