import { describe, expect, it } from 'vitest';

import {
  CancellationError,
  ConfigurationError,
  DecodeError,
  ErrorCategory,
  RetryClassification,
  RetryExhaustedError,
  TransportError,
  UpstreamStatusError,
  ValidationError,
  createErrorContext,
  extractErrorInfo,
  isRetryableError,
  safe,
  safeAsync,
  upstreamStatusOf,
} from '../index.js';

const call = { method: 'GET', url: 'http://backend.test/items', attempt: 0 };

describe('upstream errors', () => {
  it('wraps transport failures with attempt and target', () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:8081');
    const error = new TransportError({ ...call, attempt: 1, cause });

    expect(error.message).toBe(
      'request failed (attempt 2, GET http://backend.test/items): connect ECONNREFUSED 127.0.0.1:8081'
    );
    expect(error.name).toBe('TransportError');
    expect(error.origin).toBe('transport');
    expect(error.cause).toBe(cause);
    expect(error.metadata.category).toBe(ErrorCategory.TRANSPORT);
    expect(error.isRetryable()).toBe(true);
    expect(error).toBeInstanceOf(TransportError);
  });

  it('classifies decode failures as retryable', () => {
    const error = new DecodeError({ ...call, statusCode: 200, cause: new Error('aborted') });

    expect(error.origin).toBe('decode');
    expect(error.statusCode).toBe(200);
    expect(isRetryableError(error)).toBe(true);
  });

  it('keeps status bodies verbatim', () => {
    const error = new UpstreamStatusError({
      ...call,
      statusCode: 404,
      body: '{"error":"no such item"}',
      retryable: false,
    });

    expect(error.message).toBe('status 404: {"error":"no such item"}');
    expect(error.body).toBe('{"error":"no such item"}');
    expect(error.metadata.retryClassification).toBe(RetryClassification.NON_RETRYABLE);
    expect(error.headers).toEqual({});
  });

  it('keeps bytes that are not valid UTF-8', () => {
    const bytes = Buffer.from([0xff, 0xfe, 0x00, 0x80]);
    const error = new UpstreamStatusError({ ...call, statusCode: 404, body: bytes, retryable: false });

    expect(error.bodyBytes).toBe(bytes);
    expect(error.bodyBytes.toString('hex')).toBe('fffe0080');
  });

  it('exposes the last status-class outcome after exhaustion', () => {
    const last = new UpstreamStatusError({ ...call, attempt: 2, statusCode: 503, body: 'busy', retryable: true });
    const error = new RetryExhaustedError(3, last);

    expect(error.message).toBe('request failed after 3 attempts: status 503: busy');
    expect(error.statusCode).toBe(503);
    expect(error.body).toBe('busy');
    expect(error.url).toBe('http://backend.test/items');
    expect(error.cause).toBe(last);
    expect(error.isRetryable()).toBe(false);
  });

  it('has no status after exhaustion on transport failures', () => {
    const error = new RetryExhaustedError(2, new TransportError({ ...call, cause: 'socket hang up' }));

    expect(error.statusCode).toBeUndefined();
    expect(error.body).toBeUndefined();
    expect(upstreamStatusOf(error)).toBeUndefined();
  });

  it('distinguishes deadlines from caller cancellation', () => {
    const deadline = new CancellationError({ ...call, reason: 'deadline' });
    const cancelled = new CancellationError({ ...call, reason: 'cancelled' });

    expect(deadline.code).toBe('DEADLINE_EXCEEDED');
    expect(deadline.message).toBe('deadline exceeded (attempt 1, GET http://backend.test/items)');
    expect(cancelled.code).toBe('CANCELLED');
    expect(cancelled.isRetryable()).toBe(false);
  });
});

describe('upstreamStatusOf', () => {
  it('reads status errors directly and through exhaustion', () => {
    const status = new UpstreamStatusError({
      ...call,
      statusCode: 429,
      body: 'slow down',
      retryable: true,
      headers: { 'retry-after': '2' },
    });

    const expected = {
      statusCode: 429,
      body: 'slow down',
      bodyBytes: Buffer.from('slow down'),
      headers: { 'retry-after': '2' },
    };
    expect(upstreamStatusOf(status)).toEqual(expected);
    expect(upstreamStatusOf(new RetryExhaustedError(3, status))).toEqual(expected);
    expect(upstreamStatusOf(new Error('plain'))).toBeUndefined();
  });
});

describe('extractErrorInfo', () => {
  it('uses the log format for gateway errors', () => {
    const context = createErrorContext({ operation: 'load_config', correlationId: 'test-correlation' });
    const error = new ConfigurationError('routes missing', { context, cause: new Error('empty file') });

    expect(extractErrorInfo(error)).toMatchObject({
      name: 'ConfigurationError',
      code: 'CONFIGURATION_ERROR',
      category: ErrorCategory.CONFIGURATION,
      correlationId: 'test-correlation',
      operation: 'load_config',
      cause: 'empty file',
    });
  });

  it('falls back for plain errors and other values', () => {
    expect(extractErrorInfo(new Error('boom'))).toMatchObject({ name: 'Error', message: 'boom' });
    expect(extractErrorInfo(42)).toEqual({ error: '42' });
  });

  it('treats validation errors as non-retryable', () => {
    expect(isRetryableError(new ValidationError('bad url', { code: 'INVALID_URL' }))).toBe(false);
    expect(isRetryableError(new Error('timeout'))).toBe(false);
  });
});

describe('createErrorContext', () => {
  it('generates a correlation id when none is given', () => {
    const context = createErrorContext({ component: 'gateway' });

    expect(context.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(context.component).toBe('gateway');
    expect(context.operation).toBeUndefined();
  });
});

describe('Result helpers', () => {
  it('captures thrown values from sync operations', () => {
    expect(safe(() => 42)).toEqual({ success: true, data: 42 });

    const result = safe(() => {
      throw 'cache full';
    });
    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('cache full');
  });

  it('captures rejections from async operations', async () => {
    expect(await safeAsync(async () => 'stopped')).toEqual({ success: true, data: 'stopped' });

    const result = await safeAsync(() => Promise.reject(new Error('close timed out')));
    expect(result.success).toBe(false);
    expect(result.error?.message).toBe('close timed out');
  });
});
