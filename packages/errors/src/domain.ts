/**
 * Domain-specific error classes
 */

import { createErrorContext } from './context.js';
import {
  ErrorCategory,
  type ErrorContext,
  ErrorSeverity,
  GatewayError,
  RetryClassification,
} from './types.js';

/**
 * Where a failed attempt went wrong
 */
export type FailureOrigin = 'transport' | 'decode' | 'status';

export type CancellationReason = 'cancelled' | 'deadline';

/**
 * Identifies the upstream call an error belongs to
 */
export interface UpstreamErrorOptions {
  method: string;
  url: string;
  /** 0-based attempt index */
  attempt: number;
  cause?: unknown;
  context?: ErrorContext;
}

function upstreamContext(options: UpstreamErrorOptions): ErrorContext {
  return options.context ?? createErrorContext({ operation: 'upstream_request', component: 'http-client' });
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}

function describeAttempt(options: UpstreamErrorOptions): string {
  return `attempt ${options.attempt + 1}, ${options.method} ${options.url}`;
}

/**
 * The request never produced a response: connection refused, DNS failure,
 * socket timeout.
 */
export class TransportError extends GatewayError {
  readonly origin = 'transport' as const;
  readonly method: string;
  readonly url: string;
  readonly attempt: number;

  constructor(options: UpstreamErrorOptions) {
    super(`request failed (${describeAttempt(options)}): ${describeCause(options.cause)}`, 'TRANSPORT_ERROR', {
      severity: ErrorSeverity.HIGH,
      category: ErrorCategory.TRANSPORT,
      retryClassification: RetryClassification.RETRYABLE,
      context: upstreamContext(options),
      cause: options.cause,
      data: { method: options.method, url: options.url, attempt: options.attempt },
      recoveryActions: ['Check upstream availability', 'Verify the route target URL'],
    });
    this.method = options.method;
    this.url = options.url;
    this.attempt = options.attempt;
  }
}

/**
 * A response arrived but its body could not be read to the end
 */
export class DecodeError extends GatewayError {
  readonly origin = 'decode' as const;
  readonly method: string;
  readonly url: string;
  readonly attempt: number;
  readonly statusCode: number;

  constructor(options: UpstreamErrorOptions & { statusCode: number }) {
    super(
      `reading response failed (${describeAttempt(options)}): ${describeCause(options.cause)}`,
      'DECODE_ERROR',
      {
        severity: ErrorSeverity.HIGH,
        category: ErrorCategory.DECODE,
        retryClassification: RetryClassification.RETRYABLE,
        context: upstreamContext(options),
        cause: options.cause,
        data: {
          method: options.method,
          url: options.url,
          attempt: options.attempt,
          statusCode: options.statusCode,
        },
      }
    );
    this.method = options.method;
    this.url = options.url;
    this.attempt = options.attempt;
    this.statusCode = options.statusCode;
  }
}

/** Response header values; `set-cookie` keeps one entry per cookie */
export type UpstreamHeaders = Readonly<Record<string, string | readonly string[]>>;

/**
 * The upstream answered with a non-2xx status. The raw body bytes are kept
 * so the reply can be passed on unchanged; `body` is their UTF-8 view.
 */
export class UpstreamStatusError extends GatewayError {
  readonly origin = 'status' as const;
  readonly method: string;
  readonly url: string;
  readonly attempt: number;
  readonly statusCode: number;
  readonly bodyBytes: Buffer;
  readonly headers: UpstreamHeaders;

  constructor(
    options: UpstreamErrorOptions & {
      statusCode: number;
      body: Buffer | string;
      retryable: boolean;
      headers?: UpstreamHeaders;
    }
  ) {
    const bodyBytes = typeof options.body === 'string' ? Buffer.from(options.body, 'utf8') : options.body;
    super(`status ${options.statusCode}: ${bodyBytes.toString('utf8')}`, 'UPSTREAM_STATUS', {
      severity: options.statusCode >= 500 ? ErrorSeverity.HIGH : ErrorSeverity.MEDIUM,
      category: ErrorCategory.STATUS,
      retryClassification: options.retryable
        ? RetryClassification.RETRYABLE
        : RetryClassification.NON_RETRYABLE,
      context: upstreamContext(options),
      data: {
        method: options.method,
        url: options.url,
        attempt: options.attempt,
        statusCode: options.statusCode,
      },
    });
    this.method = options.method;
    this.url = options.url;
    this.attempt = options.attempt;
    this.statusCode = options.statusCode;
    this.bodyBytes = bodyBytes;
    this.headers = options.headers ?? {};
  }

  get body(): string {
    return this.bodyBytes.toString('utf8');
  }
}

export type UpstreamFailure = TransportError | DecodeError | UpstreamStatusError;

/**
 * The caller aborted the call or its deadline elapsed. Never retried.
 */
export class CancellationError extends GatewayError {
  readonly origin = 'transport' as const;
  readonly reason: CancellationReason;
  readonly method: string;
  readonly url: string;
  readonly attempt: number;

  constructor(options: UpstreamErrorOptions & { reason: CancellationReason }) {
    const what = options.reason === 'deadline' ? 'deadline exceeded' : 'request cancelled';
    super(`${what} (${describeAttempt(options)})`, options.reason === 'deadline' ? 'DEADLINE_EXCEEDED' : 'CANCELLED', {
      severity: ErrorSeverity.LOW,
      category: ErrorCategory.TRANSPORT,
      retryClassification: RetryClassification.NON_RETRYABLE,
      context: upstreamContext(options),
      cause: options.cause,
      data: { method: options.method, url: options.url, attempt: options.attempt, reason: options.reason },
    });
    this.reason = options.reason;
    this.method = options.method;
    this.url = options.url;
    this.attempt = options.attempt;
  }
}

/**
 * Every attempt failed with a retryable outcome
 */
export class RetryExhaustedError extends GatewayError {
  readonly attempts: number;
  readonly lastError: UpstreamFailure;

  constructor(attempts: number, lastError: UpstreamFailure, context?: ErrorContext) {
    super(`request failed after ${attempts} attempts: ${lastError.message}`, 'RETRY_EXHAUSTED', {
      severity: ErrorSeverity.HIGH,
      category: ErrorCategory.EXHAUSTION,
      retryClassification: RetryClassification.NON_RETRYABLE,
      context: context ?? lastError.metadata.context,
      cause: lastError,
      data: { attempts, lastOrigin: lastError.origin, url: lastError.url },
    });
    this.attempts = attempts;
    this.lastError = lastError;
  }

  get url(): string {
    return this.lastError.url;
  }

  /** Status of the last attempt when it was a status-class failure */
  get statusCode(): number | undefined {
    return this.lastError instanceof UpstreamStatusError ? this.lastError.statusCode : undefined;
  }

  /** Verbatim body of the last attempt when it was a status-class failure */
  get body(): string | undefined {
    return this.lastError instanceof UpstreamStatusError ? this.lastError.body : undefined;
  }
}

export class ConfigurationError extends GatewayError {
  constructor(
    message: string,
    options: { code?: string; cause?: unknown; data?: Record<string, unknown>; context?: ErrorContext } = {}
  ) {
    super(message, options.code ?? 'CONFIGURATION_ERROR', {
      severity: ErrorSeverity.CRITICAL,
      category: ErrorCategory.CONFIGURATION,
      context: options.context ?? createErrorContext({ operation: 'configuration' }),
      ...(options.cause !== undefined && { cause: options.cause }),
      ...(options.data && { data: options.data }),
      recoveryActions: ['Check the configuration file against the documented schema'],
    });
  }
}

/**
 * Invalid input detected before any I/O happens
 */
export class ValidationError extends GatewayError {
  constructor(
    message: string,
    options: { code?: string; cause?: unknown; data?: Record<string, unknown>; context?: ErrorContext } = {}
  ) {
    super(message, options.code ?? 'VALIDATION_ERROR', {
      severity: ErrorSeverity.MEDIUM,
      category: ErrorCategory.VALIDATION,
      context: options.context ?? createErrorContext({ operation: 'validation' }),
      ...(options.cause !== undefined && { cause: options.cause }),
      ...(options.data && { data: options.data }),
    });
  }
}
