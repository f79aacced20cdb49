/**
 * Error types and base classes shared by every Switchyard package
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * Retry classification consulted by the retry layer
 */
export enum RetryClassification {
  NON_RETRYABLE = 'non_retryable',
  RETRYABLE = 'retryable',
}

/**
 * Error categories. The first four mirror the upstream failure taxonomy:
 * transport, decode, status, exhaustion.
 */
export enum ErrorCategory {
  /** Connection refused, DNS failure, timeout, cancellation */
  TRANSPORT = 'transport',
  /** Response body could not be fully read */
  DECODE = 'decode',
  /** Upstream replied with a non-success status */
  STATUS = 'status',
  /** Attempt budget spent without success */
  EXHAUSTION = 'exhaustion',
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  UNKNOWN = 'unknown',
}

/**
 * Error context for tracking operations and debugging
 */
export interface ErrorContext {
  /** Correlation ID shared by all errors raised for one logical operation */
  correlationId: string;
  operation?: string;
  component?: string;
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

export interface ErrorMetadata {
  severity: ErrorSeverity;
  category: ErrorCategory;
  retryClassification: RetryClassification;
  context: ErrorContext;
  /** Original error that caused this error */
  cause?: unknown;
  data?: Record<string, unknown>;
  recoveryActions?: string[];
}

export type RequiredErrorMetadata = Partial<ErrorMetadata> &
  Pick<ErrorMetadata, 'severity' | 'category' | 'context'>;

/**
 * Base error class with metadata and context tracking
 */
export abstract class GatewayError extends Error {
  public readonly code: string;
  public readonly metadata: ErrorMetadata;

  constructor(message: string, code: string, metadata: RequiredErrorMetadata) {
    super(message, metadata.cause !== undefined ? { cause: metadata.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;

    this.metadata = {
      retryClassification: RetryClassification.NON_RETRYABLE,
      ...metadata,
    };

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Flat representation for structured log entries
   */
  toLogFormat(): Record<string, unknown> {
    const cause = this.metadata.cause;
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.metadata.severity,
      category: this.metadata.category,
      retryClassification: this.metadata.retryClassification,
      correlationId: this.metadata.context.correlationId,
      operation: this.metadata.context.operation,
      component: this.metadata.context.component,
      timestamp: this.metadata.context.timestamp,
      ...(this.metadata.data && { data: this.metadata.data }),
      ...(cause !== undefined && { cause: cause instanceof Error ? cause.message : String(cause) }),
    };
  }

  isRetryable(): boolean {
    return this.metadata.retryClassification === RetryClassification.RETRYABLE;
  }
}
