/**
 * Error context construction
 */

import { randomUUID } from 'crypto';

import type { ErrorContext } from './types.js';

export interface ErrorContextOptions {
  operation?: string;
  component?: string;
  metadata?: Record<string, unknown>;
  correlationId?: string;
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Create a new error context, generating a correlation ID when none is given
 */
export function createErrorContext(options: ErrorContextOptions = {}): ErrorContext {
  const context: ErrorContext = {
    correlationId: options.correlationId ?? generateCorrelationId(),
    timestamp: new Date(),
  };

  if (options.operation !== undefined) {
    context.operation = options.operation;
  }
  if (options.component !== undefined) {
    context.component = options.component;
  }
  if (options.metadata !== undefined) {
    context.metadata = options.metadata;
  }

  return context;
}
