/**
 * Error handling utilities and helper functions
 */

import { RetryExhaustedError, UpstreamStatusError, type UpstreamHeaders } from './domain.js';
import { GatewayError } from './types.js';

/**
 * Result type for operations that can fail
 */
export type Result<T, E = Error> =
  | { success: true; data: T; error?: never }
  | { success: false; data?: never; error: E };

export function success<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function failure<E = Error>(error: E): Result<never, E> {
  return { success: false, error };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an async operation to return a Result instead of throwing
 */
export async function safeAsync<T>(operation: () => Promise<T>): Promise<Result<T, Error>> {
  try {
    return success(await operation());
  } catch (error) {
    return failure(toError(error));
  }
}

/**
 * Wrap a sync operation to return a Result instead of throwing
 */
export function safe<T>(operation: () => T): Result<T, Error> {
  try {
    return success(operation());
  } catch (error) {
    return failure(toError(error));
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof GatewayError && error.isRetryable();
}

export interface UpstreamStatus {
  statusCode: number;
  body: string;
  bodyBytes: Buffer;
  headers: UpstreamHeaders;
}

/**
 * Status code and body of the upstream response behind an error, when the
 * failure (or the last attempt of an exhausted call) was status-class.
 */
export function upstreamStatusOf(error: unknown): UpstreamStatus | undefined {
  const status =
    error instanceof RetryExhaustedError && error.lastError instanceof UpstreamStatusError ? error.lastError : error;
  if (status instanceof UpstreamStatusError) {
    return { statusCode: status.statusCode, body: status.body, bodyBytes: status.bodyBytes, headers: status.headers };
  }
  return undefined;
}

/**
 * Extract error information for logging
 */
export function extractErrorInfo(error: unknown): Record<string, unknown> {
  if (error instanceof GatewayError) {
    return error.toLogFormat();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    error: String(error),
  };
}
