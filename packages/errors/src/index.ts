/**
 * Error taxonomy for upstream calls and gateway configuration
 */

export {
  ErrorSeverity,
  RetryClassification,
  ErrorCategory,
  GatewayError,
  type ErrorContext,
  type ErrorMetadata,
  type RequiredErrorMetadata,
} from './types.js';

export { createErrorContext, generateCorrelationId, type ErrorContextOptions } from './context.js';

export {
  TransportError,
  DecodeError,
  UpstreamStatusError,
  CancellationError,
  RetryExhaustedError,
  ConfigurationError,
  ValidationError,
  type FailureOrigin,
  type CancellationReason,
  type UpstreamErrorOptions,
  type UpstreamFailure,
  type UpstreamHeaders,
} from './domain.js';

export {
  type Result,
  success,
  failure,
  toError,
  safe,
  safeAsync,
  isRetryableError,
  upstreamStatusOf,
  type UpstreamStatus,
  extractErrorInfo,
} from './utils.js';
