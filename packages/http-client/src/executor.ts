/**
 * Request executor: the attempt loop for one logical upstream call
 */

import {
  CancellationError,
  DecodeError,
  RetryExhaustedError,
  TransportError,
  UpstreamStatusError,
  createErrorContext,
  extractErrorInfo,
  type ErrorContext,
  type UpstreamFailure,
} from '@switchyard/errors';
import { Logger, LogLevel } from '@switchyard/logging';
import {
  BackoffCalculator,
  classifyOutcome,
  createRetryPolicy,
  hasAttemptsRemaining,
  isRetryableStatus,
  isSuccessStatus,
  sleep,
  type AttemptOutcome,
  type RandomSource,
  type RetryPolicy,
} from '@switchyard/retry';

import { CallScope } from './call-scope.js';
import type {
  AttemptObserver,
  AttemptRecord,
  CallOptions,
  PreparedRequest,
  Transport,
  TransportResponse,
  UpstreamResponse,
} from './types.js';

export interface RequestExecutorOptions {
  transport: Transport;
  policy?: Partial<RetryPolicy>;
  /** Jitter source; defaults to Math.random */
  random?: RandomSource;
  logger?: Logger;
  observers?: AttemptObserver[];
}

type AttemptResult =
  | { kind: 'success'; response: UpstreamResponse }
  | { kind: 'failure'; error: UpstreamFailure };

/**
 * Sends a prepared request until it succeeds, fails permanently, runs out of
 * attempts, or the caller cancels.
 *
 * Per call: attempting -> success | failed | retrying, and retrying goes back
 * to attempting after a cancellable backoff wait. The executor keeps no
 * per-call state on the instance, so one executor serves any number of
 * concurrent calls.
 */
export class RequestExecutor {
  readonly policy: RetryPolicy;
  private readonly transport: Transport;
  private readonly backoff: BackoffCalculator;
  private readonly logger: Logger;
  private readonly observers: readonly AttemptObserver[];

  constructor(options: RequestExecutorOptions) {
    this.policy = createRetryPolicy(options.policy);
    this.transport = options.transport;
    this.backoff = new BackoffCalculator(this.policy.maxBackoffMs, options.random);
    this.logger = options.logger ?? new Logger({ component: 'http-client', level: LogLevel.INFO });
    this.observers = Object.freeze([...(options.observers ?? [])]);
  }

  /**
   * Execute a request. Resolves with the first 2xx response; rejects with
   * UpstreamStatusError, TransportError, DecodeError, RetryExhaustedError or
   * CancellationError.
   */
  async execute(request: PreparedRequest, options: CallOptions = {}): Promise<UpstreamResponse> {
    const scope = new CallScope(options);
    const context = createErrorContext({
      operation: `${request.method} ${request.url}`,
      component: 'http-client',
    });

    try {
      return await this.run(request, scope, context);
    } finally {
      scope.dispose();
    }
  }

  private async run(request: PreparedRequest, scope: CallScope, context: ErrorContext): Promise<UpstreamResponse> {
    const { maxAttempts, baseDelayMs } = this.policy;

    for (let attempt = 0; ; attempt++) {
      if (scope.aborted) {
        throw this.cancelled(request, attempt, scope, context);
      }

      const started = Date.now();
      const result = await this.attempt(request, attempt, scope, context);
      const durationMs = Date.now() - started;

      if (result.kind === 'success') {
        this.logger.debug('request completed', {
          method: request.method,
          url: request.url,
          status: result.response.status,
          attempt: attempt + 1,
          durationMs,
        });
        this.notify({
          attempt,
          method: request.method,
          url: request.url,
          outcome: { kind: 'success', statusCode: result.response.status },
          durationMs,
          next: 'success',
        });
        return result.response;
      }

      const { error } = result;
      const outcome = outcomeOf(error);
      const decision = classifyOutcome(outcome, scope.signal);

      if (scope.aborted) {
        this.notify({ attempt, method: request.method, url: request.url, outcome, durationMs, next: 'failed', error });
        throw this.cancelled(request, attempt, scope, context, error);
      }

      if (decision === 'terminal') {
        this.notify({ attempt, method: request.method, url: request.url, outcome, durationMs, next: 'failed', error });
        throw error;
      }

      if (!hasAttemptsRemaining(attempt, maxAttempts)) {
        this.notify({ attempt, method: request.method, url: request.url, outcome, durationMs, next: 'failed', error });
        this.logger.warn('retries exhausted', {
          method: request.method,
          url: request.url,
          attempts: attempt + 1,
          error: error.message,
        });
        throw new RetryExhaustedError(attempt + 1, error, context);
      }

      const delayMs = this.backoff.delay(attempt, baseDelayMs);
      this.notify({
        attempt,
        method: request.method,
        url: request.url,
        outcome,
        durationMs,
        next: 'retrying',
        delayMs,
        error,
      });
      this.logger.warn('retrying failed request', {
        attempt: attempt + 1,
        method: request.method,
        url: request.url,
        error: error.message,
        delayMs: Math.round(delayMs),
      });

      try {
        await sleep(delayMs, scope.signal);
      } catch (cause) {
        throw this.cancelled(request, attempt, scope, context, cause);
      }
    }
  }

  /**
   * One send-and-read cycle. Transport, decode and status failures are
   * returned; cancellation is thrown. The response is always released.
   */
  private async attempt(
    request: PreparedRequest,
    attempt: number,
    scope: CallScope,
    context: ErrorContext
  ): Promise<AttemptResult> {
    const call = { method: request.method, url: request.url, attempt, context };

    let response: TransportResponse;
    try {
      response = await this.transport.send(request, scope.signal);
    } catch (cause) {
      if (scope.aborted) {
        throw this.cancelled(request, attempt, scope, context, cause);
      }
      return { kind: 'failure', error: new TransportError({ ...call, cause }) };
    }

    try {
      let body: Buffer;
      try {
        body = await response.readBody();
      } catch (cause) {
        if (scope.aborted) {
          throw this.cancelled(request, attempt, scope, context, cause);
        }
        return { kind: 'failure', error: new DecodeError({ ...call, statusCode: response.status, cause }) };
      }

      if (isSuccessStatus(response.status)) {
        return { kind: 'success', response: { status: response.status, headers: response.headers, body } };
      }

      return {
        kind: 'failure',
        error: new UpstreamStatusError({
          ...call,
          statusCode: response.status,
          body,
          headers: { ...response.headers },
          retryable: isRetryableStatus(response.status),
        }),
      };
    } finally {
      response.release();
    }
  }

  private cancelled(
    request: PreparedRequest,
    attempt: number,
    scope: CallScope,
    context: ErrorContext,
    cause?: unknown
  ): CancellationError {
    this.logger.debug('request aborted', {
      method: request.method,
      url: request.url,
      attempt: attempt + 1,
      reason: scope.reason,
    });
    const reason: unknown = scope.signal.reason;
    return new CancellationError({
      method: request.method,
      url: request.url,
      attempt,
      reason: scope.reason,
      context,
      cause: cause ?? reason,
    });
  }

  /**
   * Best-effort delivery to observers; a failing observer never fails the call
   */
  private notify(record: AttemptRecord): void {
    for (const observer of this.observers) {
      try {
        const result: unknown = observer(record);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.observerFailed(error));
        }
      } catch (error) {
        this.observerFailed(error);
      }
    }
  }

  private observerFailed(error: unknown): void {
    this.logger.warn('attempt observer failed', { error: extractErrorInfo(error) });
  }
}

function outcomeOf(error: UpstreamFailure): AttemptOutcome {
  return {
    kind: 'failure',
    origin: error.origin,
    ...(error.origin !== 'transport' && { statusCode: error.statusCode }),
    cause: error.cause,
  };
}
