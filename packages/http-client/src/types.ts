/**
 * Request, transport and observability types for upstream calls
 */

import type { AttemptOutcome } from '@switchyard/retry';

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some(method => method === value);
}

/** Header names are stored lower-cased */
export type HeaderMap = Record<string, string>;

/**
 * Response headers. Repeated headers are joined with `, ` except
 * `set-cookie`, which keeps one entry per cookie.
 */
export type ResponseHeaderMap = Record<string, string | readonly string[]>;

/**
 * A fully assembled outbound request
 */
export interface PreparedRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<HeaderMap>;
  readonly body?: Buffer;
}

/**
 * A response whose body has not been read yet
 */
export interface TransportResponse {
  readonly status: number;
  readonly headers: Readonly<ResponseHeaderMap>;
  /** Read the entire body; rejects if the stream breaks */
  readBody(): Promise<Buffer>;
  /** Free the underlying connection. Safe to call more than once. */
  release(): void;
}

/**
 * "Send request, get response-or-error". Connection pooling belongs here,
 * not in the executor.
 */
export interface Transport {
  send(request: PreparedRequest, signal: AbortSignal): Promise<TransportResponse>;
}

/**
 * A successful upstream response with its body fully read
 */
export interface UpstreamResponse {
  readonly status: number;
  readonly headers: Readonly<ResponseHeaderMap>;
  readonly body: Buffer;
}

/**
 * Per-call options supplied by the caller
 */
export interface CallOptions {
  /** Aborting this signal cancels the call, including any backoff wait */
  signal?: AbortSignal;
  /** Deadline for the whole call, retries included */
  timeoutMs?: number;
}

export type CallState = 'attempting' | 'retrying' | 'success' | 'failed';

/**
 * One attempt, as reported to observers. Not retained after the call.
 */
export interface AttemptRecord {
  /** 0-based */
  readonly attempt: number;
  readonly method: HttpMethod;
  readonly url: string;
  readonly outcome: AttemptOutcome;
  readonly durationMs: number;
  /** State the call moves to after this attempt */
  readonly next: Exclude<CallState, 'attempting'>;
  /** Backoff before the next attempt, when `next` is `retrying` */
  readonly delayMs?: number;
  readonly error?: Error;
}

export type AttemptObserver = (record: AttemptRecord) => void;
