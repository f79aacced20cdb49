/**
 * Convenience builders on top of the request executor
 */

import type { Logger } from '@switchyard/logging';
import type { RandomSource, RetryPolicy } from '@switchyard/retry';

import { encodeForm, encodeJson, prepareRequest, type FormValues } from './encoding.js';
import { RequestExecutor } from './executor.js';
import { AxiosTransport } from './transports/axios-transport.js';
import type {
  AttemptObserver,
  CallOptions,
  HeaderMap,
  HttpMethod,
  PreparedRequest,
  Transport,
  UpstreamResponse,
} from './types.js';

export interface RequestOptions extends CallOptions {
  /** Extra headers; they override builder defaults on collision */
  headers?: HeaderMap;
}

const JSON_HEADERS: HeaderMap = { 'content-type': 'application/json' };

/**
 * HTTP client with bounded retries. Every builder assembles a request and
 * hands it to the executor unchanged; errors propagate as thrown.
 */
export class HttpClient {
  constructor(private readonly executor: RequestExecutor) {}

  get policy(): RetryPolicy {
    return this.executor.policy;
  }

  async get(url: string, options: RequestOptions = {}): Promise<Buffer> {
    return this.call('GET', url, options);
  }

  async postJson(url: string, payload: unknown, options: RequestOptions = {}): Promise<Buffer> {
    return this.call('POST', url, options, encodeJson(payload), JSON_HEADERS);
  }

  async postForm(url: string, form: FormValues, options: RequestOptions = {}): Promise<Buffer> {
    const encoded = encodeForm(form);
    return this.call('POST', url, options, Buffer.from(encoded, 'utf8'), {
      'content-type': 'application/x-www-form-urlencoded',
      'content-length': String(Buffer.byteLength(encoded)),
    });
  }

  async putJson(url: string, payload: unknown, options: RequestOptions = {}): Promise<Buffer> {
    return this.call('PUT', url, options, encodeJson(payload), JSON_HEADERS);
  }

  async patchJson(url: string, payload: unknown, options: RequestOptions = {}): Promise<Buffer> {
    return this.call('PATCH', url, options, encodeJson(payload), JSON_HEADERS);
  }

  async delete(url: string, options: RequestOptions = {}): Promise<Buffer> {
    return this.call('DELETE', url, options);
  }

  /**
   * Execute an already prepared request and return status, headers and body
   */
  send(request: PreparedRequest, options: CallOptions = {}): Promise<UpstreamResponse> {
    return this.executor.execute(request, options);
  }

  private async call(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    body?: Buffer,
    defaults?: HeaderMap
  ): Promise<Buffer> {
    const request = prepareRequest(method, url, {
      ...(body !== undefined && { body }),
      ...(defaults && { defaults }),
      ...(options.headers && { headers: options.headers }),
    });
    const response = await this.executor.execute(request, {
      ...(options.signal && { signal: options.signal }),
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
    });
    return response.body;
  }
}

export interface HttpClientOptions {
  /** Defaults to an axios transport */
  transport?: Transport;
  policy?: Partial<RetryPolicy>;
  /** Per-attempt transport timeout when the default transport is used */
  timeoutMs?: number;
  userAgent?: string;
  random?: RandomSource;
  logger?: Logger;
  observers?: AttemptObserver[];
}

/**
 * Build a client. Defaults: 1s base delay, 3 attempts, 30s backoff cap,
 * 30s per-attempt timeout.
 */
export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const transport =
    options.transport ??
    new AxiosTransport({
      ...(options.timeoutMs !== undefined && { timeoutMs: options.timeoutMs }),
      ...(options.userAgent && { userAgent: options.userAgent }),
    });

  return new HttpClient(
    new RequestExecutor({
      transport,
      ...(options.policy && { policy: options.policy }),
      ...(options.random && { random: options.random }),
      ...(options.logger && { logger: options.logger }),
      ...(options.observers && { observers: options.observers }),
    })
  );
}
