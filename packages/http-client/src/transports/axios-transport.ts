import { Readable } from 'stream';

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import type { PreparedRequest, ResponseHeaderMap, Transport, TransportResponse } from '../types.js';

export interface AxiosTransportOptions {
  /** Per-attempt timeout; 0 disables it */
  timeoutMs?: number;
  /** Redirects to follow; redirects that are not followed reach the caller as 3xx */
  maxRedirects?: number;
  userAgent?: string;
  /** Pre-configured instance, e.g. with a custom adapter or agents */
  instance?: AxiosInstance;
}

const DEFAULT_USER_AGENT = 'Switchyard/1.0';

/**
 * Transport backed by axios. Bodies are streamed so the executor decides
 * when to read them and the connection is freed on release.
 */
export class AxiosTransport implements Transport {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly userAgent: string;

  constructor(options: AxiosTransportOptions = {}) {
    this.client = options.instance ?? axios.create();
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRedirects = options.maxRedirects ?? 5;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async send(request: PreparedRequest, signal: AbortSignal): Promise<TransportResponse> {
    const response = await this.client.request<unknown>({
      method: request.method,
      url: request.url,
      headers: { 'user-agent': this.userAgent, ...request.headers },
      data: request.body,
      responseType: 'stream',
      timeout: this.timeoutMs,
      maxRedirects: this.maxRedirects,
      validateStatus: () => true,
      signal,
    });

    return new StreamedResponse(response.status, normalizeHeaders(response.headers), toReadable(response.data));
  }
}

class StreamedResponse implements TransportResponse {
  constructor(
    readonly status: number,
    readonly headers: ResponseHeaderMap,
    private readonly stream: Readable
  ) {}

  async readBody(): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of this.stream) {
      chunks.push(toBuffer(chunk));
    }
    return Buffer.concat(chunks);
  }

  release(): void {
    if (!this.stream.destroyed) {
      this.stream.destroy();
    }
  }
}

function normalizeHeaders(headers: AxiosResponse['headers']): ResponseHeaderMap {
  const result: ResponseHeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (typeof value === 'string') {
      result[lower] = lower === 'set-cookie' ? [value] : value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[lower] = String(value);
    } else if (Array.isArray(value)) {
      const values = value.map(String);
      // Cookie values may contain commas, so they are never joined
      result[lower] = lower === 'set-cookie' ? values : values.join(', ');
    }
  }
  return result;
}

function toReadable(data: unknown): Readable {
  if (data instanceof Readable) {
    return data;
  }
  if (data === undefined || data === null) {
    return Readable.from([]);
  }
  return Readable.from([toBuffer(data)]);
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk;
  }
  if (typeof chunk === 'string') {
    return Buffer.from(chunk, 'utf8');
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  throw new TypeError(`unexpected response chunk of type ${typeof chunk}`);
}
