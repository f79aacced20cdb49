import { Readable } from 'stream';

import axios, { type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';

import { AxiosTransport, prepareRequest } from '../index.js';

function instanceReturning(status: number, data: unknown, headers: Record<string, string | string[]> = {}) {
  const seen: InternalAxiosRequestConfig[] = [];
  const instance = axios.create({
    adapter: async config => {
      seen.push(config);
      return { data, status, statusText: '', headers, config };
    },
  });
  return { instance, seen };
}

describe('AxiosTransport', () => {
  it('streams the body and lower-cases response headers', async () => {
    const { instance } = instanceReturning(201, Readable.from([Buffer.from('hel'), Buffer.from('lo')]), {
      'Content-Type': 'text/plain',
      'X-Request-Count': '2',
    });
    const transport = new AxiosTransport({ instance });

    const response = await transport.send(prepareRequest('GET', 'http://backend.test/'), new AbortController().signal);

    expect(response.status).toBe(201);
    expect(response.headers).toEqual({ 'content-type': 'text/plain', 'x-request-count': '2' });
    expect((await response.readBody()).toString()).toBe('hello');
  });

  it('keeps one entry per set-cookie header and joins other repeated headers', async () => {
    const { instance } = instanceReturning(200, Readable.from([]), {
      'Set-Cookie': ['a=1; Path=/', 'b=2; Expires=Wed, 21 Oct 2026 07:28:00 GMT'],
      Vary: ['Accept', 'Origin'],
    });
    const transport = new AxiosTransport({ instance });

    const response = await transport.send(prepareRequest('GET', 'http://backend.test/'), new AbortController().signal);

    expect(response.headers).toEqual({
      'set-cookie': ['a=1; Path=/', 'b=2; Expires=Wed, 21 Oct 2026 07:28:00 GMT'],
      vary: 'Accept, Origin',
    });
  });

  it('passes method, body, user agent, timeout and signal to axios', async () => {
    const { instance, seen } = instanceReturning(200, Readable.from([]));
    const transport = new AxiosTransport({ instance, timeoutMs: 1500, userAgent: 'switchyard-test' });
    const controller = new AbortController();
    const request = prepareRequest('POST', 'http://backend.test/jobs', {
      body: Buffer.from('{"a":1}'),
      defaults: { 'content-type': 'application/json' },
    });

    await transport.send(request, controller.signal);

    const config = seen[0];
    expect(config?.method).toBe('post');
    expect(config?.url).toBe('http://backend.test/jobs');
    expect(config?.timeout).toBe(1500);
    expect(config?.responseType).toBe('stream');
    expect(config?.signal).toBe(controller.signal);
    expect(config?.headers.get('user-agent')).toBe('switchyard-test');
    expect(config?.headers.get('content-type')).toBe('application/json');
    expect(config?.data).toEqual(Buffer.from('{"a":1}'));
  });

  it('accepts every status code', async () => {
    const { instance, seen } = instanceReturning(503, Readable.from([Buffer.from('busy')]));
    const transport = new AxiosTransport({ instance });

    const response = await transport.send(prepareRequest('GET', 'http://backend.test/'), new AbortController().signal);

    expect(response.status).toBe(503);
    expect(seen[0]?.validateStatus?.(503)).toBe(true);
  });

  it('wraps non-stream data', async () => {
    const { instance } = instanceReturning(200, 'plain text');
    const transport = new AxiosTransport({ instance });

    const response = await transport.send(prepareRequest('GET', 'http://backend.test/'), new AbortController().signal);

    expect((await response.readBody()).toString()).toBe('plain text');
  });

  it('destroys the stream on release', async () => {
    const stream = Readable.from([Buffer.from('unread')]);
    const { instance } = instanceReturning(200, stream);
    const transport = new AxiosTransport({ instance });

    const response = await transport.send(prepareRequest('GET', 'http://backend.test/'), new AbortController().signal);
    response.release();
    response.release();

    expect(stream.destroyed).toBe(true);
  });

  it('rejects when axios fails to connect', async () => {
    const instance = axios.create({
      adapter: async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:9');
      },
    });
    const transport = new AxiosTransport({ instance });

    await expect(
      transport.send(prepareRequest('GET', 'http://backend.test/'), new AbortController().signal)
    ).rejects.toThrow('connect ECONNREFUSED 127.0.0.1:9');
  });
});
