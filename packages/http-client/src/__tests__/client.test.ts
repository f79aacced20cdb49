import { describe, expect, it } from 'vitest';

import { RetryExhaustedError, UpstreamStatusError, ValidationError } from '@switchyard/errors';
import { Logger, LogLevel, MemoryTransport } from '@switchyard/logging';
import { DEFAULT_RETRY_POLICY } from '@switchyard/retry';

import { createHttpClient, encodeForm, mergeHeaders } from '../index.js';

import { FakeTransport, fixedRandom, type Step } from './fake-transport.js';

function clientFor(steps: Step[]) {
  const transport = new FakeTransport(steps);
  const client = createHttpClient({
    transport,
    policy: { baseDelayMs: 1 },
    random: fixedRandom,
    logger: new Logger({ component: 'test', level: LogLevel.ERROR, transports: [new MemoryTransport()] }),
  });
  return { transport, client };
}

describe('HttpClient builders', () => {
  it('GET returns the response body', async () => {
    const { transport, client } = clientFor([{ status: 200, body: 'pong' }]);

    const body = await client.get('http://backend.test/ping?x=1');

    expect(body.toString()).toBe('pong');
    expect(transport.requests[0]).toEqual({ method: 'GET', url: 'http://backend.test/ping?x=1', headers: {} });
  });

  it('POST-JSON encodes the payload with a JSON content type', async () => {
    const { transport, client } = clientFor([{ status: 201, body: 'created' }]);

    await client.postJson('http://backend.test/jobs', { a: 1 });

    const sent = transport.requests[0];
    expect(sent?.method).toBe('POST');
    expect(sent?.headers).toEqual({ 'content-type': 'application/json' });
    expect(sent?.body?.toString()).toBe('{"a":1}');
  });

  it('lets caller headers override builder defaults regardless of case', async () => {
    const { transport, client } = clientFor([{ status: 200 }]);

    await client.putJson('http://backend.test/jobs/1', { a: 2 }, {
      headers: { 'Content-Type': 'application/merge-patch+json', Authorization: 'Bearer test-secret' },
    });

    expect(transport.requests[0]?.headers).toEqual({
      'content-type': 'application/merge-patch+json',
      authorization: 'Bearer test-secret',
    });
  });

  it('POST-FORM url-encodes fields and sets the content length', async () => {
    const { transport, client } = clientFor([{ status: 200 }]);

    await client.postForm('http://backend.test/search', { q: 'a b', tag: ['x', 'y'] });

    const sent = transport.requests[0];
    expect(sent?.body?.toString()).toBe('q=a+b&tag=x&tag=y');
    expect(sent?.headers).toEqual({
      'content-type': 'application/x-www-form-urlencoded',
      'content-length': '17',
    });
  });

  it('PATCH-JSON and DELETE use their methods', async () => {
    const { transport, client } = clientFor([{ status: 204 }]);

    await client.patchJson('http://backend.test/jobs/1', { done: true });
    await client.delete('http://backend.test/jobs/1');

    expect(transport.requests.map(r => r.method)).toEqual(['PATCH', 'DELETE']);
    expect(transport.requests[1]?.body).toBeUndefined();
  });

  it('rejects an invalid URL without sending anything', async () => {
    const { transport, client } = clientFor([{ status: 200 }]);

    const error = await client.get('not a url').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.code).toBe('INVALID_URL');
    expect(transport.attempts).toBe(0);
  });

  it('rejects non-http protocols', async () => {
    const { client } = clientFor([{ status: 200 }]);

    await expect(client.get('ftp://backend.test/file')).rejects.toThrow('unsupported URL protocol: ftp:');
  });

  it('rejects a payload that cannot be encoded', async () => {
    const { transport, client } = clientFor([{ status: 200 }]);

    const error = await client.postJson('http://backend.test/jobs', { n: 10n }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error instanceof ValidationError && error.code).toBe('ENCODE_ERROR');
    expect(transport.attempts).toBe(0);
  });

  it('propagates status errors unchanged', async () => {
    const { client } = clientFor([{ status: 409, body: 'conflict' }]);

    const error = await client.postJson('http://backend.test/jobs', {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamStatusError);
    expect(error instanceof UpstreamStatusError && error.message).toBe('status 409: conflict');
  });

  it('propagates exhaustion after the default attempt budget', async () => {
    const { transport, client } = clientFor([{ status: 500, body: 'boom' }]);

    const error = await client.get('http://backend.test/flaky').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(transport.attempts).toBe(DEFAULT_RETRY_POLICY.maxAttempts);
  });

  it('send returns status and headers', async () => {
    const { client } = clientFor([{ status: 202, body: 'queued', headers: { location: '/jobs/7' } }]);

    const response = await client.send({ method: 'GET', url: 'http://backend.test/jobs', headers: {} });

    expect(response.status).toBe(202);
    expect(response.headers).toEqual({ location: '/jobs/7' });
  });

  it('exposes the effective policy', () => {
    const { client } = clientFor([]);

    expect(client.policy).toEqual({ ...DEFAULT_RETRY_POLICY, baseDelayMs: 1 });
  });
});

describe('encoding helpers', () => {
  it('mergeHeaders lower-cases names and lets later maps win', () => {
    expect(mergeHeaders({ Accept: 'text/plain' }, undefined, { ACCEPT: 'application/json' })).toEqual({
      accept: 'application/json',
    });
  });

  it('encodeForm accepts URLSearchParams', () => {
    expect(encodeForm(new URLSearchParams([['a', '1'], ['b', '&']]))).toBe('a=1&b=%26');
  });
});
