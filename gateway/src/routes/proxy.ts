/**
 * Reverse-proxy forwarding through the route's resilient client
 */

import type { Context, MiddlewareHandler } from 'hono';

import {
  CancellationError,
  DecodeError,
  RetryExhaustedError,
  TransportError,
  extractErrorInfo,
  safe,
  upstreamStatusOf,
} from '@switchyard/errors';
import { isHttpMethod, type HeaderMap, type PreparedRequest, type ResponseHeaderMap } from '@switchyard/http-client';

import {
  cacheKey,
  isSharedRequest,
  isStorable,
  type CachedResponse,
  type ResponseCache,
} from '../cache/response-cache.js';
import type { GatewayEnv } from '../types.js';

import { upstreamUrl, type RouteTable } from './route-table.js';

/** Connection-scoped headers that must not be forwarded (RFC 9110 7.6.1) */
const HOP_BY_HOP = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

// Recomputed by the transport or by the HTTP server
const REQUEST_DROP = new Set(['host', 'content-length']);
const RESPONSE_DROP = new Set(['content-length', 'content-encoding']);

// Statuses a Response must be built without a body for
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/** Non-standard status for a client that went away before the response */
export const CLIENT_CLOSED_REQUEST = 499;

/**
 * Resolve the route for the request path; unknown paths fall through to the
 * not-found handler.
 */
export function resolveRoute(table: RouteTable): MiddlewareHandler<GatewayEnv> {
  return async (c, next) => {
    const route = table.match(c.req.path);
    if (!route) {
      return c.notFound();
    }
    c.set('route', route);
    await next();
  };
}

export function forwardRequest(options: { cache: ResponseCache }) {
  const { cache } = options;

  return async (c: Context<GatewayEnv>): Promise<Response> => {
    const route = c.get('route');
    const logger = c.get('logger');
    const method = c.req.method.toUpperCase();

    if (!isHttpMethod(method)) {
      return c.text('Method not allowed', 405, { Allow: route.methods.join(', ') });
    }

    const incoming = new URL(c.req.url);
    const url = upstreamUrl(route, incoming.pathname, incoming.search);
    const cacheable = route.cache.enabled && method === 'GET' && isSharedRequest(c.req.raw.headers);
    const key = cacheKey(route.path, url);

    if (cacheable) {
      const hit = cache.get(key);
      if (hit) {
        logger.debug('Cache hit', { url });
        return toResponse(hit, 'HIT');
      }
    }

    const body = method === 'GET' || method === 'HEAD' ? undefined : Buffer.from(await c.req.arrayBuffer());
    const request: PreparedRequest = {
      method,
      url,
      headers: forwardedHeaders(c.req.raw.headers, {
        'x-forwarded-host': c.req.header('host') ?? incoming.host,
        'x-forwarded-proto': incoming.protocol.replace(/:$/, ''),
        'x-request-id': c.get('requestId'),
        ...route.upstreamHeaders,
      }),
      ...(body && body.length > 0 && { body }),
    };

    try {
      const upstream = await route.client.send(request, {
        signal: c.req.raw.signal,
        ...(route.timeoutMs !== undefined && { timeoutMs: route.timeoutMs }),
      });
      const response: CachedResponse = {
        status: upstream.status,
        headers: filterHeaders(upstream.headers, RESPONSE_DROP),
        body: upstream.body,
      };

      if (cacheable && isStorable(response)) {
        const stored = safe(() => cache.set(key, response, route.cache.ttlMs));
        if (!stored.success) {
          logger.warn('Response not cached', { url, error: extractErrorInfo(stored.error) });
        }
        return toResponse(response, 'MISS');
      }
      return toResponse(response);
    } catch (error) {
      const mapped = mapUpstreamError(error);
      if (!mapped) {
        throw error;
      }
      logger.warn('Upstream call failed', {
        route: route.path,
        url,
        status: mapped.status,
        error: extractErrorInfo(error),
      });
      return mapped;
    }
  };
}

/**
 * Response for a failed upstream call, or undefined when the error is not an
 * upstream failure and should reach the application error handler.
 */
export function mapUpstreamError(error: unknown): Response | undefined {
  if (error instanceof CancellationError) {
    return error.reason === 'deadline'
      ? jsonError(504, 'Gateway Timeout', error.message)
      : jsonError(CLIENT_CLOSED_REQUEST, 'Client Closed Request', error.message);
  }

  const status = upstreamStatusOf(error);
  if (status) {
    return toResponse({
      status: status.statusCode,
      headers: filterHeaders(status.headers, RESPONSE_DROP),
      body: status.bodyBytes,
    });
  }

  if (error instanceof RetryExhaustedError || error instanceof TransportError || error instanceof DecodeError) {
    return jsonError(502, 'Bad Gateway', error.message);
  }

  return undefined;
}

export function forwardedHeaders(incoming: Headers, extra: HeaderMap): HeaderMap {
  const connectionScoped = new Set(
    (incoming.get('connection') ?? '')
      .split(',')
      .map(token => token.trim().toLowerCase())
      .filter(Boolean)
  );

  const headers: HeaderMap = {};
  incoming.forEach((value, name) => {
    const lower = name.toLowerCase();
    if (!HOP_BY_HOP.has(lower) && !REQUEST_DROP.has(lower) && !connectionScoped.has(lower)) {
      headers[lower] = value;
    }
  });

  for (const [name, value] of Object.entries(extra)) {
    headers[name.toLowerCase()] = value;
  }
  return headers;
}

function filterHeaders(headers: Readonly<ResponseHeaderMap>, drop: ReadonlySet<string>): ResponseHeaderMap {
  const result: ResponseHeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (!HOP_BY_HOP.has(lower) && !drop.has(lower)) {
      result[lower] = value;
    }
  }
  return result;
}

function toResponse(response: CachedResponse, cacheStatus?: 'HIT' | 'MISS'): Response {
  // 1xx and out-of-range codes cannot be relayed as a final response
  if (response.status < 200 || response.status > 599) {
    return jsonError(502, 'Bad Gateway', `Upstream replied with status ${response.status}`);
  }

  const headers = new Headers();
  for (const [name, value] of Object.entries(response.headers)) {
    if (typeof value === 'string') {
      headers.set(name, value);
    } else {
      for (const item of value) {
        headers.append(name, item);
      }
    }
  }
  if (cacheStatus) {
    headers.set('x-cache', cacheStatus);
  }

  const body = NULL_BODY_STATUSES.has(response.status) ? null : new Uint8Array(response.body);
  return new Response(body, { status: response.status, headers });
}

function jsonError(status: number, error: string, message: string): Response {
  return new Response(JSON.stringify({ success: false, error, message }), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}
