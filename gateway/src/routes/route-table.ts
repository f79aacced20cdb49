/**
 * Route table built from the `routes` section of the gateway configuration
 */

import type { GatewayConfig, RouteConfig } from '@switchyard/configuration';
import { createHttpClient, type AttemptObserver, type HttpClient, type HttpMethod, type Transport } from '@switchyard/http-client';
import type { Logger } from '@switchyard/logging';
import type { RandomSource, RetryPolicy } from '@switchyard/retry';

export interface ProxyRoute {
  /** Normalised prefix, no trailing slash except for the root route */
  readonly path: string;
  readonly target: string;
  readonly methods: readonly HttpMethod[];
  /** Deadline for the whole upstream call, retries included */
  readonly timeoutMs: number | undefined;
  readonly cache: { readonly enabled: boolean; readonly ttlMs: number };
  readonly upstreamHeaders: Readonly<Record<string, string>>;
  readonly client: HttpClient;
}

export interface RouteTableOptions {
  /** Shared by every route's client */
  transport: Transport;
  logger: Logger;
  random?: RandomSource;
  observers?: AttemptObserver[];
}

export class RouteTable {
  private readonly routes: readonly ProxyRoute[];
  // Longest prefix first
  private readonly byLength: readonly ProxyRoute[];

  constructor(routes: ProxyRoute[]) {
    this.routes = Object.freeze([...routes]);
    this.byLength = [...routes].sort((a, b) => b.path.length - a.path.length);
  }

  static fromConfig(config: GatewayConfig, options: RouteTableOptions): RouteTable {
    return new RouteTable(config.routes.map(route => buildRoute(route, config, options)));
  }

  list(): readonly ProxyRoute[] {
    return this.routes;
  }

  get(path: string): ProxyRoute | undefined {
    const normalized = normalizePath(path);
    return this.routes.find(route => route.path === normalized);
  }

  /**
   * Longest route prefix that matches on a segment boundary:
   * `/api` matches `/api` and `/api/users`, never `/apis`.
   */
  match(requestPath: string): ProxyRoute | undefined {
    return this.byLength.find(route => matchesPrefix(route.path, requestPath));
  }

  get size(): number {
    return this.routes.length;
  }
}

function buildRoute(route: RouteConfig, config: GatewayConfig, options: RouteTableOptions): ProxyRoute {
  const path = normalizePath(route.path);
  const policy: RetryPolicy = {
    baseDelayMs: route.retry?.base_delay ?? config.retry.base_delay,
    maxAttempts: route.retry?.max_attempts ?? config.retry.max_attempts,
    maxBackoffMs: route.retry?.max_backoff ?? config.retry.max_backoff,
  };

  return {
    path,
    target: route.target,
    methods: route.methods,
    timeoutMs: route.timeout,
    cache: { enabled: route.cache.enabled, ttlMs: route.cache.ttl },
    upstreamHeaders: route.upstream_headers,
    client: createHttpClient({
      transport: options.transport,
      policy,
      logger: options.logger.child(`route:${path}`),
      ...(options.random && { random: options.random }),
      ...(options.observers && { observers: options.observers }),
    }),
  };
}

export function normalizePath(path: string): string {
  return path.length > 1 ? path.replace(/\/+$/, '') || '/' : path;
}

function matchesPrefix(prefix: string, requestPath: string): boolean {
  if (prefix === '/') {
    return true;
  }
  return requestPath === prefix || requestPath.startsWith(`${prefix}/`);
}

/**
 * Target URL joined with the part of the request path after the route
 * prefix. Query strings of target and request are both kept.
 *
 * `requestPath` is the raw, still percent-encoded path; the remainder is
 * copied without decoding so escapes such as `%25` reach the upstream.
 */
export function upstreamUrl(route: Pick<ProxyRoute, 'path' | 'target'>, requestPath: string, search = ''): string {
  const url = new URL(route.target);
  const remainder = pathRemainder(route.path, requestPath);

  if (remainder && remainder !== '/') {
    url.pathname = url.pathname.replace(/\/$/, '') + remainder;
  } else if (remainder === '/' && !url.pathname.endsWith('/')) {
    url.pathname = `${url.pathname}/`;
  }

  const targetQuery = url.search.replace(/^\?/, '');
  const requestQuery = search.replace(/^\?/, '');
  url.search = [targetQuery, requestQuery].filter(Boolean).join('&');

  return url.toString();
}

/**
 * Drop as many segments as the route prefix has. Matching runs on the
 * decoded path, which has the same segments since `%2F` is never decoded.
 */
function pathRemainder(routePath: string, requestPath: string): string {
  const depth = routePath === '/' ? 0 : routePath.split('/').length - 1;
  const segments = requestPath.split('/');
  return segments.length > depth + 1 ? `/${segments.slice(depth + 1).join('/')}` : '';
}
