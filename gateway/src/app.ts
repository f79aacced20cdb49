import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { requestId } from 'hono/request-id';

import type { GatewayConfig } from '@switchyard/configuration';
import { AxiosTransport, type AttemptObserver, type Transport } from '@switchyard/http-client';
import type { Logger } from '@switchyard/logging';
import type { RandomSource } from '@switchyard/retry';

import { MemoryResponseCache, type ResponseCache } from './cache/response-cache.js';
import { structuredLogging } from './middleware/logging.js';
import { methodFilter } from './middleware/methods.js';
import { healthRoutes } from './routes/health.js';
import { forwardRequest, resolveRoute } from './routes/proxy.js';
import { RouteTable } from './routes/route-table.js';
import type { GatewayEnv } from './types.js';

export interface GatewayOptions {
  config: GatewayConfig;
  logger: Logger;
  /** Defaults to an axios transport built from the `upstream` section */
  transport?: Transport;
  cache?: ResponseCache;
  /** Jitter source for every route's backoff */
  random?: RandomSource;
  observers?: AttemptObserver[];
}

export interface Gateway {
  app: Hono<GatewayEnv>;
  routes: RouteTable;
  cache: ResponseCache;
}

export function createGateway(options: GatewayOptions): Gateway {
  const { config, logger } = options;
  const transport =
    options.transport ??
    new AxiosTransport({
      timeoutMs: config.upstream.request_timeout,
      maxRedirects: config.upstream.max_redirects,
      userAgent: config.upstream.user_agent,
    });
  const cache = options.cache ?? new MemoryResponseCache();
  const routes = RouteTable.fromConfig(config, {
    transport,
    logger,
    ...(options.random && { random: options.random }),
    ...(options.observers && { observers: options.observers }),
  });

  const app = new Hono<GatewayEnv>();

  // Request ID must come first; the logging middleware reads it
  app.use('*', requestId());
  app.use('*', structuredLogging(logger));

  if (config.cors.enabled) {
    app.use(
      '*',
      cors({
        origin: config.cors.origins.includes('*') ? '*' : config.cors.origins,
        allowMethods: config.cors.methods,
        allowHeaders: config.cors.headers,
        ...(config.cors.max_age !== undefined && { maxAge: config.cors.max_age }),
      })
    );
  }

  // Registered before the proxy chain so it wins over a catch-all route
  app.route('/healthz', healthRoutes(routes));

  app.use('*', resolveRoute(routes));
  app.use('*', methodFilter());
  app.all('*', forwardRequest({ cache }));

  app.notFound(c =>
    c.json(
      {
        success: false,
        error: 'Not Found',
        message: `No route matches ${c.req.path}`,
      },
      404
    )
  );

  app.onError((err, c) => {
    logger.error('Unhandled error', err, {
      requestId: c.get('requestId'),
      path: c.req.path,
      method: c.req.method,
    });

    return c.json(
      {
        success: false,
        error: 'Internal Server Error',
        message: err.message || 'An unexpected error occurred',
      },
      500
    );
  });

  logger.info('Gateway routes registered', {
    routes: routes.list().map(route => `${route.path} -> ${route.target}`),
  });

  return { app, routes, cache };
}
