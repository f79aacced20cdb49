import type { MiddlewareHandler } from 'hono';

import type { Logger } from '@switchyard/logging';

import type { GatewayEnv } from '../types.js';

/**
 * Structured request logging for Hono
 *
 * Runs after the requestId middleware. Each request gets a child logger
 * bound to its id, stored on the context as `logger` for handlers.
 */
export function structuredLogging(baseLogger: Logger): MiddlewareHandler<GatewayEnv> {
  return async (c, next) => {
    const startTime = Date.now();
    const requestId = c.get('requestId') || 'unknown';
    const logger = baseLogger.child(`request:${requestId}`, { requestId });

    c.set('logger', logger);

    logger.debug('Request started', {
      method: c.req.method,
      path: c.req.path,
      userAgent: c.req.header('User-Agent') ?? 'unknown',
    });

    await next();

    logger.info('Request completed', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: `${Date.now() - startTime}ms`,
    });
  };
}
