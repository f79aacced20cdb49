import type { MiddlewareHandler } from 'hono';

import type { GatewayEnv } from '../types.js';

/**
 * Rejects methods the matched route does not list. OPTIONS always passes so
 * CORS preflights reach the CORS layer and upstream.
 */
export function methodFilter(): MiddlewareHandler<GatewayEnv> {
  return async (c, next) => {
    const method = c.req.method.toUpperCase();
    const { methods } = c.get('route');

    if (method !== 'OPTIONS' && !methods.some(allowed => allowed === method)) {
      return c.text('Method not allowed', 405, { Allow: methods.join(', ') });
    }

    await next();
  };
}
