import { Hono } from 'hono';

import type { GatewayEnv } from '../types.js';

import type { RouteTable } from './route-table.js';

/**
 * GET /healthz
 */
export function healthRoutes(table: RouteTable): Hono<GatewayEnv> {
  const health = new Hono<GatewayEnv>();

  health.get('/', c => {
    const healthData = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      routes: table.size,
    };

    c.get('logger').debug('Health check data', healthData);

    return c.json(healthData);
  });

  return health;
}
