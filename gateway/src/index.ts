/**
 * Switchyard gateway: Hono application, proxy routes, response cache and server
 */

export { createGateway, type Gateway, type GatewayOptions } from './app.js';
export { startGateway, registerSignalHandlers, type RunningGateway } from './server.js';
export {
  RouteTable,
  normalizePath,
  upstreamUrl,
  type ProxyRoute,
  type RouteTableOptions,
} from './routes/route-table.js';
export { CLIENT_CLOSED_REQUEST, forwardRequest, forwardedHeaders, mapUpstreamError, resolveRoute } from './routes/proxy.js';
export { healthRoutes } from './routes/health.js';
export { structuredLogging } from './middleware/logging.js';
export { methodFilter } from './middleware/methods.js';
export {
  MemoryResponseCache,
  cacheKey,
  isSharedRequest,
  isStorable,
  type CacheStats,
  type CachedResponse,
  type ResponseCache,
} from './cache/response-cache.js';
export type { GatewayEnv, GatewayVariables } from './types.js';
