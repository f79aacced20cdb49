import type { Logger } from '@switchyard/logging';

import type { ProxyRoute } from './routes/route-table.js';

// Typed context variables shared by middleware and handlers
export type GatewayVariables = {
  logger: Logger;
  requestId: string;
  route: ProxyRoute;
};

export type GatewayEnv = { Variables: GatewayVariables };
