import { Server } from 'http';
import type { Server as NetServer } from 'net';

import { serve, type ServerType } from '@hono/node-server';

import type { GatewayConfig } from '@switchyard/configuration';
import { safeAsync } from '@switchyard/errors';
import type { Logger } from '@switchyard/logging';

import { createGateway, type Gateway, type GatewayOptions } from './app.js';

export interface RunningGateway extends Gateway {
  server: ServerType;
  /** Stop accepting connections and wait for in-flight requests */
  shutdown(reason?: string): Promise<void>;
}

/**
 * Build the gateway and listen on the configured host and port
 */
export async function startGateway(options: GatewayOptions): Promise<RunningGateway> {
  const { config, logger } = options;
  const gateway = createGateway(options);

  const server = await listen(gateway, config, logger);
  if (server instanceof Server) {
    server.keepAliveTimeout = config.server.idle_timeout;
  }

  let closing: Promise<void> | undefined;
  const shutdown = (reason = 'shutdown'): Promise<void> => {
    if (!closing) {
      closing = closeServer(server, config.server.shutdown_timeout, reason, logger).finally(async () => {
        gateway.cache.close();
        await logger.close();
      });
    }
    return closing;
  };

  return { ...gateway, server, shutdown };
}

function listen(gateway: Gateway, config: GatewayConfig, logger: Logger): Promise<ServerType> {
  return new Promise((resolve, reject) => {
    const server = serve(
      {
        fetch: gateway.app.fetch,
        hostname: config.server.host,
        port: config.server.port,
        serverOptions: {
          requestTimeout: config.server.read_timeout,
          maxHeaderSize: config.server.max_header_bytes,
        },
      },
      info => {
        logger.info(`Gateway listening on http://${config.server.host}:${info.port}`, {
          routes: gateway.routes.size,
        });
        resolve(server);
      }
    );
    const listener: NetServer = server;
    listener.once('error', reject);
  });
}

async function closeServer(server: ServerType, timeoutMs: number, reason: string, logger: Logger): Promise<void> {
  logger.info(`Received ${reason}, shutting down gracefully...`, { timeoutMs });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      if (server instanceof Server) {
        server.closeAllConnections();
      }
      reject(new Error(`Gateway shutdown timeout after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  const listener: NetServer = server;
  const closed = new Promise<void>((resolve, reject) => {
    listener.close(err => (err ? reject(err) : resolve()));
  });

  try {
    await Promise.race([closed, timeout]);
    logger.info('Gateway stopped');
  } finally {
    clearTimeout(timer);
  }
}

/**
 * SIGINT/SIGTERM trigger a graceful shutdown, then exit
 */
export function registerSignalHandlers(gateway: RunningGateway, logger: Logger): void {
  const gracefulShutdown = (signal: NodeJS.Signals): void => {
    safeAsync(() => gateway.shutdown(signal)).then(result => {
      if (!result.success) {
        logger.error('Error during graceful shutdown', result.error);
      }
      process.exit(result.success ? 0 : 1);
    });
  };

  process.once('SIGINT', gracefulShutdown);
  process.once('SIGTERM', gracefulShutdown);
}
