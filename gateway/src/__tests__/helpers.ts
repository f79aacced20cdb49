import { GatewayConfigSchema, type GatewayConfig, type GatewayConfigInput } from '@switchyard/configuration';
import type { PreparedRequest, ResponseHeaderMap, Transport, TransportResponse } from '@switchyard/http-client';
import { Logger, LogLevel, MemoryTransport } from '@switchyard/logging';

export type StubReply = { status: number; body?: string | Buffer; headers?: ResponseHeaderMap } | Error | 'hang';

type StubHandler = (request: PreparedRequest, index: number) => StubReply;

/**
 * In-process upstream. The handler decides each reply; every request and
 * release is recorded.
 */
export class StubTransport implements Transport {
  readonly requests: PreparedRequest[] = [];
  released = 0;

  constructor(private readonly handler: StubHandler) {}

  async send(request: PreparedRequest, signal: AbortSignal): Promise<TransportResponse> {
    this.requests.push(request);
    const reply = this.handler(request, this.requests.length - 1);

    if (reply instanceof Error) {
      throw reply;
    }
    if (reply === 'hang') {
      return new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted by signal')), { once: true });
      });
    }

    return {
      status: reply.status,
      headers: reply.headers ?? {},
      readBody: async () => (typeof reply.body === 'string' ? Buffer.from(reply.body, 'utf8') : (reply.body ?? Buffer.alloc(0))),
      release: () => {
        this.released++;
      },
    };
  }
}

export function gatewayConfig(overrides: Partial<GatewayConfigInput> = {}): GatewayConfig {
  return GatewayConfigSchema.parse({
    retry: { base_delay: 1, max_attempts: 3 },
    logging: { level: 'DEBUG' },
    routes: [
      {
        path: '/api/example',
        target: 'http://backend.test/hello',
        methods: ['GET', 'POST'],
        upstream_headers: { 'x-gateway': 'switchyard' },
      },
    ],
    ...overrides,
  });
}

export function memoryLogger(): { logger: Logger; logs: MemoryTransport } {
  const logs = new MemoryTransport();
  return { logger: new Logger({ component: 'gateway', level: LogLevel.DEBUG, transports: [logs] }), logs };
}

export const fixedRandom = (): number => 0.5;
