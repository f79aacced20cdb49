import {
  type ConsoleTransportConfig,
  type LogEntry,
  type LogFormat,
  LogLevel,
  type LogTransport,
} from '../types.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m', // Green
  [LogLevel.WARN]: '\x1b[33m', // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
};

const RESET = '\x1b[0m';

/**
 * Console transport for logging to stdout/stderr
 */
export class ConsoleTransport implements LogTransport {
  public readonly name = 'console';
  private readonly format: LogFormat;
  private readonly colors: boolean;

  constructor(config: ConsoleTransportConfig = {}) {
    this.format = config.format ?? 'text';
    this.colors = config.colors ?? true;
  }

  async log(entry: LogEntry): Promise<void> {
    const output = this.render(entry);

    /* eslint-disable no-console */
    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      case LogLevel.INFO:
        console.info(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      default:
        console.error(output);
    }
    /* eslint-enable no-console */
  }

  render(entry: LogEntry): string {
    return this.format === 'json' ? formatJson(entry) : this.formatText(entry);
  }

  private formatText(entry: LogEntry): string {
    const levelName = LogLevel[entry.level];
    const level = this.colors ? `${LEVEL_COLORS[entry.level]}${levelName}${RESET}` : levelName;

    let message = `${entry.timestamp.toISOString()} ${level} [${entry.component}] ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += ` ${safeStringify(entry.data)}`;
    }

    if (entry.error) {
      message += `\n${entry.error.stack ?? entry.error.message}`;
    }

    return message;
  }
}

function formatJson(entry: LogEntry): string {
  return safeStringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevel[entry.level],
    component: entry.component,
    message: entry.message,
    ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  });
}

/**
 * JSON.stringify that renders Errors, bigints and cycles instead of throwing
 */
export function safeStringify(value: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(value, (_key, current: unknown) => {
    if (typeof current === 'bigint') {
      return current.toString();
    }
    if (current instanceof Error) {
      return { name: current.name, message: current.message };
    }
    if (current !== null && typeof current === 'object') {
      if (seen.has(current)) {
        return '[Circular]';
      }
      seen.add(current);
    }
    return current;
  });
}
