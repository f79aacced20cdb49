import { ConsoleTransport } from './transports/console-transport.js';
import { type LogData, type LogEntry, LogLevel, type LogTransport, type LoggerConfig, isLogLevel } from './types.js';

/**
 * Structured logger fanning entries out to its transports.
 *
 * Children share the parent's transports and level. Fields bound to a logger
 * (for example a request id) are merged under the data of every entry it
 * writes.
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component: string;
  private readonly transports: readonly LogTransport[];
  private readonly fields: LogData | undefined;

  constructor(config: LoggerConfig) {
    this.component = config.component;
    this.level = typeof config.level === 'string' ? Logger.parseLogLevel(config.level) : config.level;
    this.transports = config.transports ?? [new ConsoleTransport()];
    this.fields = config.fields;
  }

  /**
   * Logger for a sub-component, named `parent:component`
   */
  child(component: string, fields?: LogData): Logger {
    const bound = this.fields || fields ? { ...this.fields, ...fields } : undefined;
    return new Logger({
      level: this.level,
      component: `${this.component}:${component}`,
      transports: [...this.transports],
      ...(bound && { fields: bound }),
    });
  }

  debug(message: string, data?: LogData): void {
    this.write(LogLevel.DEBUG, message, data);
  }

  info(message: string, data?: LogData): void {
    this.write(LogLevel.INFO, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write(LogLevel.WARN, message, data);
  }

  /** Only `Error` instances are attached; other values are ignored */
  error(message: string, error?: unknown, data?: LogData): void {
    this.write(LogLevel.ERROR, message, data, error instanceof Error ? error : undefined);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getComponent(): string {
    return this.component;
  }

  /**
   * Flush and close every transport that supports it
   */
  async close(): Promise<void> {
    await Promise.all(this.transports.map(transport => transport.close?.()));
  }

  private write(level: LogLevel, message: string, data?: LogData, error?: Error): void {
    if (level < this.level) {
      return;
    }

    const merged = this.fields ? { ...this.fields, ...data } : data;
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      component: this.component,
      message,
      ...(merged && { data: merged }),
      ...(error && { error }),
    };

    for (const transport of this.transports) {
      transport.log(entry).catch((err: unknown) => {
        console.error(`Transport ${transport.name} failed:`, err);
      });
    }
  }

  /**
   * Level name to enum, case-insensitive; `WARNING` is accepted for `WARN`
   */
  static parseLogLevel(level: string): LogLevel {
    const name = level.toUpperCase();
    if (name === 'WARNING') {
      return LogLevel.WARN;
    }
    if (!isLogLevel(name)) {
      throw new Error(`Invalid log level: ${level}`);
    }
    return LogLevel[name];
  }
}
