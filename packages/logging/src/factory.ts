import { Logger } from './logger.js';
import { ConsoleTransport } from './transports/console-transport.js';
import { type LogFormat, LogLevel, type LogTransport } from './types.js';

export interface LoggingOptions {
  level: LogLevel | string;
  format?: LogFormat;
  colors?: boolean;
}

/**
 * Factory for creating loggers with common configurations
 */
export class LoggerFactory {
  /**
   * Human-readable console logger
   */
  static createConsoleLogger(component: string, level: LogLevel | string = LogLevel.INFO): Logger {
    return new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLogLevel(level) : level,
      transports: [new ConsoleTransport({ format: 'text', colors: true })],
    });
  }

  /**
   * JSON-per-line console logger for production environments
   */
  static createStructuredLogger(component: string, level: LogLevel | string = LogLevel.INFO): Logger {
    return new Logger({
      component,
      level: typeof level === 'string' ? Logger.parseLogLevel(level) : level,
      transports: [new ConsoleTransport({ format: 'json', colors: false })],
    });
  }

  /**
   * Create a logger from the `logging` section of a configuration file
   */
  static fromConfig(component: string, options: LoggingOptions, extra: LogTransport[] = []): Logger {
    const format = options.format ?? 'text';
    return new Logger({
      component,
      level: typeof options.level === 'string' ? Logger.parseLogLevel(options.level) : options.level,
      transports: [
        new ConsoleTransport({ format, colors: options.colors ?? format === 'text' }),
        ...extra,
      ],
    });
  }
}
