/**
 * Structured logging with pluggable transports
 */

export {
  LOG_LEVELS,
  LOG_FORMATS,
  LogLevel,
  isLogLevel,
  isLogFormat,
  type LogLevelString,
  type LogFormat,
  type LogEntry,
  type LogTransport,
  type LoggerConfig,
  type ConsoleTransportConfig,
  type LogData,
} from './types.js';

export { Logger } from './logger.js';
export { LoggerFactory, type LoggingOptions } from './factory.js';
export { ConsoleTransport, safeStringify } from './transports/console-transport.js';
export { MemoryTransport } from './transports/memory-transport.js';
