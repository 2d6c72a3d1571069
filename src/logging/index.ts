/**
 * DNS Console Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  LOG_LEVELS,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  ConsoleLogger,
  createLogger,
  createSilentLogger,
} from "./logger.js";
