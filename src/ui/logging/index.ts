/**
 * Logging utilities for mixcast.
 */

export {
  createLogger,
  enableDebugLogging,
  isDebugEnabled,
  stderrSink,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type Logger,
} from './logger.js';
