/**
 * Context-prefixed logging with an info/debug split.
 *
 * `info` lines are always written. `debug` lines are written only when debug
 * mode is on (`--debug` on the CLI, or MIXCAST_DEBUG=1).
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when the --debug flag is present.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['MIXCAST_DEBUG'] === '1';
}

// ============================================================================
// Log Levels & Contexts
// ============================================================================

export type LogLevel = 'info' | 'debug';

/**
 * Component names used as log prefixes.
 */
export type LogContext =
  | 'mixcast'
  | 'server'
  | 'reliable'
  | 'lossy'
  | 'serializer'
  | 'registry'
  | 'client'
  | 'session'
  | 'cli';

/**
 * A single emitted log line, handed to the sink.
 */
export interface LogEntry {
  context: LogContext;
  level: LogLevel;
  message: string;
}

/**
 * Destination for log lines. The default sink writes to stderr so stdout stays
 * free for command output.
 */
export type LogSink = (entry: LogEntry) => void;

export const stderrSink: LogSink = (entry) => {
  console.error(`[${entry.context}] ${entry.message}`);
};

// ============================================================================
// Logger
// ============================================================================

export interface Logger {
  /** Always shown: milestones, rejected input, failures. */
  info: (message: string) => void;
  /** Shown only in debug mode: per-command traces. */
  debug: (message: string) => void;
  /** Shorthand for debug. */
  (message: string): void;
}

/**
 * Create a logger instance for a component.
 *
 * @param context - Component name used as the line prefix
 * @param sink - Where lines go; tests pass a capturing sink
 *
 * @example
 * ```typescript
 * const log = createLogger('lossy');
 * log.info('Dropped malformed datagram from 127.0.0.1:50123');
 * log.debug('Submitted set_track_volume');
 * ```
 */
export function createLogger(context: LogContext, sink: LogSink = stderrSink): Logger {
  const logMessage = (message: string, level: LogLevel): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    sink({ context, level, message });
  };

  const logger = ((message: string) => logMessage(message, 'debug')) as Logger;
  logger.info = (message: string) => logMessage(message, 'info');
  logger.debug = (message: string) => logMessage(message, 'debug');

  return logger;
}
