/**
 * logCapture - In-memory log sink for asserting on emitted log lines
 */

import type { LogContext, LogEntry, LogSink } from '@/ui/logging/index.js';

export interface LogCapture {
  sink: LogSink;
  entries: LogEntry[];
  /** Info-level messages, optionally from one component */
  info: (context?: LogContext) => string[];
}

export function captureLogs(): LogCapture {
  const entries: LogEntry[] = [];
  return {
    sink: (entry) => {
      entries.push(entry);
    },
    entries,
    info: (context) =>
      entries
        .filter((entry) => entry.level === 'info' && (context === undefined || entry.context === context))
        .map((entry) => entry.message),
  };
}
