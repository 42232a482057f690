/**
 * Log History
 *
 * Bounded in-memory record of recent log entries, oldest dropped first.
 * Hosts read it to attach a layout trace to bug reports.
 */

import type { LogEntry, LogLevel } from './types';

const MAX_ENTRIES = 500;

const entries: LogEntry[] = [];

export function recordLogEntry(entry: LogEntry): void {
  entries.push(entry);
  if (entries.length > MAX_ENTRIES) {
    entries.splice(0, entries.length - MAX_ENTRIES);
  }
}

export interface LogHistoryFilter {
  /** Only entries at this level or more severe */
  maxLevel?: LogLevel;
  module?: string;
  limit?: number;
}

/** Recent entries, newest last */
export function readLogHistory(filter: LogHistoryFilter = {}): LogEntry[] {
  const matching = entries.filter(
    (entry) =>
      (filter.maxLevel === undefined || entry.level <= filter.maxLevel) &&
      (filter.module === undefined || entry.module === filter.module),
  );
  return filter.limit === undefined ? matching : matching.slice(-filter.limit);
}

export function clearLogHistory(): void {
  entries.length = 0;
}
