/**
 * Logger Module
 *
 * The messageFactory lambda only runs when the entry will be kept.
 *
 * Every kept entry goes to the history and then to the sink. Errors and
 * warnings are always kept; info and verbose only for concerns enabled via
 * docklog.enable().
 */

import type { LogEntry, Logger, LogSink } from './types';
import { LogLevel, LOG_LEVEL_NAMES } from './types';
import { getMinLevel, isConcernEnabled } from './concerns';
import { recordLogEntry } from './history';

export function formatLogEntry(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toISOString().slice(11, 23);
  return `[${time}] [${LOG_LEVEL_NAMES[entry.level]}] [${entry.module}] ${entry.message}`;
}

const consoleSink: LogSink = (entry) => {
  const formatted = formatLogEntry(entry);
  const data = entry.data ?? '';
  switch (entry.level) {
    case LogLevel.Exception:
    case LogLevel.Error:
      console.error(formatted, data);
      break;
    case LogLevel.Warn:
      console.warn(formatted, data);
      break;
    case LogLevel.Info:
      console.info(formatted, data);
      break;
    case LogLevel.Verbose:
      console.debug(formatted, data);
      break;
  }
};

let sink: LogSink = consoleSink;

/** Route entries somewhere other than the console; null restores the console */
export function setLogSink(next: LogSink | null): void {
  sink = next ?? consoleSink;
}

function shouldLog(level: LogLevel, module: string): boolean {
  if (level > getMinLevel()) return false;
  return level <= LogLevel.Warn || isConcernEnabled(module);
}

function emit(level: LogLevel, module: string, message: string, data?: unknown): void {
  const entry: LogEntry = { timestamp: Date.now(), level, module, message, data };
  recordLogEntry(entry);
  sink(entry);
}

export function createLogger(module: string): Logger {
  const log = (level: LogLevel, messageFactory: () => string, data?: unknown): void => {
    if (!shouldLog(level, module)) return;
    emit(level, module, messageFactory(), data);
  };

  return {
    exception(error: Error, context?: string): void {
      // Exceptions bypass the level filter
      const message = context ? `${context}: ${error.message}` : error.message;
      emit(LogLevel.Exception, module, message, { name: error.name, stack: error.stack });
    },
    error: (messageFactory, data) => log(LogLevel.Error, messageFactory, data),
    warn: (messageFactory, data) => log(LogLevel.Warn, messageFactory, data),
    info: (messageFactory, data) => log(LogLevel.Info, messageFactory, data),
    verbose: (messageFactory, data) => log(LogLevel.Verbose, messageFactory, data),
    log,
  };
}
