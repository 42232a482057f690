/**
 * Logging Types
 *
 * Type definitions for the dock engine's logging system.
 */

/** Log severity levels, most severe first */
export enum LogLevel {
  Exception = 0,
  Error = 1,
  Warn = 2,
  Info = 3,
  Verbose = 4,
}

/** Log level display names */
export const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.Exception]: 'EXCEPTION',
  [LogLevel.Error]: 'ERROR',
  [LogLevel.Warn]: 'WARN',
  [LogLevel.Info]: 'INFO',
  [LogLevel.Verbose]: 'VERBOSE',
};

/** A single log entry */
export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

/** Logger interface */
export interface Logger {
  exception: (error: Error, context?: string) => void;
  error: (messageFactory: () => string, data?: unknown) => void;
  warn: (messageFactory: () => string, data?: unknown) => void;
  info: (messageFactory: () => string, data?: unknown) => void;
  verbose: (messageFactory: () => string, data?: unknown) => void;
  log: (level: LogLevel, messageFactory: () => string, data?: unknown) => void;
}

/** Receives every log entry that passes the level and concern filters */
export type LogSink = (entry: LogEntry) => void;

/** Minimal key-value store the concern settings persist to (localStorage-compatible) */
export interface ConcernStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
}

/** Console controller installed as `globalThis.docklog` */
export interface LogConcernsControl {
  enable: (concern: string) => void;
  disable: (concern: string) => void;
  list: () => void;
  level: (name: string) => void;
  reset: () => void;
}
