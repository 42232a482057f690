/**
 * Logging Module
 *
 * Lazy-evaluated, concern-based logging with console output.
 * Errors and warnings always log. Info/verbose only log for enabled concerns.
 */

export { LogLevel, LOG_LEVEL_NAMES } from './types';
export type { LogEntry, Logger, LogSink, ConcernStorage, LogConcernsControl } from './types';

export { createLogger, formatLogEntry, setLogSink } from './logger';
export { clearLogHistory, readLogHistory } from './history';
export type { LogHistoryFilter } from './history';
export {
  initLogConcerns,
  isConcernEnabled,
  enableConcern,
  disableConcern,
  setLogLevel,
  resetLogConcerns,
  KNOWN_CONCERNS,
} from './concerns';
