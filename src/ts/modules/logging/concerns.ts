/**
 * Logging Concerns Module
 *
 * Per-module log filtering, controllable from a devtools console.
 * Enabled concerns persist in a localStorage-like store when the host provides one.
 *
 * Usage (console):
 *   docklog.enable('stack')   - Enable logging for the stack module
 *   docklog.enable('*')       - Enable all modules
 *   docklog.disable('stack')  - Disable stack module logging
 *   docklog.list()            - Show all concerns and their on/off state
 *   docklog.level('info')     - Set global minimum log level
 *   docklog.reset()           - Reset to defaults (all off, level=warn)
 */

import type { ConcernStorage, LogConcernsControl } from './types';
import { LogLevel, LOG_LEVEL_NAMES } from './types';

declare global {
  // eslint-disable-next-line no-var
  var docklog: LogConcernsControl | undefined;
}

const STORAGE_KEY = 'dock:log-concerns';
const LEVEL_STORAGE_KEY = 'dock:log-level';

export const KNOWN_CONCERNS = [
  'dock',
  'stack',
  'tabs',
  'resizable',
  'registry',
  'persistence',
  'tiles',
] as const;

let enabledConcerns: Set<string> = new Set();
let minLevel: LogLevel = LogLevel.Warn;
let storage: ConcernStorage | null = null;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function loadFromStorage(): void {
  if (!storage) return;
  try {
    const stored = storage.getItem(STORAGE_KEY);
    if (stored) {
      const parsed: unknown = JSON.parse(stored);
      if (isStringArray(parsed)) {
        enabledConcerns = new Set(parsed);
      }
    }
    const level = storage.getItem(LEVEL_STORAGE_KEY);
    if (level !== null) {
      const num = parseInt(level, 10);
      if (num >= LogLevel.Exception && num <= LogLevel.Verbose) {
        minLevel = num;
      }
    }
  } catch (e) {
    console.warn('[docklog] ignoring unreadable concern settings', e);
  }
}

function saveToStorage(): void {
  if (!storage) return;
  try {
    storage.setItem(STORAGE_KEY, JSON.stringify([...enabledConcerns]));
    storage.setItem(LEVEL_STORAGE_KEY, String(minLevel));
  } catch (e) {
    console.warn('[docklog] could not persist concern settings', e);
  }
}

export function isConcernEnabled(module: string): boolean {
  return enabledConcerns.has('*') || enabledConcerns.has(module);
}

export function getMinLevel(): LogLevel {
  return minLevel;
}

export function enableConcern(concern: string): void {
  enabledConcerns.add(concern);
  saveToStorage();
  console.info(`[docklog] enabled: ${concern}`);
}

export function disableConcern(concern: string): void {
  enabledConcerns.delete(concern);
  saveToStorage();
  console.info(`[docklog] disabled: ${concern}`);
}

function list(): void {
  console.info(`[docklog] level: ${LOG_LEVEL_NAMES[minLevel]}`);
  console.info('[docklog] concerns:');
  for (const c of KNOWN_CONCERNS) {
    console.info(`  ${isConcernEnabled(c) ? '+' : '-'} ${c}`);
  }
  if (enabledConcerns.has('*')) {
    console.info('  * (all enabled)');
  }
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  exception: LogLevel.Exception,
  error: LogLevel.Error,
  warn: LogLevel.Warn,
  info: LogLevel.Info,
  verbose: LogLevel.Verbose,
};

export function setLogLevel(name: string): void {
  const level = LEVEL_NAMES[name.toLowerCase()];
  if (level === undefined) {
    console.error(`[docklog] unknown level: ${name}. Use: exception, error, warn, info, verbose`);
    return;
  }
  minLevel = level;
  saveToStorage();
  console.info(`[docklog] level set to: ${name}`);
}

export function resetLogConcerns(): void {
  enabledConcerns.clear();
  minLevel = LogLevel.Warn;
  saveToStorage();
}

/**
 * Load persisted concern settings and install the `docklog` console controller.
 * Falls back to `globalThis.localStorage` when no store is given.
 */
export function initLogConcerns(store?: ConcernStorage): void {
  storage = store ?? globalThis.localStorage ?? null;
  loadFromStorage();

  globalThis.docklog = {
    enable: enableConcern,
    disable: disableConcern,
    list,
    level: setLogLevel,
    reset: resetLogConcerns,
  };
}
