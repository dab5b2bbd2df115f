import type { LogLevel } from './types.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LogLevel[];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * DATASTORE_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Anything else falls back to silent.
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}
