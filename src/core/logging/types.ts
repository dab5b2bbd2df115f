import type { Logger as PinoLogger } from 'pino';

/**
 * pino's Logger, unwrapped. Data first:
 *   logger.info({ path }, 'File stored');
 *   logger.error({ err: error }, 'Operation failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
