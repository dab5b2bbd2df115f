import pino from 'pino';
import { inject, injectable } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Root pino logger: JSON on stderr, synchronous, secrets redacted.
 * stdout is left to CLI output.
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Creates one child logger per component. The container caches one instance.
 */
@injectable()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.LogLevel) level: LogLevel) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}

/**
 * Factory over an existing logger. Tests pass `pino({ level: 'silent' })`.
 */
export class FixedLoggerFactory implements ILoggerFactory {
  constructor(readonly root: Logger) {}

  create(component: string): Logger {
    return this.root.child({ component });
  }
}
