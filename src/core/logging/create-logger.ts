import 'reflect-metadata';
import pino from 'pino';
import { singleton } from 'tsyringe';
import type { Logger, ILoggerFactory } from './types.js';
import { logLevelFromEnv } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Create the root pino logger instance.
 * - Sync JSON output to stderr; stdout belongs to the embedding application
 * - Redaction of secrets carried in contexts and subjects
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: logLevelFromEnv(),

      redact: REDACTION_CONFIG,

      timestamp: pino.stdTimeFunctions.isoTime,

      // Include error stack traces
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
