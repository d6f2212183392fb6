import pino from 'pino';
import type { Logger } from './types.js';
import { logLevelFromEnv } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Bootstrap logger for code that runs BEFORE the DI container exists:
 * - container.ts during initialization
 * - ValidatorRegistry at startup
 * - validators constructed by hand
 *
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: logLevelFromEnv(),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
        serializers: {
          err: pino.stdSerializers.err,
        },
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
