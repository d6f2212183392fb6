import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, no wrapper.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ kind: 'HasId' }, 'Provider registered');
 *   logger.warn({ err: error }, 'Subject resolution failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * CONDITION_CHECKER_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: silent (a library stays quiet unless asked)
 */
export function logLevelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const level = env['CONDITION_CHECKER_LOG_LEVEL']?.toLowerCase();
  return level !== undefined && isLogLevel(level) ? level : 'silent';
}
