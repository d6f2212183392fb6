/**
 * Checker configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigIssue, ConfigInvalidError } from '../errors/app-error.js';

// =============================================================================
// Config shape
// =============================================================================

/**
 * How `getConditionHistory` treats earlier calls.
 * - `single_shot`: every call returns only its own evaluation
 * - `accumulate`: results are retained per kind, newest last, capped at `limit`
 */
export type HistoryMode = { readonly kind: 'single_shot' } | { readonly kind: 'accumulate'; readonly limit: number };

export interface CheckerConfig {
  /** Used by `checkConditionWithTimeout` when the caller passes no timeout. */
  readonly timeoutMs: number;
  readonly retry: {
    readonly attempts: number;
    readonly delayMs: number;
  };
  readonly history: HistoryMode;
}

export interface AppConfig {
  readonly checker: CheckerConfig;
}

export const DEFAULT_CHECKER_CONFIG: CheckerConfig = {
  timeoutMs: 5_000,
  retry: { attempts: 3, delayMs: 100 },
  history: { kind: 'single_shot' },
};

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const HistoryModeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('single_shot') }),
  z.object({ kind: z.literal('accumulate'), limit: z.number().int().min(1).max(10_000) }),
]);

const CheckerConfigSchema = z.object({
  timeoutMs: z.number().int().min(1).max(600_000),
  retry: z.object({
    attempts: z.number().int().min(1).max(100),
    delayMs: z.number().int().min(0).max(60_000),
  }),
  history: HistoryModeSchema,
});

const AppConfigSchema = z.object({ checker: CheckerConfigSchema }).brand<'ValidatedConfig'>();

/** Config that went through `loadConfig` or `createValidatedConfig`. */
export type ValidatedConfig = z.infer<typeof AppConfigSchema>;

function integerFromEnv(name: string, min: number, max: number, fallback: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? undefined : Number(v)))
    .pipe(
      z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .min(min, `${name} must be >= ${min}`)
        .max(max, `${name} must be <= ${max}`)
        .default(fallback)
    );
}

const EnvSchema = z.object({
  CONDITION_CHECKER_TIMEOUT_MS: integerFromEnv('CONDITION_CHECKER_TIMEOUT_MS', 1, 600_000, DEFAULT_CHECKER_CONFIG.timeoutMs),
  CONDITION_CHECKER_RETRY_ATTEMPTS: integerFromEnv('CONDITION_CHECKER_RETRY_ATTEMPTS', 1, 100, DEFAULT_CHECKER_CONFIG.retry.attempts),
  CONDITION_CHECKER_RETRY_DELAY_MS: integerFromEnv('CONDITION_CHECKER_RETRY_DELAY_MS', 0, 60_000, DEFAULT_CHECKER_CONFIG.retry.delayMs),
  CONDITION_CHECKER_HISTORY: z.enum(['single_shot', 'accumulate']).default('single_shot'),
  CONDITION_CHECKER_HISTORY_LIMIT: integerFromEnv('CONDITION_CHECKER_HISTORY_LIMIT', 1, 10_000, 100),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.transform(buildConfig).pipe(AppConfigSchema).safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(parsed.data);
}

/**
 * Tests and local construction only: validates a config built in code.
 * Throws on an invalid value; use `loadConfig` for anything user-supplied.
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return AppConfigSchema.parse(value);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  const history: HistoryMode =
    env.CONDITION_CHECKER_HISTORY === 'accumulate'
      ? { kind: 'accumulate', limit: env.CONDITION_CHECKER_HISTORY_LIMIT }
      : { kind: 'single_shot' };

  return {
    checker: {
      timeoutMs: env.CONDITION_CHECKER_TIMEOUT_MS,
      retry: {
        attempts: env.CONDITION_CHECKER_RETRY_ATTEMPTS,
        delayMs: env.CONDITION_CHECKER_RETRY_DELAY_MS,
      },
      history,
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
