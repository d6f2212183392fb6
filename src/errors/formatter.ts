import type { AppError } from './app-error.js';
import { assertNever } from '../runtime/type-helpers.js';

export function formatAppError(error: AppError): string {
  switch (error._tag) {
    case 'ConfigInvalid': {
      const issues = error.issues.length
        ? error.issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n')
        : '  - (no details)';
      return `${error.message}\n\n${issues}`;
    }

    case 'StartupFailed': {
      const base = `Startup failed during ${error.phase}: ${error.message}`;
      return error.cause !== undefined ? `${base}\nCause: ${safeToString(error.cause)}` : base;
    }

    default:
      return assertNever(error);
  }
}

/** Message of a thrown value, whatever was thrown. */
export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return safeToString(error);
}

function safeToString(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
