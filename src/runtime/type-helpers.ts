/**
 * Exhaustiveness helper for discriminated unions.
 * Put it in the `default` branch of a `switch` so a new union member is a compile error.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
