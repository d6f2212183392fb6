/**
 * Thrown error types.
 *
 * Only programmer and setup mistakes are thrown: a validator wired to the wrong
 * enumeration, a provider registered under another enumeration, an operation
 * the checker does not support, a configuration that does not parse. Anything
 * that can happen while evaluating conditions is returned as a
 * `ConditionResult` or a boolean instead.
 */

export enum ConditionErrorCodes {
  WIRING_FAULT = 1001,
  PROVIDER_MISMATCH = 1002,
  NOT_SUPPORTED = 1003,
  CONTAINER_INIT = 1004,
}

export class ConditionCheckerError extends Error {
  public readonly code: ConditionErrorCodes;
  public readonly data?: unknown;

  constructor(code: ConditionErrorCodes, message: string, data?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConditionCheckerError';
    this.code = code;
    this.data = data;
  }
}

/** A declared condition handler cannot be turned into a registered condition. */
export class ConditionWiringError extends ConditionCheckerError {
  constructor(handler: string, reason: string, cause?: unknown) {
    super(
      ConditionErrorCodes.WIRING_FAULT,
      `Error registering condition: ${handler} ${reason}`,
      { handler, reason },
      cause === undefined ? undefined : { cause }
    );
    this.name = 'ConditionWiringError';
  }
}

export class ProviderMismatchError extends ConditionCheckerError {
  constructor(expected: readonly (string | number)[], actual: readonly (string | number)[]) {
    super(
      ConditionErrorCodes.PROVIDER_MISMATCH,
      `Provider serves [${actual.join(', ')}] but was registered for [${expected.join(', ')}]`,
      { expected, actual }
    );
    this.name = 'ProviderMismatchError';
  }
}

export class NotSupportedError extends ConditionCheckerError {
  constructor(operation: string) {
    super(ConditionErrorCodes.NOT_SUPPORTED, `${operation} is not supported by this checker`, { operation });
    this.name = 'NotSupportedError';
  }
}

export class ContainerInitError extends ConditionCheckerError {
  constructor(message: string) {
    super(ConditionErrorCodes.CONTAINER_INIT, message);
    this.name = 'ContainerInitError';
  }
}
