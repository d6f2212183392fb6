/**
 * Outcome of evaluating a condition.
 *
 * `success` is tri-state: `true`, `false`, or `undefined` when the predicate
 * could not decide. Only `true` counts as passing; everything else is
 * reported as a failure and should carry a `message`.
 */
export class ConditionResult {
  readonly success: boolean | undefined;
  /** The value the predicate examined or produced, kept for diagnostics. */
  readonly result: unknown;
  readonly message: string;

  constructor(success: boolean | undefined, result: unknown, message = '') {
    this.success = success;
    this.result = result;
    this.message = message;
    Object.freeze(this);
  }

  get passed(): boolean {
    return this.success === true;
  }

  static toSuccess(result: unknown, message = ''): ConditionResult {
    return new ConditionResult(true, result, message);
  }

  static toFailure(result: unknown, message: string): ConditionResult {
    return new ConditionResult(false, result, message);
  }

  /** Failure without an examined value: lookups that found nothing, faults. */
  static toError(message: string): ConditionResult {
    return new ConditionResult(false, undefined, message);
  }

  static toUnknown(result: unknown, message: string): ConditionResult {
    return new ConditionResult(undefined, result, message);
  }

  toString(): string {
    return `Success: ${String(this.success)}, Message: ${this.message}, Result: ${String(this.result)}`;
  }
}
