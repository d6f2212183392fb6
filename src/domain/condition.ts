import { ConditionResult } from './condition-result.js';
import { ContextObject } from './context-object.js';
import type { TypeSchema } from './context-object.js';
import { errorMessageOf } from '../errors/formatter.js';

/**
 * Anything a predicate may hand back. A bare boolean is wrapped into a
 * result; a `ConditionResult` is passed through.
 */
export type ConditionOutcome = boolean | ConditionResult;

export type ConditionPredicate<TContext> = (context: TContext) => ConditionOutcome | Promise<ConditionOutcome>;

export interface ICondition {
  /** Diagnostic label. Conditions are looked up by kind, never by name. */
  readonly name: string;
  readonly errorMessage?: string;

  /** Total: every fault is reported through the returned result. */
  evaluate(context?: unknown): Promise<ConditionResult>;
}

/**
 * Declared context type of a condition.
 *
 * `fromId` is only offered by the generic context object: a bare identifier
 * (or nothing) can be turned into one, but not into an arbitrary shape.
 */
export interface ContextType<TContext> {
  readonly name: string;
  readonly is: (value: unknown) => value is TContext;
  readonly fromId?: (id: string | undefined) => TContext;
}

export const CONTEXT_OBJECT_TYPE: ContextType<ContextObject> = {
  name: 'ContextObject',
  is: (value: unknown): value is ContextObject => value instanceof ContextObject,
  fromId: (id) => ContextObject.from(id),
};

/** Context type for conditions that take a plain shape rather than a ContextObject. */
export function contextTypeOf<T>(name: string, schema: TypeSchema<T>): ContextType<T> {
  return {
    name,
    is: (value: unknown): value is T => schema.safeParse(value).success,
  };
}

export abstract class BaseCondition implements ICondition {
  protected constructor(
    readonly name: string,
    readonly errorMessage?: string
  ) {}

  abstract evaluate(context?: unknown): Promise<ConditionResult>;
}

/**
 * Condition backed by a function.
 *
 * ```typescript
 * const hasId = LambdaCondition.of('HasId', (ctx) => ctx.id !== undefined, 'Id is missing');
 * provider.register(Kinds.HasId, hasId);
 * ```
 */
export class LambdaCondition<TContext = ContextObject> extends BaseCondition {
  constructor(
    name: string,
    private readonly contextType: ContextType<TContext>,
    private readonly predicate: ConditionPredicate<TContext>,
    errorMessage?: string
  ) {
    super(name, errorMessage);
  }

  /** Condition over the generic context object; accepts bare ids too. */
  static of(name: string, predicate: ConditionPredicate<ContextObject>, errorMessage?: string): LambdaCondition {
    return new LambdaCondition(name, CONTEXT_OBJECT_TYPE, predicate, errorMessage);
  }

  async evaluate(context?: unknown): Promise<ConditionResult> {
    try {
      if (this.contextType.is(context)) {
        return await this.run(context);
      }

      const fromId = this.contextType.fromId;
      if (fromId && (typeof context === 'string' || context === undefined || context === null)) {
        return await this.run(fromId(context ?? undefined));
      }

      return ConditionResult.toError(
        `Invalid context type: ${describeType(context)}, expected ${this.contextType.name}`
      );
    } catch (error) {
      return ConditionResult.toError(`An error occurred: ${errorMessageOf(error)}`);
    }
  }

  private async run(context: TContext): Promise<ConditionResult> {
    const outcome = await this.predicate(context);
    if (typeof outcome !== 'boolean') return outcome;

    return outcome
      ? ConditionResult.toSuccess(outcome)
      : ConditionResult.toFailure(outcome, this.errorMessage ?? `${this.name} failed`);
  }
}

/**
 * Evaluates any `ICondition`, including third-party ones that break the
 * "never throws" contract, and always yields a result.
 */
export async function evaluateCondition(condition: ICondition, context: unknown): Promise<ConditionResult> {
  try {
    return await condition.evaluate(context);
  } catch (error) {
    return ConditionResult.toError(`An error occurred: ${errorMessageOf(error)}`);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}
