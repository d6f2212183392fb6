import { ZodType } from 'zod';
import type { ConditionOutcome } from '../../domain/condition.js';
import type { ContextObject, TypeSchema } from '../../domain/context-object.js';
import type { KindEnum } from '../../domain/kinds.js';
import { ConditionWiringError } from '../../core/error-handler.js';

export type ConditionHandler<TValue, TSubject> = (
  context: ContextObject<TValue, TSubject>
) => ConditionOutcome | Promise<ConditionOutcome>;

/**
 * Declarative registration of one handler under one kind.
 *
 * ```typescript
 * condition({
 *   name: 'validateHasItems',
 *   kinds: OrderKinds,
 *   kind: OrderKinds.HasItems,
 *   valueType: z.number(),
 *   message: 'Order has no items',
 *   handle: (ctx) => (ctx.subject?.items.length ?? 0) > 0,
 * });
 * ```
 */
export interface ConditionHandlerDescriptor<TValue, TSubject> {
  /** Handler name; wiring errors and debug logs refer to it. */
  readonly name: string;
  /** Must be the validator's own enumeration. */
  readonly kinds: KindEnum;
  readonly kind: string | number;
  /** Type of `value` the handler works with. Handlers without one are skipped. */
  readonly valueType?: TypeSchema<TValue>;
  /** Failure message when the handler returns `false`. */
  readonly message?: string;
  /** Comparison operand injected into every evaluation when it parses as `valueType`. */
  readonly value?: unknown;
  /** Resolve the subject by id when the context carries none. Defaults to true. */
  readonly cacheable?: boolean;
  readonly handle: ConditionHandler<TValue, TSubject>;
}

/**
 * What a described condition needs from its validator at evaluation time.
 */
export interface SubjectBinding<TSubject> {
  readonly subjectType: TypeSchema<TSubject>;
  mapTo<TValue>(
    filter: ContextObject<TValue, TSubject>,
    source: ContextObject
  ): Promise<ContextObject<TValue, TSubject>>;
}

/**
 * A descriptor with its value type closed over, so descriptors of different
 * value types can sit in one list.
 */
export interface DescribedCondition<TSubject> {
  readonly name: string;
  readonly kinds: KindEnum;
  readonly kind: string | number;
  readonly message: string;
  readonly cacheable: boolean;
  /** False when the descriptor declares no value type. */
  readonly registrable: boolean;
  evaluate(source: ContextObject, binding: SubjectBinding<TSubject>): Promise<ConditionOutcome>;
}

/**
 * @throws {ConditionWiringError} when `handle` is not a function or `valueType` is not a zod schema
 */
export function condition<TValue, TSubject>(
  descriptor: ConditionHandlerDescriptor<TValue, TSubject>
): DescribedCondition<TSubject> {
  const { name, kinds, kind, valueType, value, handle } = descriptor;
  const cacheable = descriptor.cacheable ?? true;

  if (typeof handle !== 'function') {
    throw new ConditionWiringError(name, 'must be a function taking a ContextObject');
  }
  if (valueType !== undefined && !(valueType instanceof ZodType)) {
    throw new ConditionWiringError(name, 'declares a value type that is not a zod schema');
  }

  return {
    name,
    kinds,
    kind,
    message: descriptor.message ?? '',
    cacheable,
    registrable: valueType !== undefined,

    async evaluate(source, binding) {
      if (valueType === undefined) {
        throw new ConditionWiringError(name, 'has no value type and cannot be evaluated');
      }

      let filter = source.narrow(valueType, binding.subjectType);

      if (value !== undefined) {
        const parsed = valueType.safeParse(value);
        if (parsed.success) filter = filter.withValue(parsed.data);
      }

      if (cacheable) {
        filter = await binding.mapTo(filter, source);
      }

      return handle(filter);
    },
  };
}
