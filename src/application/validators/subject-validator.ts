import { LambdaCondition, CONTEXT_OBJECT_TYPE } from '../../domain/condition.js';
import type { ContextObject, TypeSchema } from '../../domain/context-object.js';
import type { KindEnum, KindOf } from '../../domain/kinds.js';
import { isMember, kindName } from '../../domain/kinds.js';
import type { IConditionChecker } from '../services/condition-checker.js';
import { ConditionWiringError } from '../../core/error-handler.js';
import { errorMessageOf } from '../../errors/formatter.js';
import { BaseValidator } from './base-validator.js';
import { condition } from './condition-handlers.js';
import type {
  ConditionHandler,
  ConditionHandlerDescriptor,
  DescribedCondition,
  SubjectBinding,
} from './condition-handlers.js';

export interface RegisterConditionOptions<TValue> {
  readonly valueType: TypeSchema<TValue>;
  readonly value?: unknown;
  /** Resolve the subject by id before calling the handler. Defaults to false. */
  readonly cacheable?: boolean;
}

/**
 * Validator over a subject that can be looked up by id.
 *
 * Conditions come from two places, registered in this order:
 * 1. `describeConditions()`: declarative handler descriptors
 * 2. `initializeConditions()`: hand-written `registerCondition` calls
 *
 * Subjects are resolved lazily and at most once per context object, and only
 * for handlers marked `cacheable`.
 *
 * ```typescript
 * class OrderValidator extends SubjectValidator<typeof OrderKinds, Order> {
 *   constructor(checker: IConditionChecker, private readonly orders: OrderRepository) {
 *     super(checker, OrderKinds, OrderSchema);
 *   }
 *
 *   protected describeConditions() {
 *     return [
 *       this.handler({
 *         name: 'validateHasItems',
 *         kinds: OrderKinds,
 *         kind: OrderKinds.HasItems,
 *         valueType: z.unknown(),
 *         message: 'Order has no items',
 *         handle: (ctx) => (ctx.subject?.items.length ?? 0) > 0,
 *       }),
 *     ];
 *   }
 *
 *   protected initializeConditions(): void {}
 *
 *   protected resolve(id: string) {
 *     return this.orders.findById(id);
 *   }
 * }
 * ```
 */
export abstract class SubjectValidator<E extends KindEnum, TSubject>
  extends BaseValidator<E>
  implements SubjectBinding<TSubject>
{
  readonly subjectType: TypeSchema<TSubject>;
  private readonly resolved = new WeakMap<ContextObject, Promise<TSubject | undefined>>();

  protected constructor(checker: IConditionChecker, kinds: E, subjectType: TypeSchema<TSubject>) {
    super(checker, kinds);
    this.subjectType = subjectType;
  }

  /** Lookup by id. Returning nothing (or throwing) leaves the subject absent. */
  protected abstract resolve(id: string): Promise<TSubject | null | undefined>;

  /** Runs during construction; handlers may read instance state, this method may not. */
  protected abstract describeConditions(): readonly DescribedCondition<TSubject>[];

  protected override initialize(): void {
    for (const described of this.describeConditions()) {
      this.registerDescribed(described);
    }
    super.initialize();
  }

  /** `condition()` with this validator's subject type filled in. */
  protected handler<TValue>(descriptor: ConditionHandlerDescriptor<TValue, TSubject>): DescribedCondition<TSubject> {
    return condition(descriptor);
  }

  protected registerCondition<TValue>(
    kind: KindOf<E>,
    handle: ConditionHandler<TValue, TSubject>,
    message: string,
    options: RegisterConditionOptions<TValue>
  ): void {
    this.registerDescribed(
      condition({
        name: kindName(this.kinds, kind),
        kinds: this.kinds,
        kind,
        valueType: options.valueType,
        value: options.value,
        message,
        cacheable: options.cacheable ?? false,
        handle,
      })
    );
  }

  /**
   * Attaches the subject for `filter.id` when none is attached yet.
   * The lookup result is shared by every handler evaluated with the same source context.
   */
  async mapTo<TValue>(
    filter: ContextObject<TValue, TSubject>,
    source: ContextObject
  ): Promise<ContextObject<TValue, TSubject>> {
    const id = filter.id;
    if (filter.subject !== undefined || id === undefined) return filter;

    let pending = this.resolved.get(source);
    if (!pending) {
      pending = this.resolveSafely(id);
      this.resolved.set(source, pending);
    }

    const subject = await pending;
    return subject === undefined ? filter : filter.withSubject(subject);
  }

  private registerDescribed(described: DescribedCondition<TSubject>): void {
    if (!described.registrable) {
      this.logger.debug({ handler: described.name }, 'Handler declares no value type, skipped');
      return;
    }
    if (described.kinds !== this.kinds) {
      throw new ConditionWiringError(described.name, "must target the validator's kind enumeration");
    }

    const kind = described.kind;
    if (!isMember(this.kinds, kind)) {
      throw new ConditionWiringError(
        described.name,
        `declares kind ${String(kind)}, which is not a member of the validator's kind enumeration`
      );
    }

    const wrapper = new LambdaCondition(
      kindName(this.kinds, kind),
      CONTEXT_OBJECT_TYPE,
      (context) => described.evaluate(context, this),
      described.message || undefined
    );
    this.provider.register(kind, wrapper);
    this.logger.debug({ handler: described.name, kind, cacheable: described.cacheable }, 'Condition registered');
  }

  private async resolveSafely(id: string): Promise<TSubject | undefined> {
    try {
      return (await this.resolve(id)) ?? undefined;
    } catch (error) {
      this.logger.warn({ err: error, id }, `Subject resolution failed: ${errorMessageOf(error)}`);
      return undefined;
    }
  }
}
