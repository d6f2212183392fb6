import type { ICondition } from '../../domain/condition.js';
import { evaluateCondition } from '../../domain/condition.js';
import { ConditionResult } from '../../domain/condition-result.js';
import type { KindEnum, KindOf } from '../../domain/kinds.js';
import { kindName } from '../../domain/kinds.js';

/**
 * Registry of conditions for one kind enumeration.
 *
 * Conditions are kept per kind in registration order; order is significant
 * because `check` is first-success-wins. A kind with no conditions is a valid
 * empty state, never an error.
 */
export interface IConditionProvider<E extends KindEnum> {
  /** The enumeration this provider serves. */
  readonly kinds: E;

  register(kind: KindOf<E>, condition: ICondition): void;
  get(kind: KindOf<E>): ICondition | undefined;
  getAll(kind: KindOf<E>): readonly ICondition[];
  getConditions(kind: KindOf<E>, predicate?: (condition: ICondition) => boolean): readonly ICondition[];
  getAllConditions(): ReadonlyMap<KindOf<E>, readonly ICondition[]>;
  getKinds(): readonly KindOf<E>[];
  getConditionKinds(condition: ICondition): readonly KindOf<E>[];
  where(predicate: (condition: ICondition) => boolean): readonly ICondition[];
  servesKinds<F extends KindEnum>(kinds: F): this is IConditionProvider<F>;

  check(kind: KindOf<E>, context?: unknown): Promise<ConditionResult>;
  anyPass(input?: unknown): AsyncGenerator<ConditionResult, void, undefined>;
}

export class ConditionProvider<E extends KindEnum> implements IConditionProvider<E> {
  private readonly conditions = new Map<KindOf<E>, ICondition[]>();

  constructor(readonly kinds: E) {}

  register(kind: KindOf<E>, condition: ICondition): void {
    const list = this.conditions.get(kind);
    if (list) {
      list.push(condition);
    } else {
      this.conditions.set(kind, [condition]);
    }
  }

  get(kind: KindOf<E>): ICondition | undefined {
    return this.conditions.get(kind)?.[0];
  }

  getAll(kind: KindOf<E>): readonly ICondition[] {
    return [...(this.conditions.get(kind) ?? [])];
  }

  getConditions(kind: KindOf<E>, predicate?: (condition: ICondition) => boolean): readonly ICondition[] {
    const all = this.getAll(kind);
    return predicate ? all.filter(predicate) : all;
  }

  getAllConditions(): ReadonlyMap<KindOf<E>, readonly ICondition[]> {
    const snapshot = new Map<KindOf<E>, readonly ICondition[]>();
    for (const [kind, list] of this.conditions) {
      snapshot.set(kind, [...list]);
    }
    return snapshot;
  }

  getKinds(): readonly KindOf<E>[] {
    return [...this.conditions.keys()];
  }

  getConditionKinds(condition: ICondition): readonly KindOf<E>[] {
    const kinds: KindOf<E>[] = [];
    for (const [kind, list] of this.conditions) {
      if (list.includes(condition)) kinds.push(kind);
    }
    return kinds;
  }

  where(predicate: (condition: ICondition) => boolean): readonly ICondition[] {
    const matches: ICondition[] = [];
    for (const list of this.conditions.values()) {
      for (const condition of list) {
        if (predicate(condition)) matches.push(condition);
      }
    }
    return matches;
  }

  servesKinds<F extends KindEnum>(kinds: F): this is IConditionProvider<F> {
    return Object.is(this.kinds, kinds);
  }

  /**
   * First success wins: conditions run in registration order and evaluation
   * stops at the first passing one.
   */
  async check(kind: KindOf<E>, context?: unknown): Promise<ConditionResult> {
    for (const condition of this.getAll(kind)) {
      const result = await evaluateCondition(condition, context);
      if (result.passed) return result;
    }
    return ConditionResult.toError(`No ${kindName(this.kinds, kind)} conditions passed`);
  }

  /**
   * Lazily yields the successful results of every registered condition across
   * every kind. An array input is treated as a list of contexts, each
   * evaluated against every condition. Call again to restart.
   */
  async *anyPass(input?: unknown): AsyncGenerator<ConditionResult, void, undefined> {
    const contexts: readonly unknown[] = Array.isArray(input) ? input : [input];
    for (const context of contexts) {
      for (const list of this.getAllConditions().values()) {
        for (const condition of list) {
          const result = await evaluateCondition(condition, context);
          if (result.passed) yield result;
        }
      }
    }
  }
}
