import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import type { ICondition } from '../../domain/condition.js';
import { evaluateCondition } from '../../domain/condition.js';
import { ConditionResult } from '../../domain/condition-result.js';
import { ContextObject, isContextObject } from '../../domain/context-object.js';
import type { KindEnum, KindOf } from '../../domain/kinds.js';
import { enumMembers } from '../../domain/kinds.js';
import type { IConditionProvider } from './condition-provider.js';
import { NotSupportedError, ProviderMismatchError } from '../../core/error-handler.js';
import type { Logger, ILoggerFactory } from '../../core/logging/index.js';
import type { CheckerConfig } from '../../config/app-config.js';
import { DEFAULT_CHECKER_CONFIG } from '../../config/app-config.js';
import type { ConditionEvents, ConditionListener, Unsubscribe } from '../../runtime/ports/condition-events.js';
import { InMemoryConditionEvents } from '../../runtime/adapters/in-memory-condition-events.js';
import { DI } from '../../di/tokens.js';

export const ConditionMessages = {
  NOT_FOUND_OR_UNAVAILABLE: 'Condition not found or provider unavailable',
  NOT_FOUND: 'Condition not found',
  UNKNOWN_ERROR: 'Unknown error',
  SUCCESS: 'Success',
} as const;

export interface ConditionCallbacks {
  readonly onSuccess?: (result: ConditionResult) => void | Promise<void>;
  readonly onFailure?: (result: ConditionResult) => void | Promise<void>;
}

/**
 * `available` means "a result, and therefore a message, was obtained".
 * It does NOT mean the condition passed; a failing condition still reports
 * `available: true` with its failure message.
 */
export interface MessageLookup {
  readonly available: boolean;
  readonly message: string;
}

export interface CheckAllDetails<E extends KindEnum> {
  readonly passed: boolean;
  /** Every member: `Success`, the failure message, or `Unknown error` when unregistered. */
  readonly details: ReadonlyMap<KindOf<E>, string>;
}

export interface ConditionsMetReport<E extends KindEnum> {
  readonly passed: boolean;
  readonly failed: ReadonlyMap<KindOf<E>, string>;
}

export type CustomEvaluator = (context: unknown) => boolean | Promise<boolean>;

/**
 * Query surface over every registered kind enumeration.
 *
 * Every operation takes the enumeration object as its first argument; it
 * selects the provider. Evaluation faults and missing registrations come back
 * as `false` or as failure results, never as exceptions.
 */
export interface IConditionChecker {
  registerProvider<E extends KindEnum>(kinds: E, provider: IConditionProvider<E>): void;
  getProvider<E extends KindEnum>(kinds: E): IConditionProvider<E> | undefined;

  check<E extends KindEnum>(kinds: E, kind: KindOf<E>, context?: unknown): Promise<boolean>;
  checkAll<E extends KindEnum>(kinds: E, context?: unknown): Promise<boolean>;
  checkAny<E extends KindEnum>(kinds: E, context?: unknown): Promise<boolean>;
  checkAndResult<E extends KindEnum>(kinds: E, kind: KindOf<E>, context?: unknown): Promise<ConditionResult>;
  checkWithError<E extends KindEnum>(kinds: E, kind: KindOf<E>, context?: unknown): Promise<MessageLookup>;
  checkAllWithDetails<E extends KindEnum>(kinds: E, context?: unknown): Promise<CheckAllDetails<E>>;
  areAllConditionsMet<E extends KindEnum>(kinds: E, context?: unknown): Promise<ConditionsMetReport<E>>;
  checkWithMultipleContexts<E extends KindEnum>(kinds: E, kind: KindOf<E>, contexts: readonly unknown[]): Promise<boolean>;
  checkWithContextualDependencies<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    contexts: readonly unknown[]
  ): Promise<boolean>;
  checkConditionWithTimeout<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context?: unknown,
    timeoutMs?: number
  ): Promise<boolean>;
  evaluateConditionWithRetry<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context?: unknown,
    maxRetries?: number,
    delayMs?: number
  ): Promise<boolean>;
  checkConditionByCustomEvaluator<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context: unknown,
    evaluator: CustomEvaluator
  ): Promise<boolean>;
  checkWithContextData<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context: unknown,
    data: Readonly<Record<string, unknown>>
  ): Promise<boolean>;
  getFailedConditionDetails<E extends KindEnum>(kinds: E, context?: unknown): Promise<Map<KindOf<E>, string>>;
  getConditionHistory<E extends KindEnum>(kinds: E, context?: unknown): Promise<Map<KindOf<E>, ConditionResult[]>>;
  clearConditionHistory(kinds?: KindEnum): void;
  executeConditionWithCallbacks<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context: unknown,
    callbacks?: ConditionCallbacks
  ): Promise<ConditionResult>;
  resetConditionState<E extends KindEnum>(kinds: E, context?: unknown): void;
  areAllConditionsMetWithRetry<E extends KindEnum>(
    kinds: E,
    context: unknown,
    maxRetries: number,
    delayMs: number
  ): Promise<boolean>;

  onConditionMet(listener: ConditionListener): Unsubscribe;
  onConditionFailed(listener: ConditionListener): Unsubscribe;
}

/**
 * Holds exactly one provider per kind enumeration and aggregates over them.
 *
 * Providers are expected to be registered during setup. Registering while
 * evaluations are in flight is not guarded; callers serialise that themselves.
 */
@injectable()
export class ConditionChecker implements IConditionChecker {
  private readonly providers = new Map<KindEnum, IConditionProvider<KindEnum>>();
  private readonly history = new Map<KindEnum, Map<string | number, ConditionResult[]>>();
  private readonly events: ConditionEvents;
  protected readonly logger: Logger;

  constructor(
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory,
    @inject(DI.Config.Checker) private readonly config: CheckerConfig = DEFAULT_CHECKER_CONFIG
  ) {
    this.logger = loggerFactory.create('ConditionChecker');
    this.events = new InMemoryConditionEvents(loggerFactory.create('ConditionEvents'));
  }

  // ═══════════════════════════════════════════════════════════════════
  // REGISTRATION
  // ═══════════════════════════════════════════════════════════════════

  /**
   * Stores the provider for `kinds`, replacing any previous one wholesale.
   * @throws {ProviderMismatchError} when the provider serves another enumeration
   */
  registerProvider<E extends KindEnum>(kinds: E, provider: IConditionProvider<E>): void {
    const served = provider.kinds;
    if (!provider.servesKinds<KindEnum>(kinds)) {
      throw new ProviderMismatchError(enumMembers(kinds), enumMembers(served));
    }

    const replaced = this.providers.has(kinds);
    this.providers.set(kinds, provider);
    this.logger.debug(
      { members: enumMembers(kinds).length, registeredKinds: provider.getKinds().length, replaced },
      'Provider registered'
    );
  }

  getProvider<E extends KindEnum>(kinds: E): IConditionProvider<E> | undefined {
    const provider = this.providers.get(kinds);
    if (provider === undefined || !provider.servesKinds(kinds)) return undefined;
    return provider;
  }

  // ═══════════════════════════════════════════════════════════════════
  // SINGLE KIND
  // ═══════════════════════════════════════════════════════════════════

  async check<E extends KindEnum>(kinds: E, kind: KindOf<E>, context?: unknown): Promise<boolean> {
    const provider = this.getProvider(kinds);
    if (!provider) return false;
    const result = await provider.check(kind, context);
    return result.passed;
  }

  /**
   * First success wins. When nothing passes, the first condition's own failure
   * is returned so its message reaches callers, callbacks and listeners.
   */
  async checkAndResult<E extends KindEnum>(kinds: E, kind: KindOf<E>, context?: unknown): Promise<ConditionResult> {
    const conditions = this.getProvider(kinds)?.getAll(kind) ?? [];
    if (conditions.length === 0) {
      return ConditionResult.toError(ConditionMessages.NOT_FOUND_OR_UNAVAILABLE);
    }

    let firstFailure: ConditionResult | undefined;
    for (const condition of conditions) {
      const result = await evaluateCondition(condition, context);
      if (result.passed) return result;
      if (firstFailure === undefined) firstFailure = result;
    }
    return firstFailure ?? ConditionResult.toError(ConditionMessages.UNKNOWN_ERROR);
  }

  /** Message lookup; see `MessageLookup` for what `available` means. */
  async checkWithError<E extends KindEnum>(kinds: E, kind: KindOf<E>, context?: unknown): Promise<MessageLookup> {
    const result = await this.checkAndResult(kinds, kind, context);
    return { available: true, message: result.message };
  }

  /**
   * True iff the kind's first condition passes for every context.
   * Stops at the first failing context; false when the kind has no condition.
   */
  async checkWithMultipleContexts<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    contexts: readonly unknown[]
  ): Promise<boolean> {
    const condition = this.getProvider(kinds)?.get(kind);
    if (!condition) return false;

    for (const context of contexts) {
      const result = await evaluateCondition(condition, context);
      if (!result.passed) return false;
    }
    return true;
  }

  async checkWithContextualDependencies<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    contexts: readonly unknown[]
  ): Promise<boolean> {
    return this.checkWithMultipleContexts(kinds, kind, contexts);
  }

  /**
   * Races `check` against a timer and returns false when the timer wins.
   *
   * Conditions cannot be cancelled: a timed-out evaluation keeps running in
   * the background and its outcome is discarded.
   */
  async checkConditionWithTimeout<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context?: unknown,
    timeoutMs: number = this.config.timeoutMs
  ): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => {
        this.logger.debug({ kind, timeoutMs }, 'Condition check timed out');
        resolve(false);
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.check(kinds, kind, context), timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Up to `maxRetries` attempts with `delayMs` between consecutive attempts. */
  async evaluateConditionWithRetry<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context?: unknown,
    maxRetries: number = this.config.retry.attempts,
    delayMs: number = this.config.retry.delayMs
  ): Promise<boolean> {
    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      if (await this.check(kinds, kind, context)) return true;

      if (attempt < maxRetries) {
        this.logger.debug({ kind, attempt, maxRetries, delayMs }, 'Condition failed, retrying');
        await delay(delayMs);
      }
    }
    return false;
  }

  /** The evaluator's verdict, provided the kind has a registered condition. */
  async checkConditionByCustomEvaluator<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context: unknown,
    evaluator: CustomEvaluator
  ): Promise<boolean> {
    if (this.getProvider(kinds)?.get(kind) === undefined) return false;
    return evaluator(context);
  }

  /**
   * Evaluates the kind's first condition with `data` merged into the context's
   * extras. A bare id (or no context) becomes a ContextObject first; other
   * context shapes have no extras and are passed through unchanged.
   */
  async checkWithContextData<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context: unknown,
    data: Readonly<Record<string, unknown>>
  ): Promise<boolean> {
    const condition = this.getProvider(kinds)?.get(kind);
    if (!condition) return false;

    const result = await evaluateCondition(condition, withContextData(context, data));
    return result.passed;
  }

  async executeConditionWithCallbacks<E extends KindEnum>(
    kinds: E,
    kind: KindOf<E>,
    context: unknown,
    callbacks: ConditionCallbacks = {}
  ): Promise<ConditionResult> {
    const result = await this.checkAndResult(kinds, kind, context);

    if (result.passed) {
      this.raiseConditionMet(result);
      await callbacks.onSuccess?.(result);
    } else {
      this.raiseConditionFailed(result);
      await callbacks.onFailure?.(result);
    }

    return result;
  }

  // ═══════════════════════════════════════════════════════════════════
  // WHOLE ENUMERATION
  // ═══════════════════════════════════════════════════════════════════

  /**
   * True iff every member that has a condition passes. Members without a
   * condition are left out, so a partially registered enumeration can pass
   * even though some members were never checked.
   */
  async checkAll<E extends KindEnum>(kinds: E, context?: unknown): Promise<boolean> {
    let allPassed = true;
    for (const [, result] of await this.evaluateRegistered(kinds, context)) {
      if (!result.passed) allPassed = false;
    }
    return allPassed;
  }

  /**
   * Declaration order; true at the first passing member. Reaching a member
   * without a condition ends the scan with false, even when a later member
   * would pass. This differs from `checkAll` on purpose.
   */
  async checkAny<E extends KindEnum>(kinds: E, context?: unknown): Promise<boolean> {
    const provider = this.getProvider(kinds);
    if (!provider) return false;

    for (const member of enumMembers(kinds)) {
      const condition = provider.get(member);
      if (!condition) return false;

      const result = await evaluateCondition(condition, context);
      if (result.passed) return true;
    }
    return false;
  }

  async checkAllWithDetails<E extends KindEnum>(kinds: E, context?: unknown): Promise<CheckAllDetails<E>> {
    const details = new Map<KindOf<E>, string>();
    const provider = this.getProvider(kinds);

    if (provider) {
      for (const member of enumMembers(kinds)) {
        const condition = provider.get(member);
        if (!condition) {
          details.set(member, ConditionMessages.UNKNOWN_ERROR);
          continue;
        }
        const result = await evaluateCondition(condition, context);
        details.set(member, result.passed ? ConditionMessages.SUCCESS : failureMessage(result));
      }
    }

    const passed = [...details.values()].every((message) => message === ConditionMessages.SUCCESS);
    return { passed, details };
  }

  /** Like `getFailedConditionDetails`, but members without a condition are skipped. */
  async areAllConditionsMet<E extends KindEnum>(kinds: E, context?: unknown): Promise<ConditionsMetReport<E>> {
    const failed = new Map<KindOf<E>, string>();
    for (const [member, result] of await this.evaluateRegistered(kinds, context)) {
      if (!result.passed) failed.set(member, failureMessage(result));
    }
    return { passed: failed.size === 0, failed };
  }

  /**
   * Failure message per member. Members without a condition report
   * `Condition not found`; passing members are omitted.
   */
  async getFailedConditionDetails<E extends KindEnum>(kinds: E, context?: unknown): Promise<Map<KindOf<E>, string>> {
    const failed = new Map<KindOf<E>, string>();
    const provider = this.getProvider(kinds);
    if (!provider) return failed;

    for (const member of enumMembers(kinds)) {
      const condition = provider.get(member);
      if (!condition) {
        failed.set(member, ConditionMessages.NOT_FOUND);
        continue;
      }
      const result = await evaluateCondition(condition, context);
      if (!result.passed) failed.set(member, failureMessage(result));
    }
    return failed;
  }

  /**
   * Results per registered member.
   *
   * In `single_shot` mode each call returns one entry per member, from this
   * call only. In `accumulate` mode results are retained across calls (oldest
   * first, capped at the configured limit) until `clearConditionHistory`.
   */
  async getConditionHistory<E extends KindEnum>(kinds: E, context?: unknown): Promise<Map<KindOf<E>, ConditionResult[]>> {
    const evaluated = await this.evaluateRegistered(kinds, context);
    const mode = this.config.history;

    if (mode.kind === 'single_shot') {
      const history = new Map<KindOf<E>, ConditionResult[]>();
      for (const [member, result] of evaluated) history.set(member, [result]);
      return history;
    }

    let retained = this.history.get(kinds);
    if (!retained) {
      retained = new Map<string | number, ConditionResult[]>();
      this.history.set(kinds, retained);
    }

    const history = new Map<KindOf<E>, ConditionResult[]>();
    for (const [member, result] of evaluated) {
      const entries = [...(retained.get(member) ?? []), result].slice(-mode.limit);
      retained.set(member, entries);
      history.set(member, [...entries]);
    }
    return history;
  }

  /** Drops retained history for one enumeration, or for all of them. */
  clearConditionHistory(kinds?: KindEnum): void {
    if (kinds === undefined) {
      this.history.clear();
    } else {
      this.history.delete(kinds);
    }
  }

  // ═══════════════════════════════════════════════════════════════════
  // NOT SUPPORTED
  // ═══════════════════════════════════════════════════════════════════

  /** @throws {NotSupportedError} always */
  resetConditionState<E extends KindEnum>(_kinds: E, _context?: unknown): void {
    throw new NotSupportedError('resetConditionState');
  }

  /** Always rejects with NotSupportedError. */
  async areAllConditionsMetWithRetry<E extends KindEnum>(
    _kinds: E,
    _context: unknown,
    _maxRetries: number,
    _delayMs: number
  ): Promise<boolean> {
    throw new NotSupportedError('areAllConditionsMetWithRetry');
  }

  // ═══════════════════════════════════════════════════════════════════
  // NOTIFICATIONS
  // ═══════════════════════════════════════════════════════════════════

  onConditionMet(listener: ConditionListener): Unsubscribe {
    return this.events.onConditionMet(listener);
  }

  onConditionFailed(listener: ConditionListener): Unsubscribe {
    return this.events.onConditionFailed(listener);
  }

  protected raiseConditionMet(result: ConditionResult): void {
    this.events.emit({ kind: 'condition_met', result, source: this });
  }

  protected raiseConditionFailed(result: ConditionResult): void {
    this.events.emit({ kind: 'condition_failed', result, source: this });
  }

  // ═══════════════════════════════════════════════════════════════════
  // INTERNAL
  // ═══════════════════════════════════════════════════════════════════

  /** Every member with a condition, in declaration order, evaluated once. */
  private async evaluateRegistered<E extends KindEnum>(
    kinds: E,
    context: unknown
  ): Promise<Array<[KindOf<E>, ConditionResult]>> {
    const provider = this.getProvider(kinds);
    if (!provider) return [];

    const evaluated: Array<[KindOf<E>, ConditionResult]> = [];
    for (const member of enumMembers(kinds)) {
      const condition: ICondition | undefined = provider.get(member);
      if (!condition) continue;
      evaluated.push([member, await evaluateCondition(condition, context)]);
    }
    return evaluated;
  }
}

function failureMessage(result: ConditionResult): string {
  return result.message || ConditionMessages.UNKNOWN_ERROR;
}

function withContextData(context: unknown, data: Readonly<Record<string, unknown>>): unknown {
  if (isContextObject(context)) return context.withExtras(data);
  if (typeof context === 'string' || context === undefined || context === null) {
    return ContextObject.from(context).withExtras(data);
  }
  return context;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
