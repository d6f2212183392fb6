import type { KindEnum } from '../../domain/kinds.js';
import { ConditionProvider } from '../services/condition-provider.js';
import type { IConditionChecker } from '../services/condition-checker.js';
import type { Logger } from '../../core/logging/index.js';
import { createBootstrapLogger } from '../../core/logging/index.js';

/**
 * Anything that can put its conditions into a checker.
 */
export interface ValidatorModule {
  readonly name: string;
  register(checker: IConditionChecker): void;
}

/**
 * Owns the provider for one kind enumeration.
 *
 * Construction creates the provider, runs `initialize()` and registers the
 * provider with the given checker. `initialize()` runs inside the base
 * constructor, before subclass fields and parameter properties are assigned:
 * registration code may only capture `this`, not read subclass state.
 */
export abstract class BaseValidator<E extends KindEnum> implements ValidatorModule {
  protected readonly provider: ConditionProvider<E>;
  protected readonly logger: Logger;

  protected constructor(
    protected readonly checker: IConditionChecker,
    readonly kinds: E
  ) {
    this.provider = new ConditionProvider(kinds);
    this.logger = createBootstrapLogger(this.name);

    this.initialize();

    checker.registerProvider(kinds, this.provider);
  }

  get name(): string {
    return this.constructor.name;
  }

  /** Registers the same provider with another checker. */
  register(checker: IConditionChecker): void {
    checker.registerProvider(this.kinds, this.provider);
  }

  protected abstract initializeConditions(): void;

  protected initialize(): void {
    this.initializeConditions();
  }
}
