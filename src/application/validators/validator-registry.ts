import { ok, err } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { IConditionChecker } from '../services/condition-checker.js';
import type { ValidatorModule } from './base-validator.js';
import { Err } from '../../errors/factories.js';
import type { StartupFailedError } from '../../errors/app-error.js';
import { errorMessageOf } from '../../errors/formatter.js';
import { createBootstrapLogger } from '../../core/logging/index.js';

export type ValidatorFactory = (checker: IConditionChecker) => ValidatorModule;

/**
 * Explicit list of validators, assembled once at startup.
 *
 * ```typescript
 * const registry = new ValidatorRegistry()
 *   .add('orders', (checker) => new OrderValidator(checker, orders))
 *   .add('users', (checker) => new UserValidator(checker, users));
 *
 * const registered = registry.registerAll(checker);
 * if (registered.isErr()) registered.error.forEach((e) => console.error(formatAppError(e)));
 * ```
 */
export class ValidatorRegistry {
  private readonly entries: Array<{ readonly name: string; readonly create: ValidatorFactory }> = [];
  private readonly logger = createBootstrapLogger('ValidatorRegistry');

  add(name: string, create: ValidatorFactory): this {
    this.entries.push({ name, create });
    return this;
  }

  names(): readonly string[] {
    return this.entries.map((entry) => entry.name);
  }

  /**
   * Constructs every validator against `checker`; construction registers its provider.
   * A validator that fails does not stop the others; all failures are reported together.
   */
  registerAll(checker: IConditionChecker): Result<readonly ValidatorModule[], readonly StartupFailedError[]> {
    const registered: ValidatorModule[] = [];
    const failures: StartupFailedError[] = [];

    for (const { name, create } of this.entries) {
      try {
        registered.push(create(checker));
      } catch (error) {
        this.logger.error({ err: error, validator: name }, 'Validator registration failed');
        failures.push(
          Err.startupFailed('validator registration', `Error creating instance of ${name}: ${errorMessageOf(error)}`, error)
        );
      }
    }

    this.logger.debug({ registered: registered.length, failed: failures.length }, 'Validators registered');
    return failures.length > 0 ? err(failures) : ok(registered);
  }
}
