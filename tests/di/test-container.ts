import 'reflect-metadata';
import { container } from 'tsyringe';
import type { DependencyContainer } from 'tsyringe';
import { DI } from '../../src/di/tokens.js';
import type { AppConfig, CheckerConfig, ValidatedConfig } from '../../src/config/app-config.js';
import { createValidatedConfig, DEFAULT_CHECKER_CONFIG } from '../../src/config/app-config.js';
import type { ILoggerFactory } from '../../src/core/logging/index.js';
import type { ContainerInitOptions } from '../../src/di/container.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';

/**
 * Test container configuration.
 * Only specify what you want to override - everything else uses real implementations.
 */
export interface TestConfig {
  checker?: Partial<CheckerConfig>;
  loggerFactory?: ILoggerFactory;
  validators?: ContainerInitOptions['validators'];
}

/**
 * Setup container for testing.
 *
 * Registers validated config and a FakeLoggerFactory FIRST so the composition
 * root does not overwrite them, then initializes the container.
 *
 * ```typescript
 * beforeEach(async () => {
 *   await setupTest({ checker: { history: { kind: 'accumulate', limit: 2 } } });
 * });
 * ```
 */
export async function setupTest(config: TestConfig = {}): Promise<DependencyContainer> {
  const { resetContainer, initializeContainer } = await import('../../src/di/container.js');
  resetContainer();

  const appConfig: AppConfig = { checker: { ...DEFAULT_CHECKER_CONFIG, ...config.checker } };
  container.register<ValidatedConfig>(DI.Config.App, { useValue: createValidatedConfig(appConfig) });
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useValue: config.loggerFactory ?? new FakeLoggerFactory(),
  });

  await initializeContainer({ env: {}, validators: config.validators });
  return container;
}

/**
 * Cleanup after test.
 */
export function teardownTest(): void {
  container.reset();
}
