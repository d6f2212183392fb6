import { describe, it, expect, afterEach } from 'vitest';
import { DI } from '../../src/di/tokens.js';
import { container, getConditionChecker, initializeContainer, isInitialized, resetContainer } from '../../src/di/container.js';
import { ConditionChecker } from '../../src/application/services/condition-checker.js';
import type { IConditionChecker } from '../../src/application/services/condition-checker.js';
import { ConditionProvider } from '../../src/application/services/condition-provider.js';
import { ValidatorRegistry } from '../../src/application/validators/validator-registry.js';
import type { CheckerConfig } from '../../src/config/app-config.js';
import type { ILoggerFactory } from '../../src/core/logging/index.js';
import { ContainerInitError } from '../../src/core/error-handler.js';
import { FakeLoggerFactory } from '../helpers/FakeLoggerFactory.js';
import { TestKinds } from '../helpers/kinds.js';
import { OrderKinds, OrderValidator, ordersOf } from '../helpers/orders.js';
import { setupTest } from './test-container.js';

describe('DI container', () => {
  afterEach(() => {
    resetContainer();
  });

  it('resolves one shared checker', async () => {
    await setupTest();

    const checker = container.resolve<IConditionChecker>(DI.Checker.Main);

    expect(checker).toBeInstanceOf(ConditionChecker);
    expect(container.resolve<IConditionChecker>(DI.Checker.Main)).toBe(checker);
    expect(await getConditionChecker()).toBe(checker);
    expect(isInitialized()).toBe(true);
  });

  it('exposes the checker section of injected config', async () => {
    await setupTest({ checker: { history: { kind: 'accumulate', limit: 2 } } });

    expect(container.resolve<CheckerConfig>(DI.Config.Checker).history).toEqual({ kind: 'accumulate', limit: 2 });
  });

  it('hands the injected logger factory to the checker', async () => {
    const loggers = new FakeLoggerFactory();
    await setupTest({ loggerFactory: loggers });

    const checker = container.resolve<IConditionChecker>(DI.Checker.Main);
    checker.registerProvider(TestKinds, new ConditionProvider(TestKinds));

    expect(loggers.fake('ConditionChecker').hasEntry('debug', 'Provider registered')).toBe(true);
  });

  it('loads config from the environment when none is injected', async () => {
    resetContainer();
    container.register<ILoggerFactory>(DI.Logging.Factory, { useValue: new FakeLoggerFactory() });

    await initializeContainer({ env: { CONDITION_CHECKER_TIMEOUT_MS: '250' } });

    expect(container.resolve<CheckerConfig>(DI.Config.Checker).timeoutMs).toBe(250);
  });

  it('refuses to start on invalid config and can be retried', async () => {
    resetContainer();
    container.register<ILoggerFactory>(DI.Logging.Factory, { useValue: new FakeLoggerFactory() });

    await expect(initializeContainer({ env: { CONDITION_CHECKER_TIMEOUT_MS: 'soon' } })).rejects.toThrow(
      ContainerInitError
    );
    expect(isInitialized()).toBe(false);

    await initializeContainer({ env: {} });
    expect(isInitialized()).toBe(true);
  });

  it('registers validators with the shared checker', async () => {
    await setupTest({
      validators: new ValidatorRegistry().add('orders', (checker) => new OrderValidator(checker, ordersOf())),
    });

    const checker = await getConditionChecker();
    expect(checker.getProvider(OrderKinds)).toBeDefined();
  });

  it('fails initialization when a validator cannot be created', async () => {
    const validators = new ValidatorRegistry().add('broken', () => {
      throw new Error('offline');
    });

    await expect(setupTest({ validators })).rejects.toThrow(
      'Startup failed during validator registration: Error creating instance of broken: offline'
    );
    expect(isInitialized()).toBe(false);
  });

  it('forgets initialization on reset', async () => {
    await setupTest();

    resetContainer();

    expect(isInitialized()).toBe(false);
  });
});
