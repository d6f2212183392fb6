import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedConfig, CheckerConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ILoggerFactory } from '../core/logging/index.js';
import { PinoLoggerFactory, createBootstrapLogger } from '../core/logging/index.js';
import { ContainerInitError } from '../core/error-handler.js';
import { formatAppError } from '../errors/formatter.js';
import type { IConditionChecker } from '../application/services/condition-checker.js';
import type { ValidatorRegistry } from '../application/validators/validator-registry.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initializationPromise: Promise<void> | null = null;

export interface ContainerInitOptions {
  /** Defaults to process.env. */
  readonly env?: Record<string, string | undefined>;
  /** Validators to register with the shared checker once it exists. */
  readonly validators?: ValidatorRegistry;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(env: Record<string, string | undefined>): void {
  // Tests may inject config before initialization; do not overwrite it.
  if (!container.isRegistered(DI.Config.App)) {
    const configResult = loadConfig({ env });

    if (configResult.isErr()) {
      throw new ContainerInitError(formatAppError(configResult.error));
    }

    container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
  }

  if (!container.isRegistered(DI.Config.Checker)) {
    container.register<CheckerConfig>(DI.Config.Checker, {
      useFactory: instanceCachingFactory((c) => c.resolve<ValidatedConfig>(DI.Config.App).checker),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

async function registerServices(): Promise<void> {
  // Tests may override the logger factory (FakeLoggerFactory).
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }

  const { ConditionChecker } = await import('../application/services/condition-checker.js');
  container.register<IConditionChecker>(DI.Checker.Main, {
    useFactory: instanceCachingFactory((c) => c.resolve(ConditionChecker)),
  });
}

function registerValidators(validators: ValidatorRegistry): void {
  const checker = container.resolve<IConditionChecker>(DI.Checker.Main);
  const result = validators.registerAll(checker);

  if (result.isErr()) {
    throw new ContainerInitError(result.error.map(formatAppError).join('\n'));
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wires config, logging and the shared checker.
 * Concurrent callers share one initialization; a failed one can be retried
 * after `resetContainer()`.
 *
 * @throws {ContainerInitError} on invalid configuration or failed validator registration
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return;
  if (initializationPromise) return initializationPromise;

  initializationPromise = (async () => {
    const logger = createBootstrapLogger('container');

    registerConfig(options.env ?? process.env);
    await registerServices();
    if (options.validators) registerValidators(options.validators);

    initialized = true;
    logger.debug('Container initialized');
  })();

  try {
    await initializationPromise;
  } finally {
    if (!initialized) initializationPromise = null;
  }
}

/**
 * Resolve the shared checker, initializing the container first if needed.
 */
export async function getConditionChecker(options: ContainerInitOptions = {}): Promise<IConditionChecker> {
  await initializeContainer(options);
  return container.resolve<IConditionChecker>(DI.Checker.Main);
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
  initializationPromise = null;
}

/**
 * Check initialization state.
 */
export function isInitialized(): boolean {
  return initialized;
}

// Export container for direct access when needed
export { container };
