import 'reflect-metadata';

// Domain
export type { KindEnum, KindOf } from './domain/kinds.js';
export { enumMembers, isMember, kindName } from './domain/kinds.js';
export { ConditionResult } from './domain/condition-result.js';
export type { ContextObjectInit, TypeSchema } from './domain/context-object.js';
export { ContextObject, isContextObject } from './domain/context-object.js';
export type { ICondition, ConditionOutcome, ConditionPredicate, ContextType } from './domain/condition.js';
export {
  BaseCondition,
  LambdaCondition,
  CONTEXT_OBJECT_TYPE,
  contextTypeOf,
  evaluateCondition,
} from './domain/condition.js';

// Provider + checker
export type { IConditionProvider } from './application/services/condition-provider.js';
export { ConditionProvider } from './application/services/condition-provider.js';
export type {
  IConditionChecker,
  ConditionCallbacks,
  MessageLookup,
  CheckAllDetails,
  ConditionsMetReport,
  CustomEvaluator,
} from './application/services/condition-checker.js';
export { ConditionChecker, ConditionMessages } from './application/services/condition-checker.js';

// Notifications
export type {
  ConditionEvent,
  ConditionEventKind,
  ConditionEvents,
  ConditionListener,
  Unsubscribe,
} from './runtime/ports/condition-events.js';
export { InMemoryConditionEvents } from './runtime/adapters/in-memory-condition-events.js';

// Registration layer
export type { ValidatorModule } from './application/validators/base-validator.js';
export { BaseValidator } from './application/validators/base-validator.js';
export type {
  ConditionHandler,
  ConditionHandlerDescriptor,
  DescribedCondition,
  SubjectBinding,
} from './application/validators/condition-handlers.js';
export { condition } from './application/validators/condition-handlers.js';
export type { RegisterConditionOptions } from './application/validators/subject-validator.js';
export { SubjectValidator } from './application/validators/subject-validator.js';
export { GeneralValidator, GeneralValidatorKinds } from './application/validators/general-validator.js';
export type { ValidatorFactory } from './application/validators/validator-registry.js';
export { ValidatorRegistry } from './application/validators/validator-registry.js';

// Config
export type { AppConfig, CheckerConfig, HistoryMode, ValidatedConfig, LoadConfigOptions, LoadConfigResult } from './config/app-config.js';
export { loadConfig, createValidatedConfig, DEFAULT_CHECKER_CONFIG } from './config/app-config.js';

// Errors
export * from './errors/index.js';
export {
  ConditionErrorCodes,
  ConditionCheckerError,
  ConditionWiringError,
  ProviderMismatchError,
  NotSupportedError,
  ContainerInitError,
} from './core/error-handler.js';

// Logging
export * from './core/logging/index.js';

// DI
export { DI } from './di/tokens.js';
export type { ContainerInitOptions } from './di/container.js';
export { initializeContainer, getConditionChecker, resetContainer, isInitialized, container } from './di/container.js';
