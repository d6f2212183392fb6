/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 *
 * ADDING A NEW SERVICE:
 * 1. Add token here under appropriate namespace
 * 2. Register it in container.ts
 * 3. Use @inject(DI.YourToken) in consumers
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete configuration (validated). */
    App: Symbol('Config.App'),
    /** Checker section of the configuration (timeouts, retries, history) */
    Checker: Symbol('Config.Checker'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** ILoggerFactory (pino) */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CHECKER
  // ═══════════════════════════════════════════════════════════════════
  Checker: {
    /** The shared ConditionChecker */
    Main: Symbol('Checker.Main'),
  },
} as const;

