/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens.
 * Organized hierarchically by domain, not by type.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Validated application config */
    App: Symbol('Config.App'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // LOGGING
  // ═══════════════════════════════════════════════════════════════════
  Logging: {
    /** pino-backed logger factory */
    Factory: Symbol('Logging.Factory'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CRYPTO PRIMITIVES (ports)
  // ═══════════════════════════════════════════════════════════════════
  Crypto: {
    Hmac: Symbol('Crypto.Hmac'),
    RandomBytes: Symbol('Crypto.RandomBytes'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // RUNTIME (process-level behavior, injected for explicitness)
  // ═══════════════════════════════════════════════════════════════════
  Runtime: {
    /** Wall clock */
    TimeClock: Symbol('Runtime.TimeClock'),
    /** Process termination (exit codes) */
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },
} as const;
