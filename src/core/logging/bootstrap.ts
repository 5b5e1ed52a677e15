import pino from 'pino';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Bootstrap logger for use BEFORE the DI container is initialized.
 *
 * Used by the container while it loads configuration. After DI is ready,
 * resolve the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

function readBootstrapLevel(): LogLevel {
  const raw = process.env['AUTHPROOF_LOG_LEVEL']?.toLowerCase();
  return LOG_LEVELS.find((l) => l === raw) ?? 'silent';
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: readBootstrapLevel(),
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
