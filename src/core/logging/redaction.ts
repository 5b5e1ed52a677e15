/**
 * Redaction configuration for pino.
 *
 * Secrets, tokens and candidate codes never reach a log line.
 */
export const REDACTION_CONFIG = {
  paths: [
    'token',
    'jwt',
    'secret',
    'code',
    'candidate',
    'password',
    'authorization',

    '*.token',
    '*.jwt',
    '*.secret',
    '*.code',
    '*.candidate',
    '*.password',

    'err.secret',
    'err.token',
  ] as string[], // Cast to mutable for pino compatibility
  censor: '[REDACTED]',
};
