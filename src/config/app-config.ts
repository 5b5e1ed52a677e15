/**
 * Application configuration - parse, don't validate.
 *
 * - Single source of truth for config surface
 * - Zod validates at boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue } from '../errors/app-error.js';
import type { LogLevel } from '../core/logging/types.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type PeriodSeconds = Brand<number, 'PeriodSeconds'>;
export type OtpDigits = Brand<number, 'OtpDigits'>;
export type OtpWindow = Brand<number, 'OtpWindow'>;

export interface AppConfig {
  readonly logging: { readonly level: LogLevel };
  readonly otp: {
    readonly periodSeconds: PeriodSeconds;
    readonly digits: OtpDigits;
    readonly defaultWindow: OtpWindow;
  };
}

/** Proof that a config object came through `loadConfig` (or a test constructor). */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const EnvSchema = z.object({
  AUTHPROOF_LOG_LEVEL: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase())
    .pipe(z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('silent')),
});

/**
 * OTP parameters. These are not read from the environment; the schema guards
 * the defaults and any config constructed for tests.
 */
export const OtpSettingsSchema = z.object({
  periodSeconds: z.number().int().positive().default(30),
  digits: z.number().int().min(1, 'digits must be >= 1').max(10, 'digits must be <= 10').default(6),
  defaultWindow: z.number().int().min(0, 'window cannot be negative').default(1),
});

type ParsedEnv = z.infer<typeof EnvSchema>;
type ParsedOtpSettings = z.infer<typeof OtpSettingsSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsedEnv = EnvSchema.safeParse(options.env);
  if (!parsedEnv.success) {
    return err(Err.configInvalid(toConfigIssues(parsedEnv.error)));
  }

  const parsedOtp = OtpSettingsSchema.safeParse({});
  if (!parsedOtp.success) {
    return err(Err.configInvalid(toConfigIssues(parsedOtp.error, 'otp')));
  }

  return ok(buildConfig(parsedEnv.data, parsedOtp.data) as ValidatedConfig);
}

/**
 * Tests and local construction only: creates a validated config without env parsing.
 * (Still branded as validated to prevent accidentally passing raw objects.)
 */
export function createValidatedConfig(value: AppConfig): ValidatedConfig {
  return value as ValidatedConfig;
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv, otp: ParsedOtpSettings): AppConfig {
  return {
    logging: { level: env.AUTHPROOF_LOG_LEVEL },
    otp: {
      periodSeconds: otp.periodSeconds as PeriodSeconds,
      digits: otp.digits as OtpDigits,
      defaultWindow: otp.defaultWindow as OtpWindow,
    },
  };
}

function toConfigIssues(error: z.ZodError, prefix?: string): readonly ConfigIssue[] {
  return error.errors.map((issue) => {
    const path = issue.path.length ? issue.path.join('.') : '(root)';
    return {
      path: prefix ? `${prefix}.${path}` : path,
      message: issue.message,
    };
  });
}
