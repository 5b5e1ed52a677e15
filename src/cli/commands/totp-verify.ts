/**
 * TOTP Verify Command
 *
 * Checks a code against the current time step and a window of neighbours.
 * Pure function with dependency injection.
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, rejected, successMessage, usageFailure } from '../types/cli-result.js';
import type { TotpError } from '../../core/otp/totp.js';
import type { Logger } from '../../core/logging/types.js';
import { Err } from '../../errors/factories.js';
import { formatAppError } from '../../errors/formatter.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface TotpVerifyCommandDeps {
  readonly verify: (secretBase32: string, code: string, window: number) => Result<boolean, TotpError>;
  readonly defaultWindow: number;
  readonly logger: Logger;
}

export const TOTP_VERIFY_USAGE = 'totp-tool verify <base32-secret> <code> [window]';

const WindowArgSchema = z
  .string()
  .regex(/^\d+$/, 'window must be a non-negative integer')
  .transform(Number)
  .pipe(z.number().int().safe('window is too large'));

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeTotpVerifyCommand(
  secretBase32: string,
  code: string,
  windowArg: string | undefined,
  deps: TotpVerifyCommandDeps
): CliResult {
  let window = deps.defaultWindow;

  if (windowArg !== undefined) {
    const parsed = WindowArgSchema.safeParse(windowArg);
    if (!parsed.success) {
      const message = parsed.error.errors[0]?.message ?? 'invalid window';
      return usageFailure(Err.usage(`${message}: ${windowArg}`, TOTP_VERIFY_USAGE));
    }
    window = parsed.data;
  }

  const result = deps.verify(secretBase32, code, window);

  if (result.isErr()) {
    deps.logger.warn({ tag: result.error._tag }, 'TOTP verification aborted');
    return failure(formatAppError(result.error));
  }

  deps.logger.info({ window, valid: result.value }, 'TOTP code checked');
  return result.value ? successMessage('VALID') : rejected('INVALID');
}
