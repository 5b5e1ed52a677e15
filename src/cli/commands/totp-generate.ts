/**
 * TOTP Generate Command
 *
 * Prints the current code for a base32 secret.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, successMessage } from '../types/cli-result.js';
import type { TotpError } from '../../core/otp/totp.js';
import type { Logger } from '../../core/logging/types.js';
import { formatAppError } from '../../errors/formatter.js';

export interface TotpGenerateCommandDeps {
  readonly generate: (secretBase32: string) => Result<string, TotpError>;
  readonly logger: Logger;
}

export function executeTotpGenerateCommand(
  secretBase32: string,
  deps: TotpGenerateCommandDeps
): CliResult {
  const code = deps.generate(secretBase32);

  if (code.isErr()) {
    deps.logger.warn({ tag: code.error._tag }, 'TOTP generation failed');
    return failure(formatAppError(code.error));
  }

  deps.logger.debug('TOTP generated');
  return successMessage(`TOTP: ${code.value}`);
}
