/**
 * TOTP Secret Command
 *
 * Provisions a fresh shared secret, optionally with an otpauth:// URI.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, success, usageFailure } from '../types/cli-result.js';
import type { InvalidSecretLengthError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { formatAppError } from '../../errors/formatter.js';
import type { OtpauthUriParams } from '../../core/otp/provisioning.js';
import type { Logger } from '../../core/logging/types.js';

export interface TotpSecretCommandOptions {
  readonly issuer?: string;
  readonly account?: string;
}

export interface TotpSecretCommandDeps {
  readonly generateSecret: () => Result<string, InvalidSecretLengthError>;
  readonly buildUri: (params: OtpauthUriParams) => string;
  readonly logger: Logger;
}

export const TOTP_SECRET_USAGE = 'totp-tool secret [--issuer <name> --account <name>]';

export function executeTotpSecretCommand(
  options: TotpSecretCommandOptions,
  deps: TotpSecretCommandDeps
): CliResult {
  const { issuer, account } = options;

  if ((issuer === undefined) !== (account === undefined)) {
    return usageFailure(Err.usage('--issuer and --account must be given together', TOTP_SECRET_USAGE));
  }

  const generated = deps.generateSecret();
  if (generated.isErr()) {
    deps.logger.warn({ tag: generated.error._tag }, 'TOTP secret provisioning failed');
    return failure(formatAppError(generated.error));
  }

  const secret = generated.value;
  deps.logger.info({ withUri: issuer !== undefined }, 'TOTP secret provisioned');

  return success({
    message: `Secret: ${secret}`,
    details:
      issuer !== undefined && account !== undefined
        ? [`URI: ${deps.buildUri({ issuer, account, secret })}`]
        : [],
  });
}
