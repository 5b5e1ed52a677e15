/**
 * JWT Verify Command
 *
 * Checks a compact token's HS256 signature and prints the payload when it holds.
 * Pure function with dependency injection.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, rejected, usageFailure } from '../types/cli-result.js';
import type { TokenVerification, TokenVerifyError } from '../../core/token/token-verifier.js';
import type { Logger } from '../../core/logging/types.js';
import { Err } from '../../errors/factories.js';
import { formatAppError } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface JwtVerifyCommandDeps {
  readonly verifyToken: (token: string, secret: string) => Result<TokenVerification, TokenVerifyError>;
  readonly logger: Logger;
}

export const JWT_VERIFY_USAGE = 'jwt-verify <jwt> <secret>';

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

const utf8 = new TextDecoder();

/**
 * Execute the jwt-verify command.
 *
 * The payload line is the payload decoded as UTF-8. Byte sequences that are
 * not valid UTF-8 are printed as U+FFFD.
 */
export function executeJwtVerifyCommand(
  token: string,
  secret: string,
  deps: JwtVerifyCommandDeps
): CliResult {
  const result = deps.verifyToken(token, secret);

  if (result.isErr()) {
    const error = result.error;
    deps.logger.warn({ tag: error._tag }, 'Token verification aborted');

    switch (error._tag) {
      case 'MalformedToken':
        return usageFailure(Err.usage('invalid jwt', JWT_VERIFY_USAGE));
      case 'HmacFailure':
        return failure(formatAppError(error));
      default:
        return assertNever(error);
    }
  }

  const verification = result.value;
  deps.logger.info({ valid: verification.valid }, 'Token signature checked');

  if (!verification.valid) {
    return rejected('Signature: INVALID');
  }

  return success({
    message: 'Signature: VALID',
    details: verification.payload ? [`Payload: ${utf8.decode(verification.payload)}`] : [],
  });
}
