/**
 * CLI Commands - Public API
 */

export { executeJwtVerifyCommand, JWT_VERIFY_USAGE, type JwtVerifyCommandDeps } from './jwt-verify.js';
export { executeTotpGenerateCommand, type TotpGenerateCommandDeps } from './totp-generate.js';
export { executeTotpVerifyCommand, TOTP_VERIFY_USAGE, type TotpVerifyCommandDeps } from './totp-verify.js';
export {
  executeTotpSecretCommand,
  TOTP_SECRET_USAGE,
  type TotpSecretCommandDeps,
  type TotpSecretCommandOptions,
} from './totp-secret.js';
