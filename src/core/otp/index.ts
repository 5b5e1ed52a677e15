export { truncate, counterBytes, codeAt, MIN_DIGITS, MAX_DIGITS } from './hotp.js';
export type { HotpDeps } from './hotp.js';

export {
  timeStepAt,
  generateTotp,
  verifyTotp,
  DEFAULT_PERIOD_SECONDS,
  DEFAULT_DIGITS,
  VERIFY_DIGITS,
} from './totp.js';
export type { TotpDeps, TotpOptions, GenerateTotpOptions, TotpError } from './totp.js';

export { generateSecret, buildOtpauthUri, DEFAULT_SECRET_BYTES } from './provisioning.js';
export type { ProvisioningDeps, OtpauthUriParams } from './provisioning.js';
