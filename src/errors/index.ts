export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  DecodeFailedError,
  HmacAlgorithm,
  HmacFailureError,
  InvalidDigestError,
  InvalidDigitsError,
  InvalidPeriodError,
  InvalidSecretLengthError,
  InvalidWindowError,
  MalformedTokenError,
  OtpError,
  UsageError,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError } from './formatter.js';
