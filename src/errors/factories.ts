import type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  DecodeFailedError,
  HmacAlgorithm,
  HmacFailureError,
  InvalidDigestError,
  InvalidPeriodError,
  InvalidSecretLengthError,
  InvalidDigitsError,
  InvalidWindowError,
  MalformedTokenError,
  UsageError,
} from './app-error.js';

export const Err = {
  configInvalid: (issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    issues,
    message: 'Invalid configuration',
  }),

  malformedToken: (delimiters: number): MalformedTokenError => ({
    _tag: 'MalformedToken',
    delimiters,
    message: `invalid jwt: expected 2 '.' delimiters, found ${delimiters}`,
  }),

  decodeFailed: (encoding: 'base64url' | 'base32', message: string): DecodeFailedError => ({
    _tag: 'DecodeFailed',
    encoding,
    message,
  }),

  hmacFailure: (algorithm: HmacAlgorithm, cause: unknown): HmacFailureError => ({
    _tag: 'HmacFailure',
    algorithm,
    message: `HMAC-${algorithm.toUpperCase()} failed`,
    cause,
  }),

  invalidDigits: (digits: number): InvalidDigitsError => ({
    _tag: 'InvalidDigits',
    digits,
    message: `digits must be an integer between 1 and 10, got ${digits}`,
  }),

  invalidDigest: (length: number): InvalidDigestError => ({
    _tag: 'InvalidDigest',
    length,
    message: `digest must be at least 20 bytes, got ${length}`,
  }),

  invalidWindow: (window: number): InvalidWindowError => ({
    _tag: 'InvalidWindow',
    window,
    message: `window must be a non-negative integer, got ${window}`,
  }),

  invalidPeriod: (periodSeconds: number): InvalidPeriodError => ({
    _tag: 'InvalidPeriod',
    periodSeconds,
    message: `period must be a positive integer number of seconds, got ${periodSeconds}`,
  }),

  invalidSecretLength: (byteLength: number): InvalidSecretLengthError => ({
    _tag: 'InvalidSecretLength',
    byteLength,
    message: `secret byte length must be a positive integer, got ${byteLength}`,
  }),

  usage: (message: string, usage: string): UsageError => ({
    _tag: 'Usage',
    message,
    usage,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
