export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type MalformedTokenError = Readonly<{
  readonly _tag: 'MalformedToken';
  readonly delimiters: number;
  readonly message: string;
}>;

export type DecodeFailedError = Readonly<{
  readonly _tag: 'DecodeFailed';
  readonly encoding: 'base64url' | 'base32';
  readonly message: string;
}>;

export type HmacFailureError = Readonly<{
  readonly _tag: 'HmacFailure';
  readonly algorithm: HmacAlgorithm;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type InvalidDigitsError = Readonly<{
  readonly _tag: 'InvalidDigits';
  readonly digits: number;
  readonly message: string;
}>;

export type InvalidDigestError = Readonly<{
  readonly _tag: 'InvalidDigest';
  readonly length: number;
  readonly message: string;
}>;

export type InvalidWindowError = Readonly<{
  readonly _tag: 'InvalidWindow';
  readonly window: number;
  readonly message: string;
}>;

export type InvalidPeriodError = Readonly<{
  readonly _tag: 'InvalidPeriod';
  readonly periodSeconds: number;
  readonly message: string;
}>;

export type InvalidSecretLengthError = Readonly<{
  readonly _tag: 'InvalidSecretLength';
  readonly byteLength: number;
  readonly message: string;
}>;

export type UsageError = Readonly<{
  readonly _tag: 'Usage';
  readonly message: string;
  readonly usage: string;
}>;

export type HmacAlgorithm = 'sha1' | 'sha256';

/** Failures produced by the one-time-password codec. */
export type OtpError =
  | HmacFailureError
  | InvalidDigitsError
  | InvalidDigestError
  | InvalidWindowError
  | InvalidPeriodError;

export type AppError =
  | ConfigInvalidError
  | MalformedTokenError
  | DecodeFailedError
  | HmacFailureError
  | InvalidDigitsError
  | InvalidDigestError
  | InvalidWindowError
  | InvalidPeriodError
  | InvalidSecretLengthError
  | UsageError;

