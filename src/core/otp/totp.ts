import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { HmacPort } from '../../ports/hmac.port.js';
import type { TimeClockPort } from '../../ports/time-clock.port.js';
import type { InvalidPeriodError, OtpError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { decodeBase32 } from '../encoding/base32.js';
import { constantTimeEqual } from '../crypto/constant-time.js';
import { codeAt } from './hotp.js';

export const DEFAULT_PERIOD_SECONDS = 30;
export const DEFAULT_DIGITS = 6;

/**
 * Verification always compares 6-digit codes, whatever digit count was used
 * to generate them.
 */
export const VERIFY_DIGITS = 6;

export interface TotpDeps {
  readonly hmac: HmacPort;
  readonly clock: TimeClockPort;
}

export interface TotpOptions {
  readonly periodSeconds?: number;
}

export interface GenerateTotpOptions extends TotpOptions {
  readonly digits?: number;
}

export type TotpError = OtpError;

const utf8 = new TextEncoder();

/**
 * `floor(unix_seconds / period)` as an unsigned counter. `periodSeconds` must
 * be a positive integer; `generateTotp` and `verifyTotp` check it first.
 */
export function timeStepAt(nowMs: number, periodSeconds: number = DEFAULT_PERIOD_SECONDS): bigint {
  return BigInt(Math.floor(Math.floor(nowMs / 1000) / periodSeconds));
}

/**
 * Current TOTP code for a base32 secret. A secret that decodes to no bytes is
 * used as an empty HMAC key.
 */
export function generateTotp(
  secretBase32: string,
  deps: TotpDeps,
  options: GenerateTotpOptions = {}
): Result<string, TotpError> {
  const step = currentStep(deps.clock, options);
  if (step.isErr()) return err(step.error);

  const secret = decodeBase32(secretBase32);
  try {
    return codeAt(secret, step.value, options.digits ?? DEFAULT_DIGITS, deps);
  } finally {
    secret.fill(0);
  }
}

/**
 * Check a candidate code against the current step and `window` steps either
 * side of it. Stops at the first match.
 */
export function verifyTotp(
  secretBase32: string,
  candidate: string,
  window: number,
  deps: TotpDeps,
  options: TotpOptions = {}
): Result<boolean, TotpError> {
  if (!Number.isSafeInteger(window) || window < 0) {
    return err(Err.invalidWindow(window));
  }

  const step = currentStep(deps.clock, options);
  if (step.isErr()) return err(step.error);

  const secret = decodeBase32(secretBase32);
  try {
    const candidateBytes = utf8.encode(candidate);

    for (let delta = -window; delta <= window; delta++) {
      const expected = codeAt(secret, step.value + BigInt(delta), VERIFY_DIGITS, deps);
      if (expected.isErr()) return err(expected.error);
      if (constantTimeEqual(utf8.encode(expected.value), candidateBytes)) return ok(true);
    }

    return ok(false);
  } finally {
    secret.fill(0);
  }
}

function currentStep(clock: TimeClockPort, options: TotpOptions): Result<bigint, InvalidPeriodError> {
  const period = options.periodSeconds ?? DEFAULT_PERIOD_SECONDS;
  if (!Number.isSafeInteger(period) || period < 1) {
    return err(Err.invalidPeriod(period));
  }
  return ok(timeStepAt(clock.nowMs(), period));
}
