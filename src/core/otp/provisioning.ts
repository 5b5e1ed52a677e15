import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { RandomBytesPort } from '../../ports/random-bytes.port.js';
import type { InvalidSecretLengthError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { encodeBase32 } from '../encoding/base32.js';
import { DEFAULT_DIGITS, DEFAULT_PERIOD_SECONDS } from './totp.js';

/** 160 bits, the HMAC-SHA1 block-friendly size recommended by RFC 4226. */
export const DEFAULT_SECRET_BYTES = 20;

export interface ProvisioningDeps {
  readonly random: RandomBytesPort;
}

export interface OtpauthUriParams {
  readonly issuer: string;
  readonly account: string;
  readonly secret: string;
  readonly digits?: number;
  readonly periodSeconds?: number;
}

/**
 * Fresh shared secret, base32-encoded without padding.
 */
export function generateSecret(
  deps: ProvisioningDeps,
  byteLength: number = DEFAULT_SECRET_BYTES
): Result<string, InvalidSecretLengthError> {
  if (!Number.isSafeInteger(byteLength) || byteLength < 1) {
    return err(Err.invalidSecretLength(byteLength));
  }
  const bytes = deps.random.randomBytes(byteLength);
  const encoded = encodeBase32(bytes);
  bytes.fill(0);
  return ok(encoded);
}

/**
 * Key URI understood by authenticator apps.
 *
 * Example: otpauth://totp/Acme:alice%40example.com?secret=JBSW...&issuer=Acme&algorithm=SHA1&digits=6&period=30
 */
export function buildOtpauthUri(params: OtpauthUriParams): string {
  const issuer = encodeURIComponent(params.issuer);
  const account = encodeURIComponent(params.account);
  const digits = params.digits ?? DEFAULT_DIGITS;
  const period = params.periodSeconds ?? DEFAULT_PERIOD_SECONDS;

  return (
    `otpauth://totp/${issuer}:${account}` +
    `?secret=${encodeURIComponent(params.secret)}` +
    `&issuer=${issuer}` +
    `&algorithm=SHA1&digits=${digits}&period=${period}`
  );
}
