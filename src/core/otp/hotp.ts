import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { HmacPort } from '../../ports/hmac.port.js';
import type { InvalidDigestError, OtpError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';

export const MIN_DIGITS = 1;
export const MAX_DIGITS = 10;

/** Bytes of HMAC-SHA1 output that dynamic truncation reads. */
const SHA1_DIGEST_BYTES = 20;

export interface HotpDeps {
  readonly hmac: HmacPort;
}

/**
 * RFC 4226 dynamic truncation.
 *
 * The low nibble of byte 19 selects a 4-byte window; the window is read
 * big-endian with the top bit cleared, giving a 31-bit unsigned value.
 */
export function truncate(digest: Uint8Array): Result<number, InvalidDigestError> {
  if (digest.length < SHA1_DIGEST_BYTES) {
    return err(Err.invalidDigest(digest.length));
  }

  const offset = digest[19] & 0x0f;
  const value =
    ((digest[offset] & 0x7f) << 24) |
    (digest[offset + 1] << 16) |
    (digest[offset + 2] << 8) |
    digest[offset + 3];

  return ok(value >>> 0);
}

/**
 * Encode a counter as 8 bytes, big-endian. Counters wrap modulo 2^64.
 */
export function counterBytes(counter: bigint): Uint8Array {
  const out = new Uint8Array(8);
  let t = BigInt.asUintN(64, counter);
  for (let j = 7; j >= 0; j--) {
    out[j] = Number(t & 0xffn);
    t >>= 8n;
  }
  return out;
}

/**
 * HOTP value for one counter: HMAC-SHA1, truncate, reduce mod 10^digits and
 * zero-pad to exactly `digits` characters.
 */
export function codeAt(
  secret: Uint8Array,
  counter: bigint,
  digits: number,
  deps: HotpDeps
): Result<string, OtpError> {
  if (!Number.isInteger(digits) || digits < MIN_DIGITS || digits > MAX_DIGITS) {
    return err(Err.invalidDigits(digits));
  }

  return deps.hmac
    .hmacSha1(secret, counterBytes(counter))
    .andThen((digest): Result<number, OtpError> => truncate(digest))
    .map((value) => String(value % 10 ** digits).padStart(digits, '0'));
}
