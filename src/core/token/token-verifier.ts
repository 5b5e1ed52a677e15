import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { HmacPort } from '../../ports/hmac.port.js';
import type { HmacFailureError, MalformedTokenError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { decodeBase64Url } from '../encoding/base64url.js';
import { constantTimeEqual } from '../crypto/constant-time.js';

/**
 * Raw (still encoded) segments of a compact token.
 */
export interface TokenSegments {
  readonly header: string;
  readonly payload: string;
  readonly signature: string;
}

/**
 * Outcome of a signature check. The payload is only ever present on a valid
 * signature; it is null when the payload segment itself does not decode.
 */
export type TokenVerification =
  | { readonly valid: true; readonly payload: Uint8Array | null }
  | { readonly valid: false; readonly payload: null };

export type TokenVerifyError = MalformedTokenError | HmacFailureError;

export interface TokenVerifierDeps {
  readonly hmac: HmacPort;
}

const utf8 = new TextEncoder();

/**
 * Split on the first two `.` only; anything after the second dot belongs to
 * the signature segment.
 */
export function splitToken(token: string): Result<TokenSegments, MalformedTokenError> {
  const first = token.indexOf('.');
  if (first < 0) return err(Err.malformedToken(0));

  const second = token.indexOf('.', first + 1);
  if (second < 0) return err(Err.malformedToken(1));

  return ok({
    header: token.slice(0, first),
    payload: token.slice(first + 1, second),
    signature: token.slice(second + 1),
  });
}

/**
 * Bytes covered by the signature: the encoded header and payload joined by `.`.
 */
export function signingInputOf(segments: Pick<TokenSegments, 'header' | 'payload'>): Uint8Array {
  return utf8.encode(`${segments.header}.${segments.payload}`);
}

/**
 * Verify an HS256 token signature.
 *
 * The header is never parsed: HMAC-SHA256 is applied whatever `alg` it
 * declares. A signature that does not decode, has the wrong length or does not
 * match yields `valid: false`; only a token without two delimiters or a failing
 * HMAC primitive is an error.
 */
export function verifyToken(
  token: string,
  secret: string,
  deps: TokenVerifierDeps
): Result<TokenVerification, TokenVerifyError> {
  return splitToken(token).andThen((segments): Result<TokenVerification, TokenVerifyError> => {
    const provided = decodeBase64Url(segments.signature);

    const key = utf8.encode(secret);
    const expected = deps.hmac.hmacSha256(key, signingInputOf(segments));
    key.fill(0);
    if (expected.isErr()) return err(expected.error);

    const valid =
      provided.isOk() &&
      provided.value.length === expected.value.length &&
      constantTimeEqual(expected.value, provided.value);

    if (!valid) {
      return ok<TokenVerification>({ valid: false, payload: null });
    }

    const payload = decodeBase64Url(segments.payload);
    return ok<TokenVerification>({ valid: true, payload: payload.isOk() ? payload.value : null });
  });
}
