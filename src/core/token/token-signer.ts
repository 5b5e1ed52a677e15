import type { Result } from 'neverthrow';
import type { HmacPort } from '../../ports/hmac.port.js';
import type { HmacFailureError } from '../../errors/app-error.js';
import { encodeBase64Url } from '../encoding/base64url.js';
import { signingInputOf } from './token-verifier.js';

export const HS256_HEADER = '{"alg":"HS256","typ":"JWT"}';

export interface TokenSignerDeps {
  readonly hmac: HmacPort;
}

const utf8 = new TextEncoder();

/**
 * Produce a compact HS256 token over the given payload.
 *
 * The payload is signed as given (typically JSON text); no claims are added.
 */
export function signToken(
  payload: string | Uint8Array,
  secret: string,
  deps: TokenSignerDeps
): Result<string, HmacFailureError> {
  const payloadBytes = typeof payload === 'string' ? utf8.encode(payload) : payload;
  const header = encodeBase64Url(utf8.encode(HS256_HEADER));
  const body = encodeBase64Url(payloadBytes);

  const key = utf8.encode(secret);
  const sig = deps.hmac.hmacSha256(key, signingInputOf({ header, payload: body }));
  key.fill(0);

  return sig.map((bytes) => `${header}.${body}.${encodeBase64Url(bytes)}`);
}
