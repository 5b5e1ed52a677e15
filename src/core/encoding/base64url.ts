import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { DecodeFailedError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';

const STANDARD_BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Encode bytes as unpadded base64url (RFC 4648 §5).
 */
export function encodeBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64url');
}

/**
 * Decode a base64url segment.
 *
 * `-`/`_` are mapped onto the standard alphabet and the text is padded to a
 * multiple of four before decoding, so padded and unpadded input are both
 * accepted (standard `+`/`/` too).
 *
 * Fails when:
 * - the text contains characters outside the alphabet, or misplaced `=`
 * - nothing decodes (empty input, a lone stub character)
 * - the final character carries non-zero unused bits (non-canonical)
 *
 * The returned bytes are a fresh copy, never longer than the input text.
 */
export function decodeBase64Url(input: string): Result<Uint8Array, DecodeFailedError> {
  const standard = input.replace(/-/g, '+').replace(/_/g, '/');
  const padded = standard + '='.repeat((4 - (standard.length % 4)) % 4);

  if (!STANDARD_BASE64.test(padded)) {
    return err(Err.decodeFailed('base64url', 'Invalid base64url: invalid characters'));
  }

  const decoded = Buffer.from(padded, 'base64');
  if (decoded.length === 0) {
    return err(Err.decodeFailed('base64url', 'Invalid base64url: no decodable bytes'));
  }

  // Reject inputs that decode under Buffer but are not the canonical encoding.
  if (stripPadding(decoded.toString('base64')) !== stripPadding(standard)) {
    return err(Err.decodeFailed('base64url', 'Invalid base64url: non-canonical encoding'));
  }

  return ok(new Uint8Array(decoded));
}

function stripPadding(text: string): string {
  return text.replace(/=+$/, '');
}
