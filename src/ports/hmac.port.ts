import type { Result } from 'neverthrow';
import type { HmacFailureError } from '../errors/app-error.js';

/**
 * Port: keyed-hash message authentication (external primitive).
 *
 * Purpose:
 * - Compute HMAC-SHA256 over a token's signing input
 * - Compute HMAC-SHA1 over a one-time-password counter
 * - Keep the crypto library behind an interface so verifiers stay pure
 *
 * Guarantees:
 * - Deterministic: same key + message -> same digest
 * - SHA-256 digests are 32 bytes, SHA-1 digests are 20 bytes
 * - A failing primitive is reported as HmacFailure, never retried
 *
 * Example:
 * ```typescript
 * const digest = hmac.hmacSha256(keyBytes, signingInput);
 * if (digest.isErr()) return err(digest.error);
 * ```
 */
export interface HmacPort {
  hmacSha256(key: Uint8Array, message: Uint8Array): Result<Uint8Array, HmacFailureError>;
  hmacSha1(key: Uint8Array, message: Uint8Array): Result<Uint8Array, HmacFailureError>;
}
