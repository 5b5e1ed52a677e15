import { createHmac } from 'crypto';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { HmacPort } from '../../../ports/hmac.port.js';
import type { HmacAlgorithm, HmacFailureError } from '../../../errors/app-error.js';
import { Err } from '../../../errors/factories.js';

/**
 * Node HMAC adapter using the crypto module (Node-specific, hidden behind port).
 */
export class NodeHmacAdapter implements HmacPort {
  hmacSha256(key: Uint8Array, message: Uint8Array): Result<Uint8Array, HmacFailureError> {
    return this.digest('sha256', key, message);
  }

  hmacSha1(key: Uint8Array, message: Uint8Array): Result<Uint8Array, HmacFailureError> {
    return this.digest('sha1', key, message);
  }

  private digest(algorithm: HmacAlgorithm, key: Uint8Array, message: Uint8Array): Result<Uint8Array, HmacFailureError> {
    try {
      const out = createHmac(algorithm, Buffer.from(key)).update(Buffer.from(message)).digest();
      return ok(new Uint8Array(out));
    } catch (e: unknown) {
      return err(Err.hmacFailure(algorithm, e));
    }
  }
}
