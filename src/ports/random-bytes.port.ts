/**
 * Source of cryptographically secure random bytes (secret provisioning).
 */
export interface RandomBytesPort {
  randomBytes(length: number): Uint8Array;
}
