import { randomBytes } from 'crypto';
import type { RandomBytesPort } from '../../../ports/random-bytes.port.js';

export class NodeRandomBytes implements RandomBytesPort {
  randomBytes(length: number): Uint8Array {
    return new Uint8Array(randomBytes(length));
  }
}
