export const BASE32_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ234567' as const;

// Both ASCII cases map to a symbol; nothing else does.
const BASE32_LOOKUP: ReadonlyMap<string, number> = new Map(
  BASE32_ALPHABET.split('').flatMap((c, i) => [[c, i] as const, [c.toLowerCase(), i] as const])
);

export interface Base32EncodeOptions {
  /** Append `=` up to a multiple of 8 characters. Default: false. */
  readonly padding?: boolean;
}

/**
 * Encode bytes to RFC 4648 base32 (upper-case alphabet).
 */
export function encodeBase32(bytes: Uint8Array, options: Base32EncodeOptions = {}): string {
  let out = '';
  let buffer = 0;
  let bits = 0;

  for (const b of bytes) {
    buffer = (buffer << 8) | b;
    bits += 8;

    while (bits >= 5) {
      bits -= 5;
      out += BASE32_ALPHABET.charAt((buffer >> bits) & 31);
    }

    // Keep buffer bounded to remaining bits.
    buffer &= (1 << bits) - 1;
  }

  if (bits > 0) {
    // Pad remaining bits with zeros on the right.
    out += BASE32_ALPHABET.charAt((buffer << (5 - bits)) & 31);
  }

  if (options.padding) {
    out += '='.repeat((8 - (out.length % 8)) % 8);
  }

  return out;
}

/**
 * Decode a base32 shared secret, permissively.
 *
 * Secrets are typed or pasted by people, so this never fails:
 * - ASCII case is ignored
 * - decoding stops at the first `=` or space
 * - characters outside the alphabet are skipped, non-ASCII letters included
 * - trailing bits that do not fill a byte are dropped
 */
export function decodeBase32(encoded: string): Uint8Array {
  const out: number[] = [];
  let buffer = 0;
  let bits = 0;

  for (const char of encoded) {
    if (char === '=' || char === ' ') break;

    const value = BASE32_LOOKUP.get(char);
    if (value === undefined) continue;

    buffer = (buffer << 5) | value;
    bits += 5;

    if (bits >= 8) {
      bits -= 8;
      out.push((buffer >> bits) & 0xff);
      buffer &= (1 << bits) - 1;
    }
  }

  return Uint8Array.from(out);
}
