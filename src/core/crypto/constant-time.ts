/**
 * Compare two byte buffers without short-circuiting on the first difference.
 *
 * The length check runs first and is not constant-time; for equal lengths
 * every byte pair is visited and the result depends only on the OR of their XORs.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;

  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}
