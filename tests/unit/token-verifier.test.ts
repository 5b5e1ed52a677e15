import { describe, it, expect } from 'vitest';
import { splitToken, verifyToken, signingInputOf } from '../../src/core/token/token-verifier.js';
import { encodeBase64Url } from '../../src/core/encoding/base64url.js';
import { NodeHmacAdapter } from '../../src/infra/node/hmac/index.js';
import { FailingHmac } from '../fakes/index.js';

const hmac = new NodeHmacAdapter();
const deps = { hmac };

const HEADER = 'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9';
const PAYLOAD = 'eyJzdWIiOiIxMjM0NTY3ODkwIiwibmFtZSI6IkpvaG4gRG9lIiwiaWF0IjoxNTE2MjM5MDIyfQ';
const SIGNATURE = 'SflKxwRJSMeKKF2QT4fwpMeJf36POk6yJV_adQssw5c';
const TOKEN = `${HEADER}.${PAYLOAD}.${SIGNATURE}`;
const SECRET = 'your-256-bit-secret';

const decodeText = (bytes: Uint8Array | null) => (bytes === null ? null : new TextDecoder().decode(bytes));

function signWith(secret: string, header: string, payload: string): string {
  const sig = hmac.hmacSha256(new TextEncoder().encode(secret), signingInputOf({ header, payload }))._unsafeUnwrap();
  return `${header}.${payload}.${encodeBase64Url(sig)}`;
}

describe('splitToken', () => {
  it('splits on the first two dots', () => {
    expect(splitToken('a.b.c')._unsafeUnwrap()).toEqual({ header: 'a', payload: 'b', signature: 'c' });
  });

  it('keeps further dots in the signature segment', () => {
    expect(splitToken('a.b.c.d')._unsafeUnwrap()).toEqual({ header: 'a', payload: 'b', signature: 'c.d' });
  });

  it('allows empty segments', () => {
    expect(splitToken('..')._unsafeUnwrap()).toEqual({ header: '', payload: '', signature: '' });
  });

  it('reports how many delimiters a malformed token has', () => {
    expect(splitToken('abc.def')._unsafeUnwrapErr()).toMatchObject({ _tag: 'MalformedToken', delimiters: 1 });
    expect(splitToken('abc')._unsafeUnwrapErr()).toMatchObject({ _tag: 'MalformedToken', delimiters: 0 });
  });
});

describe('verifyToken', () => {
  it('accepts the reference HS256 token and returns its payload', () => {
    const result = verifyToken(TOKEN, SECRET, deps)._unsafeUnwrap();

    expect(result.valid).toBe(true);
    expect(decodeText(result.payload)).toBe('{"sub":"1234567890","name":"John Doe","iat":1516239022}');
  });

  it('rejects the token when any signature character changes', () => {
    for (let i = 0; i < SIGNATURE.length; i++) {
      const replacement = SIGNATURE[i] === 'A' ? 'B' : 'A';
      const tampered = `${HEADER}.${PAYLOAD}.${SIGNATURE.slice(0, i)}${replacement}${SIGNATURE.slice(i + 1)}`;

      expect(verifyToken(tampered, SECRET, deps)._unsafeUnwrap()).toEqual({ valid: false, payload: null });
    }
  });

  it('rejects a wrong secret without exposing the payload', () => {
    expect(verifyToken(TOKEN, 'not-the-secret', deps)._unsafeUnwrap()).toEqual({ valid: false, payload: null });
  });

  it('rejects a swapped payload segment', () => {
    const other = encodeBase64Url(new TextEncoder().encode('{"sub":"admin"}'));
    expect(verifyToken(`${HEADER}.${other}.${SIGNATURE}`, SECRET, deps)._unsafeUnwrap().valid).toBe(false);
  });

  it('accepts a signature that carries base64 padding', () => {
    expect(verifyToken(`${TOKEN}=`, SECRET, deps)._unsafeUnwrap().valid).toBe(true);
  });

  it('treats an undecodable or truncated signature as invalid, not as an error', () => {
    expect(verifyToken(`${HEADER}.${PAYLOAD}.`, SECRET, deps)._unsafeUnwrap().valid).toBe(false);
    expect(verifyToken(`${TOKEN}.extra`, SECRET, deps)._unsafeUnwrap().valid).toBe(false);
    expect(verifyToken(`${HEADER}.${PAYLOAD}.${SIGNATURE.slice(0, 20)}`, SECRET, deps)._unsafeUnwrap().valid).toBe(false);
  });

  it('fails with MalformedToken when the token has one dot', () => {
    expect(verifyToken('abc.def', SECRET, deps)._unsafeUnwrapErr()).toEqual({
      _tag: 'MalformedToken',
      delimiters: 1,
      message: "invalid jwt: expected 2 '.' delimiters, found 1",
    });
  });

  it('applies HS256 whatever algorithm the header declares', () => {
    const noneHeader = encodeBase64Url(new TextEncoder().encode('{"alg":"none"}'));
    const signed = signWith(SECRET, noneHeader, PAYLOAD);

    expect(verifyToken(signed, SECRET, deps)._unsafeUnwrap().valid).toBe(true);
    expect(verifyToken(`${noneHeader}.${PAYLOAD}.`, SECRET, deps)._unsafeUnwrap().valid).toBe(false);
  });

  it('returns a null payload when a validly signed payload segment does not decode', () => {
    const signed = signWith(SECRET, HEADER, '!');
    expect(verifyToken(signed, SECRET, deps)._unsafeUnwrap()).toEqual({ valid: true, payload: null });
  });

  it('propagates an unavailable HMAC primitive', () => {
    const failing = new FailingHmac();
    expect(verifyToken(TOKEN, SECRET, { hmac: failing })._unsafeUnwrapErr()).toMatchObject({
      _tag: 'HmacFailure',
      algorithm: 'sha256',
    });
    expect(failing.calls).toBe(1);
  });
});
