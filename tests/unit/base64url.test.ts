import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { decodeBase64Url, encodeBase64Url } from '../../src/core/encoding/base64url.js';

const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

describe('decodeBase64Url', () => {
  it('decodes unpadded url-safe text', () => {
    const decoded = decodeBase64Url('aGVsbG8');
    expect(decoded.isOk()).toBe(true);
    expect(decoded._unsafeUnwrap()).toEqual(new TextEncoder().encode('hello'));
  });

  it('accepts text that already carries padding', () => {
    expect(text(decodeBase64Url('aGVsbG8=')._unsafeUnwrap())).toBe('hello');
    expect(text(decodeBase64Url('YQ==')._unsafeUnwrap())).toBe('a');
    expect(text(decodeBase64Url('YQ=')._unsafeUnwrap())).toBe('a');
  });

  it('maps - and _ onto the standard alphabet', () => {
    expect(Array.from(decodeBase64Url('-_8')._unsafeUnwrap())).toEqual([0xfb, 0xff]);
    expect(Array.from(decodeBase64Url('+/8')._unsafeUnwrap())).toEqual([0xfb, 0xff]);
  });

  it('fails on empty input and a lone stub character', () => {
    expect(decodeBase64Url('')._unsafeUnwrapErr()).toMatchObject({ _tag: 'DecodeFailed', encoding: 'base64url' });
    expect(decodeBase64Url('Y').isErr()).toBe(true);
  });

  it('fails on characters outside the alphabet', () => {
    expect(decodeBase64Url('aGVs bG8')._unsafeUnwrapErr().message).toBe('Invalid base64url: invalid characters');
    expect(decodeBase64Url('aGVs.bG8').isErr()).toBe(true);
    expect(decodeBase64Url('Y=Q=').isErr()).toBe(true);
    expect(decodeBase64Url('YQ===').isErr()).toBe(true);
  });

  it('rejects non-zero unused bits in the final character', () => {
    expect(decodeBase64Url('aGVsbG9')._unsafeUnwrapErr().message).toBe('Invalid base64url: non-canonical encoding');
  });

  it('never returns more bytes than input characters', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1, maxLength: 64 }), (s) => {
        const decoded = decodeBase64Url(s);
        if (decoded.isOk()) expect(decoded.value.length).toBeLessThanOrEqual(s.length);
      })
    );
  });
});

describe('encodeBase64Url', () => {
  it('produces unpadded url-safe output', () => {
    expect(encodeBase64Url(new Uint8Array([0xfb, 0xff]))).toBe('-_8');
    expect(encodeBase64Url(new TextEncoder().encode('a'))).toBe('YQ');
  });

  it('round-trips through decode for any non-empty buffer', () => {
    fc.assert(
      fc.property(fc.uint8Array({ minLength: 1, maxLength: 96 }), (bytes) => {
        expect(decodeBase64Url(encodeBase64Url(bytes))._unsafeUnwrap()).toEqual(bytes);
      })
    );
  });
});
