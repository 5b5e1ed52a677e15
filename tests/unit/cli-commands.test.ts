import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { err, ok } from 'neverthrow';
import {
  executeJwtVerifyCommand,
  executeTotpGenerateCommand,
  executeTotpSecretCommand,
  executeTotpVerifyCommand,
} from '../../src/cli/commands/index.js';
import { verifyToken } from '../../src/core/token/token-verifier.js';
import { signToken } from '../../src/core/token/token-signer.js';
import { NodeHmacAdapter } from '../../src/infra/node/hmac/index.js';
import { FailingHmac } from '../fakes/index.js';
import { Err } from '../../src/errors/factories.js';
import type { TokenVerification, TokenVerifyError } from '../../src/core/token/token-verifier.js';
import type { TotpError } from '../../src/core/otp/totp.js';
import type { InvalidSecretLengthError } from '../../src/errors/app-error.js';

const logger = pino({ level: 'silent' });
const hmac = new NodeHmacAdapter();

describe('executeJwtVerifyCommand', () => {
  const deps = { verifyToken: (token: string, secret: string) => verifyToken(token, secret, { hmac }), logger };
  const token = signToken('{"sub":"user-1"}', 'test-secret', { hmac })._unsafeUnwrap();

  it('prints VALID and the payload for a good signature', () => {
    expect(executeJwtVerifyCommand(token, 'test-secret', deps)).toEqual({
      kind: 'success',
      output: { message: 'Signature: VALID', details: ['Payload: {"sub":"user-1"}'] },
    });
  });

  it('omits the payload line when the payload does not decode', () => {
    const verify = vi.fn(() => ok<TokenVerification, TokenVerifyError>({ valid: true, payload: null }));
    expect(executeJwtVerifyCommand('a.b.c', 'k', { verifyToken: verify, logger })).toEqual({
      kind: 'success',
      output: { message: 'Signature: VALID', details: [] },
    });
  });

  it('prints payload bytes that are not UTF-8 as replacement characters', () => {
    const verify = vi.fn(() =>
      ok<TokenVerification, TokenVerifyError>({ valid: true, payload: Uint8Array.from([0x7b, 0xff, 0x7d]) })
    );
    expect(executeJwtVerifyCommand('a.b.c', 'k', { verifyToken: verify, logger })).toEqual({
      kind: 'success',
      output: { message: 'Signature: VALID', details: ['Payload: {\uFFFD}'] },
    });
  });

  it('reports INVALID with the rejected exit code for a wrong secret', () => {
    expect(executeJwtVerifyCommand(token, 'other-secret', deps)).toEqual({
      kind: 'failure',
      exitCode: { kind: 'rejected' },
      output: { message: 'Signature: INVALID' },
    });
  });

  it('treats a token without two dots as misuse', () => {
    const result = executeJwtVerifyCommand('abc.def', 'test-secret', deps);
    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'error' },
      output: { message: 'invalid jwt', details: undefined, suggestions: ['Usage: jwt-verify <jwt> <secret>'] },
    });
  });

  it('surfaces an HMAC failure as an error', () => {
    const result = executeJwtVerifyCommand(token, 'test-secret', {
      verifyToken: (t, s) => verifyToken(t, s, { hmac: new FailingHmac() }),
      logger,
    });
    expect(result.kind).toBe('failure');
    if (result.kind === 'failure') {
      expect(result.exitCode).toEqual({ kind: 'error' });
      expect(result.output.message).toBe('HMAC-SHA256 failed\nCause: Error: digest unavailable');
    }
  });
});

describe('executeTotpGenerateCommand', () => {
  it('prints the generated code', () => {
    const generate = vi.fn(() => ok<string, TotpError>('012345'));
    expect(executeTotpGenerateCommand('JBSWY3DPEHPK3PXP', { generate, logger })).toEqual({
      kind: 'success',
      output: { message: 'TOTP: 012345' },
    });
    expect(generate).toHaveBeenCalledWith('JBSWY3DPEHPK3PXP');
  });

  it('fails with exit code error when the period is unusable', () => {
    const generate = vi.fn(() => err<string, TotpError>(Err.invalidPeriod(0)));
    const result = executeTotpGenerateCommand('JBSWY3DPEHPK3PXP', { generate, logger });
    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'error' },
      output: {
        message: 'period must be a positive integer number of seconds, got 0',
        details: undefined,
        suggestions: undefined,
      },
    });
  });
});

describe('executeTotpVerifyCommand', () => {
  const makeDeps = (valid: boolean) => ({
    verify: vi.fn((_secret: string, _code: string, _window: number) => ok<boolean, TotpError>(valid)),
    defaultWindow: 1,
    logger,
  });

  it('uses the default window when none is given', () => {
    const deps = makeDeps(true);
    expect(executeTotpVerifyCommand('S', '123456', undefined, deps)).toEqual({
      kind: 'success',
      output: { message: 'VALID' },
    });
    expect(deps.verify).toHaveBeenCalledWith('S', '123456', 1);
  });

  it('parses an explicit window', () => {
    const deps = makeDeps(false);
    expect(executeTotpVerifyCommand('S', '123456', '3', deps)).toEqual({
      kind: 'failure',
      exitCode: { kind: 'rejected' },
      output: { message: 'INVALID' },
    });
    expect(deps.verify).toHaveBeenCalledWith('S', '123456', 3);
  });

  it.each(['-1', 'abc', '1.5', ''])('rejects window %j as misuse', (windowArg) => {
    const deps = makeDeps(true);
    const result = executeTotpVerifyCommand('S', '123456', windowArg, deps);
    expect(result).toEqual({
      kind: 'failure',
      exitCode: { kind: 'error' },
      output: {
        message: `window must be a non-negative integer: ${windowArg}`,
        details: undefined,
        suggestions: ['Usage: totp-tool verify <base32-secret> <code> [window]'],
      },
    });
    expect(deps.verify).not.toHaveBeenCalled();
  });

  it('rejects windows beyond the safe integer range', () => {
    const result = executeTotpVerifyCommand('S', '123456', '99999999999999999999', makeDeps(true));
    expect(result.kind === 'failure' && result.output.message).toBe('window is too large: 99999999999999999999');
  });

  it('fails when verification cannot run', () => {
    const deps = {
      verify: vi.fn((_secret: string, _code: string, _window: number) =>
        err<boolean, TotpError>(Err.hmacFailure('sha1', new Error('digest unavailable')))
      ),
      defaultWindow: 1,
      logger,
    };
    const result = executeTotpVerifyCommand('JBSWY3DPEHPK3PXP', '123456', undefined, deps);
    expect(result.kind === 'failure' && result.exitCode).toEqual({ kind: 'error' });
  });
});

describe('executeTotpSecretCommand', () => {
  const deps = {
    generateSecret: () => ok<string, InvalidSecretLengthError>('JBSWY3DPEHPK3PXP'),
    buildUri: vi.fn(() => 'otpauth://totp/x'),
    logger,
  };

  it('prints only the secret without issuer and account', () => {
    expect(executeTotpSecretCommand({}, deps)).toEqual({
      kind: 'success',
      output: { message: 'Secret: JBSWY3DPEHPK3PXP', details: [] },
    });
  });

  it('adds the key URI when both are given', () => {
    const result = executeTotpSecretCommand({ issuer: 'Example', account: 'user-1' }, deps);
    expect(result).toEqual({
      kind: 'success',
      output: { message: 'Secret: JBSWY3DPEHPK3PXP', details: ['URI: otpauth://totp/x'] },
    });
    expect(deps.buildUri).toHaveBeenCalledWith({ issuer: 'Example', account: 'user-1', secret: 'JBSWY3DPEHPK3PXP' });
  });

  it('requires issuer and account together', () => {
    expect(executeTotpSecretCommand({ issuer: 'Example' }, deps)).toEqual({
      kind: 'failure',
      exitCode: { kind: 'error' },
      output: {
        message: '--issuer and --account must be given together',
        details: undefined,
        suggestions: ['Usage: totp-tool secret [--issuer <name> --account <name>]'],
      },
    });
  });

  it('fails when the secret cannot be generated', () => {
    const result = executeTotpSecretCommand(
      {},
      { ...deps, generateSecret: () => err<string, InvalidSecretLengthError>(Err.invalidSecretLength(0)) }
    );
    expect(result.kind === 'failure' && result.output.message).toBe('secret byte length must be a positive integer, got 0');
  });
});
