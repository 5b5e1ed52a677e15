/**
 * totp-tool program definition.
 *
 * Each subcommand takes its positional arguments as given, so a code or
 * secret may start with `-`.
 */

import { Command } from 'commander';

import { initializeContainer, container } from '../../di/container.js';
import type { ContainerInitOptions } from '../../di/container.js';
import { DI } from '../../di/tokens.js';
import type { ProcessTerminator } from '../../runtime/ports/process-terminator.js';
import type { ILoggerFactory } from '../../core/logging/types.js';
import type { HmacPort } from '../../ports/hmac.port.js';
import type { TimeClockPort } from '../../ports/time-clock.port.js';
import type { RandomBytesPort } from '../../ports/random-bytes.port.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import { generateTotp, verifyTotp } from '../../core/otp/totp.js';
import { buildOtpauthUri, generateSecret } from '../../core/otp/provisioning.js';
import { interpretCliResult } from '../interpret-result.js';
import {
  executeTotpGenerateCommand,
  executeTotpVerifyCommand,
  executeTotpSecretCommand,
} from '../commands/index.js';
import { VERSION } from '../../version.js';

export function createTotpToolProgram(init: ContainerInitOptions = { runtimeMode: { kind: 'cli' } }): Command {
  const program = new Command()
    .name('totp-tool')
    .description('Generate and verify RFC 6238 time-based one-time passwords (HMAC-SHA1, 30s step)')
    .version(VERSION)
    .enablePositionalOptions();

  const resolveTotpDeps = () => {
    initializeContainer(init);

    return {
      terminator: container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator),
      config: container.resolve<ValidatedConfig>(DI.Config.App),
      loggers: container.resolve<ILoggerFactory>(DI.Logging.Factory),
      hmac: container.resolve<HmacPort>(DI.Crypto.Hmac),
      clock: container.resolve<TimeClockPort>(DI.Runtime.TimeClock),
    };
  };

  program
    .command('generate')
    .description('Print the current code for a base32 secret')
    .argument('<base32-secret>', 'shared secret (RFC 4648 base32)')
    .passThroughOptions()
    .allowExcessArguments(false)
    .action((secret: string) => {
      const { terminator, config, loggers, hmac, clock } = resolveTotpDeps();

      const result = executeTotpGenerateCommand(secret, {
        generate: (s) =>
          generateTotp(s, { hmac, clock }, { periodSeconds: config.otp.periodSeconds, digits: config.otp.digits }),
        logger: loggers.create('totp-generate'),
      });

      interpretCliResult(result, terminator);
    });

  program
    .command('verify')
    .description('Check a 6-digit code against the current time step and its neighbours')
    .argument('<base32-secret>', 'shared secret (RFC 4648 base32)')
    .argument('<code>', 'code to check')
    .argument('[window]', 'number of 30s steps accepted either side of now (default: 1)')
    .passThroughOptions()
    .allowExcessArguments(false)
    .action((secret: string, code: string, window: string | undefined) => {
      const { terminator, config, loggers, hmac, clock } = resolveTotpDeps();

      const result = executeTotpVerifyCommand(secret, code, window, {
        verify: (s, c, w) => verifyTotp(s, c, w, { hmac, clock }, { periodSeconds: config.otp.periodSeconds }),
        defaultWindow: config.otp.defaultWindow,
        logger: loggers.create('totp-verify'),
      });

      interpretCliResult(result, terminator);
    });

  program
    .command('secret')
    .description('Provision a new base32 secret, optionally with an otpauth:// URI')
    .option('--issuer <name>', 'issuer shown by authenticator apps')
    .option('--account <name>', 'account label shown by authenticator apps')
    .passThroughOptions()
    .action((options: { issuer?: string; account?: string }) => {
      const { terminator, config, loggers } = resolveTotpDeps();
      const random = container.resolve<RandomBytesPort>(DI.Crypto.RandomBytes);

      const result = executeTotpSecretCommand(options, {
        generateSecret: () => generateSecret({ random }),
        buildUri: (params) =>
          buildOtpauthUri({ ...params, digits: config.otp.digits, periodSeconds: config.otp.periodSeconds }),
        logger: loggers.create('totp-secret'),
      });

      interpretCliResult(result, terminator);
    });

  return program;
}
