/**
 * jwt-verify program definition.
 *
 * Arguments after the token are taken as given, so a secret may start with `-`.
 */

import { Command } from 'commander';

import { initializeContainer, container } from '../../di/container.js';
import type { ContainerInitOptions } from '../../di/container.js';
import { DI } from '../../di/tokens.js';
import type { ProcessTerminator } from '../../runtime/ports/process-terminator.js';
import type { ILoggerFactory } from '../../core/logging/types.js';
import type { HmacPort } from '../../ports/hmac.port.js';
import { verifyToken } from '../../core/token/token-verifier.js';
import { interpretCliResult } from '../interpret-result.js';
import { executeJwtVerifyCommand } from '../commands/index.js';
import { VERSION } from '../../version.js';

export function createJwtVerifyProgram(init: ContainerInitOptions = { runtimeMode: { kind: 'cli' } }): Command {
  return new Command()
    .name('jwt-verify')
    .description('Verify the HS256 signature of a compact JWT and print its payload')
    .version(VERSION)
    .argument('<jwt>', 'token to verify (header.payload.signature)')
    .argument('<secret>', 'shared HMAC-SHA256 secret')
    .passThroughOptions()
    .allowExcessArguments(false)
    .action((jwt: string, secret: string) => {
      initializeContainer(init);

      const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
      const hmac = container.resolve<HmacPort>(DI.Crypto.Hmac);
      const loggers = container.resolve<ILoggerFactory>(DI.Logging.Factory);

      const result = executeJwtVerifyCommand(jwt, secret, {
        verifyToken: (token, key) => verifyToken(token, key, { hmac }),
        logger: loggers.create('jwt-verify'),
      });

      interpretCliResult(result, terminator);
    });
}
