import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import { formatAppError } from '../errors/formatter.js';
import type { ILoggerFactory } from '../core/logging/types.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';
import type { HmacPort } from '../ports/hmac.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { RandomBytesPort } from '../ports/random-bytes.port.js';
import { NodeHmacAdapter } from '../infra/node/hmac/index.js';
import { NodeTimeClock } from '../infra/node/time-clock/index.js';
import { NodeRandomBytes } from '../infra/node/random-bytes/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root), but should not leak into services.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'production' };
}

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
  readonly env?: Record<string, string | undefined>;
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  if (!container.isRegistered(DI.Runtime.ProcessTerminator)) {
    const terminator: ProcessTerminator =
      mode.kind === 'test' ? new ThrowingProcessTerminator() : new NodeProcessTerminator();
    container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: terminator });
  }

  if (!container.isRegistered(DI.Runtime.TimeClock)) {
    container.register<TimeClockPort>(DI.Runtime.TimeClock, { useValue: new NodeTimeClock() });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): void {
  // Tests may inject config explicitly before container initialization.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: options.env ?? process.env });
  if (configResult.isErr()) {
    createBootstrapLogger('container').error({ issues: configResult.error.issues }, 'Configuration rejected');
    console.error(formatAppError(configResult.error));
    const terminator = container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
    return terminator.terminate({ kind: 'failure', status: 1 });
  }

  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function registerServices(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register<ILoggerFactory>(DI.Logging.Factory, {
      useFactory: instanceCachingFactory(
        (c) => new PinoLoggerFactory(c.resolve<ValidatedConfig>(DI.Config.App).logging.level)
      ),
    });
  }

  if (!container.isRegistered(DI.Crypto.Hmac)) {
    container.register<HmacPort>(DI.Crypto.Hmac, { useValue: new NodeHmacAdapter() });
  }

  if (!container.isRegistered(DI.Crypto.RandomBytes)) {
    container.register<RandomBytesPort>(DI.Crypto.RandomBytes, { useValue: new NodeRandomBytes() });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wire the container. Idempotent; registrations made beforehand (fakes in
 * tests) are left in place.
 */
export function initializeContainer(options: ContainerInitOptions = {}): void {
  if (initialized) return;

  registerRuntime(options);
  registerConfig(options);
  registerServices();

  initialized = true;
}

/**
 * Clear every registration. Tests only.
 */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
