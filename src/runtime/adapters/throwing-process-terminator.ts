import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: never exits the process.
 * Useful to catch accidental termination during tests.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    const suffix = code.kind === 'failure' ? `:${code.status}` : '';
    throw new Error(`[ProcessTerminator] terminate(${code.kind}${suffix})`);
  }
}
