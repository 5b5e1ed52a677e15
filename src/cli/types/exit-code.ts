import type { ExitCode as ProcessExitCode } from '../../runtime/ports/process-terminator.js';

/**
 * Typed exit codes for CLI commands.
 * Prefer these over raw integers for type safety.
 */
export type ExitCode =
  | { kind: 'success' }   // 0 - proof accepted / output produced
  | { kind: 'error' }     // 1 - usage, parse or fatal errors
  | { kind: 'rejected' }; // 2 - proof checked and found invalid

/**
 * Convert ExitCode to ProcessTerminator's expected format.
 */
export function toProcessExitCode(exitCode: ExitCode): ProcessExitCode {
  switch (exitCode.kind) {
    case 'success':
      return { kind: 'success' };
    case 'error':
      return { kind: 'failure', status: 1 };
    case 'rejected':
      return { kind: 'failure', status: 2 };
  }
}
