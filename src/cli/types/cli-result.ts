/**
 * CLI Result Types
 *
 * Discriminated unions for CLI command outcomes.
 * Commands return these types; the composition root interprets them.
 */

import type { ExitCode } from './exit-code.js';
import type { UsageError } from '../../errors/app-error.js';

/**
 * Structured output for CLI display.
 * `message` and `details` are verdict lines; `suggestions` only accompany errors.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

/**
 * Result of a CLI command execution.
 * All commands should return this type.
 */
export type CliResult =
  | { kind: 'success'; output?: CliOutput }
  | { kind: 'failure'; exitCode: ExitCode; output: CliOutput };

/**
 * Helper to create a success result.
 */
export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

/**
 * Helper to create a success result with just a message.
 */
export function successMessage(message: string): CliResult {
  return { kind: 'success', output: { message } };
}

/**
 * A verdict that the proof was checked and did not hold (exit 2).
 */
export function rejected(message: string): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'rejected' },
    output: { message },
  };
}

/**
 * Helper to create an error result (exit 1).
 */
export function failure(
  message: string,
  options?: {
    details?: readonly string[];
    suggestions?: readonly string[];
  }
): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'error' },
    output: {
      message,
      details: options?.details,
      suggestions: options?.suggestions,
    },
  };
}

/**
 * Bad arguments: the error message, then the usage line as a suggestion.
 */
export function usageFailure(error: UsageError): CliResult {
  return failure(error.message, { suggestions: [`Usage: ${error.usage}`] });
}
