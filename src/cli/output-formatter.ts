/**
 * CLI Output Formatter
 *
 * Presentation layer for CLI output.
 * Verdict lines (`Signature: VALID`, `TOTP: 123456`, ...) are printed verbatim
 * to stdout so scripts can match them; errors go to stderr, styled with chalk.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

/**
 * Format verdict lines: the message followed by each detail line, unstyled.
 */
export function formatVerdict(output: CliOutput): string {
  return [output.message, ...(output.details ?? [])].join('\n');
}

/**
 * Format an error with its details and suggestions.
 */
export function formatError(output: CliOutput): string {
  const lines: string[] = [chalk.red(`error: ${output.message}`)];

  if (output.details && output.details.length > 0) {
    output.details.forEach(detail => {
      lines.push(chalk.white(`  ${detail}`));
    });
  }

  if (output.suggestions && output.suggestions.length > 0) {
    output.suggestions.forEach(suggestion => {
      lines.push(chalk.gray(`  ${suggestion}`));
    });
  }

  return lines.join('\n');
}

export interface FormattedResult {
  readonly stream: 'stdout' | 'stderr';
  readonly text: string;
}

/**
 * Format a CliResult and pick the stream it belongs on.
 */
export function formatResult(result: CliResult): FormattedResult {
  switch (result.kind) {
    case 'success':
      return { stream: 'stdout', text: result.output ? formatVerdict(result.output) : '' };

    case 'failure':
      return result.exitCode.kind === 'rejected'
        ? { stream: 'stdout', text: formatVerdict(result.output) }
        : { stream: 'stderr', text: formatError(result.output) };
  }
}

/**
 * Print a CliResult to console.
 */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted.text) return;

  if (formatted.stream === 'stderr') {
    console.error(formatted.text);
  } else {
    console.log(formatted.text);
  }
}
