/**
 * Port for terminating the current process.
 * This should only be used by composition roots / entrypoints.
 *
 * Failure statuses follow the CLI contract: 1 for usage/parse errors,
 * 2 for a proof that was checked and rejected.
 */
export type ExitCode =
  | { kind: 'success' }
  | { kind: 'failure'; status: 1 | 2 };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
