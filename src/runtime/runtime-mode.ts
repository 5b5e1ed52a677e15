/**
 * Runtime mode of the current process.
 * Injected through DI rather than inferred ad-hoc via env vars.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };
