import type { BuildConfig } from '../installers/types';

/**
 * Malformed or contradictory command line. `token` is the offending
 * argument when one can be named.
 */
export class UsageError extends Error {
  constructor(message: string, public token?: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Facts about the host the resolver needs, gathered by the caller */
export interface ResolveHost {
  homeDir: string;
  /** Relative install paths resolve against this */
  workDir: string;
  cpuCount: number;
}

export type ArgumentResolution =
  | { kind: 'config'; config: BuildConfig }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; error: UsageError };
