// Main entry point for the amber-installer library
export * from './installers';
export { resolveArguments } from './cli/args';
export { formatUsage } from './cli/usage';
export { ArgumentResolution, ResolveHost, UsageError } from './cli/types';
export { CommandRunner, ProcessRunner, RunOptions, RunResult } from './lib/process-runner';
export * from './config';
export * from './shared-constants';
