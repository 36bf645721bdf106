#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  AmberInstaller,
  BuildConfig,
  ExternalToolError,
  InstallReport,
  MissingInputError
} from '../installers';
import { output } from '../lib/output';
import { resolveArguments } from './args';
import { ResolveHost, UsageError } from './types';
import { formatUsage } from './usage';

const PROGRAM_NAME = 'amber-installer';

export interface CliDependencies {
  host: ResolveHost;
  install(config: BuildConfig): Promise<InstallReport>;
}

export function defaultDependencies(): CliDependencies {
  const workDir = process.cwd();
  return {
    host: { homeDir: os.homedir(), workDir, cpuCount: os.availableParallelism() },
    install: config => new AmberInstaller(config, { workDir }).install()
  };
}

export function readPackageVersion(): string {
  const packageJsonPath = path.join(__dirname, '../../package.json');
  if (!fs.existsSync(packageJsonPath)) {
    return '0.0.0';
  }

  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

/**
 * Exit status for a failure: the failing tool's own status when it has one
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ExternalToolError && error.exitCode !== null && error.exitCode > 0) {
    return error.exitCode;
  }
  return 1;
}

export function reportFailure(error: unknown): void {
  if (error instanceof UsageError) {
    output.error(`Error: ${error.message}`);
    console.log(formatUsage(PROGRAM_NAME));
    return;
  }

  output.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof MissingInputError && error.remedy) {
    output.warn(error.remedy);
  }
}

/**
 * Commander carries the program name, description and version text. The
 * installer flags are single-dash words that its option grammar does not
 * express, so the raw tokens go to the argument resolver instead of
 * commander's parser.
 */
export function createProgram(): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description('Build and install AmberTools and PMEMD from vendor source archives')
    .version(readPackageVersion(), '-V, --version', 'Show the installer version');
}

export async function runInstaller(
  tokens: readonly string[],
  deps: CliDependencies,
  program: Command = createProgram()
): Promise<number> {
  const resolution = resolveArguments(tokens, deps.host);

  switch (resolution.kind) {
    case 'help':
      console.log(formatUsage(program.name()));
      return 1;
    case 'version':
      console.log(program.version() ?? readPackageVersion());
      return 0;
    case 'error':
      reportFailure(resolution.error);
      return 1;
    case 'config':
      break;
  }

  try {
    await deps.install(resolution.config);
    return 0;
  } catch (error) {
    reportFailure(error);
    return exitCodeFor(error);
  }
}

export function main(argv: readonly string[], deps: CliDependencies): Promise<number> {
  return runInstaller(argv, deps, createProgram());
}

// Only run if this file is executed directly
if (require.main === module) {
  main(process.argv.slice(2), defaultDependencies()).then(
    code => {
      process.exitCode = code;
    },
    error => {
      reportFailure(error);
      process.exitCode = 1;
    }
  );
}
