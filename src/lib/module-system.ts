import { ExternalToolError } from '../installers/types';
import { output } from './output';
import { CommandRunner } from './process-runner';
import { captureShellEnvironment } from './shell-environment';

// Exit status used by the purge script when `module` is not defined
const MODULE_COMMAND_MISSING = 127;

const PURGE_SCRIPT =
  `command -v module >/dev/null 2>&1 || exit ${MODULE_COMMAND_MISSING}; module purge`;

/**
 * Lmod exports LMOD_CMD into every shell it manages
 */
export function isModuleSystemActive(env: NodeJS.ProcessEnv): boolean {
  return Boolean(env.LMOD_CMD);
}

/**
 * Unload all environment modules so site compilers and MPI stacks do not
 * leak into the build. Never fatal: on any failure the environment is
 * returned unchanged.
 */
export async function purgeModules(
  runner: CommandRunner,
  env: NodeJS.ProcessEnv,
  cwd: string
): Promise<NodeJS.ProcessEnv> {
  output.info('Detected Lmod environment. Purging loaded modules...');

  try {
    return await captureShellEnvironment(runner, PURGE_SCRIPT, [], { cwd, env }, {
      component: 'environment',
      step: 'purge'
    });
  } catch (error) {
    if (error instanceof ExternalToolError && error.exitCode === MODULE_COMMAND_MISSING) {
      output.warn('The module command is not available; skipping module purge');
    } else {
      output.warn(`Module purge failed, continuing with the current environment: ${error instanceof Error ? error.message : error}`);
    }
    return env;
  }
}
