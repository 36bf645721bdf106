import { CommandRunner, StepContext, runStep } from './process-runner';

/**
 * Parse the NUL-separated output of `env -0` into an environment object.
 * Values may contain newlines and '='; only the first '=' splits.
 */
export function parseEnvironmentBlock(block: string): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};

  for (const entry of block.split('\0')) {
    const separator = entry.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    env[entry.slice(0, separator)] = entry.slice(separator + 1);
  }

  return env;
}

/**
 * Run a bash snippet and return the environment it leaves behind. Shell
 * functions such as `conda activate` or `module purge` only change their
 * own shell, so the result becomes the environment of later child processes.
 *
 * `args` are passed as positional parameters ($1, $2, ...) rather than
 * spliced into the script. Anything the script prints goes to stderr so
 * stdout carries only the `env -0` block.
 */
export async function captureShellEnvironment(
  runner: CommandRunner,
  script: string,
  args: readonly string[],
  options: { cwd: string; env: NodeJS.ProcessEnv },
  context: StepContext
): Promise<NodeJS.ProcessEnv> {
  const result = await runStep(
    runner,
    'bash',
    ['-c', `{ ${script}; } >&2 && env -0`, 'bash', ...args],
    { cwd: options.cwd, env: options.env, captureOutput: true },
    context
  );

  return parseEnvironmentBlock(result.stdout);
}
