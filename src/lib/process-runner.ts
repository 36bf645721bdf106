import { spawn } from 'child_process';
import { ExternalToolError, InstallStep } from '../installers/types';

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Collect stdout instead of passing it through to the terminal */
  captureOutput?: boolean;
}

export interface RunResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<RunResult>;
}

export interface StepContext {
  component: string;
  step: InstallStep;
}

/**
 * Spawns external tools and blocks until they exit. No timeout: a hung
 * build holds the installer until the user interrupts it.
 */
export class ProcessRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: options.captureOutput ? ['inherit', 'pipe', 'inherit'] : 'inherit'
      });

      const chunks: Buffer[] = [];
      child.stdout?.on('data', (chunk: Buffer) => chunks.push(chunk));

      child.once('error', reject);
      child.once('close', (exitCode, signal) => {
        resolve({
          exitCode,
          signal,
          stdout: Buffer.concat(chunks).toString('utf8')
        });
      });
    });
  }
}

export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(part => (part === '' || /\s/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/**
 * Run one external step and turn anything but a clean exit into an
 * ExternalToolError tagged with the component and step.
 */
export async function runStep(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options: RunOptions,
  context: StepContext
): Promise<RunResult> {
  const commandLine = formatCommandLine(command, args);

  let result: RunResult;
  try {
    result = await runner.run(command, args, options);
  } catch (error) {
    throw new ExternalToolError(
      `Could not start ${commandLine}: ${error instanceof Error ? error.message : error}`,
      context.component,
      context.step,
      commandLine,
      null,
      error
    );
  }

  if (result.exitCode !== 0) {
    const reason = result.signal
      ? `was terminated by ${result.signal}`
      : `exited with status ${result.exitCode}`;
    throw new ExternalToolError(
      `${commandLine} ${reason}`,
      context.component,
      context.step,
      commandLine,
      result.exitCode
    );
  }

  return result;
}
