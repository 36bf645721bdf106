import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { RunOptions, RunResult } from './lib/process-runner';
import type { BuildConfig, ComponentId } from './installers/types';

// One scratch working directory per Jest worker
export const TEST_TEMP_DIR = path.join(os.tmpdir(), `amber-installer-tests-${process.env.JEST_WORKER_ID ?? '0'}`);
export const TEST_HOME_DIR = path.join(TEST_TEMP_DIR, 'home');
export const TEST_WORK_DIR = path.join(TEST_TEMP_DIR, 'work');

function removeTestDir(): void {
  let retries = 3;
  while (retries > 0 && fs.existsSync(TEST_TEMP_DIR)) {
    try {
      fs.rmSync(TEST_TEMP_DIR, { recursive: true, force: true });
      break;
    } catch (error) {
      retries--;
      if (retries === 0) {
        console.warn(`Failed to clean up test directory, continuing... (${error})`);
      }
    }
  }
}

beforeEach(() => {
  jest.clearAllMocks();
  jest.restoreAllMocks();

  removeTestDir();
  fs.mkdirSync(TEST_HOME_DIR, { recursive: true });
  fs.mkdirSync(TEST_WORK_DIR, { recursive: true });
});

afterAll(() => {
  removeTestDir();
});

/**
 * Write a file relative to the test working directory, creating parents
 */
export function writeWorkFile(relativePath: string, content = ''): string {
  const filePath = path.join(TEST_WORK_DIR, relativePath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function createArchives(...names: string[]): void {
  for (const name of names) {
    writeWorkFile(name, 'archive');
  }
}

export function result(exitCode: number | null, stdout = ''): RunResult {
  return { exitCode, signal: null, stdout };
}

/**
 * CommandRunner stand-in: every command succeeds unless the test overrides it
 */
export function createMockRunner() {
  const run = jest.fn((_command: string, _args: readonly string[], _options?: RunOptions) =>
    Promise.resolve(result(0))
  );
  return { run };
}

/** "command arg arg" for each recorded call, in order */
export function commandLines(run: ReturnType<typeof createMockRunner>['run']): string[] {
  return run.mock.calls.map(([command, args]) => [command, ...args].join(' '));
}

/** serial GPU build of both amber25 components, four jobs */
export function createBuildConfig(overrides: Partial<BuildConfig> = {}): BuildConfig {
  return {
    release: 'amber25',
    buildType: 'gpu',
    parallelismEnabled: false,
    acceleratorEnabled: true,
    components: ['ambertools', 'pmemd'],
    installPrefixes: new Map<ComponentId, string>([
      ['ambertools', '/opt/amber25'],
      ['pmemd', '/opt/pmemd']
    ]),
    compileParallelism: 4,
    ...overrides
  };
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
}
