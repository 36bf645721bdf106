import * as fs from 'fs';
import * as path from 'path';
import { AMBER_DOWNLOAD_URL, CMAKE_DEFAULTS, COMPONENTS, ComponentDefinition } from '../config';
import { UPDATE_SCRIPT } from '../shared-constants';
import { CmakeOptions, renderCmakeDefinitions, toCmakeBoolean } from '../lib/cmake-options';
import { output } from '../lib/output';
import { CommandRunner, RunOptions, runStep } from '../lib/process-runner';
import {
  BuildConfig,
  ComponentId,
  ComponentInstaller,
  ComponentState,
  InstallationError,
  MissingInputError,
  PipelineStep
} from './types';
import { getInstallPrefix } from './utils';

export interface InstallContext {
  workDir: string;
  runner: CommandRunner;
  /** Environment for every child process, usually the activated conda env */
  env: NodeJS.ProcessEnv;
  config: BuildConfig;
}

/**
 * Each state has at most one way forward; `failed` and `installed` are terminal.
 */
export const PIPELINE_TRANSITIONS: Readonly<Record<ComponentState, { step: PipelineStep; next: ComponentState } | undefined>> = {
  'not-started': { step: 'verify', next: 'verified' },
  verified: { step: 'extract', next: 'extracted' },
  extracted: { step: 'update', next: 'updated' },
  updated: { step: 'patch', next: 'patched' },
  patched: { step: 'configure', next: 'configured' },
  configured: { step: 'build', next: 'built' },
  built: { step: 'install', next: 'installed' },
  installed: undefined,
  failed: undefined
};

export abstract class BaseInstaller implements ComponentInstaller {
  private state: ComponentState = 'not-started';

  constructor(protected readonly context: InstallContext) {}

  abstract getName(): ComponentId;

  /** Component-specific cache definitions appended after the shared ones */
  protected abstract getComponentCmakeOptions(): CmakeOptions;

  /** Source edits applied after the update step; none by default */
  protected async applyPatches(): Promise<void> {}

  getState(): ComponentState {
    return this.state;
  }

  getDefinition(): ComponentDefinition {
    return COMPONENTS[this.getName()];
  }

  getDisplayName(): string {
    return this.getDefinition().displayName;
  }

  getSourceDir(): string {
    return path.join(this.context.workDir, this.getDefinition().sourceDir);
  }

  getBuildDir(): string {
    return path.join(this.getSourceDir(), CMAKE_DEFAULTS.BUILD_DIR);
  }

  getInstallPrefix(): string {
    return getInstallPrefix(this.context.config, this.getName());
  }

  getCmakeArguments(): string[] {
    const { config } = this.context;
    return [
      '..',
      ...renderCmakeDefinitions({
        CMAKE_INSTALL_PREFIX: this.getInstallPrefix(),
        COMPILER: CMAKE_DEFAULTS.COMPILER,
        MPI: config.parallelismEnabled,
        CUDA: config.acceleratorEnabled,
        INSTALL_TESTS: true,
        ...this.getComponentCmakeOptions()
      })
    ];
  }

  async install(): Promise<void> {
    const name = this.getDisplayName();

    let transition = PIPELINE_TRANSITIONS[this.state];
    if (!transition) {
      throw new InstallationError(`${name} cannot be installed from state ${this.state}`, this.getName(), 'verify');
    }

    while (transition) {
      try {
        await this.runPipelineStep(transition.step);
      } catch (error) {
        this.state = 'failed';
        if (error instanceof InstallationError) {
          throw error;
        }
        throw new InstallationError(
          `Failed to ${transition.step} ${name}: ${error instanceof Error ? error.message : error}`,
          this.getName(),
          transition.step,
          error
        );
      }
      this.state = transition.next;
      transition = PIPELINE_TRANSITIONS[this.state];
    }

    output.success(`${name} build complete.`);
  }

  missingArchives(): string[] {
    return this.getDefinition().archives.filter(
      archive => !fs.existsSync(path.join(this.context.workDir, archive))
    );
  }

  sourceTreeExists(): boolean {
    return fs.existsSync(this.getSourceDir());
  }

  hasStaleBuildMetadata(): boolean {
    return fs.existsSync(path.join(this.getBuildDir(), CMAKE_DEFAULTS.METADATA_DIR));
  }

  protected async run(command: string, args: readonly string[], cwd: string, step: PipelineStep): Promise<void> {
    const options: RunOptions = { cwd, env: this.context.env };
    await runStep(this.context.runner, command, args, options, { component: this.getName(), step });
  }

  private async runPipelineStep(step: PipelineStep): Promise<void> {
    switch (step) {
      case 'verify':
        return this.verify();
      case 'extract':
        return this.extract();
      case 'update':
        return this.update();
      case 'patch':
        return this.applyPatches();
      case 'configure':
        return this.configure();
      case 'build':
        return this.build();
      case 'install':
        return this.installArtifacts();
    }
  }

  private verify(): void {
    const missing = this.missingArchives();
    if (missing.length > 0) {
      throw new MissingInputError(
        `${missing.join(', ')} not found in the current directory.`,
        this.getName(),
        'verify',
        `Please download ${missing.join(' and ')} from ${AMBER_DOWNLOAD_URL}`
      );
    }
  }

  private async extract(): Promise<void> {
    const { sourceDir, archives } = this.getDefinition();
    output.info(`Extracting ${this.getDisplayName()}...`);

    if (this.sourceTreeExists()) {
      output.info(`${sourceDir} already exists. Skipping extraction.`);
      return;
    }

    for (const archive of archives) {
      await this.run('tar', ['xvjf', archive], this.context.workDir, 'extract');
    }
  }

  private async update(): Promise<void> {
    const sourceDir = this.getSourceDir();
    await this.run(path.join(sourceDir, UPDATE_SCRIPT.NAME), UPDATE_SCRIPT.ARGS, sourceDir, 'update');
  }

  private async configure(): Promise<void> {
    const { config } = this.context;
    const buildDir = this.getBuildDir();
    fs.mkdirSync(buildDir, { recursive: true });

    output.info(
      `Configuring ${this.getDisplayName()} with MPI=${toCmakeBoolean(config.parallelismEnabled)}, ` +
      `CUDA=${toCmakeBoolean(config.acceleratorEnabled)}, INSTALL_PREFIX=${this.getInstallPrefix()}...`
    );

    if (this.hasStaleBuildMetadata()) {
      output.info(`${CMAKE_DEFAULTS.METADATA_DIR} folder found. Running 'make clean'...`);
      await this.run('make', ['clean'], buildDir, 'configure');
    }

    await this.run('cmake', this.getCmakeArguments(), buildDir, 'configure');
  }

  private async build(): Promise<void> {
    const jobs = this.context.config.compileParallelism;
    output.info(`Building ${this.getDisplayName()} with ${jobs} threads...`);
    await this.run('make', [`-j${jobs}`], this.getBuildDir(), 'build');
  }

  private async installArtifacts(): Promise<void> {
    await this.run('make', ['install'], this.getBuildDir(), 'install');
  }
}
