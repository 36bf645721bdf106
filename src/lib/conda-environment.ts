import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CONDA_DEFAULTS } from '../config';
import { ExternalToolError, MissingInputError } from '../installers/types';
import { DownloadFn, downloadFile } from './downloader';
import { output } from './output';
import { CommandRunner, runStep } from './process-runner';
import { captureShellEnvironment } from './shell-environment';

const COMPONENT = 'environment';

export interface HostPlatform {
  /** `uname -s`, e.g. Linux */
  type: string;
  /** `uname -m`, e.g. x86_64 */
  machine: string;
}

export interface CondaEnvironmentOptions {
  workDir: string;
  runner: CommandRunner;
  download?: DownloadFn;
  platform?: HostPlatform;
}

export function getHostPlatform(): HostPlatform {
  return { type: os.type(), machine: os.machine() };
}

export function getMiniforgeInstallerName(platform: HostPlatform): string {
  return `Miniforge3-${platform.type}-${platform.machine}.sh`;
}

/**
 * Local Miniforge install plus the named environment that carries the
 * build toolchain. Everything lives under the working directory.
 */
export class CondaEnvironment {
  readonly rootDir: string;
  readonly specFile: string;
  readonly envName: string;
  private workDir: string;
  private runner: CommandRunner;
  private download: DownloadFn;
  private platform: HostPlatform;

  constructor(options: CondaEnvironmentOptions) {
    this.workDir = options.workDir;
    this.runner = options.runner;
    this.download = options.download ?? downloadFile;
    this.platform = options.platform ?? getHostPlatform();
    this.rootDir = path.join(this.workDir, CONDA_DEFAULTS.ROOT_DIR);
    this.specFile = path.join(this.workDir, CONDA_DEFAULTS.SPEC_FILE);
    this.envName = CONDA_DEFAULTS.ENV_NAME;
  }

  environmentReady(): boolean {
    return fs.existsSync(this.rootDir) && fs.statSync(this.rootDir).isDirectory();
  }

  getInstallerPath(): string {
    return path.join(this.workDir, getMiniforgeInstallerName(this.platform));
  }

  getInstallerUrl(): string {
    return `${CONDA_DEFAULTS.INSTALLER_BASE_URL}/${getMiniforgeInstallerName(this.platform)}`;
  }

  /**
   * Install Miniforge and create the environment unless the root directory
   * already exists. An installer already sitting in the working directory is
   * reused instead of downloaded again.
   */
  async bootstrapEnvironment(env: NodeJS.ProcessEnv): Promise<void> {
    if (this.environmentReady()) {
      output.info(`${CONDA_DEFAULTS.ROOT_DIR} directory already exists. Skipping installation of Miniforge3.`);
      return;
    }

    if (!fs.existsSync(this.specFile)) {
      throw new MissingInputError(
        `${CONDA_DEFAULTS.SPEC_FILE} not found in ${this.workDir}`,
        COMPONENT,
        'bootstrap',
        `Place the ${CONDA_DEFAULTS.SPEC_FILE} environment specification next to the Amber archives`
      );
    }

    const installerPath = this.getInstallerPath();
    if (!fs.existsSync(installerPath)) {
      const url = this.getInstallerUrl();
      output.info(`Downloading ${url}...`);
      try {
        await this.download(url, installerPath);
      } catch (error) {
        throw new ExternalToolError(
          `Could not download the Miniforge installer: ${error instanceof Error ? error.message : error}`,
          COMPONENT,
          'download',
          `GET ${url}`,
          null,
          error
        );
      }
    }

    output.info(`Installing Miniforge3 into ${this.rootDir}...`);
    await runStep(
      this.runner,
      'bash',
      [installerPath, '-b', '-p', this.rootDir],
      { cwd: this.workDir, env },
      { component: COMPONENT, step: 'bootstrap' }
    );

    output.info(`Creating conda environment '${this.envName}'...`);
    await runStep(
      this.runner,
      'bash',
      ['-c', 'source "$1/bin/activate" && conda env create -f "$2"', 'bash', this.rootDir, this.specFile],
      { cwd: this.workDir, env },
      { component: COMPONENT, step: 'bootstrap' }
    );
  }

  /**
   * Returns the environment of a shell with the named conda environment
   * active; later tools must be spawned with it.
   */
  async activateEnvironment(env: NodeJS.ProcessEnv): Promise<NodeJS.ProcessEnv> {
    output.info(`Activating conda environment '${this.envName}'...`);
    return captureShellEnvironment(
      this.runner,
      'source "$1/bin/activate" && conda activate "$2"',
      [this.rootDir, this.envName],
      { cwd: this.workDir, env },
      { component: COMPONENT, step: 'activate' }
    );
  }
}
