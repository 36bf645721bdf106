import { BUILD_TYPES } from '../config';
import { CondaEnvironment, HostPlatform } from '../lib/conda-environment';
import { DownloadFn } from '../lib/downloader';
import { isModuleSystemActive, purgeModules } from '../lib/module-system';
import { output } from '../lib/output';
import { CommandRunner, ProcessRunner } from '../lib/process-runner';
import { AmberToolsInstaller } from './ambertools-installer';
import { BaseInstaller, InstallContext } from './base-installer';
import { LegacyAmberInstaller } from './legacy-amber-installer';
import { PmemdInstaller } from './pmemd-installer';
import { BuildConfig, ComponentId, InstallReport, InstalledComponent } from './types';

export interface AmberInstallerOptions {
  workDir: string;
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
  download?: DownloadFn;
  platform?: HostPlatform;
}

export function createComponentInstaller(component: ComponentId, context: InstallContext): BaseInstaller {
  switch (component) {
    case 'ambertools':
      return new AmberToolsInstaller(context);
    case 'pmemd':
      return new PmemdInstaller(context);
    case 'amber':
      return new LegacyAmberInstaller(context);
  }
}

export function formatSummary(report: InstallReport): string {
  const installed = report.installed
    .map(({ displayName, prefix }) => `${displayName} at ${prefix}`)
    .join(', ');
  return `Installation completed successfully (${BUILD_TYPES[report.buildType].label}): ${installed}.`;
}

/**
 * Runs one invocation end to end: module purge, conda bootstrap and
 * activation, then every selected component in order. The first error
 * stops everything; nothing is rolled back.
 */
export class AmberInstaller {
  private workDir: string;
  private runner: CommandRunner;
  private env: NodeJS.ProcessEnv;
  private conda: CondaEnvironment;

  constructor(private config: BuildConfig, options: AmberInstallerOptions) {
    this.workDir = options.workDir;
    this.runner = options.runner ?? new ProcessRunner();
    this.env = options.env ?? process.env;
    this.conda = new CondaEnvironment({
      workDir: this.workDir,
      runner: this.runner,
      download: options.download,
      platform: options.platform
    });
  }

  async install(): Promise<InstallReport> {
    const { config } = this;
    output.info(`Setting up ${config.release} (${BUILD_TYPES[config.buildType].label}) in ${this.workDir}\n`);

    let env = this.env;
    if (isModuleSystemActive(env)) {
      env = await purgeModules(this.runner, env, this.workDir);
    }

    await this.conda.bootstrapEnvironment(env);
    env = await this.conda.activateEnvironment(env);

    const context: InstallContext = { workDir: this.workDir, runner: this.runner, env, config };
    const installed: InstalledComponent[] = [];

    for (const component of config.components) {
      const installer = createComponentInstaller(component, context);
      await installer.install();
      installed.push({
        component,
        displayName: installer.getDisplayName(),
        prefix: installer.getInstallPrefix()
      });
    }

    const report: InstallReport = { release: config.release, buildType: config.buildType, installed };
    output.success(formatSummary(report));
    return report;
  }
}
