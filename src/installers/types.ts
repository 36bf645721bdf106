export type ReleaseId = 'amber24' | 'amber25';

export type ComponentId = 'ambertools' | 'pmemd' | 'amber';

export type BuildType = 'cpu' | 'gpu' | 'mpi_cpu' | 'mpi_gpu';

/**
 * Validated, immutable description of one installer invocation
 */
export interface BuildConfig {
  readonly release: ReleaseId;
  readonly buildType: BuildType;
  readonly parallelismEnabled: boolean;
  readonly acceleratorEnabled: boolean;
  /** Selected components, in the release's build order */
  readonly components: readonly ComponentId[];
  readonly installPrefixes: ReadonlyMap<ComponentId, string>;
  readonly compileParallelism: number;
}

export type ComponentState =
  | 'not-started'
  | 'verified'
  | 'extracted'
  | 'updated'
  | 'patched'
  | 'configured'
  | 'built'
  | 'installed'
  | 'failed';

export type PipelineStep =
  | 'verify'
  | 'extract'
  | 'update'
  | 'patch'
  | 'configure'
  | 'build'
  | 'install';

export type EnvironmentStep = 'purge' | 'download' | 'bootstrap' | 'activate';

export type InstallStep = PipelineStep | EnvironmentStep;

export interface ComponentInstaller {
  install(): Promise<void>;
  getName(): ComponentId;
  getDisplayName(): string;
  getState(): ComponentState;
  getInstallPrefix(): string;
}

export interface InstalledComponent {
  component: ComponentId;
  displayName: string;
  prefix: string;
}

export interface InstallReport {
  release: ReleaseId;
  buildType: BuildType;
  installed: InstalledComponent[];
}

export class InstallationError extends Error {
  constructor(
    message: string,
    public component: string,
    public step: InstallStep,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'InstallationError';
  }
}

/**
 * A required input file is absent. `remedy` tells the user where to get it.
 */
export class MissingInputError extends InstallationError {
  constructor(
    message: string,
    component: string,
    step: InstallStep,
    public remedy?: string
  ) {
    super(message, component, step);
    this.name = 'MissingInputError';
  }
}

export class ExternalToolError extends InstallationError {
  constructor(
    message: string,
    component: string,
    step: InstallStep,
    public commandLine: string,
    public exitCode: number | null,
    cause?: unknown
  ) {
    super(message, component, step, cause);
    this.name = 'ExternalToolError';
  }
}
