export {
  BuildConfig,
  BuildType,
  ComponentId,
  ComponentInstaller,
  ComponentState,
  ExternalToolError,
  InstallationError,
  InstallReport,
  MissingInputError,
  ReleaseId
} from './types';
export { BaseInstaller, InstallContext, PIPELINE_TRANSITIONS } from './base-installer';
export { AmberToolsInstaller } from './ambertools-installer';
export { PmemdInstaller } from './pmemd-installer';
export { LegacyAmberInstaller } from './legacy-amber-installer';
export { AmberInstaller, AmberInstallerOptions, createComponentInstaller, formatSummary } from './amber-installer';
export { expandTilde, getDefaultInstallPrefix, getInstallPrefix } from './utils';
