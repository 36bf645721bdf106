/**
 * Central configuration constants for the Amber installer
 *
 * Release profiles, component definitions and environment defaults live
 * here so the argument resolver, the pipeline and the usage text agree.
 */

import type { BuildType, ComponentId, ReleaseId } from './installers/types';

export const AMBER_DOWNLOAD_URL = 'https://ambermd.org/GetAmber.php';

export const DEFAULT_RELEASE: ReleaseId = 'amber25';

export interface BuildTypeDefinition {
  parallelism: boolean;
  accelerator: boolean;
  label: string;
}

export const BUILD_TYPES: Readonly<Record<BuildType, BuildTypeDefinition>> = {
  cpu: { parallelism: false, accelerator: false, label: 'serial CPU' },
  gpu: { parallelism: false, accelerator: true, label: 'serial GPU' },
  mpi_cpu: { parallelism: true, accelerator: false, label: 'parallel CPU' },
  mpi_gpu: { parallelism: true, accelerator: true, label: 'parallel GPU' },
};

export interface ComponentDefinition {
  displayName: string;
  /** Vendor archives, extracted in order into the working directory */
  archives: readonly string[];
  /** Directory the archives unpack into */
  sourceDir: string;
}

export const COMPONENTS: Readonly<Record<ComponentId, ComponentDefinition>> = {
  ambertools: {
    displayName: 'AmberTools25',
    archives: ['ambertools25.tar.bz2'],
    sourceDir: 'ambertools25_src',
  },
  pmemd: {
    displayName: 'PMEMD24',
    archives: ['pmemd24.tar.bz2'],
    sourceDir: 'pmemd24_src',
  },
  amber: {
    displayName: 'Amber24 and AmberTools24',
    archives: ['AmberTools24.tar.bz2', 'Amber24.tar.bz2'],
    sourceDir: 'amber24_src',
  },
};

export interface ReleaseDefinition {
  /** Build order. A release with no selectable components builds all of these. */
  components: readonly ComponentId[];
  /** Components the user picks with -<component>; empty for legacy releases */
  selectable: readonly ComponentId[];
  /** Install prefix relative to the home directory */
  defaultPrefix: string;
}

export const RELEASES: Readonly<Record<ReleaseId, ReleaseDefinition>> = {
  amber25: {
    components: ['ambertools', 'pmemd'],
    selectable: ['ambertools', 'pmemd'],
    defaultPrefix: 'amber25',
  },
  amber24: {
    components: ['amber'],
    selectable: [],
    defaultPrefix: 'apps/amber24',
  },
};

export const CONDA_DEFAULTS = {
  ROOT_DIR: 'miniforge3',
  ENV_NAME: 'amber-installer',
  SPEC_FILE: 'env.yml',
  INSTALLER_BASE_URL: 'https://github.com/conda-forge/miniforge/releases/latest/download',
} as const;

export const CMAKE_DEFAULTS = {
  COMPILER: 'GNU',
  BUILD_DIR: 'build',
  METADATA_DIR: 'CMakeFiles',
} as const;

// ANSI color codes for tagged console output
export const ANSI_COLORS = {
  RED: '\x1b[0;31m',
  GREEN: '\x1b[0;32m',
  YELLOW: '\x1b[1;33m',
  BLUE: '\x1b[1;34m',
  RESET: '\x1b[0m',
} as const;

export function isReleaseId(value: string): value is ReleaseId {
  return Object.prototype.hasOwnProperty.call(RELEASES, value);
}
