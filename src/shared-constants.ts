/**
 * Shared constants between the argument resolver, the usage text and the
 * component installers. NEVER duplicate these strings - always import from here
 */

import type { BuildType } from './installers/types';

// Build-type selector flags; exactly one per invocation
export const BUILD_TYPE_FLAGS: ReadonlyMap<string, BuildType> = new Map<string, BuildType>([
  ['-cpu', 'cpu'],
  ['-gpu', 'gpu'],
  ['-mpi_cpu', 'mpi_cpu'],
  ['-mpi_gpu', 'mpi_gpu'],
]);

export const FLAGS = {
  HELP: ['-h', '--help'],
  VERSION: ['-V', '--version'],
  INSTALL_PATH: '-path_install',
  COMPONENT_PATH_PREFIX: '-path_',
  NPROC: '-nproc',
  RELEASE: '-release',
} as const;

// QUICK resets the compiler flags and loses the MPI include path
// https://github.com/merzlab/QUICK/issues/343
export const QUICK_CMAKE_PATCH = {
  RELATIVE_PATH: 'AmberTools/src/quick/CMakeLists.txt',
  PATTERNS: [
    'set(CMAKE_C_FLAGS "")',
    'set(CMAKE_CXX_FLAGS "")',
    'set(CMAKE_Fortran_FLAGS "")',
  ],
  COMMENT_MARKER: '# ',
} as const;

export const UPDATE_SCRIPT = {
  NAME: 'update_amber',
  ARGS: ['--update'],
} as const;
