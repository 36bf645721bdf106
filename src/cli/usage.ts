import { COMPONENTS, DEFAULT_RELEASE, RELEASES } from '../config';
import { FLAGS } from '../shared-constants';
import { componentFlag, componentPathFlag } from './args';

const FLAG_COLUMN = 24;

function option(flag: string, description: string): string {
  return `  ${flag.padEnd(FLAG_COLUMN)}${description}`;
}

export function formatUsage(programName = 'amber-installer'): string {
  const selectable = RELEASES[DEFAULT_RELEASE].selectable;

  const lines = [
    `Usage: ${programName} [OPTIONS]`,
    '',
    'Options:',
    option('-cpu', 'Build with serial CPU version'),
    option('-gpu', 'Build with serial GPU version'),
    option('-mpi_cpu', 'Build with parallel (MPI) CPU version'),
    option('-mpi_gpu', 'Build with parallel (MPI) GPU version'),
    ...selectable.map(component => option(componentFlag(component), `Build ${COMPONENTS[component].displayName}`)),
    option(`${FLAGS.INSTALL_PATH} <path>`, `Installation prefix (default: $HOME/${RELEASES[DEFAULT_RELEASE].defaultPrefix})`),
    ...selectable.map(component =>
      option(`${componentPathFlag(component)} <path>`, `Installation prefix for ${COMPONENTS[component].displayName} only`)
    ),
    option(`${FLAGS.NPROC} <n>`, 'Set number of CPU cores for compilation (default: all cores)'),
    option(`${FLAGS.RELEASE} <name>`, `Amber release to build (default: ${DEFAULT_RELEASE})`),
    option('-h, --help', 'Show this help message'),
    option('-V, --version', 'Show the installer version'),
    '',
    'Releases:',
    ...Object.entries(RELEASES).map(([id, release]) =>
      option(id, `${release.components.map(component => COMPONENTS[component].displayName).join(', ')} (default prefix: $HOME/${release.defaultPrefix})`)
    ),
    '',
    `Example: ${programName} -gpu -ambertools -pmemd -path_install /opt/amber25 -nproc 8`
  ];

  return lines.join('\n');
}
