import * as path from 'path';
import { BUILD_TYPES, DEFAULT_RELEASE, RELEASES, isReleaseId } from '../config';
import { BUILD_TYPE_FLAGS, FLAGS } from '../shared-constants';
import { BuildConfig, BuildType, ComponentId, ReleaseId } from '../installers/types';
import { expandTilde, getDefaultInstallPrefix } from '../installers/utils';
import { ArgumentResolution, ResolveHost, UsageError } from './types';

const SELECTABLE_COMPONENTS: readonly ComponentId[] = [
  ...new Set(Object.values(RELEASES).flatMap(release => release.selectable))
];

interface FlagOccurrence<T> {
  value: T;
  token: string;
}

interface ScanResult {
  buildTypes: Set<BuildType>;
  components: FlagOccurrence<ComponentId>[];
  componentPaths: Map<ComponentId, FlagOccurrence<string>>;
  installPath?: string;
  nproc?: string;
  release: ReleaseId;
}

export function isHelpFlag(token: string): boolean {
  return token === FLAGS.HELP[0] || token === FLAGS.HELP[1];
}

export function isVersionFlag(token: string): boolean {
  return token === FLAGS.VERSION[0] || token === FLAGS.VERSION[1];
}

export function componentFlag(component: ComponentId): string {
  return `-${component}`;
}

export function componentPathFlag(component: ComponentId): string {
  return `${FLAGS.COMPONENT_PATH_PREFIX}${component}`;
}

function findComponent(token: string, toFlag: (component: ComponentId) => string): ComponentId | undefined {
  return SELECTABLE_COMPONENTS.find(component => toFlag(component) === token);
}

function usageError(message: string, token?: string): ArgumentResolution {
  return { kind: 'error', error: new UsageError(message, token) };
}

/**
 * Resolve the argument vector into a BuildConfig. Single left-to-right scan;
 * value-bearing flags consume exactly the next token, whatever it is. Help,
 * version and the first unknown token end the scan immediately. No I/O
 * happens here.
 */
export function resolveArguments(tokens: readonly string[], host: ResolveHost): ArgumentResolution {
  const scan: ScanResult = {
    buildTypes: new Set(),
    components: [],
    componentPaths: new Map(),
    release: DEFAULT_RELEASE
  };

  let index = 0;
  const nextValue = (): string | undefined => {
    const value = tokens[index];
    if (value === undefined) {
      return undefined;
    }
    index++;
    return value;
  };

  while (index < tokens.length) {
    const token = tokens[index++];

    if (isHelpFlag(token)) {
      return { kind: 'help' };
    }

    if (isVersionFlag(token)) {
      return { kind: 'version' };
    }

    const buildType = BUILD_TYPE_FLAGS.get(token);
    if (buildType) {
      scan.buildTypes.add(buildType);
      continue;
    }

    if (token === FLAGS.INSTALL_PATH) {
      const value = nextValue();
      if (value === undefined) {
        return usageError(`${token} requires a path for installation.`, token);
      }
      scan.installPath = value;
      continue;
    }

    const pathComponent = findComponent(token, componentPathFlag);
    if (pathComponent) {
      const value = nextValue();
      if (value === undefined) {
        return usageError(`${token} requires a path for installation.`, token);
      }
      scan.componentPaths.set(pathComponent, { value, token });
      continue;
    }

    if (token === FLAGS.NPROC) {
      const value = nextValue();
      if (value === undefined) {
        return usageError(`${token} requires a number`, token);
      }
      scan.nproc = value;
      continue;
    }

    if (token === FLAGS.RELEASE) {
      const value = nextValue();
      if (value === undefined) {
        return usageError(`${token} requires a release name (${Object.keys(RELEASES).join(', ')})`, token);
      }
      if (!isReleaseId(value)) {
        return usageError(`Unknown release: ${value} (choose one of ${Object.keys(RELEASES).join(', ')})`, value);
      }
      scan.release = value;
      continue;
    }

    const component = findComponent(token, componentFlag);
    if (component) {
      scan.components.push({ value: component, token });
      continue;
    }

    return usageError(`Unknown argument: ${token}`, token);
  }

  return validateScan(scan, host);
}

function validateScan(scan: ScanResult, host: ResolveHost): ArgumentResolution {
  if (scan.buildTypes.size !== 1) {
    return usageError(`Choose one build type (${[...BUILD_TYPE_FLAGS.keys()].join(', ')})`);
  }
  const [buildType] = scan.buildTypes;

  const release = RELEASES[scan.release];
  let components: ComponentId[];

  if (release.selectable.length === 0) {
    const stray = scan.components[0] ?? [...scan.componentPaths.values()][0];
    if (stray) {
      return usageError(`${stray.token} is not available for release ${scan.release}`, stray.token);
    }
    components = [...release.components];
  } else {
    const unavailable = scan.components.find(({ value }) => !release.selectable.includes(value));
    if (unavailable) {
      return usageError(`${unavailable.token} is not available for release ${scan.release}`, unavailable.token);
    }
    const selected = new Set(scan.components.map(({ value }) => value));
    if (selected.size === 0) {
      return usageError(`Choose at least one of ${release.selectable.map(componentFlag).join(' or ')}`);
    }
    components = release.components.filter(component => selected.has(component));
  }

  let compileParallelism = Math.max(1, host.cpuCount);
  if (scan.nproc !== undefined) {
    const jobs = /^\d+$/.test(scan.nproc) ? Number(scan.nproc) : NaN;
    if (!Number.isSafeInteger(jobs) || jobs < 1) {
      return usageError(`${FLAGS.NPROC} requires a positive integer, got '${scan.nproc}'`, scan.nproc);
    }
    compileParallelism = jobs;
  }

  const resolvePath = (value: string): string => path.resolve(host.workDir, expandTilde(value, host.homeDir));
  const fallbackPrefix = scan.installPath !== undefined
    ? resolvePath(scan.installPath)
    : getDefaultInstallPrefix(scan.release, host.homeDir);

  const installPrefixes = new Map<ComponentId, string>();
  for (const component of components) {
    const override = scan.componentPaths.get(component);
    installPrefixes.set(component, override ? resolvePath(override.value) : fallbackPrefix);
  }

  const { parallelism, accelerator } = BUILD_TYPES[buildType];
  const config: BuildConfig = Object.freeze({
    release: scan.release,
    buildType,
    parallelismEnabled: parallelism,
    acceleratorEnabled: accelerator,
    components: Object.freeze(components),
    installPrefixes,
    compileParallelism
  });

  return { kind: 'config', config };
}
