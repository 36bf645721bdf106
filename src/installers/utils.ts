import * as path from 'path';
import { RELEASES } from '../config';
import { BuildConfig, ComponentId, ReleaseId } from './types';

/**
 * Expand tilde (~) to the given home directory in file paths
 */
export function expandTilde(filePath: string, homeDir: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    return path.join(homeDir, filePath.slice(1));
  }
  return filePath;
}

/**
 * Default install prefix of a release, e.g. ~/amber25
 */
export function getDefaultInstallPrefix(release: ReleaseId, homeDir: string): string {
  return path.join(homeDir, RELEASES[release].defaultPrefix);
}

export function getInstallPrefix(config: BuildConfig, component: ComponentId): string {
  const prefix = config.installPrefixes.get(component);
  if (prefix === undefined) {
    throw new Error(`${component} is not selected in this build`);
  }
  return prefix;
}
