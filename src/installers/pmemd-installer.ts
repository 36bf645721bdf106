import { CmakeOptions } from '../lib/cmake-options';
import { BaseInstaller } from './base-installer';
import { ComponentId } from './types';

/**
 * Engine-only build: no Python, Perl or GUI, no update checks
 */
export class PmemdInstaller extends BaseInstaller {
  getName(): ComponentId {
    return 'pmemd';
  }

  protected getComponentCmakeOptions(): CmakeOptions {
    return {
      DOWNLOAD_MINICONDA: false,
      BUILD_PYTHON: false,
      BUILD_PERL: false,
      BUILD_GUI: false,
      PMEMD_ONLY: true,
      CHECK_UPDATES: false
    };
  }
}
