import * as fs from 'fs';
import * as path from 'path';
import { QUICK_CMAKE_PATCH } from '../shared-constants';
import { CmakeOptions } from '../lib/cmake-options';
import { patchFile } from '../lib/cmake-patch';
import { output } from '../lib/output';
import { BaseInstaller } from './base-installer';
import { ComponentId, MissingInputError } from './types';

export class AmberToolsInstaller extends BaseInstaller {
  getName(): ComponentId {
    return 'ambertools';
  }

  protected getComponentCmakeOptions(): CmakeOptions {
    return { DOWNLOAD_MINICONDA: true };
  }

  /**
   * Comment out QUICK's compiler-flag resets. Runs on every invocation; a
   * second run adds another comment marker to lines that are already off.
   */
  protected async applyPatches(): Promise<void> {
    const target = path.join(this.getSourceDir(), QUICK_CMAKE_PATCH.RELATIVE_PATH);

    if (!fs.existsSync(target)) {
      throw new MissingInputError(
        `${QUICK_CMAKE_PATCH.RELATIVE_PATH} not found in ${this.getSourceDir()}`,
        this.getName(),
        'patch',
        `Remove ${this.getDefinition().sourceDir} and re-run the installer to extract a fresh copy`
      );
    }

    const changed = patchFile(target, QUICK_CMAKE_PATCH.PATTERNS, QUICK_CMAKE_PATCH.COMMENT_MARKER);
    output.info(`Patched ${QUICK_CMAKE_PATCH.RELATIVE_PATH} (${changed} line(s) commented out)`);
  }
}
