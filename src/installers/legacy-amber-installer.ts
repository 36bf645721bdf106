import { AmberToolsInstaller } from './ambertools-installer';
import { ComponentId } from './types';

/**
 * Amber24 ships Amber and AmberTools as two archives that unpack into one
 * tree and build together; patching and options match AmberTools.
 */
export class LegacyAmberInstaller extends AmberToolsInstaller {
  getName(): ComponentId {
    return 'amber';
  }
}
