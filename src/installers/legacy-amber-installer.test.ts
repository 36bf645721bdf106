import * as path from 'path';
import { LegacyAmberInstaller } from './legacy-amber-installer';
import { ComponentId } from './types';
import {
  TEST_WORK_DIR,
  commandLines,
  createArchives,
  createBuildConfig,
  createMockRunner,
  result,
  silenceConsole,
  writeWorkFile
} from '../test-setup';

describe('LegacyAmberInstaller', () => {
  let runner: ReturnType<typeof createMockRunner>;
  let installer: LegacyAmberInstaller;

  beforeEach(() => {
    silenceConsole();
    runner = createMockRunner();
    installer = new LegacyAmberInstaller({
      workDir: TEST_WORK_DIR,
      runner,
      env: {},
      config: createBuildConfig({
        release: 'amber24',
        buildType: 'mpi_gpu',
        parallelismEnabled: true,
        acceleratorEnabled: true,
        components: ['amber'],
        installPrefixes: new Map<ComponentId, string>([['amber', '/home/tester/apps/amber24']])
      })
    });
    runner.run.mockImplementation(async (command, args) => {
      if (command === 'tar' && args[1] === 'Amber24.tar.bz2') {
        writeWorkFile('amber24_src/AmberTools/src/quick/CMakeLists.txt', 'set(CMAKE_C_FLAGS "")\n');
      }
      return result(0);
    });
  });

  it('should require both archives', async () => {
    createArchives('AmberTools24.tar.bz2');

    await expect(installer.install()).rejects.toMatchObject({
      message: 'Amber24.tar.bz2 not found in the current directory.',
      remedy: 'Please download Amber24.tar.bz2 from https://ambermd.org/GetAmber.php',
      component: 'amber'
    });
  });

  it('should name every missing archive', async () => {
    await expect(installer.install()).rejects.toMatchObject({
      message: 'AmberTools24.tar.bz2, Amber24.tar.bz2 not found in the current directory.',
      remedy: 'Please download AmberTools24.tar.bz2 and Amber24.tar.bz2 from https://ambermd.org/GetAmber.php'
    });
  });

  it('should extract both archives into one tree and build it once', async () => {
    createArchives('AmberTools24.tar.bz2', 'Amber24.tar.bz2');

    await installer.install();

    expect(commandLines(runner.run)).toEqual([
      'tar xvjf AmberTools24.tar.bz2',
      'tar xvjf Amber24.tar.bz2',
      `${path.join(TEST_WORK_DIR, 'amber24_src')}/update_amber --update`,
      'cmake .. -DCMAKE_INSTALL_PREFIX=/home/tester/apps/amber24 -DCOMPILER=GNU -DMPI=TRUE -DCUDA=TRUE ' +
        '-DINSTALL_TESTS=TRUE -DDOWNLOAD_MINICONDA=TRUE',
      'make -j4',
      'make install'
    ]);
    expect(installer.getDisplayName()).toBe('Amber24 and AmberTools24');
  });
});
