import * as fs from 'fs';
import * as path from 'path';
import { AmberInstaller, AmberInstallerOptions, createComponentInstaller, formatSummary } from './amber-installer';
import { AmberToolsInstaller } from './ambertools-installer';
import { LegacyAmberInstaller } from './legacy-amber-installer';
import { PmemdInstaller } from './pmemd-installer';
import { InstallReport, MissingInputError } from './types';
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

const CONDA_ROOT = path.join(TEST_WORK_DIR, 'miniforge3');
const ACTIVATION = `bash -c { source "$1/bin/activate" && conda activate "$2"; } >&2 && env -0 bash ${CONDA_ROOT} amber-installer`;
const ACTIVATED_ENV = { PATH: '/conda/envs/amber-installer/bin:/usr/bin', CONDA_DEFAULT_ENV: 'amber-installer' };

describe('AmberInstaller', () => {
  let runner: ReturnType<typeof createMockRunner>;
  let download: jest.Mock<Promise<void>, [string, string]>;
  let options: AmberInstallerOptions;

  beforeEach(() => {
    silenceConsole();
    runner = createMockRunner();
    download = jest.fn((_url: string, _destination: string) => Promise.resolve());
    options = {
      workDir: TEST_WORK_DIR,
      runner,
      env: { PATH: '/usr/bin' },
      download,
      platform: { type: 'Linux', machine: 'x86_64' }
    };

    createArchives('ambertools25.tar.bz2', 'pmemd24.tar.bz2');
    fs.mkdirSync(CONDA_ROOT);

    runner.run.mockImplementation(async (command, args) => {
      if (command === 'bash' && args[1].includes('module purge')) {
        return result(0, 'PATH=/usr/bin\0');
      }
      if (command === 'bash' && args[1].includes('conda activate')) {
        return result(0, 'PATH=/conda/envs/amber-installer/bin:/usr/bin\0CONDA_DEFAULT_ENV=amber-installer\0');
      }
      if (command === 'tar' && args[1] === 'ambertools25.tar.bz2') {
        writeWorkFile('ambertools25_src/AmberTools/src/quick/CMakeLists.txt', 'set(CMAKE_C_FLAGS "")\n');
      }
      return result(0);
    });
  });

  it('should build the selected components in release order and report them', async () => {
    const report = await new AmberInstaller(createBuildConfig(), options).install();

    expect(report).toEqual({
      release: 'amber25',
      buildType: 'gpu',
      installed: [
        { component: 'ambertools', displayName: 'AmberTools25', prefix: '/opt/amber25' },
        { component: 'pmemd', displayName: 'PMEMD24', prefix: '/opt/pmemd' }
      ]
    });

    const lines = commandLines(runner.run);
    expect(lines[0]).toBe(ACTIVATION);
    expect(lines).toHaveLength(11);
    expect(lines.filter(line => line.startsWith('tar '))).toEqual([
      'tar xvjf ambertools25.tar.bz2',
      'tar xvjf pmemd24.tar.bz2'
    ]);
    expect(lines.indexOf('tar xvjf pmemd24.tar.bz2')).toBe(lines.indexOf('make install') + 1);
  });

  it('should run every build tool inside the activated environment', async () => {
    await new AmberInstaller(createBuildConfig(), options).install();

    const toolEnvs = runner.run.mock.calls
      .filter(([command]) => command !== 'bash')
      .map(([, , runOptions]) => runOptions?.env);
    expect(toolEnvs).toHaveLength(10);
    toolEnvs.forEach(env => expect(env).toEqual(ACTIVATED_ENV));
  });

  it('should print the success summary', async () => {
    const report = await new AmberInstaller(createBuildConfig(), options).install();

    expect(console.log).toHaveBeenCalledWith(expect.stringContaining(formatSummary(report)));
  });

  it('should build only what was selected', async () => {
    const config = createBuildConfig({ components: ['pmemd'] });

    const report = await new AmberInstaller(config, options).install();

    expect(report.installed.map(({ component }) => component)).toEqual(['pmemd']);
    expect(commandLines(runner.run)).not.toContain('tar xvjf ambertools25.tar.bz2');
  });

  it('should stop at the first failing component', async () => {
    runner.run.mockImplementation(async (command, args) => {
      if (command === 'bash') {
        return result(0, 'PATH=/usr/bin\0');
      }
      return result(command === 'make' && args[0] === '-j4' ? 2 : 0);
    });
    writeWorkFile('ambertools25_src/AmberTools/src/quick/CMakeLists.txt', '');

    await expect(new AmberInstaller(createBuildConfig(), options).install()).rejects.toMatchObject({
      component: 'ambertools',
      step: 'build',
      exitCode: 2
    });
    expect(commandLines(runner.run)).not.toContain('tar xvjf pmemd24.tar.bz2');
    expect(console.log).not.toHaveBeenCalledWith(expect.stringContaining('Installation completed successfully'));
  });

  it('should keep earlier components when a later archive is missing', async () => {
    fs.rmSync(path.join(TEST_WORK_DIR, 'pmemd24.tar.bz2'));

    await expect(new AmberInstaller(createBuildConfig(), options).install()).rejects.toMatchObject({
      component: 'pmemd',
      step: 'verify'
    });
    expect(commandLines(runner.run).filter(line => line === 'make install')).toHaveLength(1);
  });

  describe('environment setup', () => {
    it('should not purge modules outside an Lmod session', async () => {
      await new AmberInstaller(createBuildConfig(), options).install();

      expect(commandLines(runner.run).some(line => line.includes('module purge'))).toBe(false);
    });

    it('should purge Lmod modules before activating conda', async () => {
      options.env = { PATH: '/usr/bin', LMOD_CMD: '/opt/lmod/libexec/lmod' };

      await new AmberInstaller(createBuildConfig(), options).install();

      const [purge, activation] = runner.run.mock.calls;
      expect(purge[1][1]).toBe('{ command -v module >/dev/null 2>&1 || exit 127; module purge; } >&2 && env -0');
      expect(purge[2]).toEqual({ cwd: TEST_WORK_DIR, env: options.env, captureOutput: true });
      expect(activation[2]?.env).toEqual({ PATH: '/usr/bin' });
    });

    it('should continue with the original environment when the purge fails', async () => {
      const env = { PATH: '/usr/bin', LMOD_CMD: '/opt/lmod/libexec/lmod' };
      options.env = env;
      runner.run.mockResolvedValueOnce(result(127));

      await new AmberInstaller(createBuildConfig({ components: ['pmemd'] }), options).install();

      expect(runner.run.mock.calls[1][2]?.env).toBe(env);
      expect(console.warn).toHaveBeenCalledWith(
        expect.stringContaining('The module command is not available; skipping module purge')
      );
    });

    it('should bootstrap Miniforge when it is not installed yet', async () => {
      fs.rmSync(CONDA_ROOT, { recursive: true });
      writeWorkFile('env.yml', 'name: amber-installer\n');

      await new AmberInstaller(createBuildConfig({ components: ['pmemd'] }), options).install();

      expect(download).toHaveBeenCalledWith(
        'https://github.com/conda-forge/miniforge/releases/latest/download/Miniforge3-Linux-x86_64.sh',
        path.join(TEST_WORK_DIR, 'Miniforge3-Linux-x86_64.sh')
      );
      expect(commandLines(runner.run).slice(0, 3)).toEqual([
        `bash ${TEST_WORK_DIR}/Miniforge3-Linux-x86_64.sh -b -p ${CONDA_ROOT}`,
        `bash -c source "$1/bin/activate" && conda env create -f "$2" bash ${CONDA_ROOT} ${TEST_WORK_DIR}/env.yml`,
        ACTIVATION
      ]);
    });

    it('should fail before building when the environment spec is missing', async () => {
      fs.rmSync(CONDA_ROOT, { recursive: true });

      const failure = new AmberInstaller(createBuildConfig(), options).install();

      await expect(failure).rejects.toBeInstanceOf(MissingInputError);
      await expect(failure).rejects.toMatchObject({ component: 'environment', step: 'bootstrap' });
      expect(runner.run).not.toHaveBeenCalled();
      expect(download).not.toHaveBeenCalled();
    });
  });
});

describe('formatSummary', () => {
  it('should list every installed component with its prefix', () => {
    const report: InstallReport = {
      release: 'amber25',
      buildType: 'mpi_gpu',
      installed: [
        { component: 'ambertools', displayName: 'AmberTools25', prefix: '/opt/amber25' },
        { component: 'pmemd', displayName: 'PMEMD24', prefix: '/opt/pmemd' }
      ]
    };

    expect(formatSummary(report)).toBe(
      'Installation completed successfully (parallel GPU): AmberTools25 at /opt/amber25, PMEMD24 at /opt/pmemd.'
    );
  });
});

describe('createComponentInstaller', () => {
  it.each([
    ['ambertools', AmberToolsInstaller],
    ['pmemd', PmemdInstaller],
    ['amber', LegacyAmberInstaller]
  ] as const)('should build %s with its installer', (component, installerClass) => {
    const installer = createComponentInstaller(component, {
      workDir: TEST_WORK_DIR,
      runner: createMockRunner(),
      env: {},
      config: createBuildConfig()
    });

    expect(installer).toBeInstanceOf(installerClass);
    expect(installer.getName()).toBe(component);
  });
});
