import { promises as fs } from 'fs';
import * as path from 'path';
import { IsolatedEnvironment } from '../lib/env/environment';
import { Installer } from '../lib/env/installer';
import { DefaultIsolatedEnv } from '../lib/env/isolated-env';
import { EnvImpl, EnvStrategy, StrategyResolver } from '../lib/env/strategies';
import { InstallerError, ProvisioningError } from '../lib/errors';
import { exists, rimraf } from '../lib/util/files';
import { captureLog, makeTempDir } from './fakes';

let tempRoot: string;
beforeEach(async () => {
  tempRoot = await makeTempDir();
});

afterEach(async () => {
  await rimraf(tempRoot);
});

/**
 * Installer that remembers what it was asked to install
 */
class RecordingInstaller implements Installer {
  public readonly requirementFiles = new Array<string>();
  public readonly installed = new Array<string>();

  constructor(private readonly fail: boolean = false) {
  }

  public async install(_target: IsolatedEnvironment | undefined, requirementsFile: string) {
    this.requirementFiles.push(requirementsFile);
    this.installed.push(...(await fs.readFile(requirementsFile, { encoding: 'utf-8' })).split(/\r?\n/));
    if (this.fail) {
      throw new InstallerError('Failed to install requirements', ['pip'], 1, 'boom');
    }
  }
}

/**
 * Strategy that lays out a fake environment with an interpreter file
 */
function fakeStrategies(installer: Installer, options: { writeExecutable?: boolean; name?: EnvImpl } = {}) {
  const requested = new Array<EnvImpl | undefined>();
  const resolver: StrategyResolver = async (impl) => {
    requested.push(impl);
    const strategy: EnvStrategy = {
      name: options.name ?? 'venv',
      async create(root) {
        const scripts = path.join(root, 'bin');
        const pythonExecutable = path.join(scripts, 'python');
        await fs.mkdir(scripts, { recursive: true });
        if (options.writeExecutable ?? true) {
          await fs.writeFile(pythonExecutable, '');
        }
        return { paths: { scripts, pythonExecutable, purelib: path.join(root, 'lib') }, installer };
      },
    };
    return strategy;
  };
  return { resolver, requested };
}

test('environment is created in a fresh directory and removed on cleanup', async () => {
  // GIVEN
  const { resolver } = fakeStrategies(new RecordingInstaller());
  const env = new DefaultIsolatedEnv({ tempRoot, strategies: resolver });

  // WHEN
  await env.create();
  const root = env.path;

  // THEN
  expect(path.dirname(root)).toBe(tempRoot);
  expect(path.basename(root)).toMatch(/^pybuild-env-/);
  expect(env.pythonExecutable).toBe(path.join(root, 'bin', 'python'));

  // WHEN
  await env.cleanup();

  // THEN
  expect(await exists(root)).toBe(false);
});

test('the requested implementation is passed on', async () => {
  // GIVEN
  const { resolver, requested } = fakeStrategies(new RecordingInstaller(), { name: 'uv' });

  // WHEN
  await DefaultIsolatedEnv.with({ tempRoot, strategies: resolver, envImpl: 'uv' }, () => undefined);

  // THEN
  expect(requested).toEqual(['uv']);
});

test('extra environment puts the scripts directory first on the PATH', async () => {
  // GIVEN
  const { resolver } = fakeStrategies(new RecordingInstaller());

  // WHEN
  const extra = await DefaultIsolatedEnv.with({ tempRoot, strategies: resolver }, env => env.extraEnvironment());

  // THEN
  expect(extra.PATH.split(path.delimiter)[0]).toMatch(/pybuild-env-[^/\\]+[/\\]bin$/);
});

test('a second create is refused before allocating anything', async () => {
  // GIVEN
  const { resolver } = fakeStrategies(new RecordingInstaller());
  const env = new DefaultIsolatedEnv({ tempRoot, strategies: resolver });
  await env.create();

  // WHEN
  const error = await env.create().catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(ProvisioningError);
  expect(await fs.readdir(tempRoot)).toHaveLength(1);
  await env.cleanup();
});

test('create after cleanup is refused too', async () => {
  // GIVEN
  const { resolver } = fakeStrategies(new RecordingInstaller());
  const env = new DefaultIsolatedEnv({ tempRoot, strategies: resolver });
  await env.create();
  await env.cleanup();

  // WHEN
  const error = await env.create().catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(ProvisioningError);
  expect(await fs.readdir(tempRoot)).toEqual([]);
});

test('a missing interpreter fails creation and removes the root', async () => {
  // GIVEN
  const { resolver } = fakeStrategies(new RecordingInstaller(), { writeExecutable: false });
  const env = new DefaultIsolatedEnv({ tempRoot, strategies: resolver });

  // WHEN
  const error = await env.create().catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(ProvisioningError);
  expect(error.message).toMatch(/^Virtual environment creation failed, executable .*python missing$/);
  expect(await fs.readdir(tempRoot)).toEqual([]);
});

test('an interpreter that is a dangling symlink fails creation', async () => {
  // GIVEN
  const resolver: StrategyResolver = async () => ({
    name: 'venv',
    async create(root) {
      const scripts = path.join(root, 'bin');
      const pythonExecutable = path.join(scripts, 'python');
      await fs.mkdir(scripts);
      await fs.symlink(path.join(root, 'no-such-interpreter'), pythonExecutable);
      return { paths: { scripts, pythonExecutable, purelib: path.join(root, 'lib') }, installer: new RecordingInstaller() };
    },
  });
  const env = new DefaultIsolatedEnv({ tempRoot, strategies: resolver });

  // WHEN
  const error = await env.create().catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(ProvisioningError);
  expect(error.message).toMatch(/^Virtual environment creation failed, executable .*python missing$/);
  expect(await fs.readdir(tempRoot)).toEqual([]);
});

test('unexpected strategy failures are reported as provisioning errors', async () => {
  // GIVEN
  const resolver: StrategyResolver = async () => {
    throw new Error('no interpreter');
  };
  const env = new DefaultIsolatedEnv({ tempRoot, strategies: resolver });

  // WHEN
  const error = await env.create().catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(ProvisioningError);
  expect(error.message).toBe('Failed to create isolated environment: no interpreter');
  expect(await fs.readdir(tempRoot)).toEqual([]);
});

test('install writes a requirements file, logs the sorted list and removes the file', async () => {
  // GIVEN
  const installer = new RecordingInstaller();
  const { resolver } = fakeStrategies(installer);
  const { log, messages } = captureLog();

  // WHEN
  await DefaultIsolatedEnv.with({ tempRoot, strategies: resolver, log }, async (env) => {
    await env.install(['wheel', 'setuptools>=40.8.0', 'wheel']);
  });

  // THEN
  expect(installer.installed).toEqual(['wheel', 'setuptools>=40.8.0']);
  expect(path.basename(installer.requirementFiles[0])).toMatch(/^pybuild-reqs-[0-9a-f]{16}\.txt$/);
  expect(await exists(installer.requirementFiles[0])).toBe(false);
  expect(messages).toContainEqual(['Installing packages in isolated environment:\n- setuptools>=40.8.0\n- wheel', 'log']);
});

test('the requirements file is removed when installing fails', async () => {
  // GIVEN
  const installer = new RecordingInstaller(true);
  const { resolver } = fakeStrategies(installer);

  // WHEN
  const error = await DefaultIsolatedEnv.with({ tempRoot, strategies: resolver }, env => env.install(['flit_core'])).catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(InstallerError);
  expect(await exists(installer.requirementFiles[0])).toBe(false);
  expect(await fs.readdir(tempRoot)).toEqual([]);
});

test('installing nothing does not run the installer', async () => {
  // GIVEN
  const installer = new RecordingInstaller();
  const { resolver } = fakeStrategies(installer);

  // WHEN
  await DefaultIsolatedEnv.with({ tempRoot, strategies: resolver }, env => env.install([]));

  // THEN
  expect(installer.requirementFiles).toEqual([]);
});

test('the environment is removed when the block fails', async () => {
  // GIVEN
  const { resolver } = fakeStrategies(new RecordingInstaller());

  // WHEN
  const error = await DefaultIsolatedEnv.with({ tempRoot, strategies: resolver }, () => {
    throw new Error('build failed');
  }).catch(e => e);

  // THEN
  expect(error.message).toBe('build failed');
  expect(await fs.readdir(tempRoot)).toEqual([]);
});
