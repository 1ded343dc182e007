import { IsolatedEnvironment } from '../lib/env/environment';
import { PipInstaller, UvInstaller } from '../lib/env/installer';
import { InstallerError } from '../lib/errors';
import { Logger } from '../lib/util/log';
import { ProcessError } from '../lib/util/process';
import { FakeInterpreter, FakeRunner } from './fakes';

const target: IsolatedEnvironment = {
  pythonExecutable: '/tmp/env/bin/python',
  extraEnvironment: () => ({ PATH: '/tmp/env/bin' }),
};

test('usable host pip installs into the environment by path', async () => {
  // GIVEN
  const runner = new FakeRunner();
  const installer = new PipInstaller(new FakeInterpreter(), { status: 'usable', version: '24.0' }, { runner, log: Logger.silent() });

  // WHEN
  await installer.install(target, '/tmp/reqs.txt');

  // THEN
  expect(runner.calls.map(c => c.argv)).toEqual([[
    '/usr/bin/python3', '-m', 'pip', '--python', '/tmp/env/bin/python',
    'install', '--use-pep517', '--no-warn-script-location', '-r', '/tmp/reqs.txt',
  ]]);
});

test('without a usable host pip the environment pip is used', async () => {
  // GIVEN
  const runner = new FakeRunner();
  const installer = new PipInstaller(new FakeInterpreter(), { status: 'outdated', version: '21.0' }, { runner, log: Logger.silent() });

  // WHEN
  await installer.install(target, '/tmp/reqs.txt');

  // THEN
  expect(runner.calls[0].argv.slice(0, 3)).toEqual(['/tmp/env/bin/python', '-Im', 'pip']);
});

test('no target means the host interpreter', async () => {
  // GIVEN
  const runner = new FakeRunner();
  const installer = new PipInstaller(new FakeInterpreter(), { status: 'usable', version: '24.0' }, { runner, log: Logger.silent() });

  // WHEN
  await installer.install(undefined, '/tmp/reqs.txt');

  // THEN
  expect(runner.calls[0].argv.slice(0, 4)).toEqual(['/usr/bin/python3', '-m', 'pip', 'install']);
});

test('pip gets one -v less than the verbosity', async () => {
  // GIVEN
  const runner = new FakeRunner();
  const installer = new PipInstaller(new FakeInterpreter(), { status: 'absent' }, { runner, log: Logger.silent(3) });

  // WHEN
  await installer.install(target, '/tmp/reqs.txt');

  // THEN
  expect(runner.calls[0].argv.slice(0, 5)).toEqual(['/tmp/env/bin/python', '-Im', 'pip', '-vv', 'install']);
});

test('a failing install becomes an InstallerError carrying the output', async () => {
  // GIVEN
  const runner = new FakeRunner((argv) => {
    throw new ProcessError(argv, 1, 'ERROR: No matching distribution found for nonexistent');
  });
  const installer = new PipInstaller(new FakeInterpreter(), { status: 'usable', version: '24.0' }, { runner, log: Logger.silent() });

  // WHEN
  const error = await installer.install(target, '/tmp/reqs.txt').catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(InstallerError);
  expect(error.exitCode).toBe(1);
  expect(error.output).toBe('ERROR: No matching distribution found for nonexistent');
});

test('uv installs with the environment selected through VIRTUAL_ENV', async () => {
  // GIVEN
  const runner = new FakeRunner();
  const installer = new UvInstaller('/opt/bin/uv', '/tmp/env', { runner, log: Logger.silent(2), environment: { FORCE_COLOR: '1' } });

  // WHEN
  await installer.install(target, '/tmp/reqs.txt');

  // THEN
  expect(runner.calls).toEqual([{
    argv: ['/opt/bin/uv', 'pip', '-v', 'install', '-r', '/tmp/reqs.txt'],
    options: { extraEnv: { FORCE_COLOR: '1', VIRTUAL_ENV: '/tmp/env' } },
  }]);
});
