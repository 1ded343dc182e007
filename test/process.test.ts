import { Logger } from '../lib/util/log';
import { ProcessError, SubprocessRunner } from '../lib/util/process';
import { captureLog } from './fakes';

test('output of a successful command is returned', async () => {
  // WHEN
  const output = await new SubprocessRunner(Logger.silent()).run([process.execPath, '-e', 'console.log("a\\nb")']);

  // THEN
  expect(output).toBe('a\nb');
});

test('a failing command is a ProcessError with its exit code and output', async () => {
  // GIVEN
  const { log, messages } = captureLog();
  const argv = [process.execPath, '-e', 'console.log("bad things"); process.exit(3)'];

  // WHEN
  const error = await new SubprocessRunner(log).run(argv).catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(ProcessError);
  expect(error.exitCode).toBe(3);
  expect(error.output).toBe('bad things');
  expect(error.message).toBe(`Command exited with code 3: ${argv.join(' ')}`);
  expect(messages).toEqual([['bad things', 'command-output']]);
});

test('a command that cannot be started is a ProcessError too', async () => {
  // GIVEN
  const argv = ['/nonexistent/python3', 'hook_runner.py'];

  // WHEN
  const error = await new SubprocessRunner(Logger.silent()).run(argv).catch(e => e);

  // THEN
  expect(error).toBeInstanceOf(ProcessError);
  expect(error.exitCode).toBeUndefined();
  expect(error.message).toBe('Command could not be started (spawn /nonexistent/python3 ENOENT): /nonexistent/python3 hook_runner.py');
});

test('environment overrides reach the command', async () => {
  // WHEN
  const output = await new SubprocessRunner(Logger.silent()).run(
    [process.execPath, '-e', 'console.log(process.env.PYBUILD_TEST_VALUE)'],
    { extraEnv: { PYBUILD_TEST_VALUE: 'test-value' } });

  // THEN
  expect(output).toBe('test-value');
});
