import { shellHandler, shellInvocation } from '../../../src/engine/handlers';
import { LogLevel } from '../../../src/logger';
import { FakeCommandRunner } from '../../helpers/fake-command-runner';
import { createRecordingLogger, makeContext, makeStep, stepFailure } from '../../helpers/context';

describe('shellInvocation', () => {
  test('bash fails on the first error and on broken pipes', () => {
    expect(shellInvocation('bash', 'make html')).toEqual({
      command: 'bash',
      args: ['--noprofile', '--norc', '-eo', 'pipefail', '-c', 'make html'],
    });
  });

  test('sh runs with -e', () => {
    expect(shellInvocation('sh', 'make html')).toEqual({ command: 'sh', args: ['-e', '-c', 'make html'] });
  });
});

describe('shell step', () => {
  let runner: FakeCommandRunner;

  beforeEach(() => {
    runner = new FakeCommandRunner();
  });

  test('runs the script in the step directory with the step env', async () => {
    const context = makeContext(runner, { cwd: '/work/docs', env: { CI: 'true' } });

    const result = await shellHandler.execute(makeStep('shell', { run: 'pip install .' }), context);

    expect(runner.calls).toEqual([
      {
        command: 'bash',
        args: ['--noprofile', '--norc', '-eo', 'pipefail', '-c', 'pip install .'],
        cwd: '/work/docs',
        env: { CI: 'true' },
      },
    ]);
    expect(result.outputs).toEqual({ exitCode: 0, durationMs: 0 });
  });

  test('streams output lines to the step logger with secrets masked', async () => {
    runner.on('bash', { stdout: 'Successfully installed\nusing test-secret\n', stderr: 'warning: deprecated\n' });
    const { logger, entries } = createRecordingLogger();

    await shellHandler.execute(
      makeStep('shell', { run: 'pip install .' }),
      makeContext(runner, { logger, secretValues: ['test-secret'] }),
    );

    const output = entries.filter((e) => e.context.stream !== undefined);
    expect(output).toEqual([
      { level: LogLevel.Info, message: 'Successfully installed', context: { stream: 'stdout' } },
      { level: LogLevel.Info, message: 'using *******cret', context: { stream: 'stdout' } },
      { level: LogLevel.Info, message: 'warning: deprecated', context: { stream: 'stderr' } },
    ]);
  });

  test('a non-zero exit fails the step with the stderr tail', async () => {
    runner.on('sh', { exitCode: 2, stderr: 'Sphinx error:\nsource directory not found\n' });

    const error = await stepFailure(
      shellHandler.execute(makeStep('shell', { run: 'sphinx-build ../docs . -a', shell: 'sh' }), makeContext(runner)),
    );

    expect(error.code).toBe('STEP.COMMAND_FAILED');
    expect(error.message).toBe("Command exited with code 2: sh -e -c 'sphinx-build ../docs . -a'");
    expect(error.details).toEqual({ exitCode: 2, stderr: 'Sphinx error:\nsource directory not found' });
  });
});
