import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  CommandAbortedError,
  ProcessCommandRunner,
  createLineSplitter,
  formatCommand,
  tailLines,
} from '../../src/engine/command-runner';

describe('formatCommand', () => {
  test('leaves plain arguments bare', () => {
    expect(formatCommand({ command: 'git', args: ['push', 'origin', 'gh-pages:gh-pages'] })).toBe(
      'git push origin gh-pages:gh-pages',
    );
  });

  test('quotes arguments with spaces or shell characters', () => {
    expect(formatCommand({ command: 'git', args: ['commit', '-m', 'Add generated documentation.'] })).toBe(
      "git commit -m 'Add generated documentation.'",
    );
    expect(formatCommand({ command: 'sh', args: ['-c', "echo 'hi'"] })).toBe(`sh -c 'echo '\\''hi'\\'''`);
  });
});

describe('tailLines', () => {
  test('keeps the last lines and drops trailing whitespace', () => {
    expect(tailLines('a\nb\nc\nd\n', 2)).toBe('c\nd');
    expect(tailLines('only')).toBe('only');
  });
});

describe('createLineSplitter', () => {
  test('emits complete lines and holds back a partial tail until flush', () => {
    const lines: string[] = [];
    const splitter = createLineSplitter((line) => lines.push(line));

    splitter.push('Running Sphinx\nbuild');
    expect(lines).toEqual(['Running Sphinx']);

    splitter.push('ing html\r\nwriting output');
    expect(lines).toEqual(['Running Sphinx', 'building html']);

    splitter.flush();
    expect(lines).toEqual(['Running Sphinx', 'building html', 'writing output']);
  });
});

describe('ProcessCommandRunner', () => {
  const runner = new ProcessCommandRunner({ PATH: process.env.PATH }, { killGraceMs: 200 });
  let dir: string;

  beforeAll(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'docs-flow-runner-')));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  test('runs in the given directory with the merged environment', async () => {
    const result = await runner.run({
      command: 'sh',
      args: ['-c', 'pwd; echo "$DOCS_FLOW_GREETING"'],
      cwd: dir,
      env: { DOCS_FLOW_GREETING: 'hello' },
    });
    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe(`${dir}\nhello\n`);
    expect(result.stderr).toBe('');
  });

  test('reports the exit code and streams each line', async () => {
    const lines: string[] = [];
    const result = await runner.run(
      { command: 'sh', args: ['-c', 'echo building; echo broken >&2; exit 3'], cwd: dir },
      { onLine: (stream, line) => lines.push(`${stream}: ${line}`) },
    );
    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('building\n');
    expect(result.stderr).toBe('broken\n');
    expect(lines.sort()).toEqual(['stderr: broken', 'stdout: building']);
  });

  test('keeps a character whose bytes arrive in separate chunks', async () => {
    const lines: string[] = [];
    const result = await runner.run(
      { command: 'sh', args: ['-c', "printf '\\303'; sleep 0.2; printf '\\251t\\n'"], cwd: dir },
      { onLine: (_stream, line) => lines.push(line) },
    );
    expect(result.stdout).toBe('\u00e9t\n');
    expect(lines).toEqual(['\u00e9t']);
  });

  test('an abort terminates the process', async () => {
    const controller = new AbortController();
    const pending = runner.run({ command: 'sleep', args: ['30'], cwd: dir }, { signal: controller.signal });
    controller.abort();
    await expect(pending).rejects.toThrow(CommandAbortedError);
  });

  test('a process that ignores SIGTERM is killed after the grace period', async () => {
    const controller = new AbortController();
    let abortedAt = 0;
    const pending = runner.run(
      { command: 'sh', args: ['-c', 'trap "" TERM; echo ready; while :; do :; done'], cwd: dir },
      {
        signal: controller.signal,
        onLine: (_stream, line) => {
          if (line === 'ready') {
            abortedAt = Date.now();
            controller.abort();
          }
        },
      },
    );
    await expect(pending).rejects.toThrow(CommandAbortedError);
    expect(abortedAt).toBeGreaterThan(0);
    expect(Date.now() - abortedAt).toBeGreaterThanOrEqual(150);
  });

  test('an already aborted signal rejects without spawning', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(runner.run({ command: 'sh', args: ['-c', 'exit 0'], cwd: dir }, { signal: controller.signal })).rejects.toThrow(
      CommandAbortedError,
    );
  });

  test('a missing executable rejects with the spawn error', async () => {
    await expect(runner.run({ command: 'docs-flow-no-such-command', args: [], cwd: dir })).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });
});
