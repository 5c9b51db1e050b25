/**
 * Command runner: spawns external commands for step handlers.
 *
 * Every external tool the pipeline touches (git, the package installer,
 * the documentation generator, a shell script) goes through this interface,
 * so tests can substitute an in-process fake.
 */

import { spawn } from 'child_process';

/** A single external command invocation. */
export interface CommandSpec {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
}

/** Outcome of a finished command. */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/** Receives output line by line while the command runs. */
export type OutputLineSink = (stream: 'stdout' | 'stderr', line: string) => void;

export interface CommandRunOptions {
  /** Aborting terminates the child process. */
  signal?: AbortSignal;
  onLine?: OutputLineSink;
}

export interface CommandRunner {
  run(spec: CommandSpec, options?: CommandRunOptions): Promise<CommandResult>;
}

/** Raised when a command could not be started or was aborted. */
export class CommandAbortedError extends Error {
  constructor(public readonly spec: CommandSpec) {
    super(`Command aborted: ${formatCommand(spec)}`);
    this.name = 'CommandAbortedError';
  }
}

/** Grace period between SIGTERM and SIGKILL after an abort. */
export const DEFAULT_KILL_GRACE_MS = 5000;

export interface ProcessCommandRunnerOptions {
  killGraceMs?: number;
}

/** Runs commands as real child processes. */
export class ProcessCommandRunner implements CommandRunner {
  private readonly killGraceMs: number;

  constructor(
    private readonly baseEnv: Record<string, string | undefined> = process.env,
    options: ProcessCommandRunnerOptions = {},
  ) {
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
  }

  run(spec: CommandSpec, options: CommandRunOptions = {}): Promise<CommandResult> {
    const { signal, onLine } = options;
    if (signal?.aborted) {
      return Promise.reject(new CommandAbortedError(spec));
    }

    return new Promise<CommandResult>((resolve, reject) => {
      const startedAt = Date.now();
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: { ...this.baseEnv, ...spec.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      const stdoutLines = createLineSplitter((line) => onLine?.('stdout', line));
      const stderrLines = createLineSplitter((line) => onLine?.('stderr', line));

      // Decoding on the stream keeps multi-byte characters split across chunks intact.
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (text: string) => {
        stdout += text;
        stdoutLines.push(text);
      });
      child.stderr.on('data', (text: string) => {
        stderr += text;
        stderrLines.push(text);
      });

      let aborted = false;
      let killTimer: NodeJS.Timeout | undefined;
      const onAbort = () => {
        aborted = true;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => child.kill('SIGKILL'), this.killGraceMs);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        signal?.removeEventListener('abort', onAbort);
        if (killTimer) clearTimeout(killTimer);
      };

      child.on('error', (err) => {
        cleanup();
        reject(err);
      });

      child.on('close', (code) => {
        cleanup();
        stdoutLines.flush();
        stderrLines.flush();
        if (aborted) {
          reject(new CommandAbortedError(spec));
          return;
        }
        resolve({
          // A null code means the process died from a signal.
          exitCode: code ?? 1,
          stdout,
          stderr,
          durationMs: Date.now() - startedAt,
        });
      });
    });
  }
}

/** Split streamed text into complete lines, holding back a partial tail. */
export function createLineSplitter(onLine: (line: string) => void): { push(text: string): void; flush(): void } {
  let buffer = '';
  return {
    push(text: string) {
      buffer += text;
      const parts = buffer.split(/\r?\n/);
      buffer = parts.pop() ?? '';
      for (const line of parts) onLine(line);
    },
    flush() {
      if (buffer.length > 0) onLine(buffer);
      buffer = '';
    },
  };
}

/** Render a command for logs and error messages. */
export function formatCommand(spec: Pick<CommandSpec, 'command' | 'args'>): string {
  return [spec.command, ...spec.args.map(quoteArg)].join(' ');
}

function quoteArg(arg: string): string {
  return /^[A-Za-z0-9_./:=@%+-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Last `maxLines` lines of command output, for error details. */
export function tailLines(text: string, maxLines = 20): string {
  const lines = text.trimEnd().split(/\r?\n/);
  return lines.slice(-maxLines).join('\n');
}
