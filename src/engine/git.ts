/**
 * Git client built on the command runner.
 *
 * Wraps exactly the version-control operations the pipeline needs. Every
 * call runs `git` in the workspace; a non-zero exit raises GitCommandError.
 */

import { CommandResult, CommandRunOptions, CommandRunner, formatCommand, tailLines } from './command-runner';

export class GitCommandError extends Error {
  constructor(
    public readonly args: string[],
    public readonly exitCode: number,
    public readonly stderr: string,
  ) {
    super(`${formatCommand({ command: 'git', args })} exited with code ${exitCode}${stderr ? `: ${tailLines(stderr, 5)}` : ''}`);
    this.name = 'GitCommandError';
  }
}

export class GitClient {
  constructor(
    private readonly commands: CommandRunner,
    private readonly cwd: string,
    private readonly options: CommandRunOptions = {},
    private readonly env: Record<string, string> = {},
  ) {}

  /** Run an arbitrary git command, failing on non-zero exit. */
  async exec(args: string[]): Promise<CommandResult> {
    const result = await this.commands.run(
      { command: 'git', args, cwd: this.cwd, env: this.env },
      this.options,
    );
    if (result.exitCode !== 0) {
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }
    return result;
  }

  async isRepository(): Promise<boolean> {
    const result = await this.commands.run(
      { command: 'git', args: ['rev-parse', '--is-inside-work-tree'], cwd: this.cwd, env: this.env },
      this.options,
    );
    return result.exitCode === 0 && result.stdout.trim() === 'true';
  }

  async isShallow(): Promise<boolean> {
    const result = await this.exec(['rev-parse', '--is-shallow-repository']);
    return result.stdout.trim() === 'true';
  }

  async fetchUnshallow(remote = 'origin'): Promise<void> {
    await this.exec(['fetch', '--unshallow', '--tags', remote]);
  }

  async revParse(rev: string): Promise<string> {
    const result = await this.exec(['rev-parse', rev]);
    return result.stdout.trim();
  }

  async currentBranch(): Promise<string> {
    const result = await this.exec(['rev-parse', '--abbrev-ref', 'HEAD']);
    return result.stdout.trim();
  }

  /** Set the commit identity for this repository. */
  async configUser(name: string, email: string): Promise<void> {
    await this.exec(['config', 'user.email', email]);
    await this.exec(['config', 'user.name', name]);
  }

  async checkout(ref: string): Promise<void> {
    await this.exec(['checkout', ref]);
  }

  async remove(path: string, opts: { recursive?: boolean; ignoreUnmatch?: boolean } = {}): Promise<void> {
    const args = ['rm'];
    if (opts.recursive) args.push('-r');
    if (opts.ignoreUnmatch) args.push('--ignore-unmatch');
    args.push('--', path);
    await this.exec(args);
  }

  async add(path: string, opts: { force?: boolean } = {}): Promise<void> {
    const args = ['add'];
    if (opts.force) args.push('-f');
    args.push('--', path);
    await this.exec(args);
  }

  async commit(message: string, opts: { allowEmpty?: boolean } = {}): Promise<void> {
    const args = ['commit'];
    if (opts.allowEmpty) args.push('--allow-empty');
    args.push('-m', message);
    await this.exec(args);
  }

  async push(remote: string, refspec: string): Promise<void> {
    await this.exec(['push', remote, refspec]);
  }
}
