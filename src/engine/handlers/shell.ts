/**
 * `shell`: run a script, failing on the first command that fails.
 *
 * bash runs with `--noprofile --norc -eo pipefail`, the same flags hosted CI
 * runners use, so a multi-line `run` behaves as it does there.
 */

import { StepHandler } from '../step-runner';
import { runChecked, stringInput } from './exec';

export const SHELLS = ['bash', 'sh'] as const;

/** argv for running `script` under the given shell. */
export function shellInvocation(shell: string, script: string): { command: string; args: string[] } {
  if (shell === 'sh') {
    return { command: 'sh', args: ['-e', '-c', script] };
  }
  return { command: 'bash', args: ['--noprofile', '--norc', '-eo', 'pipefail', '-c', script] };
}

export const shellHandler: StepHandler = {
  type: 'shell',
  inputContract: {
    run: { type: 'string', required: true, description: 'Script to run' },
    shell: { type: 'string', oneOf: SHELLS },
  },

  async execute(step, context) {
    const script = stringInput(step, 'run') ?? '';
    const { command, args } = shellInvocation(stringInput(step, 'shell') ?? 'bash', script);
    const result = await runChecked(step, context, command, args);
    return { outputs: { exitCode: result.exitCode, durationMs: result.durationMs } };
  },
};
