/**
 * `setup-runtime`: verify the pinned language runtime is the one on PATH.
 *
 * docs-flow does not download interpreters. The step checks that the pinned
 * runtime (e.g. Python 3.9) is the one the install and build steps will run.
 */

import { runtimeVersionMismatchError } from '../../domain/errors';
import { NonRetryableStepError, StepHandler } from '../step-runner';
import { runChecked, stringInput } from './exec';

export const SUPPORTED_RUNTIMES = ['python', 'node'] as const;
export type RuntimeName = (typeof SUPPORTED_RUNTIMES)[number];

const DEFAULT_COMMANDS: Record<RuntimeName, string> = {
  python: 'python3',
  node: 'node',
};

/** Pull the first dotted version number out of `--version` output. */
export function parseVersionOutput(output: string): string | undefined {
  const match = /(\d+(?:\.\d+)+)/.exec(output);
  return match ? match[1] : undefined;
}

/**
 * A pin matches when every component it names is equal:
 * "3.9" matches "3.9.18" but not "3.10.1" or "3.90.0".
 */
export function versionMatches(pinned: string, actual: string): boolean {
  const want = pinned.replace(/^v/, '').split('.');
  const have = actual.replace(/^v/, '').split('.');
  if (want.length > have.length) return false;
  return want.every((part, i) => part === 'x' || part === '*' || part === have[i]);
}

function isRuntimeName(value: string): value is RuntimeName {
  return (SUPPORTED_RUNTIMES as readonly string[]).includes(value);
}

export const setupRuntimeHandler: StepHandler = {
  type: 'setup-runtime',
  inputContract: {
    runtime: { type: 'string', required: true, oneOf: SUPPORTED_RUNTIMES },
    version: { type: 'string', required: true, description: 'Version prefix to require, e.g. "3.9"' },
    command: { type: 'string', description: 'Executable to check instead of the runtime default' },
  },

  async execute(step, context) {
    const runtime = stringInput(step, 'runtime') ?? '';
    const pinned = stringInput(step, 'version') ?? '';
    const command = stringInput(step, 'command') ?? (isRuntimeName(runtime) ? DEFAULT_COMMANDS[runtime] : runtime);

    const result = await runChecked(step, context, command, ['--version']);
    // Older Pythons print their version on stderr.
    const output = `${result.stdout}\n${result.stderr}`;
    const actual = parseVersionOutput(output);

    if (!actual || !versionMatches(pinned, actual)) {
      throw new NonRetryableStepError(
        runtimeVersionMismatchError(step.id, runtime, pinned, actual ?? output.trim()),
      );
    }

    context.logger.info('Runtime verified', { runtime, version: actual, command });
    return { outputs: { runtime, version: actual, command } };
  },
};
