/**
 * Helpers shared by the built-in step handlers.
 */

import { commandFailedError, maskSecretsInMessage } from '../../domain/errors';
import { CompiledStep } from '../../dsl/compiler';
import { CommandResult, CommandRunOptions, CommandSpec, formatCommand, tailLines } from '../command-runner';
import { GitClient, GitCommandError } from '../git';
import { NonRetryableStepError, StepExecutionContext } from '../step-runner';

/** Run options that stream masked output to the step logger and honor the abort signal. */
export function commandOptions(context: StepExecutionContext): CommandRunOptions {
  return {
    signal: context.signal,
    onLine: (stream, line) => {
      context.logger.info(maskSecretsInMessage(line, context.secretValues), { stream });
    },
  };
}

/** Run a command in the step's directory; a non-zero exit fails the step. */
export async function runChecked(
  step: CompiledStep,
  context: StepExecutionContext,
  command: string,
  args: string[],
  cwd: string = context.cwd,
): Promise<CommandResult> {
  const spec: CommandSpec = { command, args, cwd, env: context.env };
  context.logger.debug('Running command', { command: maskSecretsInMessage(formatCommand(spec), context.secretValues) });
  const result = await context.commands.run(spec, commandOptions(context));
  if (result.exitCode !== 0) {
    throw new NonRetryableStepError(
      commandFailedError(
        step.id,
        maskSecretsInMessage(formatCommand(spec), context.secretValues),
        result.exitCode,
        maskSecretsInMessage(tailLines(result.stderr), context.secretValues),
      ),
    );
  }
  return result;
}

/** Git client bound to the workspace and this step's signal, env and logger. */
export function gitFor(context: StepExecutionContext): GitClient {
  return new GitClient(context.commands, context.workspace, commandOptions(context), context.env);
}

/** Convert a failed git call into a non-retryable step failure. */
export function gitFailure(step: CompiledStep, context: StepExecutionContext, err: GitCommandError): NonRetryableStepError {
  return new NonRetryableStepError(
    commandFailedError(
      step.id,
      maskSecretsInMessage(formatCommand({ command: 'git', args: err.args }), context.secretValues),
      err.exitCode,
      maskSecretsInMessage(tailLines(err.stderr), context.secretValues),
    ),
  );
}

/** Run a git operation, mapping GitCommandError to a step failure. */
export async function withGit<T>(
  step: CompiledStep,
  context: StepExecutionContext,
  fn: (git: GitClient) => Promise<T>,
): Promise<T> {
  try {
    return await fn(gitFor(context));
  } catch (err) {
    if (err instanceof GitCommandError) throw gitFailure(step, context, err);
    throw err;
  }
}

/** Read a string input that the input contract already type-checked. */
export function stringInput(step: CompiledStep, name: string): string | undefined {
  const value = step.inputs[name];
  return typeof value === 'string' ? value : undefined;
}

export function numberInput(step: CompiledStep, name: string): number | undefined {
  const value = step.inputs[name];
  return typeof value === 'number' ? value : undefined;
}

export function booleanInput(step: CompiledStep, name: string): boolean | undefined {
  const value = step.inputs[name];
  return typeof value === 'boolean' ? value : undefined;
}
