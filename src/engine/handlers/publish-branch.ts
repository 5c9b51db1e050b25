/**
 * `publish-branch`: replace generated output on a publishing branch.
 *
 * Sequence, each stage aborting the step on failure:
 *   1. configure the commit identity (when given)
 *   2. check out the publishing branch
 *   3. `git rm -r --ignore-unmatch <target>`
 *   4. move the freshly built `<source>` directory to `<target>`
 *   5. `git add -f <target>` (output directories are usually ignored)
 *   6. `git commit --allow-empty -m <message>`
 *   7. `git push <remote> <branch>:<branch>` unless dry-run or `push: false`
 *
 * The build output is untracked, so it survives the branch switch in step 2.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { createTypedError, publishSourceMissingError } from '../../domain/errors';
import { CompiledStep } from '../../dsl/compiler';
import { NonRetryableStepError, StepExecutionContext, StepHandler } from '../step-runner';
import { booleanInput, stringInput, withGit } from './exec';

export const DEFAULT_PUBLISH_MESSAGE = 'Add generated documentation.';

/** Resolve a workspace-relative path, refusing anything outside the workspace. */
export function resolveInWorkspace(step: CompiledStep, workspace: string, relative: string, field: string): string {
  const resolved = path.resolve(workspace, relative);
  const rel = path.relative(workspace, resolved);
  if (rel === '' || rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
    throw new NonRetryableStepError(
      createTypedError({
        code: 'PUBLISH.INVALID_PATH',
        message: `"${field}" must be a directory inside the workspace: ${relative}`,
        stepId: step.id,
        retryable: false,
        details: { field, path: relative },
      }),
    );
  }
  return resolved;
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (isErrno(err) && err.code === 'ENOENT') return false;
    throw err;
  }
}

function isErrno(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Move a directory, copying when source and target sit on different devices. */
export async function moveDirectory(source: string, target: string): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.rm(target, { recursive: true, force: true });
  try {
    await fs.rename(source, target);
  } catch (err) {
    if (!isErrno(err) || err.code !== 'EXDEV') throw err;
    await fs.cp(source, target, { recursive: true });
    await fs.rm(source, { recursive: true, force: true });
  }
}

async function publish(step: CompiledStep, context: StepExecutionContext) {
  const branch = stringInput(step, 'branch') ?? '';
  const sourceRel = stringInput(step, 'source') ?? '';
  const targetRel = stringInput(step, 'target') ?? '';
  const remote = stringInput(step, 'remote') ?? 'origin';
  const message = stringInput(step, 'message') ?? DEFAULT_PUBLISH_MESSAGE;
  const authorName = stringInput(step, 'authorName');
  const authorEmail = stringInput(step, 'authorEmail');
  const shouldPush = (booleanInput(step, 'push') ?? true) && !context.dryRun;

  const source = resolveInWorkspace(step, context.workspace, sourceRel, 'source');
  const target = resolveInWorkspace(step, context.workspace, targetRel, 'target');
  // Git wants forward slashes relative to the repository root.
  const targetPathspec = path.relative(context.workspace, target).split(path.sep).join('/');

  if (!(await exists(source))) {
    throw new NonRetryableStepError(publishSourceMissingError(step.id, sourceRel));
  }

  return withGit(step, context, async (git) => {
    if (authorName && authorEmail) {
      await git.configUser(authorName, authorEmail);
    }

    context.logger.info('Switching to publishing branch', { branch });
    await git.checkout(branch);
    await git.remove(targetPathspec, { recursive: true, ignoreUnmatch: true });

    context.logger.info('Copying generated output', { source: sourceRel, target: targetPathspec });
    await moveDirectory(source, target);

    await git.add(targetPathspec, { force: true });
    await git.commit(message, { allowEmpty: true });
    const commit = await git.revParse('HEAD');

    if (shouldPush) {
      context.logger.info('Pushing publishing branch', { remote, branch });
      await git.push(remote, `${branch}:${branch}`);
    } else {
      context.logger.info('Skipping push', { reason: context.dryRun ? 'dry-run' : 'push disabled' });
    }

    return { outputs: { branch, target: targetPathspec, commit, pushed: shouldPush } };
  });
}

export const publishBranchHandler: StepHandler = {
  type: 'publish-branch',
  inputContract: {
    branch: { type: 'string', required: true, description: 'Publishing branch, e.g. "gh-pages"' },
    source: { type: 'string', required: true, description: 'Directory holding the generated output' },
    target: { type: 'string', required: true, description: 'Directory on the publishing branch to replace' },
    remote: { type: 'string' },
    message: { type: 'string' },
    authorName: { type: 'string' },
    authorEmail: { type: 'string' },
    push: { type: 'boolean' },
  },

  async execute(step, context) {
    return publish(step, context);
  },
};
