/**
 * `checkout`: prepare the repository checkout the pipeline runs in.
 *
 * The workspace must already be a clone. With `fetchDepth: 0` a shallow
 * clone is deepened to full history; `ref` switches to a branch or commit.
 */

import { createTypedError } from '../../domain/errors';
import { NonRetryableStepError, StepHandler } from '../step-runner';
import { numberInput, stringInput, withGit } from './exec';

export const checkoutHandler: StepHandler = {
  type: 'checkout',
  inputContract: {
    fetchDepth: { type: 'number', description: '0 fetches full history; any other value keeps the clone as is' },
    ref: { type: 'string', description: 'Branch, tag or commit to check out' },
    remote: { type: 'string', description: 'Remote to deepen from (default "origin")' },
  },

  async execute(step, context) {
    const fetchDepth = numberInput(step, 'fetchDepth') ?? 1;
    const ref = stringInput(step, 'ref');
    const remote = stringInput(step, 'remote') ?? 'origin';

    return withGit(step, context, async (git) => {
      if (!(await git.isRepository())) {
        throw new NonRetryableStepError(
          createTypedError({
            code: 'GIT.NOT_A_REPOSITORY',
            message: `Workspace is not a git repository: ${context.workspace}`,
            stepId: step.id,
            retryable: false,
            suggestedFixes: [
              { type: 'SET_WORKSPACE', params: { workspace: context.workspace }, description: 'Run inside a clone or pass --workspace' },
            ],
          }),
        );
      }

      let deepened = false;
      if (fetchDepth === 0 && (await git.isShallow())) {
        context.logger.info('Fetching full history', { remote });
        await git.fetchUnshallow(remote);
        deepened = true;
      }

      if (ref) {
        await git.checkout(ref);
      }

      const commit = await git.revParse('HEAD');
      return { outputs: { commit, deepened } };
    });
  },
};
