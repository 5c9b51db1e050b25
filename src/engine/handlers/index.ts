export { checkoutHandler } from './checkout';
export { setupRuntimeHandler, parseVersionOutput, versionMatches, SUPPORTED_RUNTIMES } from './setup-runtime';
export { shellHandler, shellInvocation, SHELLS } from './shell';
export { publishBranchHandler, moveDirectory, resolveInWorkspace, DEFAULT_PUBLISH_MESSAGE } from './publish-branch';

import { registerStepHandler, StepHandler } from '../step-runner';
import { checkoutHandler } from './checkout';
import { publishBranchHandler } from './publish-branch';
import { setupRuntimeHandler } from './setup-runtime';
import { shellHandler } from './shell';

/** The handlers behind the built-in step types. */
export const BUILTIN_HANDLERS: readonly StepHandler[] = [
  checkoutHandler,
  setupRuntimeHandler,
  shellHandler,
  publishBranchHandler,
];

/** Register every built-in handler. Safe to call more than once. */
export function registerBuiltinHandlers(): void {
  for (const handler of BUILTIN_HANDLERS) {
    registerStepHandler(handler);
  }
}
