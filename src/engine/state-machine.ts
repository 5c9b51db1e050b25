/**
 * Run and step state machines.
 *
 * Both are driven by the transition tables in domain/run.ts; a move the
 * table does not list comes back as a typed error instead of throwing.
 */

import {
  RunStatus,
  StepRunStatus,
  VALID_RUN_TRANSITIONS,
  VALID_STEP_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

function transition<S extends string>(
  table: Record<S, S[]>,
  subject: 'run' | 'step',
  current: S,
  target: S,
): TransitionResult<S> {
  const validTargets = table[current];
  if (validTargets.includes(target)) {
    return { success: true, newStatus: target };
  }
  return {
    success: false,
    error: createTypedError({
      code: `${subject.toUpperCase()}.INVALID_TRANSITION`,
      message: `Invalid ${subject} state transition: ${current} -> ${target}`,
      retryable: false,
      details: { current, target, validTargets },
    }),
  };
}

export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  return transition(VALID_RUN_TRANSITIONS, 'run', current, target);
}

export function transitionStepStatus(current: StepRunStatus, target: StepRunStatus): TransitionResult<StepRunStatus> {
  return transition(VALID_STEP_TRANSITIONS, 'step', current, target);
}

/** Terminal statuses have no outgoing transitions. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return VALID_RUN_TRANSITIONS[status].length === 0;
}
