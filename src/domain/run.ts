/**
 * Run domain model.
 *
 * A single execution instance of a pipeline for one trigger, producing
 * step-level results and run-time events.
 */

import { RunTrigger } from './pipeline';
import { TypedError } from './errors';

/** Pipeline run lifecycle states. */
export enum RunStatus {
  Created = 'created',
  Queued = 'queued',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
  /** The trigger or run-level condition did not match. */
  Skipped = 'skipped',
}

/** Step-level run states. */
export enum StepRunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
  Skipped = 'skipped',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Created]: [RunStatus.Queued, RunStatus.Canceled, RunStatus.Skipped],
  [RunStatus.Queued]: [RunStatus.Running, RunStatus.Skipped],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Canceled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Canceled]: [],
  [RunStatus.Skipped]: [],
};

/** Valid state transitions for step runs. */
export const VALID_STEP_TRANSITIONS: Record<StepRunStatus, StepRunStatus[]> = {
  [StepRunStatus.Pending]: [StepRunStatus.Running, StepRunStatus.Skipped],
  [StepRunStatus.Running]: [StepRunStatus.Succeeded, StepRunStatus.Failed, StepRunStatus.Canceled],
  [StepRunStatus.Succeeded]: [],
  [StepRunStatus.Failed]: [],
  [StepRunStatus.Canceled]: [],
  [StepRunStatus.Skipped]: [],
};

/** Result of a single step execution. */
export interface StepRunResult {
  stepId: string;
  status: StepRunStatus;
  startedAt?: string;
  completedAt?: string;
  outputs?: Record<string, unknown>;
  error?: TypedError;
  /** Number of attempts made (including retries). */
  attempts: number;
  durationMs?: number;
  /** Why the step did not run, when skipped. */
  skipReason?: string;
}

/** A single execution instance of a pipeline. */
export interface Run {
  id: string;
  pipelineName: string;
  /** Hash of the compiled plan this run executes. */
  planHash: string;
  trigger: RunTrigger;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  /** Step IDs in execution order. */
  stepOrder: string[];
  /** Step-level results indexed by step ID. */
  stepResults: Record<string, StepRunResult>;
  /** Publish changes only locally; never push. */
  dryRun: boolean;
  /** Run-level error if the run failed or was canceled. */
  error?: TypedError;
  skipReason?: string;
  canceledAt?: string;
  cancelReason?: string;
}
