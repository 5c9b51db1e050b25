/**
 * Pipeline domain model.
 *
 * A versioned, declarative definition of one documentation build-and-publish
 * job: a trigger, optional run-level condition and job timeout, and an
 * ordered list of steps executed one after another on a single workspace.
 */

/** Built-in step types. */
export type StepType = 'checkout' | 'setup-runtime' | 'shell' | 'publish-branch';

/** Push trigger: the pipeline runs for pushes to any of these branches. */
export interface PushTrigger {
  branches: string[];
}

/** Events the pipeline reacts to. */
export interface PipelineTrigger {
  push: PushTrigger;
}

/** Secret requirement declared by a pipeline. */
export interface SecretRequirement {
  /** Environment variable holding the secret value. */
  key: string;
  required: boolean;
  description?: string;
}

/** A single unit of work within a pipeline. */
export interface PipelineStep {
  id: string;
  name: string;
  type: StepType;
  description?: string;
  /** Type-specific inputs, checked against the handler's input contract. */
  with?: Record<string, unknown>;
  /** Directory the step runs in, relative to the workspace. */
  workingDirectory?: string;
  env?: Record<string, string>;
  /** Condition expression; the step is skipped when it evaluates to false. */
  if?: string;
  timeoutMinutes?: number;
  maxAttempts?: number;
}

/** The pipeline document. */
export interface Pipeline {
  /** DSL specification version this pipeline targets. */
  specVersion: string;
  name: string;
  description?: string;
  on: PipelineTrigger;
  /** Run-level condition expression. */
  if?: string;
  /** Job-level time cap. */
  timeoutMinutes?: number;
  env?: Record<string, string>;
  secrets?: SecretRequirement[];
  steps: PipelineStep[];
}

/** The event that started a run. */
export interface RunTrigger {
  /** Event name, e.g. "push" or "workflow_dispatch". */
  event: string;
  /** Short branch name, e.g. "main". */
  branch: string;
  /** Full ref, e.g. "refs/heads/main". */
  ref: string;
  /** Workflow name reported by CI; defaults to the pipeline name. */
  workflow?: string;
}

/** Build a trigger for a push to the given branch. */
export function pushTrigger(branch: string): RunTrigger {
  return { event: 'push', branch, ref: `refs/heads/${branch}` };
}

/**
 * Derive the short branch name from a full ref. Tags and other refs are
 * returned unchanged.
 */
export function branchFromRef(ref: string): string {
  return ref.startsWith('refs/heads/') ? ref.slice('refs/heads/'.length) : ref;
}
