/**
 * DSL Compiler.
 *
 * Compiles a validated pipeline document into an executable plan: steps in
 * declaration order with resolved policies, parsed conditions and a stable
 * plan hash. Input contracts are checked during validation.
 */

import { createHash } from 'crypto';
import { TypedError } from '../domain/errors';
import { PipelineStep, SecretRequirement, StepType } from '../domain/pipeline';
import { ConditionNode, parseCondition } from './condition';
import { DEFAULT_JOB_TIMEOUT_MINUTES } from './schema';
import { validatePipeline, ValidationResult } from './validator';

/** Policy defaults applied when a step declares none. */
export const DEFAULT_STEP_POLICY = {
  maxAttempts: 1,
  backoffStrategy: 'exponential',
  backoffBaseMs: 1000,
} as const;

/** SHA-256 digest record. */
export interface HashRecord {
  algorithm: 'sha256';
  digest: string;
}

/** A compiled step with execution metadata. */
export interface CompiledStep {
  id: string;
  name: string;
  type: StepType;
  inputs: Record<string, unknown>;
  /** Relative to the workspace; "." when the step declares none. */
  workingDirectory: string;
  env: Record<string, string>;
  /** Source text of the step condition, if any. */
  conditionSource?: string;
  condition: ConditionNode;
  policy: {
    /** Undefined means the step is bounded only by the job timeout. */
    timeoutMs?: number;
    maxAttempts: number;
    backoffStrategy: 'fixed' | 'exponential';
    backoffBaseMs: number;
  };
}

/** The compiled execution plan for a pipeline run. */
export interface CompiledPlan {
  pipelineName: string;
  specVersion: string;
  /** Hash of the compiled plan. */
  planHash: HashRecord;
  branches: string[];
  conditionSource?: string;
  condition: ConditionNode;
  jobTimeoutMs: number;
  env: Record<string, string>;
  secrets: SecretRequirement[];
  /** Step IDs in execution order (declaration order). */
  executionOrder: string[];
  /** Compiled steps indexed by ID. */
  steps: Record<string, CompiledStep>;
}

/** Compilation result. */
export interface CompilationResult {
  success: boolean;
  plan?: CompiledPlan;
  errors: TypedError[];
  validation: ValidationResult;
}

/** Validate and compile a pipeline document. */
export function compilePipeline(doc: unknown): CompilationResult {
  // Phase 1: Validate
  const validation = validatePipeline(doc);
  if (!validation.valid || !validation.pipeline) {
    return {
      success: false,
      errors: validation.errors,
      validation,
    };
  }
  const pipeline = validation.pipeline;

  // Phase 2: Compile steps
  const executionOrder = pipeline.steps.map((s) => s.id);
  const compiledSteps: Record<string, CompiledStep> = {};
  for (const step of pipeline.steps) {
    compiledSteps[step.id] = compileStep(step);
  }

  // Phase 3: Compute hash
  const planHash = computeHash(JSON.stringify({ executionOrder, steps: compiledSteps }));

  const plan: CompiledPlan = {
    pipelineName: pipeline.name,
    specVersion: pipeline.specVersion,
    planHash,
    branches: pipeline.on.push.branches,
    conditionSource: pipeline.if,
    condition: parseCondition(pipeline.if ?? ''),
    jobTimeoutMs: minutesToMs(pipeline.timeoutMinutes ?? DEFAULT_JOB_TIMEOUT_MINUTES),
    env: pipeline.env ?? {},
    secrets: pipeline.secrets ?? [],
    executionOrder,
    steps: compiledSteps,
  };

  return {
    success: true,
    plan,
    errors: [],
    validation,
  };
}

/** Compile a single step. */
function compileStep(step: PipelineStep): CompiledStep {
  return {
    id: step.id,
    name: step.name,
    type: step.type,
    inputs: step.with ?? {},
    workingDirectory: step.workingDirectory ?? '.',
    env: step.env ?? {},
    conditionSource: step.if,
    condition: parseCondition(step.if ?? ''),
    policy: {
      timeoutMs: step.timeoutMinutes !== undefined ? minutesToMs(step.timeoutMinutes) : undefined,
      maxAttempts: step.maxAttempts ?? DEFAULT_STEP_POLICY.maxAttempts,
      backoffStrategy: DEFAULT_STEP_POLICY.backoffStrategy,
      backoffBaseMs: DEFAULT_STEP_POLICY.backoffBaseMs,
    },
  };
}

function minutesToMs(minutes: number): number {
  return Math.round(minutes * 60_000);
}

/** Compute SHA-256 hash of a string. */
export function computeHash(data: string): HashRecord {
  const digest = createHash('sha256').update(data).digest('hex');
  return { algorithm: 'sha256', digest };
}
