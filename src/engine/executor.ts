/**
 * Pipeline executor: runs compiled plans step by step.
 *
 * Executes compiled pipeline plans one step after another with checked
 * state transitions, trigger and condition evaluation, per-step and
 * job-level timeouts, cancellation and run-time event publication.
 */

import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { RunTrigger } from '../domain/pipeline';
import { Run, RunStatus, StepRunStatus, StepRunResult } from '../domain/run';
import {
  TypedError,
  createTypedError,
  runCanceledError,
  runNotFoundError,
  runTimeoutError,
  secretMissingError,
} from '../domain/errors';
import { CompiledPlan, CompiledStep } from '../dsl/compiler';
import { ConditionVariables, evaluateCondition } from '../dsl/condition';
import { interpolate, interpolateInputs } from '../dsl/template';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { CommandRunner } from './command-runner';
import { isTerminalRunStatus, transitionRunStatus, transitionStepStatus } from './state-machine';
import { executeStep, StepExecutionContext } from './step-runner';
import { RunEventPublisher } from '../data-plane/publisher';
import { RunEventType } from '../domain/events';

/** Executor configuration. */
export interface ExecutorConfig {
  /** Absolute path of the repository checkout. */
  workspace: string;
  /** Environment secrets are read from. */
  env: Record<string, string | undefined>;
  logger: Logger;
}

export interface CreateRunOptions {
  /** Commit on the publishing branch but do not push. */
  dryRun?: boolean;
}

/** The pipeline executor. */
export class PipelineExecutor {
  private config: ExecutorConfig;
  private plans = new Map<string, CompiledPlan>();
  private canceledRuns = new Map<string, string | undefined>();
  private activeControllers = new Map<string, AbortController>();
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Set<string>();

  constructor(
    private store: Store,
    private publisher: RunEventPublisher,
    private commands: CommandRunner,
    config?: Partial<ExecutorConfig>,
  ) {
    this.config = {
      workspace: process.cwd(),
      env: process.env,
      logger: rootLogger,
      ...config,
    };
  }

  /** Create a run record for a compiled plan and trigger. */
  async createRun(plan: CompiledPlan, trigger: RunTrigger, options: CreateRunOptions = {}): Promise<Run> {
    const now = new Date().toISOString();
    const run: Run = {
      id: `run_${uuid()}`,
      pipelineName: plan.pipelineName,
      planHash: plan.planHash.digest,
      trigger,
      status: RunStatus.Created,
      createdAt: now,
      updatedAt: now,
      stepOrder: [...plan.executionOrder],
      stepResults: {},
      dryRun: options.dryRun ?? false,
    };

    for (const stepId of plan.executionOrder) {
      run.stepResults[stepId] = {
        stepId,
        status: StepRunStatus.Pending,
        attempts: 0,
      };
    }

    this.plans.set(run.id, plan);
    await this.store.runs.create(run);
    await this.safePublishRunEvent(run, 'run.created');
    return run;
  }

  /** Create and execute a run in one call. */
  async run(plan: CompiledPlan, trigger: RunTrigger, options: CreateRunOptions = {}): Promise<Run> {
    const created = await this.createRun(plan, trigger, options);
    return this.executeRun(created.id);
  }

  /** Execute a run (queued -> running -> terminal, or skipped). */
  async executeRun(runId: string): Promise<Run> {
    if (this.runningRuns.has(runId)) {
      throw new ExecutorError(createTypedError({
        code: 'RUN.ALREADY_RUNNING',
        message: `Run "${runId}" is already being executed`,
        runId,
        retryable: false,
      }));
    }
    this.runningRuns.add(runId);

    try {
      return await this.executeRunInternal(runId);
    } finally {
      this.runningRuns.delete(runId);
      this.activeControllers.delete(runId);
      this.canceledRuns.delete(runId);
    }
  }

  /**
   * Cancel a run. A running run stops its in-flight step and is marked
   * canceled by the execution loop; a run that has not started is
   * canceled immediately.
   */
  async cancelRun(runId: string, reason?: string): Promise<Run> {
    const run = await this.store.runs.getById(runId);
    if (!run) {
      throw new ExecutorError(runNotFoundError(runId));
    }

    if (isTerminalRunStatus(run.status)) {
      return run;
    }

    this.canceledRuns.set(runId, reason);
    this.activeControllers.get(runId)?.abort();

    if (run.status === RunStatus.Running || this.runningRuns.has(runId)) {
      return run;
    }

    return this.cancelRunInternal(run);
  }

  private async executeRunInternal(runId: string): Promise<Run> {
    let run = await this.store.runs.getById(runId);
    const plan = this.plans.get(runId);
    if (!run || !plan) {
      throw new ExecutorError(runNotFoundError(runId));
    }

    if (isTerminalRunStatus(run.status)) {
      throw new ExecutorError(createTypedError({
        code: 'RUN.ALREADY_FINISHED',
        message: `Run "${runId}" already finished with status "${run.status}"`,
        runId,
        retryable: false,
      }));
    }

    const log = this.config.logger.child({ runId: run.id });
    const vars = this.runVariables(run, plan);
    const templateVars = { ...vars, runId: run.id };

    if (this.canceledRuns.has(runId)) {
      return this.cancelRunInternal(run);
    }

    // Trigger and run-level condition
    const skipReason = this.checkTrigger(plan, run.trigger, vars);
    if (skipReason) {
      log.info('Run skipped', { reason: skipReason });
      return this.skipRun(run, skipReason);
    }

    run = await this.transitionRun(run, RunStatus.Queued);
    run = await this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.started');
    log.info('Run started', { pipeline: plan.pipelineName, branch: run.trigger.branch, dryRun: run.dryRun });

    // Required secrets
    const secretEnv: Record<string, string> = {};
    for (const req of plan.secrets) {
      const value = this.config.env[req.key];
      if (value) {
        secretEnv[req.key] = value;
      } else if (req.required) {
        run = this.skipRemaining(run, undefined, `Required secret not found: ${req.key}`);
        return this.failRun(run, { ...secretMissingError(req.key), runId: run.id });
      }
    }
    const secretValues = Object.values(secretEnv);

    const deadline = Date.now() + plan.jobTimeoutMs;

    for (const stepId of plan.executionOrder) {
      if (this.canceledRuns.has(runId)) {
        return this.cancelRunInternal(run);
      }

      const compiledStep = plan.steps[stepId];
      if (!compiledStep) continue;
      const stepLog = log.child({ step: stepId });

      if (!evaluateCondition(compiledStep.condition, vars)) {
        run = await this.skipStep(run, stepId, `Condition is false: ${compiledStep.conditionSource ?? ''}`);
        stepLog.info('Step skipped', { reason: run.stepResults[stepId]?.skipReason });
        continue;
      }

      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        run = this.skipRemaining(run, stepId, 'Job timeout exhausted');
        return this.failRun(run, runTimeoutError(run.id, plan.jobTimeoutMs, stepId));
      }
      const stepTimeout = compiledStep.policy.timeoutMs;
      const boundByJob = stepTimeout === undefined || remainingMs < stepTimeout;
      const effectiveTimeout = boundByJob ? remainingMs : stepTimeout;

      run = await this.setStepStatus(run, stepId, StepRunStatus.Running, {
        startedAt: new Date().toISOString(),
      });
      await this.safePublishStepEvent(run, stepId, 'step.started');
      stepLog.info(`Running ${compiledStep.name}`, { type: compiledStep.type });

      const controller = new AbortController();
      this.activeControllers.set(runId, controller);
      const canceledRuns = this.canceledRuns;
      const resolvedStep = this.resolveStep(compiledStep, templateVars);
      const context: StepExecutionContext = {
        runId: run.id,
        workspace: this.config.workspace,
        cwd: path.resolve(this.config.workspace, compiledStep.workingDirectory),
        env: {
          ...this.runEnv(run, plan, templateVars),
          ...secretEnv,
          ...interpolateRecord(compiledStep.env, templateVars),
        },
        secretValues,
        commands: this.commands,
        logger: stepLog,
        dryRun: run.dryRun,
        signal: controller.signal,
        get canceled() { return canceledRuns.has(runId); },
      };

      let result = await executeStep(resolvedStep, context, {
        timeoutMs: effectiveTimeout,
        onTimeout: () => controller.abort(),
      });
      this.activeControllers.delete(runId);

      if (result.error?.code === 'STEP.TIMEOUT' && boundByJob) {
        result = { ...result, error: runTimeoutError(run.id, plan.jobTimeoutMs, stepId) };
      }

      run = await this.recordStepResult(run, stepId, result);

      if (result.status === StepRunStatus.Succeeded) {
        stepLog.info(`Finished ${compiledStep.name}`, { durationMs: result.durationMs });
        await this.safePublishStepEvent(run, stepId, 'step.succeeded');
      } else if (result.status === StepRunStatus.Failed) {
        const error = result.error ?? createTypedError({
          code: 'STEP.UNKNOWN_FAILURE',
          message: `Step "${stepId}" failed`,
          stepId,
          retryable: false,
        });
        stepLog.error(`Failed ${compiledStep.name}`, { code: error.code, error: error.message });
        await this.safePublishStepEvent(run, stepId, 'step.failed');
        run = this.skipRemaining(run, stepId, `Step "${stepId}" failed`);
        return this.failRun(run, { ...error, runId: run.id });
      } else if (result.status === StepRunStatus.Canceled) {
        await this.safePublishStepEvent(run, stepId, 'step.canceled');
        return this.cancelRunInternal(run);
      }
    }

    run = await this.transitionRun(run, RunStatus.Succeeded);
    run.completedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.succeeded');
    log.info('Run succeeded');
    return run;
  }

  /** Returns a skip reason when the trigger or run-level condition does not match. */
  private checkTrigger(plan: CompiledPlan, trigger: RunTrigger, vars: ConditionVariables): string | undefined {
    if (trigger.event !== 'push') {
      return `Event "${trigger.event}" does not trigger this pipeline`;
    }
    if (!plan.branches.includes(trigger.branch)) {
      return `Branch "${trigger.branch}" is not in on.push.branches (${plan.branches.join(', ')})`;
    }
    if (!evaluateCondition(plan.condition, vars)) {
      return `Condition is false: ${plan.conditionSource ?? ''}`;
    }
    return undefined;
  }

  private runVariables(run: Run, plan: CompiledPlan): ConditionVariables {
    return {
      event: run.trigger.event,
      branch: run.trigger.branch,
      ref: run.trigger.ref,
      workflow: run.trigger.workflow ?? plan.pipelineName,
    };
  }

  /** Variables exported to every command the run starts. */
  private runEnv(run: Run, plan: CompiledPlan, vars: ConditionVariables & { runId: string }): Record<string, string> {
    return {
      ...interpolateRecord(plan.env, vars),
      CI: 'true',
      DOCS_FLOW: 'true',
      DOCS_FLOW_RUN_ID: run.id,
      DOCS_FLOW_WORKFLOW: vars.workflow,
      DOCS_FLOW_EVENT: vars.event,
      DOCS_FLOW_REF: vars.ref,
      DOCS_FLOW_BRANCH: vars.branch,
      DOCS_FLOW_WORKSPACE: this.config.workspace,
    };
  }

  /** Substitute `${{ name }}` placeholders in the step inputs. */
  private resolveStep(step: CompiledStep, vars: Record<string, string>): CompiledStep {
    return { ...step, inputs: interpolateInputs(step.inputs, vars) };
  }

  private async safePublishRunEvent(run: Run, eventType: RunEventType): Promise<void> {
    try {
      await this.publisher.publishRunEvent(run, eventType);
    } catch (err) {
      this.logPublishFailure(run.id, eventType, err);
    }
  }

  private async safePublishStepEvent(run: Run, stepId: string, eventType: RunEventType): Promise<void> {
    try {
      await this.publisher.publishStepEvent(run, stepId, eventType);
    } catch (err) {
      this.logPublishFailure(run.id, eventType, err);
    }
  }

  /** Event publishing never changes a run's outcome; failures are logged. */
  private logPublishFailure(runId: string, eventType: RunEventType, err: unknown): void {
    this.config.logger.warn('Failed to publish run event', {
      runId,
      eventType,
      error: err instanceof Error ? err.message : String(err),
    });
  }

  private async transitionRun(run: Run, target: RunStatus): Promise<Run> {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new ExecutorError({ ...result.error, runId: run.id });
    }
    run.status = result.newStatus;
    run.updatedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    return run;
  }

  private applyStepStatus(run: Run, stepId: string, target: StepRunStatus, patch: Partial<StepRunResult>): Run {
    const current = run.stepResults[stepId];
    if (!current) {
      throw new ExecutorError(createTypedError({
        code: 'STEP.NOT_FOUND',
        message: `Step "${stepId}" is not part of run "${run.id}"`,
        runId: run.id,
        stepId,
        retryable: false,
      }));
    }
    const result = transitionStepStatus(current.status, target);
    if (!result.success) {
      throw new ExecutorError({ ...result.error, runId: run.id, stepId });
    }
    run.stepResults[stepId] = { ...current, ...patch, status: result.newStatus };
    return run;
  }

  private async setStepStatus(run: Run, stepId: string, target: StepRunStatus, patch: Partial<StepRunResult> = {}): Promise<Run> {
    run = this.applyStepStatus(run, stepId, target, patch);
    await this.store.runs.update(run.id, run);
    return run;
  }

  private async recordStepResult(run: Run, stepId: string, result: StepRunResult): Promise<Run> {
    return this.setStepStatus(run, stepId, result.status, result);
  }

  private async skipStep(run: Run, stepId: string, reason: string): Promise<Run> {
    run = await this.setStepStatus(run, stepId, StepRunStatus.Skipped, { skipReason: reason });
    await this.safePublishStepEvent(run, stepId, 'step.skipped');
    return run;
  }

  /** Mark every still-pending step from `fromStepId` on (or all of them) as skipped. */
  private skipRemaining(run: Run, fromStepId: string | undefined, reason: string): Run {
    const index = fromStepId === undefined ? 0 : Math.max(run.stepOrder.indexOf(fromStepId), 0);
    for (const stepId of run.stepOrder.slice(index)) {
      if (run.stepResults[stepId]?.status === StepRunStatus.Pending) {
        run = this.applyStepStatus(run, stepId, StepRunStatus.Skipped, { skipReason: reason });
      }
    }
    return run;
  }

  private async skipRun(run: Run, reason: string): Promise<Run> {
    run = this.skipRemaining(run, undefined, reason);
    run.skipReason = reason;
    run.completedAt = new Date().toISOString();
    run = await this.transitionRun(run, RunStatus.Skipped);
    await this.safePublishRunEvent(run, 'run.skipped');
    return run;
  }

  private async failRun(run: Run, error: TypedError): Promise<Run> {
    run.error = error;
    run.completedAt = new Date().toISOString();
    run = await this.transitionRun(run, RunStatus.Failed);
    await this.safePublishRunEvent(run, 'run.failed');
    this.canceledRuns.delete(run.id);
    this.config.logger.error('Run failed', { runId: run.id, code: error.code, step: error.stepId, error: error.message });
    return run;
  }

  /**
   * Internal cancellation with try-finally to guarantee canceledRuns
   * cleanup even if the store update throws.
   */
  private async cancelRunInternal(run: Run): Promise<Run> {
    const reason = this.canceledRuns.get(run.id);
    const error = runCanceledError(run.id, reason);
    run.error = error;
    run.cancelReason = reason;
    run.canceledAt = new Date().toISOString();
    run.completedAt = run.canceledAt;

    for (const stepId of run.stepOrder) {
      if (run.stepResults[stepId]?.status === StepRunStatus.Running) {
        run = this.applyStepStatus(run, stepId, StepRunStatus.Canceled, { completedAt: run.canceledAt });
      }
    }
    run = this.skipRemaining(run, undefined, error.message);

    try {
      run = await this.transitionRun(run, RunStatus.Canceled);
      await this.safePublishRunEvent(run, 'run.canceled');
      this.config.logger.warn('Run canceled', { runId: run.id, reason });
    } finally {
      this.canceledRuns.delete(run.id);
    }
    return run;
  }
}

/** Executor-specific error wrapper. */
export class ExecutorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExecutorError';
  }
}

function interpolateRecord(values: Record<string, string>, vars: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    result[key] = interpolate(value, vars);
  }
  return result;
}
