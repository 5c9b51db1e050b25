/**
 * Step runner: executes individual steps within a pipeline run.
 *
 * Step execution is policy-driven: timeouts, retries and backoff are applied
 * according to the compiled step policy. A timeout aborts the step's
 * in-flight command through the context's abort signal.
 */

import { StepRunStatus, StepRunResult } from '../domain/run';
import { TypedError, createTypedError, maskSecretsInMessage, stepTimeoutError } from '../domain/errors';
import { CompiledStep } from '../dsl/compiler';
import { Logger } from '../logger';
import { CommandRunner } from './command-runner';

/** Step execution context provided by the engine. */
export interface StepExecutionContext {
  runId: string;
  /** Absolute path of the repository checkout. */
  workspace: string;
  /** Absolute directory the step runs in. */
  cwd: string;
  /** Environment exported to every command the step runs. */
  env: Record<string, string>;
  /** Secret values to mask in output and errors. */
  secretValues: string[];
  commands: CommandRunner;
  logger: Logger;
  /** Publish steps commit locally but never push. */
  dryRun: boolean;
  /** Aborted on timeout or cancellation. */
  signal: AbortSignal;
  /** Cancellation state, read at call time. */
  readonly canceled: boolean;
}

/** Input field constraint for a step handler. */
export interface InputFieldContract {
  type: 'string' | 'number' | 'boolean' | 'object' | 'array';
  required?: boolean;
  oneOf?: readonly string[];
  description?: string;
}

/** Pluggable step implementation. */
export interface StepHandler {
  type: string;

  /** Expected shape of the step's `with` inputs, checked by the validator. */
  inputContract?: Record<string, InputFieldContract>;

  execute(
    step: CompiledStep,
    context: StepExecutionContext,
  ): Promise<{ outputs: Record<string, unknown> }>;
}

/** Registry of step handlers by type. */
const stepHandlers = new Map<string, StepHandler>();

/** Register a step handler. */
export function registerStepHandler(handler: StepHandler): void {
  stepHandlers.set(handler.type, handler);
}

/** Options the executor passes for one step. */
export interface ExecuteStepOptions {
  /** Overrides the step's own timeout (the lesser of step and job budget). */
  timeoutMs?: number;
  /** Called when the timeout fires, before the step is reported failed. */
  onTimeout: () => void;
}

/** Execute a single step with retry and timeout policy. */
export async function executeStep(
  step: CompiledStep,
  context: StepExecutionContext,
  options: ExecuteStepOptions,
): Promise<StepRunResult> {
  const startedAt = new Date().toISOString();
  const started = Date.now();
  const handler = stepHandlers.get(step.type);
  if (!handler) {
    return {
      stepId: step.id,
      status: StepRunStatus.Failed,
      startedAt,
      completedAt: new Date().toISOString(),
      error: createTypedError({
        code: 'STEP.NO_HANDLER',
        message: `No handler registered for step type "${step.type}". Register a handler with registerStepHandler() before executing this pipeline.`,
        stepId: step.id,
        retryable: false,
        suggestedFixes: [
          { type: 'REGISTER_HANDLER', params: { stepType: step.type }, description: `Register a step handler for "${step.type}"` },
        ],
      }),
      attempts: 0,
      durationMs: 0,
    };
  }

  const timeoutMs = options.timeoutMs ?? step.policy.timeoutMs;
  const mask = (message: string) => maskSecretsInMessage(message, context.secretValues);
  let lastError: TypedError | undefined;

  for (let attempt = 1; attempt <= step.policy.maxAttempts; attempt++) {
    if (context.canceled) {
      return {
        stepId: step.id,
        status: StepRunStatus.Canceled,
        startedAt,
        completedAt: new Date().toISOString(),
        attempts: attempt - 1,
        durationMs: Date.now() - started,
      };
    }

    try {
      const result = await executeWithTimeout(
        () => handler.execute(step, context),
        timeoutMs,
        options.onTimeout,
      );

      return {
        stepId: step.id,
        status: StepRunStatus.Succeeded,
        startedAt,
        completedAt: new Date().toISOString(),
        outputs: result.outputs,
        attempts: attempt,
        durationMs: Date.now() - started,
      };
    } catch (err) {
      if (context.canceled && !(err instanceof TimeoutError)) {
        return {
          stepId: step.id,
          status: StepRunStatus.Canceled,
          startedAt,
          completedAt: new Date().toISOString(),
          attempts: attempt,
          durationMs: Date.now() - started,
        };
      }

      // Non-retryable failures (bad exit code, version mismatch, missing
      // output) fail immediately without exhausting retry attempts.
      if (err instanceof NonRetryableStepError) {
        return {
          stepId: step.id,
          status: StepRunStatus.Failed,
          startedAt,
          completedAt: new Date().toISOString(),
          error: {
            ...err.typedError,
            message: mask(err.typedError.message),
            stepId: step.id,
            details: { ...err.typedError.details, attempt },
          },
          attempts: attempt,
          durationMs: Date.now() - started,
        };
      }

      if (err instanceof TimeoutError) {
        // Timeouts are final for the step.
        return {
          stepId: step.id,
          status: StepRunStatus.Failed,
          startedAt,
          completedAt: new Date().toISOString(),
          error: stepTimeoutError(step.id, err.timeoutMs, attempt),
          attempts: attempt,
          durationMs: Date.now() - started,
        };
      }

      lastError = createTypedError({
        code: 'STEP.EXECUTION_ERROR',
        message: mask(err instanceof Error ? err.message : 'Unknown step execution error'),
        stepId: step.id,
        retryable: attempt < step.policy.maxAttempts,
        details: { attempt, maxAttempts: step.policy.maxAttempts },
      });

      if (attempt < step.policy.maxAttempts) {
        const delay = computeBackoff(step.policy.backoffStrategy, step.policy.backoffBaseMs, attempt);
        context.logger.warn('Step attempt failed, retrying', { attempt, delayMs: delay, error: lastError.message });
        await sleep(delay, context.signal);
      }
    }
  }

  return {
    stepId: step.id,
    status: StepRunStatus.Failed,
    startedAt,
    completedAt: new Date().toISOString(),
    error: lastError,
    attempts: step.policy.maxAttempts,
    durationMs: Date.now() - started,
  };
}

/** Execute a function with an optional timeout. */
async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => void,
): Promise<T> {
  if (timeoutMs === undefined) return fn();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout();
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
    fn()
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export class TimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Step execution timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Error that step handlers throw when the failure will not go away on
 * retry: a command's non-zero exit, a runtime version mismatch, missing
 * build output. The step runner fails the step immediately.
 */
export class NonRetryableStepError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'NonRetryableStepError';
  }
}

/** Compute backoff delay based on strategy. */
export function computeBackoff(
  strategy: 'fixed' | 'exponential',
  baseMs: number,
  attempt: number,
): number {
  if (strategy === 'fixed') return baseMs;
  return baseMs * Math.pow(2, attempt - 1);
}

/** Resolves after `ms`, or as soon as the signal aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}
