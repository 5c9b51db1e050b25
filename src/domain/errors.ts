/**
 * Typed error model for machine-actionable error handling.
 *
 * Errors are carried as typed values on run and step results rather than
 * thrown exceptions, so the CLI (or any caller) can print the failing step,
 * the reason and the suggested remediation.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VALIDATION'
  | 'PIPELINE'
  | 'STEP'
  | 'RUNTIME'
  | 'PUBLISH'
  | 'GIT'
  | 'RUN'
  | 'SECRETS'
  | 'CONFIG';

/** Typed suggested fix. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "STEP.COMMAND_FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated step if applicable. */
  stepId?: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stepId?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stepId: params.stepId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function pipelineNotFoundError(path: string): TypedError {
  return createTypedError({
    code: 'PIPELINE.NOT_FOUND',
    message: `Pipeline file not found: ${path}`,
    retryable: false,
    details: { path },
    suggestedFixes: [
      { type: 'SET_PIPELINE_FILE', params: { path }, description: 'Pass --file or set DOCS_FLOW_FILE to an existing pipeline file' },
    ],
  });
}

export function pipelineParseError(path: string, reason: string): TypedError {
  return createTypedError({
    code: 'PIPELINE.PARSE',
    message: `Pipeline file is not valid JSON: ${reason}`,
    retryable: false,
    details: { path },
  });
}

export function stepTimeoutError(stepId: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'STEP.TIMEOUT',
    message: `Step timed out after ${timeoutMs}ms`,
    stepId,
    retryable: true,
    details: { timeoutMs, attempt },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMinutes: Math.ceil((timeoutMs * 1.5) / 60000) } },
    ],
  });
}

export function commandFailedError(
  stepId: string,
  command: string,
  exitCode: number,
  stderrTail: string,
): TypedError {
  return createTypedError({
    code: 'STEP.COMMAND_FAILED',
    message: `Command exited with code ${exitCode}: ${command}`,
    stepId,
    retryable: false,
    details: { exitCode, stderr: stderrTail },
  });
}

export function runtimeVersionMismatchError(
  stepId: string,
  runtime: string,
  expected: string,
  actual: string,
): TypedError {
  return createTypedError({
    code: 'RUNTIME.VERSION_MISMATCH',
    message: `Expected ${runtime} ${expected}, found ${actual}`,
    stepId,
    retryable: false,
    details: { runtime, expected, actual },
    suggestedFixes: [
      { type: 'INSTALL_RUNTIME', params: { runtime, version: expected }, description: `Install ${runtime} ${expected} or point "command" at it` },
    ],
  });
}

export function publishSourceMissingError(stepId: string, source: string): TypedError {
  return createTypedError({
    code: 'PUBLISH.SOURCE_MISSING',
    message: `Generated output not found: ${source}`,
    stepId,
    retryable: false,
    details: { source },
    suggestedFixes: [
      { type: 'CHECK_BUILD_OUTPUT', params: { source }, description: 'Make sure the build step writes its output to the publish source directory' },
    ],
  });
}

export function secretMissingError(secretKey: string): TypedError {
  return createTypedError({
    code: 'SECRETS.MISSING',
    message: `Required secret not found: ${secretKey}`,
    retryable: false,
    suggestedFixes: [
      { type: 'PROVIDE_SECRET', params: { key: secretKey }, description: `Export environment variable "${secretKey}"` },
    ],
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of each secret value in a message with its
 * masked form. Returns the message unchanged when no secret occurs.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex special characters in secret values
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

// --- RUN error factory functions ---

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    retryable: false,
    details: reason ? { reason } : undefined,
  });
}

export function runTimeoutError(runId: string, timeoutMs: number, stepId?: string): TypedError {
  return createTypedError({
    code: 'RUN.TIMEOUT',
    message: `Run exceeded timeout of ${timeoutMs}ms`,
    runId,
    stepId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMinutes: Math.ceil((timeoutMs * 2) / 60000) } },
    ],
  });
}

