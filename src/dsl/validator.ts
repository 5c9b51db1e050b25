/**
 * DSL Validator.
 *
 * Validates an untrusted pipeline document (usually parsed JSON) against the
 * schema and returns the typed Pipeline when it conforms.
 */

import * as path from 'path';
import { TypedError, createTypedError } from '../domain/errors';
import { Pipeline, PipelineStep, SecretRequirement, StepType } from '../domain/pipeline';
import { ConditionSyntaxError, parseCondition } from './condition';
import { BUILTIN_HANDLERS } from '../engine/handlers';
import { InputFieldContract } from '../engine/step-runner';
import {
  DEFAULT_JOB_TIMEOUT_MINUTES,
  DSL_SPEC_VERSIONS,
  REQUIRED_PIPELINE_FIELDS,
  REQUIRED_STEP_FIELDS,
  SCHEMA_CONSTRAINTS,
  STEP_ID_PATTERN,
  VALID_STEP_TYPES,
  isSupportedVersion,
} from './schema';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
  /** The typed document, present only when valid. */
  pipeline?: Pipeline;
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Input contracts of the built-in step types, fixed at load time. */
const STEP_INPUT_CONTRACTS: ReadonlyMap<string, Record<string, InputFieldContract>> = new Map(
  BUILTIN_HANDLERS.map((handler) => [handler.type, handler.inputContract ?? {}]),
);

function isStepType(value: unknown): value is StepType {
  return typeof value === 'string' && (VALID_STEP_TYPES as readonly string[]).includes(value);
}

function schemaError(code: string, message: string, stepId?: string, details?: UnknownRecord): TypedError {
  return createTypedError({ code, message, stepId, retryable: false, details });
}

/** Validate a pipeline document. */
export function validatePipeline(doc: unknown): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  if (!isRecord(doc)) {
    errors.push(schemaError('VALIDATION.INVALID_DOCUMENT', 'Pipeline document must be a JSON object'));
    return { valid: false, errors, warnings };
  }

  validateRequiredFields(doc, errors);
  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  const specVersion = validateSpecVersion(doc.specVersion, errors);
  const name = validateName(doc.name, errors);
  const branches = validateTrigger(doc.on, errors);
  const condition = validateCondition(doc.if, 'if', errors);
  const timeoutMinutes = validateTimeout(doc.timeoutMinutes, 'timeoutMinutes', errors);
  const env = validateEnv(doc.env, 'env', errors);
  const secrets = validateSecrets(doc.secrets, errors);
  const steps = validateSteps(doc.steps, errors, warnings);

  const jobTimeout = timeoutMinutes ?? DEFAULT_JOB_TIMEOUT_MINUTES;
  for (const step of steps) {
    if (step.timeoutMinutes !== undefined && step.timeoutMinutes > jobTimeout) {
      warnings.push(`Step "${step.id}" timeout (${step.timeoutMinutes}m) exceeds the job timeout (${jobTimeout}m)`);
    }
  }
  if (steps.length > 0 && !steps.some((s) => s.type === 'publish-branch')) {
    warnings.push('Pipeline has no publish-branch step; generated output will not be published');
  }

  if (errors.length > 0 || specVersion === undefined || name === undefined || branches === undefined) {
    return { valid: false, errors, warnings };
  }

  const pipeline: Pipeline = {
    specVersion,
    name,
    description: typeof doc.description === 'string' ? doc.description : undefined,
    on: { push: { branches } },
    if: condition,
    timeoutMinutes,
    env,
    secrets,
    steps,
  };

  return { valid: true, errors, warnings, pipeline };
}

function validateRequiredFields(doc: UnknownRecord, errors: TypedError[]): void {
  for (const field of REQUIRED_PIPELINE_FIELDS) {
    if (doc[field] === undefined || doc[field] === null) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.REQUIRED_FIELD',
          message: `Missing required field: ${field}`,
          retryable: false,
          suggestedFixes: [
            { type: 'ADD_FIELD', params: { field }, description: `Provide the "${field}" field` },
          ],
        }),
      );
    }
  }
}

function validateSpecVersion(value: unknown, errors: TypedError[]): string | undefined {
  if (typeof value === 'string' && isSupportedVersion(value)) return value;
  errors.push(
    createTypedError({
      code: 'VALIDATION.UNSUPPORTED_VERSION',
      message: `Unsupported DSL spec version: ${String(value)}`,
      retryable: false,
      suggestedFixes: [
        { type: 'USE_VERSION', params: { specVersion: DSL_SPEC_VERSIONS[0] }, description: `Use supported version ${DSL_SPEC_VERSIONS[0]}` },
      ],
    }),
  );
  return undefined;
}

function validateName(value: unknown, errors: TypedError[]): string | undefined {
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push(schemaError('VALIDATION.INVALID_NAME', 'Pipeline name must be a non-empty string'));
    return undefined;
  }
  if (value.length > SCHEMA_CONSTRAINTS.maxPipelineNameLength) {
    errors.push(
      schemaError('VALIDATION.NAME_TOO_LONG', `Pipeline name exceeds ${SCHEMA_CONSTRAINTS.maxPipelineNameLength} characters`),
    );
    return undefined;
  }
  return value;
}

function validateTrigger(value: unknown, errors: TypedError[]): string[] | undefined {
  const branches = isRecord(value) && isRecord(value.push) ? value.push.branches : undefined;
  if (!Array.isArray(branches) || branches.length === 0) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_TRIGGER',
        message: 'Trigger must name at least one branch under on.push.branches',
        retryable: false,
        suggestedFixes: [
          { type: 'SET_TRIGGER', params: { on: { push: { branches: ['main'] } } }, description: 'Trigger on pushes to main' },
        ],
      }),
    );
    return undefined;
  }
  const names: string[] = [];
  for (const branch of branches) {
    if (typeof branch !== 'string' || branch.trim() === '') {
      errors.push(schemaError('VALIDATION.INVALID_TRIGGER', 'Trigger branches must be non-empty strings'));
      return undefined;
    }
    names.push(branch);
  }
  return names;
}

function validateCondition(
  value: unknown,
  field: string,
  errors: TypedError[],
  stepId?: string,
): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    errors.push(schemaError('VALIDATION.INVALID_CONDITION', `"${field}" must be a string`, stepId));
    return undefined;
  }
  try {
    parseCondition(value);
  } catch (err) {
    if (!(err instanceof ConditionSyntaxError)) throw err;
    errors.push(
      schemaError('VALIDATION.INVALID_CONDITION', `Invalid condition in "${field}": ${err.message}`, stepId, {
        condition: value,
        position: err.position,
      }),
    );
    return undefined;
  }
  return value;
}

function validateTimeout(value: unknown, field: string, errors: TypedError[], stepId?: string): number | undefined {
  if (value === undefined) return undefined;
  const { minTimeoutMinutes, maxTimeoutMinutes } = SCHEMA_CONSTRAINTS;
  if (typeof value !== 'number' || !Number.isFinite(value) || value < minTimeoutMinutes || value > maxTimeoutMinutes) {
    errors.push(
      schemaError(
        'VALIDATION.INVALID_TIMEOUT',
        `"${field}" must be a number between ${minTimeoutMinutes} and ${maxTimeoutMinutes}`,
        stepId,
      ),
    );
    return undefined;
  }
  return value;
}

function validateEnv(
  value: unknown,
  field: string,
  errors: TypedError[],
  stepId?: string,
): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    errors.push(schemaError('VALIDATION.INVALID_ENV', `"${field}" must be an object of strings`, stepId));
    return undefined;
  }
  const env: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      errors.push(schemaError('VALIDATION.INVALID_ENV', `"${field}.${key}" must be a string`, stepId));
      continue;
    }
    env[key] = entry;
  }
  return env;
}

function validateSecrets(value: unknown, errors: TypedError[]): SecretRequirement[] | undefined {
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    errors.push(schemaError('VALIDATION.INVALID_SECRETS', '"secrets" must be an array'));
    return undefined;
  }
  const secrets: SecretRequirement[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.key !== 'string' || entry.key === '') {
      errors.push(schemaError('VALIDATION.INVALID_SECRETS', 'Each secret needs a non-empty "key"'));
      continue;
    }
    secrets.push({
      key: entry.key,
      required: entry.required === true,
      description: typeof entry.description === 'string' ? entry.description : undefined,
    });
  }
  return secrets;
}

function validateSteps(value: unknown, errors: TypedError[], warnings: string[]): PipelineStep[] {
  if (!Array.isArray(value)) {
    errors.push(schemaError('VALIDATION.INVALID_STEPS', 'Steps must be an array'));
    return [];
  }

  if (value.length === 0) {
    errors.push(schemaError('VALIDATION.EMPTY_STEPS', 'Pipeline must have at least one step'));
    return [];
  }

  if (value.length > SCHEMA_CONSTRAINTS.maxSteps) {
    errors.push(
      schemaError('VALIDATION.TOO_MANY_STEPS', `Pipeline exceeds maximum of ${SCHEMA_CONSTRAINTS.maxSteps} steps`),
    );
  }

  const steps: PipelineStep[] = [];
  const seenIds = new Set<string>();
  value.forEach((raw: unknown, index: number) => {
    const step = validateStep(raw, index, errors, warnings);
    if (!step) return;
    if (seenIds.has(step.id)) {
      errors.push(schemaError('VALIDATION.DUPLICATE_STEP_ID', `Duplicate step ID: ${step.id}`, step.id));
      return;
    }
    seenIds.add(step.id);
    steps.push(step);
  });
  return steps;
}

function validateStep(raw: unknown, index: number, errors: TypedError[], warnings: string[]): PipelineStep | undefined {
  if (!isRecord(raw)) {
    errors.push(schemaError('VALIDATION.INVALID_STEP', `Step at index ${index} must be an object`));
    return undefined;
  }

  const missing = REQUIRED_STEP_FIELDS.filter((field) => typeof raw[field] !== 'string' || raw[field] === '');
  if (missing.length > 0) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.STEP_REQUIRED_FIELD',
        message: `Step at index ${index} is missing required fields: ${missing.join(', ')}`,
        retryable: false,
        suggestedFixes: missing.map((field) => ({
          type: 'ADD_FIELD',
          params: { field, index },
          description: `Provide the "${field}" field`,
        })),
      }),
    );
    return undefined;
  }

  const { id, name, type } = raw;
  if (typeof id !== 'string' || typeof name !== 'string') return undefined;
  const errorCount = errors.length;

  if (!STEP_ID_PATTERN.test(id)) {
    errors.push(
      schemaError('VALIDATION.INVALID_STEP_ID', `Step ID "${id}" must match ${STEP_ID_PATTERN.source}`, id),
    );
  }

  if (name.length > SCHEMA_CONSTRAINTS.maxStepNameLength) {
    errors.push(
      schemaError('VALIDATION.NAME_TOO_LONG', `Step name exceeds ${SCHEMA_CONSTRAINTS.maxStepNameLength} characters`, id),
    );
  }

  if (!isStepType(type)) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.INVALID_STEP_TYPE',
        message: `Step "${id}" has unknown type "${String(type)}"`,
        stepId: id,
        retryable: false,
        suggestedFixes: [
          { type: 'SET_STEP_TYPE', params: { validTypes: [...VALID_STEP_TYPES] }, description: 'Use a built-in step type' },
        ],
      }),
    );
    return undefined;
  }

  const inputs = raw.with;
  if (inputs === undefined || isRecord(inputs)) {
    validateInputs(id, type, inputs ?? {}, errors);
  } else {
    errors.push(schemaError('VALIDATION.INVALID_INPUTS', `Step "${id}": "with" must be an object`, id));
  }

  const workingDirectory = validateWorkingDirectory(raw.workingDirectory, id, errors);
  const env = validateEnv(raw.env, 'env', errors, id);
  const condition = validateCondition(raw.if, 'if', errors, id);
  const timeoutMinutes = validateTimeout(raw.timeoutMinutes, 'timeoutMinutes', errors, id);

  let maxAttempts: number | undefined;
  const attempts = raw.maxAttempts;
  if (attempts !== undefined) {
    const { minAttempts, maxAttempts: limit } = SCHEMA_CONSTRAINTS;
    if (typeof attempts === 'number' && Number.isInteger(attempts) && attempts >= minAttempts && attempts <= limit) {
      maxAttempts = attempts;
    } else {
      errors.push(
        schemaError('VALIDATION.INVALID_MAX_ATTEMPTS', `"maxAttempts" must be an integer between ${minAttempts} and ${limit}`, id),
      );
    }
  }

  if (type === 'shell' && maxAttempts !== undefined && maxAttempts > 1) {
    warnings.push(`Step "${id}" retries a shell script; make sure it is safe to run more than once`);
  }

  if (errors.length > errorCount) return undefined;

  return {
    id,
    name,
    type,
    description: typeof raw.description === 'string' ? raw.description : undefined,
    with: isRecord(inputs) ? inputs : undefined,
    workingDirectory,
    env,
    if: condition,
    timeoutMinutes,
    maxAttempts,
  };
}

/** Working directories are relative and stay inside the workspace. */
function validateWorkingDirectory(value: unknown, stepId: string, errors: TypedError[]): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    errors.push(schemaError('VALIDATION.INVALID_WORKING_DIRECTORY', '"workingDirectory" must be a non-empty string', stepId));
    return undefined;
  }
  const normalized = path.posix.normalize(value.replace(/\\/g, '/'));
  if (path.posix.isAbsolute(normalized) || normalized === '..' || normalized.startsWith('../')) {
    errors.push(
      schemaError(
        'VALIDATION.INVALID_WORKING_DIRECTORY',
        `Step "${stepId}": working directory "${value}" must stay inside the workspace`,
        stepId,
      ),
    );
    return undefined;
  }
  return normalized;
}

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/** Check step inputs against the input contract of the step's type. */
function validateInputs(stepId: string, type: StepType, inputs: UnknownRecord, errors: TypedError[]): void {
  const contract = STEP_INPUT_CONTRACTS.get(type) ?? {};
  const contractError = (message: string, extra: Partial<Pick<TypedError, 'details' | 'suggestedFixes'>> = {}) =>
    createTypedError({
      code: 'VALIDATION.HANDLER_CONTRACT',
      message: `Step "${stepId}": ${message}`,
      stepId,
      retryable: false,
      ...extra,
    });

  for (const [field, rule] of Object.entries(contract)) {
    const value = hasOwn(inputs, field) ? inputs[field] : undefined;

    if (value === undefined || value === null || (rule.required && typeof value === 'string' && value.trim() === '')) {
      if (rule.required) {
        errors.push(
          contractError(`missing required input "${field}" for step type "${type}"`, {
            suggestedFixes: [
              { type: 'ADD_INPUT', params: { field, stepId }, description: rule.description ?? `Provide the "${field}" input` },
            ],
          }),
        );
      }
      continue;
    }

    const actualType = Array.isArray(value) ? 'array' : typeof value;
    if (actualType !== rule.type) {
      errors.push(contractError(`input "${field}" must be type "${rule.type}", got "${actualType}"`));
      continue;
    }

    if (rule.oneOf && typeof value === 'string' && !rule.oneOf.includes(value)) {
      errors.push(
        contractError(`input "${field}" has invalid value "${value}". Allowed: ${rule.oneOf.join(', ')}`, {
          suggestedFixes: rule.oneOf.map((allowed) => ({
            type: 'SET_INPUT_VALUE',
            params: { field, value: allowed, stepId },
            description: `Use "${allowed}" for ${field}`,
          })),
        }),
      );
    }
  }

  for (const field of Object.keys(inputs)) {
    if (!hasOwn(contract, field)) {
      errors.push(
        contractError(`unknown input "${field}" for step type "${type}"`, {
          details: { knownInputs: Object.keys(contract) },
        }),
      );
    }
  }
}
