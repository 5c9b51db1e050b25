/**
 * Pipeline DSL schema definitions.
 *
 * The versioned schema is the source of truth for validation and
 * compilation of pipeline documents.
 */

/** Supported pipeline document versions. */
export const DSL_SPEC_VERSIONS = ['1.0.0'] as const;
export type DslSpecVersion = (typeof DSL_SPEC_VERSIONS)[number];

/** Check if a version string is a supported DSL spec version. */
export function isSupportedVersion(version: string): version is DslSpecVersion {
  return (DSL_SPEC_VERSIONS as readonly string[]).includes(version);
}

/** Step types recognized by the schema. */
export const VALID_STEP_TYPES = ['checkout', 'setup-runtime', 'shell', 'publish-branch'] as const;

/** Required fields for a pipeline document. */
export const REQUIRED_PIPELINE_FIELDS = ['specVersion', 'name', 'on', 'steps'] as const;

/** Required fields for a step. */
export const REQUIRED_STEP_FIELDS = ['id', 'name', 'type'] as const;

/** Step IDs: lowercase letters, digits, dashes and underscores. */
export const STEP_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

/** Validation constraints. */
export const SCHEMA_CONSTRAINTS = {
  /** Maximum number of steps per pipeline. */
  maxSteps: 100,
  /** Maximum step name length. */
  maxStepNameLength: 256,
  /** Maximum pipeline name length. */
  maxPipelineNameLength: 256,
  /** Minimum timeout in minutes. */
  minTimeoutMinutes: 1,
  /** Maximum timeout in minutes (the hosted-runner job limit). */
  maxTimeoutMinutes: 360,
  /** Maximum attempts per step. */
  maxAttempts: 5,
  /** Minimum attempts per step. */
  minAttempts: 1,
} as const;

/** Job-level timeout applied when the pipeline declares none. */
export const DEFAULT_JOB_TIMEOUT_MINUTES = 360;
