/**
 * Environment-driven configuration, resolved once at startup.
 *
 * CLI flags override these values; see cli/index.ts.
 */

import * as path from 'path';
import { TypedError, createTypedError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';

export const DEFAULT_PIPELINE_FILE = 'docs-flow.json';

export const LOG_FORMATS = ['text', 'json'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export interface DocsFlowConfig {
  /** Pipeline file, relative to the workspace unless absolute. */
  pipelineFile: string;
  /** Absolute path of the repository checkout. */
  workspace: string;
  logLevel: LogLevel;
  logFormat: LogFormat;
  dryRun: boolean;
  /** Triggering event name; "push" when not running under CI. */
  event: string;
  /** Full ref from CI, when known. */
  ref?: string;
  /** Workflow name reported by CI. */
  workflow?: string;
}

/** Raised for an invalid configuration value. */
export class ConfigError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigError';
  }
}

function invalidValue(variable: string, value: string, allowed: readonly string[]): ConfigError {
  return new ConfigError(
    createTypedError({
      code: 'CONFIG.INVALID_VALUE',
      message: `${variable} has invalid value "${value}". Allowed: ${allowed.join(', ')}`,
      retryable: false,
      details: { variable, value },
    }),
  );
}

const TRUE_VALUES = ['1', 'true', 'yes'];
const FALSE_VALUES = ['0', 'false', 'no', ''];

export function parseBoolean(variable: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  throw invalidValue(variable, value, [...TRUE_VALUES, ...FALSE_VALUES.filter((v) => v !== '')]);
}

function isLogFormat(value: string): value is LogFormat {
  return (LOG_FORMATS as readonly string[]).includes(value);
}

export function parseLogFormat(variable: string, value: string): LogFormat {
  const normalized = value.trim().toLowerCase();
  if (isLogFormat(normalized)) return normalized;
  throw invalidValue(variable, value, LOG_FORMATS);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

/** Read configuration from environment variables. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): DocsFlowConfig {
  const levelText = nonEmpty(env.DOCS_FLOW_LOG_LEVEL);
  let logLevel = LogLevel.Info;
  if (levelText !== undefined) {
    const parsed = parseLogLevel(levelText);
    if (!parsed) throw invalidValue('DOCS_FLOW_LOG_LEVEL', levelText, Object.values(LogLevel));
    logLevel = parsed;
  }

  const formatText = nonEmpty(env.DOCS_FLOW_LOG_FORMAT);
  const dryRunText = env.DOCS_FLOW_DRY_RUN;

  return {
    pipelineFile: nonEmpty(env.DOCS_FLOW_FILE) ?? DEFAULT_PIPELINE_FILE,
    workspace: path.resolve(cwd, nonEmpty(env.DOCS_FLOW_WORKSPACE) ?? '.'),
    logLevel,
    logFormat: formatText !== undefined ? parseLogFormat('DOCS_FLOW_LOG_FORMAT', formatText) : 'text',
    dryRun: dryRunText !== undefined ? parseBoolean('DOCS_FLOW_DRY_RUN', dryRunText) : false,
    event: nonEmpty(env.GITHUB_EVENT_NAME) ?? 'push',
    ref: nonEmpty(env.GITHUB_REF),
    workflow: nonEmpty(env.GITHUB_WORKFLOW),
  };
}
