/**
 * `docs-flow` command line.
 *
 * Commands:
 * - run [--event <name>] [--branch <name>] [--dry-run]
 * - validate
 * - plan
 *
 * Global options: --file, --workspace, --log-format text|json, --log-level.
 * Exit codes: 0 succeeded or skipped, 1 failed or canceled, 2 invalid
 * pipeline, configuration or usage.
 */

import * as path from 'path';
import yargs from 'yargs';
import { createAppContext } from '../app';
import { ConfigError, DocsFlowConfig, loadConfig, parseLogFormat } from '../config';
import { TypedError, createTypedError } from '../domain/errors';
import { RunTrigger, branchFromRef } from '../domain/pipeline';
import { RunStatus } from '../domain/run';
import { CompiledPlan, compilePipeline } from '../dsl/compiler';
import { PipelineLoadError, loadPipeline } from '../dsl/loader';
import { CommandRunner, ProcessCommandRunner } from '../engine/command-runner';
import { GitClient, GitCommandError } from '../engine/git';
import { registerBuiltinHandlers } from '../engine/handlers';
import {
  LogEntry,
  LogLevel,
  formatJsonEntry,
  formatTextEntry,
  logger,
  parseLogLevel,
  setLogHandler,
  setLogLevel,
} from '../logger';
import { formatPlan, formatRunSummary, formatTypedError } from './format';
import { IO } from './io';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INVALID = 2;

export interface CliOptions {
  argv: string[];
  io: IO;
  env?: Record<string, string | undefined>;
  cwd?: string;
  /** Runs external commands; defaults to real child processes. */
  commands?: CommandRunner;
}

interface GlobalArgs {
  file?: string;
  workspace?: string;
  'log-format'?: string;
  'log-level'?: string;
}

interface RunArgs {
  event?: string;
  branch?: string;
  'dry-run'?: boolean;
}

interface Session {
  config: DocsFlowConfig;
  io: IO;
  env: Record<string, string | undefined>;
  commands: CommandRunner;
}

export async function runCli(opts: CliOptions): Promise<number> {
  const { argv, io } = opts;
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  let exitCode = EXIT_OK;

  const session = (args: GlobalArgs): Session => {
    const config = applyGlobalArgs(loadConfig(env, cwd), args, cwd);
    installLogHandler(io, config);
    registerBuiltinHandlers();
    return { config, io, env, commands: opts.commands ?? new ProcessCommandRunner(env) };
  };

  const parser = yargs(argv)
    .scriptName('docs-flow')
    .option('file', { alias: 'f', type: 'string', describe: 'Pipeline file (default docs-flow.json)' })
    .option('workspace', { alias: 'C', type: 'string', describe: 'Repository checkout to run in' })
    .option('log-format', { type: 'string', describe: 'text or json' })
    .option('log-level', { type: 'string', describe: 'debug, info, warn or error' })
    .command(
      'run',
      'Build and publish the documentation',
      (y) =>
        y
          .option('event', { type: 'string', describe: 'Triggering event (default push)' })
          .option('branch', { type: 'string', describe: 'Branch the push went to (default: current branch)' })
          .option('dry-run', { type: 'boolean', describe: 'Commit on the publishing branch but do not push' }),
      async (args) => {
        exitCode = await runCommand(session(args), args);
      },
    )
    .command(
      'validate',
      'Check the pipeline file',
      (y) => y,
      async (args) => {
        exitCode = await validateCommand(session(args));
      },
    )
    .command(
      'plan',
      'Print the compiled steps and their policies',
      (y) => y,
      async (args) => {
        exitCode = await planCommand(session(args));
      },
    )
    .demandCommand(1, 'Specify a command: run, validate or plan')
    .strict()
    .help()
    .exitProcess(false)
    .fail(false);

  try {
    await parser.parseAsync();
    return exitCode;
  } catch (err) {
    if (err instanceof ConfigError || err instanceof PipelineLoadError) {
      printErrors(io, [err.typedError]);
      return EXIT_INVALID;
    }
    if (err instanceof Error && err.name === 'YError') {
      io.stderr(`${err.message}\n`);
      return EXIT_INVALID;
    }
    io.stderr(`${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_FAILED;
  }
}

/** Flags override the environment. */
function applyGlobalArgs(config: DocsFlowConfig, args: GlobalArgs, cwd: string): DocsFlowConfig {
  const result = { ...config };
  if (args.file) result.pipelineFile = args.file;
  if (args.workspace) result.workspace = path.resolve(cwd, args.workspace);
  if (args['log-format']) result.logFormat = parseLogFormat('--log-format', args['log-format']);
  if (args['log-level']) {
    const level = parseLogLevel(args['log-level']);
    if (!level) {
      throw new ConfigError(
        createTypedError({
          code: 'CONFIG.INVALID_VALUE',
          message: `--log-level has invalid value "${args['log-level']}". Allowed: ${Object.values(LogLevel).join(', ')}`,
          retryable: false,
        }),
      );
    }
    result.logLevel = level;
  }
  return result;
}

function installLogHandler(io: IO, config: DocsFlowConfig): void {
  const format = config.logFormat === 'json' ? formatJsonEntry : formatTextEntry;
  setLogLevel(config.logLevel);
  setLogHandler((entry: LogEntry) => {
    const line = `${format(entry)}\n`;
    if (entry.level === LogLevel.Warn || entry.level === LogLevel.Error) {
      io.stderr(line);
    } else {
      io.stdout(line);
    }
  });
}

function printErrors(io: IO, errors: TypedError[]): void {
  for (const error of errors) {
    io.stderr(`${formatTypedError(error).join('\n')}\n`);
  }
}

function pipelinePath(config: DocsFlowConfig): string {
  return path.resolve(config.workspace, config.pipelineFile);
}

/** Load and compile the pipeline; prints warnings and errors. */
async function compile(session: Session): Promise<CompiledPlan | undefined> {
  const doc = await loadPipeline(pipelinePath(session.config));
  const result = compilePipeline(doc);
  for (const warning of result.validation.warnings) {
    session.io.stderr(`warning: ${warning}\n`);
  }
  if (!result.success || !result.plan) {
    printErrors(session.io, result.errors);
    return undefined;
  }
  return result.plan;
}

async function validateCommand(session: Session): Promise<number> {
  const plan = await compile(session);
  if (!plan) return EXIT_INVALID;
  session.io.stdout(`Pipeline "${plan.pipelineName}" is valid (${plan.executionOrder.length} steps)\n`);
  return EXIT_OK;
}

async function planCommand(session: Session): Promise<number> {
  const plan = await compile(session);
  if (!plan) return EXIT_INVALID;
  session.io.stdout(`${formatPlan(plan).join('\n')}\n`);
  return EXIT_OK;
}

/**
 * The trigger comes from --event/--branch, then the CI variables, then
 * the checkout's current branch.
 */
async function resolveTrigger(session: Session, args: RunArgs): Promise<RunTrigger | TypedError> {
  const { config } = session;
  const event = args.event ?? config.event;
  const workflow = config.workflow;

  if (args.branch) {
    return { event, branch: args.branch, ref: `refs/heads/${args.branch}`, workflow };
  }
  if (config.ref) {
    return { event, branch: branchFromRef(config.ref), ref: config.ref, workflow };
  }

  try {
    const branch = await new GitClient(session.commands, config.workspace).currentBranch();
    return { event, branch, ref: `refs/heads/${branch}`, workflow };
  } catch (err) {
    if (!(err instanceof GitCommandError)) throw err;
    return createTypedError({
      code: 'GIT.BRANCH_UNKNOWN',
      message: `Could not determine the current branch: ${err.message}`,
      retryable: false,
      suggestedFixes: [{ type: 'SET_BRANCH', params: {}, description: 'Pass --branch or set GITHUB_REF' }],
    });
  }
}

function isTrigger(value: RunTrigger | TypedError): value is RunTrigger {
  return 'branch' in value;
}

async function runCommand(session: Session, args: RunArgs): Promise<number> {
  const plan = await compile(session);
  if (!plan) return EXIT_INVALID;

  const trigger = await resolveTrigger(session, args);
  if (!isTrigger(trigger)) {
    printErrors(session.io, [trigger]);
    return EXIT_FAILED;
  }

  const context = createAppContext({
    workspace: session.config.workspace,
    env: session.env,
    commands: session.commands,
  });
  const created = await context.executor.createRun(plan, trigger, {
    dryRun: args['dry-run'] ?? session.config.dryRun,
  });

  const onInterrupt = () => {
    context.executor.cancelRun(created.id, 'interrupted').catch((err: unknown) => {
      logger.error('Failed to cancel run', { runId: created.id, error: err instanceof Error ? err.message : String(err) });
    });
  };
  process.once('SIGINT', onInterrupt);

  const run = await context.executor
    .executeRun(created.id)
    .finally(() => process.removeListener('SIGINT', onInterrupt));

  session.io.stdout(`${formatRunSummary(run).join('\n')}\n`);
  if (run.error) printErrors(session.io, [run.error]);

  return run.status === RunStatus.Succeeded || run.status === RunStatus.Skipped ? EXIT_OK : EXIT_FAILED;
}
