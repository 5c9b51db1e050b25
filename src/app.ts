/**
 * Application context wiring.
 *
 * Assembles the store, event publisher, command runner and executor the
 * CLI (or an embedding program) drives a pipeline with.
 */

import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { RunEventPublisher } from './data-plane/publisher';
import { CommandRunner, ProcessCommandRunner } from './engine/command-runner';
import { PipelineExecutor } from './engine/executor';
import { registerBuiltinHandlers } from './engine/handlers';
import { Logger, logger as rootLogger } from './logger';

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  publisher: RunEventPublisher;
  commands: CommandRunner;
  executor: PipelineExecutor;
}

export interface AppContextOptions {
  store?: Store;
  commands?: CommandRunner;
  /** Absolute path of the repository checkout. */
  workspace: string;
  /** Environment secrets are read from. */
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

/** Create the application context with all services and the built-in step handlers. */
export function createAppContext(options: AppContextOptions): AppContext {
  registerBuiltinHandlers();

  const log = options.logger ?? rootLogger;
  const store = options.store ?? createMemoryStore();
  const publisher = new RunEventPublisher(store, log);
  const commands = options.commands ?? new ProcessCommandRunner(options.env);
  const executor = new PipelineExecutor(store, publisher, commands, {
    workspace: options.workspace,
    env: options.env ?? process.env,
    logger: log,
  });

  return { store, publisher, commands, executor };
}
