/**
 * docs-flow: build and publish project documentation from a declarative
 * pipeline file.
 *
 * Public exports for programmatic use. The `docs-flow` binary lives in
 * cli/main.ts.
 */

export { createAppContext } from './app';
export type { AppContext, AppContextOptions } from './app';
export * from './config';
export * from './domain';
export * from './dsl/schema';
export * from './dsl/condition';
export * from './dsl/template';
export * from './dsl/validator';
export * from './dsl/compiler';
export * from './dsl/loader';
export * from './engine/command-runner';
export * from './engine/git';
export * from './engine/state-machine';
export * from './engine/step-runner';
export * from './engine/executor';
export * from './engine/handlers';
export * from './storage/store';
export * from './storage/memory-store';
export * from './data-plane/publisher';
export * from './logger';
export { runCli } from './cli';
export type { IO } from './cli/io';
