/**
 * version-sync library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the building blocks for
 * embedding a reconciliation run elsewhere.
 */

export * from './api/index.js';
export * from './config/index.js';
export * from './reconcilers/index.js';
export { runCommand, validateCommand } from './commands/index.js';
export type {
  RunCommandOptions,
  RunCommandDependencies,
  ValidateOptions,
  ValidateResult,
  ValidatedService,
} from './commands/index.js';
export type {
  ServiceSpec,
  GlobalOptions,
  CommandContext,
  CommandResult,
  OutputFormat,
} from './types.js';
