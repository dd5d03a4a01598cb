/**
 * Command exports
 */

export {
  runCommand,
  type RunCommandOptions,
  type RunCommandDependencies,
} from './run.js';
export {
  validateCommand,
  type ValidateOptions,
  type ValidateResult,
  type ValidatedService,
} from './validate.js';
