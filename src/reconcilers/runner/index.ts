/**
 * Reconciliation runner
 *
 * @module reconcilers/runner
 */

export type {
  ServiceStep,
  ServiceSuccess,
  ServiceFailure,
  ServiceResult,
  RunReport,
  RunnerDependencies,
  RunOptions,
} from './types.js';

export { runReconciliation, findPrefixConflicts } from './run.js';

export {
  summarizeResults,
  configFailure,
  withConfigFailures,
  formatServiceResult,
  formatRunSummary,
} from './report.js';
