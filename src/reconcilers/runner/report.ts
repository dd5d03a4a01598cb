/**
 * Run report helpers
 *
 * Aggregates per-service results and formats them as plain text, one line
 * per service plus a summary.
 */

import type { InvalidServiceEntry } from '../../config/services.js';
import { formatAppliedTag } from '../tags/apply.js';
import type { RunReport, ServiceFailure, ServiceResult } from './types.js';

/**
 * Count outcomes
 */
export function summarizeResults(
  results: ServiceResult[]
): Pick<RunReport, 'total' | 'succeeded' | 'failed' | 'changed'> {
  let succeeded = 0;
  let changed = 0;
  for (const result of results) {
    if (result.status === 'success') {
      succeeded++;
      if (!result.applied.converged) changed++;
    }
  }
  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    changed,
  };
}

/**
 * Turn an invalid configuration entry into a failure result
 */
export function configFailure(entry: InvalidServiceEntry): ServiceFailure {
  return {
    status: 'failure',
    monitorName: entry.label,
    step: 'config',
    kind: 'ConfigError',
    reason: `Invalid service config: ${entry.issues.join('; ')}`,
  };
}

/**
 * Prepend configuration failures to a run report and recount
 */
export function withConfigFailures(report: RunReport, failures: ServiceFailure[]): RunReport {
  if (failures.length === 0) return report;
  const results = [...failures, ...report.results];
  return { ...report, results, ...summarizeResults(results) };
}

/**
 * Format one service outcome as a single line
 */
export function formatServiceResult(result: ServiceResult): string {
  if (result.status === 'success') {
    return `${result.monitorName}: ${result.version} -> ${formatAppliedTag(result.applied)}`;
  }
  return `${result.monitorName}: ${result.kind} at ${result.step}: ${result.reason}`;
}

/**
 * Format the aggregate counts
 */
export function formatRunSummary(report: RunReport): string {
  const lines = [
    `Summary: ${report.succeeded}/${report.total} succeeded, ${report.failed} failed` +
      (report.dryRun ? ' (dry run)' : ''),
  ];

  const failures = report.results.filter(
    (result): result is ServiceFailure => result.status === 'failure'
  );
  for (const failure of failures) {
    lines.push(`  ${failure.monitorName}: ${failure.kind}`);
  }

  return lines.join('\n');
}
