/**
 * run command - Mirror every configured service's version onto its monitor
 *
 * One pass: load the service list, open a single Uptime Kuma session, then
 * fetch → resolve → reconcile each service in order. Invalid entries and
 * per-service failures are reported without stopping the run; only a
 * session that cannot be established aborts it.
 */

import type { CommandContext, CommandResult, ServiceSpec } from '../types.js';
import type { SessionConfig, SessionConnector } from '../api/types.js';
import { AuthError, SyncError, errorMessage } from '../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { createKumaConnector } from '../api/client.js';
import {
  loadServices,
  partitionEntries,
  resolveSessionConfig,
  type InvalidServiceEntry,
  type KumaConnectionOptions,
} from '../config/index.js';
import { openSession } from '../reconcilers/monitors/directory.js';
import { runReconciliation } from '../reconcilers/runner/run.js';
import { configFailure, withConfigFailures } from '../reconcilers/runner/report.js';
import type { RunReport } from '../reconcilers/runner/types.js';
import {
  header,
  info,
  verbose,
  dryRunNotice,
  printServiceResult,
  printRunSummary,
  error as printError,
} from '../utils/output.js';

export interface RunCommandOptions extends KumaConnectionOptions {
  /** Raw JSON service list (SERVICES_CONFIG) */
  servicesJson?: string;
  /** YAML/JSON service list file (SERVICES_FILE) */
  servicesFile?: string;
  /** Plan changes without applying them */
  dryRun?: boolean;
  /** Color for newly created tag definitions */
  tagColor?: string;
  /** Per-request timeout for version endpoints (ms) */
  fetchTimeoutMs?: number;
}

/**
 * Collaborators that tests replace
 */
export interface RunCommandDependencies {
  connector?: SessionConnector;
  fetchVersion?: (endpoint: URL) => Promise<string>;
  logger?: ApiLogger;
}

function fail(message: string, human: boolean): CommandResult<RunReport> {
  if (human) {
    printError(message);
  }
  return { success: false, message };
}

/**
 * Execute the run command
 */
export async function runCommand(
  ctx: CommandContext,
  options: RunCommandOptions = {},
  deps: RunCommandDependencies = {}
): Promise<CommandResult<RunReport>> {
  const { options: globalOpts, outputFormat } = ctx;
  const human = outputFormat === 'human';
  const log = deps.logger ?? defaultLogger;

  verbose('Executing run command', globalOpts.verbose);

  let services: ServiceSpec[];
  let invalid: InvalidServiceEntry[];
  let sessionConfig: SessionConfig;
  try {
    const loaded = await loadServices({
      servicesJson: options.servicesJson,
      servicesFile: options.servicesFile,
    });
    verbose(
      `Loaded ${loaded.entries.length} service entr${loaded.entries.length === 1 ? 'y' : 'ies'} from ${loaded.path ?? 'SERVICES_CONFIG'}`,
      globalOpts.verbose
    );
    ({ services, invalid } = partitionEntries(loaded.entries));
    sessionConfig = resolveSessionConfig(options);
  } catch (err) {
    return fail(errorMessage(err), human);
  }

  if (human) {
    header('Version Sync');
    info(`Uptime Kuma: ${sessionConfig.baseUrl} (${sessionConfig.credentials.mode} auth)`);
    info(`Services: ${services.length + invalid.length}`);
    if (options.dryRun) {
      dryRunNotice();
    }
  }

  const failures = invalid.map(configFailure);
  for (const failure of failures) {
    log.warn('Skipping invalid service entry', {
      service: failure.monitorName,
      reason: failure.reason,
    });
    if (human) {
      printServiceResult(failure);
    }
  }

  const connector = deps.connector ?? createKumaConnector({ logger: log });
  const config = sessionConfig;

  let report: RunReport;
  try {
    report = await runReconciliation(
      services,
      {
        openSession: () => openSession(connector, config),
        fetchVersion: deps.fetchVersion,
        logger: log,
      },
      {
        dryRun: options.dryRun,
        tagColor: options.tagColor,
        fetchTimeoutMs: options.fetchTimeoutMs,
        onResult: human ? printServiceResult : undefined,
      }
    );
  } catch (err) {
    const message =
      err instanceof AuthError
        ? `Authentication with Uptime Kuma failed: ${err.message}`
        : `Version sync failed: ${errorMessage(err)}`;
    log.error('Run aborted', err instanceof Error ? err : undefined, {
      kind: err instanceof SyncError ? err.kind : undefined,
    });
    return fail(message, human);
  }

  report = withConfigFailures(report, failures);

  if (human) {
    printRunSummary(report);
  }

  const dryRunSuffix = report.dryRun ? ' (dry run)' : '';
  const errors = report.results.flatMap((result) =>
    result.status === 'failure' ? [`${result.monitorName}: ${result.reason}`] : []
  );

  return {
    success: report.failed === 0,
    message:
      report.failed === 0
        ? `Synced ${report.succeeded} service(s), ${report.changed} changed${dryRunSuffix}`
        : `${report.failed} of ${report.total} service(s) failed${dryRunSuffix}`,
    data: report,
    errors: errors.length > 0 ? errors : undefined,
  };
}
