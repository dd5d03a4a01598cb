/**
 * Reconciliation run
 *
 * Processes the configured services sequentially:
 * - One session for the whole run; failing to open it aborts the run
 * - Fetch → Resolve → Reconcile per service
 * - Failure isolation (a failing service never stops the next one)
 * - Aggregated result reporting
 *
 * @module reconcilers/runner/run
 */

import type { Session } from '../../api/types.js';
import type { ServiceSpec } from '../../types.js';
import { AuthError, SyncError, errorMessage, type SyncErrorKind } from '../../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import { fetchVersion } from '../versions/fetch.js';
import { resolveMonitor } from '../monitors/directory.js';
import { reconcileVersionTag } from '../tags/apply.js';
import { prefixesOverlap } from '../tags/types.js';
import type {
  RunReport,
  RunnerDependencies,
  RunOptions,
  ServiceFailure,
  ServiceResult,
  ServiceStep,
} from './types.js';
import { summarizeResults } from './report.js';

/**
 * Generate a unique run ID
 */
function generateRunId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `run-${timestamp}-${random}`;
}

/**
 * Error kind reported when a step fails with an error outside the taxonomy
 */
const STEP_ERROR_KIND: Record<ServiceStep, SyncErrorKind> = {
  config: 'ConfigError',
  fetch: 'FetchError',
  resolve: 'DirectoryError',
  reconcile: 'TagApplyError',
};

/**
 * Find services whose prefix overlaps an earlier service's prefix on the
 * same monitor
 *
 * @returns the overlapped earlier service for each conflicting service
 */
export function findPrefixConflicts(services: ServiceSpec[]): Map<ServiceSpec, ServiceSpec> {
  const conflicts = new Map<ServiceSpec, ServiceSpec>();
  const accepted: ServiceSpec[] = [];
  for (const service of services) {
    const earlier = accepted.find(
      (other) =>
        other.monitorName === service.monitorName &&
        prefixesOverlap(other.tagPrefix, service.tagPrefix)
    );
    if (earlier) {
      conflicts.set(service, earlier);
    } else {
      accepted.push(service);
    }
  }
  return conflicts;
}

/**
 * Failure for a service that was never reconciled because its prefix
 * overlaps another one on the same monitor
 */
function conflictFailure(service: ServiceSpec, earlier: ServiceSpec): ServiceFailure {
  return {
    status: 'failure',
    monitorName: service.monitorName,
    tagPrefix: service.tagPrefix,
    versionEndpoint: service.versionEndpoint.toString(),
    step: 'config',
    kind: 'ConfigError',
    reason: `tagPrefix '${service.tagPrefix}' overlaps '${earlier.tagPrefix}' on the same monitor`,
  };
}

/**
 * Reconcile one service; never throws
 */
async function reconcileService(
  session: Session,
  service: ServiceSpec,
  getVersion: (endpoint: URL) => Promise<string>,
  options: RunOptions,
  log: ApiLogger
): Promise<ServiceResult> {
  const base = {
    monitorName: service.monitorName,
    tagPrefix: service.tagPrefix,
    versionEndpoint: service.versionEndpoint.toString(),
  };
  let step: ServiceStep = 'fetch';
  let version: string | undefined;
  let monitorId: string | undefined;

  try {
    version = await getVersion(service.versionEndpoint);
    log.debug('Fetched version', { version });

    step = 'resolve';
    monitorId = await resolveMonitor(session, service.monitorName, { logger: log });
    log.debug('Resolved monitor', { monitorId });

    step = 'reconcile';
    const applied = await reconcileVersionTag(session, monitorId, service.tagPrefix, version, {
      dryRun: options.dryRun,
      tagColor: options.tagColor,
      logger: log,
    });

    log.info(applied.converged ? 'Version tag unchanged' : 'Version tag updated', {
      tag: applied.tag,
      added: applied.added,
      removed: applied.removed,
    });

    return { status: 'success', ...base, version, monitorId, applied };
  } catch (err) {
    const failure: ServiceFailure = {
      status: 'failure',
      ...base,
      step,
      kind: err instanceof SyncError ? err.kind : STEP_ERROR_KIND[step],
      reason: errorMessage(err),
      version,
      monitorId,
    };
    log.error(`Service failed at ${step}`, err instanceof Error ? err : undefined, {
      kind: failure.kind,
    });
    return failure;
  }
}

/**
 * Run one reconciliation pass over the configured services
 *
 * @throws AuthError if the session cannot be opened; no service is processed
 */
export async function runReconciliation(
  services: ServiceSpec[],
  deps: RunnerDependencies,
  options: RunOptions = {}
): Promise<RunReport> {
  const log = deps.logger ?? defaultLogger;
  const runId = generateRunId();
  const startTime = Date.now();
  const startedAt = new Date(startTime).toISOString();
  const dryRun = options.dryRun ?? false;

  const getVersion =
    deps.fetchVersion ??
    ((endpoint: URL) =>
      fetchVersion(endpoint, { timeoutMs: options.fetchTimeoutMs, logger: log }));

  let session: Session;
  try {
    session = await deps.openSession();
  } catch (err) {
    if (err instanceof AuthError) throw err;
    throw new AuthError(`Failed to open session: ${errorMessage(err)}`, { cause: err });
  }

  log.info(`Starting version sync for ${services.length} service(s)`, { runId, dryRun });

  const conflicts = findPrefixConflicts(services);
  const results: ServiceResult[] = [];

  try {
    for (const service of services) {
      const serviceLog = log.child({ service: service.monitorName, tagPrefix: service.tagPrefix });
      const earlier = conflicts.get(service);
      let result: ServiceResult;
      if (earlier) {
        result = conflictFailure(service, earlier);
        serviceLog.error('Service skipped', undefined, { reason: result.reason });
      } else {
        result = await reconcileService(session, service, getVersion, options, serviceLog);
      }
      results.push(result);
      options.onResult?.(result);
    }
  } finally {
    try {
      await session.close();
    } catch (err) {
      log.warn('Failed to close session', { error: errorMessage(err) });
    }
  }

  const completedTime = Date.now();
  return {
    runId,
    startedAt,
    completedAt: new Date(completedTime).toISOString(),
    durationMs: completedTime - startTime,
    dryRun,
    results,
    ...summarizeResults(results),
  };
}
