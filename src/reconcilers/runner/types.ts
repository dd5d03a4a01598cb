/**
 * Types for reconciliation runs
 */

import type { MonitorId, Session } from '../../api/types.js';
import type { SyncErrorKind } from '../../api/errors.js';
import type { ApiLogger } from '../../api/logger.js';
import type { AppliedTag } from '../tags/types.js';

/**
 * Step of the per-service pipeline
 */
export type ServiceStep = 'config' | 'fetch' | 'resolve' | 'reconcile';

/**
 * A service that converged
 */
export interface ServiceSuccess {
  status: 'success';
  monitorName: string;
  tagPrefix: string;
  versionEndpoint: string;
  version: string;
  monitorId: MonitorId;
  applied: AppliedTag;
}

/**
 * A service that failed at some step
 */
export interface ServiceFailure {
  status: 'failure';
  monitorName: string;
  tagPrefix?: string;
  versionEndpoint?: string;
  step: ServiceStep;
  kind: SyncErrorKind;
  reason: string;
  /** Fetched version, when the failure came after fetching */
  version?: string;
  /** Resolved monitor, when the failure came after resolving */
  monitorId?: MonitorId;
}

export type ServiceResult = ServiceSuccess | ServiceFailure;

/**
 * Outcome of a whole run
 */
export interface RunReport {
  /** Unique run ID */
  runId: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  dryRun: boolean;
  results: ServiceResult[];
  total: number;
  succeeded: number;
  failed: number;
  /** Successful services that needed at least one change */
  changed: number;
}

/**
 * Collaborators of a run
 */
export interface RunnerDependencies {
  /** Establish the run's session; failures abort the run */
  openSession: () => Promise<Session>;
  /** Override version fetching (defaults to HTTP GET) */
  fetchVersion?: (endpoint: URL) => Promise<string>;
  logger?: ApiLogger;
}

/**
 * Options for a run
 */
export interface RunOptions {
  /** Plan tag changes without applying them */
  dryRun?: boolean;
  /** Color for newly created tag definitions */
  tagColor?: string;
  /** Timeout for each version fetch (ms) */
  fetchTimeoutMs?: number;
  /** Called as soon as each service's result is known */
  onResult?: (result: ServiceResult) => void;
}
