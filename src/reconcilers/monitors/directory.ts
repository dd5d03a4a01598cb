/**
 * Monitor directory
 *
 * Establishes the run's session and resolves monitor display names to
 * monitor ids. Names match exactly: case-sensitive, no trimming.
 */

import type { MonitorId, MonitorSummary, Session, SessionConfig, SessionConnector } from '../../api/types.js';
import {
  AuthError,
  DirectoryError,
  MonitorNotFoundError,
  SyncError,
  errorMessage,
} from '../../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';

/**
 * Open the run's single session
 *
 * @throws AuthError for any failure; the run cannot proceed without a session
 */
export async function openSession(
  connector: SessionConnector,
  config: SessionConfig
): Promise<Session> {
  try {
    return await connector.connect(config);
  } catch (err) {
    if (err instanceof AuthError) throw err;
    if (err instanceof SyncError) {
      throw new AuthError(err.message, { cause: err });
    }
    throw new AuthError(`Failed to open session: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Find every monitor carrying exactly this display name, in listing order
 */
export function findMonitorsByName(monitors: MonitorSummary[], monitorName: string): MonitorSummary[] {
  return monitors.filter((monitor) => monitor.name === monitorName);
}

export interface ResolveMonitorOptions {
  logger?: ApiLogger;
}

/**
 * Resolve a monitor display name to its id
 *
 * When several monitors share the name, the first in listing order wins
 * and a warning names the others.
 *
 * @throws MonitorNotFoundError when no monitor has the name
 * @throws DirectoryError when the listing fails
 */
export async function resolveMonitor(
  session: Session,
  monitorName: string,
  options: ResolveMonitorOptions = {}
): Promise<MonitorId> {
  const log = options.logger ?? defaultLogger;

  let monitors: MonitorSummary[];
  try {
    monitors = await session.monitors.list();
  } catch (err) {
    throw new DirectoryError(`Failed to list monitors: ${errorMessage(err)}`, { cause: err });
  }

  const [first, ...duplicates] = findMonitorsByName(monitors, monitorName);
  if (!first) {
    throw new MonitorNotFoundError(monitorName);
  }

  if (duplicates.length > 0) {
    log.warn(`Monitor name '${monitorName}' is ambiguous, using first match`, {
      monitorId: first.id,
      ignored: duplicates.map((monitor) => monitor.id),
    });
  }

  return first.id;
}
