/**
 * Error taxonomy for version-sync
 *
 * Every failure the reconciler reports carries a `kind` so the runner and
 * the summary can name it without instanceof chains:
 * - AuthError: run-fatal, no session could be established
 * - FetchError: version endpoint failed
 * - MonitorNotFound: no monitor with the configured name
 * - DirectoryError: the monitor listing itself failed
 * - TagApplyError: listing or mutating a monitor's tags failed
 * - ConfigError: service configuration is unusable
 */

export type SyncErrorKind =
  | 'AuthError'
  | 'FetchError'
  | 'MonitorNotFound'
  | 'DirectoryError'
  | 'TagApplyError'
  | 'ConfigError';

/**
 * Base class for all reconciler errors
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly kind: SyncErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SyncError';
  }
}

/**
 * Authentication or connection to the monitoring system failed
 */
export class AuthError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'AuthError', options);
    this.name = 'AuthError';
  }
}

/**
 * A version endpoint could not be read
 */
export class FetchError extends SyncError {
  public readonly endpoint: string;
  public readonly status?: number;

  constructor(
    endpoint: string,
    reason: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(`Failed to fetch version from ${endpoint}: ${reason}`, 'FetchError', options);
    this.name = 'FetchError';
    this.endpoint = endpoint;
    this.status = options?.status;
  }
}

/**
 * No monitor carries the configured display name
 */
export class MonitorNotFoundError extends SyncError {
  constructor(public readonly monitorName: string) {
    super(`Monitor '${monitorName}' not found`, 'MonitorNotFound');
    this.name = 'MonitorNotFoundError';
  }
}

/**
 * Listing monitors failed
 */
export class DirectoryError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DirectoryError', options);
    this.name = 'DirectoryError';
  }
}

/**
 * Which step of tag reconciliation failed
 */
export type TagOperation = 'list' | 'add' | 'remove';

/**
 * Listing or mutating a monitor's tags failed
 */
export class TagApplyError extends SyncError {
  constructor(
    public readonly operation: TagOperation,
    public readonly monitorId: string,
    public readonly tag: string | undefined,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(
      tag
        ? `Failed to ${operation} tag '${tag}' on monitor ${monitorId}: ${reason}`
        : `Failed to ${operation} tags of monitor ${monitorId}: ${reason}`,
      'TagApplyError',
      options
    );
    this.name = 'TagApplyError';
  }
}

/**
 * Service configuration could not be used
 */
export class ConfigError extends SyncError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'ConfigError');
    this.name = 'ConfigError';
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
