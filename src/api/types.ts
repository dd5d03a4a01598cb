/**
 * Type definitions for the monitoring system client
 *
 * The reconciler depends on five operations only: authenticate, list
 * monitors, list a monitor's tags, add a tag, remove a tag. `Session` is
 * the authenticated handle that exposes the last four.
 */

// =============================================================================
// Credentials & Connection
// =============================================================================

/**
 * How the run authenticates against the monitoring system
 */
export type Credentials =
  | { mode: 'password'; username: string; password: string }
  | { mode: 'token'; username: string; token: string };

export type AuthMode = Credentials['mode'];

/**
 * Everything needed to open a session
 */
export interface SessionConfig {
  /** Monitoring system base URL */
  baseUrl: string;
  /** Credentials for the run */
  credentials: Credentials;
  /** Verify TLS certificates of the monitoring system */
  verifyTls: boolean;
  /** Timeout for connect and for each request (ms) */
  timeoutMs?: number;
}

// =============================================================================
// Entities
// =============================================================================

/**
 * Opaque monitor identifier (integers are normalized to strings)
 */
export type MonitorId = string;

/**
 * A monitor as returned by the listing
 */
export interface MonitorSummary {
  id: MonitorId;
  name: string;
}

// =============================================================================
// Session
// =============================================================================

/**
 * Monitor listing operations
 */
export interface MonitorsApi {
  /** All monitors visible to the principal, in listing order */
  list(): Promise<MonitorSummary[]>;
}

/**
 * Monitor tag operations
 */
export interface MonitorTagsApi {
  /** Tag names currently attached to the monitor */
  list(monitorId: MonitorId): Promise<string[]>;
  /**
   * Attach a tag to the monitor, creating the tag definition first when it
   * does not exist yet
   */
  add(monitorId: MonitorId, name: string, options?: { color?: string }): Promise<void>;
  /** Detach every attachment of the tag from the monitor */
  remove(monitorId: MonitorId, name: string): Promise<void>;
}

/**
 * An authenticated session, established once per run
 */
export interface Session {
  readonly baseUrl: string;
  readonly verifyTls: boolean;
  readonly authMode: AuthMode;
  readonly monitors: MonitorsApi;
  readonly tags: MonitorTagsApi;
  /** Release the underlying connection */
  close(): Promise<void>;
}

/**
 * Opens sessions; the only way the reconciler reaches the monitoring system
 */
export interface SessionConnector {
  connect(config: SessionConfig): Promise<Session>;
}
