/**
 * Shared types and interfaces for the version-sync CLI
 */

// ============================================================================
// Service Configuration
// ============================================================================

/**
 * One service whose version is mirrored onto a monitor
 */
export interface ServiceSpec {
  /** Exact display name of the monitor */
  readonly monitorName: string;
  /** Plain-text endpoint serving the version */
  readonly versionEndpoint: URL;
  /** Tag namespace; tags are `{tagPrefix}-{version}` */
  readonly tagPrefix: string;
}

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to every command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}
