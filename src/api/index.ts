/**
 * Monitoring system client module
 *
 * Provides:
 * - Uptime Kuma session over Socket.io
 * - JSON logging with secret redaction
 * - The reconciler's error taxonomy
 */

export {
  createKumaConnector,
  createKumaSession,
  parseMonitorList,
  parseMonitorTags,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_TAG_COLOR,
} from './client.js';

export type {
  KumaConnectorOptions,
  KumaSessionOptions,
  KumaMonitorTag,
  KumaTag,
} from './client.js';

export { connectTransport, socketTransport } from './transport.js';
export type { KumaTransport, TransportOptions } from './transport.js';

export {
  logger,
  createLogger,
  parseLogLevel,
  ApiLogger,
  redactString,
  redactPatterns,
  redactValue,
  redactContext,
} from './logger.js';

export type { LogLevel, LogEntry, LoggerConfig } from './logger.js';

export {
  SyncError,
  AuthError,
  FetchError,
  MonitorNotFoundError,
  DirectoryError,
  TagApplyError,
  ConfigError,
  errorMessage,
} from './errors.js';

export type { SyncErrorKind, TagOperation } from './errors.js';

export type {
  Credentials,
  AuthMode,
  SessionConfig,
  MonitorId,
  MonitorSummary,
  MonitorsApi,
  MonitorTagsApi,
  Session,
  SessionConnector,
} from './types.js';
