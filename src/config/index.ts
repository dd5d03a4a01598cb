/**
 * Configuration module exports
 */

export {
  resolveSessionConfig,
  resolveCredentials,
  resolveBaseUrl,
  parseBooleanSetting,
  parseTimeoutMs,
  DEFAULT_KUMA_URL,
  type KumaConnectionOptions,
} from './kuma-auth.js';

export {
  loadServices,
  parseServicesDocument,
  parseServiceEntry,
  partitionEntries,
  type ServiceEntry,
  type ValidServiceEntry,
  type InvalidServiceEntry,
  type LoadedServices,
  type LoadServicesOptions,
} from './services.js';
