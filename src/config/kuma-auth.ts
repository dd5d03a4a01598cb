/**
 * Uptime Kuma connection and auth resolution
 *
 * ## Auth Resolution Order
 *
 * 1. UPTIME_KUMA_API_TOKEN / --api-token: sent with `login` in place of the
 *    password, together with UPTIME_KUMA_USERNAME when set
 * 2. UPTIME_KUMA_USERNAME + UPTIME_KUMA_PASSWORD / --username + --password:
 *    exchanged for a session with `login`
 *
 * One of the two is required.
 *
 * ## Environment Variables
 *
 * - UPTIME_KUMA_URL: base URL (default: the in-cluster service address)
 * - UPTIME_KUMA_USERNAME, UPTIME_KUMA_PASSWORD, UPTIME_KUMA_API_TOKEN
 * - VERIFY_SSL: "true" to verify TLS certificates (default: false)
 * - UPTIME_KUMA_TIMEOUT_MS: connect/request timeout
 */

import type { Credentials, SessionConfig } from '../api/types.js';
import { ConfigError } from '../api/errors.js';
import { DEFAULT_TIMEOUT_MS } from '../api/client.js';

export const DEFAULT_KUMA_URL = 'http://uptime-kuma.uptime-kuma.svc.cluster.local:3001';

/**
 * Raw connection settings, as collected from flags and environment
 */
export interface KumaConnectionOptions {
  url?: string;
  username?: string;
  password?: string;
  apiToken?: string;
  verifyTls?: boolean;
  timeoutMs?: number;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse a boolean setting the way VERIFY_SSL has always been read:
 * only "true" (any case) is true
 */
export function parseBooleanSetting(value: string): boolean {
  return value.trim().toLowerCase() === 'true';
}

/**
 * Parse a positive integer number of milliseconds
 *
 * @throws ConfigError for anything else
 */
export function parseTimeoutMs(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid timeout: "${value}". Must be a positive integer (ms)`);
  }
  return parsed;
}

/**
 * Resolve credentials; a token takes precedence over a password
 *
 * @returns credentials, or null if none are configured
 */
export function resolveCredentials(options: KumaConnectionOptions): Credentials | null {
  const username = options.username?.trim() ?? '';

  const token = nonEmpty(options.apiToken);
  if (token) {
    return { mode: 'token', username, token };
  }

  const password = nonEmpty(options.password);
  if (password) {
    return { mode: 'password', username, password };
  }

  return null;
}

/**
 * Resolve the Uptime Kuma base URL
 *
 * @throws ConfigError if the URL is not http(s)
 */
export function resolveBaseUrl(url: string | undefined): string {
  const raw = nonEmpty(url) ?? DEFAULT_KUMA_URL;
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    throw new ConfigError(`Invalid Uptime Kuma URL: ${raw}`);
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigError(`Uptime Kuma URL must be http(s): ${raw}`);
  }
  return raw.replace(/\/+$/, '');
}

/**
 * Build the session configuration for a run
 *
 * @throws ConfigError if no credentials are configured or the URL is invalid
 */
export function resolveSessionConfig(options: KumaConnectionOptions): SessionConfig {
  const credentials = resolveCredentials(options);
  if (!credentials) {
    throw new ConfigError(
      'Missing Uptime Kuma credentials. Configure authentication using:\n' +
        '  1. UPTIME_KUMA_API_TOKEN (or --api-token), or\n' +
        '  2. UPTIME_KUMA_USERNAME and UPTIME_KUMA_PASSWORD (or --username/--password)'
    );
  }

  return {
    baseUrl: resolveBaseUrl(options.url),
    credentials,
    verifyTls: options.verifyTls ?? false,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };
}
