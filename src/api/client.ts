/**
 * Uptime Kuma API Client
 *
 * Implements the Session interface over Uptime Kuma's Socket.io events:
 * - login for authentication, with the password or the API token
 * - monitorList (pushed by the server after login) for listing monitors
 * - getMonitor for a monitor's current tags
 * - getTags / addTag / addMonitorTag / deleteMonitorTag for tag mutation
 *
 * Tags are addressed by name; the client maps names to Uptime Kuma's tag
 * ids on every call so that nothing is cached across mutations.
 */

import type {
  Credentials,
  MonitorId,
  MonitorSummary,
  MonitorsApi,
  MonitorTagsApi,
  Session,
  SessionConfig,
  SessionConnector,
} from './types.js';
import { AuthError, errorMessage } from './errors.js';
import { logger as defaultLogger, type ApiLogger } from './logger.js';
import { connectTransport, type KumaTransport, type TransportOptions } from './transport.js';

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_TAG_COLOR = '#3b82f6';

// =============================================================================
// Wire payloads
// =============================================================================

/**
 * Tag attached to a monitor, as embedded in monitor payloads
 */
export interface KumaMonitorTag {
  tagId: number;
  name: string;
  value: string;
}

/**
 * Tag definition as returned by getTags / addTag
 */
export interface KumaTag {
  id: number;
  name: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check an acknowledgement and return it, throwing the server's message
 * when `ok` is false
 */
function expectOk(response: unknown, action: string): Record<string, unknown> {
  if (!isRecord(response)) {
    throw new Error(`Unexpected response to ${action}`);
  }
  if (response.ok !== true) {
    const msg = typeof response.msg === 'string' && response.msg ? response.msg : 'request rejected';
    throw new Error(`${action} failed: ${msg}`);
  }
  return response;
}

function parseMonitorSummary(key: string, value: unknown): MonitorSummary | null {
  if (!isRecord(value) || typeof value.name !== 'string') return null;
  const id = typeof value.id === 'number' || typeof value.id === 'string' ? String(value.id) : key;
  return { id, name: value.name };
}

/**
 * Parse the `monitorList` event payload, an object keyed by monitor id
 */
export function parseMonitorList(payload: unknown): MonitorSummary[] {
  if (!isRecord(payload)) {
    throw new Error('Unexpected monitorList payload');
  }
  const monitors: MonitorSummary[] = [];
  for (const [key, value] of Object.entries(payload)) {
    const summary = parseMonitorSummary(key, value);
    if (summary) monitors.push(summary);
  }
  return monitors;
}

/**
 * Parse the tags embedded in a monitor payload
 */
export function parseMonitorTags(monitor: unknown): KumaMonitorTag[] {
  if (!isRecord(monitor) || !Array.isArray(monitor.tags)) {
    return [];
  }
  const tags: KumaMonitorTag[] = [];
  for (const entry of monitor.tags) {
    if (!isRecord(entry) || typeof entry.name !== 'string') continue;
    const tagId = Number(entry.tag_id);
    if (!Number.isFinite(tagId)) continue;
    tags.push({
      tagId,
      name: entry.name,
      value: typeof entry.value === 'string' ? entry.value : '',
    });
  }
  return tags;
}

function parseTag(value: unknown): KumaTag | null {
  if (!isRecord(value) || typeof value.name !== 'string') return null;
  const id = Number(value.id);
  return Number.isFinite(id) ? { id, name: value.name } : null;
}

/**
 * Uptime Kuma ids are integers; keep non-numeric ids as they are
 */
function toKumaId(monitorId: MonitorId): number | string {
  return /^\d+$/.test(monitorId) ? Number(monitorId) : monitorId;
}

// =============================================================================
// Session Implementation
// =============================================================================

/**
 * Authenticate an open transport
 *
 * An API token goes in the password field; the trailing `token` is the
 * two-factor code, which a non-interactive run never has.
 */
async function login(transport: KumaTransport, credentials: Credentials): Promise<void> {
  let response: unknown;
  try {
    response = await transport.request('login', {
      username: credentials.username,
      password: credentials.mode === 'token' ? credentials.token : credentials.password,
      token: '',
    });
  } catch (err) {
    throw new AuthError(`No response to authentication: ${errorMessage(err)}`, { cause: err });
  }

  if (!isRecord(response)) {
    throw new AuthError('Unexpected response to authentication');
  }
  if (response.tokenRequired === true) {
    throw new AuthError('Authentication failed: two-factor token required');
  }
  if (response.ok !== true) {
    const msg = typeof response.msg === 'string' && response.msg ? response.msg : 'rejected';
    throw new AuthError(`Authentication failed: ${msg}`);
  }
}

export interface KumaSessionOptions {
  baseUrl: string;
  verifyTls: boolean;
  credentials: Credentials;
  timeoutMs?: number;
  logger?: ApiLogger;
}

/**
 * Create an authenticated session on top of a connected transport
 *
 * The monitor listing subscription is registered before logging in, since
 * Uptime Kuma pushes `monitorList` as part of the login handshake.
 */
export async function createKumaSession(
  transport: KumaTransport,
  options: KumaSessionOptions
): Promise<Session> {
  const log = options.logger ?? defaultLogger;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let latestMonitorList: unknown;
  const waiters: Array<(payload: unknown) => void> = [];

  const unsubscribe = transport.subscribe('monitorList', (payload) => {
    latestMonitorList = payload;
    for (const wake of waiters.splice(0)) wake(payload);
  });

  try {
    await login(transport, options.credentials);
  } catch (err) {
    unsubscribe();
    transport.close();
    throw err;
  }
  log.info('Authenticated with Uptime Kuma', {
    baseUrl: options.baseUrl,
    authMode: options.credentials.mode,
  });

  function nextMonitorList(): Promise<unknown> {
    if (latestMonitorList !== undefined) {
      return Promise.resolve(latestMonitorList);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = waiters.indexOf(wake);
        if (index >= 0) waiters.splice(index, 1);
        reject(new Error(`Timed out after ${timeoutMs}ms waiting for monitor list`));
      }, timeoutMs);
      const wake = (payload: unknown): void => {
        clearTimeout(timer);
        resolve(payload);
      };
      waiters.push(wake);
    });
  }

  async function getMonitorTags(monitorId: MonitorId): Promise<KumaMonitorTag[]> {
    const response = expectOk(
      await transport.request('getMonitor', toKumaId(monitorId)),
      `getMonitor ${monitorId}`
    );
    return parseMonitorTags(response.monitor);
  }

  async function listTagDefinitions(): Promise<KumaTag[]> {
    const response = expectOk(await transport.request('getTags'), 'getTags');
    if (!Array.isArray(response.tags)) return [];
    return response.tags.map(parseTag).filter((tag): tag is KumaTag => tag !== null);
  }

  async function ensureTagDefinition(name: string, color: string): Promise<number> {
    const existing = (await listTagDefinitions()).find((tag) => tag.name === name);
    if (existing) {
      return existing.id;
    }

    const response = expectOk(await transport.request('addTag', { name, color }), `addTag ${name}`);
    const created = parseTag(response.tag);
    if (!created) {
      throw new Error(`addTag ${name} returned no tag`);
    }
    log.debug('Created tag definition', { name, tagId: created.id });
    return created.id;
  }

  const monitors: MonitorsApi = {
    async list(): Promise<MonitorSummary[]> {
      return parseMonitorList(await nextMonitorList());
    },
  };

  const tags: MonitorTagsApi = {
    async list(monitorId: MonitorId): Promise<string[]> {
      return (await getMonitorTags(monitorId)).map((tag) => tag.name);
    },

    async add(monitorId: MonitorId, name: string, addOptions: { color?: string } = {}): Promise<void> {
      const tagId = await ensureTagDefinition(name, addOptions.color ?? DEFAULT_TAG_COLOR);
      expectOk(
        await transport.request('addMonitorTag', tagId, toKumaId(monitorId), ''),
        `addMonitorTag ${name}`
      );
    },

    async remove(monitorId: MonitorId, name: string): Promise<void> {
      const attached = (await getMonitorTags(monitorId)).filter((tag) => tag.name === name);
      for (const tag of attached) {
        expectOk(
          await transport.request('deleteMonitorTag', tag.tagId, toKumaId(monitorId), tag.value),
          `deleteMonitorTag ${name}`
        );
      }
    },
  };

  return {
    baseUrl: options.baseUrl,
    verifyTls: options.verifyTls,
    authMode: options.credentials.mode,
    monitors,
    tags,
    async close(): Promise<void> {
      unsubscribe();
      transport.close();
    },
  };
}

// =============================================================================
// Connector
// =============================================================================

export interface KumaConnectorOptions {
  logger?: ApiLogger;
  /** Override the transport factory (tests use an in-process transport) */
  openTransport?: (baseUrl: string, options: TransportOptions) => Promise<KumaTransport>;
}

/**
 * Create a connector that opens Uptime Kuma sessions
 */
export function createKumaConnector(options: KumaConnectorOptions = {}): SessionConnector {
  const log = options.logger ?? defaultLogger;
  const openTransport = options.openTransport ?? connectTransport;

  return {
    async connect(config: SessionConfig): Promise<Session> {
      const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
      log.info(`Connecting to Uptime Kuma at ${config.baseUrl}`);

      let transport: KumaTransport;
      try {
        transport = await openTransport(config.baseUrl, {
          timeoutMs,
          verifyTls: config.verifyTls,
          logger: log,
        });
      } catch (err) {
        throw new AuthError(`Failed to connect to ${config.baseUrl}: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      return createKumaSession(transport, {
        baseUrl: config.baseUrl,
        verifyTls: config.verifyTls,
        credentials: config.credentials,
        timeoutMs,
        logger: log,
      });
    },
  };
}
