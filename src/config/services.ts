/**
 * Service list loading
 *
 * The service list comes from either:
 * - SERVICES_CONFIG: a JSON array in the environment (CronJob style), or
 * - a services file: YAML or JSON, a bare array or `{ services: [...] }`
 *
 * A document that is not a non-empty list is fatal. Individual entries
 * that fail validation are returned as invalid entries so the rest of the
 * list can still be reconciled.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { ServiceSpec } from '../types.js';
import { ConfigError, errorMessage } from '../api/errors.js';
import {
  DEFAULT_TAG_PREFIX,
  prefixesOverlap,
  validateTagPrefix,
} from '../reconcilers/tags/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A validated service
 */
export interface ValidServiceEntry {
  ok: true;
  index: number;
  spec: ServiceSpec;
}

/**
 * An entry that could not be used
 */
export interface InvalidServiceEntry {
  ok: false;
  index: number;
  /** monitorName when present, otherwise `services[index]` */
  label: string;
  issues: string[];
}

export type ServiceEntry = ValidServiceEntry | InvalidServiceEntry;

export interface LoadedServices {
  source: 'env' | 'file';
  /** File path when loaded from a file */
  path?: string;
  entries: ServiceEntry[];
}

export interface LoadServicesOptions {
  /** Raw JSON from SERVICES_CONFIG / --services */
  servicesJson?: string;
  /** Path from SERVICES_FILE / --services-file */
  servicesFile?: string;
  /** Base directory for relative file paths */
  basePath?: string;
}

// =============================================================================
// Validation
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate one raw entry of the service list
 */
export function parseServiceEntry(raw: unknown, index: number): ServiceEntry {
  const fallbackLabel = `services[${index}]`;

  if (!isRecord(raw)) {
    return { ok: false, index, label: fallbackLabel, issues: ['entry must be an object'] };
  }

  const issues: string[] = [];
  const { monitorName, versionEndpoint, tagPrefix } = raw;

  if (typeof monitorName !== 'string' || monitorName.length === 0) {
    issues.push('missing monitorName');
  }

  let endpoint: URL | undefined;
  if (typeof versionEndpoint !== 'string' || versionEndpoint.length === 0) {
    issues.push('missing versionEndpoint');
  } else {
    try {
      endpoint = new URL(versionEndpoint);
      if (endpoint.protocol !== 'http:' && endpoint.protocol !== 'https:') {
        issues.push(`versionEndpoint must be http(s): ${versionEndpoint}`);
      }
    } catch {
      issues.push(`versionEndpoint is not a valid URL: ${versionEndpoint}`);
    }
  }

  let prefix = DEFAULT_TAG_PREFIX;
  if (tagPrefix !== undefined && tagPrefix !== null) {
    if (typeof tagPrefix !== 'string') {
      issues.push('tagPrefix must be a string');
    } else {
      const prefixError = validateTagPrefix(tagPrefix);
      if (prefixError) {
        issues.push(prefixError);
      } else {
        prefix = tagPrefix;
      }
    }
  }

  const label = typeof monitorName === 'string' && monitorName.length > 0 ? monitorName : fallbackLabel;

  if (issues.length > 0 || endpoint === undefined || typeof monitorName !== 'string') {
    return { ok: false, index, label, issues };
  }

  return {
    ok: true,
    index,
    spec: { monitorName, versionEndpoint: endpoint, tagPrefix: prefix },
  };
}

/**
 * Validate a parsed services document
 *
 * A later entry whose prefix equals, extends or is extended by the prefix of
 * an earlier entry for the same monitor is invalid: both would claim the
 * same tags.
 *
 * @throws ConfigError when the document is not a non-empty list
 */
export function parseServicesDocument(document: unknown): ServiceEntry[] {
  const list = isRecord(document) ? document.services : document;

  if (!Array.isArray(list)) {
    throw new ConfigError('Services configuration must be a list of services');
  }
  if (list.length === 0) {
    throw new ConfigError('Services configuration must contain at least one service');
  }

  const accepted: ValidServiceEntry[] = [];
  return list.map((raw, index): ServiceEntry => {
    const entry = parseServiceEntry(raw, index);
    if (!entry.ok) return entry;

    const { monitorName, tagPrefix } = entry.spec;
    const earlier = accepted.find(
      (other) =>
        other.spec.monitorName === monitorName && prefixesOverlap(other.spec.tagPrefix, tagPrefix)
    );
    if (earlier) {
      const issue =
        earlier.spec.tagPrefix === tagPrefix
          ? `duplicates services[${earlier.index}] (same monitorName and tagPrefix)`
          : `tagPrefix '${tagPrefix}' overlaps '${earlier.spec.tagPrefix}' of services[${earlier.index}] on the same monitor`;
      return { ok: false, index, label: monitorName, issues: [issue] };
    }
    accepted.push(entry);
    return entry;
  });
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Load the service list from the environment JSON or a file
 *
 * When both are given the file wins.
 *
 * @throws ConfigError if nothing is configured or the document is unusable
 */
export async function loadServices(options: LoadServicesOptions): Promise<LoadedServices> {
  if (options.servicesFile) {
    const path = resolve(options.basePath ?? process.cwd(), options.servicesFile);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      throw new ConfigError(`Failed to read services file ${path}: ${errorMessage(err)}`);
    }

    let document: unknown;
    try {
      document = parseYaml(content);
    } catch (err) {
      throw new ConfigError(`Failed to parse services file ${path}: ${errorMessage(err)}`);
    }

    return { source: 'file', path, entries: parseServicesDocument(document) };
  }

  if (options.servicesJson && options.servicesJson.trim().length > 0) {
    let document: unknown;
    try {
      document = JSON.parse(options.servicesJson);
    } catch (err) {
      throw new ConfigError(`Failed to parse SERVICES_CONFIG JSON: ${errorMessage(err)}`);
    }

    return { source: 'env', entries: parseServicesDocument(document) };
  }

  throw new ConfigError('No services configured: set SERVICES_CONFIG or --services-file');
}

/**
 * Split loaded entries into usable specs and invalid entries
 */
export function partitionEntries(entries: ServiceEntry[]): {
  services: ServiceSpec[];
  invalid: InvalidServiceEntry[];
} {
  const services: ServiceSpec[] = [];
  const invalid: InvalidServiceEntry[] = [];
  for (const entry of entries) {
    if (entry.ok) {
      services.push(entry.spec);
    } else {
      invalid.push(entry);
    }
  }
  return { services, invalid };
}
