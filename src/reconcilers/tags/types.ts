/**
 * Types for version tag reconciliation
 *
 * A version tag is `{prefix}-{version}`. Any tag starting with `{prefix}-`
 * is version-like under that prefix and is owned by the reconciler; every
 * other tag on the monitor is left alone.
 */

import type { MonitorId } from '../../api/types.js';

export const DEFAULT_TAG_PREFIX = 'version';

/**
 * Prefix validation pattern: non-empty, no whitespace, no trailing dash
 */
export const TAG_PREFIX_PATTERN = /^\S*[^\s-]$/;

/**
 * Planned changes for one monitor under one prefix
 */
export interface VersionTagPlan {
  /** The tag that should be present */
  target: string;
  /** Version-like tags currently present under the prefix */
  versionLike: string[];
  /** Tags to remove, in removal order */
  toRemove: string[];
  /** Tags to add (empty or exactly the target) */
  toAdd: string[];
  /** Tags outside the prefix's namespace; never touched */
  preserved: string[];
  /** Whether the monitor already carries exactly the target */
  converged: boolean;
}

/**
 * Options for tag apply operations
 */
export interface TagApplyOptions {
  /** If true, only return what would change without applying */
  dryRun?: boolean;
  /** Color for tag definitions created in the monitoring system */
  tagColor?: string;
}

/**
 * Result of reconciling one monitor's version tag
 */
export interface AppliedTag {
  monitorId: MonitorId;
  /** The version tag now on the monitor */
  tag: string;
  /** Tags that were added */
  added: string[];
  /** Tags that were removed */
  removed: string[];
  /** Tags that were left untouched */
  preserved: string[];
  /** Number of mutating calls issued */
  mutations: number;
  /** Whether the monitor was already converged */
  converged: boolean;
  /** Whether this was a dry run (nothing applied) */
  dryRun: boolean;
}

/**
 * Build the canonical version tag
 */
export function buildVersionTag(tagPrefix: string, version: string): string {
  return `${tagPrefix}-${version}`;
}

/**
 * Check whether a tag is version-like under a prefix
 */
export function isVersionLike(tag: string, tagPrefix: string): boolean {
  return tag.startsWith(`${tagPrefix}-`);
}

/**
 * Check whether two prefixes claim overlapping tags on one monitor
 *
 * `version` and `version-beta` overlap: every `version-beta-*` tag is also
 * version-like under `version`.
 */
export function prefixesOverlap(a: string, b: string): boolean {
  return a === b || isVersionLike(a, b) || isVersionLike(b, a);
}

/**
 * Validate a tag prefix
 *
 * @returns an error message, or undefined when the prefix is usable
 */
export function validateTagPrefix(tagPrefix: string): string | undefined {
  if (!TAG_PREFIX_PATTERN.test(tagPrefix)) {
    return `Invalid tag prefix: "${tagPrefix}". Must be non-empty, without whitespace, and not end with "-"`;
  }
  return undefined;
}
