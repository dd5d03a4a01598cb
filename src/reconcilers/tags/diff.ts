/**
 * Version tag diff algorithm
 *
 * Compares a monitor's current tags with the desired version tag and plans
 * removals and additions under a single prefix.
 */

import type { VersionTagPlan } from './types.js';
import { buildVersionTag, isVersionLike } from './types.js';

/**
 * Split tags into the prefix's version-like tags and everything else
 */
export function partitionTags(
  tags: string[],
  tagPrefix: string
): { versionLike: string[]; preserved: string[] } {
  const versionLike: string[] = [];
  const preserved: string[] = [];

  for (const tag of new Set(tags)) {
    if (isVersionLike(tag, tagPrefix)) {
      versionLike.push(tag);
    } else {
      preserved.push(tag);
    }
  }

  return { versionLike, preserved };
}

/**
 * Plan the changes that leave exactly `{tagPrefix}-{version}` among the
 * prefix's version-like tags
 *
 * Removals are listed before the addition so that applying them in order
 * never leaves two version-like tags on the monitor.
 */
export function planVersionTag(
  currentTags: string[],
  tagPrefix: string,
  version: string
): VersionTagPlan {
  const target = buildVersionTag(tagPrefix, version);
  const { versionLike, preserved } = partitionTags(currentTags, tagPrefix);

  const toRemove = versionLike.filter((tag) => tag !== target);
  const toAdd = versionLike.includes(target) ? [] : [target];

  return {
    target,
    versionLike,
    toRemove,
    toAdd,
    preserved,
    converged: toRemove.length === 0 && toAdd.length === 0,
  };
}
