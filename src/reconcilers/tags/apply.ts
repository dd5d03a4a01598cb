/**
 * Version tag apply/reconcile operations
 *
 * Applies a version tag plan to a monitor through the session's tag API.
 * Supports dry-run mode for previewing changes.
 */

import type { MonitorId, Session } from '../../api/types.js';
import { TagApplyError, errorMessage } from '../../api/errors.js';
import { logger as defaultLogger, type ApiLogger } from '../../api/logger.js';
import type { AppliedTag, TagApplyOptions } from './types.js';
import { planVersionTag } from './diff.js';

/**
 * Make `{tagPrefix}-{version}` the only version-like tag on a monitor
 *
 * Every removal and the addition are independent calls. A failing call
 * stops the reconciliation; earlier calls are not rolled back and the next
 * run converges from wherever this one stopped.
 *
 * @throws TagApplyError naming the failed operation
 */
export async function reconcileVersionTag(
  session: Session,
  monitorId: MonitorId,
  tagPrefix: string,
  version: string,
  options: TagApplyOptions & { logger?: ApiLogger } = {}
): Promise<AppliedTag> {
  const { dryRun = false, tagColor } = options;
  const log = options.logger ?? defaultLogger;

  let currentTags: string[];
  try {
    currentTags = await session.tags.list(monitorId);
  } catch (err) {
    throw new TagApplyError('list', monitorId, undefined, errorMessage(err), { cause: err });
  }

  const plan = planVersionTag(currentTags, tagPrefix, version);

  const result: AppliedTag = {
    monitorId,
    tag: plan.target,
    added: [],
    removed: [],
    preserved: plan.preserved,
    mutations: 0,
    converged: plan.converged,
    dryRun,
  };

  if (plan.converged) {
    log.debug('Version tag already converged', { monitorId, tag: plan.target });
    return result;
  }

  if (dryRun) {
    return { ...result, added: plan.toAdd, removed: plan.toRemove };
  }

  for (const tag of plan.toRemove) {
    try {
      await session.tags.remove(monitorId, tag);
    } catch (err) {
      throw new TagApplyError('remove', monitorId, tag, errorMessage(err), { cause: err });
    }
    result.removed.push(tag);
    result.mutations++;
    log.debug('Removed tag', { monitorId, tag });
  }

  for (const tag of plan.toAdd) {
    try {
      await session.tags.add(monitorId, tag, { color: tagColor });
    } catch (err) {
      throw new TagApplyError('add', monitorId, tag, errorMessage(err), { cause: err });
    }
    result.added.push(tag);
    result.mutations++;
    log.debug('Added tag', { monitorId, tag });
  }

  return result;
}

/**
 * Format an applied tag as a short description of what changed
 */
export function formatAppliedTag(applied: AppliedTag): string {
  if (applied.converged) {
    return `${applied.tag} (unchanged)`;
  }
  const changes = [
    ...applied.removed.map((tag) => `-${tag}`),
    ...applied.added.map((tag) => `+${tag}`),
  ];
  const suffix = applied.dryRun ? ', dry run' : '';
  return `${applied.tag} (${changes.join(', ')}${suffix})`;
}
