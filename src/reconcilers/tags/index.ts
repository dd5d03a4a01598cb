/**
 * Version tag reconciler exports
 *
 * Keeps exactly one `{prefix}-{version}` tag per prefix on a monitor.
 */

export type {
  VersionTagPlan,
  TagApplyOptions,
  AppliedTag,
} from './types.js';

export {
  DEFAULT_TAG_PREFIX,
  TAG_PREFIX_PATTERN,
  buildVersionTag,
  isVersionLike,
  prefixesOverlap,
  validateTagPrefix,
} from './types.js';

export { partitionTags, planVersionTag } from './diff.js';

export { reconcileVersionTag, formatAppliedTag } from './apply.js';
