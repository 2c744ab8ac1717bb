/**
 * Change set classifier module
 * @module @commit-planner/core/classifier
 */

export { classify, classifyFiles, assertValidThreshold, DEFAULT_THRESHOLD } from './classify';
export {
  TYPE_RULES,
  FALLBACK_TYPE,
  inferType,
  matchTypeRule,
  toEvidence,
  type TypeRule,
  type FileEvidence,
} from './type-rules';
export { extractScope, CONTAINER_DIRECTORIES, ROOT_SCOPE } from './scope';
export {
  CONCERN_DETECTORS,
  detectMixedConcerns,
  effectiveTypes,
  partitionScopes,
  type ConcernDetector,
} from './concerns';
