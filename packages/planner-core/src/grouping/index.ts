/**
 * Commit grouping module
 * @module @commit-planner/core/grouping
 */

export { groupChangeSet, combineChangeSet } from './heuristics';
export { loadDescriptors, validateDescriptors } from './descriptors';
