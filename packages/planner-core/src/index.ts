/**
 * Commit planning core
 *
 * Classifies a change set, groups it into candidate commits, infers the
 * dependencies between them and orders them.
 *
 * @module @commit-planner/core
 */

// Types
export * from './types';

// Errors
export * from './errors';

// Analyzer
export {
  GitDiffProvider,
  findRepoRoot,
  categorizePath,
  prefetchContents,
  createContentLookup,
  type GitDiffProviderOptions,
} from './analyzer';

// Classifier
export { classify, DEFAULT_THRESHOLD, extractScope, inferType } from './classifier';

// Grouping
export { groupChangeSet, combineChangeSet, loadDescriptors, validateDescriptors } from './grouping';

// Graph
export { buildDependencyGraph, DEPENDENCY_RULES, type BuildGraphOptions } from './graph';

// Sequencer
export { sequence, orderedDescriptors } from './sequencer';

// Pipeline
export { planCommits, planChangeSet, type ChangeSetPlan, type ChangeSetPlanOptions } from './planner';

// Rendering
export { renderPlan, toJsonOutput, formatHeader } from './render';

// Storage
export {
  getCurrentPlanPath,
  savePlan,
  readPlan,
  loadPlan,
  hasPlan,
  clearPlan,
  type PlanReadResult,
} from './storage';
