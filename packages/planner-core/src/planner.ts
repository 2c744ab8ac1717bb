/**
 * Planning pipeline: descriptors in, ordered plan out
 */

import type {
  ChangedFile,
  ClassificationResult,
  CommitDescriptor,
  GroupingStrategy,
  Plan,
} from '@commit-planner/contracts';
import { classify } from './classifier/classify';
import { buildDependencyGraph, type BuildGraphOptions } from './graph/build-graph';
import { combineChangeSet, groupChangeSet } from './grouping/heuristics';
import { sequence } from './sequencer/sequence';

/**
 * Build the dependency graph and sequence it
 */
export function planCommits(descriptors: readonly CommitDescriptor[], options: BuildGraphOptions = {}): Plan {
  const edges = buildDependencyGraph(descriptors, options);
  return sequence(descriptors, edges);
}

export interface ChangeSetPlanOptions extends BuildGraphOptions {
  threshold?: number;
  strategy?: GroupingStrategy;
}

export interface ChangeSetPlan {
  classification: ClassificationResult;
  descriptors: CommitDescriptor[];
  plan: Plan;
}

/**
 * Classify a change set, group it into candidate commits and plan them.
 * A change set that needs no split still yields a one-commit plan.
 */
export function planChangeSet(files: readonly ChangedFile[], options: ChangeSetPlanOptions = {}): ChangeSetPlan {
  const { threshold, strategy, ...graphOptions } = options;
  const classification = classify(files, threshold);
  const descriptors = classification.shouldSplit
    ? groupChangeSet(files, classification, strategy)
    : [combineChangeSet(files, classification)];
  return { classification, descriptors, plan: planCommits(descriptors, graphOptions) };
}
