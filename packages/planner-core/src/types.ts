/**
 * Core types for the commit planner
 *
 * Note: zod schemas and inferred record types live in @commit-planner/contracts.
 * This file holds the collaborator contracts used inside planner-core.
 */

import type { ChangedFile, CommitDescriptor, DependencyRuleName } from '@commit-planner/contracts';

export type {
  ConventionalType,
  ContentCategory,
  ChangedFile,
  ClassifiedFile,
  ClassificationResult,
  ClassificationMetrics,
  CommitDescriptor,
  DependencyEdge,
  DependencyRuleName,
  Plan,
  PlanEntry,
  StoredPlan,
  GroupingStrategy,
  PlanFormat,
} from '@commit-planner/contracts';

/**
 * Revision marker understood by the diff provider.
 * `':'` is the index (staged state), anything else is a git revision.
 */
export type RevisionMarker = string;

export const INDEX_REVISION: RevisionMarker = ':';

/**
 * Source of changed files and file contents
 */
export interface DiffProvider {
  changedFiles(): Promise<ChangedFile[]>;
  /** Content of `path` at `revision`, undefined when the file does not exist there */
  contentAt(path: string, revision?: RevisionMarker): Promise<string | undefined>;
}

/**
 * Content of a file as staged by the descriptor at `descriptorIndex`.
 * Must be total and pure; undefined means "no content".
 */
export type ContentLookup = (path: string, descriptorIndex: number) => string | undefined;

/**
 * Context handed to dependency rules
 */
export interface RuleContext {
  contentAt: ContentLookup;
}

/**
 * A named heuristic deciding whether `dependent` must follow `producer`
 */
export interface DependencyRule {
  name: DependencyRuleName;
  matches(
    producer: IndexedDescriptor,
    dependent: IndexedDescriptor,
    context: RuleContext
  ): boolean;
}

export interface IndexedDescriptor {
  index: number;
  descriptor: CommitDescriptor;
}
