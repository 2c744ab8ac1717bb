import { z } from 'zod';

// ============================================================================
// Core Types
// ============================================================================

/**
 * Conventional commit types
 */
export const ConventionalTypeSchema = z.enum([
  'feat',
  'fix',
  'refactor',
  'perf',
  'test',
  'docs',
  'style',
  'chore',
  'ci',
  'build',
]);

export type ConventionalType = z.infer<typeof ConventionalTypeSchema>;

/**
 * Sequencing priority per type (lower runs first)
 */
export const TYPE_PRIORITY = {
  feat: 1,
  fix: 2,
  refactor: 3,
  perf: 4,
  test: 5,
  docs: 6,
  style: 7,
  chore: 8,
  ci: 9,
  build: 10,
} as const satisfies Record<ConventionalType, number>;

/**
 * Coarse content category of a changed file, derived from its path.
 * The type rules read it for the path-based types.
 */
export type ContentCategory = 'documentation' | 'test' | 'build' | 'ci' | 'config' | 'code' | 'unknown';

// ============================================================================
// Change Set
// ============================================================================

/**
 * One file touched by the pending change, as reported by a diff provider
 */
export interface ChangedFile {
  path: string;
  additions: number;
  deletions: number;
  category: ContentCategory;
  /** Unified diff text, when the provider has one */
  diff?: string;
}

/**
 * File with the type and scope the classifier inferred for it
 */
export const ClassifiedFileSchema = z.object({
  path: z.string(),
  type: ConventionalTypeSchema,
  scope: z.string(),
});

export type ClassifiedFile = z.infer<typeof ClassifiedFileSchema>;

export const ClassificationMetricsSchema = z.object({
  fileCount: z.number().int().min(0),
  threshold: z.number().int().positive(),
  typesDetected: z.array(ConventionalTypeSchema),
  typeCounts: z.record(z.string(), z.number().int().min(0)),
  scopesDetected: z.array(z.string()),
  scopeCounts: z.record(z.string(), z.number().int().min(0)),
  concerns: z.array(z.string()),
});

export type ClassificationMetrics = z.infer<typeof ClassificationMetricsSchema>;

export const ClassificationResultSchema = z.object({
  shouldSplit: z.boolean(),
  reasons: z.array(z.string()),
  files: z.array(ClassifiedFileSchema),
  metrics: ClassificationMetricsSchema,
});

export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

// ============================================================================
// Commit Plan
// ============================================================================

/**
 * A candidate commit, referenced by its position in the descriptor list
 */
export const CommitDescriptorSchema = z.object({
  type: ConventionalTypeSchema,
  scope: z.string().min(1).optional(),
  files: z.array(z.string().min(1)).min(1),
  subject: z.string().min(1),
  body: z.string().optional(),
});

export type CommitDescriptor = z.infer<typeof CommitDescriptorSchema>;

/**
 * Suggestions file accepted by `plan --input`
 */
export const DescriptorInputSchema = z.union([
  z.array(z.unknown()),
  z.object({ suggestions: z.array(z.unknown()) }),
]);

export const DependencyRuleNameSchema = z.enum([
  'test-after-implementation',
  'docs-after-feature',
  'fix-after-feature',
  'import-dependency',
  'manual',
]);

export type DependencyRuleName = z.infer<typeof DependencyRuleNameSchema>;

/**
 * `dependent` must be committed strictly after `producer`
 */
export const DependencyEdgeSchema = z.object({
  producer: z.number().int().min(0),
  dependent: z.number().int().min(0),
  rule: DependencyRuleNameSchema,
});

export type DependencyEdge = z.infer<typeof DependencyEdgeSchema>;

export const PlanEntrySchema = z.object({
  /** Original descriptor index */
  index: z.number().int().min(0),
  /** 1-based execution position */
  position: z.number().int().positive(),
  /** Position of the lowest-positioned direct predecessor, null when executable immediately */
  earliestAfter: z.number().int().positive().nullable(),
});

export type PlanEntry = z.infer<typeof PlanEntrySchema>;

export const PlanSchema = z.object({
  entries: z.array(PlanEntrySchema),
  edges: z.array(DependencyEdgeSchema),
});

export type Plan = z.infer<typeof PlanSchema>;

/**
 * Plan as written to storage
 */
export const StoredPlanSchema = z.object({
  schemaVersion: z.literal('1.0'),
  createdAt: z.string().datetime(),
  repoRoot: z.string(),
  descriptors: z.array(CommitDescriptorSchema),
  plan: PlanSchema,
  classification: ClassificationResultSchema.optional(),
});

export type StoredPlan = z.infer<typeof StoredPlanSchema>;

// ============================================================================
// Output Formats
// ============================================================================

export const GroupingStrategySchema = z.enum(['type', 'scope', 'type-scope']);

export type GroupingStrategy = z.infer<typeof GroupingStrategySchema>;

export const PlanFormatSchema = z.enum(['plan', 'script', 'json']);

export type PlanFormat = z.infer<typeof PlanFormatSchema>;

/**
 * JSON rendering of a plan
 */
export const PlanJsonOutputSchema = z.object({
  sequence: z.array(
    CommitDescriptorSchema.extend({
      order: z.number().int().positive(),
      originalIndex: z.number().int().min(0),
      canExecute: z.string(),
    })
  ),
  summary: z.object({
    totalCommits: z.number().int().min(0),
    totalFiles: z.number().int().min(0),
  }),
});

export type PlanJsonOutput = z.infer<typeof PlanJsonOutputSchema>;
