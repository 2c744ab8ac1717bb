/**
 * Dependency graph construction
 */

import type { CommitDescriptor, DependencyEdge } from '@commit-planner/contracts';
import type { ContentLookup, DependencyRule, IndexedDescriptor, RuleContext } from '../types';
import { ContradictoryEdgeError } from '../errors';
import { validateDescriptors } from '../grouping/descriptors';
import { DEPENDENCY_RULES } from './rules';

export interface BuildGraphOptions {
  /** File content as staged by a descriptor; without it no import edges are found */
  contentAt?: ContentLookup;
  /** Rules to apply, in precedence order */
  rules?: readonly DependencyRule[];
}

const noContent: ContentLookup = () => undefined;

export function edgeKey(producer: number, dependent: number): string {
  return `${producer}->${dependent}`;
}

/**
 * Infer "must precede" edges between descriptors
 *
 * For every ordered pair the first matching rule produces the edge. Edges come
 * back sorted by producer, then dependent.
 *
 * @throws MalformedDescriptorError when a descriptor fails validation
 * @throws ContradictoryEdgeError when a pair is ordered both ways
 */
export function buildDependencyGraph(
  descriptors: readonly CommitDescriptor[],
  options: BuildGraphOptions = {}
): DependencyEdge[] {
  const validated = validateDescriptors(descriptors);
  const rules = options.rules ?? DEPENDENCY_RULES;
  const context: RuleContext = { contentAt: options.contentAt ?? noContent };
  const nodes: IndexedDescriptor[] = validated.map((descriptor, index) => ({ index, descriptor }));

  const edges = new Map<string, DependencyEdge>();
  for (const producer of nodes) {
    for (const dependent of nodes) {
      if (producer.index === dependent.index) {
        continue;
      }
      const rule = rules.find((candidate) => candidate.matches(producer, dependent, context));
      if (rule) {
        edges.set(edgeKey(producer.index, dependent.index), {
          producer: producer.index,
          dependent: dependent.index,
          rule: rule.name,
        });
      }
    }
  }

  for (const edge of edges.values()) {
    if (edge.producer > edge.dependent) {
      continue;
    }
    const reverse = edges.get(edgeKey(edge.dependent, edge.producer));
    if (reverse) {
      throw new ContradictoryEdgeError([edge.producer, edge.dependent], [edge.rule, reverse.rule]);
    }
  }

  return [...edges.values()];
}

/**
 * Collapse duplicate edges, keeping the first occurrence, sorted by producer then dependent
 */
export function dedupeEdges(edges: readonly DependencyEdge[]): DependencyEdge[] {
  const unique = new Map<string, DependencyEdge>();
  for (const edge of edges) {
    const key = edgeKey(edge.producer, edge.dependent);
    if (!unique.has(key)) {
      unique.set(key, edge);
    }
  }
  return [...unique.values()].sort((a, b) => a.producer - b.producer || a.dependent - b.dependent);
}
