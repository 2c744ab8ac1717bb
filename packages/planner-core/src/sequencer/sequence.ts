/**
 * Commit ordering
 *
 * Kahn's algorithm over the dependency edges. Among commits that are ready at
 * the same time, the lower TYPE_PRIORITY goes first, then the lower index.
 */

import { TYPE_PRIORITY, type CommitDescriptor, type DependencyEdge, type Plan, type PlanEntry } from '@commit-planner/contracts';
import { CyclicDependencyError, MalformedDescriptorError } from '../errors';
import { dedupeEdges } from '../graph/build-graph';
import { validateDescriptors } from '../grouping/descriptors';
import { PriorityQueue } from './priority-queue';

function assertEdgesInRange(edges: readonly DependencyEdge[], total: number): void {
  edges.forEach((edge, position) => {
    const outOfRange = [edge.producer, edge.dependent].filter(
      (index) => !Number.isInteger(index) || index < 0 || index >= total
    );
    if (outOfRange.length > 0) {
      throw new MalformedDescriptorError(
        undefined,
        outOfRange.map((index) => `edge ${position} references unknown commit ${index}`)
      );
    }
  });
}

/**
 * Order descriptors so every edge's producer comes before its dependent
 *
 * @throws MalformedDescriptorError when a descriptor is invalid or an edge names an unknown index
 * @throws CyclicDependencyError listing every index left unordered
 */
export function sequence(descriptors: readonly CommitDescriptor[], edges: readonly DependencyEdge[]): Plan {
  const validated = validateDescriptors(descriptors);
  const total = validated.length;
  assertEdgesInRange(edges, total);

  const unique = dedupeEdges(edges);
  const successors = Array.from({ length: total }, (): number[] => []);
  const predecessors = Array.from({ length: total }, (): number[] => []);
  const inDegree = new Array<number>(total).fill(0);

  for (const { producer, dependent } of unique) {
    successors[producer]?.push(dependent);
    predecessors[dependent]?.push(producer);
    inDegree[dependent] = (inDegree[dependent] ?? 0) + 1;
  }

  const priorityOf = (index: number): number => {
    const descriptor = validated[index];
    return descriptor ? TYPE_PRIORITY[descriptor.type] : Number.MAX_SAFE_INTEGER;
  };
  const ready = new PriorityQueue<number>((a, b) => priorityOf(a) - priorityOf(b) || a - b);
  for (let index = 0; index < total; index += 1) {
    if (inDegree[index] === 0) ready.push(index);
  }

  const positions = new Map<number, number>();
  for (let next = ready.pop(); next !== undefined; next = ready.pop()) {
    positions.set(next, positions.size + 1);
    for (const dependent of successors[next] ?? []) {
      const remaining = (inDegree[dependent] ?? 0) - 1;
      inDegree[dependent] = remaining;
      if (remaining === 0) ready.push(dependent);
    }
  }

  if (positions.size < total) {
    const unresolved: number[] = [];
    for (let index = 0; index < total; index += 1) {
      if (!positions.has(index)) unresolved.push(index);
    }
    throw new CyclicDependencyError(unresolved);
  }

  const entries: PlanEntry[] = [];
  for (const [index, position] of positions) {
    const predecessorPositions = (predecessors[index] ?? [])
      .map((producer) => positions.get(producer))
      .filter((value): value is number => value !== undefined);
    entries.push({
      index,
      position,
      earliestAfter: predecessorPositions.length > 0 ? Math.min(...predecessorPositions) : null,
    });
  }

  return { entries, edges: unique };
}

/**
 * Descriptors in execution order
 */
export function orderedDescriptors(plan: Plan, descriptors: readonly CommitDescriptor[]): CommitDescriptor[] {
  return plan.entries.flatMap((entry) => {
    const descriptor = descriptors[entry.index];
    return descriptor ? [descriptor] : [];
  });
}
