/**
 * Commit message helpers shared by the renderers
 */

import type { CommitDescriptor, PlanEntry } from '@commit-planner/contracts';

/**
 * Conventional header: `type(scope): subject`
 */
export function formatHeader(descriptor: CommitDescriptor): string {
  const scope = descriptor.scope ? `(${descriptor.scope})` : '';
  return `${descriptor.type}${scope}: ${descriptor.subject}`;
}

/**
 * `type(scope)` label used in listings
 */
export function formatLabel(descriptor: CommitDescriptor): string {
  return descriptor.scope ? `${descriptor.type}(${descriptor.scope})` : descriptor.type;
}

export function formatCanExecute(entry: PlanEntry): string {
  return entry.earliestAfter === null ? 'now' : `after commit ${entry.earliestAfter}`;
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
