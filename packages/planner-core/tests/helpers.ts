/**
 * Shared builders for core tests
 */

import type { ChangedFile, CommitDescriptor } from '@commit-planner/contracts';
import { categorizePath } from '../src/analyzer/categorize';

export function changedFile(path: string, additions: number, deletions = 0, diff?: string): ChangedFile {
  return { path, additions, deletions, category: categorizePath(path), diff };
}

export function descriptor(
  type: CommitDescriptor['type'],
  files: string[],
  subject: string,
  scope?: string
): CommitDescriptor {
  return { type, scope, files, subject };
}
