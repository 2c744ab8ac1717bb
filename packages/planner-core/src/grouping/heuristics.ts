/**
 * Candidate commit grouping (turns a classified change set into descriptors)
 */

import {
  TYPE_PRIORITY,
  type ChangedFile,
  type ClassificationResult,
  type ClassifiedFile,
  type CommitDescriptor,
  type ConventionalType,
  type GroupingStrategy,
} from '@commit-planner/contracts';
import { ROOT_SCOPE } from '../classifier/scope';

interface FileGroup {
  key: string;
  files: ClassifiedFile[];
}

/**
 * Group classified files into candidate commits
 *
 * Strategies:
 * - `type`: one commit per type
 * - `scope`: one commit per scope, typed by its dominant type
 * - `type-scope`: one commit per type and scope pair
 *
 * Groups are emitted in first-appearance order, files in input order.
 */
export function groupChangeSet(
  files: readonly ChangedFile[],
  classification: ClassificationResult,
  strategy: GroupingStrategy = 'type-scope'
): CommitDescriptor[] {
  const stats = new Map(files.map((file) => [file.path, file]));
  const groups = new Map<string, FileGroup>();

  for (const file of classification.files) {
    const key = groupKey(file, strategy);
    const group = groups.get(key) ?? { key, files: [] };
    group.files.push(file);
    groups.set(key, group);
  }

  return [...groups.values()].map((group) => toDescriptor(group.files, stats));
}

/**
 * The whole change set as one commit, for change sets that need no split
 */
export function combineChangeSet(
  files: readonly ChangedFile[],
  classification: ClassificationResult
): CommitDescriptor {
  return toDescriptor(classification.files, new Map(files.map((file) => [file.path, file])));
}

function toDescriptor(
  files: readonly ClassifiedFile[],
  stats: ReadonlyMap<string, ChangedFile>
): CommitDescriptor {
  const type = dominantType(files);
  const scope = commonScope(files);
  const changes = files.map((f) => stats.get(f.path)).filter((f): f is ChangedFile => f !== undefined);

  return {
    type,
    scope,
    files: files.map((f) => f.path),
    subject: generateSubject(type, scope, changes),
  };
}

function groupKey(file: ClassifiedFile, strategy: GroupingStrategy): string {
  switch (strategy) {
    case 'type':
      return file.type;
    case 'scope':
      return file.scope;
    case 'type-scope':
      return `${file.type}:${file.scope}`;
  }
}

/**
 * Most frequent type, ignoring tests when anything else is present.
 * Ties go to the higher-priority type.
 */
function dominantType(files: readonly ClassifiedFile[]): ConventionalType {
  const nonTest = files.filter((f) => f.type !== 'test');
  const candidates = nonTest.length > 0 ? nonTest : files;

  const counts = new Map<ConventionalType, number>();
  for (const file of candidates) {
    counts.set(file.type, (counts.get(file.type) ?? 0) + 1);
  }

  let best: ConventionalType = 'chore';
  let bestCount = 0;
  for (const [type, count] of counts) {
    if (count > bestCount || (count === bestCount && TYPE_PRIORITY[type] < TYPE_PRIORITY[best])) {
      best = type;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Shared scope of all files, undefined when they differ or sit at the root
 */
function commonScope(files: readonly ClassifiedFile[]): string | undefined {
  const first = files[0]?.scope;
  if (!first || first === ROOT_SCOPE) return undefined;
  return files.every((f) => f.scope === first) ? first : undefined;
}

/**
 * Placeholder subject; the message writer replaces it
 */
function generateSubject(
  type: ConventionalType,
  scope: string | undefined,
  files: readonly ChangedFile[]
): string {
  const count = files.length;
  const plural = count === 1 ? '' : 's';
  const target = scope ? `${scope} ` : '';

  const allAdded = count > 0 && files.every((f) => f.deletions === 0 && f.additions > 0);
  const allDeleted = count > 0 && files.every((f) => f.additions === 0 && f.deletions > 0);

  if (type === 'test') {
    return allAdded ? `add ${target}tests` : `update ${target}tests`;
  }

  if (type === 'docs') {
    return allAdded ? `add ${target}documentation` : `update ${target}documentation`;
  }

  if (type === 'ci') {
    return 'update ci configuration';
  }

  if (type === 'build') {
    if (files.some((f) => f.path.endsWith('package.json'))) {
      return 'update dependencies';
    }
    return 'update build configuration';
  }

  if (type === 'style') {
    return `format ${target}code`;
  }

  const verb = allAdded ? 'add' : allDeleted ? 'remove' : 'update';
  return scope ? `${verb} ${scope} (${count} file${plural})` : `${verb} ${count} file${plural}`;
}
