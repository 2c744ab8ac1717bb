/**
 * Memoized file contents for the import-dependency rule
 */

import type { CommitDescriptor } from '@commit-planner/contracts';
import { INDEX_REVISION, type ContentLookup, type DiffProvider, type RevisionMarker } from '../types';

/**
 * Read every file staged by every descriptor once and expose the result as a
 * synchronous lookup.
 *
 * All descriptors stage from the same working tree, so a path read for one
 * descriptor serves every descriptor that stages it.
 */
export async function prefetchContents(
  provider: DiffProvider,
  descriptors: CommitDescriptor[],
  revision: RevisionMarker = INDEX_REVISION
): Promise<ContentLookup> {
  const paths = [...new Set(descriptors.flatMap((descriptor) => descriptor.files))];
  const contents = new Map<string, string | undefined>();

  const results = await Promise.all(paths.map((path) => provider.contentAt(path, revision)));
  paths.forEach((path, i) => contents.set(path, results[i]));

  return (path) => contents.get(path);
}

/**
 * Lookup over an in-memory path → content record
 */
export function createContentLookup(contents: Record<string, string>): ContentLookup {
  const map = new Map(Object.entries(contents));
  return (path) => map.get(path);
}
