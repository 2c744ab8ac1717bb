/**
 * Unified diff helpers
 */

/**
 * Content of added lines, without the leading `+` and without `+++` headers
 */
export function extractAddedLines(diff: string): string[] {
  return diff
    .split('\n')
    .filter((line) => line.startsWith('+') && !line.startsWith('+++'))
    .map((line) => line.slice(1));
}

/**
 * Content of removed lines, without the leading `-` and without `---` headers
 */
export function extractRemovedLines(diff: string): string[] {
  return diff
    .split('\n')
    .filter((line) => line.startsWith('-') && !line.startsWith('---'))
    .map((line) => line.slice(1));
}

/**
 * Count added and removed lines in a unified diff
 */
export function countDiffLines(diff: string): { additions: number; deletions: number } {
  return {
    additions: extractAddedLines(diff).length,
    deletions: extractRemovedLines(diff).length,
  };
}
