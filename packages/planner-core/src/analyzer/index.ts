/**
 * Change set analyzer module
 * @module @commit-planner/core/analyzer
 */

export {
  GitDiffProvider,
  findRepoRoot,
  filterPaths,
  getAllChangedFiles,
  toWorkingTreeStatus,
  type GitDiffProviderOptions,
  type WorkingTreeStatus,
} from './git-diff-provider';

export { categorizePath } from './categorize';

export { extractAddedLines, extractRemovedLines, countDiffLines } from './diff-lines';

export {
  normalizePath,
  isDocumentationPath,
  isTestPath,
  isCiPath,
  isDependencyManifest,
  isConfigPath,
  isSourcePath,
} from './path-markers';

export { prefetchContents, createContentLookup } from './content-snapshot';
