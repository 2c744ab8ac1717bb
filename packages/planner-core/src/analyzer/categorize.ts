/**
 * Content category inference for changed files
 */

import type { ContentCategory } from '@commit-planner/contracts';
import {
  isCiPath,
  isConfigPath,
  isDependencyManifest,
  isDocumentationPath,
  isSourcePath,
  isTestPath,
} from './path-markers';

/**
 * Categorize a file by its path
 *
 * Checked in order: documentation, test, ci, build, config, code.
 */
export function categorizePath(path: string): ContentCategory {
  if (isDocumentationPath(path)) return 'documentation';
  if (isTestPath(path)) return 'test';
  if (isCiPath(path)) return 'ci';
  if (isDependencyManifest(path)) return 'build';
  if (isConfigPath(path)) return 'config';
  if (isSourcePath(path)) return 'code';
  return 'unknown';
}
