/**
 * Scope inference from file paths
 */

import { normalizePath } from '../analyzer/path-markers';

/** Directories that hold code rather than name an area of it */
export const CONTAINER_DIRECTORIES: ReadonlySet<string> = new Set([
  'src',
  'lib',
  'app',
  'packages',
  'tests',
  'test',
  '__tests__',
  'spec',
]);

export const ROOT_SCOPE = 'root';

/**
 * First meaningful path segment, with leading dots and extensions removed
 *
 * @example
 * extractScope('src/auth/login.ts')       // 'auth'
 * extractScope('packages/billing/index.ts') // 'billing'
 * extractScope('README.md')               // 'README'
 * extractScope('.github/workflows/ci.yml') // 'github'
 */
export function extractScope(path: string): string {
  for (const segment of normalizePath(path).split('/')) {
    if (segment === '' || segment === '.' || segment === '..' || CONTAINER_DIRECTORIES.has(segment)) {
      continue;
    }
    const scope = segment.replace(/^\.+/, '').split('.')[0];
    if (scope) {
      return scope;
    }
  }
  return ROOT_SCOPE;
}
