/**
 * Path predicates shared by file categorization and type inference
 */

import { posix } from 'node:path';

const DOCUMENTATION_EXTENSIONS = ['.md', '.txt', '.rst', '.adoc'];

const TEST_DIRECTORIES = new Set(['test', 'tests', 'spec', '__tests__']);

const CI_MARKERS = ['.github/', '.gitlab-ci', 'jenkins', '.circleci'];

const DEPENDENCY_MANIFESTS = new Set([
  'package.json',
  'pom.xml',
  'build.gradle',
  'Makefile',
  'CMakeLists.txt',
]);

const CONFIG_EXTENSIONS = ['.json', '.yml', '.yaml', '.toml', '.ini', '.cfg'];

const SOURCE_EXTENSIONS = [
  '.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs',
  '.py', '.go', '.rs', '.java', '.kt', '.rb', '.php', '.cs', '.swift',
  '.c', '.h', '.cpp', '.hpp', '.scala', '.sh', '.css', '.scss', '.vue', '.svelte',
];

export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\.\//, '');
}

export function isDocumentationPath(path: string): boolean {
  const lower = path.toLowerCase();
  return DOCUMENTATION_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Test directory anywhere in the path, or `.test.` / `.spec.` in the file name
 */
export function isTestPath(path: string): boolean {
  const segments = normalizePath(path).split('/');
  const name = segments[segments.length - 1] ?? '';
  if (name.includes('.test.') || name.includes('.spec.')) {
    return true;
  }
  return segments.slice(0, -1).some((segment) => TEST_DIRECTORIES.has(segment));
}

export function isCiPath(path: string): boolean {
  const lower = normalizePath(path).toLowerCase();
  return CI_MARKERS.some((marker) => lower.includes(marker));
}

export function isDependencyManifest(path: string): boolean {
  return DEPENDENCY_MANIFESTS.has(posix.basename(normalizePath(path)));
}

/**
 * Dotfiles, `*.config.*` files and structured config formats
 */
export function isConfigPath(path: string): boolean {
  const name = posix.basename(normalizePath(path));
  const lower = name.toLowerCase();
  if (name.startsWith('.') || lower.includes('.config.') || lower.startsWith('tsconfig')) {
    return true;
  }
  return CONFIG_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

export function isSourcePath(path: string): boolean {
  const lower = normalizePath(path).toLowerCase();
  return SOURCE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}
