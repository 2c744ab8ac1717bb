/**
 * Textual module references between source files
 *
 * A producer file is referenced when the importer's content names the module
 * path derived from the producer: its path without the source extension,
 * written the way the importer's language spells module paths.
 */

import { posix } from 'node:path';
import { normalizePath } from '../analyzer/path-markers';
import { CONTAINER_DIRECTORIES } from '../classifier/scope';

export type ModuleLanguage = 'javascript' | 'python' | 'other';

const JAVASCRIPT_EXTENSIONS = ['.ts', '.tsx', '.mts', '.cts', '.js', '.jsx', '.mjs', '.cjs'];
const PYTHON_EXTENSIONS = ['.py'];

// import x from '...', export { x } from '...', import '...'
const ES_FROM_PATTERN = /\b(?:import|export)\s[^'";]*?\bfrom\s*['"]([^'"]+)['"]/g;
const ES_SIDE_EFFECT_PATTERN = /\bimport\s*['"]([^'"]+)['"]/g;
// require('...'), import('...')
const CALL_PATTERN = /\b(?:require|import)\s*\(\s*['"]([^'"]+)['"]\s*\)/g;
// from a.b import c, import a.b
const PYTHON_PATTERN = /^\s*(?:from\s+([\w.]+)\s+import\b|import\s+([\w.]+))/gm;

export function languageOf(path: string): ModuleLanguage {
  const ext = posix.extname(path).toLowerCase();
  if (JAVASCRIPT_EXTENSIONS.includes(ext)) return 'javascript';
  if (PYTHON_EXTENSIONS.includes(ext)) return 'python';
  return 'other';
}

export function stripSourceExtension(path: string): string {
  const ext = posix.extname(path);
  const known = [...JAVASCRIPT_EXTENSIONS, ...PYTHON_EXTENSIONS];
  return known.includes(ext.toLowerCase()) ? path.slice(0, -ext.length) : path;
}

/**
 * Module paths that name a JavaScript/TypeScript file: `src/auth/login`,
 * plus the directory for `index` files
 */
export function javascriptModulePaths(producerPath: string): string[] {
  const modulePath = stripSourceExtension(normalizePath(producerPath));
  const paths = [modulePath];
  if (posix.basename(modulePath) === 'index') {
    paths.push(posix.dirname(modulePath));
  }
  return paths;
}

/**
 * Dotted module names for a Python file: `src.auth.login`, and
 * `auth.login` when the first directory is a container
 */
export function pythonModuleNames(producerPath: string): string[] {
  const segments = stripSourceExtension(normalizePath(producerPath)).split('/');
  const names = [segments.join('.')];
  const [first, ...rest] = segments;
  if (first !== undefined && CONTAINER_DIRECTORIES.has(first) && rest.length > 0) {
    names.push(rest.join('.'));
  }
  return names;
}

function collectMatches(pattern: RegExp, content: string): string[] {
  const found: string[] = [];
  for (const match of content.matchAll(pattern)) {
    const value = match[1] ?? match[2];
    if (value) {
      found.push(value);
    }
  }
  return found;
}

export function extractJavascriptSpecifiers(content: string): string[] {
  return [
    ...collectMatches(ES_FROM_PATTERN, content),
    ...collectMatches(ES_SIDE_EFFECT_PATTERN, content),
    ...collectMatches(CALL_PATTERN, content),
  ];
}

export function extractPythonModules(content: string): string[] {
  return collectMatches(PYTHON_PATTERN, content);
}

/**
 * Resolve an import specifier to a repository path without source extension.
 * Relative specifiers resolve against the importer's directory; bare ones are
 * taken as written.
 */
export function resolveSpecifier(importerPath: string, specifier: string): string {
  if (specifier.startsWith('.')) {
    const base = posix.dirname(normalizePath(importerPath));
    return stripSourceExtension(posix.normalize(posix.join(base, specifier)));
  }
  return stripSourceExtension(specifier);
}

/**
 * Does `content` (of `importerPath`) reference the module defined by `producerPath`?
 */
export function referencesModule(content: string, importerPath: string, producerPath: string): boolean {
  const importerLanguage = languageOf(importerPath);
  if (importerLanguage === 'other' || importerLanguage !== languageOf(producerPath)) {
    return false;
  }

  if (importerLanguage === 'python') {
    const names = pythonModuleNames(producerPath);
    return extractPythonModules(content).some((module) => names.includes(module));
  }

  const modulePaths = javascriptModulePaths(producerPath);
  return extractJavascriptSpecifiers(content).some((specifier) =>
    modulePaths.includes(resolveSpecifier(importerPath, specifier))
  );
}
