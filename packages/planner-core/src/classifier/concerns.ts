/**
 * Mixed-concern detection over classified files
 */

import type { ClassifiedFile, ConventionalType } from '@commit-planner/contracts';

export interface ConcernDetector {
  name: string;
  /** Human-readable explanation reported when the detector fires */
  message: string;
  detect(files: readonly ClassifiedFile[]): boolean;
}

function hasType(files: readonly ClassifiedFile[], type: ConventionalType): boolean {
  return files.some((file) => file.type === type);
}

/**
 * Scopes touched by test files and by everything else
 */
export function partitionScopes(files: readonly ClassifiedFile[]): {
  testScopes: Set<string>;
  implementationScopes: Set<string>;
} {
  const testScopes = new Set<string>();
  const implementationScopes = new Set<string>();
  for (const file of files) {
    (file.type === 'test' ? testScopes : implementationScopes).add(file.scope);
  }
  return { testScopes, implementationScopes };
}

function sameSet<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  return a.size === b.size && [...a].every((item) => b.has(item));
}

export const featureWithRefactor: ConcernDetector = {
  name: 'feature-with-refactor',
  message: 'Feature implementation mixed with refactoring',
  detect: (files) => hasType(files, 'feat') && hasType(files, 'refactor'),
};

export const featureWithStyle: ConcernDetector = {
  name: 'feature-with-style',
  message: 'Feature implementation mixed with style changes',
  detect: (files) => hasType(files, 'feat') && hasType(files, 'style'),
};

export const testScopeMismatch: ConcernDetector = {
  name: 'test-scope-mismatch',
  message: 'Tests touch different scopes than the implementation',
  detect: (files) => {
    const { testScopes, implementationScopes } = partitionScopes(files);
    if (testScopes.size === 0 || implementationScopes.size === 0) {
      return false;
    }
    return !sameSet(testScopes, implementationScopes);
  },
};

export const CONCERN_DETECTORS: readonly ConcernDetector[] = [
  featureWithRefactor,
  featureWithStyle,
  testScopeMismatch,
];

export function detectMixedConcerns(
  files: readonly ClassifiedFile[],
  detectors: readonly ConcernDetector[] = CONCERN_DETECTORS
): string[] {
  return detectors.filter((detector) => detector.detect(files)).map((detector) => detector.message);
}

/**
 * Distinct types that count toward the "multiple types" trigger.
 *
 * A test file whose scope is also touched by implementation files accompanies
 * that implementation, so it does not add `test` as a type of its own.
 */
export function effectiveTypes(files: readonly ClassifiedFile[]): ConventionalType[] {
  const { implementationScopes } = partitionScopes(files);
  const types: ConventionalType[] = [];
  for (const file of files) {
    if (file.type === 'test' && implementationScopes.has(file.scope)) {
      continue;
    }
    if (!types.includes(file.type)) {
      types.push(file.type);
    }
  }
  return types;
}
