/**
 * Dependency heuristics between candidate commits
 *
 * Each rule answers "must `dependent` be committed after `producer`?" for one
 * ordered pair. Rules are tried in order and the first match decides.
 */

import type { DependencyRule } from '../types';
import { referencesModule } from './module-references';

/**
 * Equal scopes; two unset scopes count as equal
 */
export function sameScope(a: string | undefined, b: string | undefined): boolean {
  return a === b;
}

export const testAfterImplementation: DependencyRule = {
  name: 'test-after-implementation',
  matches: ({ descriptor: producer }, { descriptor: dependent }) =>
    producer.type !== 'test' && dependent.type === 'test' && sameScope(producer.scope, dependent.scope),
};

export const docsAfterFeature: DependencyRule = {
  name: 'docs-after-feature',
  matches: ({ descriptor: producer }, { descriptor: dependent }) =>
    producer.type === 'feat' &&
    dependent.type === 'docs' &&
    producer.scope !== undefined &&
    producer.scope !== '' &&
    dependent.subject.includes(producer.scope),
};

export const fixAfterFeature: DependencyRule = {
  name: 'fix-after-feature',
  matches: ({ descriptor: producer }, { descriptor: dependent }) =>
    producer.type === 'feat' && dependent.type === 'fix' && sameScope(producer.scope, dependent.scope),
};

export const importDependency: DependencyRule = {
  name: 'import-dependency',
  matches: (producer, dependent, { contentAt }) => {
    for (const importerPath of dependent.descriptor.files) {
      const content = contentAt(importerPath, dependent.index);
      if (content === undefined) {
        continue;
      }
      for (const producerPath of producer.descriptor.files) {
        if (producerPath !== importerPath && referencesModule(content, importerPath, producerPath)) {
          return true;
        }
      }
    }
    return false;
  },
};

export const DEPENDENCY_RULES: readonly DependencyRule[] = [
  testAfterImplementation,
  docsAfterFeature,
  fixAfterFeature,
  importDependency,
];
