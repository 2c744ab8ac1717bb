/**
 * Tests for build-graph.ts - dependency edges between candidate commits
 */

import { describe, it, expect } from 'vitest';
import { createContentLookup } from '../../src/analyzer/content-snapshot';
import { buildDependencyGraph } from '../../src/graph/build-graph';
import { ContradictoryEdgeError, MalformedDescriptorError } from '../../src/errors';
import { descriptor } from '../helpers';

describe('buildDependencyGraph - rules', () => {
  it('should order tests and documentation after the feature they describe', () => {
    const descriptors = [
      descriptor('feat', ['src/auth/token.ts'], 'add token issuer', 'auth'),
      descriptor('test', ['src/auth/token.test.ts'], 'cover token issuer', 'auth'),
      descriptor('docs', ['docs/auth.md'], 'document auth flow'),
    ];

    expect(buildDependencyGraph(descriptors)).toEqual([
      { producer: 0, dependent: 1, rule: 'test-after-implementation' },
      { producer: 0, dependent: 2, rule: 'docs-after-feature' },
    ]);
  });

  it('should treat two unset scopes as equal', () => {
    const descriptors = [
      descriptor('refactor', ['lib.ts'], 'tidy helpers'),
      descriptor('test', ['lib.test.ts'], 'cover helpers'),
    ];
    expect(buildDependencyGraph(descriptors)).toEqual([
      { producer: 0, dependent: 1, rule: 'test-after-implementation' },
    ]);
  });

  it('should order fixes after the feature in the same scope', () => {
    const descriptors = [
      descriptor('fix', ['src/billing/tax.ts'], 'round tax', 'billing'),
      descriptor('feat', ['src/billing/invoice.ts'], 'add invoices', 'billing'),
    ];
    expect(buildDependencyGraph(descriptors)).toEqual([
      { producer: 1, dependent: 0, rule: 'fix-after-feature' },
    ]);
  });

  it('should derive edges from imports in staged content', () => {
    const descriptors = [
      descriptor('refactor', ['src/core/router.ts'], 'use registry', 'core'),
      descriptor('chore', ['src/core/registry.ts'], 'add registry', 'core'),
    ];
    const contentAt = createContentLookup({
      'src/core/router.ts': "import { registry } from './registry';\n",
      'src/core/registry.ts': 'export const registry = new Map();\n',
    });

    expect(buildDependencyGraph(descriptors, { contentAt })).toEqual([
      { producer: 1, dependent: 0, rule: 'import-dependency' },
    ]);
    expect(buildDependencyGraph(descriptors)).toEqual([]);
  });

  it('should ignore docs whose subject does not name the feature scope', () => {
    const descriptors = [
      descriptor('feat', ['src/auth/token.ts'], 'add token issuer', 'auth'),
      descriptor('docs', ['docs/billing.md'], 'document invoices'),
    ];
    expect(buildDependencyGraph(descriptors)).toEqual([]);
  });

  it('should use only the rules it is given', () => {
    const descriptors = [
      descriptor('feat', ['src/auth/token.ts'], 'add token issuer', 'auth'),
      descriptor('test', ['src/auth/token.test.ts'], 'cover token issuer', 'auth'),
    ];
    expect(buildDependencyGraph(descriptors, { rules: [] })).toEqual([]);
  });
});

describe('buildDependencyGraph - failures', () => {
  it('should reject a pair ordered both ways', () => {
    const descriptors = [
      descriptor('fix', ['src/auth/session.ts'], 'expire sessions', 'auth'),
      descriptor('feat', ['src/auth/token.ts'], 'add token issuer', 'auth'),
    ];
    const contentAt = createContentLookup({
      'src/auth/token.ts': "import { Session } from './session';\n",
    });

    expect(() => buildDependencyGraph(descriptors, { contentAt })).toThrow(ContradictoryEdgeError);
    try {
      buildDependencyGraph(descriptors, { contentAt });
    } catch (error) {
      expect(error).toMatchObject({
        indices: [0, 1],
        rules: ['import-dependency', 'fix-after-feature'],
      });
    }
  });

  it('should reject malformed descriptors', () => {
    const descriptors = [descriptor('feat', [], 'add nothing', 'auth')];
    expect(() => buildDependencyGraph(descriptors)).toThrow(MalformedDescriptorError);
  });
});
