/**
 * Tests for heuristics.ts - grouping classified files into candidate commits
 */

import { describe, it, expect } from 'vitest';
import { classify } from '../../src/classifier/classify';
import { combineChangeSet, groupChangeSet } from '../../src/grouping/heuristics';
import { changedFile } from '../helpers';

const files = [
  changedFile('src/auth/login.ts', 10),
  changedFile('src/auth/login.test.ts', 5),
  changedFile('docs/auth.md', 3),
];
const classification = classify(files);

describe('groupChangeSet', () => {
  it('should group by type and scope by default', () => {
    expect(groupChangeSet(files, classification)).toEqual([
      { type: 'feat', scope: 'auth', files: ['src/auth/login.ts'], subject: 'add auth (1 file)' },
      { type: 'test', scope: 'auth', files: ['src/auth/login.test.ts'], subject: 'add auth tests' },
      { type: 'docs', scope: 'docs', files: ['docs/auth.md'], subject: 'add docs documentation' },
    ]);
  });

  it('should group by scope and type each group by its dominant non-test type', () => {
    expect(groupChangeSet(files, classification, 'scope')).toEqual([
      {
        type: 'feat',
        scope: 'auth',
        files: ['src/auth/login.ts', 'src/auth/login.test.ts'],
        subject: 'add auth (2 files)',
      },
      { type: 'docs', scope: 'docs', files: ['docs/auth.md'], subject: 'add docs documentation' },
    ]);
  });

  it('should group by type across scopes', () => {
    const mixed = [changedFile('src/auth/login.ts', 10), changedFile('src/billing/invoice.ts', 6)];
    expect(groupChangeSet(mixed, classify(mixed), 'type')).toEqual([
      {
        type: 'feat',
        scope: undefined,
        files: ['src/auth/login.ts', 'src/billing/invoice.ts'],
        subject: 'add 2 files',
      },
    ]);
  });

  it('should pick subjects from the kind of change', () => {
    const changes = [
      changedFile('src/billing/invoice.ts', 2, 5),
      changedFile('src/legacy/report.ts', 0, 7),
      changedFile('package.json', 2, 1),
      changedFile('.github/workflows/ci.yml', 4, 1),
    ];
    expect(groupChangeSet(changes, classify(changes)).map((d) => d.subject)).toEqual([
      'update billing (1 file)',
      'remove legacy (1 file)',
      'update dependencies',
      'update ci configuration',
    ]);
  });
});

describe('combineChangeSet', () => {
  it('should turn the whole change set into one commit', () => {
    expect(combineChangeSet(files, classification)).toEqual({
      type: 'feat',
      scope: undefined,
      files: ['src/auth/login.ts', 'src/auth/login.test.ts', 'docs/auth.md'],
      subject: 'add 3 files',
    });
  });
});
