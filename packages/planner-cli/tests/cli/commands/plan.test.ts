/**
 * Tests for the plan, show and reset commands
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { PlanJsonOutputSchema } from '@commit-planner/contracts';
import { getCurrentPlanPath, loadPlan } from '@commit-planner/core';
import { runPlan } from '../../../src/cli/commands/plan';
import { runReset } from '../../../src/cli/commands/reset';
import { runShow } from '../../../src/cli/commands/show';
import { changedFile, createHarness } from '../../helpers';

const workingTree = [
  changedFile('src/auth/token.ts', 10),
  changedFile('src/auth/token.test.ts', 6),
  changedFile('docs/auth.md', 3),
];

describe('plan command', () => {
  let repoRoot: string;

  beforeEach(async () => {
    repoRoot = await mkdtemp(join(tmpdir(), 'commit-planner-plan-'));
  });

  afterEach(async () => {
    await rm(repoRoot, { recursive: true, force: true });
  });

  it('should group, order and render the working tree as JSON', async () => {
    const { context, output } = createHarness(repoRoot, workingTree);

    expect(await runPlan(context, { format: 'json' })).toBe(0);
    expect(output).toHaveLength(1);

    const { sequence, summary } = PlanJsonOutputSchema.parse(JSON.parse(output[0] ?? ''));
    expect(sequence.map((item) => [item.order, item.originalIndex, item.type, item.canExecute])).toEqual([
      [1, 0, 'feat', 'now'],
      [2, 1, 'test', 'after commit 1'],
      [3, 2, 'docs', 'now'],
    ]);
    expect(summary).toEqual({ totalCommits: 3, totalFiles: 3 });
  });

  it('should print the split decision before a narrative plan', async () => {
    const { context, output } = createHarness(repoRoot, workingTree);

    expect(await runPlan(context, {})).toBe(0);
    expect(output[0]).toBe(
      'Split recommended: Multiple types detected: feat, docs; Multiple scopes detected: auth, docs; ' +
        'Mixed concerns: Tests touch different scopes than the implementation'
    );
    expect(output[1]?.split('\n')).toContain('COMMIT 2: test(auth)');
  });

  it('should plan an atomic change set as one commit', async () => {
    const { context, output } = createHarness(repoRoot, [
      changedFile('src/auth/login.ts', 12),
      changedFile('src/auth/login.test.ts', 20),
    ]);

    expect(await runPlan(context, { json: true })).toBe(0);
    const { sequence } = PlanJsonOutputSchema.parse(JSON.parse(output[0] ?? ''));
    expect(sequence).toEqual([
      {
        type: 'feat',
        scope: 'auth',
        files: ['src/auth/login.ts', 'src/auth/login.test.ts'],
        subject: 'add auth (2 files)',
        order: 1,
        originalIndex: 0,
        canExecute: 'now',
      },
    ]);
  });

  it('should plan descriptors from an input file', async () => {
    await writeFile(
      join(repoRoot, 'suggestions.json'),
      JSON.stringify({
        suggestions: [
          { type: 'docs', files: ['docs/auth.md'], subject: 'document auth flow' },
          { type: 'test', scope: 'auth', files: ['src/auth/token.test.ts'], subject: 'cover tokens' },
          { type: 'feat', scope: 'auth', files: ['src/auth/token.ts'], subject: 'add token issuer' },
        ],
      })
    );
    const { context, output } = createHarness(repoRoot, []);

    expect(await runPlan(context, { input: 'suggestions.json', format: 'json' })).toBe(0);
    const { sequence } = PlanJsonOutputSchema.parse(JSON.parse(output[0] ?? ''));
    expect(sequence.map((item) => item.originalIndex)).toEqual([2, 1, 0]);
  });

  it('should order commits by imports in staged content', async () => {
    await writeFile(
      join(repoRoot, 'suggestions.json'),
      JSON.stringify([
        { type: 'refactor', scope: 'core', files: ['src/core/router.ts'], subject: 'route through registry' },
        { type: 'chore', scope: 'core', files: ['src/core/registry.ts'], subject: 'add registry' },
      ])
    );
    const { context, output } = createHarness(repoRoot, [], {
      contents: { 'src/core/router.ts': "import { registry } from './registry';\n" },
    });

    expect(await runPlan(context, { input: 'suggestions.json', format: 'json' })).toBe(0);
    const { sequence } = PlanJsonOutputSchema.parse(JSON.parse(output[0] ?? ''));
    expect(sequence.map((item) => [item.originalIndex, item.canExecute])).toEqual([
      [1, 'now'],
      [0, 'after commit 1'],
    ]);
  });

  it('should exit 1 on contradictory dependencies', async () => {
    await writeFile(
      join(repoRoot, 'suggestions.json'),
      JSON.stringify([
        { type: 'fix', scope: 'auth', files: ['src/auth/session.ts'], subject: 'expire sessions' },
        { type: 'feat', scope: 'auth', files: ['src/auth/token.ts'], subject: 'add token issuer' },
      ])
    );
    const { context, logger, output } = createHarness(repoRoot, [], {
      contents: { 'src/auth/token.ts': "import { Session } from './session';\n" },
    });

    expect(await runPlan(context, { input: 'suggestions.json' })).toBe(1);
    expect(logger.messages('error')).toEqual([
      'Error: Contradictory dependency between commits 0 and 1 ' +
        '(0 -> 1 by import-dependency, 1 -> 0 by fix-after-feature)',
    ]);
    expect(output).toEqual([]);
  });

  it('should exit 1 on malformed descriptors', async () => {
    await writeFile(join(repoRoot, 'suggestions.json'), JSON.stringify([{ type: 'feat', files: [], subject: 'x' }]));
    const { context, logger } = createHarness(repoRoot, []);

    expect(await runPlan(context, { input: 'suggestions.json' })).toBe(1);
    expect(logger.messages('error')).toEqual([
      'Error: Malformed commit descriptor 0: files: Array must contain at least 1 element(s)',
    ]);
  });

  it('should exit 1 when the input file lists no commits', async () => {
    await writeFile(join(repoRoot, 'suggestions.json'), JSON.stringify({ suggestions: [] }));
    const { context, logger, output } = createHarness(repoRoot, []);

    expect(await runPlan(context, { input: 'suggestions.json' })).toBe(1);
    expect(logger.messages('error')).toEqual([
      'Error: Malformed commit descriptors: no commit suggestions provided',
    ]);
    expect(output).toEqual([]);
  });

  it('should exit 2 for invalid flags or a missing input file', async () => {
    const { context, logger } = createHarness(repoRoot, workingTree);

    expect(await runPlan(context, { strategy: 'by-author' })).toBe(2);
    expect(await runPlan(context, { format: 'yaml' })).toBe(2);
    expect(await runPlan(context, { input: 'missing.json' })).toBe(2);
    expect(logger.messages('error')[0]).toBe(
      'Error: Invalid value for --strategy: "by-author" (expected one of type, scope, type-scope)'
    );
  });
});

describe('saved plans', () => {
  let repoRoot: string;

  beforeEach(async () => {
    repoRoot = await mkdtemp(join(tmpdir(), 'commit-planner-saved-'));
  });

  afterEach(async () => {
    await rm(repoRoot, { recursive: true, force: true });
  });

  it('should save, show and reset a plan', async () => {
    const planned = createHarness(repoRoot, workingTree);
    expect(await runPlan(planned.context, { format: 'json', save: true })).toBe(0);
    expect(planned.logger.messages('info')).toEqual([`Plan saved to ${getCurrentPlanPath(repoRoot)}`]);

    const stored = await loadPlan(repoRoot);
    expect(stored?.createdAt).toBe('2024-05-01T12:00:00.000Z');
    expect(stored?.classification?.shouldSplit).toBe(true);
    expect(stored?.descriptors).toHaveLength(3);

    const shown = createHarness(repoRoot, []);
    expect(await runShow(shown.context, { format: 'script' })).toBe(0);
    expect(shown.output[0]?.split('\n')).toContain("git commit -m 'feat(auth): add auth (1 file)'");

    const reset = createHarness(repoRoot, []);
    expect(await runReset(reset.context, {})).toBe(0);
    expect(reset.logger.messages('info')).toEqual(['Commit plan cleared.']);

    const after = createHarness(repoRoot, []);
    expect(await runShow(after.context, {})).toBe(1);
    expect(after.logger.messages('warn')).toEqual(['No saved plan. Run `commit-planner plan --save` first.']);
  });

  it('should honor the storage directory from the environment', async () => {
    const { context } = createHarness(repoRoot, workingTree, { env: { COMMIT_PLANNER_STORAGE_DIR: '.plans' } });

    expect(await runPlan(context, { format: 'json', save: true })).toBe(0);
    expect(await loadPlan(repoRoot, '.plans')).not.toBeNull();
    expect(await loadPlan(repoRoot)).toBeNull();
  });

  it('should tell a corrupt saved plan apart from a missing one', async () => {
    const path = getCurrentPlanPath(repoRoot);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify({ schemaVersion: '1.0' }));
    const { context, logger, output } = createHarness(repoRoot, []);

    expect(await runShow(context, {})).toBe(1);
    expect(logger.messages('error')).toEqual([
      `Saved plan at ${path} is unreadable (createdAt: Required; repoRoot: Required; descriptors: Required; plan: Required).`,
    ]);
    expect(logger.messages('warn')).toEqual(['Run `commit-planner reset`, then `commit-planner plan --save`.']);
    expect(output).toEqual([]);

    const reset = createHarness(repoRoot, []);
    expect(await runReset(reset.context, {})).toBe(0);
    expect(reset.logger.messages('info')).toEqual(['Commit plan cleared.']);
  });

  it('should report when there is nothing to reset', async () => {
    const { context, logger } = createHarness(repoRoot, []);

    expect(await runReset(context, {})).toBe(0);
    expect(logger.messages('info')).toEqual(['No commit plan to clear.']);
  });
});
