/**
 * Tests for program.ts - argument parsing and exit codes
 */

import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runCli } from '../../src/cli/program';
import { changedFile, createHarness } from '../helpers';

const repoRoot = join(tmpdir(), 'commit-planner-program');
const argv = (...args: string[]) => ['node', 'commit-planner', ...args];

describe('runCli', () => {
  it('should run analyze with parsed flags', async () => {
    const { context, output } = createHarness(repoRoot, [changedFile('src/auth/login.ts', 12)]);

    expect(await runCli(argv('analyze', '--json'), context)).toBe(0);
    expect(JSON.parse(output[0] ?? '')).toMatchObject({ shouldSplit: false, reasons: [] });
  });

  it('should accept global flags after the subcommand', async () => {
    const { context, logger } = createHarness(repoRoot, [changedFile('src/auth/login.ts', 12)]);

    expect(await runCli(argv('analyze', '--verbose', '--json'), context)).toBe(0);
    expect(logger.messages('debug')[0]).toBe(`Repository root: ${repoRoot}`);
  });

  it('should return the command exit code', async () => {
    const { context, logger } = createHarness(repoRoot, []);

    expect(await runCli(argv('analyze'), context)).toBe(1);
    expect(logger.messages('warn')).toEqual(['No changes to plan']);
  });

  it('should exit 2 on invalid values and unknown options', async () => {
    const { context } = createHarness(repoRoot, [changedFile('src/auth/login.ts', 12)]);

    expect(await runCli(argv('plan', '--strategy', 'by-author'), context)).toBe(2);
    expect(await runCli(argv('analyze', '--threshold', '-3'), context)).toBe(2);
    expect(await runCli(argv('plan', '--no-such-flag'), context)).toBe(2);
    expect(await runCli(argv('deploy'), context)).toBe(2);
  });

  it('should exit 0 after help and version output', async () => {
    const { context, output } = createHarness(repoRoot, []);

    expect(await runCli(argv('--version'), context)).toBe(0);
    expect(output).toEqual(['0.1.0\n']);

    expect(await runCli(argv('--help'), context)).toBe(0);
    expect(output[1]).toContain('Usage: commit-planner [options] [command]');
  });
});
