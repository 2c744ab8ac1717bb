/**
 * In-process stand-ins for git, the terminal and the clock
 */

import type { ChangedFile } from '@commit-planner/contracts';
import { categorizePath, type DiffProvider } from '@commit-planner/core';
import type { CommandContext } from '../src/cli/context';
import type { Logger } from '../src/utils/logger';

export class FakeDiffProvider implements DiffProvider {
  constructor(
    private readonly files: ChangedFile[],
    private readonly contents: Record<string, string> = {}
  ) {}

  async changedFiles(): Promise<ChangedFile[]> {
    return this.files;
  }

  async contentAt(path: string): Promise<string | undefined> {
    return this.contents[path];
  }
}

type Level = 'debug' | 'info' | 'warn' | 'error';

export class RecordingLogger implements Logger {
  readonly entries: Array<{ level: Level; message: string }> = [];

  debug(log: string) {
    this.entries.push({ level: 'debug', message: log });
  }
  info(log: string) {
    this.entries.push({ level: 'info', message: log });
  }
  warn(log: string) {
    this.entries.push({ level: 'warn', message: log });
  }
  error(log: string) {
    this.entries.push({ level: 'error', message: log });
  }

  messages(level: Level): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export interface TestHarness {
  context: CommandContext;
  output: string[];
  logger: RecordingLogger;
}

export function changedFile(path: string, additions: number, deletions = 0): ChangedFile {
  return { path, additions, deletions, category: categorizePath(path) };
}

export function createHarness(
  repoRoot: string,
  files: ChangedFile[],
  options: { contents?: Record<string, string>; env?: Record<string, string | undefined> } = {}
): TestHarness {
  const output: string[] = [];
  const logger = new RecordingLogger();
  const provider = new FakeDiffProvider(files, options.contents);

  const context: CommandContext = {
    cwd: repoRoot,
    env: options.env ?? {},
    write: (text) => {
      output.push(text);
    },
    color: false,
    createLogger: () => logger,
    findRepoRoot: async () => repoRoot,
    createDiffProvider: () => provider,
    now: () => new Date('2024-05-01T12:00:00.000Z'),
  };

  return { context, output, logger };
}
