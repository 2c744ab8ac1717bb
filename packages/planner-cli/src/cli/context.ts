/**
 * Collaborators handed to every command
 */

import { GitDiffProvider, findRepoRoot, type DiffProvider, type GitDiffProviderOptions } from '@commit-planner/core';
import { createLogger, type Logger } from '../utils/logger';

export interface CommandContext {
  cwd: string;
  env: Record<string, string | undefined>;
  /** Writes user output (plans, scripts, JSON) */
  write(text: string): void;
  /** Colour user output */
  color: boolean;
  createLogger(debug: boolean): Logger;
  findRepoRoot(cwd: string): Promise<string>;
  createDiffProvider(repoRoot: string, options: GitDiffProviderOptions): DiffProvider;
  now(): Date;
}

export function createDefaultContext(): CommandContext {
  return {
    cwd: process.cwd(),
    env: process.env,
    write: (text) => {
      process.stdout.write(text.endsWith('\n') ? text : `${text}\n`);
    },
    color: process.stdout.isTTY === true,
    createLogger,
    findRepoRoot,
    createDiffProvider: (repoRoot, options) => new GitDiffProvider(repoRoot, options),
    now: () => new Date(),
  };
}
