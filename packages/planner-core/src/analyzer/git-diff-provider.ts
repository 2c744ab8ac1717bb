/**
 * Diff provider backed by the local git repository
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  simpleGit,
  type SimpleGit,
  type StatusResult,
  type DiffResultTextFile,
  type DiffResultBinaryFile,
} from 'simple-git';
import { minimatch } from 'minimatch';
import type { ChangedFile } from '@commit-planner/contracts';
import { INDEX_REVISION, type DiffProvider, type RevisionMarker } from '../types';
import { categorizePath } from './categorize';

export interface GitDiffProviderOptions {
  /** Glob limiting which changed files are reported */
  filter?: string;
}

export interface WorkingTreeStatus {
  staged: string[];
  unstaged: string[];
  untracked: string[];
}

/**
 * Type guard for text file diff result
 */
function isTextFile(file: DiffResultTextFile | DiffResultBinaryFile): file is DiffResultTextFile {
  return !file.binary;
}

/**
 * Split `git status` into staged, unstaged and untracked paths
 *
 * A staged rename contributes both its new path and the removed old one.
 * Files with staged changes are listed as staged only.
 */
export function toWorkingTreeStatus(status: Pick<StatusResult, 'files' | 'renamed'>): WorkingTreeStatus {
  const staged = new Set<string>();
  const unstaged = new Set<string>();
  const untracked = new Set<string>();

  for (const file of status.files) {
    if (file.index === '?') {
      untracked.add(file.path);
    } else if (file.index.trim() !== '') {
      staged.add(file.path);
      if (file.index === 'R' && file.from) {
        staged.add(file.from);
      }
    } else if (file.working_dir.trim() !== '') {
      unstaged.add(file.path);
    }
  }
  for (const { from, to } of status.renamed) {
    staged.add(to);
    staged.add(from);
  }

  return {
    staged: [...staged],
    unstaged: [...unstaged].filter((path) => !staged.has(path)),
    untracked: [...untracked],
  };
}

/**
 * Get all changed files (staged + unstaged + untracked), deduplicated, in status order
 */
export function getAllChangedFiles(status: WorkingTreeStatus): string[] {
  return [...new Set([...status.staged, ...status.unstaged, ...status.untracked])];
}

/**
 * Keep only paths matching the glob (all paths when no glob is given)
 */
export function filterPaths(paths: string[], filter?: string): string[] {
  if (!filter) {
    return paths;
  }
  return paths.filter((path) => minimatch(path, filter, { dot: true }));
}

/**
 * Find the repository root containing `cwd`
 */
export async function findRepoRoot(cwd: string): Promise<string> {
  const git: SimpleGit = simpleGit(cwd);
  const root = await git.revparse(['--show-toplevel']);
  return root.trim();
}

export class GitDiffProvider implements DiffProvider {
  private readonly git: SimpleGit;

  constructor(
    private readonly repoRoot: string,
    private readonly options: GitDiffProviderOptions = {}
  ) {
    this.git = simpleGit(repoRoot);
  }

  async changedFiles(): Promise<ChangedFile[]> {
    const status = toWorkingTreeStatus(await this.git.status());
    const paths = filterPaths(getAllChangedFiles(status), this.options.filter);
    if (paths.length === 0) {
      return [];
    }

    const untracked = new Set(status.untracked);
    const tracked = paths.filter((path) => !untracked.has(path));

    // Staged takes priority over working tree changes
    const diffFiles = new Map<string, DiffResultTextFile | DiffResultBinaryFile>();
    if (tracked.length > 0) {
      const unstagedDiff = await this.git.diffSummary(['--no-renames', '--', ...tracked]);
      const stagedDiff = await this.git.diffSummary(['--cached', '--no-renames', '--', ...tracked]);
      for (const file of unstagedDiff.files) {
        diffFiles.set(file.file, file);
      }
      for (const file of stagedDiff.files) {
        diffFiles.set(file.file, file);
      }
    }

    const files: ChangedFile[] = [];
    for (const path of paths) {
      if (untracked.has(path)) {
        files.push(await this.describeUntracked(path));
        continue;
      }

      const summary = diffFiles.get(path);
      const diff = await this.fileDiff(path);
      files.push({
        path,
        additions: summary && isTextFile(summary) ? summary.insertions : 0,
        deletions: summary && isTextFile(summary) ? summary.deletions : 0,
        category: categorizePath(path),
        diff,
      });
    }

    return files;
  }

  async contentAt(path: string, revision: RevisionMarker = INDEX_REVISION): Promise<string | undefined> {
    const object = revision === INDEX_REVISION ? `:${path}` : `${revision}:${path}`;
    try {
      return await this.git.show([object]);
    } catch {
      // Not in the index yet: the working tree copy is what would be staged
      if (revision === INDEX_REVISION) {
        return this.readWorkingTree(path);
      }
      return undefined;
    }
  }

  /**
   * Staged diff first, then working tree diff. Renames show as a deletion
   * plus an addition.
   */
  private async fileDiff(path: string): Promise<string> {
    const staged = await this.git.diff(['--cached', '--no-renames', '--', path]);
    if (staged) {
      return staged;
    }
    return this.git.diff(['--no-renames', '--', path]);
  }

  /**
   * Untracked files count every line as an addition
   */
  private async describeUntracked(path: string): Promise<ChangedFile> {
    const content = (await this.readWorkingTree(path)) ?? '';
    const lines = content.length === 0 ? [] : content.replace(/\n$/, '').split('\n');
    return {
      path,
      additions: lines.length,
      deletions: 0,
      category: categorizePath(path),
      diff: lines.map((line) => `+${line}`).join('\n'),
    };
  }

  private async readWorkingTree(path: string): Promise<string | undefined> {
    try {
      return await readFile(join(this.repoRoot, path), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}
