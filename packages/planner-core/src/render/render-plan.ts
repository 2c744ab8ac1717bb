/**
 * Plan renderers
 */

import type {
  CommitDescriptor,
  Plan,
  PlanEntry,
  PlanFormat,
  PlanJsonOutput,
} from '@commit-planner/contracts';
import { MalformedDescriptorError } from '../errors';
import { formatCanExecute, formatHeader, formatLabel, shellQuote } from './message';

const RULE = '='.repeat(60);
const SEPARATOR = '-'.repeat(60);

interface PlannedCommit {
  entry: PlanEntry;
  descriptor: CommitDescriptor;
}

function planned(plan: Plan, descriptors: readonly CommitDescriptor[]): PlannedCommit[] {
  return plan.entries.map((entry) => {
    const descriptor = descriptors[entry.index];
    if (!descriptor) {
      throw new MalformedDescriptorError(entry.index, ['plan entry has no matching descriptor']);
    }
    return { entry, descriptor };
  });
}

function totalFiles(commits: readonly PlannedCommit[]): number {
  return commits.reduce((sum, { descriptor }) => sum + descriptor.files.length, 0);
}

export function renderNarrative(plan: Plan, descriptors: readonly CommitDescriptor[]): string {
  const commits = planned(plan, descriptors);
  const lines: string[] = [
    RULE,
    'COMMIT SEQUENCE PLAN',
    RULE,
    '',
    `Execution order: ${commits.length} commits in sequence`,
    '',
  ];

  for (const { entry, descriptor } of commits) {
    lines.push(
      SEPARATOR,
      `COMMIT ${entry.position}: ${formatLabel(descriptor)}`,
      `Files: ${descriptor.files.length}`,
      `Can execute: ${formatCanExecute(entry)}`,
      SEPARATOR,
      '',
      'Message:',
      `  ${formatHeader(descriptor)}`
    );
    if (descriptor.body) {
      lines.push('', ...descriptor.body.split('\n').map((line) => `  ${line}`));
    }
    lines.push('', 'Files to stage:');
    for (const file of descriptor.files) {
      lines.push(`  git add ${shellQuote(file)}`);
    }
    lines.push('', 'Command:', `  ${commitCommand(descriptor)}`, '');
  }

  lines.push(RULE, `Total commits: ${commits.length}`, `Total files: ${totalFiles(commits)}`, RULE);
  return lines.join('\n');
}

function commitCommand(descriptor: CommitDescriptor): string {
  const parts = ['git commit -m', shellQuote(formatHeader(descriptor))];
  if (descriptor.body) {
    parts.push('-m', shellQuote(descriptor.body));
  }
  return parts.join(' ');
}

export function renderScript(plan: Plan, descriptors: readonly CommitDescriptor[]): string {
  const commits = planned(plan, descriptors);
  const lines: string[] = [
    '#!/bin/bash',
    '# Atomic commit sequence',
    `# Total commits: ${commits.length}`,
    '',
    'set -e',
    '',
    "echo 'Starting commit sequence...'",
    '',
  ];

  for (const { entry, descriptor } of commits) {
    lines.push(
      `# Commit ${entry.position}: ${formatLabel(descriptor)}`,
      `echo ${shellQuote(`Commit ${entry.position}/${commits.length}: ${formatLabel(descriptor)}`)}`
    );
    lines.push(`git add -- ${descriptor.files.map(shellQuote).join(' ')}`);
    lines.push(commitCommand(descriptor), '');
  }

  lines.push(
    "echo 'All commits completed'",
    `echo ${shellQuote(`Total commits: ${commits.length}`)}`,
    `echo ${shellQuote(`Total files: ${totalFiles(commits)}`)}`
  );
  return `${lines.join('\n')}\n`;
}

export function toJsonOutput(plan: Plan, descriptors: readonly CommitDescriptor[]): PlanJsonOutput {
  const commits = planned(plan, descriptors);
  return {
    sequence: commits.map(({ entry, descriptor }) => ({
      ...descriptor,
      order: entry.position,
      originalIndex: entry.index,
      canExecute: formatCanExecute(entry),
    })),
    summary: {
      totalCommits: commits.length,
      totalFiles: totalFiles(commits),
    },
  };
}

export function renderPlan(plan: Plan, descriptors: readonly CommitDescriptor[], format: PlanFormat): string {
  switch (format) {
    case 'plan':
      return renderNarrative(plan, descriptors);
    case 'script':
      return renderScript(plan, descriptors);
    case 'json':
      return JSON.stringify(toJsonOutput(plan, descriptors), null, 2);
  }
}
