/**
 * analyze command
 * Classify the working tree change set and report whether it should be split
 */

import type { ChalkInstance } from 'chalk';
import type { ClassificationResult } from '@commit-planner/contracts';
import { classify } from '@commit-planner/core';
import type { CommandContext } from '../context';
import { parseThreshold, type AnalyzeOptions } from '../options';
import { runCommand } from '../session';

/**
 * Human-readable classification summary
 */
export function formatAnalysis(result: ClassificationResult, colors: ChalkInstance): string {
  const { metrics } = result;
  const types = metrics.typesDetected.map((type) => `${type} (${metrics.typeCounts[type] ?? 0})`);
  const scopes = metrics.scopesDetected.map((scope) => `${scope} (${metrics.scopeCounts[scope] ?? 0})`);

  const lines = [
    colors.bold(`Change set: ${metrics.fileCount} file(s) (threshold: ${metrics.threshold})`),
    `Types: ${types.join(', ')}`,
    `Scopes: ${scopes.join(', ')}`,
    '',
    `Split recommended: ${result.shouldSplit ? colors.yellow('yes') : colors.green('no')}`,
  ];

  if (result.reasons.length > 0) {
    lines.push('Reasons:', ...result.reasons.map((reason) => `  - ${reason}`));
  }

  return lines.join('\n');
}

export async function runAnalyze(context: CommandContext, options: AnalyzeOptions): Promise<number> {
  return runCommand(context, options, async ({ repoRoot, config, logger, colors }) => {
    const threshold = parseThreshold(options.threshold, config.threshold);
    const provider = context.createDiffProvider(repoRoot, { filter: options.filter ?? config.filter });

    const files = await provider.changedFiles();
    logger.debug(`Found ${files.length} changed file(s)`);

    const result = classify(files, threshold);

    context.write(options.json ? JSON.stringify(result, null, 2) : formatAnalysis(result, colors));
    return 0;
  });
}
