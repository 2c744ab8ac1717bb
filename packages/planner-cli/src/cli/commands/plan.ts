/**
 * plan command
 * Build an ordered commit plan from the working tree or a descriptor file
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type {
  ClassificationResult,
  CommitDescriptor,
  GroupingStrategy,
  StoredPlan,
} from '@commit-planner/contracts';
import {
  MalformedDescriptorError,
  classify,
  combineChangeSet,
  groupChangeSet,
  loadDescriptors,
  planCommits,
  prefetchContents,
  renderPlan,
  savePlan,
  type DiffProvider,
} from '@commit-planner/core';
import type { CommandContext } from '../context';
import { UsageError } from '../errors';
import { parseFormat, parseStrategy, parseThreshold, type PlanOptions } from '../options';
import { runCommand, type Session } from '../session';

interface PlanInput {
  descriptors: CommitDescriptor[];
  classification?: ClassificationResult;
}

async function readDescriptorFile(cwd: string, file: string): Promise<CommitDescriptor[]> {
  const path = resolve(cwd, file);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new UsageError(`Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new MalformedDescriptorError(undefined, [
      `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    ]);
  }

  return loadDescriptors(data);
}

export async function runPlan(context: CommandContext, options: PlanOptions): Promise<number> {
  return runCommand(context, options, async (session) => {
    const { cwd, repoRoot, config, logger, colors } = session;
    const threshold = parseThreshold(options.threshold, config.threshold);
    const strategy = parseStrategy(options.strategy, config.strategy);
    const format = options.json ? 'json' : parseFormat(options.format, config.format);
    const provider = context.createDiffProvider(repoRoot, { filter: options.filter ?? config.filter });

    const input: PlanInput = options.input
      ? { descriptors: await readDescriptorFile(cwd, options.input) }
      : await groupWorkingTree(session, provider, threshold, strategy);

    const contentAt = await prefetchContents(provider, input.descriptors);
    const plan = planCommits(input.descriptors, { contentAt });
    logger.debug(`Planned ${plan.entries.length} commit(s) with ${plan.edges.length} dependency edge(s)`);
    for (const edge of plan.edges) {
      logger.debug(`  ${edge.producer} -> ${edge.dependent} (${edge.rule})`);
    }

    if (format === 'plan' && input.classification) {
      const { shouldSplit, reasons } = input.classification;
      context.write(
        shouldSplit
          ? colors.yellow(`Split recommended: ${reasons.join('; ')}`)
          : colors.green('Change set is atomic: planning a single commit')
      );
    }

    context.write(renderPlan(plan, input.descriptors, format));

    if (options.save) {
      const stored: StoredPlan = {
        schemaVersion: '1.0',
        createdAt: context.now().toISOString(),
        repoRoot,
        descriptors: input.descriptors,
        plan,
        classification: input.classification,
      };
      const path = await savePlan(repoRoot, stored, config.storage.directory);
      logger.info(`Plan saved to ${path}`);
    }

    return 0;
  });
}

async function groupWorkingTree(
  { logger }: Session,
  provider: DiffProvider,
  threshold: number,
  strategy: GroupingStrategy
): Promise<PlanInput> {
  const files = await provider.changedFiles();
  logger.debug(`Found ${files.length} changed file(s)`);

  const classification = classify(files, threshold);
  const descriptors = classification.shouldSplit
    ? groupChangeSet(files, classification, strategy)
    : [combineChangeSet(files, classification)];
  logger.debug(`Grouped into ${descriptors.length} candidate commit(s) by ${strategy}`);

  return { descriptors, classification };
}
