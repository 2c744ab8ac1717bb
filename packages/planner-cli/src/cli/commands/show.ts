/**
 * show command
 * Render the saved plan
 */

import { EXIT_PLANNING_ERROR, readPlan, renderPlan } from '@commit-planner/core';
import type { CommandContext } from '../context';
import { parseFormat, type ShowOptions } from '../options';
import { runCommand } from '../session';

export async function runShow(context: CommandContext, options: ShowOptions): Promise<number> {
  return runCommand(context, options, async ({ repoRoot, config, logger }) => {
    const format = parseFormat(options.format, config.format);
    const result = await readPlan(repoRoot, config.storage.directory);

    if (result.status === 'missing') {
      logger.warn('No saved plan. Run `commit-planner plan --save` first.');
      return EXIT_PLANNING_ERROR;
    }

    if (result.status === 'invalid') {
      logger.error(`Saved plan at ${result.path} is unreadable (${result.reason}).`);
      logger.warn('Run `commit-planner reset`, then `commit-planner plan --save`.');
      return EXIT_PLANNING_ERROR;
    }

    logger.debug(`Plan created at ${result.plan.createdAt}`);
    context.write(renderPlan(result.plan.plan, result.plan.descriptors, format));
    return 0;
  });
}
