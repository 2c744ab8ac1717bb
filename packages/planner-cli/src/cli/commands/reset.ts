/**
 * reset command
 * Clear the saved plan
 */

import { clearPlan, hasPlan } from '@commit-planner/core';
import type { CommandContext } from '../context';
import type { GlobalOptions } from '../options';
import { runCommand } from '../session';

export async function runReset(context: CommandContext, options: GlobalOptions): Promise<number> {
  return runCommand(context, options, async ({ repoRoot, config, logger }) => {
    if (!(await hasPlan(repoRoot, config.storage.directory))) {
      logger.info('No commit plan to clear.');
      return 0;
    }

    await clearPlan(repoRoot, config.storage.directory);
    logger.info('Commit plan cleared.');
    return 0;
  });
}
