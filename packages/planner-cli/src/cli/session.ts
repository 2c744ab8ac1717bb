/**
 * Shared command setup: repository root, resolved config, logger
 */

import { resolve } from 'node:path';
import { Chalk, type ChalkInstance } from 'chalk';
import type { PlannerConfig } from '@commit-planner/contracts';
import { loadPlannerConfig } from '../config/load-config';
import type { Logger } from '../utils/logger';
import type { CommandContext } from './context';
import { handleError } from './errors';
import type { GlobalOptions } from './options';

export interface Session {
  cwd: string;
  repoRoot: string;
  config: PlannerConfig;
  logger: Logger;
  colors: ChalkInstance;
}

/**
 * Run a command body and turn whatever it throws into an exit code
 */
export async function runCommand(
  context: CommandContext,
  options: GlobalOptions,
  body: (session: Session) => Promise<number>
): Promise<number> {
  const debug = options.verbose === true || context.env.COMMIT_PLANNER_DEBUG === 'true';
  let logger = context.createLogger(debug);

  try {
    const cwd = resolve(context.cwd, options.cwd ?? '.');
    const repoRoot = await context.findRepoRoot(cwd);
    const config = await loadPlannerConfig(repoRoot, context.env);
    if (config.debug && !debug) {
      logger = context.createLogger(true);
    }
    logger.debug(`Repository root: ${repoRoot}`);

    const colors = new Chalk({ level: context.color ? 1 : 0 });
    return await body({ cwd, repoRoot, config, logger, colors });
  } catch (error) {
    return handleError(error, logger);
  }
}
