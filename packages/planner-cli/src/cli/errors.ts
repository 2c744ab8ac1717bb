/**
 * CLI error mapping
 */

import { EXIT_INVALID_PARAMETERS, EXIT_PLANNING_ERROR, isPlanningError } from '@commit-planner/core';
import type { Logger } from '../utils/logger';

/**
 * Bad flag value, unreadable input file or invalid config file
 */
export class UsageError extends Error {
  readonly exitCode = EXIT_INVALID_PARAMETERS;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Report an error and return the exit code for it
 */
export function handleError(error: unknown, logger: Logger): number {
  if (isPlanningError(error)) {
    if (error.code === 'EMPTY_CHANGE_SET') {
      logger.warn('No changes to plan');
    } else {
      logger.error(`Error: ${error.message}`);
    }
    return error.exitCode;
  }

  if (error instanceof UsageError) {
    logger.error(`Error: ${error.message}`);
    return error.exitCode;
  }

  logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  return EXIT_PLANNING_ERROR;
}
