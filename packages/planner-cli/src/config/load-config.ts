/**
 * Config loading from commit-planner.config.json and the environment
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  PlannerFileConfigSchema,
  pickPlannerEnv,
  resolvePlannerConfig,
  type PlannerConfig,
  type PlannerFileConfig,
} from '@commit-planner/contracts';
import { UsageError } from '../cli/errors';

/**
 * Read the config file at the repository root; an absent file is an empty config
 */
export async function readConfigFile(repoRoot: string): Promise<PlannerFileConfig> {
  const path = join(repoRoot, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new UsageError(`${CONFIG_FILE_NAME} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = PlannerFileConfigSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new UsageError(`Invalid ${CONFIG_FILE_NAME}: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Defaults, then the config file, then environment overrides
 */
export async function loadPlannerConfig(
  repoRoot: string,
  env: Record<string, string | undefined>
): Promise<PlannerConfig> {
  const fileConfig = await readConfigFile(repoRoot);
  return resolvePlannerConfig(fileConfig, pickPlannerEnv(env));
}
