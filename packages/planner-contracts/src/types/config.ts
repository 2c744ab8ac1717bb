/**
 * Planner Configuration Contract
 *
 * Defines the shape of commit-planner.config.json at the repository root.
 * Resolution order: defaults, then file, then environment, then CLI flags.
 */

import { z } from 'zod';
import {
  GroupingStrategySchema,
  PlanFormatSchema,
  type GroupingStrategy,
  type PlanFormat,
} from '../schema';

export const CONFIG_FILE_NAME = 'commit-planner.config.json';

/**
 * Storage configuration
 */
export interface StorageConfig {
  /** Directory for saved plans (default: .commit-planner) */
  directory: string;
}

/**
 * Resolved planner configuration
 *
 * @example
 * ```json
 * {
 *   "threshold": 8,
 *   "strategy": "type-scope",
 *   "format": "plan",
 *   "storage": { "directory": ".commit-planner" },
 *   "filter": "packages/**"
 * }
 * ```
 */
export interface PlannerConfig {
  /** Largest file count still considered a small change */
  threshold: number;
  /** How classified files are grouped into candidate commits */
  strategy: GroupingStrategy;
  /** Default rendering of a plan */
  format: PlanFormat;
  storage: StorageConfig;
  /** Glob limiting which changed files are planned */
  filter?: string;
  /** Enables debug logging */
  debug: boolean;
}

/**
 * Schema for the config file; every field is optional
 */
export const PlannerFileConfigSchema = z
  .object({
    threshold: z.number().int().positive(),
    strategy: GroupingStrategySchema,
    format: PlanFormatSchema,
    storage: z.object({ directory: z.string().min(1) }).partial(),
    filter: z.string().min(1),
    debug: z.boolean(),
  })
  .partial()
  .strict();

export type PlannerFileConfig = z.infer<typeof PlannerFileConfigSchema>;

/**
 * Environment variables supported by the planner
 */
export const PLANNER_ENV_VARS = [
  'COMMIT_PLANNER_THRESHOLD',
  'COMMIT_PLANNER_STRATEGY',
  'COMMIT_PLANNER_FORMAT',
  'COMMIT_PLANNER_STORAGE_DIR',
  'COMMIT_PLANNER_DEBUG',
] as const;

export type PlannerEnvVar = (typeof PLANNER_ENV_VARS)[number];

export type PlannerEnv = Partial<Record<PlannerEnvVar, string>>;

/**
 * Default configuration values
 */
export const defaultPlannerConfig: PlannerConfig = {
  threshold: 10,
  strategy: 'type-scope',
  format: 'plan',
  storage: {
    directory: '.commit-planner',
  },
  filter: undefined,
  debug: false,
};

/**
 * Pick the known planner variables out of a process environment
 */
export function pickPlannerEnv(source: Record<string, string | undefined>): PlannerEnv {
  const env: PlannerEnv = {};
  for (const name of PLANNER_ENV_VARS) {
    const value = source[name];
    if (value !== undefined) {
      env[name] = value;
    }
  }
  return env;
}

/**
 * Resolve config with env variable overrides
 *
 * Env values that fail to parse are ignored and the file/default value stays.
 *
 * @param fileConfig - Parsed commit-planner.config.json
 * @param env - Planner environment variables
 */
export function resolvePlannerConfig(
  fileConfig: PlannerFileConfig = {},
  env: PlannerEnv = {}
): PlannerConfig {
  const config: PlannerConfig = {
    threshold: fileConfig.threshold ?? defaultPlannerConfig.threshold,
    strategy: fileConfig.strategy ?? defaultPlannerConfig.strategy,
    format: fileConfig.format ?? defaultPlannerConfig.format,
    storage: {
      directory: fileConfig.storage?.directory ?? defaultPlannerConfig.storage.directory,
    },
    filter: fileConfig.filter ?? defaultPlannerConfig.filter,
    debug: fileConfig.debug ?? defaultPlannerConfig.debug,
  };

  // Environment variable overrides
  if (env.COMMIT_PLANNER_THRESHOLD !== undefined) {
    const threshold = Number(env.COMMIT_PLANNER_THRESHOLD);
    if (Number.isInteger(threshold) && threshold > 0) {
      config.threshold = threshold;
    }
  }

  if (env.COMMIT_PLANNER_STRATEGY !== undefined) {
    const strategy = GroupingStrategySchema.safeParse(env.COMMIT_PLANNER_STRATEGY);
    if (strategy.success) {
      config.strategy = strategy.data;
    }
  }

  if (env.COMMIT_PLANNER_FORMAT !== undefined) {
    const format = PlanFormatSchema.safeParse(env.COMMIT_PLANNER_FORMAT);
    if (format.success) {
      config.format = format.data;
    }
  }

  if (env.COMMIT_PLANNER_STORAGE_DIR) {
    config.storage.directory = env.COMMIT_PLANNER_STORAGE_DIR;
  }

  if (env.COMMIT_PLANNER_DEBUG !== undefined) {
    config.debug = env.COMMIT_PLANNER_DEBUG === 'true';
  }

  return config;
}
