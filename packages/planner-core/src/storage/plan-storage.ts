/**
 * Commit plan storage in <repo>/.commit-planner/
 */

import { readFile, writeFile, mkdir, rm } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { StoredPlanSchema, defaultPlannerConfig, type StoredPlan } from '@commit-planner/contracts';

const CURRENT_DIR = 'current';
const PLAN_FILE = 'plan.json';

/**
 * Get path to plan storage directory
 */
export function getPlanStoragePath(cwd: string, directory = defaultPlannerConfig.storage.directory): string {
  return join(cwd, directory);
}

/**
 * Get path to current plan file
 */
export function getCurrentPlanPath(cwd: string, directory = defaultPlannerConfig.storage.directory): string {
  return join(getPlanStoragePath(cwd, directory), CURRENT_DIR, PLAN_FILE);
}

/**
 * Save plan to storage, replacing the current one
 */
export async function savePlan(
  cwd: string,
  plan: StoredPlan,
  directory = defaultPlannerConfig.storage.directory
): Promise<string> {
  const planPath = getCurrentPlanPath(cwd, directory);

  await mkdir(dirname(planPath), { recursive: true });
  await writeFile(planPath, `${JSON.stringify(plan, null, 2)}\n`);

  return planPath;
}

export type PlanReadResult =
  | { status: 'ok'; plan: StoredPlan }
  | { status: 'missing' }
  | { status: 'invalid'; path: string; reason: string };

/**
 * Read the current plan, telling a missing file apart from an unreadable one
 */
export async function readPlan(
  cwd: string,
  directory = defaultPlannerConfig.storage.directory
): Promise<PlanReadResult> {
  const planPath = getCurrentPlanPath(cwd, directory);

  let content: string;
  try {
    content = await readFile(planPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { status: 'missing' };
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    return {
      status: 'invalid',
      path: planPath,
      reason: `not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = StoredPlanSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    return { status: 'invalid', path: planPath, reason: issues.join('; ') };
  }
  return { status: 'ok', plan: result.data };
}

/**
 * Load current plan from storage; null when missing or invalid
 */
export async function loadPlan(
  cwd: string,
  directory = defaultPlannerConfig.storage.directory
): Promise<StoredPlan | null> {
  const result = await readPlan(cwd, directory);
  return result.status === 'ok' ? result.plan : null;
}

/**
 * Check if a plan file exists, valid or not
 */
export async function hasPlan(cwd: string, directory = defaultPlannerConfig.storage.directory): Promise<boolean> {
  const result = await readPlan(cwd, directory);
  return result.status !== 'missing';
}

/**
 * Clear current plan
 */
export async function clearPlan(cwd: string, directory = defaultPlannerConfig.storage.directory): Promise<void> {
  await rm(join(getPlanStoragePath(cwd, directory), CURRENT_DIR), { recursive: true, force: true });
}
