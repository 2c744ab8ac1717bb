/**
 * Storage module
 * @module @commit-planner/core/storage
 */

export {
  getPlanStoragePath,
  getCurrentPlanPath,
  savePlan,
  readPlan,
  loadPlan,
  hasPlan,
  clearPlan,
  type PlanReadResult,
} from './plan-storage';
