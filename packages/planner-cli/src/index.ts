/**
 * Commit planner CLI
 *
 * @module @commit-planner/cli
 */

// CLI commands and program
export * from './cli';

// Config
export { loadPlannerConfig, readConfigFile } from './config/load-config';

// Logging
export { ConsoleLogger, createLogger, type Logger } from './utils/logger';
