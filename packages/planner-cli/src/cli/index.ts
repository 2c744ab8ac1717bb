export * from './commands';
export { createProgram, runCli, addFlags } from './program';
export { createDefaultContext, type CommandContext } from './context';
export { UsageError, handleError } from './errors';
export {
  parseThreshold,
  parseStrategy,
  parseFormat,
  type AnalyzeOptions,
  type PlanOptions,
  type ShowOptions,
  type GlobalOptions,
} from './options';
