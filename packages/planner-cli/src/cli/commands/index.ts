// CLI commands
export { runAnalyze, formatAnalysis } from './analyze';
export { runPlan } from './plan';
export { runShow } from './show';
export { runReset } from './reset';
