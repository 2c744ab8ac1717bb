/**
 * Rendering module
 * @module @commit-planner/core/render
 */

export { renderPlan, renderNarrative, renderScript, toJsonOutput } from './render-plan';
export { formatHeader, formatLabel, formatCanExecute, shellQuote } from './message';
