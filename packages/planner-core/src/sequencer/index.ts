/**
 * Sequencer module
 * @module @commit-planner/core/sequencer
 */

export { sequence, orderedDescriptors } from './sequence';
export { PriorityQueue, type Compare } from './priority-queue';
