/**
 * Planning errors
 *
 * Every failure of the planning core is one of these. None is retryable:
 * the core is a pure function of its inputs.
 */

export type PlanningErrorCode =
  | 'EMPTY_CHANGE_SET'
  | 'INVALID_THRESHOLD'
  | 'MALFORMED_DESCRIPTOR'
  | 'CONTRADICTORY_EDGE'
  | 'CYCLIC_DEPENDENCY';

/** Exit code for fatal planning errors */
export const EXIT_PLANNING_ERROR = 1;

/** Exit code for invalid caller-supplied parameters */
export const EXIT_INVALID_PARAMETERS = 2;

export abstract class PlanningError extends Error {
  abstract readonly code: PlanningErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Nothing to plan. Callers report this as "no changes", not as an atomicity failure.
 */
export class EmptyChangeSetError extends PlanningError {
  readonly code = 'EMPTY_CHANGE_SET';
  readonly exitCode = EXIT_PLANNING_ERROR;

  constructor() {
    super('No changed files to plan');
  }
}

export class InvalidThresholdError extends PlanningError {
  readonly code = 'INVALID_THRESHOLD';
  readonly exitCode = EXIT_INVALID_PARAMETERS;

  constructor(readonly threshold: unknown) {
    super(`Threshold must be a positive integer, got ${String(threshold)}`);
  }
}

export class MalformedDescriptorError extends PlanningError {
  readonly code = 'MALFORMED_DESCRIPTOR';
  readonly exitCode = EXIT_PLANNING_ERROR;

  /**
   * @param index - Offending descriptor (or edge) index, when known
   * @param issues - One line per problem, e.g. `files: Array must contain at least 1 element(s)`
   */
  constructor(
    readonly index: number | undefined,
    readonly issues: string[]
  ) {
    const where = index === undefined ? 'Malformed commit descriptors' : `Malformed commit descriptor ${index}`;
    super(`${where}: ${issues.join('; ')}`);
  }
}

/**
 * Two heuristics ordered the same pair both ways
 */
export class ContradictoryEdgeError extends PlanningError {
  readonly code = 'CONTRADICTORY_EDGE';
  readonly exitCode = EXIT_PLANNING_ERROR;

  constructor(
    readonly indices: [number, number],
    readonly rules: [string, string]
  ) {
    super(
      `Contradictory dependency between commits ${indices[0]} and ${indices[1]} ` +
        `(${indices[0]} -> ${indices[1]} by ${rules[0]}, ${indices[1]} -> ${indices[0]} by ${rules[1]})`
    );
  }
}

export class CyclicDependencyError extends PlanningError {
  readonly code = 'CYCLIC_DEPENDENCY';
  readonly exitCode = EXIT_PLANNING_ERROR;

  /**
   * @param unresolved - Ascending indices that were never assigned a position
   */
  constructor(readonly unresolved: number[]) {
    super(`Circular dependency among commits ${unresolved.join(', ')}`);
  }
}

export function isPlanningError(error: unknown): error is PlanningError {
  return error instanceof PlanningError;
}
