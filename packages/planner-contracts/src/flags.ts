/**
 * Declarative flag definitions for planner commands
 *
 * Defined once here and turned into commander options by the CLI, so help
 * text and parsing stay in one place.
 */

export interface FlagDefinition {
  type: 'string' | 'boolean' | 'number';
  description: string;
  alias?: string;
  /** Placeholder shown in help for value flags */
  argName?: string;
  choices?: readonly string[];
}

export type FlagSet = Record<string, FlagDefinition>;

const thresholdFlag = {
  type: 'number',
  description: 'Maximum file count considered a small change',
  alias: 't',
  argName: 'count',
} as const satisfies FlagDefinition;

const filterFlag = {
  type: 'string',
  description: 'Only plan changed files matching this glob',
  argName: 'glob',
} as const satisfies FlagDefinition;

const jsonFlag = {
  type: 'boolean',
  description: 'Output JSON instead of formatted text',
} as const satisfies FlagDefinition;

const formatFlag = {
  type: 'string',
  description: 'Plan rendering',
  alias: 'f',
  argName: 'format',
  choices: ['plan', 'script', 'json'],
} as const satisfies FlagDefinition;

/**
 * Flags for `analyze`
 *
 * @example
 * ```bash
 * commit-planner analyze --threshold 5 --json
 * ```
 */
export const analyzeFlags = {
  threshold: thresholdFlag,
  filter: filterFlag,
  json: jsonFlag,
} as const satisfies FlagSet;

/**
 * Flags for `plan`
 *
 * @example
 * ```bash
 * commit-planner plan --strategy scope --format script --save
 * commit-planner plan --input suggestions.json
 * ```
 */
export const planFlags = {
  threshold: thresholdFlag,
  filter: filterFlag,
  strategy: {
    type: 'string',
    description: 'How changed files are grouped into commits',
    alias: 's',
    argName: 'strategy',
    choices: ['type', 'scope', 'type-scope'],
  },
  input: {
    type: 'string',
    description: 'Read commit descriptors from a JSON file instead of the working tree',
    alias: 'i',
    argName: 'file',
  },
  format: formatFlag,
  save: {
    type: 'boolean',
    description: 'Store the plan for `show`',
  },
} as const satisfies FlagSet;

/**
 * Flags for `show`
 */
export const showFlags = {
  format: formatFlag,
} as const satisfies FlagSet;

/**
 * Global flags
 */
export const globalFlags = {
  verbose: {
    type: 'boolean',
    description: 'Print debug output to stderr',
    alias: 'v',
  },
  cwd: {
    type: 'string',
    description: 'Repository directory (default: current directory)',
    argName: 'dir',
  },
} as const satisfies FlagSet;
