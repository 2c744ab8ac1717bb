/**
 * Flag parsing for planner commands
 *
 * commander hands every value over as a string; these helpers turn them into
 * typed settings and reject bad values with exit code 2.
 */

import { z } from 'zod';
import { GroupingStrategySchema, PlanFormatSchema, type GroupingStrategy, type PlanFormat } from '@commit-planner/contracts';
import { InvalidThresholdError } from '@commit-planner/core';
import { UsageError } from './errors';

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  cwd: z.string().optional(),
});

export const AnalyzeOptionsSchema = GlobalOptionsSchema.extend({
  threshold: z.string().optional(),
  filter: z.string().optional(),
  json: z.boolean().optional(),
});

export type AnalyzeOptions = z.infer<typeof AnalyzeOptionsSchema>;

export const PlanOptionsSchema = AnalyzeOptionsSchema.extend({
  strategy: z.string().optional(),
  input: z.string().optional(),
  format: z.string().optional(),
  save: z.boolean().optional(),
});

export type PlanOptions = z.infer<typeof PlanOptionsSchema>;

export const ShowOptionsSchema = GlobalOptionsSchema.extend({
  format: z.string().optional(),
});

export type ShowOptions = z.infer<typeof ShowOptionsSchema>;

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export function parseThreshold(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidThresholdError(raw);
  }
  return value;
}

function parseChoice<T extends string>(
  schema: z.ZodEnum<[T, ...T[]]>,
  flag: string,
  raw: string | undefined,
  fallback: T
): T {
  if (raw === undefined) {
    return fallback;
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new UsageError(`Invalid value for --${flag}: "${raw}" (expected one of ${schema.options.join(', ')})`);
  }
  return result.data;
}

export function parseStrategy(raw: string | undefined, fallback: GroupingStrategy): GroupingStrategy {
  return parseChoice(GroupingStrategySchema, 'strategy', raw, fallback);
}

export function parseFormat(raw: string | undefined, fallback: PlanFormat): PlanFormat {
  return parseChoice(PlanFormatSchema, 'format', raw, fallback);
}
