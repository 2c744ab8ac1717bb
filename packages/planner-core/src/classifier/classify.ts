/**
 * Change set classification: atomic, or split into several commits?
 */

import type {
  ChangedFile,
  ClassificationResult,
  ClassifiedFile,
  ConventionalType,
} from '@commit-planner/contracts';
import { EmptyChangeSetError, InvalidThresholdError } from '../errors';
import { inferType } from './type-rules';
import { extractScope } from './scope';
import { detectMixedConcerns, effectiveTypes } from './concerns';

export const DEFAULT_THRESHOLD = 10;

export function assertValidThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold <= 0) {
    throw new InvalidThresholdError(threshold);
  }
}

/**
 * Infer type and scope for every file, in input order
 */
export function classifyFiles(files: readonly ChangedFile[]): ClassifiedFile[] {
  return files.map((file) => ({
    path: file.path,
    type: inferType(file),
    scope: extractScope(file.path),
  }));
}

/**
 * Count occurrences, keeping keys in first-appearance order
 */
function histogram<K extends string>(keys: readonly K[]): { order: K[]; counts: Record<string, number> } {
  const order: K[] = [];
  const counts: Record<string, number> = {};
  for (const key of keys) {
    const count = counts[key];
    if (count === undefined) {
      order.push(key);
    }
    counts[key] = (count ?? 0) + 1;
  }
  return { order, counts };
}

/**
 * Decide whether a change set should be split
 *
 * Triggers are evaluated independently and reported in fixed order:
 * 1. more than one distinct type
 * 2. more than one distinct scope
 * 3. more files than `threshold`
 * 4. mixed concerns
 */
export function classify(files: readonly ChangedFile[], threshold: number = DEFAULT_THRESHOLD): ClassificationResult {
  assertValidThreshold(threshold);
  if (files.length === 0) {
    throw new EmptyChangeSetError();
  }

  const classified = classifyFiles(files);
  const types = histogram<ConventionalType>(classified.map((f) => f.type));
  const scopes = histogram<string>(classified.map((f) => f.scope));
  const distinctTypes = effectiveTypes(classified);
  const concerns = detectMixedConcerns(classified);

  const reasons: string[] = [];

  if (distinctTypes.length > 1) {
    reasons.push(`Multiple types detected: ${distinctTypes.join(', ')}`);
  }

  if (scopes.order.length > 1) {
    reasons.push(`Multiple scopes detected: ${scopes.order.join(', ')}`);
  }

  if (files.length > threshold) {
    reasons.push(`Large change: ${files.length} files (threshold: ${threshold})`);
  }

  if (concerns.length > 0) {
    reasons.push(`Mixed concerns: ${concerns.join('; ')}`);
  }

  return {
    shouldSplit: reasons.length > 0,
    reasons,
    files: classified,
    metrics: {
      fileCount: files.length,
      threshold,
      typesDetected: types.order,
      typeCounts: types.counts,
      scopesDetected: scopes.order,
      scopeCounts: scopes.counts,
      concerns,
    },
  };
}
