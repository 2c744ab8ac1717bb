/**
 * Descriptor validation for caller-supplied commit suggestions
 */

import {
  CommitDescriptorSchema,
  DescriptorInputSchema,
  type CommitDescriptor,
} from '@commit-planner/contracts';
import type { ZodIssue } from 'zod';
import { MalformedDescriptorError } from '../errors';

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate each descriptor; the first invalid one is reported with its index
 */
export function validateDescriptors(input: readonly unknown[]): CommitDescriptor[] {
  return input.map((item, index) => {
    const result = CommitDescriptorSchema.safeParse(item);
    if (!result.success) {
      throw new MalformedDescriptorError(index, result.error.issues.map(formatIssue));
    }
    return result.data;
  });
}

/**
 * Read descriptors from parsed JSON: either an array or `{ suggestions: [...] }`
 *
 * @throws MalformedDescriptorError when the shape is wrong or the list is empty
 */
export function loadDescriptors(data: unknown): CommitDescriptor[] {
  const parsed = DescriptorInputSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedDescriptorError(undefined, [
      'expected an array of commit descriptors or { "suggestions": [...] }',
    ]);
  }
  const items = Array.isArray(parsed.data) ? parsed.data : parsed.data.suggestions;
  if (items.length === 0) {
    throw new MalformedDescriptorError(undefined, ['no commit suggestions provided']);
  }
  return validateDescriptors(items);
}
