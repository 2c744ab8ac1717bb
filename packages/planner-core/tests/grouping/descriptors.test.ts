/**
 * Tests for descriptors.ts - validating caller-supplied commit descriptors
 */

import { describe, it, expect } from 'vitest';
import { loadDescriptors, validateDescriptors } from '../../src/grouping/descriptors';
import { MalformedDescriptorError } from '../../src/errors';

const valid = { type: 'feat', scope: 'auth', files: ['src/auth/token.ts'], subject: 'add token issuer' };

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('validateDescriptors', () => {
  it('should return valid descriptors unchanged', () => {
    expect(validateDescriptors([valid])).toEqual([valid]);
  });

  it('should name the index and field of an empty file list', () => {
    const error = captureError(() => validateDescriptors([valid, { type: 'fix', files: [], subject: 'x' }]));

    expect(error).toBeInstanceOf(MalformedDescriptorError);
    expect(error).toMatchObject({
      index: 1,
      issues: ['files: Array must contain at least 1 element(s)'],
      exitCode: 1,
    });
  });

  it('should reject a null scope', () => {
    const error = captureError(() => validateDescriptors([{ ...valid, scope: null }]));
    expect(error).toMatchObject({ index: 0, issues: ['scope: Expected string, received null'] });
  });

  it('should reject unknown types', () => {
    const error = captureError(() => validateDescriptors([{ ...valid, type: 'wip' }]));
    expect(error).toBeInstanceOf(MalformedDescriptorError);
    expect(error).toMatchObject({ index: 0 });
  });
});

describe('loadDescriptors', () => {
  it('should accept a suggestions object or a bare array', () => {
    expect(loadDescriptors({ suggestions: [valid] })).toEqual([valid]);
    expect(loadDescriptors([valid])).toEqual([valid]);
  });

  it('should reject other shapes without an index', () => {
    const error = captureError(() => loadDescriptors({ commits: [valid] }));
    expect(error).toBeInstanceOf(MalformedDescriptorError);
    expect(error).toMatchObject({ index: undefined });
  });

  it('should reject an empty suggestion list', () => {
    for (const input of [[], { suggestions: [] }]) {
      const error = captureError(() => loadDescriptors(input));
      expect(error).toBeInstanceOf(MalformedDescriptorError);
      expect(error).toMatchObject({
        index: undefined,
        issues: ['no commit suggestions provided'],
        message: 'Malformed commit descriptors: no commit suggestions provided',
      });
    }
  });
});
