/**
 * Tests for zod issue helpers
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { firstIssue, formatIssuePath, valueAtPath } from '../../src/utils/issues.js';

describe('formatIssuePath', () => {
  it('should render indices in brackets', () => {
    expect(formatIssuePath(['facts', 2, 'value'], 'scenario')).toBe('facts[2].value');
    expect(formatIssuePath(['npcs', 0, 'traits', 1, 'name'], 'scenario')).toBe('npcs[0].traits[1].name');
  });

  it('should use the root label for an empty path', () => {
    expect(formatIssuePath([], 'config')).toBe('config');
  });
});

describe('valueAtPath', () => {
  const doc = { logging: { level: 'loud' }, locations: ['Hall', 7] };

  it('should walk objects and arrays', () => {
    expect(valueAtPath(doc, ['logging', 'level'])).toBe('loud');
    expect(valueAtPath(doc, ['locations', 1])).toBe(7);
    expect(valueAtPath(doc, [])).toBe(doc);
  });

  it('should return undefined past the end of the input', () => {
    expect(valueAtPath(doc, ['logging', 'level', 'deeper'])).toBeUndefined();
    expect(valueAtPath(doc, ['missing', 'key'])).toBeUndefined();
  });
});

describe('firstIssue', () => {
  it('should return the first reported issue', () => {
    const result = z.object({ a: z.string(), b: z.number() }).safeParse({ a: 1, b: 'x' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(firstIssue(result.error)?.path).toEqual(['a']);
    }
  });
});
