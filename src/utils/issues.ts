/**
 * Rendering of zod issues for error messages and field names
 */

import type { ZodError, ZodIssue } from 'zod';

/**
 * Dotted path with array indices in brackets: ['facts', 2, 'value'] -> "facts[2].value".
 * An empty path renders as the root label.
 */
export function formatIssuePath(path: readonly (string | number)[], root: string): string {
  if (path.length === 0) return root;

  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out.length === 0 ? segment : `.${segment}`;
    }
  }
  return out;
}

/**
 * The value found at an issue path in the input that was parsed
 */
export function valueAtPath(input: unknown, path: readonly (string | number)[]): unknown {
  let current: unknown = input;
  for (const segment of path) {
    if (Array.isArray(current) && typeof segment === 'number') {
      current = current[segment];
    } else if (typeof current === 'object' && current !== null && typeof segment === 'string') {
      current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    } else {
      return undefined;
    }
  }
  return current;
}

export function firstIssue(error: ZodError): ZodIssue | undefined {
  return error.issues[0];
}
