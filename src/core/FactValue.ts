/**
 * FactValue helpers
 *
 * Claims arrive as text, so comparison against stored values goes through
 * one canonical rendering per variant.
 */

import type { FactValue, FactValueInput } from '../types/index.js';

export function toFactValue(input: FactValueInput): FactValue {
  switch (typeof input) {
    case 'string':
      return { kind: 'string', value: input };
    case 'number':
      return { kind: 'number', value: input };
    case 'boolean':
      return { kind: 'boolean', value: input };
    default:
      return input;
  }
}

export function reference(ref: string): FactValue {
  return { kind: 'reference', ref };
}

export function formatFactValue(value: FactValue): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'number':
      return String(value.value);
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'reference':
      return value.ref;
  }
}

/**
 * Case-insensitive comparison of a stored value against claimed text
 */
export function factValueMatches(value: FactValue, claimed: string): boolean {
  return formatFactValue(value).toLowerCase() === claimed.toLowerCase();
}
