/**
 * Commander option parsers
 *
 * @module cli/options
 */

import { InvalidArgumentError } from 'commander';

/**
 * A scenario day: positive integer
 */
export function parseDay(value: string): number {
  const day = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(day) || day < 1) {
    throw new InvalidArgumentError('Day must be a positive integer.');
  }
  return day;
}

/**
 * Repeatable option: each use appends
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}
