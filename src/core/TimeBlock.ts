/**
 * TimeBlock - (day, period) coordinates on the canonical period scale
 */

import { TIME_PERIODS, type TimePeriod } from '../config/constants.js';
import { InvalidPeriodError, ValidationError } from './errors.js';
import type { TimeBlock } from '../types/index.js';

export function isTimePeriod(period: string): period is TimePeriod {
  return (TIME_PERIODS as readonly string[]).includes(period);
}

/**
 * Position of a period in the day, -1 when not canonical
 */
export function periodIndex(period: string): number {
  return (TIME_PERIODS as readonly string[]).indexOf(period);
}

/**
 * @throws InvalidPeriodError if the period is not canonical
 * @throws ValidationError if day is not a positive integer
 */
export function createTimeBlock(day: number, period: string): TimeBlock {
  if (!isTimePeriod(period)) {
    throw new InvalidPeriodError(period);
  }
  if (!Number.isInteger(day) || day < 1) {
    throw new ValidationError(`Day must be a positive integer, got ${day}`, 'day');
  }
  return Object.freeze({ day, period });
}

export function compareTimeBlocks(a: TimeBlock, b: TimeBlock): number {
  if (a.day !== b.day) {
    return a.day - b.day;
  }
  return periodIndex(a.period) - periodIndex(b.period);
}

export function timeBlocksEqual(a: TimeBlock, b: TimeBlock): boolean {
  return a.day === b.day && a.period === b.period;
}

/**
 * "Day 1 - early_evening"
 */
export function formatTimeBlock(block: TimeBlock): string {
  return `Day ${block.day} - ${block.period}`;
}
