import {
  DAYS_PER_YEAR,
  LEAP_COMPENSATION_MS,
  MS_PER_DAY,
  MS_PER_HOUR,
  MS_PER_MINUTE,
  MS_PER_MONTH,
  MS_PER_SECOND,
  MS_PER_WEEK,
} from './constants.js';

/**
 * Unit groups, largest first.
 */
export type DurationUnit = 'year' | 'month' | 'week' | 'day' | 'hour' | 'minute' | 'second';

export interface DurationUnitDefinition {
  readonly unit: DurationUnit;
  /** Accepted spellings, matched case-sensitively */
  readonly spellings: readonly string[];
  /** Converts a count of this unit to milliseconds */
  readonly toMs: (count: number) => number;
}

/**
 * Converts a year count to milliseconds.
 *
 * Leap compensation (6 hours per year) applies only when the count is
 * positive. Negative counts get plain 365-day years.
 *
 * @example
 * yearsToMs(1)  // 365 days + 6 hours
 * yearsToMs(-1) // -365 days
 */
export function yearsToMs(count: number): number {
  const days = count * DAYS_PER_YEAR * MS_PER_DAY;
  return count > 0 ? days + count * LEAP_COMPENSATION_MS : days;
}

/**
 * Converts a month count to milliseconds using the 365.25 / 12 day average.
 */
export function monthsToMs(count: number): number {
  return count * MS_PER_MONTH;
}

/**
 * Unit table in the only order units may appear.
 */
export const DURATION_UNITS: readonly DurationUnitDefinition[] = [
  { unit: 'year', spellings: ['y', 'yr', 'yrs', 'year', 'years'], toMs: yearsToMs },
  { unit: 'month', spellings: ['mon', 'month', 'months'], toMs: monthsToMs },
  { unit: 'week', spellings: ['w', 'wk', 'wks', 'week', 'weeks'], toMs: (count) => count * MS_PER_WEEK },
  { unit: 'day', spellings: ['d', 'day', 'days'], toMs: (count) => count * MS_PER_DAY },
  { unit: 'hour', spellings: ['h', 'hr', 'hrs', 'hour', 'hours'], toMs: (count) => count * MS_PER_HOUR },
  {
    unit: 'minute',
    spellings: ['m', 'min', 'mins', 'minute', 'minutes'],
    toMs: (count) => count * MS_PER_MINUTE,
  },
  {
    unit: 'second',
    spellings: ['s', 'sec', 'secs', 'second', 'seconds'],
    toMs: (count) => count * MS_PER_SECOND,
  },
];
