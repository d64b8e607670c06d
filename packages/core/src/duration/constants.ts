/**
 * Fixed unit conversions for relative durations.
 *
 * Calendar units are approximations: a year is 365 days plus 6 hours of
 * leap compensation, a month is 365.25 / 12 days.
 */

export const MS_PER_SECOND = 1000;

export const MS_PER_MINUTE = 60 * MS_PER_SECOND;

export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

export const MS_PER_DAY = 24 * MS_PER_HOUR;

export const MS_PER_WEEK = 7 * MS_PER_DAY;

/**
 * Days in a duration year, before leap compensation.
 */
export const DAYS_PER_YEAR = 365;

/**
 * Added once per year, for positive year counts only.
 */
export const LEAP_COMPENSATION_MS = 6 * MS_PER_HOUR;

/**
 * Average month: round(86 400 000 × 365.25 / 12) = 2 629 800 000 ms.
 */
export const MS_PER_MONTH = Math.round((MS_PER_DAY * 365.25) / 12);

/**
 * Largest count a unit may carry (signed 64-bit maximum).
 */
export const MAX_UNIT_COUNT = 9223372036854775807n;
