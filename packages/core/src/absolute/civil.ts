import { parseFail, parseOk, type ParseResult } from '../errors/parseError.js';
import { UTC_OFFSET } from '../zones/types.js';
import type { AbsoluteFields } from './types.js';

/**
 * Largest distance from the epoch a JavaScript Date can represent.
 */
const MAX_DATE_MS = 8.64e15;

/**
 * Returns true if the year is a Gregorian leap year.
 */
export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Days in a 1-based month of the given year.
 */
export function daysInMonth(year: number, month: number): number {
  const days = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return days[month - 1];
}

/**
 * Converts calendar fields in their zone to a UTC instant.
 *
 * @returns The instant, or an `invalid-date` error for impossible fields
 *          (month 13, day 32, February 29 in a common year, hour 24, ...)
 *
 * @example
 * toUtcInstant({ year: 2023, month: 6, day: 14, hour: 3, minute: 0, second: 0, zone: { kind: 'utc' } })
 * // 2023-06-14T03:00:00.000Z
 */
export function toUtcInstant(fields: AbsoluteFields): ParseResult<Date> {
  const { year, month, day, hour, minute, second } = fields;

  if (month < 1 || month > 12) {
    return parseFail('invalid-date', `Invalid date: month ${month} is not in [1, 12]`);
  }
  const monthDays = daysInMonth(year, month);
  if (day < 1 || day > monthDays) {
    return parseFail(
      'invalid-date',
      `Invalid date: day ${day} is not in [1, ${monthDays}] for ${year}-${String(month).padStart(2, '0')}`,
    );
  }
  if (hour > 23) {
    return parseFail('invalid-date', `Invalid time: hour ${hour} is not in [0, 23]`);
  }
  if (minute > 59) {
    return parseFail('invalid-date', `Invalid time: minute ${minute} is not in [0, 59]`);
  }
  if (second > 59) {
    return parseFail('invalid-date', `Invalid time: second ${second} is not in [0, 59]`);
  }

  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const civil = new Date(0);
  civil.setUTCFullYear(year, month - 1, day);
  civil.setUTCHours(hour, minute, second, 0);

  const offset = fields.zone.kind === 'abbreviation' ? fields.zone.offset : UTC_OFFSET;
  const ms = civil.getTime() - offset * 1000;
  if (Number.isNaN(ms) || Math.abs(ms) > MAX_DATE_MS) {
    return parseFail('invalid-date', `Invalid date: year ${year} is outside the supported range`);
  }

  return parseOk(new Date(ms));
}
