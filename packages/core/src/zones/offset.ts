import { parseFail, parseOk, type ParseResult } from '../errors/parseError.js';
import { createUtcOffset, type UtcOffset } from './types.js';

/**
 * Sign, hours, optional minutes. U+2212 is accepted alongside ASCII '-'
 * because the reference dataset writes west offsets with it.
 */
const OFFSET_PATTERN = /^([+\-−±])(\d{1,2})?(?::(\d{2}))?$/;

/**
 * Parses a UTC offset token such as "+05:30", "-08", "−03:30" or "±00".
 *
 * '±' marks a zero or variable offset and always yields 0, whatever digits
 * follow it.
 *
 * @param token - Offset token without the "UTC" prefix
 * @returns Signed seconds east of UTC
 *
 * @example
 * parseUtcOffset('+05:30') // { success: true, data: 19800 }
 * parseUtcOffset('-06')    // { success: true, data: -21600 }
 * parseUtcOffset('±12')    // { success: true, data: 0 }
 */
export function parseUtcOffset(token: string): ParseResult<UtcOffset> {
  const match = OFFSET_PATTERN.exec(token);
  if (match === null) {
    return parseFail(
      'malformed',
      `Invalid UTC offset "${token}": expected [+|-|±]HH[:MM]`,
    );
  }

  const [, sign, rawHours, rawMinutes] = match;
  if (sign === '±') {
    return parseOk(createUtcOffset(0));
  }

  if (rawHours === undefined) {
    return parseFail('malformed', `Invalid UTC offset "${token}": missing hours`);
  }

  const hours = parseInt(rawHours, 10);
  const minutes = rawMinutes === undefined ? 0 : parseInt(rawMinutes, 10);

  if (hours > 23) {
    return parseFail('out-of-range', `Invalid UTC offset "${token}": hours must be in [0, 23], got ${hours}`);
  }
  if (minutes > 59) {
    return parseFail('out-of-range', `Invalid UTC offset "${token}": minutes must be in [0, 59], got ${minutes}`);
  }

  const magnitude = hours * 3600 + minutes * 60;
  return parseOk(createUtcOffset(sign === '+' || magnitude === 0 ? magnitude : -magnitude));
}

/**
 * Formats an offset as "+HH:MM" / "-HH:MM".
 *
 * @example
 * formatUtcOffset(-21600) // "-06:00"
 * formatUtcOffset(0)      // "+00:00"
 */
export function formatUtcOffset(offset: UtcOffset): string {
  const sign = offset < 0 ? '-' : '+';
  const magnitude = Math.abs(offset);
  const hours = Math.floor(magnitude / 3600);
  const minutes = Math.floor((magnitude % 3600) / 60);
  return `${sign}${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}
