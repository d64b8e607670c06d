/**
 * Banner text for resolved instants.
 */

import { formatDistanceStrict } from 'date-fns';
import { formatUtcOffset, type UtcOffset } from '@time-banner/core';

/**
 * Distance from `now` in words, e.g. "in 1 hour" or "5 minutes ago".
 */
export function formatRelativeText(instant: Date, now: Date): string {
  return formatDistanceStrict(instant, now, { addSuffix: true });
}

/**
 * RFC 3339 timestamp in the given offset, without fractional seconds.
 *
 * @example
 * formatRfc3339(new Date('2023-06-14T21:45:30Z'), -21600) // '2023-06-14T15:45:30-06:00'
 */
export function formatRfc3339(instant: Date, offset: UtcOffset): string {
  const local = new Date(instant.getTime() + offset * 1000);
  return local.toISOString().replace(/\.\d{3}Z$/, formatUtcOffset(offset));
}

/**
 * RFC 3339 timestamp followed by the zone name, e.g. "2023-06-14T15:45:30-06:00 CST".
 */
export function formatAbsoluteText(instant: Date, offset: UtcOffset, zoneName: string): string {
  return `${formatRfc3339(instant, offset)} ${zoneName}`;
}
