/**
 * Absolute date-time expression types.
 */

import type { UtcOffset } from '../zones/types.js';

/**
 * Semantic order of the three leading date segments.
 */
export type DateSegmentOrder = 'YMD' | 'MDY' | 'DMY';

export const DEFAULT_DATE_SEGMENT_ORDER: DateSegmentOrder = 'YMD';

/**
 * Zone an absolute expression was written in.
 */
export type AbsoluteZone =
  | { readonly kind: 'utc' }
  | { readonly kind: 'abbreviation'; readonly abbreviation: string; readonly offset: UtcOffset };

/**
 * Calendar fields as written, before timezone resolution.
 * Month and day are 1-based. Missing time parts are 0.
 */
export interface AbsoluteFields {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly zone: AbsoluteZone;
}
