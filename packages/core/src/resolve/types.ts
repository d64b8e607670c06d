/**
 * Resolver output types.
 */

import type { UtcOffset } from '../zones/types.js';

/**
 * How a resolved instant should be displayed downstream.
 */
export type DisplayIntent = 'relative' | 'absolute' | 'clock';

/**
 * A normalized instant plus what the renderer needs to display it.
 * Created once per request and discarded after rendering.
 */
export interface ResolvedInstant {
  /** Point on the UTC timeline */
  readonly instant: Date;
  /** Offset the expression was written in (0 unless it named a zone) */
  readonly sourceOffset: UtcOffset;
  /** Abbreviation the expression named, or "UTC" */
  readonly zoneName: string;
  readonly displayIntent: DisplayIntent;
}
