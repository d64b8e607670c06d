/**
 * Timezone offset and abbreviation types.
 */

/**
 * Signed displacement from UTC in whole seconds (negative = west of UTC).
 * Magnitude never exceeds 23:59.
 */
export type UtcOffset = number & { readonly __brand: 'UtcOffset' };

/**
 * Largest offset magnitude: 23 hours 59 minutes.
 */
export const MAX_OFFSET_SECONDS = 23 * 3600 + 59 * 60;

/**
 * Type guard to check if a value is a valid UtcOffset.
 */
export function isUtcOffset(value: number): value is UtcOffset {
  return Number.isInteger(value) && Math.abs(value) <= MAX_OFFSET_SECONDS && value % 60 === 0;
}

/**
 * Creates a UtcOffset from a second count, throwing if it is not a whole
 * number of minutes within ±23:59.
 */
export function createUtcOffset(seconds: number): UtcOffset {
  if (!isUtcOffset(seconds)) {
    throw new Error(`UtcOffset must be whole minutes within ±${MAX_OFFSET_SECONDS}s, got ${seconds}`);
  }
  return seconds;
}

/**
 * Offset of UTC itself.
 */
export const UTC_OFFSET: UtcOffset = createUtcOffset(0);

/**
 * One line of the abbreviation reference dataset.
 */
export interface AbbreviationEntry {
  /** Uppercase abbreviation, e.g. "CST" */
  readonly abbreviation: string;
  /** Free-text description, e.g. "Central Standard Time (North America)" */
  readonly label: string;
  readonly offset: UtcOffset;
  /** 1-based line number in the source text */
  readonly line: number;
}
