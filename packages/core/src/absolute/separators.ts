/**
 * Characters that may separate date and time segments.
 */
export const SEGMENT_SEPARATORS: readonly string[] = [' ', '-', '.', ',', ':'];

export function isSegmentSeparator(char: string): boolean {
  return SEGMENT_SEPARATORS.includes(char);
}
