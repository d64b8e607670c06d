import { parseFail, parseOk, type ParseResult } from '../errors/parseError.js';
import { lookupAbbreviation, type AbbreviationTable } from '../zones/abbreviations.js';
import { toUtcInstant } from './civil.js';
import { isSegmentSeparator } from './separators.js';
import {
  DEFAULT_DATE_SEGMENT_ORDER,
  type AbsoluteFields,
  type AbsoluteZone,
  type DateSegmentOrder,
} from './types.js';

export interface AbsoluteParseOptions {
  /** Table used to resolve a trailing zone abbreviation */
  abbreviations: AbbreviationTable;
  /** Order of the three date segments (default YMD) */
  dateSegmentOrder?: DateSegmentOrder;
  /**
   * When false, the zone token is upper-cased before lookup.
   * The lookup itself stays case-sensitive.
   */
  strict?: boolean;
}

/**
 * Maximum number of time sub-segments: hour, minute, second, fraction.
 */
const MAX_TIME_SEGMENTS = 4;

const MIN_ZONE_LENGTH = 2;
const MAX_ZONE_LENGTH = 5;

interface Segment {
  readonly kind: 'number' | 'word';
  readonly text: string;
}

type DateField = 'year' | 'month' | 'day';

const DATE_SEGMENT_NAMES: Record<DateSegmentOrder, readonly DateField[]> = {
  YMD: ['year', 'month', 'day'],
  MDY: ['month', 'day', 'year'],
  DMY: ['day', 'month', 'year'],
};

const TIME_SEGMENT_NAMES = ['hour', 'minute', 'second', 'fraction'] as const;

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isLetter(char: string): boolean {
  return /^[A-Za-z]$/.test(char);
}

/**
 * Splits text into digit runs and letter runs, dropping separators.
 * Only a single letter run is allowed, and only at the end.
 */
function splitSegments(text: string): ParseResult<Segment[]> {
  const segments: Segment[] = [];
  let pos = 0;

  if (text.length > 0 && isSegmentSeparator(text[0])) {
    return parseFail('malformed', `Invalid date "${text}": expected a digit at the start`);
  }

  while (pos < text.length) {
    const char = text[pos];

    if (isSegmentSeparator(char)) {
      pos++;
      continue;
    }

    const start = pos;
    if (isDigit(char)) {
      while (pos < text.length && isDigit(text[pos])) {
        pos++;
      }
      segments.push({ kind: 'number', text: text.slice(start, pos) });
      continue;
    }

    if (isLetter(char)) {
      while (pos < text.length && isLetter(text[pos])) {
        pos++;
      }
      if (pos < text.length) {
        return parseFail(
          'malformed',
          `Invalid date "${text}": unexpected "${text.slice(start)}"; a timezone abbreviation may only appear at the end`,
        );
      }
      segments.push({ kind: 'word', text: text.slice(start, pos) });
      continue;
    }

    return parseFail('malformed', `Invalid date "${text}": unexpected character "${char}" at position ${pos}`);
  }

  return parseOk(segments);
}

/**
 * Converts a digit run to an integer.
 */
function toInteger(name: string, raw: string): ParseResult<number> {
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    return parseFail('out-of-range', `Could not parse ${name} from ${raw}: number too large`);
  }
  return parseOk(value);
}

function resolveZone(token: string | undefined, options: AbsoluteParseOptions): ParseResult<AbsoluteZone> {
  if (token === undefined) {
    return parseOk<AbsoluteZone>({ kind: 'utc' });
  }
  if (token.length < MIN_ZONE_LENGTH || token.length > MAX_ZONE_LENGTH) {
    return parseFail(
      'malformed',
      `Invalid timezone "${token}": expected an abbreviation of ${MIN_ZONE_LENGTH}-${MAX_ZONE_LENGTH} letters`,
    );
  }

  const abbreviation = options.strict === false ? token.toUpperCase() : token;
  const offset = lookupAbbreviation(options.abbreviations, abbreviation);
  if (!offset.success) {
    return offset;
  }
  return parseOk<AbsoluteZone>({ kind: 'abbreviation', abbreviation, offset: offset.data });
}

/**
 * Parses an absolute expression into calendar fields.
 *
 * Shape: three date segments, then up to hour, minute, second and a
 * discarded fraction, then an optional 2-5 letter zone abbreviation. Segments
 * are separated by any run of space, '-', '.', ',' or ':'; the zone may
 * follow the last number directly.
 *
 * @example
 * parseAbsoluteFields('2023-06-14-3', { abbreviations })
 * // { year: 2023, month: 6, day: 14, hour: 3, minute: 0, second: 0, zone: { kind: 'utc' } }
 * parseAbsoluteFields('2023.06.14.15-45-30,123-CST', { abbreviations })
 * // 15:45:30 with zone CST (-21600); ",123" is dropped
 */
export function parseAbsoluteFields(
  text: string,
  options: AbsoluteParseOptions,
): ParseResult<AbsoluteFields> {
  const split = splitSegments(text);
  if (!split.success) {
    return split;
  }

  const segments = split.data;
  const last = segments[segments.length - 1];
  const zoneToken = last !== undefined && last.kind === 'word' ? last.text : undefined;
  const numbers = segments.filter((segment) => segment.kind === 'number').map((segment) => segment.text);

  const order = options.dateSegmentOrder ?? DEFAULT_DATE_SEGMENT_ORDER;
  if (numbers.length < 3) {
    return parseFail(
      'malformed',
      `Invalid date "${text}": expected three date segments in ${order} order, got ${numbers.length}`,
    );
  }

  const timeSegments = numbers.slice(3);
  if (timeSegments.length > MAX_TIME_SEGMENTS) {
    return parseFail(
      'too-many-segments',
      `Invalid date "${text}": too many segments in time "${timeSegments.join(':')}"; expected at most hour, minute, second and fraction`,
    );
  }

  const date = { year: 0, month: 0, day: 0 };
  const names = DATE_SEGMENT_NAMES[order];
  for (let i = 0; i < 3; i++) {
    const value = toInteger(names[i], numbers[i]);
    if (!value.success) {
      return value;
    }
    date[names[i]] = value.data;
  }

  const time = { hour: 0, minute: 0, second: 0 };
  for (let i = 0; i < timeSegments.length; i++) {
    const name = TIME_SEGMENT_NAMES[i];
    const value = toInteger(name, timeSegments[i]);
    if (!value.success) {
      return value;
    }
    // The fraction is validated, then dropped
    if (name !== 'fraction') {
      time[name] = value.data;
    }
  }

  const zone = resolveZone(zoneToken, options);
  if (!zone.success) {
    return zone;
  }

  return parseOk({ ...date, ...time, zone: zone.data });
}

/**
 * Parses an absolute expression all the way to a UTC instant.
 */
export function parseAbsolute(
  text: string,
  options: AbsoluteParseOptions,
): ParseResult<{ fields: AbsoluteFields; instant: Date }> {
  const fields = parseAbsoluteFields(text, options);
  if (!fields.success) {
    return fields;
  }

  const instant = toUtcInstant(fields.data);
  if (!instant.success) {
    return instant;
  }
  return parseOk({ fields: fields.data, instant: instant.data });
}
