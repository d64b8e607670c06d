import { parseFail, parseOk, type ParseResult } from '../errors/parseError.js';
import { MAX_UNIT_COUNT } from './constants.js';
import { DURATION_UNITS, type DurationUnitDefinition } from './units.js';

/**
 * Signed elapsed time in milliseconds.
 */
export type DurationMs = number & { readonly __brand: 'DurationMs' };

/**
 * Creates a DurationMs, throwing if the value is not a safe integer.
 */
export function createDurationMs(value: number): DurationMs {
  if (!Number.isSafeInteger(value)) {
    throw new Error(`DurationMs must be a safe integer, got ${value}`);
  }
  return value as DurationMs;
}

export const ZERO_DURATION = createDurationMs(0);

/**
 * Spelling → (rank, definition). Rank is the position in DURATION_UNITS.
 */
const UNITS_BY_SPELLING = new Map<string, { rank: number; definition: DurationUnitDefinition }>(
  DURATION_UNITS.flatMap((definition, rank) =>
    definition.spellings.map((spelling) => [spelling, { rank, definition }] as const),
  ),
);

const UNIT_ORDER = DURATION_UNITS.map((definition) => `${definition.unit}s`).join(', ');

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

function isLetter(char: string | undefined): boolean {
  return char !== undefined && /^[A-Za-z]$/.test(char);
}

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /^\s$/.test(char);
}

/**
 * Parses a relative duration such as "1y2mon3w4d5h6m7s", "+1year" or "-3h 30m".
 *
 * Grammar: `[sign] (count [ws] unit ws*)*`, where the unit groups (years,
 * months, weeks, days, hours, minutes, seconds) are each optional but must
 * appear in that order, at most once. The sign applies to the whole sum,
 * once, after every unit has been added.
 *
 * @param text - Duration text; empty or whitespace-only means zero
 * @returns Signed milliseconds, or the reason the text was rejected. Nothing
 *          partial is ever returned.
 *
 * @example
 * parseDuration('1y')     // 365 days + 6 hours
 * parseDuration('-14mon') // -14 × 2 629 800 000 ms
 * parseDuration('1d2y')   // fails: units out of order
 */
export function parseDuration(text: string): ParseResult<DurationMs> {
  if (text.trim() === '') {
    return parseOk(ZERO_DURATION);
  }

  let pos = 0;
  let sign: '+' | '-' = '+';
  if (text[pos] === '+' || text[pos] === '-') {
    sign = text[pos] === '-' ? '-' : '+';
    pos++;
  }

  if (pos === text.length) {
    return parseFail('malformed', `Invalid duration "${text}": expected at least one unit after the sign`);
  }

  let total = 0;
  let lastRank = -1;

  while (pos < text.length) {
    const countStart = pos;
    while (isDigit(text[pos])) {
      pos++;
    }
    if (countStart === pos) {
      return parseFail(
        'malformed',
        `Invalid duration "${text}": expected a number at "${text.slice(pos)}"`,
      );
    }
    const rawCount = text.slice(countStart, pos);

    // A single space may separate the count from its unit
    if (isWhitespace(text[pos])) {
      pos++;
    }

    const unitStart = pos;
    while (isLetter(text[pos])) {
      pos++;
    }
    const spelling = text.slice(unitStart, pos);
    if (spelling === '') {
      return parseFail('malformed', `Invalid duration "${text}": expected a unit after "${rawCount}"`);
    }

    const unit = UNITS_BY_SPELLING.get(spelling);
    if (unit === undefined) {
      return parseFail('malformed', `Invalid duration "${text}": unknown unit "${spelling}"`);
    }
    if (unit.rank <= lastRank) {
      return parseFail(
        'unit-order',
        `Invalid duration "${text}": "${rawCount}${spelling}" is out of order; units must appear at most once, in the order ${UNIT_ORDER}`,
      );
    }
    lastRank = unit.rank;

    if (BigInt(rawCount) > MAX_UNIT_COUNT) {
      return parseFail(
        'out-of-range',
        `Could not parse ${unit.definition.unit} from ${rawCount}: number too large`,
      );
    }

    const ms = unit.definition.toMs(Number(rawCount));
    total += ms;
    if (!Number.isSafeInteger(ms) || !Number.isSafeInteger(total)) {
      return parseFail('out-of-range', `Invalid duration "${text}": ${unit.definition.unit} count ${rawCount} is too large`);
    }

    while (isWhitespace(text[pos])) {
      pos++;
    }
  }

  return parseOk(createDurationMs(sign === '-' && total !== 0 ? -total : total));
}
