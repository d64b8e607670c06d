import { parseAbsolute } from '../absolute/fields.js';
import { parseDuration } from '../duration/duration.js';
import { parseFail, parseOk, type ParseResult } from '../errors/parseError.js';
import { UTC_OFFSET } from '../zones/types.js';
import type { ResolverContext } from './context.js';
import type { ResolvedInstant } from './types.js';

const SIGNED_INTEGER = /^[+-]\d+$/;
const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Largest distance from the epoch a JavaScript Date can represent.
 */
const MAX_DATE_MS = 8.64e15;

const UTC_ZONE_NAME = 'UTC';

function toInstant(ms: number, raw: string): ParseResult<Date> {
  if (!Number.isFinite(ms) || Math.abs(ms) > MAX_DATE_MS) {
    return parseFail('out-of-range', `Invalid timestamp: "${raw}" is outside the supported range`);
  }
  return parseOk(new Date(ms));
}

function asRelative(instant: ParseResult<Date>): ParseResult<ResolvedInstant> {
  if (!instant.success) {
    return instant;
  }
  return parseOk<ResolvedInstant>({
    instant: instant.data,
    sourceOffset: UTC_OFFSET,
    zoneName: UTC_ZONE_NAME,
    displayIntent: 'relative',
  });
}

/**
 * "+3600" (seconds) first, then a duration such as "+1y2d".
 */
function resolveRelative(text: string, context: ResolverContext): ParseResult<ResolvedInstant> {
  const now = context.now().getTime();

  if (SIGNED_INTEGER.test(text)) {
    return asRelative(toInstant(now + Number(text) * 1000, text));
  }

  const duration = parseDuration(text);
  if (!duration.success) {
    return parseFail(
      duration.error.kind,
      `Could not parse relative time: ${text} (${duration.error.message})`,
    );
  }
  return asRelative(toInstant(now + duration.data, text));
}

function resolveEpoch(text: string): ParseResult<ResolvedInstant> {
  const instant = toInstant(Number(text) * 1000, text);
  if (!instant.success) {
    return instant;
  }
  return parseOk<ResolvedInstant>({
    instant: instant.data,
    sourceOffset: UTC_OFFSET,
    zoneName: UTC_ZONE_NAME,
    displayIntent: 'absolute',
  });
}

function resolveAbsolute(text: string, context: ResolverContext): ParseResult<ResolvedInstant> {
  const parsed = parseAbsolute(text, {
    abbreviations: context.abbreviations,
    dateSegmentOrder: context.config.dateSegmentOrder,
    strict: context.config.strict,
  });
  if (!parsed.success) {
    return parsed;
  }

  const { zone } = parsed.data.fields;
  return parseOk<ResolvedInstant>({
    instant: parsed.data.instant,
    sourceOffset: zone.kind === 'abbreviation' ? zone.offset : UTC_OFFSET,
    zoneName: zone.kind === 'abbreviation' ? zone.abbreviation : UTC_ZONE_NAME,
    displayIntent: 'absolute',
  });
}

/**
 * Resolves a temporal expression to a UTC instant.
 *
 * Dispatch, in order:
 * 1. Leading '+' or '-': signed seconds from now, else a duration from now.
 *    Displayed as relative.
 * 2. Only digits: Unix epoch seconds. Displayed as absolute.
 * 3. Anything else: an absolute date-time expression. Displayed as absolute.
 *
 * Failures are returned, never thrown, and never retried.
 *
 * @example
 * resolveExpression('+3600', context)      // now + 1 hour, relative
 * resolveExpression('1700000000', context) // 2023-11-14T22:13:20Z, absolute
 * resolveExpression('2023-06-14-3', context) // 2023-06-14T03:00:00Z, absolute
 */
export function resolveExpression(raw: string, context: ResolverContext): ParseResult<ResolvedInstant> {
  const text = context.config.strict ? raw : raw.trim();

  if (text.startsWith('+') || text.startsWith('-')) {
    return resolveRelative(text, context);
  }
  if (UNSIGNED_INTEGER.test(text)) {
    return resolveEpoch(text);
  }
  return resolveAbsolute(text, context);
}

/**
 * Resolves to the current instant for clock-style rendering (e.g. favicons).
 * Does not look at any input and cannot fail.
 */
export function resolveClock(context: ResolverContext): ResolvedInstant {
  return {
    instant: context.now(),
    sourceOffset: UTC_OFFSET,
    zoneName: UTC_ZONE_NAME,
    displayIntent: 'clock',
  };
}
