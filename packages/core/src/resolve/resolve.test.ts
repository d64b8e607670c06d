import { describe, it, expect } from 'vitest';
import { buildAbbreviationTable, parseAbbreviationSource } from '../zones/abbreviations.js';
import { createResolverContext, type ResolverContext } from './context.js';
import { resolveClock, resolveExpression } from './resolve.js';
import type { ResolvedInstant } from './types.js';

const NOW = new Date('2024-01-01T00:00:00.000Z');

const abbreviations = buildAbbreviationTable(
  parseAbbreviationSource(
    ['CST\tCentral Standard Time (North America)\tUTC−06', 'JST\tJapan Standard Time\tUTC+09'].join('\n'),
  ),
);

function contextWith(config: unknown = {}): ResolverContext {
  return createResolverContext({ abbreviations, config, now: () => NOW });
}

const context = contextWith();

function resolved(raw: string, ctx: ResolverContext = context): ResolvedInstant {
  const result = resolveExpression(raw, ctx);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

function rejected(raw: string, ctx: ResolverContext = context) {
  const result = resolveExpression(raw, ctx);
  if (result.success) {
    throw new Error(`expected "${raw}" to be rejected`);
  }
  return result.error;
}

describe('resolveExpression', () => {
  describe('relative expressions', () => {
    it('treats a signed integer as seconds from now', () => {
      expect(resolved('+3600')).toEqual({
        instant: new Date('2024-01-01T01:00:00.000Z'),
        sourceOffset: 0,
        zoneName: 'UTC',
        displayIntent: 'relative',
      });
      expect(resolved('-60').instant.toISOString()).toBe('2023-12-31T23:59:00.000Z');
    });

    it('falls back to a duration', () => {
      expect(resolved('+1d').instant.toISOString()).toBe('2024-01-02T00:00:00.000Z');
      expect(resolved('-1h30m').instant.toISOString()).toBe('2023-12-31T22:30:00.000Z');
      expect(resolved('+1y').instant.toISOString()).toBe('2024-12-31T06:00:00.000Z');
      expect(resolved('+1d').displayIntent).toBe('relative');
    });

    it('wraps duration errors and keeps their kind', () => {
      const error = rejected('+1x');
      expect(error.kind).toBe('malformed');
      expect(error.message).toBe('Could not parse relative time: +1x (Invalid duration "+1x": unknown unit "x")');

      expect(rejected('+1d2y').kind).toBe('unit-order');
    });

    it('rejects a bare sign', () => {
      expect(rejected('+').message).toBe(
        'Could not parse relative time: + (Invalid duration "+": expected at least one unit after the sign)',
      );
    });

    it('rejects offsets beyond the Date range', () => {
      const error = rejected('+99999999999999999');
      expect(error.kind).toBe('out-of-range');
      expect(error.message).toBe('Invalid timestamp: "+99999999999999999" is outside the supported range');
    });

    it('samples the clock on every call', () => {
      let calls = 0;
      const ticking = createResolverContext({
        abbreviations,
        now: () => new Date(NOW.getTime() + 1000 * calls++),
      });
      expect(resolved('+0', ticking).instant.toISOString()).toBe('2024-01-01T00:00:00.000Z');
      expect(resolved('+0', ticking).instant.toISOString()).toBe('2024-01-01T00:00:01.000Z');
    });
  });

  describe('epoch expressions', () => {
    it('reads digits as Unix seconds', () => {
      expect(resolved('1700000000')).toEqual({
        instant: new Date('2023-11-14T22:13:20.000Z'),
        sourceOffset: 0,
        zoneName: 'UTC',
        displayIntent: 'absolute',
      });
      expect(resolved('0').instant.toISOString()).toBe('1970-01-01T00:00:00.000Z');
    });

    it('does not depend on the clock', () => {
      const later = createResolverContext({ abbreviations, now: () => new Date('2030-01-01T00:00:00.000Z') });
      expect(resolved('1700000000', later)).toEqual(resolved('1700000000'));
    });

    it('rejects epochs beyond the Date range', () => {
      expect(rejected('99999999999999999').kind).toBe('out-of-range');
    });
  });

  describe('absolute expressions', () => {
    it('resolves a date in UTC', () => {
      expect(resolved('2023-06-14-3')).toEqual({
        instant: new Date('2023-06-14T03:00:00.000Z'),
        sourceOffset: 0,
        zoneName: 'UTC',
        displayIntent: 'absolute',
      });
    });

    it('carries the named zone through', () => {
      expect(resolved('2023.06.14.15-45-30,123-CST')).toEqual({
        instant: new Date('2023-06-14T21:45:30.000Z'),
        sourceOffset: -21600,
        zoneName: 'CST',
        displayIntent: 'absolute',
      });
    });

    it('uses the configured date segment order', () => {
      const dmy = contextWith({ dateSegmentOrder: 'DMY' });
      expect(resolved('14-06-2023 9:00 JST', dmy).instant.toISOString()).toBe('2023-06-14T00:00:00.000Z');
    });

    it('returns parse failures', () => {
      expect(rejected('2023-06-14 XYZ').kind).toBe('unknown-abbreviation');
      expect(rejected('2023-02-30').kind).toBe('invalid-date');
      expect(rejected('not a date').kind).toBe('malformed');
    });
  });

  describe('strict mode', () => {
    it('does not trim input', () => {
      expect(rejected(' +3600').kind).toBe('malformed');
      expect(rejected('2023-06-14 cst').kind).toBe('unknown-abbreviation');
    });

    it('trims input and upper-cases zones when disabled', () => {
      const lenient = contextWith({ strict: false });
      expect(resolved(' +3600 ', lenient).instant.toISOString()).toBe('2024-01-01T01:00:00.000Z');
      expect(resolved('2023-06-14 15:00 cst', lenient).zoneName).toBe('CST');
    });
  });
});

describe('resolveClock', () => {
  it('returns the current instant for clock display', () => {
    expect(resolveClock(context)).toEqual({
      instant: NOW,
      sourceOffset: 0,
      zoneName: 'UTC',
      displayIntent: 'clock',
    });
  });
});
