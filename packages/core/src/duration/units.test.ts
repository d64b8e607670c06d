import { describe, it, expect } from 'vitest';
import { DURATION_UNITS, monthsToMs, yearsToMs } from './units.js';
import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MONTH } from './constants.js';

describe('yearsToMs', () => {
  it('adds leap compensation for positive counts', () => {
    expect(yearsToMs(1)).toBe(365 * MS_PER_DAY + 6 * MS_PER_HOUR);
    expect(yearsToMs(4)).toBe(4 * 365 * MS_PER_DAY + 24 * MS_PER_HOUR);
  });

  it('adds no leap compensation for zero or negative counts', () => {
    // Asymmetric on purpose: negative years are plain 365-day years
    expect(yearsToMs(0)).toBe(0);
    expect(yearsToMs(-1)).toBe(-365 * MS_PER_DAY);
    expect(yearsToMs(-3)).toBe(-3 * 365 * MS_PER_DAY);
  });
});

describe('monthsToMs', () => {
  it('uses 2 629 800 000 ms per month', () => {
    expect(MS_PER_MONTH).toBe(2_629_800_000);
    expect(monthsToMs(1)).toBe(2_629_800_000);
    expect(monthsToMs(-2)).toBe(-5_259_600_000);
  });
});

describe('DURATION_UNITS', () => {
  it('lists units from largest to smallest', () => {
    expect(DURATION_UNITS.map((definition) => definition.unit)).toEqual([
      'year',
      'month',
      'week',
      'day',
      'hour',
      'minute',
      'second',
    ]);
  });

  it('never gives two units the same spelling', () => {
    const spellings = DURATION_UNITS.flatMap((definition) => definition.spellings);
    expect(new Set(spellings).size).toBe(spellings.length);
  });
});
