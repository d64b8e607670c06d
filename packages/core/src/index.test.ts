import { describe, it, expect } from 'vitest';
import * as core from './index.js';

describe('core package', () => {
  it('exports the resolver entry points', () => {
    expect(typeof core.resolveExpression).toBe('function');
    expect(typeof core.resolveClock).toBe('function');
    expect(typeof core.loadAbbreviationTable).toBe('function');
  });

  it('exports the individual parsers', () => {
    expect(typeof core.parseUtcOffset).toBe('function');
    expect(typeof core.parseDuration).toBe('function');
    expect(typeof core.parseAbsoluteFields).toBe('function');
  });
});
