import { describe, it, expect } from 'vitest';
import { clockHandAngles, renderClock } from './clock.js';

describe('clockHandAngles', () => {
  it('places the hands for the UTC time', () => {
    expect(clockHandAngles(new Date('2024-01-01T03:30:00.000Z'))).toEqual({ hour: 105, minute: 180, second: 0 });
  });

  it('uses a twelve hour dial', () => {
    expect(clockHandAngles(new Date('2024-01-01T15:30:00.000Z'))).toEqual(
      clockHandAngles(new Date('2024-01-01T03:30:00.000Z')),
    );
  });

  it('moves the minute hand with the seconds', () => {
    expect(clockHandAngles(new Date('2024-01-01T00:10:30.000Z')).minute).toBe(63);
  });
});

describe('renderClock', () => {
  it('draws the minute hand pointing down at half past', () => {
    const lines = renderClock(new Date('2024-01-01T03:30:00.000Z')).split('\n');
    expect(lines).toContain(
      '  <line x1="32" y1="32" x2="32" y2="56" stroke="#f9fafb" stroke-width="2" stroke-linecap="round"/>',
    );
  });

  it('draws the second hand pointing up on the minute', () => {
    const lines = renderClock(new Date('2024-01-01T03:30:00.000Z')).split('\n');
    expect(lines).toContain(
      '  <line x1="32" y1="32" x2="32" y2="6" stroke="#ef4444" stroke-width="1" stroke-linecap="round"/>',
    );
  });

  it('draws twelve ticks', () => {
    const svg = renderClock(new Date('2024-01-01T00:00:00.000Z'));
    expect(svg.match(/stroke="#9ca3af"/g)).toHaveLength(12);
  });
});
