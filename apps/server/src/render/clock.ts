const SIZE = 64;
const CENTER = SIZE / 2;
const FACE_RADIUS = 30;

const HOUR_HAND_LENGTH = 16;
const MINUTE_HAND_LENGTH = 24;
const SECOND_HAND_LENGTH = 26;

export interface HandAngles {
  hour: number;
  minute: number;
  second: number;
}

/**
 * Clockwise angles from 12 o'clock, in degrees, for the UTC time of an instant.
 *
 * @example
 * clockHandAngles(new Date('2024-01-01T03:30:00Z')) // { hour: 105, minute: 180, second: 0 }
 */
export function clockHandAngles(instant: Date): HandAngles {
  const hours = instant.getUTCHours() % 12;
  const minutes = instant.getUTCMinutes();
  const seconds = instant.getUTCSeconds();

  return {
    hour: hours * 30 + minutes / 2,
    minute: minutes * 6 + seconds / 10,
    second: seconds * 6,
  };
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}

function hand(angle: number, length: number, width: number, color: string): string {
  const radians = (angle * Math.PI) / 180;
  const x = round(CENTER + length * Math.sin(radians));
  const y = round(CENTER - length * Math.cos(radians));
  return `  <line x1="${CENTER}" y1="${CENTER}" x2="${x}" y2="${y}" stroke="${color}" stroke-width="${width}" stroke-linecap="round"/>`;
}

function ticks(): string[] {
  const lines: string[] = [];
  for (let i = 0; i < 12; i++) {
    const radians = (i * 30 * Math.PI) / 180;
    const inner = i % 3 === 0 ? FACE_RADIUS - 6 : FACE_RADIUS - 3;
    lines.push(
      `  <line x1="${round(CENTER + inner * Math.sin(radians))}" y1="${round(CENTER - inner * Math.cos(radians))}" x2="${round(CENTER + FACE_RADIUS * Math.sin(radians))}" y2="${round(CENTER - FACE_RADIUS * Math.cos(radians))}" stroke="#9ca3af" stroke-width="1"/>`,
    );
  }
  return lines;
}

/**
 * Renders an analog clock face showing the UTC time of an instant.
 */
export function renderClock(instant: Date): string {
  const angles = clockHandAngles(instant);
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${SIZE}" height="${SIZE}" viewBox="0 0 ${SIZE} ${SIZE}">`,
    `  <circle cx="${CENTER}" cy="${CENTER}" r="${FACE_RADIUS}" fill="#1f2937" stroke="#f9fafb" stroke-width="2"/>`,
    ...ticks(),
    hand(angles.hour, HOUR_HAND_LENGTH, 3, '#f9fafb'),
    hand(angles.minute, MINUTE_HAND_LENGTH, 2, '#f9fafb'),
    hand(angles.second, SECOND_HAND_LENGTH, 1, '#ef4444'),
    `  <circle cx="${CENTER}" cy="${CENTER}" r="2" fill="#f9fafb"/>`,
    `</svg>`,
    '',
  ].join('\n');
}
