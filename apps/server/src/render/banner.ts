import { escapeXml } from './escape.js';

const BANNER_HEIGHT = 40;
const BANNER_PADDING = 16;
const FONT_SIZE = 16;
/** Advance of one monospace glyph at FONT_SIZE */
const CHAR_WIDTH = 9.6;

/**
 * Width of the banner for a line of text.
 */
export function bannerWidth(text: string): number {
  return BANNER_PADDING * 2 + Math.ceil(text.length * CHAR_WIDTH);
}

/**
 * Renders one line of text as an SVG banner.
 *
 * @example
 * renderBanner('in 1 hour')
 * // <svg ... width="119" height="40" ...> ... <text ...>in 1 hour</text></svg>
 */
export function renderBanner(text: string): string {
  const width = bannerWidth(text);
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${BANNER_HEIGHT}" viewBox="0 0 ${width} ${BANNER_HEIGHT}">`,
    `  <rect width="100%" height="100%" rx="6" fill="#1f2937"/>`,
    `  <text x="50%" y="50%" dominant-baseline="middle" text-anchor="middle" font-family="ui-monospace, Menlo, Consolas, monospace" font-size="${FONT_SIZE}" fill="#f9fafb">${escapeXml(text)}</text>`,
    `</svg>`,
    '',
  ].join('\n');
}
