/**
 * Turns a resolved instant into an image response body.
 */

import type { DisplayIntent, ResolvedInstant } from '@time-banner/core';
import { ServiceError } from '../errors.js';
import { renderBanner } from './banner.js';
import { renderClock } from './clock.js';
import { rasterizeSvg } from './raster.js';
import { formatAbsoluteText, formatRelativeText } from './text.js';

export * from './banner.js';
export * from './clock.js';
export * from './escape.js';
export * from './raster.js';
export * from './text.js';

export type OutputFormat = 'svg' | 'png';

const CONTENT_TYPES: Record<OutputFormat, string> = {
  svg: 'image/svg+xml',
  png: 'image/png',
};

export interface RenderedImage {
  contentType: string;
  /** SVG markup, or PNG bytes */
  body: string | Buffer;
}

function isOutputFormat(extension: string): extension is OutputFormat {
  return Object.hasOwn(CONTENT_TYPES, extension);
}

/**
 * Maps a path extension to an output format.
 *
 * @throws ServiceError (unsupported-format) for anything but svg or png
 */
export function resolveOutputFormat(extension: string): OutputFormat {
  if (!isOutputFormat(extension)) {
    throw new ServiceError('unsupported-format', `Unsupported extension: ${extension}`);
  }
  return extension;
}

function renderSvg(resolved: ResolvedInstant, style: DisplayIntent, now: Date): string {
  switch (style) {
    case 'relative':
      return renderBanner(formatRelativeText(resolved.instant, now));
    case 'absolute':
      return renderBanner(formatAbsoluteText(resolved.instant, resolved.sourceOffset, resolved.zoneName));
    case 'clock':
      return renderClock(resolved.instant);
  }
}

/**
 * Renders a resolved instant as the given display style.
 *
 * @param now - Reference point for relative text
 * @throws ServiceError (render) if the text or the PNG cannot be produced
 */
export function renderInstant(
  resolved: ResolvedInstant,
  style: DisplayIntent,
  format: OutputFormat,
  now: Date,
): RenderedImage {
  try {
    const svg = renderSvg(resolved, style, now);
    return {
      contentType: CONTENT_TYPES[format],
      body: format === 'png' ? rasterizeSvg(svg) : svg,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ServiceError('render', `Template rendering failed: ${message}`);
  }
}
