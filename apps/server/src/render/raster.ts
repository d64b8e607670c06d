import { Resvg } from '@resvg/resvg-js';

/**
 * Rasterizes an SVG document to PNG at its intrinsic size.
 * Text is drawn with system fonts, falling back to any monospace face.
 *
 * @throws Error if the document cannot be parsed or encoded
 */
export function rasterizeSvg(svg: string): Buffer {
  const resvg = new Resvg(svg, {
    font: {
      loadSystemFonts: true,
      defaultFontFamily: 'monospace',
    },
  });
  return resvg.render().asPng();
}
