/**
 * Image Loader
 *
 * Decodes image files or buffers into RasterGrids using sharp. This is the
 * only place the library touches image formats.
 */

import sharp from 'sharp';
import { UnreadableImageError } from '../errors/index.js';
import { WHITE, formatColor, type Color } from './color.js';
import { RasterGrid } from './pixel-grid.js';

export interface LoadImageOptions {
  /** Transparent pixels are flattened onto this color. Default: white */
  background?: Color;
}

export type ImageSource = string | Buffer;

function describeSource(source: ImageSource): string {
  return typeof source === 'string' ? source : `<buffer ${source.length} bytes>`;
}

export async function loadImage(source: ImageSource, options: LoadImageOptions = {}): Promise<RasterGrid> {
  const background = options.background ?? WHITE;
  try {
    const { data, info } = await sharp(source)
      .flatten({ background: formatColor(background) })
      .raw()
      .toBuffer({ resolveWithObject: true });
    return RasterGrid.fromRaw(data, info.width, info.height, info.channels);
  } catch (err) {
    throw new UnreadableImageError(`Illegal image: ${describeSource(source)}`, {
      source: describeSource(source),
      reason: err instanceof Error ? err.message : String(err),
    });
  }
}
