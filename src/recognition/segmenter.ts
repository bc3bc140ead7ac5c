/**
 * Segmenter
 *
 * Column-projection segmentation: every maximal run of columns holding ink
 * is one character. Characters that touch (no blank column between them)
 * come out as a single region.
 */

import { isInk, type Color, type PixelGrid } from '../image/index.js';
import type { InkOptions, InkRegion } from './types.js';

export interface SegmentOptions extends InkOptions {
  /** Spans narrower than this many columns are dropped as noise. Default: 2 */
  minSpanWidth?: number;
}

export const DEFAULT_MIN_SPAN_WIDTH = 2;

/** For each column, whether it holds at least one ink pixel. */
export function inkColumns(grid: PixelGrid, background: Color, tolerance = 0): boolean[] {
  const columns: boolean[] = new Array<boolean>(grid.width).fill(false);
  for (let x = 0; x < grid.width; x++) {
    for (let y = 0; y < grid.height; y++) {
      if (isInk(grid.getColor(x, y), background, tolerance)) {
        columns[x] = true;
        break;
      }
    }
  }
  return columns;
}

/** Split a grid into Ink Regions, left to right. A blank grid gives []. */
export function segment(grid: PixelGrid, background: Color, options: SegmentOptions = {}): InkRegion[] {
  const minSpanWidth = options.minSpanWidth ?? DEFAULT_MIN_SPAN_WIDTH;
  const columns = inkColumns(grid, background, options.colorTolerance ?? 0);
  const regions: InkRegion[] = [];

  let start = -1;
  for (let x = 0; x <= columns.length; x++) {
    const ink = x < columns.length && columns[x];
    if (ink && start < 0) {
      start = x;
    } else if (!ink && start >= 0) {
      if (x - start >= minSpanWidth) {
        regions.push({ lo: start, hi: x - 1, top: 0, bottom: grid.height - 1 });
      }
      start = -1;
    }
  }
  return regions;
}
