/**
 * Normalizer
 *
 * Crops an Ink Region to the bounding box of its ink, pads it to a square
 * and resamples it to a SCALE_SIZE × SCALE_SIZE Glyph Pattern.
 */

import { isInk, type Color, type PixelGrid } from '../image/index.js';
import { GlyphPattern, SCALE_SIZE, type Cell } from '../templates/index.js';
import type { InkOptions, InkRegion } from './types.js';

interface Box {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

function inkBounds(
  grid: PixelGrid,
  region: InkRegion,
  background: Color,
  tolerance: number
): Box | undefined {
  let box: Box | undefined;
  for (let y = region.top; y <= region.bottom; y++) {
    for (let x = region.lo; x <= region.hi; x++) {
      if (!isInk(grid.getColor(x, y), background, tolerance)) continue;
      if (!box) {
        box = { minX: x, maxX: x, minY: y, maxY: y };
      } else {
        box.minX = Math.min(box.minX, x);
        box.maxX = Math.max(box.maxX, x);
        box.minY = Math.min(box.minY, y);
        box.maxY = Math.max(box.maxY, y);
      }
    }
  }
  return box;
}

/** Source index range [start, end) covered by output cell `cell` when `side` pixels map onto SCALE_SIZE cells. */
export function cellSpan(cell: number, side: number): [number, number] {
  const start = Math.floor((cell * side) / SCALE_SIZE);
  const end = Math.ceil(((cell + 1) * side) / SCALE_SIZE);
  return [start, end];
}

/**
 * Normalize the ink inside `region` to a Glyph Pattern. Regions without ink
 * give the empty pattern. Each output cell takes the majority classification
 * of the source pixels it overlaps; ties count as ink.
 */
export function normalize(
  grid: PixelGrid,
  region: InkRegion,
  background: Color,
  options: InkOptions = {}
): GlyphPattern {
  const tolerance = options.colorTolerance ?? 0;
  const lo = Math.max(0, region.lo);
  const hi = Math.min(grid.width - 1, region.hi);
  const top = Math.max(0, region.top);
  const bottom = Math.min(grid.height - 1, region.bottom);
  if (lo > hi || top > bottom) return GlyphPattern.EMPTY;

  const box = inkBounds(grid, { lo, hi, top, bottom }, background, tolerance);
  if (!box) return GlyphPattern.EMPTY;

  const boxWidth = box.maxX - box.minX + 1;
  const boxHeight = box.maxY - box.minY + 1;
  const side = Math.max(boxWidth, boxHeight);
  // Square origin in grid coordinates; the padding is virtual background.
  const originX = box.minX - Math.floor((side - boxWidth) / 2);
  const originY = box.minY - Math.floor((side - boxHeight) / 2);

  const inkAt = (sx: number, sy: number): boolean => {
    const x = originX + sx;
    const y = originY + sy;
    if (x < box.minX || x > box.maxX || y < box.minY || y > box.maxY) return false;
    return isInk(grid.getColor(x, y), background, tolerance);
  };

  const cells: Cell[] = [];
  for (let cy = 0; cy < SCALE_SIZE; cy++) {
    const [y0, y1] = cellSpan(cy, side);
    for (let cx = 0; cx < SCALE_SIZE; cx++) {
      const [x0, x1] = cellSpan(cx, side);
      let ink = 0;
      let total = 0;
      for (let sy = y0; sy < y1; sy++) {
        for (let sx = x0; sx < x1; sx++) {
          total++;
          if (inkAt(sx, sy)) ink++;
        }
      }
      if (total > 0 && ink * 2 >= total) {
        cells.push({ x: cx, y: cy });
      }
    }
  }
  return new GlyphPattern(cells);
}
