/**
 * Pixel grids: the only image shape the recognition pipeline consumes.
 */

import { InvalidArgumentError } from '../errors/index.js';
import { WHITE, type Color } from './color.js';

export interface PixelGrid {
  readonly width: number;
  readonly height: number;
  /** Color at column x, row y. Both are in range for valid calls. */
  getColor(x: number, y: number): Color;
}

/** Throws InvalidArgumentError unless the grid is present and at least 1×1. */
export function assertPixelGrid(grid: PixelGrid | null | undefined): asserts grid is PixelGrid {
  if (grid == null) {
    throw new InvalidArgumentError('Pixel grid cannot be null');
  }
  const { width, height } = grid;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new InvalidArgumentError(`Pixel grid must be at least 1x1, got ${width}x${height}`, {
      width,
      height,
    });
  }
}

/** Mutable in-memory raster backed by a Uint32Array. */
export class RasterGrid implements PixelGrid {
  private readonly pixels: Uint32Array;

  constructor(
    readonly width: number,
    readonly height: number,
    fill: Color = WHITE
  ) {
    assertPixelGrid({ width, height, getColor: () => fill });
    this.pixels = new Uint32Array(width * height).fill(fill);
  }

  /**
   * Build a grid from raw interleaved samples (1–4 channels per pixel).
   * One or two channels are treated as gray (+ alpha); the alpha channel is ignored.
   */
  static fromRaw(data: Uint8Array, width: number, height: number, channelCount: number): RasterGrid {
    if (channelCount < 1 || channelCount > 4) {
      throw new InvalidArgumentError(`Unsupported channel count: ${channelCount}`, { channelCount });
    }
    if (data.length < width * height * channelCount) {
      throw new InvalidArgumentError('Raw pixel buffer is shorter than width × height × channels', {
        width,
        height,
        channelCount,
        length: data.length,
      });
    }
    const grid = new RasterGrid(width, height);
    const gray = channelCount < 3;
    for (let i = 0; i < width * height; i++) {
      const offset = i * channelCount;
      const r = data[offset];
      const g = gray ? r : data[offset + 1];
      const b = gray ? r : data[offset + 2];
      grid.pixels[i] = (r << 16) | (g << 8) | b;
    }
    return grid;
  }

  getColor(x: number, y: number): Color {
    return this.pixels[y * this.width + x];
  }

  setColor(x: number, y: number, color: Color): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    this.pixels[y * this.width + x] = color;
  }

  /** Fill the inclusive rectangle [x0, x1] × [y0, y1], clipped to the grid. */
  fillRect(x0: number, y0: number, x1: number, y1: number, color: Color): void {
    for (let y = Math.max(0, y0); y <= Math.min(this.height - 1, y1); y++) {
      for (let x = Math.max(0, x0); x <= Math.min(this.width - 1, x1); x++) {
        this.pixels[y * this.width + x] = color;
      }
    }
  }
}
