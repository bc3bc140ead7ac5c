/**
 * Shared recognition types.
 */

import type { GlyphPattern } from '../templates/index.js';

/** Inclusive column span [lo, hi] over the full row range [top, bottom] of a grid. */
export interface InkRegion {
  lo: number;
  hi: number;
  top: number;
  bottom: number;
}

/** Options shared by every stage that classifies pixels as ink. */
export interface InkOptions {
  /** Max per-channel difference from the background still counted as background. Default: 0 */
  colorTolerance?: number;
}

/** How a normalized pattern is matched against the template dictionary. */
export type MatchStrategy = 'exact' | 'any-cell';

/** One segmented glyph and what it was recognized as. */
export interface GlyphReading {
  region: InkRegion;
  pattern: GlyphPattern;
  /** Recognized character, or the placeholder when nothing matched */
  character: string;
  recognized: boolean;
}
