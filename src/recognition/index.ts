/**
 * Recognition module
 *
 * Segmentation, normalization, matching and the Recognizer that composes them.
 */

export { Recognizer, DEFAULT_LANGUAGE, DEFAULT_BACKGROUND, DEFAULT_PLACEHOLDER } from './recognizer.js';
export type { RecognizerOptions } from './recognizer.js';
export { segment, inkColumns, DEFAULT_MIN_SPAN_WIDTH } from './segmenter.js';
export type { SegmentOptions } from './segmenter.js';
export { normalize, cellSpan } from './normalizer.js';
export { matchPattern, isMatchStrategy, MATCH_STRATEGIES } from './matcher.js';
export type { InkRegion, InkOptions, MatchStrategy, GlyphReading } from './types.js';
