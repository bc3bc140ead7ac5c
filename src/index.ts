/**
 * glyph-reader - handwritten character recognition for raster images
 *
 * Main entry point for the library.
 * Exports all public APIs and utilities.
 */

// Errors
export * from './errors/index.js';

// Images: pixel grids, colors, decoding
export * from './image/index.js';

// Templates
export * from './templates/index.js';

// Recognition
export * from './recognition/index.js';

// Config
export * from './config/index.js';

// CLI utilities
export * from './cli/exports.js';

/**
 * Library version
 */
export const VERSION = '0.1.0';
