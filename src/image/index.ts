export { WHITE, BLACK, isColor, rgb, channels, parseColor, formatColor, isInk } from './color.js';
export type { Color } from './color.js';
export { RasterGrid, assertPixelGrid } from './pixel-grid.js';
export type { PixelGrid } from './pixel-grid.js';
export { loadImage } from './image-loader.js';
export type { LoadImageOptions, ImageSource } from './image-loader.js';
