export { ConfigManager } from './config.js';
export type { GlyphReaderConfig } from './config.js';
