/**
 * Templates module
 *
 * Glyph patterns, template dictionaries and the language-pack store.
 */

export { GlyphPattern, SCALE_SIZE, isCellInRange } from './glyph-pattern.js';
export type { Cell } from './glyph-pattern.js';
export { TemplateDictionary } from './template-dictionary.js';
export { TemplateStore, parseLanguagePack, DEFAULT_PACK_DIR } from './template-store.js';
export type { TemplateKeying, ParseOptions, TemplateStoreOptions } from './template-store.js';
