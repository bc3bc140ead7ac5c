export { GlyphReaderCLI } from './cli.js';
export { OutputFormatter } from './formatter.js';
export type { ImageReadResult } from './formatter.js';
export { ProgressReporter } from './progress.js';
