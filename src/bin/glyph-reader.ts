#!/usr/bin/env node
/**
 * glyph-reader CLI entry point
 *
 * Compiled to dist/bin/glyph-reader.js by TypeScript.
 * Registered as the `glyph-reader` binary in package.json.
 */

import dotenv from 'dotenv';
import { GlyphReaderCLI } from '../cli/cli.js';

dotenv.config();

const cli = new GlyphReaderCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
