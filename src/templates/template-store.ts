/**
 * Template Store
 *
 * Loads language packs from `<packDir>/<language>.txt` and parses them into
 * TemplateDictionaries. Each line lists tab-separated `"x, y"` coordinate
 * tokens followed by the character they spell, e.g.
 *
 *   4, 0	4, 1	4, 2	4, 3	4, 4	4, 5	4, 6	4, 7	4, 8	l
 *
 * With the default `coordinate` keying every token registers its own
 * one-cell pattern; `pattern` keying registers the whole record as one shape.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { LanguagePackNotFoundError, MalformedTemplateRecordError } from '../errors/index.js';
import { GlyphPattern, SCALE_SIZE, isCellInRange, type Cell } from './glyph-pattern.js';
import { TemplateDictionary } from './template-dictionary.js';

export type TemplateKeying = 'coordinate' | 'pattern';

export interface ParseOptions {
  /** Language name recorded on the dictionary. Default: 'unknown' */
  language?: string;
  /** Default: 'coordinate' */
  keying?: TemplateKeying;
}

export interface TemplateStoreOptions {
  /** Directory holding `<language>.txt` packs. Default: data/languages in the package root */
  packDir?: string;
  keying?: TemplateKeying;
}

export const DEFAULT_PACK_DIR = fileURLToPath(new URL('../../data/languages/', import.meta.url));

const PACK_EXTENSION = '.txt';
const PACK_NAME = /^[A-Za-z0-9_-]+$/;
const INTEGER = /^[+-]?\d+$/;

function parseCoordinate(token: string, lineNumber: number): Cell {
  const parts = token.split(', ');
  if (parts.length !== 2) {
    throw new MalformedTemplateRecordError(
      `Bad coordinate "${token}" on line ${lineNumber}: expected "<x>, <y>"`,
      lineNumber,
      { token }
    );
  }
  if (!INTEGER.test(parts[0]) || !INTEGER.test(parts[1])) {
    throw new MalformedTemplateRecordError(
      `Bad coordinate "${token}" on line ${lineNumber}: components must be integers`,
      lineNumber,
      { token }
    );
  }
  const x = parseInt(parts[0], 10);
  const y = parseInt(parts[1], 10);
  if (!isCellInRange(x, y)) {
    throw new MalformedTemplateRecordError(
      `Coordinate "${token}" on line ${lineNumber} is outside the ${SCALE_SIZE}x${SCALE_SIZE} grid`,
      lineNumber,
      { token }
    );
  }
  return { x, y };
}

/**
 * Parse language-pack text. Blank lines are skipped; every other line must
 * carry at least one coordinate token and a non-empty trailing token.
 */
export function parseLanguagePack(text: string, options: ParseOptions = {}): TemplateDictionary {
  const keying = options.keying ?? 'coordinate';
  const entries: [GlyphPattern, string][] = [];

  text.split('\n').forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (line.trim().length === 0) return;

    const tokens = line.split('\t');
    if (tokens.length < 2) {
      throw new MalformedTemplateRecordError(
        `Bad line ${lineNumber}: no coordinate tokens before the character`,
        lineNumber
      );
    }
    // Only the first code point of the trailing token counts.
    const character = [...tokens[tokens.length - 1]][0];
    if (character === undefined) {
      throw new MalformedTemplateRecordError(`Bad line ${lineNumber}: missing trailing character`, lineNumber);
    }

    const cells = tokens.slice(0, -1).map((token) => parseCoordinate(token, lineNumber));
    if (keying === 'pattern') {
      entries.push([new GlyphPattern(cells), character]);
    } else {
      for (const cell of cells) {
        entries.push([new GlyphPattern([cell]), character]);
      }
    }
  });

  return new TemplateDictionary(options.language ?? 'unknown', entries);
}

export class TemplateStore {
  readonly packDir: string;
  readonly keying: TemplateKeying;

  constructor(options: TemplateStoreOptions = {}) {
    this.packDir = options.packDir ?? DEFAULT_PACK_DIR;
    this.keying = options.keying ?? 'coordinate';
  }

  /** Path of the pack file for a language, or undefined if the name is not a pack name. */
  resolve(language: string): string | undefined {
    if (!PACK_NAME.test(language)) return undefined;
    return path.join(this.packDir, `${language}${PACK_EXTENSION}`);
  }

  /**
   * Read and parse the pack for a language.
   *
   * @throws LanguagePackNotFoundError when no pack exists for the name
   * @throws MalformedTemplateRecordError when a record cannot be parsed
   */
  load(language: string): TemplateDictionary {
    const file = this.resolve(language);
    if (!file || !fs.existsSync(file)) {
      throw new LanguagePackNotFoundError(`No language pack for "${language}"`, {
        language,
        packDir: this.packDir,
      });
    }
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf-8');
    } catch (err) {
      throw new LanguagePackNotFoundError(`Cannot read language pack for "${language}"`, {
        language,
        packDir: this.packDir,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
    return parseLanguagePack(text, { language, keying: this.keying });
  }

  /** Names of the packs in the pack directory, sorted. */
  listLanguages(): string[] {
    if (!fs.existsSync(this.packDir)) return [];
    return fs
      .readdirSync(this.packDir)
      .filter((name) => name.endsWith(PACK_EXTENSION))
      .map((name) => name.slice(0, -PACK_EXTENSION.length))
      .filter((name) => PACK_NAME.test(name))
      .sort();
  }
}
