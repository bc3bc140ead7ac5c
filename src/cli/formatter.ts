/**
 * Output Formatter
 *
 * Formats recognition results into human-readable strings for CLI output.
 */

import { formatColor, type Color } from '../image/index.js';
import type { GlyphReading } from '../recognition/index.js';
import { ErrorHandler } from '../errors/index.js';

export interface ImageReadResult {
  source: string;
  text: string;
  readings: GlyphReading[];
}

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number): string {
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

export class OutputFormatter {
  /** One line per image: `<source>: <text>`. */
  formatText(result: ImageReadResult): string {
    return `${result.source}: ${result.text}`;
  }

  formatJson(results: ImageReadResult[]): string {
    return JSON.stringify(
      results.map((r) => ({
        source: r.source,
        text: r.text,
        glyphs: r.readings.map((g) => ({
          lo: g.region.lo,
          hi: g.region.hi,
          character: g.character,
          recognized: g.recognized,
          cells: g.pattern.size,
        })),
      })),
      null,
      2
    );
  }

  /**
   * Detailed per-glyph breakdown with the normalized grid of each glyph.
   */
  formatReadings(result: ImageReadResult): string {
    const lines: string[] = [header(`Glyphs in ${result.source} (${result.readings.length})`)];
    result.readings.forEach((reading, i) => {
      const status = reading.recognized ? `${GREEN}${reading.character}${RESET}` : `${YELLOW}unrecognized${RESET}`;
      lines.push(field(`#${i + 1} columns ${reading.region.lo}-${reading.region.hi}`, status));
      for (const row of reading.pattern.toString().split('\n')) {
        lines.push(`      ${DIM}${row}${RESET}`);
      }
    });
    return lines.join('\n');
  }

  formatLanguages(languages: string[], current: string): string {
    if (!languages.length) {
      return `${YELLOW}No language packs found.${RESET}`;
    }
    const lines: string[] = [header(`Language packs (${languages.length})`)];
    for (const language of languages) {
      const marker = language === current ? ` ${GREEN}(current)${RESET}` : '';
      lines.push(`  ${language}${marker}`);
    }
    return lines.join('\n');
  }

  formatSettings(language: string, background: Color, strategy: string): string {
    return [
      header('Recognizer'),
      field('Language', language),
      field('Background', formatColor(background)),
      field('Match strategy', strategy),
    ].join('\n');
  }

  formatError(err: unknown): string {
    return `${RED}Error:${RESET} ${ErrorHandler.toUserMessage(err)}`;
  }
}
