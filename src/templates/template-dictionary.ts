/**
 * Template Dictionary: immutable mapping from Glyph Pattern to character.
 */

import { GlyphPattern } from './glyph-pattern.js';

export class TemplateDictionary {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(
    readonly language: string,
    entries: Iterable<readonly [GlyphPattern, string]>
  ) {
    const map = new Map<string, string>();
    // Identical patterns overwrite: the last record wins.
    for (const [pattern, character] of entries) {
      map.set(pattern.key, character);
    }
    this.entries = map;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Exact set-equality lookup. */
  get(pattern: GlyphPattern): string | undefined {
    return this.entries.get(pattern.key);
  }

  has(pattern: GlyphPattern): boolean {
    return this.entries.has(pattern.key);
  }

  /** Distinct characters in the dictionary, in first-seen order. */
  characters(): string[] {
    return [...new Set(this.entries.values())];
  }
}
