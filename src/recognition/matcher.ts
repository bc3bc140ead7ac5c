/**
 * Pattern matching policies.
 *
 *   exact     the whole pattern must equal a dictionary key
 *   any-cell  ink cells are scanned in row-major order and the first one that
 *             is a trained single-cell key decides the character
 *
 * `any-cell` is the reading that fits language packs keyed per coordinate.
 */

import { GlyphPattern, type TemplateDictionary } from '../templates/index.js';
import type { MatchStrategy } from './types.js';

export const MATCH_STRATEGIES: readonly MatchStrategy[] = ['exact', 'any-cell'];

export function isMatchStrategy(value: string): value is MatchStrategy {
  return (MATCH_STRATEGIES as readonly string[]).includes(value);
}

export function matchPattern(
  pattern: GlyphPattern,
  dictionary: TemplateDictionary,
  strategy: MatchStrategy = 'exact'
): string | undefined {
  if (pattern.isEmpty) return undefined;

  switch (strategy) {
    case 'exact':
      return dictionary.get(pattern);
    case 'any-cell':
      for (const cell of pattern.cells) {
        const character = dictionary.get(new GlyphPattern([cell]));
        if (character !== undefined) return character;
      }
      return undefined;
  }
}
