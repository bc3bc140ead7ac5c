/**
 * Recognizer
 *
 * Public entry point: holds the language, its template dictionary and the
 * background color, and turns pixel grids into text.
 *
 * Configuration is one frozen object that every change replaces as a whole,
 * so a read never sees a half-applied language switch.
 */

import {
  GlyphReaderError,
  InvalidArgumentError,
  InvalidLanguageError,
  LanguagePackNotFoundError,
  MalformedTemplateRecordError,
} from '../errors/index.js';
import {
  WHITE,
  assertPixelGrid,
  isColor,
  loadImage,
  type Color,
  type ImageSource,
  type PixelGrid,
} from '../image/index.js';
import { TemplateStore, type TemplateDictionary } from '../templates/index.js';
import { matchPattern } from './matcher.js';
import { normalize } from './normalizer.js';
import { segment } from './segmenter.js';
import type { GlyphReading, InkRegion, MatchStrategy } from './types.js';

export const DEFAULT_LANGUAGE = 'English';
export const DEFAULT_BACKGROUND: Color = WHITE;
export const DEFAULT_PLACEHOLDER = '?';

export interface RecognizerOptions {
  /** Where language packs come from. Default: a TemplateStore on the bundled packs */
  store?: TemplateStore;
  /** Default: 'exact' */
  matchStrategy?: MatchStrategy;
  /** Emitted for glyphs that match nothing. Default: '?' */
  placeholder?: string;
  /** Default: 0 (any difference from the background is ink) */
  colorTolerance?: number;
  /** Default: 2 */
  minSpanWidth?: number;
}

interface RecognizerState {
  readonly language: string;
  readonly dictionary: TemplateDictionary;
  readonly background: Color;
}

function assertLanguage(language: unknown): asserts language is string {
  if (typeof language !== 'string' || language.length === 0) {
    throw new InvalidArgumentError('Language cannot be null or empty');
  }
}

function assertBackground(background: unknown): asserts background is Color {
  if (!isColor(background)) {
    throw new InvalidArgumentError('Background color must be a 24-bit RGB value', { background });
  }
}

export class Recognizer {
  private state: RecognizerState;
  private readonly store: TemplateStore;
  private readonly matchStrategy: MatchStrategy;
  private readonly placeholder: string;
  private readonly colorTolerance: number;
  private readonly minSpanWidth: number | undefined;

  /** English on white. */
  constructor();
  /**
   * @throws InvalidArgumentError if language or background is absent
   * @throws InvalidLanguageError if the language pack is missing or malformed
   */
  constructor(language: string, background: Color, options?: RecognizerOptions);
  constructor(language?: string, background?: Color, options: RecognizerOptions = {}) {
    // Defaults apply only to the no-argument form; an explicit undefined is an error.
    if (arguments.length === 0) {
      language = DEFAULT_LANGUAGE;
      background = DEFAULT_BACKGROUND;
    }
    assertLanguage(language);
    assertBackground(background);

    const placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;
    if ([...placeholder].length !== 1) {
      throw new InvalidArgumentError('Placeholder must be a single character', { placeholder });
    }

    this.store = options.store ?? new TemplateStore();
    this.matchStrategy = options.matchStrategy ?? 'exact';
    this.placeholder = placeholder;
    this.colorTolerance = options.colorTolerance ?? 0;
    this.minSpanWidth = options.minSpanWidth;
    this.state = Object.freeze({
      language,
      dictionary: this.loadDictionary(language),
      background,
    });
  }

  getLanguage(): string {
    return this.state.language;
  }

  getBackground(): Color {
    return this.state.background;
  }

  getDictionary(): TemplateDictionary {
    return this.state.dictionary;
  }

  /**
   * Switch to another language. On failure the current language and
   * dictionary stay in place.
   */
  setLanguage(language: string): void {
    assertLanguage(language);
    const dictionary = this.loadDictionary(language);
    this.state = Object.freeze({ ...this.state, language, dictionary });
  }

  setBackground(background: Color): void {
    assertBackground(background);
    this.state = Object.freeze({ ...this.state, background });
  }

  /** Text pictured in the grid. Unrecognized glyphs become the placeholder. */
  read(grid: PixelGrid): string {
    return this.analyze(grid)
      .map((reading) => reading.character)
      .join('');
  }

  /** Per-glyph breakdown of what read() would return. */
  analyze(grid: PixelGrid): GlyphReading[] {
    assertPixelGrid(grid);
    const state = this.state;
    const regions = segment(grid, state.background, {
      colorTolerance: this.colorTolerance,
      minSpanWidth: this.minSpanWidth,
    });
    return regions.map((region) => this.readGlyph(grid, region, state));
  }

  /** Recognize the single character in the column span [lo, hi]. */
  readRegion(grid: PixelGrid, lo: number, hi: number): string {
    assertPixelGrid(grid);
    if (!Number.isInteger(lo) || !Number.isInteger(hi) || lo < 0 || hi < lo || hi >= grid.width) {
      throw new InvalidArgumentError(`Invalid column span [${lo}, ${hi}]`, { lo, hi, width: grid.width });
    }
    const region: InkRegion = { lo, hi, top: 0, bottom: grid.height - 1 };
    return this.readGlyph(grid, region, this.state).character;
  }

  /** Decode an image file or buffer and read it. */
  async readImage(source: ImageSource): Promise<string> {
    if (source == null) {
      throw new InvalidArgumentError('Image source cannot be null');
    }
    const grid = await loadImage(source, { background: this.state.background });
    return this.read(grid);
  }

  private readGlyph(grid: PixelGrid, region: InkRegion, state: RecognizerState): GlyphReading {
    const pattern = normalize(grid, region, state.background, { colorTolerance: this.colorTolerance });
    const match = matchPattern(pattern, state.dictionary, this.matchStrategy);
    return {
      region,
      pattern,
      character: match ?? this.placeholder,
      recognized: match !== undefined,
    };
  }

  private loadDictionary(language: string): TemplateDictionary {
    try {
      return this.store.load(language);
    } catch (err) {
      if (err instanceof LanguagePackNotFoundError || err instanceof MalformedTemplateRecordError) {
        throw new InvalidLanguageError(`Illegal language: ${language}`, {
          language,
          reason: err.code,
          detail: err.message,
        });
      }
      if (err instanceof GlyphReaderError) throw err;
      throw new InvalidLanguageError(`Illegal language: ${language}`, {
        language,
        reason: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
