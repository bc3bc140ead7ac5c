/**
 * glyph-reader configuration
 *
 * Manages the config file at ~/.glyph-reader/config.json.
 * Supports environment variable overrides.
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import { ConfigurationError } from '../errors/index.js';
import { parseColor } from '../image/index.js';
import { isMatchStrategy } from '../recognition/matcher.js';
import type { MatchStrategy } from '../recognition/types.js';
import type { TemplateKeying } from '../templates/index.js';

export interface GlyphReaderConfig {
  recognition: {
    /** Default: English */
    language: string;
    /** `#rrggbb`, `#rgb`, `0xrrggbb`, white or black. Default: #ffffff */
    background: string;
    matchStrategy: MatchStrategy;
    /** Default: ? */
    placeholder: string;
    /** Default: 0 */
    colorTolerance: number;
    /** Default: 2 */
    minSpanWidth: number;
  };
  languages: {
    /** Unset means the packs bundled with the package. */
    packDir?: string;
    keying: TemplateKeying;
  };
  output: {
    format: 'plain' | 'json';
  };
}

const KEYINGS: readonly string[] = ['coordinate', 'pattern'];
const OUTPUT_FORMATS: readonly string[] = ['plain', 'json'];

function readInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be an integer, got: ${raw}`, { variable: name });
  }
  return value;
}

export class ConfigManager {
  private readonly configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath ?? path.join(os.homedir(), '.glyph-reader', 'config.json');
  }

  get path(): string {
    return this.configPath;
  }

  /**
   * Load config from disk. Returns defaults if file doesn't exist.
   */
  load(): GlyphReaderConfig {
    if (!fs.existsSync(this.configPath)) {
      return ConfigManager.defaults();
    }
    let parsed: Partial<GlyphReaderConfig>;
    try {
      const raw = fs.readFileSync(this.configPath, 'utf-8');
      parsed = JSON.parse(raw) as Partial<GlyphReaderConfig>;
    } catch (err) {
      throw new ConfigurationError(
        `Failed to read config at ${this.configPath}: ${err instanceof Error ? err.message : String(err)}`,
        { path: this.configPath }
      );
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(`Config at ${this.configPath} must be a JSON object`, {
        path: this.configPath,
      });
    }
    return this.merge(ConfigManager.defaults(), parsed);
  }

  /**
   * Save config to disk, creating parent directories as needed.
   */
  save(config: GlyphReaderConfig): void {
    const dir = path.dirname(this.configPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(this.configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  }

  /**
   * Validate a config object. An empty errors array means valid.
   */
  validate(config: GlyphReaderConfig): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { recognition, languages, output } = config;

    if (typeof recognition.language !== 'string' || !/^[A-Za-z0-9_-]+$/.test(recognition.language)) {
      errors.push('recognition.language must be a pack name (letters, digits, _ or -)');
    }
    if (typeof recognition.background !== 'string' || parseColor(recognition.background) === undefined) {
      errors.push(`recognition.background must be a color like #ffffff, got: ${String(recognition.background)}`);
    }
    if (typeof recognition.matchStrategy !== 'string' || !isMatchStrategy(recognition.matchStrategy)) {
      errors.push('recognition.matchStrategy must be exact | any-cell');
    }
    if (typeof recognition.placeholder !== 'string' || [...recognition.placeholder].length !== 1) {
      errors.push('recognition.placeholder must be a single character');
    }
    if (!Number.isInteger(recognition.colorTolerance) || recognition.colorTolerance < 0 || recognition.colorTolerance > 255) {
      errors.push('recognition.colorTolerance must be an integer between 0 and 255');
    }
    if (!Number.isInteger(recognition.minSpanWidth) || recognition.minSpanWidth < 1) {
      errors.push('recognition.minSpanWidth must be a positive integer');
    }
    if (!KEYINGS.includes(languages.keying)) {
      errors.push('languages.keying must be coordinate | pattern');
    }
    if (languages.packDir !== undefined && typeof languages.packDir !== 'string') {
      errors.push('languages.packDir must be a directory path');
    }
    if (!OUTPUT_FORMATS.includes(output.format)) {
      errors.push('output.format must be plain | json');
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Load config, then apply environment variable overrides.
   *
   * Supported env vars:
   *   GLYPH_READER_LANGUAGE, GLYPH_READER_BACKGROUND, GLYPH_READER_MATCH_STRATEGY,
   *   GLYPH_READER_PLACEHOLDER, GLYPH_READER_COLOR_TOLERANCE, GLYPH_READER_MIN_SPAN_WIDTH,
   *   GLYPH_READER_PACK_DIR, GLYPH_READER_KEYING, GLYPH_READER_OUTPUT_FORMAT
   */
  loadWithEnvOverrides(): GlyphReaderConfig {
    const config = this.load();
    const env = process.env;

    // Recognition
    if (env.GLYPH_READER_LANGUAGE) config.recognition.language = env.GLYPH_READER_LANGUAGE;
    if (env.GLYPH_READER_BACKGROUND) config.recognition.background = env.GLYPH_READER_BACKGROUND;
    if (env.GLYPH_READER_MATCH_STRATEGY) {
      const strategy = env.GLYPH_READER_MATCH_STRATEGY;
      if (!isMatchStrategy(strategy)) {
        throw new ConfigurationError(`GLYPH_READER_MATCH_STRATEGY must be exact | any-cell, got: ${strategy}`);
      }
      config.recognition.matchStrategy = strategy;
    }
    if (env.GLYPH_READER_PLACEHOLDER) config.recognition.placeholder = env.GLYPH_READER_PLACEHOLDER;
    config.recognition.colorTolerance = readInt('GLYPH_READER_COLOR_TOLERANCE') ?? config.recognition.colorTolerance;
    config.recognition.minSpanWidth = readInt('GLYPH_READER_MIN_SPAN_WIDTH') ?? config.recognition.minSpanWidth;

    // Languages
    if (env.GLYPH_READER_PACK_DIR) config.languages.packDir = env.GLYPH_READER_PACK_DIR;
    if (env.GLYPH_READER_KEYING) {
      const keying = env.GLYPH_READER_KEYING;
      if (keying !== 'coordinate' && keying !== 'pattern') {
        throw new ConfigurationError(`GLYPH_READER_KEYING must be coordinate | pattern, got: ${keying}`);
      }
      config.languages.keying = keying;
    }

    // Output
    if (env.GLYPH_READER_OUTPUT_FORMAT) {
      const format = env.GLYPH_READER_OUTPUT_FORMAT;
      if (format !== 'plain' && format !== 'json') {
        throw new ConfigurationError(`GLYPH_READER_OUTPUT_FORMAT must be plain | json, got: ${format}`);
      }
      config.output.format = format;
    }

    return config;
  }

  /**
   * Return a default configuration.
   */
  static defaults(): GlyphReaderConfig {
    return {
      recognition: {
        language: 'English',
        background: '#ffffff',
        matchStrategy: 'exact',
        placeholder: '?',
        colorTolerance: 0,
        minSpanWidth: 2,
      },
      languages: {
        keying: 'coordinate',
      },
      output: {
        format: 'plain',
      },
    };
  }

  /** Deep-merge source into target (non-destructive). */
  private merge(target: GlyphReaderConfig, source: Partial<GlyphReaderConfig>): GlyphReaderConfig {
    const result = { ...target };
    if (source.recognition) result.recognition = { ...target.recognition, ...source.recognition };
    if (source.languages) result.languages = { ...target.languages, ...source.languages };
    if (source.output) result.output = { ...target.output, ...source.output };
    return result;
  }
}
