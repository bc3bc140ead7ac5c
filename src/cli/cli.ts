/**
 * glyph-reader CLI
 *
 * Commands:
 *   glyph-reader read <images...> [--language English] [--background #ffffff] [--strategy exact]
 *   glyph-reader languages
 *   glyph-reader config get [key] | set <key> <value> | validate | reset
 */

import { Command } from 'commander';
import { ConfigManager, type GlyphReaderConfig } from '../config/index.js';
import { ConfigurationError, ErrorHandler, InvalidArgumentError } from '../errors/index.js';
import { loadImage, parseColor } from '../image/index.js';
import { Recognizer, isMatchStrategy } from '../recognition/index.js';
import { TemplateStore } from '../templates/index.js';
import { OutputFormatter, type ImageReadResult } from './formatter.js';
import { ProgressReporter } from './progress.js';

interface ReadOptions {
  language?: string;
  background?: string;
  strategy?: string;
  placeholder?: string;
  tolerance?: string;
  packs?: string;
  format?: string;
  verbose?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class GlyphReaderCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter()
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('glyph-reader')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Read handwritten characters from raster images');

    // ── read ───────────────────────────────────────────────────────────────
    program
      .command('read <images...>')
      .description('Recognize the text drawn in one or more images')
      .option('-l, --language <name>', 'Language pack to read with')
      .option('-b, --background <color>', 'Background color (#rrggbb); every other color is ink')
      .option('-s, --strategy <exact|any-cell>', 'Template matching strategy')
      .option('--placeholder <char>', 'Character emitted for unrecognized glyphs')
      .option('--tolerance <n>', 'Per-channel color tolerance for ink detection')
      .option('--packs <dir>', 'Directory holding <language>.txt packs')
      .option('-f, --format <plain|json>', 'Output format')
      .option('-v, --verbose', 'Print the normalized grid of every glyph')
      .action(async (images: string[], opts: ReadOptions) => {
        try {
          const config = this.applyReadOptions(this.configManager.loadWithEnvOverrides(), opts);
          const reporter = new ProgressReporter(opts.verbose === true);
          const recognizer = this.createRecognizer(config);
          reporter.logInfo(
            this.formatter.formatSettings(recognizer.getLanguage(), recognizer.getBackground(), config.recognition.matchStrategy)
          );

          const results: ImageReadResult[] = [];
          for (const image of images) {
            reporter.startTask(`Reading ${image}`);
            const outcome = await ErrorHandler.wrap(() => this.readImage(recognizer, image), { source: image });
            if (!outcome.ok) {
              reporter.failTask(`Reading ${image}`, outcome.error);
              process.exitCode = 1;
              continue;
            }
            const data = outcome.data;
            reporter.completeTask(`Reading ${image}`);
            const missed = data.readings.filter((r) => !r.recognized).length;
            if (missed > 0) {
              reporter.warn(`${missed} unrecognized glyph(s) in ${image}`);
            }
            if (opts.verbose) {
              console.log(this.formatter.formatReadings(data));
            }
            results.push(data);
          }

          if (config.output.format === 'json') {
            console.log(this.formatter.formatJson(results));
          } else {
            for (const result of results) {
              console.log(this.formatter.formatText(result));
            }
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── languages ──────────────────────────────────────────────────────────
    program
      .command('languages')
      .description('List installed language packs')
      .option('--packs <dir>', 'Directory holding <language>.txt packs')
      .action((opts: { packs?: string }) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const store = new TemplateStore({
            packDir: opts.packs ?? config.languages.packDir,
            keying: config.languages.keying,
          });
          console.log(this.formatter.formatLanguages(store.listLanguages(), config.recognition.language));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    program.addCommand(this.configCommand());

    return program;
  }

  // ─── config ───────────────────────────────────────────────────────────────

  private configCommand(): Command {
    const cmd = new Command('config');
    cmd.description('Manage glyph-reader configuration');

    cmd
      .command('get [key]')
      .description('Show full config or a specific key')
      .action((key?: string) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          if (!key) {
            console.log(JSON.stringify(config, null, 2));
            return;
          }
          let value: unknown = config;
          for (const part of key.split('.')) {
            value = isRecord(value) ? value[part] : undefined;
          }
          console.log(value !== undefined ? JSON.stringify(value, null, 2) : `Key not found: ${key}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    cmd
      .command('set <key> <value>')
      .description('Set a configuration key')
      .action((key: string, value: string) => {
        try {
          const config = this.configManager.load();
          const parts = key.split('.');
          const lastKey = parts[parts.length - 1];
          let target: unknown = config;
          for (const part of parts.slice(0, -1)) {
            target = isRecord(target) ? target[part] : undefined;
          }
          if (!isRecord(target) || parts.length < 2) {
            throw new ConfigurationError(`Unknown config key: ${key}`, { key });
          }
          let parsed: unknown;
          try {
            parsed = JSON.parse(value);
          } catch {
            parsed = value;
          }
          target[lastKey] = parsed;
          const { valid, errors } = this.configManager.validate(config);
          if (!valid) {
            throw new ConfigurationError(`Invalid value for ${key}: ${errors.join('; ')}`, { key, errors });
          }
          this.configManager.save(config);
          console.log(`✅ Set ${key} = ${value}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    cmd
      .command('validate')
      .description('Validate the current configuration')
      .action(() => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const { valid, errors } = this.configManager.validate(config);
          if (valid) {
            console.log('✅ Configuration is valid');
          } else {
            console.error('❌ Configuration has errors:');
            for (const err of errors) {
              console.error(`  - ${err}`);
            }
            process.exitCode = 1;
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    cmd
      .command('reset')
      .description('Reset configuration to defaults')
      .action(() => {
        try {
          this.configManager.save(ConfigManager.defaults());
          console.log('✅ Configuration reset to defaults');
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return cmd;
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected createRecognizer(config: GlyphReaderConfig): Recognizer {
    const { valid, errors } = this.configManager.validate(config);
    if (!valid) {
      throw new ConfigurationError(`Invalid configuration: ${errors.join('; ')}`, { errors });
    }
    const background = parseColor(config.recognition.background);
    if (background === undefined) {
      throw new InvalidArgumentError(`Illegal background color: ${config.recognition.background}`);
    }
    const store = new TemplateStore({
      packDir: config.languages.packDir,
      keying: config.languages.keying,
    });
    return new Recognizer(config.recognition.language, background, {
      store,
      matchStrategy: config.recognition.matchStrategy,
      placeholder: config.recognition.placeholder,
      colorTolerance: config.recognition.colorTolerance,
      minSpanWidth: config.recognition.minSpanWidth,
    });
  }

  protected async readImage(recognizer: Recognizer, source: string): Promise<ImageReadResult> {
    const grid = await loadImage(source, { background: recognizer.getBackground() });
    const readings = recognizer.analyze(grid);
    return { source, text: readings.map((r) => r.character).join(''), readings };
  }

  private applyReadOptions(config: GlyphReaderConfig, opts: ReadOptions): GlyphReaderConfig {
    const recognition = { ...config.recognition };
    const languages = { ...config.languages };
    const output = { ...config.output };

    if (opts.language) recognition.language = opts.language;
    if (opts.background) recognition.background = opts.background;
    if (opts.strategy) {
      if (!isMatchStrategy(opts.strategy)) {
        throw new InvalidArgumentError(`--strategy must be exact | any-cell, got: ${opts.strategy}`);
      }
      recognition.matchStrategy = opts.strategy;
    }
    if (opts.placeholder) recognition.placeholder = opts.placeholder;
    if (opts.tolerance) recognition.colorTolerance = parseInt(opts.tolerance, 10);
    if (opts.packs) languages.packDir = opts.packs;
    if (opts.format) {
      if (opts.format !== 'plain' && opts.format !== 'json') {
        throw new InvalidArgumentError(`--format must be plain | json, got: ${opts.format}`);
      }
      output.format = opts.format;
    }
    return { recognition, languages, output };
  }
}
