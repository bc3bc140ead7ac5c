/**
 * Template tests
 *
 * GlyphPattern, TemplateDictionary, parseLanguagePack and TemplateStore.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { GlyphPattern, SCALE_SIZE } from './glyph-pattern.js';
import { TemplateDictionary } from './template-dictionary.js';
import { TemplateStore, parseLanguagePack, DEFAULT_PACK_DIR } from './template-store.js';
import { LanguagePackNotFoundError, MalformedTemplateRecordError } from '../errors/index.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function expectMalformed(text: string, line: number): void {
  try {
    parseLanguagePack(text);
    expect.fail('expected MalformedTemplateRecordError');
  } catch (err) {
    expect(err).toBeInstanceOf(MalformedTemplateRecordError);
    if (err instanceof MalformedTemplateRecordError) {
      expect(err.line).toBe(line);
      expect(err.code).toBe('MALFORMED_TEMPLATE_RECORD');
    }
  }
}

// ─── GlyphPattern ─────────────────────────────────────────────────────────────

describe('GlyphPattern', () => {
  it('compares by cell set, not by insertion order', () => {
    const a = new GlyphPattern([{ x: 1, y: 2 }, { x: 0, y: 0 }]);
    const b = new GlyphPattern([{ x: 0, y: 0 }, { x: 1, y: 2 }, { x: 0, y: 0 }]);
    expect(a.equals(b)).toBe(true);
    expect(a.key).toBe('0,0;1,2');
    expect(b.size).toBe(2);
  });

  it('orders cells row-major', () => {
    const p = new GlyphPattern([{ x: 0, y: 3 }, { x: 5, y: 1 }, { x: 2, y: 1 }]);
    expect(p.cells).toEqual([{ x: 2, y: 1 }, { x: 5, y: 1 }, { x: 0, y: 3 }]);
  });

  it('keeps its cells frozen and detached from the input', () => {
    const input = { x: 3, y: 4 };
    const p = new GlyphPattern([input]);
    input.x = 7;
    expect(p.has(3, 4)).toBe(true);
    expect(p.key).toBe('3,4');
    expect(Object.isFrozen(p.cells)).toBe(true);
    expect(Object.isFrozen(p.cells[0])).toBe(true);
  });

  it('rejects cells outside the grid', () => {
    expect(() => new GlyphPattern([{ x: SCALE_SIZE, y: 0 }])).toThrow(RangeError);
    expect(() => new GlyphPattern([{ x: 0, y: -1 }])).toThrow(RangeError);
  });

  it('round-trips through toString and fromRows', () => {
    const rows = [
      '....#....',
      '...###...',
      '....#....',
      '.........',
      '.........',
      '.........',
      '.........',
      '.........',
      '#.......#',
    ];
    const p = GlyphPattern.fromRows(rows);
    expect(p.size).toBe(7);
    expect(p.toString()).toBe(rows.join('\n'));
  });

  it('EMPTY has no cells', () => {
    expect(GlyphPattern.EMPTY.isEmpty).toBe(true);
    expect(GlyphPattern.EMPTY.key).toBe('');
  });
});

// ─── TemplateDictionary ───────────────────────────────────────────────────────

describe('TemplateDictionary', () => {
  it('lets the last entry win for identical patterns', () => {
    const cell = new GlyphPattern([{ x: 4, y: 4 }]);
    const dict = new TemplateDictionary('Test', [
      [cell, 'a'],
      [new GlyphPattern([{ x: 4, y: 4 }]), 'b'],
    ]);
    expect(dict.size).toBe(1);
    expect(dict.get(cell)).toBe('b');
  });

  it('returns undefined for unknown patterns', () => {
    const dict = new TemplateDictionary('Test', []);
    expect(dict.get(new GlyphPattern([{ x: 0, y: 0 }]))).toBeUndefined();
    expect(dict.has(new GlyphPattern([{ x: 0, y: 0 }]))).toBe(false);
  });

  it('lists distinct characters in first-seen order', () => {
    const dict = parseLanguagePack('0, 0\t1, 1\tz\n2, 2\ta\n');
    expect(dict.characters()).toEqual(['z', 'a']);
  });
});

// ─── parseLanguagePack ────────────────────────────────────────────────────────

describe('parseLanguagePack', () => {
  it('registers one singleton pattern per coordinate token by default', () => {
    const dict = parseLanguagePack('4, 0\t4, 1\t4, 2\tl\n');
    expect(dict.size).toBe(3);
    expect(dict.get(new GlyphPattern([{ x: 4, y: 1 }]))).toBe('l');
    expect(dict.get(new GlyphPattern([{ x: 4, y: 0 }, { x: 4, y: 1 }, { x: 4, y: 2 }]))).toBeUndefined();
  });

  it('registers whole records with pattern keying', () => {
    const dict = parseLanguagePack('4, 0\t4, 1\t4, 2\tl\n', { keying: 'pattern', language: 'Test' });
    expect(dict.size).toBe(1);
    expect(dict.language).toBe('Test');
    expect(dict.get(new GlyphPattern([{ x: 4, y: 2 }, { x: 4, y: 0 }, { x: 4, y: 1 }]))).toBe('l');
  });

  it('overwrites a coordinate shared by later records', () => {
    const dict = parseLanguagePack('4, 4\t4, 5\ta\n4, 4\tb\n');
    expect(dict.get(new GlyphPattern([{ x: 4, y: 4 }]))).toBe('b');
    expect(dict.get(new GlyphPattern([{ x: 4, y: 5 }]))).toBe('a');
  });

  it('skips blank lines and accepts CRLF line endings', () => {
    const dict = parseLanguagePack('0, 0\ta\r\n\r\n1, 1\tb\r\n');
    expect(dict.get(new GlyphPattern([{ x: 0, y: 0 }]))).toBe('a');
    expect(dict.get(new GlyphPattern([{ x: 1, y: 1 }]))).toBe('b');
  });

  it('accepts a non-ASCII character token', () => {
    const dict = parseLanguagePack('3, 3\tあ\n');
    expect(dict.get(new GlyphPattern([{ x: 3, y: 3 }]))).toBe('あ');
  });

  it('rejects a token missing the ", " separator', () => {
    expectMalformed('0, 0\t0,0\tx', 1);
  });

  it('rejects a record with no coordinate tokens', () => {
    expectMalformed('0, 0\ta\nb\n', 2);
  });

  it('rejects non-integer components', () => {
    expectMalformed('1, x\ta', 1);
    expectMalformed('1.5, 2\ta', 1);
  });

  it('rejects a coordinate with three components', () => {
    expectMalformed('1, 2, 3\ta', 1);
  });

  it('rejects coordinates outside the 9x9 grid', () => {
    expectMalformed('9, 0\ta', 1);
  });

  it('rejects an empty trailing character', () => {
    expectMalformed('1, 1\t', 1);
  });

  it('keeps the first character of a longer trailing token', () => {
    const dict = parseLanguagePack('4, 0\tl \n2, 2\tあい\n');
    expect(dict.get(new GlyphPattern([{ x: 4, y: 0 }]))).toBe('l');
    expect(dict.get(new GlyphPattern([{ x: 2, y: 2 }]))).toBe('あ');
  });
});

// ─── TemplateStore ────────────────────────────────────────────────────────────

describe('TemplateStore', () => {
  let packDir: string;

  beforeEach(() => {
    packDir = fs.mkdtempSync(path.join(os.tmpdir(), 'glyph-reader-packs-'));
    fs.writeFileSync(path.join(packDir, 'Tiny.txt'), '4, 4\to\n0, 0\t8, 8\tx\n', 'utf-8');
    fs.writeFileSync(path.join(packDir, 'Broken.txt'), '0, 0\t0,0\tx\n', 'utf-8');
    fs.writeFileSync(path.join(packDir, 'notes.md'), 'not a pack', 'utf-8');
  });

  afterEach(() => {
    fs.rmSync(packDir, { recursive: true, force: true });
  });

  it('loads a pack by language name', () => {
    const dict = new TemplateStore({ packDir }).load('Tiny');
    expect(dict.language).toBe('Tiny');
    expect(dict.size).toBe(3);
    expect(dict.get(new GlyphPattern([{ x: 8, y: 8 }]))).toBe('x');
  });

  it('applies the configured keying', () => {
    const dict = new TemplateStore({ packDir, keying: 'pattern' }).load('Tiny');
    expect(dict.size).toBe(2);
    expect(dict.get(new GlyphPattern([{ x: 0, y: 0 }, { x: 8, y: 8 }]))).toBe('x');
  });

  it('throws LanguagePackNotFoundError for a missing pack', () => {
    expect(() => new TemplateStore({ packDir }).load('Klingon')).toThrow(LanguagePackNotFoundError);
  });

  it('throws LanguagePackNotFoundError when the pack path is not a readable file', () => {
    fs.mkdirSync(path.join(packDir, 'Folder.txt'));
    const err = (() => {
      try {
        new TemplateStore({ packDir }).load('Folder');
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(err).toBeInstanceOf(LanguagePackNotFoundError);
    expect(err).toMatchObject({ context: { language: 'Folder', packDir } });
  });

  it('never resolves names that leave the pack directory', () => {
    const store = new TemplateStore({ packDir });
    expect(store.resolve('../Tiny')).toBeUndefined();
    expect(() => store.load('../Tiny')).toThrow(LanguagePackNotFoundError);
  });

  it('surfaces malformed records', () => {
    expect(() => new TemplateStore({ packDir }).load('Broken')).toThrow(MalformedTemplateRecordError);
  });

  it('lists pack names sorted', () => {
    expect(new TemplateStore({ packDir }).listLanguages()).toEqual(['Broken', 'Tiny']);
  });

  it('returns no languages for a missing directory', () => {
    expect(new TemplateStore({ packDir: path.join(packDir, 'nope') }).listLanguages()).toEqual([]);
  });

  it('ships an English pack', () => {
    const store = new TemplateStore();
    expect(store.packDir).toBe(DEFAULT_PACK_DIR);
    expect(store.listLanguages()).toContain('English');
    const dict = store.load('English');
    expect(dict.size).toBe(57);
    expect(dict.get(new GlyphPattern([{ x: 4, y: 4 }]))).toBe('x');
    expect(dict.get(new GlyphPattern([{ x: 4, y: 3 }]))).toBe('l');
  });
});
