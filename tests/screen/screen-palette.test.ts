import { describe, expect, it, vi } from 'vitest';
import { ScreenBuffer } from '../../src/screen/screen-buffer.js';
import { makeBlankCell } from '../../src/screen/screen-cells.js';
import {
  DEFAULT_BACKGROUND,
  DEFAULT_BLACK,
  DEFAULT_FOREGROUND,
  standardColor,
  trueColor,
} from '../../src/screen/screen-color.js';
import { glyphPaletteNumber, newPalette, paletteHash } from '../../src/screen/screen-palette.js';
import type { Cell } from '../../src/screen/screen-types.js';

function glyphCell(bgp: number): Cell {
  return { ...makeBlankCell(standardColor(2), standardColor(4)), bgp };
}

describe('palettes', () => {
  it('fills new palettes with black color entries', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
    buffer.initPalette(5, 2);
    expect(buffer.getPalette(5)).toEqual({
      entries: [
        { kind: 'color', color: DEFAULT_BLACK, dim: false },
        { kind: 'color', color: DEFAULT_BLACK, dim: false },
      ],
      usesBg: false,
      usesDefaultFG: false,
    });
  });

  it('maps SGR codes to entries', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
    buffer.initPalette(5, 4);
    buffer.setPaletteEntry(5, 0, 8);
    buffer.setPaletteEntry(5, 1, 9, true);
    buffer.setPaletteEntry(5, 2, 31);
    buffer.setPaletteEntry(5, 3, 97);

    expect(buffer.getPalette(5)).toEqual({
      entries: [
        { kind: 'transparent', dim: false },
        { kind: 'default-fg', dim: true },
        { kind: 'color', color: standardColor(1), dim: false },
        { kind: 'color', color: standardColor(15), dim: false },
      ],
      usesBg: true,
      usesDefaultFG: true,
    });
  });

  it('round-trips a palette color code through the ANSI table', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
    buffer.initPalette(1, 1);
    buffer.setPaletteEntry(1, 0, 31);
    const entry = buffer.getPalette(1)?.entries[0];
    expect(entry).toEqual({ kind: 'color', color: { type: 'standard', index: 1, r: 170, g: 0, b: 0 }, dim: false });
    if (entry?.kind !== 'color') throw new Error('expected a color entry');
    expect(buffer.colorToANSICode(entry.color)).toBe(31);
  });

  it('uses white for unknown codes and counts them', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3, traceUnknownInput: false });
    buffer.initPalette(5, 1);
    buffer.setPaletteEntry(5, 0, 55);
    expect(buffer.getPalette(5)?.entries[0]).toEqual({ kind: 'color', color: standardColor(7), dim: false });
    expect(buffer.getRecoveryCount('palette_unknown_code')).toBe(1);
    expect(buffer.getLastRecovery('palette_unknown_code')).toEqual({ palette: 5, code: 55 });
  });

  it('warns about unknown codes when tracing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const buffer = new ScreenBuffer({ cols: 10, rows: 3, traceUnknownInput: true });
    buffer.initPalette(2, 1);
    buffer.setPaletteEntry(2, 0, 55);
    expect(warn).toHaveBeenCalledWith('[screen] unknown palette color code 55 for palette 2[0], using white');
    warn.mockRestore();
  });

  it('ignores writes to missing palettes and bad indices', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
    buffer.initPalette(5, 2);
    buffer.setPaletteEntry(9, 0, 31);
    buffer.setPaletteEntry(5, 2, 31);
    buffer.setPaletteEntryColor(5, -1, trueColor(1, 2, 3));

    expect(buffer.getPalette(9)).toBeUndefined();
    expect(buffer.getPalette(5)?.entries).toEqual([
      { kind: 'color', color: DEFAULT_BLACK, dim: false },
      { kind: 'color', color: DEFAULT_BLACK, dim: false },
    ]);
    expect(buffer.getRecoveryCounts()).toEqual({ palette_missing: 1, palette_index_out_of_range: 2 });
    expect(buffer.getLastRecovery('palette_missing')).toEqual({ op: 'set_entry', palette: 9 });
    expect(buffer.getLastRecovery('palette_index_out_of_range')).toEqual({
      op: 'set_entry_color',
      palette: 5,
      index: -1,
    });
  });

  it('returns copies from getPalette', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
    buffer.initPalette(5, 1);
    const copy = buffer.getPalette(5);
    copy?.entries.push({ kind: 'transparent', dim: false });
    expect(buffer.getPalette(5)?.entries).toHaveLength(1);
  });

  it('deletes palettes', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
    buffer.initPalette(1, 1);
    buffer.initPalette(2, 1);
    buffer.deletePalette(1);
    expect(buffer.getPalette(1)).toBeUndefined();
    expect(buffer.getPalette(2)).toBeDefined();
    buffer.deleteAllPalettes();
    expect(buffer.getPalette(2)).toBeUndefined();
  });

  describe('resolveGlyphColor', () => {
    it('resolves entries of a multi-entry palette, clamping the index', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.initPalette(5, 4);
      buffer.setPaletteEntry(5, 0, 8);
      buffer.setPaletteEntry(5, 1, 9, true);
      buffer.setPaletteEntry(5, 2, 31);
      buffer.setPaletteEntry(5, 3, 97);
      const cell = glyphCell(5);

      expect(buffer.resolveGlyphColor(cell, 0)).toEqual(standardColor(4));
      expect(buffer.resolveGlyphColor(cell, 1)).toEqual(trueColor(0, 102, 0));
      expect(buffer.resolveGlyphColor(cell, 2)).toEqual(standardColor(1));
      expect(buffer.resolveGlyphColor(cell, 9)).toEqual(standardColor(15));
    });

    it('resolves non-finite indices as index 0', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.initPalette(5, 2);
      buffer.setPaletteEntry(5, 0, 31);
      buffer.setPaletteEntry(5, 1, 32);
      const cell = glyphCell(5);

      expect(buffer.resolveGlyphColor(cell, Number.NaN)).toEqual(standardColor(1));
      expect(buffer.resolveGlyphColor(cell, Infinity)).toEqual(standardColor(1));
      expect(buffer.resolveGlyphColor(glyphCell(-1), Number.NaN)).toEqual(standardColor(4));
    });

    it('treats index 0 of a single-entry palette as background', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.initPalette(6, 1);
      buffer.setPaletteEntry(6, 0, 31);
      const cell = glyphCell(6);

      expect(buffer.resolveGlyphColor(cell, 0)).toEqual(standardColor(4));
      expect(buffer.resolveGlyphColor(cell, 1)).toEqual(standardColor(1));
      expect(buffer.resolveGlyphColor(cell, 5)).toEqual(standardColor(1));
    });

    it('falls back to cell colors without a palette', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      const cell = glyphCell(-1);

      expect(buffer.resolveGlyphColor(cell, 0)).toEqual(standardColor(4));
      expect(buffer.resolveGlyphColor(cell, 1)).toEqual(standardColor(2));
      expect(buffer.resolveGlyphColor(cell, 2)).toEqual(trueColor(0, 102, 0));
      expect(buffer.resolveGlyphColor(cell, 3)).toEqual(trueColor(64, 234, 64));
    });

    it('falls back to cell colors for an empty palette', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.initPalette(7, 0);
      expect(buffer.resolveGlyphColor(glyphCell(7), 1)).toEqual(standardColor(2));
    });

    it('looks up the palette named by the foreground when bgp is unset', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.initPalette(32, 2);
      buffer.setPaletteEntryColor(32, 1, trueColor(9, 9, 9));
      expect(buffer.resolveGlyphColor(glyphCell(-1), 1)).toEqual(trueColor(9, 9, 9));
    });
  });

  describe('glyphPaletteNumber', () => {
    it('prefers an explicit base glyph palette', () => {
      expect(glyphPaletteNumber(glyphCell(4))).toBe(4);
    });

    it('derives the palette from standard foregrounds', () => {
      expect(glyphPaletteNumber(makeBlankCell(standardColor(3), DEFAULT_BACKGROUND))).toBe(33);
      expect(glyphPaletteNumber(makeBlankCell(standardColor(12), DEFAULT_BACKGROUND))).toBe(94);
    });

    it('uses 39 for other foregrounds', () => {
      expect(glyphPaletteNumber(makeBlankCell(DEFAULT_FOREGROUND, DEFAULT_BACKGROUND))).toBe(39);
      expect(glyphPaletteNumber(makeBlankCell(trueColor(1, 2, 3), DEFAULT_BACKGROUND))).toBe(39);
    });
  });

  describe('paletteHash', () => {
    it('is stable for equal palettes and changes with entries', () => {
      const a = newPalette(2);
      const b = newPalette(2);
      expect(paletteHash(a)).toBe(paletteHash(b));

      b.entries[1] = { kind: 'color', color: standardColor(1), dim: false };
      expect(paletteHash(a)).not.toBe(paletteHash(b));
      expect(paletteHash(newPalette(3))).not.toBe(paletteHash(a));
    });
  });
});
