/**
 * Indexed palettes for custom glyphs and the rules that turn a glyph pixel's
 * palette index into a display color.
 */

import { DEFAULT_BLACK, dimColor, brightenColor, standardColor } from './screen-color.js';
import { markDirty } from './screen-cells.js';
import type { PaletteOp } from './screen-diagnostics.js';
import type { Cell, Color, Palette, PaletteEntry, ScreenBufferState } from './screen-types.js';
import { Fnv64 } from './screen-utils.js';

/** SGR foreground code used as palette number for non-standard foregrounds. */
export const DEFAULT_FG_PALETTE = 39;

export function newPalette(length: number): Palette {
  const size = Number.isFinite(length) ? Math.max(0, Math.floor(length)) : 0;
  const entries: PaletteEntry[] = [];
  for (let i = 0; i < size; i++) {
    entries.push({ kind: 'color', color: DEFAULT_BLACK, dim: false });
  }
  return { entries, usesBg: false, usesDefaultFG: false };
}

export function copyPalette(p: Palette): Palette {
  return { entries: [...p.entries], usesBg: p.usesBg, usesDefaultFG: p.usesDefaultFG };
}

export function initPalette(s: ScreenBufferState, n: number, length: number): void {
  s.palettes.set(n, newPalette(length));
  markDirty(s);
}

export function deletePalette(s: ScreenBufferState, n: number): void {
  if (s.palettes.delete(n)) markDirty(s);
}

export function deleteAllPalettes(s: ScreenBufferState): void {
  s.palettes.clear();
  markDirty(s);
}

function entrySlot(s: ScreenBufferState, n: number, idx: number, op: PaletteOp): Palette | undefined {
  const palette = s.palettes.get(n);
  if (!palette) {
    s.recoveries.record('palette_missing', { op, palette: n });
    return undefined;
  }
  if (!Number.isInteger(idx) || idx < 0 || idx >= palette.entries.length) {
    s.recoveries.record('palette_index_out_of_range', { op, palette: n, index: idx });
    return undefined;
  }
  return palette;
}

/** Maps 30-37/40-47 to ANSI 0-7 and 90-97/100-107 to 8-15. */
function ansiIndexForCode(code: number): number | undefined {
  if (code >= 30 && code <= 37) return code - 30;
  if (code >= 40 && code <= 47) return code - 40;
  if (code >= 90 && code <= 97) return code - 90 + 8;
  if (code >= 100 && code <= 107) return code - 100 + 8;
  return undefined;
}

/**
 * Sets an entry from an SGR-style code: 8 is transparent (cell background),
 * 9 the cell foreground, color codes select the ANSI table. Unknown codes
 * give white.
 */
export function setPaletteEntry(
  s: ScreenBufferState,
  n: number,
  idx: number,
  code: number,
  dim: boolean,
): void {
  const palette = entrySlot(s, n, idx, 'set_entry');
  if (!palette) return;

  if (code === 8) {
    palette.entries[idx] = { kind: 'transparent', dim };
    palette.usesBg = true;
  } else if (code === 9) {
    palette.entries[idx] = { kind: 'default-fg', dim };
    palette.usesDefaultFG = true;
  } else {
    let index = ansiIndexForCode(code);
    if (index === undefined) {
      s.recoveries.record('palette_unknown_code', { palette: n, code });
      if (s.traceUnknownInput) {
        console.warn(`[screen] unknown palette color code ${code} for palette ${n}[${idx}], using white`);
      }
      index = 7;
    }
    palette.entries[idx] = { kind: 'color', color: standardColor(index), dim };
  }
  markDirty(s);
}

export function setPaletteEntryColor(
  s: ScreenBufferState,
  n: number,
  idx: number,
  color: Color,
  dim: boolean,
): void {
  const palette = entrySlot(s, n, idx, 'set_entry_color');
  if (!palette) return;
  palette.entries[idx] = { kind: 'color', color, dim };
  markDirty(s);
}

export function getPalette(s: ScreenBufferState, n: number): Palette | undefined {
  const p = s.palettes.get(n);
  return p ? copyPalette(p) : undefined;
}

/** Palette number a cell's glyph pixels are looked up in. */
export function glyphPaletteNumber(cell: Cell): number {
  if (cell.bgp >= 0) return cell.bgp;
  const fg = cell.fg;
  if (fg.type === 'standard') {
    return fg.index < 8 ? 30 + fg.index : 90 + (fg.index - 8);
  }
  return DEFAULT_FG_PALETTE;
}

/** 0 background, 1 foreground, 2 dim foreground, 3+ bright foreground. */
function fallbackGlyphColor(cell: Cell, paletteIndex: number): Color {
  if (paletteIndex === 0) return cell.bg;
  if (paletteIndex === 1) return cell.fg;
  if (paletteIndex === 2) return dimColor(cell.fg);
  return brightenColor(cell.fg);
}

function resolveEntry(entry: PaletteEntry, cell: Cell): Color {
  switch (entry.kind) {
    case 'transparent':
      return cell.bg;
    case 'default-fg':
      return entry.dim ? dimColor(cell.fg) : cell.fg;
    case 'color':
      return entry.dim ? dimColor(entry.color) : entry.color;
  }
}

/** Non-finite pixel indices resolve as index 0. */
export function resolveGlyphColor(s: ScreenBufferState, cell: Cell, paletteIndex: number): Color {
  const index = Number.isFinite(paletteIndex) ? Math.floor(paletteIndex) : 0;
  const palette = s.palettes.get(glyphPaletteNumber(cell));
  const entries = palette?.entries ?? [];
  if (entries.length === 0) return fallbackGlyphColor(cell, index);

  if (entries.length === 1) {
    return index === 0 ? cell.bg : resolveEntry(entries[0], cell);
  }

  const i = Math.max(0, Math.min(entries.length - 1, index));
  return resolveEntry(entries[i], cell);
}

const ENTRY_KIND_CODES = { color: 0, transparent: 1, 'default-fg': 2 } as const;
const COLOR_TYPE_CODES = { default: 0, standard: 1, palette: 2, truecolor: 3 } as const;

/** 64-bit FNV-1a over a palette's entries, for render cache keys. */
export function paletteHash(p: Palette): bigint {
  const h = new Fnv64().int(p.entries.length);
  for (const entry of p.entries) {
    h.byte(ENTRY_KIND_CODES[entry.kind]).bool(entry.dim);
    if (entry.kind === 'color') {
      const c = entry.color;
      h.byte(COLOR_TYPE_CODES[c.type]).byte(c.r).byte(c.g).byte(c.b);
      if (c.type === 'standard' || c.type === 'palette') h.byte(c.index);
    }
  }
  return h.digest();
}
