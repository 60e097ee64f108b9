/**
 * Custom bitmap glyphs keyed by character.
 */

import { markDirty } from './screen-cells.js';
import type { CustomGlyph, ScreenBufferState } from './screen-types.js';
import { Fnv64 } from './screen-utils.js';

/** Height rounds up, so a short last row still counts. */
export function newCustomGlyph(width: number, pixels: readonly number[]): CustomGlyph {
  const w = Number.isFinite(width) ? Math.max(0, Math.floor(width)) : 0;
  const height = w > 0 && pixels.length > 0 ? Math.ceil(pixels.length / w) : 0;
  return { width: w, height, pixels: [...pixels] };
}

/** Palette index at (x, y), 0 outside the grid or past the stored pixels. */
export function glyphPixel(glyph: CustomGlyph, x: number, y: number): number {
  if (x < 0 || x >= glyph.width || y < 0 || y >= glyph.height) return 0;
  return glyph.pixels[y * glyph.width + x] ?? 0;
}

export function glyphHash(glyph: CustomGlyph): bigint {
  const h = new Fnv64().int(glyph.width).int(glyph.height);
  for (const p of glyph.pixels) h.int(p);
  return h.digest();
}

/** Key for the glyph map: the first code point of `ch`. */
export function glyphKey(ch: string): string {
  const cp = ch.codePointAt(0);
  return cp === undefined ? '' : String.fromCodePoint(cp);
}

export function setGlyph(s: ScreenBufferState, ch: string, width: number, pixels: readonly number[]): void {
  const key = glyphKey(ch);
  if (key === '') return;
  const glyph = newCustomGlyph(width, pixels);
  if (glyph.width > 0 && pixels.length % glyph.width !== 0) {
    s.recoveries.record('glyph_pixels_misaligned', { glyph: key, pixels: pixels.length, width: glyph.width });
    console.warn(
      `[screen] glyph U+${key.codePointAt(0)?.toString(16).toUpperCase()} has ${pixels.length} pixels, not a multiple of width ${glyph.width}`,
    );
  }
  s.customGlyphs.set(key, glyph);
  markDirty(s);
}

export function getGlyph(s: ScreenBufferState, ch: string): CustomGlyph | undefined {
  const glyph = s.customGlyphs.get(glyphKey(ch));
  return glyph ? { ...glyph, pixels: [...glyph.pixels] } : undefined;
}

export function hasCustomGlyph(s: ScreenBufferState, ch: string): boolean {
  return s.customGlyphs.has(glyphKey(ch));
}

export function deleteGlyph(s: ScreenBufferState, ch: string): void {
  if (s.customGlyphs.delete(glyphKey(ch))) markDirty(s);
}

export function deleteAllGlyphs(s: ScreenBufferState): void {
  s.customGlyphs.clear();
  markDirty(s);
}
