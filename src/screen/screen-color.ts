/**
 * Color values: the 16-entry ANSI table, the xterm 256-color cube and the
 * conversions back to SGR codes.
 */

import type { Color, Rgb } from './screen-types.js';
import { clampChannel, toHex } from './screen-utils.js';

export const ANSI_RGB: readonly Rgb[] = [
  { r: 0, g: 0, b: 0 },
  { r: 170, g: 0, b: 0 },
  { r: 0, g: 170, b: 0 },
  { r: 170, g: 85, b: 0 },
  { r: 0, g: 0, b: 170 },
  { r: 170, g: 0, b: 170 },
  { r: 0, g: 170, b: 170 },
  { r: 170, g: 170, b: 170 },
  { r: 85, g: 85, b: 85 },
  { r: 255, g: 85, b: 85 },
  { r: 85, g: 255, b: 85 },
  { r: 255, g: 255, b: 85 },
  { r: 85, g: 85, b: 255 },
  { r: 255, g: 85, b: 255 },
  { r: 85, g: 255, b: 255 },
  { r: 255, g: 255, b: 255 },
];

/** Index used when a color index is out of range. */
const FALLBACK_INDEX = 7;

/** SGR 39/49: whatever the renderer treats as default. */
export const DEFAULT_FOREGROUND: Color = { type: 'default', r: 212, g: 212, b: 212 };
export const DEFAULT_BACKGROUND: Color = { type: 'default', r: 30, g: 30, b: 30 };
/** Initial value of every entry in a new palette. */
export const DEFAULT_BLACK: Color = { type: 'default', r: 0, g: 0, b: 0 };

function ansiRgb(index: number): Rgb {
  return ANSI_RGB[index] ?? ANSI_RGB[FALLBACK_INDEX];
}

function isIndex(value: number, size: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < size;
}

export function xterm256Rgb(index: number): Rgb {
  if (!isIndex(index, 256)) return ansiRgb(FALLBACK_INDEX);
  if (index < 16) return ansiRgb(index);
  if (index >= 232) {
    const v = (index - 232) * 10 + 8;
    return { r: v, g: v, b: v };
  }
  const i = index - 16;
  return {
    r: Math.floor(i / 36) * 51,
    g: Math.floor((i % 36) / 6) * 51,
    b: (i % 6) * 51,
  };
}

export function standardColor(index: number): Color {
  const i = isIndex(index, 16) ? index : FALLBACK_INDEX;
  return { type: 'standard', index: i, ...ansiRgb(i) };
}

export function paletteColor(index: number): Color {
  const i = isIndex(index, 256) ? index : FALLBACK_INDEX;
  return { type: 'palette', index: i, ...xterm256Rgb(i) };
}

export function trueColor(r: number, g: number, b: number): Color {
  return { type: 'truecolor', r: clampChannel(r), g: clampChannel(g), b: clampChannel(b) };
}

export function colorsEqual(a: Color, b: Color): boolean {
  switch (a.type) {
    case 'standard':
    case 'palette':
      return b.type === a.type && b.index === a.index;
    case 'default':
    case 'truecolor':
      return b.type === a.type && a.r === b.r && a.g === b.g && a.b === b.b;
  }
}

/** Multiplies each channel by 0.6, truncating. */
export function dimColor(c: Rgb): Color {
  return trueColor(Math.trunc(c.r * 0.6), Math.trunc(c.g * 0.6), Math.trunc(c.b * 0.6));
}

export function brightenColor(c: Rgb, amount = 64): Color {
  return trueColor(Math.min(255, c.r + amount), Math.min(255, c.g + amount), Math.min(255, c.b + amount));
}

function ansiCodeForIndex(index: number): number {
  return index < 8 ? 30 + index : 90 + (index - 8);
}

/**
 * Maps a color back to the foreground SGR code that selects it. Palette
 * indices above 15 are returned raw and need `38;5;N` framing.
 */
export function colorToANSICode(color: Color): number {
  switch (color.type) {
    case 'standard':
      return ansiCodeForIndex(color.index);
    case 'palette':
      return color.index < 16 ? ansiCodeForIndex(color.index) : color.index;
    case 'default':
      return 39;
    case 'truecolor': {
      const match = ANSI_RGB.findIndex((c) => c.r === color.r && c.g === color.g && c.b === color.b);
      return match >= 0 ? ansiCodeForIndex(match) : 37;
    }
  }
}

/** SGR parameter string selecting the color, e.g. `31`, `48;5;200`, `38;2;1;2;3`. */
export function colorToSgr(color: Color, isFg: boolean): string {
  const base = isFg ? 30 : 40;
  switch (color.type) {
    case 'default':
      return String(base + 9);
    case 'standard':
      return String(color.index < 8 ? base + color.index : base + 60 + color.index - 8);
    case 'palette':
      return `${base + 8};5;${color.index}`;
    case 'truecolor':
      return `${base + 8};2;${color.r};${color.g};${color.b}`;
  }
}

export function colorToHex(c: Rgb): string {
  return `#${toHex(c.r)}${toHex(c.g)}${toHex(c.b)}`;
}

/** Parses `#RGB` or `#RRGGBB` into a true color. */
export function parseHexColor(text: string): Color | undefined {
  const match = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(text.trim());
  if (!match) return undefined;
  let hex = match[1];
  if (hex.length === 3) {
    hex = hex.split('').map((ch) => ch + ch).join('');
  }
  return trueColor(
    parseInt(hex.slice(0, 2), 16),
    parseInt(hex.slice(2, 4), 16),
    parseInt(hex.slice(4, 6), 16),
  );
}
