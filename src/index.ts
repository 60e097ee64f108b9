/**
 * Main entry point for tilescreen
 */

export { ScreenBuffer } from './screen/screen-buffer.js';
export type {
  CursorStyle,
  DirtyListener,
  ScaleListener,
  ScreenCrop,
  ScreenSize,
  SgrAttributes,
} from './screen/screen-buffer.js';
export { ReadWriteLock } from './screen/screen-lock.js';
export {
  DEFAULT_AUTOSCROLL_WINDOW_MS,
  DEFAULT_COLS,
  DEFAULT_MANUAL_SCROLL_COOLDOWN_MS,
  DEFAULT_MAX_SCROLLBACK,
  DEFAULT_ROWS,
  resolveScreenBufferOptions,
} from './screen/screen-config.js';
export type { ResolvedScreenBufferOptions, ScreenBufferOptions } from './screen/screen-config.js';
export {
  ANSI_RGB,
  DEFAULT_BACKGROUND,
  DEFAULT_BLACK,
  DEFAULT_FOREGROUND,
  brightenColor,
  colorToANSICode,
  colorToHex,
  colorToSgr,
  colorsEqual,
  dimColor,
  paletteColor,
  parseHexColor,
  standardColor,
  trueColor,
  xterm256Rgb,
} from './screen/screen-color.js';
export { DEFAULT_FG_PALETTE, glyphPaletteNumber, newPalette, paletteHash } from './screen/screen-palette.js';
export { glyphHash, glyphPixel, newCustomGlyph } from './screen/screen-glyphs.js';
export { charWidthClass, eastAsianWidth, eastAsianWidthClass, isCombiningMark } from './screen/screen-width.js';
export type { EastAsianWidthClass, WidthClass } from './screen/screen-width.js';
export { EMPTY_CELL, cellText, makeBlankCell } from './screen/screen-cells.js';
export { ScreenRecoveryLog } from './screen/screen-diagnostics.js';
export type { PaletteOp, ScreenRecoveryDetails, ScreenRecoveryEvent } from './screen/screen-diagnostics.js';
export { formatScreenDump } from './screen/screen-dump.js';
export type { ScreenDumpOptions } from './screen/screen-dump.js';
export type {
  ActivityMark,
  AmbiguousWidthMode,
  Cell,
  Color,
  ColorType,
  CursorDirections,
  CustomGlyph,
  HorizMemo,
  Line,
  LineAttribute,
  LineDensity,
  LineInfo,
  MoveDirection,
  Palette,
  PaletteEntry,
  Rgb,
  ScrollbackEntry,
  SelectionRange,
  TerminalModes,
  TextAttributes,
  UnderlineStyle,
} from './screen/screen-types.js';
