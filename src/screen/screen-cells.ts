/**
 * Cell, line and screen model: construction, growth and lookups on the live
 * screen. Viewport-relative lookups live in screen-scroll-ops.
 */

import { DEFAULT_BACKGROUND, DEFAULT_FOREGROUND } from './screen-color.js';
import type { ResolvedScreenBufferOptions } from './screen-config.js';
import { ScreenRecoveryLog } from './screen-diagnostics.js';
import type {
  Cell,
  Color,
  LineInfo,
  ScreenBufferState,
  TerminalModes,
  TextAttributes,
} from './screen-types.js';

type BlankCellAttrs = Partial<Pick<Cell, 'bold' | 'italic' | 'underline' | 'reverse' | 'blink'>>;

export function makeBlankCell(fg: Color, bg: Color, attrs?: BlankCellAttrs): Cell {
  return {
    char: ' ',
    combining: '',
    fg,
    bg,
    bold: attrs?.bold ?? false,
    italic: attrs?.italic ?? false,
    underline: attrs?.underline ?? false,
    underlineStyle: 'none',
    reverse: attrs?.reverse ?? false,
    blink: attrs?.blink ?? false,
    strikethrough: false,
    flexWidth: false,
    cellWidth: 1,
    bgp: -1,
    xFlip: false,
    yFlip: false,
  };
}

export const EMPTY_CELL: Cell = makeBlankCell(DEFAULT_FOREGROUND, DEFAULT_BACKGROUND);

export function defaultLineInfo(defaultCell: Cell = EMPTY_CELL): LineInfo {
  return { attribute: 'normal', defaultCell };
}

export function defaultAttributes(): TextAttributes {
  return {
    fg: DEFAULT_FOREGROUND,
    bg: DEFAULT_BACKGROUND,
    bold: false,
    italic: false,
    underline: false,
    underlineStyle: 'none',
    underlineColor: undefined,
    reverse: false,
    blink: false,
    strikethrough: false,
    flexWidth: false,
    bgp: -1,
    xFlip: false,
    yFlip: false,
  };
}

export function defaultModes(): TerminalModes {
  return {
    flexWidth: false,
    visualWidthWrap: false,
    ambiguousWidth: 'auto',
    autoWrap: true,
    smartWordWrap: true,
    autoScrollDisabled: false,
    scrollbackDisabled: false,
    bracketedPaste: false,
    columnMode132: false,
    columnMode40: false,
    lineDensity: 25,
  };
}

export function effectiveCols(s: ScreenBufferState): number {
  return s.logicalCols > 0 ? s.logicalCols : s.cols;
}

export function effectiveRows(s: ScreenBufferState): number {
  return s.logicalRows > 0 ? s.logicalRows : s.rows;
}

/** Logical rows above the physical viewport when the logical screen is taller. */
export function logicalHiddenAbove(s: ScreenBufferState): number {
  return Math.max(0, effectiveRows(s) - s.rows);
}

/**
 * Cursor as callers see it. While a wrap is pending this is the start of the
 * row the next character lands on.
 */
export function cursorPosition(s: ScreenBufferState): { x: number; y: number } {
  if (!s.wrapPending || !s.modes.autoWrap) return { x: s.cursorX, y: s.cursorY };
  return { x: 0, y: Math.min(s.cursorY + 1, effectiveRows(s) - 1) };
}

export function markDirty(s: ScreenBufferState): void {
  s.dirty = true;
  s.dirtyPending = true;
}

/** Blank cell carrying the current colors (swapped under reverse) and attributes. */
export function currentDefaultCell(s: ScreenBufferState): Cell {
  const a = s.attrs;
  const fg = a.reverse ? a.bg : a.fg;
  const bg = a.reverse ? a.fg : a.bg;
  return makeBlankCell(fg, bg, {
    bold: a.bold,
    italic: a.italic,
    underline: a.underline,
    reverse: a.reverse,
    blink: a.blink,
  });
}

export function makeDefaultLineInfo(s: ScreenBufferState): LineInfo {
  return defaultLineInfo(currentDefaultCell(s));
}

export function updateScreenDefault(s: ScreenBufferState): void {
  s.screenDefaultCell = currentDefaultCell(s);
}

export function initScreen(s: ScreenBufferState): void {
  const rows = effectiveRows(s);
  s.screen = [];
  s.lineInfos = [];
  for (let i = 0; i < rows; i++) {
    s.screen.push([]);
    s.lineInfos.push(makeDefaultLineInfo(s));
  }
}

/** Appends empty rows until the cursor row exists. */
export function ensureCursorRow(s: ScreenBufferState): void {
  while (s.cursorY >= s.screen.length) {
    s.screen.push([]);
    s.lineInfos.push(makeDefaultLineInfo(s));
  }
}

/** The line's default cell with a blank character. */
export function fillCellFor(info: LineInfo): Cell {
  return info.defaultCell.char === ' ' ? info.defaultCell : { ...info.defaultCell, char: ' ' };
}

/** Grows a line to at least `length` cells using its default fill cell. */
export function ensureLineLength(s: ScreenBufferState, row: number, length: number): void {
  const line = s.screen[row];
  if (!line || line.length >= length) return;
  const info = s.lineInfos[row];
  const fill = info ? fillCellFor(info) : EMPTY_CELL;
  while (line.length < length) {
    line.push(fill);
  }
}

/**
 * Cell at live-screen coordinates. Columns past the stored line yield the
 * line's default cell, rows past the screen the screen default.
 */
export function getCell(s: ScreenBufferState, x: number, y: number): Cell {
  const line = s.screen[y];
  if (y < 0 || !line) return s.screenDefaultCell;
  if (x < 0 || x >= line.length) {
    const info = s.lineInfos[y];
    return info ? fillCellFor(info) : EMPTY_CELL;
  }
  return line[x];
}

export function getLineInfo(s: ScreenBufferState, y: number): LineInfo {
  return s.lineInfos[y] ?? defaultLineInfo();
}

function widthOf(cell: Cell): number {
  return cell.cellWidth > 0 ? cell.cellWidth : 1;
}

/** Sum of cell widths for columns `0..col-1` of a row. */
export function lineVisualWidth(s: ScreenBufferState, row: number, col: number): number {
  const line = s.screen[row];
  if (row < 0 || !line) return 0;
  let width = 0;
  for (let i = 0; i < col && i < line.length; i++) {
    width += widthOf(line[i]);
  }
  return width;
}

export function totalLineVisualWidth(s: ScreenBufferState, row: number): number {
  const line = s.screen[row];
  return line ? lineVisualWidth(s, row, line.length) : 0;
}

/** The cell's character followed by its combining marks. */
export function cellText(cell: Cell): string {
  return cell.char + cell.combining;
}

export function createScreenBufferState(options: ResolvedScreenBufferOptions): ScreenBufferState {
  const s: ScreenBufferState = {
    cols: options.cols,
    rows: options.rows,
    logicalCols: 0,
    logicalRows: 0,
    cursorX: 0,
    cursorY: 0,
    wrapPending: false,
    savedCursorX: 0,
    savedCursorY: 0,
    cursorVisible: true,
    cursorShape: 0,
    cursorBlink: 0,
    attrs: defaultAttributes(),
    modes: defaultModes(),
    screen: [],
    lineInfos: [],
    screenDefaultCell: EMPTY_CELL,
    scrollback: [],
    maxScrollback: options.maxScrollback,
    scrollOffset: 0,
    horizOffset: 0,
    horizMemos: [],
    selection: null,
    widthCrop: -1,
    heightCrop: -1,
    lastKeyboardActivity: null,
    lastManualVertScroll: null,
    lastManualHorizScroll: null,
    lastScrollCausingEvent: null,
    activitySeq: 0,
    cursorDrawnLastFrame: false,
    lastCursorMoveDir: 0,
    lastHorizCursorMoveDir: 0,
    isAbsoluteHorizPosition: false,
    autoScrollWindowMs: options.autoScrollWindowMs,
    manualScrollCooldownMs: options.manualScrollCooldownMs,
    palettes: new Map(),
    customGlyphs: new Map(),
    dirty: true,
    dirtyPending: false,
    traceUnknownInput: options.traceUnknownInput,
    recoveries: new ScreenRecoveryLog(),
    now: options.now,
  };
  initScreen(s);
  return s;
}
