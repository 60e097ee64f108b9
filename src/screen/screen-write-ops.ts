/**
 * Cursor movement, character placement and the line editing family.
 * All functions mutate the state bag in place.
 */

import {
  EMPTY_CELL,
  currentDefaultCell,
  effectiveCols,
  effectiveRows,
  ensureCursorRow,
  ensureLineLength,
  initScreen,
  lineVisualWidth,
  logicalHiddenAbove,
  makeDefaultLineInfo,
  markDirty,
  updateScreenDefault,
} from './screen-cells.js';
import { hasCustomGlyph } from './screen-glyphs.js';
import { scrollUpInternal, trackCursorYMove } from './screen-scroll-ops.js';
import type { Cell, LineAttribute, MoveDirection, ScreenBufferState } from './screen-types.js';
import { isCombiningMark, charWidthClass } from './screen-width.js';
import { boundedCount, clamp } from './screen-utils.js';

const TAB_WIDTH = 8;
const WORD_BOUNDARIES = new Set([' ', '-', ',', ';', '\u2014']);

export function setHorizMoveDir(s: ScreenBufferState, dir: MoveDirection, absolute: boolean): void {
  s.lastHorizCursorMoveDir = dir;
  s.isAbsoluteHorizPosition = absolute;
}

function moveToNextRow(s: ScreenBufferState): void {
  const rows = effectiveRows(s);
  trackCursorYMove(s, s.cursorY + 1);
  s.cursorY += 1;
  if (s.cursorY >= rows) {
    scrollUpInternal(s);
    s.cursorY = rows - 1;
  }
}

// --- Cursor movement ---

export function setCursor(s: ScreenBufferState, x: number, y: number): void {
  const nx = clamp(x, 0, effectiveCols(s) - 1);
  const ny = clamp(y, 0, effectiveRows(s) - 1);
  trackCursorYMove(s, ny);
  setHorizMoveDir(s, 0, true);
  s.wrapPending = false;
  s.cursorX = nx;
  s.cursorY = ny;
  markDirty(s);
}

export function moveCursorUp(s: ScreenBufferState, n: number): void {
  const newY = Math.max(0, s.cursorY - boundedCount(n, s.cursorY));
  trackCursorYMove(s, newY);
  s.wrapPending = false;
  s.cursorY = newY;
  markDirty(s);
}

export function moveCursorDown(s: ScreenBufferState, n: number): void {
  const last = effectiveRows(s) - 1;
  const newY = Math.min(last, s.cursorY + boundedCount(n, last));
  trackCursorYMove(s, newY);
  s.wrapPending = false;
  s.cursorY = newY;
  markDirty(s);
}

export function moveCursorForward(s: ScreenBufferState, n: number): void {
  const last = effectiveCols(s) - 1;
  setHorizMoveDir(s, 1, false);
  s.wrapPending = false;
  s.cursorX = Math.min(last, s.cursorX + boundedCount(n, last));
  markDirty(s);
}

export function moveCursorBackward(s: ScreenBufferState, n: number): void {
  setHorizMoveDir(s, -1, false);
  s.wrapPending = false;
  s.cursorX = Math.max(0, s.cursorX - boundedCount(n, s.cursorX));
  markDirty(s);
}

export function newline(s: ScreenBufferState): void {
  s.wrapPending = false;
  s.cursorX = 0;
  moveToNextRow(s);
  markDirty(s);
}

export function lineFeed(s: ScreenBufferState): void {
  s.wrapPending = false;
  moveToNextRow(s);
  markDirty(s);
}

export function carriageReturn(s: ScreenBufferState): void {
  setHorizMoveDir(s, -1, false);
  s.wrapPending = false;
  s.cursorX = 0;
  markDirty(s);
}

export function tab(s: ScreenBufferState): void {
  setHorizMoveDir(s, 1, false);
  s.wrapPending = false;
  const next = (Math.floor(s.cursorX / TAB_WIDTH) + 1) * TAB_WIDTH;
  s.cursorX = Math.min(next, effectiveCols(s) - 1);
  markDirty(s);
}

export function backspace(s: ScreenBufferState): void {
  setHorizMoveDir(s, -1, false);
  s.wrapPending = false;
  if (s.cursorX > 0) s.cursorX -= 1;
  markDirty(s);
}

export function saveCursor(s: ScreenBufferState): void {
  s.savedCursorX = s.cursorX;
  s.savedCursorY = s.cursorY;
  markDirty(s);
}

export function restoreCursor(s: ScreenBufferState): void {
  s.wrapPending = false;
  s.cursorX = s.savedCursorX;
  trackCursorYMove(s, s.savedCursorY);
  s.cursorY = s.savedCursorY;
  markDirty(s);
}

// --- Character output ---

type CellPosition = { row: number; col: number };

/** Column the next character is placed at; one past the last column while a wrap is pending. */
function writeColumn(s: ScreenBufferState): number {
  return s.wrapPending ? s.cursorX + 1 : s.cursorX;
}

/** The cell before the write column, crossing to the end of the previous row at column 0. */
function previousCellPosition(s: ScreenBufferState): CellPosition | undefined {
  let col = writeColumn(s) - 1;
  let row = s.cursorY;
  if (col < 0) {
    if (row <= 0) return undefined;
    row -= 1;
    const prevLine = s.screen[row];
    if (!prevLine || prevLine.length === 0) return undefined;
    col = prevLine.length - 1;
  }
  const line = s.screen[row];
  if (!line || col >= line.length) return undefined;
  return { row, col };
}

function previousCellWidth(s: ScreenBufferState): number {
  const pos = previousCellPosition(s);
  if (!pos) return 1;
  const cell = s.screen[pos.row][pos.col];
  return cell.flexWidth && cell.cellWidth > 0 ? cell.cellWidth : 1;
}

/** Display width for a new character under the current flex-width and ambiguous-width modes. */
export function charDisplayWidth(s: ScreenBufferState, ch: string): number {
  if (!s.attrs.flexWidth) return 1;
  const mode = s.modes.ambiguousWidth;
  const cls = charWidthClass(ch);

  if (hasCustomGlyph(s, ch)) {
    if (mode === 'narrow') return 1;
    if (mode === 'wide') return 2;
    return cls < 0 ? previousCellWidth(s) : cls;
  }

  if (cls >= 0) return cls;
  if (mode === 'narrow') return 1;
  if (mode === 'wide') return 2;
  return previousCellWidth(s);
}

function appendCombiningMark(s: ScreenBufferState, mark: string): void {
  const pos = previousCellPosition(s);
  if (!pos) {
    s.recoveries.record('combining_mark_dropped', { mark });
    markDirty(s);
    return;
  }
  const line = s.screen[pos.row];
  const cell = line[pos.col];
  line[pos.col] = { ...cell, combining: cell.combining + mark };
  markDirty(s);
}

function buildCell(s: ScreenBufferState, ch: string, width: number): Cell {
  const a = s.attrs;
  const cell: Cell = {
    char: ch,
    combining: '',
    fg: a.reverse ? a.bg : a.fg,
    bg: a.reverse ? a.fg : a.bg,
    bold: a.bold,
    italic: a.italic,
    underline: a.underline,
    underlineStyle: a.underlineStyle,
    reverse: a.reverse,
    blink: a.blink,
    strikethrough: a.strikethrough,
    flexWidth: a.flexWidth,
    cellWidth: width,
    bgp: a.bgp,
    xFlip: a.xFlip,
    yFlip: a.yFlip,
  };
  return a.underlineColor ? { ...cell, underlineColor: a.underlineColor } : cell;
}

/**
 * Word-aware wrap: the tail after the last boundary character moves to the
 * next row behind a copy of the line's indentation. Without a usable
 * boundary only the indentation is carried over.
 */
function smartWrap(s: ScreenBufferState): void {
  const line = s.screen[s.cursorY];

  let indent = 0;
  while (indent < line.length && line[indent].char === ' ') indent++;

  let wrapPoint = -1;
  for (let i = line.length - 1; i > indent; i--) {
    if (WORD_BOUNDARIES.has(line[i].char)) {
      wrapPoint = i;
      break;
    }
  }

  setHorizMoveDir(s, -1, false);
  moveToNextRow(s);
  ensureCursorRow(s);

  // A row of nothing but spaces carries no indentation.
  const carried = indent < effectiveCols(s) ? indent : 0;
  const indentCells: Cell[] = new Array<Cell>(carried).fill(EMPTY_CELL);
  const prevRow = s.cursorY - 1;
  // The wrapped row can only be split while it is still on screen.
  const canSplit = prevRow >= 0 && s.screen[prevRow] === line;

  if (canSplit && wrapPoint > indent && wrapPoint < line.length - 1) {
    const moved = line.slice(wrapPoint + 1);
    s.screen[prevRow] = line.slice(0, wrapPoint + 1);
    s.screen[s.cursorY] = [...indentCells, ...moved, ...s.screen[s.cursorY]];
    s.cursorX = carried + moved.length;
  } else {
    if (carried > 0) s.screen[s.cursorY] = [...indentCells, ...s.screen[s.cursorY]];
    s.cursorX = carried;
  }
}

/**
 * Places one printable character at the cursor. Wrapping is deferred: after
 * the last column is written the cursor stays on it with `wrapPending` set,
 * and the wrap happens when the next character arrives.
 */
export function writeChar(s: ScreenBufferState, input: string): void {
  const cp = input.codePointAt(0);
  if (cp === undefined) {
    markDirty(s);
    return;
  }
  const ch = String.fromCodePoint(cp);

  if (isCombiningMark(cp)) {
    appendCombiningMark(s, ch);
    return;
  }

  const cols = effectiveCols(s);
  const width = charDisplayWidth(s, ch);
  const col = writeColumn(s);

  const shouldWrap = s.modes.visualWidthWrap && s.attrs.flexWidth
    ? lineVisualWidth(s, s.cursorY, col) + width > cols
    : col >= cols;
  s.wrapPending = false;

  if (shouldWrap) {
    if (!s.modes.autoWrap) {
      s.cursorX = cols - 1;
    } else if (s.modes.smartWordWrap && s.cursorY < s.screen.length) {
      smartWrap(s);
    } else {
      setHorizMoveDir(s, -1, false);
      s.cursorX = 0;
      moveToNextRow(s);
    }
  }

  ensureCursorRow(s);
  ensureLineLength(s, s.cursorY, s.cursorX + 1);
  s.screen[s.cursorY][s.cursorX] = buildCell(s, ch, width);

  if (!shouldWrap) setHorizMoveDir(s, 1, false);
  if (s.cursorX + 1 >= cols) s.wrapPending = true;
  else s.cursorX += 1;
  markDirty(s);
}

export function writeText(s: ScreenBufferState, text: string): void {
  for (const ch of text) {
    writeChar(s, ch);
  }
}

// --- Line and character editing ---

export function insertLines(s: ScreenBufferState, n: number): void {
  s.wrapPending = false;
  const len = s.screen.length;
  const count = boundedCount(n, len - s.cursorY);
  for (let i = 0; i < count; i++) {
    s.screen.splice(s.cursorY, 0, []);
    s.lineInfos.splice(s.cursorY, 0, makeDefaultLineInfo(s));
  }
  s.screen.splice(len);
  s.lineInfos.splice(len);
  markDirty(s);
}

export function deleteLines(s: ScreenBufferState, n: number): void {
  s.wrapPending = false;
  const count = boundedCount(n, s.screen.length - s.cursorY);
  s.screen.splice(s.cursorY, count);
  s.lineInfos.splice(s.cursorY, count);
  for (let i = 0; i < count; i++) {
    s.screen.push([]);
    s.lineInfos.push(makeDefaultLineInfo(s));
  }
  markDirty(s);
}

/** Removes cells at the cursor, shifting the rest left. */
export function deleteChars(s: ScreenBufferState, n: number): void {
  s.wrapPending = false;
  const line = s.screen[s.cursorY];
  if (line && s.cursorX < line.length) {
    line.splice(s.cursorX, boundedCount(n, line.length - s.cursorX));
  }
  markDirty(s);
}

/** Splices blank cells in at the cursor, first growing the line to reach it. */
export function insertChars(s: ScreenBufferState, n: number): void {
  s.wrapPending = false;
  const line = s.screen[s.cursorY];
  if (line) {
    ensureLineLength(s, s.cursorY, s.cursorX);
    const fill = currentDefaultCell(s);
    const cells = new Array<Cell>(boundedCount(n, effectiveCols(s))).fill(fill);
    line.splice(s.cursorX, 0, ...cells);
  }
  markDirty(s);
}

/** Blanks existing cells from the cursor on; never lengthens the line. */
export function eraseChars(s: ScreenBufferState, n: number): void {
  s.wrapPending = false;
  const line = s.screen[s.cursorY];
  if (line && s.cursorX < line.length) {
    const end = s.cursorX + boundedCount(n, line.length - s.cursorX);
    const fill = currentDefaultCell(s);
    for (let x = s.cursorX; x < end; x++) {
      line[x] = fill;
    }
  }
  markDirty(s);
}

// --- Clears ---

function setRowDefault(s: ScreenBufferState, y: number): void {
  const info = s.lineInfos[y];
  if (info) s.lineInfos[y] = { ...info, defaultCell: currentDefaultCell(s) };
}

function blankUpToCursor(s: ScreenBufferState, y: number): void {
  const line = s.screen[y];
  if (!line) return;
  const end = Math.min(s.cursorX, line.length - 1);
  const fill = currentDefaultCell(s);
  for (let x = 0; x <= end; x++) {
    line[x] = fill;
  }
}

export function clearToEndOfLine(s: ScreenBufferState): void {
  s.wrapPending = false;
  const line = s.screen[s.cursorY];
  if (line) {
    setRowDefault(s, s.cursorY);
    if (s.cursorX < line.length) line.splice(s.cursorX);
  }
  markDirty(s);
}

/** Blanks existing cells up to the cursor. The row's default cell is left alone. */
export function clearToStartOfLine(s: ScreenBufferState): void {
  s.wrapPending = false;
  blankUpToCursor(s, s.cursorY);
  markDirty(s);
}

export function clearLine(s: ScreenBufferState): void {
  s.wrapPending = false;
  if (s.screen[s.cursorY]) {
    setRowDefault(s, s.cursorY);
    s.screen[s.cursorY] = [];
  }
  markDirty(s);
}

export function clearToEndOfScreen(s: ScreenBufferState): void {
  s.wrapPending = false;
  updateScreenDefault(s);
  const line = s.screen[s.cursorY];
  if (line) {
    setRowDefault(s, s.cursorY);
    if (s.cursorX < line.length) line.splice(s.cursorX);
  }
  for (let y = s.cursorY + 1; y < s.screen.length; y++) {
    s.screen[y] = [];
    s.lineInfos[y] = makeDefaultLineInfo(s);
  }
  markDirty(s);
}

/** Rows above the cursor are rebuilt; the screen default cell is left alone. */
export function clearToStartOfScreen(s: ScreenBufferState): void {
  s.wrapPending = false;
  for (let y = 0; y < s.cursorY && y < s.screen.length; y++) {
    s.screen[y] = [];
    s.lineInfos[y] = makeDefaultLineInfo(s);
  }
  blankUpToCursor(s, s.cursorY);
  markDirty(s);
}

/** Rebuilds the screen and homes the cursor. Scrollback, palettes and glyphs stay. */
export function clearScreen(s: ScreenBufferState): void {
  updateScreenDefault(s);
  initScreen(s);
  trackCursorYMove(s, 0);
  s.wrapPending = false;
  s.cursorX = 0;
  s.cursorY = 0;
  s.scrollOffset = logicalHiddenAbove(s);
  markDirty(s);
}

export function setLineAttribute(s: ScreenBufferState, attribute: LineAttribute): void {
  const info = s.lineInfos[s.cursorY];
  if (info) s.lineInfos[s.cursorY] = { ...info, attribute };
  markDirty(s);
}
