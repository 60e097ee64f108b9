/**
 * Geometry changes: physical resize, logical size override, screen crop,
 * scale modes and full reset.
 */

import {
  defaultAttributes,
  defaultLineInfo,
  defaultModes,
  effectiveCols,
  effectiveRows,
  initScreen,
  logicalHiddenAbove,
  makeDefaultLineInfo,
  markDirty,
  updateScreenDefault,
} from './screen-cells.js';
import { maxScrollOffset, pushLineToScrollback, trackCursorYMove } from './screen-scroll-ops.js';
import type { LineDensity, ScreenBufferState } from './screen-types.js';

const LINE_DENSITIES: readonly LineDensity[] = [25, 30, 43, 50, 60];
const COLUMN_132_SCALE = 0.606;
const COLUMN_40_SCALE = 2;

function lastContentRow(s: ScreenBufferState): number {
  for (let i = s.screen.length - 1; i >= 0; i--) {
    if (s.screen[i].length > 0) return i;
  }
  return -1;
}

/** Moves the top `count` rows into scrollback. */
function pushTopRows(s: ScreenBufferState, count: number): void {
  const rows = s.screen.splice(0, count);
  const infos = s.lineInfos.splice(0, count);
  rows.forEach((line, i) => pushLineToScrollback(s, line, infos[i] ?? defaultLineInfo()));
}

/** A width change drops a pending wrap; the cursor then sits on a real column. */
function clampCursorToSize(s: ScreenBufferState, oldCols: number): void {
  const cols = effectiveCols(s);
  const rows = effectiveRows(s);
  if (cols !== oldCols) s.wrapPending = false;
  if (s.cursorX >= cols) s.cursorX = cols - 1;
  if (s.cursorY >= rows) {
    trackCursorYMove(s, rows - 1);
    s.cursorY = rows - 1;
  }
}

/**
 * Fits the screen to `targetRows` without truncating lines. Rows only go to
 * scrollback when content would otherwise fall off the bottom.
 */
function adjustScreenToRows(s: ScreenBufferState, targetRows: number): void {
  if (s.screen.length < targetRows) {
    while (s.screen.length < targetRows) {
      s.screen.push([]);
      s.lineInfos.push(makeDefaultLineInfo(s));
    }
    return;
  }

  const toPush = Math.max(0, lastContentRow(s) - targetRows + 1);
  if (toPush > 0) {
    pushTopRows(s, toPush);
    const newY = Math.max(0, s.cursorY - toPush);
    trackCursorYMove(s, newY);
    s.cursorY = newY;
  }
  s.screen.splice(targetRows);
  s.lineInfos.splice(targetRows);
  while (s.screen.length < targetRows) {
    s.screen.push([]);
    s.lineInfos.push(makeDefaultLineInfo(s));
  }
}

/** Changes the physical size. A viewer on the live screen is not scrolled into history. */
export function resize(s: ScreenBufferState, cols: number, rows: number): void {
  const newCols = Math.max(1, Math.floor(cols) || 1);
  const newRows = Math.max(1, Math.floor(rows) || 1);
  if (newCols === s.cols && newRows === s.rows) return;

  const wasViewingScrollback = s.scrollOffset > logicalHiddenAbove(s);
  const oldCols = effectiveCols(s);

  // Widening reveals columns scrolled off the left before adding blank ones.
  if (newCols > s.cols && s.horizOffset > 0) {
    s.horizOffset = Math.max(0, s.horizOffset - (newCols - s.cols));
  }

  s.cols = newCols;
  s.rows = newRows;
  if (s.logicalRows === 0) adjustScreenToRows(s, newRows);
  clampCursorToSize(s, oldCols);

  const hidden = logicalHiddenAbove(s);
  if (!wasViewingScrollback && s.scrollOffset > hidden) s.scrollOffset = hidden;
  s.scrollOffset = Math.min(s.scrollOffset, maxScrollOffset(s));
  markDirty(s);
}

function shrinkLogicalScreen(s: ScreenBufferState, targetRows: number): void {
  if (targetRows <= 0 || s.screen.length <= targetRows) return;

  const last = lastContentRow(s);
  if (last >= 0) {
    const newTop = Math.max(0, last - targetRows + 1);
    if (newTop > 0) pushTopRows(s, newTop);
  }
  s.screen.splice(targetRows);
  s.lineInfos.splice(targetRows);
  while (s.screen.length < targetRows) {
    s.screen.push([]);
    s.lineInfos.push(defaultLineInfo(s.screenDefaultCell));
  }
}

/**
 * Sets the logical size, 0 meaning the physical dimension. A fixed logical
 * width turns smart word wrap off; returning to the physical width turns it on.
 */
export function setLogicalSize(s: ScreenBufferState, logicalRows: number, logicalCols: number): void {
  const oldRows = effectiveRows(s);
  const oldCols = effectiveCols(s);
  s.logicalRows = Math.max(0, Math.floor(logicalRows) || 0);
  s.logicalCols = Math.max(0, Math.floor(logicalCols) || 0);
  s.modes.smartWordWrap = s.logicalCols === 0;

  const newRows = effectiveRows(s);
  if (newRows > oldRows) {
    while (s.screen.length < newRows) {
      s.screen.push([]);
      s.lineInfos.push(defaultLineInfo(s.screenDefaultCell));
    }
  } else if (newRows < oldRows) {
    shrinkLogicalScreen(s, newRows);
  }
  clampCursorToSize(s, oldCols);
  markDirty(s);
}

export function setScreenCrop(s: ScreenBufferState, widthCrop: number, heightCrop: number): void {
  s.widthCrop = widthCrop;
  s.heightCrop = heightCrop;
  markDirty(s);
}

export function clearScreenCrop(s: ScreenBufferState): void {
  setScreenCrop(s, -1, -1);
}

export function set132ColumnMode(s: ScreenBufferState, enabled: boolean): void {
  s.modes.columnMode132 = enabled;
  markDirty(s);
}

export function set40ColumnMode(s: ScreenBufferState, enabled: boolean): void {
  s.modes.columnMode40 = enabled;
  markDirty(s);
}

function isLineDensity(value: number): value is LineDensity {
  return LINE_DENSITIES.some((density) => density === value);
}

/** Densities other than 25, 30, 43, 50 and 60 select 25. */
export function setLineDensity(s: ScreenBufferState, density: number): void {
  s.modes.lineDensity = isLineDensity(density) ? density : 25;
  markDirty(s);
}

/** Combined factor of the column modes; both together give 1.212. */
export function horizontalScale(s: ScreenBufferState): number {
  let scale = 1;
  if (s.modes.columnMode132) scale *= COLUMN_132_SCALE;
  if (s.modes.columnMode40) scale *= COLUMN_40_SCALE;
  return scale;
}

export function verticalScale(s: ScreenBufferState): number {
  const density = s.modes.lineDensity;
  return density === 25 ? 1 : 25 / density;
}

/**
 * Full reset (RIS). Non-empty rows are kept in scrollback; palettes and
 * glyphs survive. Modes, scale modes included, return to their defaults.
 */
export function resetScreen(s: ScreenBufferState): void {
  s.screen.forEach((line, i) => {
    if (line.length > 0) pushLineToScrollback(s, line, s.lineInfos[i] ?? defaultLineInfo());
  });

  s.attrs = defaultAttributes();
  s.modes = defaultModes();
  updateScreenDefault(s);
  initScreen(s);

  s.cursorX = 0;
  s.cursorY = 0;
  s.wrapPending = false;
  s.savedCursorX = 0;
  s.savedCursorY = 0;
  s.cursorVisible = true;
  s.cursorShape = 0;
  s.cursorBlink = 0;
  s.scrollOffset = 0;
  s.horizOffset = 0;
  markDirty(s);
}
