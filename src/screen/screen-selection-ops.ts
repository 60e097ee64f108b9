/**
 * Text selection. Endpoints arrive in viewport coordinates and are stored
 * against the whole buffer (rows counted from the oldest scrollback line,
 * columns including the horizontal offset), so a selection stays on its text
 * while the view scrolls.
 */

import { cellText, effectiveRows, getCell, logicalHiddenAbove, markDirty } from './screen-cells.js';
import { effectiveScrollOffset } from './screen-scroll-ops.js';
import type { Cell, ScreenBufferState, SelectionRange } from './screen-types.js';

/** Buffer row shown at viewport row `y`. */
export function viewportToBufferY(s: ScreenBufferState, y: number): number {
  return s.scrollback.length + logicalHiddenAbove(s) - effectiveScrollOffset(s) + y;
}

/** Viewport row showing buffer row `bufferY`, or -1 when it is off screen. */
export function bufferToViewportY(s: ScreenBufferState, bufferY: number): number {
  const y = bufferY - s.scrollback.length - logicalHiddenAbove(s) + effectiveScrollOffset(s);
  return y < 0 || y >= s.rows ? -1 : y;
}

export function startSelection(s: ScreenBufferState, x: number, y: number): void {
  const bx = x + s.horizOffset;
  const by = viewportToBufferY(s, y);
  s.selection = { startX: bx, startY: by, endX: bx, endY: by };
  markDirty(s);
}

/** Moves the end point; ignored without an active selection. */
export function updateSelection(s: ScreenBufferState, x: number, y: number): void {
  if (!s.selection) return;
  s.selection.endX = x + s.horizOffset;
  s.selection.endY = viewportToBufferY(s, y);
  markDirty(s);
}

export function clearSelection(s: ScreenBufferState): void {
  s.selection = null;
  markDirty(s);
}

/** From column 0 of the oldest scrollback line to the last column of the last screen row. */
export function selectAll(s: ScreenBufferState): void {
  s.selection = {
    startX: 0,
    startY: 0,
    endX: s.cols - 1,
    endY: s.scrollback.length + effectiveRows(s) - 1,
  };
  markDirty(s);
}

/** The selection with its start before its end, or undefined when none is active. */
export function normalizedSelection(s: ScreenBufferState): SelectionRange | undefined {
  const sel = s.selection;
  if (!sel) return undefined;
  const reversed = sel.startY > sel.endY || (sel.startY === sel.endY && sel.startX > sel.endX);
  return reversed
    ? { startX: sel.endX, startY: sel.endY, endX: sel.startX, endY: sel.startY }
    : { ...sel };
}

export function isCellInSelection(s: ScreenBufferState, x: number, y: number): boolean {
  const sel = normalizedSelection(s);
  if (!sel) return false;
  const bx = x + s.horizOffset;
  const by = viewportToBufferY(s, y);
  if (by < sel.startY || by > sel.endY) return false;
  if (by === sel.startY && bx < sel.startX) return false;
  if (by === sel.endY && bx > sel.endX) return false;
  return true;
}

function bufferLineLength(s: ScreenBufferState, bufferY: number): number {
  const size = s.scrollback.length;
  if (bufferY < size) return s.scrollback[bufferY]?.line.length ?? 0;
  return s.screen[bufferY - size]?.length ?? 0;
}

function bufferCell(s: ScreenBufferState, x: number, bufferY: number): Cell {
  if (bufferY < 0) return s.screenDefaultCell;
  const size = s.scrollback.length;
  if (bufferY >= size) return getCell(s, x, bufferY - size);
  const entry = s.scrollback[bufferY];
  const cell = entry?.line[x];
  return cell ?? s.screenDefaultCell;
}

/**
 * Selected text, rows joined with "\n" and trailing blanks dropped from each
 * row. Rows span the physical width, or the line's length when it is wider.
 */
export function getSelectedText(s: ScreenBufferState): string {
  const sel = normalizedSelection(s);
  if (!sel) return '';

  const totalRows = s.scrollback.length + effectiveRows(s);
  const rows: string[] = [];
  for (let y = Math.max(0, sel.startY); y <= sel.endY && y < totalRows; y++) {
    const width = Math.max(s.cols, bufferLineLength(s, y));
    const from = y === sel.startY ? Math.max(0, sel.startX) : 0;
    const to = y === sel.endY ? Math.min(sel.endX + 1, width) : width;
    let text = '';
    for (let x = from; x < to; x++) {
      text += cellText(bufferCell(s, x, y));
    }
    rows.push(text.trimEnd());
  }
  return rows.join('\n');
}
