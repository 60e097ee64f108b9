/**
 * Scrollback and viewport: eviction into history, the scroll offset with its
 * magnetic zone, horizontal scrolling, viewport lookups and the cursor-follow
 * auto-scroll heuristics.
 */

import {
  EMPTY_CELL,
  cursorPosition,
  defaultLineInfo,
  fillCellFor,
  logicalHiddenAbove,
  makeDefaultLineInfo,
  markDirty,
} from './screen-cells.js';
import type {
  ActivityMark,
  Cell,
  HorizMemo,
  Line,
  LineInfo,
  ScreenBufferState,
  ScrollbackEntry,
} from './screen-types.js';
import { clamp } from './screen-utils.js';

const MAGNETIC_THRESHOLD_PERCENT = 5;
const MAGNETIC_THRESHOLD_MIN = 2;
const MAGNETIC_THRESHOLD_MAX = 50;

export function nextActivityMark(s: ScreenBufferState): ActivityMark {
  s.activitySeq += 1;
  return { at: s.now(), seq: s.activitySeq };
}

/** Records the vertical direction of a move to `newY`; equal rows keep the last one. */
export function trackCursorYMove(s: ScreenBufferState, newY: number): void {
  if (newY > s.cursorY) s.lastCursorMoveDir = 1;
  else if (newY < s.cursorY) s.lastCursorMoveDir = -1;
}

export function pushLineToScrollback(s: ScreenBufferState, line: Line, info: LineInfo): void {
  if (s.modes.scrollbackDisabled || s.maxScrollback <= 0) return;

  let trimmed = false;
  while (s.scrollback.length >= s.maxScrollback) {
    s.scrollback.shift();
    s.recoveries.record('scrollback_evicted', { maxScrollback: s.maxScrollback });
    trimmed = true;
  }
  s.scrollback.push({ line, info });

  // Keep the same history in view when the oldest line went away.
  if (trimmed && s.scrollOffset > 0) s.scrollOffset -= 1;
}

/** Moves row 0 into scrollback and appends a blank row at the bottom. */
export function scrollUpInternal(s: ScreenBufferState): void {
  if (s.screen.length === 0) return;

  const [top] = s.screen.splice(0, 1);
  const [topInfo] = s.lineInfos.splice(0, 1);
  pushLineToScrollback(s, top, topInfo ?? defaultLineInfo());
  s.lastScrollCausingEvent = nextActivityMark(s);

  s.screen.push([]);
  s.lineInfos.push(makeDefaultLineInfo(s));

  s.lastCursorMoveDir = 1;
  markDirty(s);
}

export function scrollUp(s: ScreenBufferState, n: number): void {
  const count = Math.min(Math.max(0, Math.floor(n) || 0), s.screen.length + s.maxScrollback);
  for (let i = 0; i < count; i++) {
    scrollUpInternal(s);
  }
  markDirty(s);
}

/** Shifts the live rows down, dropping the bottom row. Scrollback is untouched. */
export function scrollDown(s: ScreenBufferState, n: number): void {
  const count = Math.min(Math.max(0, Math.floor(n) || 0), s.screen.length);
  for (let i = 0; i < count; i++) {
    s.screen.pop();
    s.lineInfos.pop();
    s.screen.unshift([]);
    s.lineInfos.unshift(makeDefaultLineInfo(s));
  }
  markDirty(s);
}

/** 5% of the rows scrollable above the viewport, clamped to [2, 50]. */
export function magneticThreshold(s: ScreenBufferState): number {
  const scrollable = s.scrollback.length + logicalHiddenAbove(s);
  const threshold = Math.floor((scrollable * MAGNETIC_THRESHOLD_PERCENT) / 100);
  return clamp(threshold, MAGNETIC_THRESHOLD_MIN, MAGNETIC_THRESHOLD_MAX);
}

export function maxScrollOffset(s: ScreenBufferState): number {
  const hidden = logicalHiddenAbove(s);
  if (s.modes.scrollbackDisabled) return hidden;
  const size = s.scrollback.length;
  return size + hidden + (size > 0 ? magneticThreshold(s) : 0);
}

export function setScrollOffset(s: ScreenBufferState, offset: number): void {
  s.scrollOffset = clamp(offset, 0, maxScrollOffset(s));
  markDirty(s);
}

/**
 * Scroll offset used for rendering. Inside the magnetic zone the view stays
 * on the logical screen; past it the threshold is subtracted.
 */
export function effectiveScrollOffset(s: ScreenBufferState): number {
  const hidden = logicalHiddenAbove(s);
  const boundaryRow = s.scrollOffset - hidden;
  if (boundaryRow <= 0) return s.scrollOffset;
  const threshold = magneticThreshold(s);
  if (boundaryRow <= threshold) return hidden;
  return s.scrollOffset - threshold;
}

/** Snaps out of the magnetic zone. Returns true when the offset changed. */
export function normalizeScrollOffset(s: ScreenBufferState): boolean {
  const hidden = logicalHiddenAbove(s);
  const boundaryRow = s.scrollOffset - hidden;
  if (boundaryRow > 0 && boundaryRow <= magneticThreshold(s)) {
    s.scrollOffset = hidden;
    markDirty(s);
    return true;
  }
  return false;
}

/** Viewport row where history meets the logical screen, or -1 when not shown. */
export function scrollbackBoundaryVisibleRow(s: ScreenBufferState): number {
  if (s.scrollback.length === 0) return -1;
  const boundaryRow = s.scrollOffset - logicalHiddenAbove(s);
  if (boundaryRow <= 0) return -1;
  const threshold = magneticThreshold(s);
  if (boundaryRow <= threshold) return -1;
  const row = boundaryRow - threshold;
  return row <= 0 || row >= s.rows ? -1 : row;
}

/** Viewport row of the cursor's line, even when the cursor is scrolled off sideways. */
export function cursorVisibleY(s: ScreenBufferState): number {
  const y = cursorPosition(s).y - logicalHiddenAbove(s) + effectiveScrollOffset(s);
  return y < 0 || y >= s.rows ? -1 : y;
}

export function cursorVisiblePosition(s: ScreenBufferState): { x: number; y: number } | undefined {
  const y = cursorVisibleY(s);
  const x = cursorPosition(s).x - s.horizOffset;
  if (y < 0 || x < 0 || x >= s.cols) return undefined;
  return { x, y };
}

type ViewportRow =
  | { source: 'scrollback'; index: number }
  | { source: 'screen'; index: number }
  | { source: 'none' };

function viewportRow(s: ScreenBufferState, y: number): ViewportRow {
  if (y < 0 || y >= s.rows) return { source: 'none' };
  const hidden = logicalHiddenAbove(s);
  const offset = effectiveScrollOffset(s);
  const size = s.scrollback.length;
  if (offset === 0) return { source: 'screen', index: hidden + y };

  const absoluteY = size + hidden - offset + y;
  if (absoluteY < size) return { source: 'scrollback', index: absoluteY };
  return { source: 'screen', index: absoluteY - size };
}

function cellInLine(line: readonly Cell[], info: LineInfo | undefined, x: number): Cell {
  if (x < 0 || x >= line.length) return info ? fillCellFor(info) : EMPTY_CELL;
  return line[x];
}

/** Cell at viewport coordinates, reaching into scrollback when scrolled. */
export function getVisibleCell(s: ScreenBufferState, viewX: number, y: number): Cell {
  const x = viewX + s.horizOffset;
  const row = viewportRow(s, y);
  if (row.source === 'scrollback') {
    const entry = s.scrollback[row.index];
    return entry ? cellInLine(entry.line, entry.info, x) : s.screenDefaultCell;
  }
  if (row.source === 'screen') {
    const line = s.screen[row.index];
    if (row.index < 0 || !line) return s.screenDefaultCell;
    return cellInLine(line, s.lineInfos[row.index], x);
  }
  return s.screenDefaultCell;
}

export function getVisibleLineInfo(s: ScreenBufferState, y: number): LineInfo {
  const row = viewportRow(s, y);
  const fallback = defaultLineInfo(s.screenDefaultCell);
  if (row.source === 'scrollback') return s.scrollback[row.index]?.info ?? fallback;
  if (row.source === 'screen' && row.index >= 0) return s.lineInfos[row.index] ?? fallback;
  return fallback;
}

export function getScrollbackLine(s: ScreenBufferState, index: number): ScrollbackEntry | undefined {
  const entry = s.scrollback[index];
  if (!Number.isInteger(index) || !entry) return undefined;
  return { line: [...entry.line], info: entry.info };
}

export function clearScrollback(s: ScreenBufferState): void {
  s.scrollback = [];
  s.scrollOffset = 0;
  markDirty(s);
}

/** Disabling keeps the stored history but scrolls back to the live screen. */
export function setScrollbackDisabled(s: ScreenBufferState, disabled: boolean): void {
  s.modes.scrollbackDisabled = disabled;
  if (disabled && s.scrollOffset > 0) s.scrollOffset = 0;
  markDirty(s);
}

export function notifyKeyboardActivity(s: ScreenBufferState): void {
  s.lastKeyboardActivity = nextActivityMark(s);
}

export function notifyManualVertScroll(s: ScreenBufferState): void {
  s.lastManualVertScroll = nextActivityMark(s);
}

export function setCursorDrawn(s: ScreenBufferState, drawn: boolean): void {
  s.cursorDrawnLastFrame = drawn;
}

/** Recent keyboard activity with no manual scroll after it. */
export function isVertAutoScrollActive(s: ScreenBufferState): boolean {
  const keyboard = s.lastKeyboardActivity;
  if (!keyboard) return false;
  if (s.now() - keyboard.at >= s.autoScrollWindowMs) return false;
  const manual = s.lastManualVertScroll;
  return !(manual && manual.seq > keyboard.seq);
}

function extendAutoScrollTimer(s: ScreenBufferState): void {
  s.lastKeyboardActivity = nextActivityMark(s);
}

/**
 * Brings an undrawn cursor back into view after keyboard activity. History is
 * snapped out of view first; then the view catches up by the cursor's
 * overshoot in its last vertical direction. Returns true when it scrolled.
 */
export function checkCursorAutoScroll(s: ScreenBufferState): boolean {
  if (s.modes.autoScrollDisabled) return false;
  if (!isVertAutoScrollActive(s)) return false;

  const hidden = logicalHiddenAbove(s);
  if (s.scrollOffset > hidden) {
    s.scrollOffset = hidden;
    extendAutoScrollTimer(s);
    markDirty(s);
    return true;
  }

  if (s.cursorDrawnLastFrame) return false;

  const visibleY = s.cursorY - hidden + effectiveScrollOffset(s);
  let amount = 0;
  if (s.lastCursorMoveDir > 0) {
    if (visibleY >= s.rows) amount = visibleY - s.rows + 1;
    else if (s.scrollOffset > 0) amount = 1;
    if (amount > 0 && s.scrollOffset > 0) {
      s.scrollOffset -= Math.min(amount, s.scrollOffset);
      extendAutoScrollTimer(s);
      markDirty(s);
      return true;
    }
  } else if (s.lastCursorMoveDir < 0) {
    if (visibleY < 0) amount = -visibleY;
    else if (s.scrollOffset < hidden) amount = 1;
    if (amount > 0 && s.scrollOffset < hidden) {
      s.scrollOffset += Math.min(amount, hidden - s.scrollOffset);
      extendAutoScrollTimer(s);
      markDirty(s);
      return true;
    }
  }
  return false;
}

export function scrollbackSize(s: ScreenBufferState): number {
  return s.scrollback.length;
}

// --- Horizontal scrolling ---

const EMPTY_HORIZ_MEMO: HorizMemo = {
  valid: false,
  logicalRow: 0,
  leftmostCell: 0,
  rightmostCell: 0,
  distanceToLeft: 0,
  distanceToRight: 0,
  cursorLocated: false,
};

/** Negative offsets become 0; there is no upper bound. */
export function setHorizOffset(s: ScreenBufferState, offset: number): void {
  s.horizOffset = Math.max(0, Math.floor(offset) || 0);
  markDirty(s);
}

export function notifyManualHorizScroll(s: ScreenBufferState): void {
  s.lastManualHorizScroll = nextActivityMark(s);
}

/** Resets one memo per physical row before a paint. */
export function clearHorizMemos(s: ScreenBufferState): void {
  s.horizMemos = new Array<HorizMemo>(s.rows).fill(EMPTY_HORIZ_MEMO);
}

export function setHorizMemo(s: ScreenBufferState, scanline: number, memo: HorizMemo): void {
  if (Number.isInteger(scanline) && scanline >= 0 && scanline < s.horizMemos.length) {
    s.horizMemos[scanline] = memo;
  }
}

function longestLine(lines: readonly (readonly Cell[])[]): number {
  let longest = 0;
  for (const line of lines) {
    if (line.length > longest) longest = line.length;
  }
  return longest;
}

export function longestLineOnScreen(s: ScreenBufferState): number {
  return longestLine(s.screen);
}

export function longestLineInScrollback(s: ScreenBufferState): number {
  return longestLine(s.scrollback.map((entry) => entry.line));
}

/** Scrollback only counts once the boundary with history is on screen. */
export function longestLineVisible(s: ScreenBufferState): number {
  const screen = longestLineOnScreen(s);
  if (scrollbackBoundaryVisibleRow(s) <= 0) return screen;
  return Math.max(screen, longestLineInScrollback(s));
}

export function needsHorizScrollbar(s: ScreenBufferState): boolean {
  return s.horizOffset > 0 || longestLineVisible(s) > s.cols;
}

/** Never below the current offset, so a scrolled view is not snapped left. */
export function maxHorizOffset(s: ScreenBufferState): number {
  const contentMax = Math.max(0, longestLineVisible(s) - s.cols);
  return Math.max(s.horizOffset, contentMax);
}

function maxHorizOffsetOnScreen(s: ScreenBufferState): number {
  const contentMax = Math.max(0, longestLineOnScreen(s) - s.cols);
  return Math.max(s.horizOffset, contentMax);
}

function isViewingScrollback(s: ScreenBufferState): boolean {
  return s.scrollOffset > logicalHiddenAbove(s);
}

/**
 * Recent typing on the live screen, and no manual horizontal scroll holding
 * it off. A manual scroll after the typing blocks until the cooldown has
 * passed and something has scrolled the screen since.
 */
export function isHorizAutoScrollActive(s: ScreenBufferState): boolean {
  const keyboard = s.lastKeyboardActivity;
  if (!keyboard) return false;
  const now = s.now();
  if (now - keyboard.at >= s.autoScrollWindowMs) return false;
  if (isViewingScrollback(s)) return false;

  const manual = s.lastManualHorizScroll;
  if (!manual || keyboard.seq > manual.seq) return true;
  if (now - manual.at < s.manualScrollCooldownMs) return false;
  const scrolled = s.lastScrollCausingEvent;
  return scrolled !== null && scrolled.seq > manual.seq;
}

type HorizStep = { amount: number; left: boolean };

/** A cursor placed absolutely just outside a rendered row scrolls by one. */
function absoluteEdgeStep(s: ScreenBufferState, memos: readonly HorizMemo[]): HorizStep | undefined {
  for (const memo of memos) {
    if (s.cursorX === memo.leftmostCell - 1 && memo.distanceToLeft === 1) return { amount: 1, left: true };
    if (s.cursorX === memo.rightmostCell + 1 && memo.distanceToRight === 1) return { amount: 1, left: false };
  }
  return undefined;
}

function directionalStep(s: ScreenBufferState, left: number, right: number): HorizStep | undefined {
  if (s.lastHorizCursorMoveDir < 0 && left > 0) return { amount: left, left: true };
  if (s.lastHorizCursorMoveDir > 0 && right > 0) return { amount: right, left: false };
  // Unknown direction: nearest side, left on a tie.
  if (left > 0 && (right <= 0 || left <= right)) return { amount: left, left: true };
  if (right > 0) return { amount: right, left: false };
  return undefined;
}

/**
 * Scrolls sideways toward a cursor the last paint drew outside the view, using
 * the per-scanline memos. Runs after paint. Returns true when it scrolled.
 */
export function checkCursorAutoScrollHoriz(s: ScreenBufferState): boolean {
  if (s.modes.autoScrollDisabled) return false;
  if (!isHorizAutoScrollActive(s)) return false;

  const hidden = logicalHiddenAbove(s);
  if (s.scrollOffset > hidden) {
    s.scrollOffset = hidden;
    markDirty(s);
    return true;
  }

  if (!s.cursorDrawnLastFrame) return false;

  const memos = s.horizMemos.filter((memo) => memo.valid);
  let minLeft = -1;
  let minRight = -1;
  for (const memo of memos) {
    if (memo.cursorLocated) return false;
    if (memo.distanceToLeft > 0 && (minLeft < 0 || memo.distanceToLeft < minLeft)) minLeft = memo.distanceToLeft;
    if (memo.distanceToRight > 0 && (minRight < 0 || memo.distanceToRight < minRight)) minRight = memo.distanceToRight;
  }
  if (minLeft < 0 && minRight < 0) return false;

  const step = (s.isAbsoluteHorizPosition ? absoluteEdgeStep(s, memos) : undefined)
    ?? directionalStep(s, minLeft, minRight);
  if (!step) return false;

  if (step.left) {
    // One extra column keeps the cursor off the edge.
    s.horizOffset = Math.max(0, s.horizOffset - (step.amount + 1));
  } else {
    s.horizOffset = Math.min(s.horizOffset + step.amount, maxHorizOffsetOnScreen(s));
  }
  markDirty(s);
  return true;
}
