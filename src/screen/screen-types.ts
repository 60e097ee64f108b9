/**
 * Screen model types shared across the screen modules.
 */

import type { ScreenRecoveryLog } from './screen-diagnostics.js';

export type ColorType = 'default' | 'standard' | 'palette' | 'truecolor';

/**
 * A terminal color with the way it was specified preserved, so it can be
 * turned back into the SGR code that produced it. `r`/`g`/`b` always hold the
 * resolved display value.
 */
export type Color =
  | { readonly type: 'default'; readonly r: number; readonly g: number; readonly b: number }
  | { readonly type: 'standard'; readonly index: number; readonly r: number; readonly g: number; readonly b: number }
  | { readonly type: 'palette'; readonly index: number; readonly r: number; readonly g: number; readonly b: number }
  | { readonly type: 'truecolor'; readonly r: number; readonly g: number; readonly b: number };

export type Rgb = { readonly r: number; readonly g: number; readonly b: number };

export type UnderlineStyle = 'none' | 'single' | 'double' | 'curly' | 'dotted' | 'dashed';

export type AmbiguousWidthMode = 'auto' | 'narrow' | 'wide';

/** DEC line display mode (DECSWL / DECDWL / DECDHL). */
export type LineAttribute = 'normal' | 'double-width' | 'double-top' | 'double-bottom';

export type Cell = {
  readonly char: string;
  /** Combining marks attached to `char`, in arrival order. */
  readonly combining: string;
  readonly fg: Color;
  readonly bg: Color;
  readonly bold: boolean;
  readonly italic: boolean;
  readonly underline: boolean;
  readonly underlineStyle: UnderlineStyle;
  readonly underlineColor?: Color;
  readonly reverse: boolean;
  readonly blink: boolean;
  readonly strikethrough: boolean;
  readonly flexWidth: boolean;
  /** Visual width in cell units. */
  readonly cellWidth: number;
  /** Base glyph palette, -1 derives the palette from the foreground color. */
  readonly bgp: number;
  readonly xFlip: boolean;
  readonly yFlip: boolean;
};

export type Line = Cell[];

export type LineInfo = {
  readonly attribute: LineAttribute;
  /** Fills columns past the stored end of the line. */
  readonly defaultCell: Cell;
};

export type ScrollbackEntry = {
  readonly line: readonly Cell[];
  readonly info: LineInfo;
};

export type PaletteEntry =
  | { readonly kind: 'transparent'; readonly dim: boolean }
  | { readonly kind: 'default-fg'; readonly dim: boolean }
  | { readonly kind: 'color'; readonly color: Color; readonly dim: boolean };

export type Palette = {
  entries: PaletteEntry[];
  /** Some entry resolves to the cell background. */
  usesBg: boolean;
  /** Some entry resolves to the cell foreground. */
  usesDefaultFG: boolean;
};

export type CustomGlyph = {
  readonly width: number;
  readonly height: number;
  /** Palette indices, row-major. */
  readonly pixels: readonly number[];
};

/** Current SGR-style attributes applied to newly written cells. */
export type TextAttributes = {
  fg: Color;
  bg: Color;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  underlineStyle: UnderlineStyle;
  underlineColor?: Color;
  reverse: boolean;
  blink: boolean;
  strikethrough: boolean;
  flexWidth: boolean;
  bgp: number;
  xFlip: boolean;
  yFlip: boolean;
};

/** Rows per screen height: 25 is normal, higher values shrink rows vertically. */
export type LineDensity = 25 | 30 | 43 | 50 | 60;

export type TerminalModes = {
  flexWidth: boolean;
  visualWidthWrap: boolean;
  ambiguousWidth: AmbiguousWidthMode;
  autoWrap: boolean;
  smartWordWrap: boolean;
  autoScrollDisabled: boolean;
  scrollbackDisabled: boolean;
  bracketedPaste: boolean;
  /** DECCOLM, horizontal scale 0.606. */
  columnMode132: boolean;
  /** Horizontal scale 2.0. */
  columnMode40: boolean;
  lineDensity: LineDensity;
};

/** -1 up/left, 0 unknown, 1 down/right. */
export type MoveDirection = -1 | 0 | 1;

/**
 * A point in time for the auto-scroll heuristic. `seq` orders marks that share
 * the same millisecond.
 */
export type ActivityMark = {
  at: number;
  seq: number;
};

/**
 * What the renderer saw of the cursor row on one scanline during a paint.
 * Distances are how far the view would have to scroll to reach the cursor,
 * 0 when not applicable.
 */
export type HorizMemo = {
  readonly valid: boolean;
  readonly logicalRow: number;
  readonly leftmostCell: number;
  readonly rightmostCell: number;
  readonly distanceToLeft: number;
  readonly distanceToRight: number;
  readonly cursorLocated: boolean;
};

/** Selection endpoints; `y` counts rows from the oldest scrollback line. */
export type SelectionRange = {
  startX: number;
  startY: number;
  endX: number;
  endY: number;
};

export type CursorDirections = {
  vertical: MoveDirection;
  horizontal: MoveDirection;
  absoluteHorizontal: boolean;
};

/**
 * Mutable state bag for the screen operations.
 * All fields are directly read/written by the *-ops functions.
 */
export interface ScreenBufferState {
  /** Physical size. */
  cols: number;
  rows: number;
  /** Logical size override, 0 uses the physical size. */
  logicalCols: number;
  logicalRows: number;

  cursorX: number;
  cursorY: number;
  /** The last column was written; the next printable character wraps first. */
  wrapPending: boolean;
  savedCursorX: number;
  savedCursorY: number;
  cursorVisible: boolean;
  cursorShape: number;
  cursorBlink: number;

  attrs: TextAttributes;
  modes: TerminalModes;

  screen: Line[];
  lineInfos: LineInfo[];
  /** Default for logical rows with no stored line. */
  screenDefaultCell: Cell;

  scrollback: ScrollbackEntry[];
  maxScrollback: number;
  scrollOffset: number;
  horizOffset: number;
  horizMemos: HorizMemo[];

  /** Raw endpoints in arrival order, not normalized. */
  selection: SelectionRange | null;

  widthCrop: number;
  heightCrop: number;

  lastKeyboardActivity: ActivityMark | null;
  lastManualVertScroll: ActivityMark | null;
  lastManualHorizScroll: ActivityMark | null;
  lastScrollCausingEvent: ActivityMark | null;
  activitySeq: number;
  cursorDrawnLastFrame: boolean;
  lastCursorMoveDir: MoveDirection;
  lastHorizCursorMoveDir: MoveDirection;
  isAbsoluteHorizPosition: boolean;
  autoScrollWindowMs: number;
  manualScrollCooldownMs: number;

  palettes: Map<number, Palette>;
  customGlyphs: Map<string, CustomGlyph>;

  dirty: boolean;
  /** Set by markDirty, cleared once the dirty listener has been told. */
  dirtyPending: boolean;
  traceUnknownInput: boolean;
  recoveries: ScreenRecoveryLog;
  now: () => number;
}
