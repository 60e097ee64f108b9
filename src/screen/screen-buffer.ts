import {
  cellText,
  createScreenBufferState,
  cursorPosition,
  defaultAttributes,
  effectiveCols,
  effectiveRows,
  getCell,
  getLineInfo,
  lineVisualWidth,
  markDirty,
  totalLineVisualWidth,
} from './screen-cells.js';
import { colorToANSICode } from './screen-color.js';
import { resolveScreenBufferOptions, type ScreenBufferOptions } from './screen-config.js';
import type { ScreenRecoveryDetails, ScreenRecoveryEvent } from './screen-diagnostics.js';
import { ReadWriteLock } from './screen-lock.js';
import * as glyphOps from './screen-glyphs.js';
import * as geometryOps from './screen-geometry-ops.js';
import * as paletteOps from './screen-palette.js';
import * as scrollOps from './screen-scroll-ops.js';
import * as selectionOps from './screen-selection-ops.js';
import * as writeOps from './screen-write-ops.js';
import type {
  AmbiguousWidthMode,
  Cell,
  Color,
  CursorDirections,
  CustomGlyph,
  HorizMemo,
  LineAttribute,
  LineDensity,
  LineInfo,
  Palette,
  ScreenBufferState,
  ScrollbackEntry,
  SelectionRange,
  UnderlineStyle,
} from './screen-types.js';
import { clamp } from './screen-utils.js';

export type ScreenSize = { cols: number; rows: number };

export type CursorStyle = { shape: number; blink: number };

export type ScreenCrop = { widthCrop: number; heightCrop: number };

/** The attributes an SGR sequence sets together. */
export type SgrAttributes = {
  fg: Color;
  bg: Color;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  reverse: boolean;
};

export type DirtyListener = () => void;

/** Called after the column modes or line density change. */
export type ScaleListener = () => void;

function notifyAll(listeners: Set<() => void>, label: string): void {
  for (const listener of [...listeners]) {
    try {
      listener();
    } catch (error) {
      console.error(`[screen] ${label} listener failed:`, error);
    }
  }
}

/**
 * Terminal screen model. An interpreter drives it one operation at a time;
 * a renderer reads it through the query methods.
 *
 * Mutations take the exclusive hold, queries the shared one. Dirty listeners
 * run after the hold is released, so they may read the buffer.
 */
export class ScreenBuffer {
  private readonly state: ScreenBufferState;
  private readonly lock = new ReadWriteLock('[screen] buffer');
  private readonly dirtyListeners = new Set<DirtyListener>();
  private readonly scaleListeners = new Set<ScaleListener>();

  constructor(options?: ScreenBufferOptions) {
    this.state = createScreenBufferState(resolveScreenBufferOptions(options));
  }

  private mutate<T>(fn: (s: ScreenBufferState) => T): T {
    const result = this.lock.write(() => fn(this.state));
    this.flushDirty();
    return result;
  }

  private query<T>(fn: (s: ScreenBufferState) => T): T {
    return this.lock.read(() => fn(this.state));
  }

  private flushDirty(): void {
    const s = this.state;
    if (!s.dirtyPending) return;
    s.dirtyPending = false;
    notifyAll(this.dirtyListeners, 'dirty');
  }

  private changeScale(fn: (s: ScreenBufferState) => void): void {
    this.mutate(fn);
    notifyAll(this.scaleListeners, 'scale');
  }

  // --- Dirty tracking ---

  isDirty(): boolean {
    return this.query((s) => s.dirty);
  }

  clearDirty(): void {
    this.lock.write(() => {
      this.state.dirty = false;
      this.state.dirtyPending = false;
    });
  }

  /** Registers a listener for state changes. Returns an unsubscribe function. */
  onDirty(listener: DirtyListener): () => void {
    this.dirtyListeners.add(listener);
    return () => {
      this.dirtyListeners.delete(listener);
    };
  }

  // --- Output ---

  writeChar(ch: string): void {
    this.mutate((s) => writeOps.writeChar(s, ch));
  }

  writeText(text: string): void {
    this.mutate((s) => writeOps.writeText(s, text));
  }

  // --- Cursor ---

  setCursor(x: number, y: number): void {
    this.mutate((s) => writeOps.setCursor(s, x, y));
  }

  /** After a write to the last column this is already the start of the next row. */
  getCursor(): { x: number; y: number } {
    return this.query(cursorPosition);
  }

  moveCursorUp(n = 1): void {
    this.mutate((s) => writeOps.moveCursorUp(s, n));
  }

  moveCursorDown(n = 1): void {
    this.mutate((s) => writeOps.moveCursorDown(s, n));
  }

  moveCursorForward(n = 1): void {
    this.mutate((s) => writeOps.moveCursorForward(s, n));
  }

  moveCursorBackward(n = 1): void {
    this.mutate((s) => writeOps.moveCursorBackward(s, n));
  }

  newline(): void {
    this.mutate(writeOps.newline);
  }

  lineFeed(): void {
    this.mutate(writeOps.lineFeed);
  }

  carriageReturn(): void {
    this.mutate(writeOps.carriageReturn);
  }

  tab(): void {
    this.mutate(writeOps.tab);
  }

  backspace(): void {
    this.mutate(writeOps.backspace);
  }

  saveCursor(): void {
    this.mutate(writeOps.saveCursor);
  }

  restoreCursor(): void {
    this.mutate(writeOps.restoreCursor);
  }

  setCursorVisible(visible: boolean): void {
    this.mutate((s) => {
      s.cursorVisible = visible;
      markDirty(s);
    });
  }

  isCursorVisible(): boolean {
    return this.query((s) => s.cursorVisible);
  }

  /** Shape 0 block, 1 underline, 2 bar; blink 0 none, 1 slow, 2 fast. */
  setCursorStyle(shape: number, blink: number): void {
    this.mutate((s) => {
      s.cursorShape = clamp(shape, 0, 2);
      s.cursorBlink = clamp(blink, 0, 2);
      markDirty(s);
    });
  }

  getCursorStyle(): CursorStyle {
    return this.query((s) => ({ shape: s.cursorShape, blink: s.cursorBlink }));
  }

  getCursorDirections(): CursorDirections {
    return this.query((s) => ({
      vertical: s.lastCursorMoveDir,
      horizontal: s.lastHorizCursorMoveDir,
      absoluteHorizontal: s.isAbsoluteHorizPosition,
    }));
  }

  // --- Editing ---

  insertLines(n = 1): void {
    this.mutate((s) => writeOps.insertLines(s, n));
  }

  deleteLines(n = 1): void {
    this.mutate((s) => writeOps.deleteLines(s, n));
  }

  insertChars(n = 1): void {
    this.mutate((s) => writeOps.insertChars(s, n));
  }

  deleteChars(n = 1): void {
    this.mutate((s) => writeOps.deleteChars(s, n));
  }

  eraseChars(n = 1): void {
    this.mutate((s) => writeOps.eraseChars(s, n));
  }

  clearToEndOfLine(): void {
    this.mutate(writeOps.clearToEndOfLine);
  }

  clearToStartOfLine(): void {
    this.mutate(writeOps.clearToStartOfLine);
  }

  clearLine(): void {
    this.mutate(writeOps.clearLine);
  }

  clearToEndOfScreen(): void {
    this.mutate(writeOps.clearToEndOfScreen);
  }

  clearToStartOfScreen(): void {
    this.mutate(writeOps.clearToStartOfScreen);
  }

  clearScreen(): void {
    this.mutate(writeOps.clearScreen);
  }

  scrollUp(n = 1): void {
    this.mutate((s) => scrollOps.scrollUp(s, n));
  }

  scrollDown(n = 1): void {
    this.mutate((s) => scrollOps.scrollDown(s, n));
  }

  setLineAttribute(attribute: LineAttribute): void {
    this.mutate((s) => writeOps.setLineAttribute(s, attribute));
  }

  getLineAttribute(y: number): LineAttribute {
    return this.query((s) => getLineInfo(s, y).attribute);
  }

  /** RIS: screen content goes to scrollback; palettes and glyphs are kept. */
  reset(): void {
    this.changeScale(geometryOps.resetScreen);
  }

  // --- Attributes ---

  setForeground(color: Color): void {
    this.mutate((s) => {
      s.attrs.fg = color;
      markDirty(s);
    });
  }

  setBackground(color: Color): void {
    this.mutate((s) => {
      s.attrs.bg = color;
      markDirty(s);
    });
  }

  setBold(bold: boolean): void {
    this.mutate((s) => {
      s.attrs.bold = bold;
      markDirty(s);
    });
  }

  setItalic(italic: boolean): void {
    this.mutate((s) => {
      s.attrs.italic = italic;
      markDirty(s);
    });
  }

  setUnderline(underline: boolean): void {
    this.mutate((s) => {
      s.attrs.underline = underline;
      s.attrs.underlineStyle = underline ? 'single' : 'none';
      markDirty(s);
    });
  }

  setUnderlineStyle(style: UnderlineStyle): void {
    this.mutate((s) => {
      s.attrs.underlineStyle = style;
      s.attrs.underline = style !== 'none';
      markDirty(s);
    });
  }

  setUnderlineColor(color: Color): void {
    this.mutate((s) => {
      s.attrs.underlineColor = color;
      markDirty(s);
    });
  }

  resetUnderlineColor(): void {
    this.mutate((s) => {
      s.attrs.underlineColor = undefined;
      markDirty(s);
    });
  }

  setReverse(reverse: boolean): void {
    this.mutate((s) => {
      s.attrs.reverse = reverse;
      markDirty(s);
    });
  }

  setBlink(blink: boolean): void {
    this.mutate((s) => {
      s.attrs.blink = blink;
      markDirty(s);
    });
  }

  setStrikethrough(strikethrough: boolean): void {
    this.mutate((s) => {
      s.attrs.strikethrough = strikethrough;
      markDirty(s);
    });
  }

  setAttributes(attrs: SgrAttributes): void {
    this.mutate((s) => {
      s.attrs = { ...s.attrs, ...attrs };
      markDirty(s);
    });
  }

  /** SGR 0. Flex width, glyph palette and flips are not SGR state and stay. */
  resetAttributes(): void {
    this.mutate((s) => {
      const { flexWidth, bgp, xFlip, yFlip } = s.attrs;
      s.attrs = { ...defaultAttributes(), flexWidth, bgp, xFlip, yFlip };
      markDirty(s);
    });
  }

  setBGP(palette: number): void {
    this.mutate((s) => {
      s.attrs.bgp = palette;
      markDirty(s);
    });
  }

  resetBGP(): void {
    this.setBGP(-1);
  }

  getBGP(): number {
    return this.query((s) => s.attrs.bgp);
  }

  setXFlip(flip: boolean): void {
    this.mutate((s) => {
      s.attrs.xFlip = flip;
      markDirty(s);
    });
  }

  setYFlip(flip: boolean): void {
    this.mutate((s) => {
      s.attrs.yFlip = flip;
      markDirty(s);
    });
  }

  // --- Modes ---

  /** Turns East Asian width handling on for the buffer and for cells written from now on. */
  setFlexWidthMode(enabled: boolean): void {
    this.mutate((s) => {
      s.modes.flexWidth = enabled;
      s.attrs.flexWidth = enabled;
      markDirty(s);
    });
  }

  isFlexWidthModeEnabled(): boolean {
    return this.query((s) => s.modes.flexWidth);
  }

  setVisualWidthWrap(enabled: boolean): void {
    this.mutate((s) => {
      s.modes.visualWidthWrap = enabled;
      markDirty(s);
    });
  }

  isVisualWidthWrapEnabled(): boolean {
    return this.query((s) => s.modes.visualWidthWrap);
  }

  setAmbiguousWidthMode(mode: AmbiguousWidthMode): void {
    this.mutate((s) => {
      s.modes.ambiguousWidth = mode;
      markDirty(s);
    });
  }

  getAmbiguousWidthMode(): AmbiguousWidthMode {
    return this.query((s) => s.modes.ambiguousWidth);
  }

  setAutoWrapMode(enabled: boolean): void {
    this.mutate((s) => {
      s.modes.autoWrap = enabled;
      markDirty(s);
    });
  }

  isAutoWrapModeEnabled(): boolean {
    return this.query((s) => s.modes.autoWrap);
  }

  setSmartWordWrap(enabled: boolean): void {
    this.mutate((s) => {
      s.modes.smartWordWrap = enabled;
      markDirty(s);
    });
  }

  isSmartWordWrapEnabled(): boolean {
    return this.query((s) => s.modes.smartWordWrap);
  }

  setBracketedPasteMode(enabled: boolean): void {
    this.mutate((s) => {
      s.modes.bracketedPaste = enabled;
      markDirty(s);
    });
  }

  isBracketedPasteModeEnabled(): boolean {
    return this.query((s) => s.modes.bracketedPaste);
  }

  setAutoScrollDisabled(disabled: boolean): void {
    this.mutate((s) => {
      s.modes.autoScrollDisabled = disabled;
      markDirty(s);
    });
  }

  isAutoScrollDisabled(): boolean {
    return this.query((s) => s.modes.autoScrollDisabled);
  }

  // --- Palettes and glyphs ---

  initPalette(n: number, length: number): void {
    this.mutate((s) => paletteOps.initPalette(s, n, length));
  }

  deletePalette(n: number): void {
    this.mutate((s) => paletteOps.deletePalette(s, n));
  }

  deleteAllPalettes(): void {
    this.mutate(paletteOps.deleteAllPalettes);
  }

  /** `code` is an SGR-style color: 30-37, 90-97, 8 transparent, 9 default foreground. */
  setPaletteEntry(n: number, index: number, code: number, dim = false): void {
    this.mutate((s) => paletteOps.setPaletteEntry(s, n, index, code, dim));
  }

  setPaletteEntryColor(n: number, index: number, color: Color, dim = false): void {
    this.mutate((s) => paletteOps.setPaletteEntryColor(s, n, index, color, dim));
  }

  getPalette(n: number): Palette | undefined {
    return this.query((s) => paletteOps.getPalette(s, n));
  }

  resolveGlyphColor(cell: Cell, paletteIndex: number): Color {
    return this.query((s) => paletteOps.resolveGlyphColor(s, cell, paletteIndex));
  }

  colorToANSICode(color: Color): number {
    return colorToANSICode(color);
  }

  setGlyph(ch: string, width: number, pixels: readonly number[]): void {
    this.mutate((s) => glyphOps.setGlyph(s, ch, width, pixels));
  }

  getGlyph(ch: string): CustomGlyph | undefined {
    return this.query((s) => glyphOps.getGlyph(s, ch));
  }

  hasCustomGlyph(ch: string): boolean {
    return this.query((s) => glyphOps.hasCustomGlyph(s, ch));
  }

  deleteGlyph(ch: string): void {
    this.mutate((s) => glyphOps.deleteGlyph(s, ch));
  }

  deleteAllGlyphs(): void {
    this.mutate(glyphOps.deleteAllGlyphs);
  }

  // --- Geometry ---

  resize(cols: number, rows: number): void {
    this.mutate((s) => geometryOps.resize(s, cols, rows));
  }

  getSize(): ScreenSize {
    return this.query((s) => ({ cols: s.cols, rows: s.rows }));
  }

  /** 0 for either dimension means the physical size. */
  setLogicalSize(rows: number, cols: number): void {
    this.mutate((s) => geometryOps.setLogicalSize(s, rows, cols));
  }

  getLogicalSize(): ScreenSize {
    return this.query((s) => ({ cols: s.logicalCols, rows: s.logicalRows }));
  }

  getEffectiveSize(): ScreenSize {
    return this.query((s) => ({ cols: effectiveCols(s), rows: effectiveRows(s) }));
  }

  setScreenCrop(widthCrop: number, heightCrop: number): void {
    this.mutate((s) => geometryOps.setScreenCrop(s, widthCrop, heightCrop));
  }

  getScreenCrop(): ScreenCrop {
    return this.query((s) => ({ widthCrop: s.widthCrop, heightCrop: s.heightCrop }));
  }

  clearScreenCrop(): void {
    this.mutate(geometryOps.clearScreenCrop);
  }

  // --- Scale modes ---

  /** Registers a listener for column mode and line density changes. Returns an unsubscribe function. */
  onScaleChange(listener: ScaleListener): () => void {
    this.scaleListeners.add(listener);
    return () => {
      this.scaleListeners.delete(listener);
    };
  }

  set132ColumnMode(enabled: boolean): void {
    this.changeScale((s) => geometryOps.set132ColumnMode(s, enabled));
  }

  is132ColumnModeEnabled(): boolean {
    return this.query((s) => s.modes.columnMode132);
  }

  set40ColumnMode(enabled: boolean): void {
    this.changeScale((s) => geometryOps.set40ColumnMode(s, enabled));
  }

  is40ColumnModeEnabled(): boolean {
    return this.query((s) => s.modes.columnMode40);
  }

  setLineDensity(density: number): void {
    this.changeScale((s) => geometryOps.setLineDensity(s, density));
  }

  getLineDensity(): LineDensity {
    return this.query((s) => s.modes.lineDensity);
  }

  getHorizontalScale(): number {
    return this.query(geometryOps.horizontalScale);
  }

  getVerticalScale(): number {
    return this.query(geometryOps.verticalScale);
  }

  // --- Scrollback and viewport ---

  getScrollbackSize(): number {
    return this.query(scrollOps.scrollbackSize);
  }

  getScrollbackLine(index: number): ScrollbackEntry | undefined {
    return this.query((s) => scrollOps.getScrollbackLine(s, index));
  }

  clearScrollback(): void {
    this.mutate(scrollOps.clearScrollback);
  }

  setScrollbackDisabled(disabled: boolean): void {
    this.mutate((s) => scrollOps.setScrollbackDisabled(s, disabled));
  }

  isScrollbackDisabled(): boolean {
    return this.query((s) => s.modes.scrollbackDisabled);
  }

  setScrollOffset(offset: number): void {
    this.mutate((s) => scrollOps.setScrollOffset(s, offset));
  }

  getScrollOffset(): number {
    return this.query((s) => s.scrollOffset);
  }

  getMaxScrollOffset(): number {
    return this.query(scrollOps.maxScrollOffset);
  }

  getEffectiveScrollOffset(): number {
    return this.query(scrollOps.effectiveScrollOffset);
  }

  normalizeScrollOffset(): boolean {
    return this.mutate(scrollOps.normalizeScrollOffset);
  }

  getScrollbackBoundaryVisibleRow(): number {
    return this.query(scrollOps.scrollbackBoundaryVisibleRow);
  }

  getCursorVisibleY(): number {
    return this.query(scrollOps.cursorVisibleY);
  }

  getCursorVisiblePosition(): { x: number; y: number } | undefined {
    return this.query(scrollOps.cursorVisiblePosition);
  }

  // --- Horizontal scrolling ---

  setHorizOffset(offset: number): void {
    this.mutate((s) => scrollOps.setHorizOffset(s, offset));
  }

  getHorizOffset(): number {
    return this.query((s) => s.horizOffset);
  }

  getMaxHorizOffset(): number {
    return this.query(scrollOps.maxHorizOffset);
  }

  needsHorizScrollbar(): boolean {
    return this.query(scrollOps.needsHorizScrollbar);
  }

  getLongestLineOnScreen(): number {
    return this.query(scrollOps.longestLineOnScreen);
  }

  getLongestLineInScrollback(): number {
    return this.query(scrollOps.longestLineInScrollback);
  }

  getLongestLineVisible(): number {
    return this.query(scrollOps.longestLineVisible);
  }

  // --- Selection ---

  startSelection(x: number, y: number): void {
    this.mutate((s) => selectionOps.startSelection(s, x, y));
  }

  updateSelection(x: number, y: number): void {
    this.mutate((s) => selectionOps.updateSelection(s, x, y));
  }

  /** The selection stays active until cleared. */
  endSelection(): void {}

  clearSelection(): void {
    this.mutate(selectionOps.clearSelection);
  }

  selectAll(): void {
    this.mutate(selectionOps.selectAll);
  }

  hasSelection(): boolean {
    return this.query((s) => s.selection !== null);
  }

  /** Normalized bounds in buffer coordinates. */
  getSelection(): SelectionRange | undefined {
    return this.query(selectionOps.normalizedSelection);
  }

  isCellInSelection(x: number, y: number): boolean {
    return this.query((s) => selectionOps.isCellInSelection(s, x, y));
  }

  getSelectedText(): string {
    return this.query(selectionOps.getSelectedText);
  }

  // --- Renderer and input collaborators ---

  notifyKeyboardActivity(): void {
    this.lock.write(() => scrollOps.notifyKeyboardActivity(this.state));
  }

  notifyManualVertScroll(): void {
    this.lock.write(() => scrollOps.notifyManualVertScroll(this.state));
  }

  setCursorDrawn(drawn: boolean): void {
    this.lock.write(() => scrollOps.setCursorDrawn(this.state, drawn));
  }

  /** Called by the renderer before painting. Returns true when the view scrolled. */
  checkCursorAutoScroll(): boolean {
    return this.mutate(scrollOps.checkCursorAutoScroll);
  }

  notifyManualHorizScroll(): void {
    this.lock.write(() => scrollOps.notifyManualHorizScroll(this.state));
  }

  /** Called by the renderer at the start of a paint, before memos are recorded. */
  clearHorizMemos(): void {
    this.lock.write(() => scrollOps.clearHorizMemos(this.state));
  }

  setHorizMemo(scanline: number, memo: HorizMemo): void {
    this.lock.write(() => scrollOps.setHorizMemo(this.state, scanline, memo));
  }

  getHorizMemos(): HorizMemo[] {
    return this.query((s) => [...s.horizMemos]);
  }

  /** Called by the renderer after painting, once memos are recorded. Returns true when the view scrolled. */
  checkCursorAutoScrollHoriz(): boolean {
    return this.mutate(scrollOps.checkCursorAutoScrollHoriz);
  }

  // --- Cell queries ---

  getCell(x: number, y: number): Cell {
    return this.query((s) => getCell(s, x, y));
  }

  getVisibleCell(x: number, y: number): Cell {
    return this.query((s) => scrollOps.getVisibleCell(s, x, y));
  }

  getLineInfo(y: number): LineInfo {
    return this.query((s) => getLineInfo(s, y));
  }

  getVisibleLineInfo(y: number): LineInfo {
    return this.query((s) => scrollOps.getVisibleLineInfo(s, y));
  }

  getLineLength(row: number): number {
    return this.query((s) => s.screen[row]?.length ?? 0);
  }

  getLineVisualWidth(row: number, col: number): number {
    return this.query((s) => lineVisualWidth(s, row, col));
  }

  getTotalLineVisualWidth(row: number): number {
    return this.query((s) => totalLineVisualWidth(s, row));
  }

  /** Scrollback then screen lines as plain text, one `\n`-terminated line each. */
  saveScrollbackText(): string {
    return this.query((s) => {
      const lines = [...s.scrollback.map((entry) => entry.line), ...s.screen];
      return lines.map((line) => line.map(cellText).join('') + '\n').join('');
    });
  }

  // --- Recoveries ---

  getRecoveryCount(event: ScreenRecoveryEvent): number {
    return this.query((s) => s.recoveries.count(event));
  }

  /** Detail of the most recent occurrence of `event`. */
  getLastRecovery<E extends ScreenRecoveryEvent>(event: E): ScreenRecoveryDetails[E] | undefined {
    return this.query((s) => s.recoveries.lastDetail(event));
  }

  getRecoveryCounts(): Partial<Record<ScreenRecoveryEvent, number>> {
    return this.query((s) => s.recoveries.snapshot());
  }

  clearRecoveries(): void {
    this.lock.write(() => this.state.recoveries.clear());
  }
}
