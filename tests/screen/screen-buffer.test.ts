import { describe, expect, it } from 'vitest';
import { ScreenBuffer } from '../../src/screen/screen-buffer.js';
import { EMPTY_CELL } from '../../src/screen/screen-cells.js';
import { standardColor } from '../../src/screen/screen-color.js';
import { ReadWriteLock } from '../../src/screen/screen-lock.js';

describe('ScreenBuffer', () => {
  describe('construction', () => {
    it('starts with an empty screen and the cursor at home', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      expect(buffer.getSize()).toEqual({ cols: 10, rows: 3 });
      expect(buffer.getCursor()).toEqual({ x: 0, y: 0 });
      expect(buffer.getLineLength(0)).toBe(0);
      expect(buffer.isDirty()).toBe(true);
      expect(buffer.isCursorVisible()).toBe(true);
      expect(buffer.getCursorStyle()).toEqual({ shape: 0, blink: 0 });
    });

    it('starts with default modes', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      expect(buffer.isAutoWrapModeEnabled()).toBe(true);
      expect(buffer.isSmartWordWrapEnabled()).toBe(true);
      expect(buffer.isFlexWidthModeEnabled()).toBe(false);
      expect(buffer.isVisualWidthWrapEnabled()).toBe(false);
      expect(buffer.getAmbiguousWidthMode()).toBe('auto');
      expect(buffer.isBracketedPasteModeEnabled()).toBe(false);
      expect(buffer.isAutoScrollDisabled()).toBe(false);
    });
  });

  describe('cell lookups', () => {
    it('returns the line default past the end of a line', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.writeText('ab');
      expect(buffer.getCell(5, 0)).toEqual(EMPTY_CELL);
    });

    it('returns the screen default past the last row', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      expect(buffer.getCell(0, 99)).toEqual(EMPTY_CELL);
      expect(buffer.getVisibleCell(0, 99)).toEqual(EMPTY_CELL);
      expect(buffer.getVisibleLineInfo(99)).toEqual({ attribute: 'normal', defaultCell: EMPTY_CELL });
    });

    it('hands out cells that do not change with the buffer', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.writeText('a');
      const cell = buffer.getCell(0, 0);
      buffer.writeText('\u0301');
      expect(cell.combining).toBe('');
      expect(buffer.getCell(0, 0).combining).toBe('\u0301');
    });
  });

  describe('dirty tracking', () => {
    it('clears and re-marks the dirty flag', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.clearDirty();
      expect(buffer.isDirty()).toBe(false);
      buffer.setBold(true);
      expect(buffer.isDirty()).toBe(true);
    });

    it('notifies listeners once per mutating call', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      let calls = 0;
      const unsubscribe = buffer.onDirty(() => {
        calls += 1;
      });

      buffer.writeText('abc');
      expect(calls).toBe(1);
      buffer.notifyKeyboardActivity();
      buffer.setCursorDrawn(false);
      expect(calls).toBe(1);

      unsubscribe();
      buffer.writeText('d');
      expect(calls).toBe(1);
    });

    it('lets listeners read the buffer', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      let seen = -1;
      buffer.onDirty(() => {
        seen = buffer.getCursor().x;
      });
      buffer.writeText('ab');
      expect(seen).toBe(2);
    });
  });

  describe('reset', () => {
    it('moves content to scrollback and restores defaults', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3, maxScrollback: 100 });
      buffer.initPalette(1, 2);
      buffer.setGlyph('g', 1, [1]);
      buffer.setForeground(standardColor(1));
      buffer.setBold(true);
      buffer.setAutoWrapMode(false);
      buffer.writeText('hello');
      buffer.setCursorVisible(false);

      buffer.reset();
      expect(buffer.getScrollbackSize()).toBe(1);
      expect(buffer.getCursor()).toEqual({ x: 0, y: 0 });
      expect(buffer.getLineLength(0)).toBe(0);
      expect(buffer.isAutoWrapModeEnabled()).toBe(true);
      expect(buffer.isCursorVisible()).toBe(true);
      expect(buffer.getPalette(1)).toBeDefined();
      expect(buffer.hasCustomGlyph('g')).toBe(true);

      buffer.writeChar('x');
      expect(buffer.getCell(0, 0)).toMatchObject({ bold: false, fg: EMPTY_CELL.fg });
    });
  });

  describe('saveScrollbackText', () => {
    it('joins scrollback and screen lines with their combining marks', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 2, maxScrollback: 100 });
      buffer.writeText('one');
      buffer.newline();
      buffer.writeText('two');
      buffer.newline();
      buffer.writeText('cafe\u0301');
      expect(buffer.saveScrollbackText()).toBe('one\ntwo\ncafe\u0301\n');
    });
  });

  describe('bracketed paste', () => {
    it('toggles the mode', () => {
      const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
      buffer.setBracketedPasteMode(true);
      expect(buffer.isBracketedPasteModeEnabled()).toBe(true);
    });
  });
});

describe('ReadWriteLock', () => {
  it('allows nested reads', () => {
    const lock = new ReadWriteLock('test');
    expect(lock.read(() => lock.read(() => 2))).toBe(2);
  });

  it('rejects nested writes', () => {
    const lock = new ReadWriteLock('test');
    expect(() => lock.write(() => lock.write(() => 1))).toThrow('test: nested write attempted');
    expect(lock.isHeld()).toBe(false);
  });

  it('rejects a write inside a read', () => {
    const lock = new ReadWriteLock('test');
    expect(() => lock.read(() => lock.write(() => 1))).toThrow('test: write attempted while 1 read(s) are active');
    expect(lock.isHeld()).toBe(false);
  });

  it('rejects a read inside a write', () => {
    const lock = new ReadWriteLock('test');
    expect(() => lock.write(() => lock.read(() => 1))).toThrow('test: read attempted while a write is in progress');
  });

  it('releases the hold when the callback throws', () => {
    const lock = new ReadWriteLock('test');
    expect(() =>
      lock.write(() => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
    expect(lock.write(() => 3)).toBe(3);
  });
});
