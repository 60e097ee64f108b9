import { describe, expect, it } from 'vitest';
import { ScreenBuffer } from '../../src/screen/screen-buffer.js';
import { standardColor } from '../../src/screen/screen-color.js';

function rowText(buffer: ScreenBuffer, y: number): string {
  let text = '';
  for (let x = 0; x < buffer.getLineLength(y); x++) {
    text += buffer.getCell(x, y).char;
  }
  return text;
}

function bufferWithRows(...rows: string[]): ScreenBuffer {
  const buffer = new ScreenBuffer({ cols: 10, rows: 3, maxScrollback: 100 });
  rows.forEach((row, i) => {
    if (i > 0) buffer.newline();
    buffer.writeText(row);
  });
  return buffer;
}

describe('line and character editing', () => {
  describe('characters', () => {
    it('deletes characters at the cursor, shifting left', () => {
      const buffer = bufferWithRows('abcdef');
      buffer.setCursor(1, 0);
      buffer.deleteChars(2);
      expect(rowText(buffer, 0)).toBe('adef');
    });

    it('ignores deletes past the end of the line', () => {
      const buffer = bufferWithRows('ab');
      buffer.setCursor(5, 0);
      buffer.deleteChars(3);
      expect(rowText(buffer, 0)).toBe('ab');
    });

    it('marks the buffer dirty for deletes and erases past the line end', () => {
      const buffer = bufferWithRows('abc');
      buffer.setCursor(5, 0);
      buffer.clearDirty();
      buffer.deleteChars(1);
      expect(buffer.isDirty()).toBe(true);

      buffer.clearDirty();
      buffer.eraseChars(2);
      expect(buffer.isDirty()).toBe(true);
      expect(rowText(buffer, 0)).toBe('abc');
    });

    it('inserts blanks at the cursor, shifting right', () => {
      const buffer = bufferWithRows('abc');
      buffer.setCursor(1, 0);
      buffer.insertChars(2);
      expect(rowText(buffer, 0)).toBe('a  bc');
    });

    it('grows the line to reach the cursor before inserting', () => {
      const buffer = bufferWithRows('ab');
      buffer.setCursor(5, 0);
      buffer.insertChars(2);
      expect(buffer.getLineLength(0)).toBe(7);
      expect(rowText(buffer, 0)).toBe('ab     ');
    });

    it('bounds huge insert counts by the line width', () => {
      const buffer = bufferWithRows('abc');
      buffer.setCursor(0, 0);
      buffer.insertChars(1e9);
      expect(buffer.getLineLength(0)).toBe(13);
    });

    it('erases existing cells without lengthening the line', () => {
      const buffer = bufferWithRows('abc');
      buffer.setCursor(1, 0);
      buffer.eraseChars(5);
      expect(rowText(buffer, 0)).toBe('a  ');
    });

    it('fills erased cells with the current background', () => {
      const buffer = bufferWithRows('abc');
      buffer.setBackground(standardColor(4));
      buffer.setCursor(0, 0);
      buffer.eraseChars(1);
      expect(buffer.getCell(0, 0).bg).toEqual(standardColor(4));
      expect(buffer.getCell(0, 0).char).toBe(' ');
    });
  });

  describe('lines', () => {
    it('inserts blank lines at the cursor, dropping lines off the bottom', () => {
      const buffer = bufferWithRows('one', 'two', 'three');
      buffer.setCursor(0, 1);
      buffer.insertLines(1);
      expect([0, 1, 2].map((y) => rowText(buffer, y))).toEqual(['one', '', 'two']);
      expect(buffer.getScrollbackSize()).toBe(0);
    });

    it('deletes lines at the cursor, adding blanks at the bottom', () => {
      const buffer = bufferWithRows('one', 'two', 'three');
      buffer.setCursor(0, 1);
      buffer.deleteLines(1);
      expect([0, 1, 2].map((y) => rowText(buffer, y))).toEqual(['one', 'three', '']);
    });

    it('bounds line counts by the rows below the cursor', () => {
      const buffer = bufferWithRows('one', 'two', 'three');
      buffer.setCursor(0, 1);
      buffer.insertLines(1000);
      expect([0, 1, 2].map((y) => rowText(buffer, y))).toEqual(['one', '', '']);
    });
  });

  describe('clears', () => {
    it('truncates to the cursor for clear-to-end-of-line', () => {
      const buffer = bufferWithRows('abcdef');
      buffer.setCursor(2, 0);
      buffer.clearToEndOfLine();
      expect(rowText(buffer, 0)).toBe('ab');
    });

    it('fills beyond a cleared line end with the current background', () => {
      const buffer = bufferWithRows('abc');
      buffer.setBackground(standardColor(4));
      buffer.setCursor(1, 0);
      buffer.clearToEndOfLine();
      expect(buffer.getCell(5, 0).bg).toEqual(standardColor(4));
      expect(buffer.getLineInfo(0).defaultCell.bg).toEqual(standardColor(4));
    });

    it('blanks cells up to and including the cursor for clear-to-start-of-line', () => {
      const buffer = bufferWithRows('abcdef');
      buffer.setCursor(2, 0);
      buffer.clearToStartOfLine();
      expect(rowText(buffer, 0)).toBe('   def');
    });

    it('leaves the row default alone for clear-to-start-of-line', () => {
      const buffer = bufferWithRows('ab');
      buffer.setBackground(standardColor(4));
      buffer.setCursor(5, 0);
      buffer.clearToStartOfLine();
      expect(buffer.getLineLength(0)).toBe(2);
      expect(buffer.getCell(0, 0).bg).toEqual(standardColor(4));
      expect(buffer.getCell(5, 0).bg).not.toEqual(standardColor(4));
    });

    it('empties the row for clear-line', () => {
      const buffer = bufferWithRows('abc');
      buffer.clearLine();
      expect(buffer.getLineLength(0)).toBe(0);
    });

    it('clears from the cursor to the end of the screen', () => {
      const buffer = bufferWithRows('one', 'two', 'three');
      buffer.setCursor(1, 1);
      buffer.clearToEndOfScreen();
      expect([0, 1, 2].map((y) => rowText(buffer, y))).toEqual(['one', 't', '']);
    });

    it('clears from the start of the screen to the cursor', () => {
      const buffer = bufferWithRows('one', 'two', 'three');
      buffer.setCursor(1, 1);
      buffer.clearToStartOfScreen();
      expect([0, 1, 2].map((y) => rowText(buffer, y))).toEqual(['', '  o', 'three']);
    });

    it('homes the cursor and keeps scrollback on clear-screen', () => {
      const buffer = bufferWithRows('one', 'two', 'three', 'four');
      buffer.clearScreen();
      expect(buffer.getCursor()).toEqual({ x: 0, y: 0 });
      expect(buffer.getScrollbackSize()).toBe(1);
      expect([0, 1, 2].map((y) => buffer.getLineLength(y))).toEqual([0, 0, 0]);
    });
  });

  describe('scroll regions', () => {
    it('scrolls up into scrollback', () => {
      const buffer = bufferWithRows('one', 'two', 'three');
      buffer.scrollUp(2);
      expect([0, 1, 2].map((y) => rowText(buffer, y))).toEqual(['three', '', '']);
      expect(buffer.getScrollbackSize()).toBe(2);
    });

    it('scrolls down without touching scrollback', () => {
      const buffer = bufferWithRows('one', 'two', 'three');
      buffer.scrollDown(1);
      expect([0, 1, 2].map((y) => rowText(buffer, y))).toEqual(['', 'one', 'two']);
      expect(buffer.getScrollbackSize()).toBe(0);
    });
  });

  describe('line attributes', () => {
    it('sets the attribute of the cursor row', () => {
      const buffer = bufferWithRows('one', 'two');
      buffer.setLineAttribute('double-width');
      expect(buffer.getLineAttribute(1)).toBe('double-width');
      expect(buffer.getLineAttribute(0)).toBe('normal');
    });
  });
});
