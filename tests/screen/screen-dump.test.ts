import { Chalk } from 'chalk';
import { describe, expect, it } from 'vitest';
import { ScreenBuffer } from '../../src/screen/screen-buffer.js';
import { formatScreenDump } from '../../src/screen/screen-dump.js';

describe('formatScreenDump', () => {
  it('renders plain rows without trailing blanks', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 3 });
    buffer.writeText('hi');
    buffer.newline();
    buffer.writeText('  there');
    expect(formatScreenDump(buffer, { chalk: new Chalk({ level: 0 }) })).toEqual(['hi', '  there', '']);
  });

  it('marks the cursor cell in inverse', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 1 });
    buffer.writeText('hi');
    expect(formatScreenDump(buffer, { chalk: new Chalk({ level: 1 }) })).toEqual(['hi\u001B[7m \u001B[27m']);
  });

  it('omits the cursor when asked to', () => {
    const buffer = new ScreenBuffer({ cols: 10, rows: 1 });
    buffer.writeText('hi');
    expect(formatScreenDump(buffer, { chalk: new Chalk({ level: 1 }), showCursor: false })).toEqual(['hi']);
  });

  it('keeps full width in colour mode', () => {
    const buffer = new ScreenBuffer({ cols: 4, rows: 1 });
    buffer.writeText('ab');
    expect(formatScreenDump(buffer, { color: true, chalk: new Chalk({ level: 0 }) })).toEqual(['ab  ']);
  });

  it('colours runs from resolved cell colors', () => {
    const buffer = new ScreenBuffer({ cols: 2, rows: 1 });
    buffer.writeText('ab');
    expect(formatScreenDump(buffer, { color: true, showCursor: false, chalk: new Chalk({ level: 3 }) })).toEqual([
      '\u001B[38;2;212;212;212m\u001B[48;2;30;30;30mab\u001B[49m\u001B[39m',
    ]);
  });
});
