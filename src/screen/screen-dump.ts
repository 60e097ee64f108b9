import chalk, { type ChalkInstance } from 'chalk';
import { cellText } from './screen-cells.js';
import { colorToHex } from './screen-color.js';
import type { ScreenBuffer } from './screen-buffer.js';
import type { Cell } from './screen-types.js';

export type ScreenDumpOptions = {
  /** Colour cells from their resolved fg/bg. Default false. */
  color?: boolean;
  /** Highlight the cursor cell in inverse. Default true. */
  showCursor?: boolean;
  chalk?: ChalkInstance;
};

type Run = { key: string; cell: Cell; text: string };

function styleKey(cell: Cell, cursor: boolean): string {
  return [
    colorToHex(cell.fg),
    colorToHex(cell.bg),
    cell.bold ? 'b' : '',
    cell.italic ? 'i' : '',
    cell.underline ? 'u' : '',
    cell.strikethrough ? 's' : '',
    cursor ? 'c' : '',
  ].join('|');
}

function styleRun(c: ChalkInstance, run: Run, color: boolean): string {
  const { cell } = run;
  const cursor = run.key.endsWith('|c');
  if (!color) return cursor ? c.inverse(run.text) : run.text;
  let style = c.rgb(cell.fg.r, cell.fg.g, cell.fg.b).bgRgb(cell.bg.r, cell.bg.g, cell.bg.b);
  if (cell.bold) style = style.bold;
  if (cell.italic) style = style.italic;
  if (cell.underline) style = style.underline;
  if (cell.strikethrough) style = style.strikethrough;
  if (cursor) style = style.inverse;
  return style(run.text);
}

/**
 * Renders the visible viewport, one string per row. Plain output drops
 * trailing blanks and only marks the cursor; coloured output keeps the full
 * width so backgrounds show.
 */
export function formatScreenDump(buffer: ScreenBuffer, options?: ScreenDumpOptions): string[] {
  const c = options?.chalk ?? chalk;
  const color = options?.color ?? false;
  const showCursor = options?.showCursor ?? true;
  const { cols, rows } = buffer.getSize();
  const cursor = showCursor && buffer.isCursorVisible() ? buffer.getCursorVisiblePosition() : undefined;

  const out: string[] = [];
  for (let y = 0; y < rows; y++) {
    const runs: Run[] = [];
    for (let x = 0; x < cols; x++) {
      const cell = buffer.getVisibleCell(x, y);
      const atCursor = cursor !== undefined && cursor.x === x && cursor.y === y;
      const key = styleKey(cell, atCursor);
      const last = runs[runs.length - 1];
      if (last && last.key === key) {
        last.text += cellText(cell);
      } else {
        runs.push({ key, cell, text: cellText(cell) });
      }
    }

    const line = runs.map((run) => styleRun(c, run, color)).join('');
    out.push(color ? line : line.trimEnd());
  }
  return out;
}
