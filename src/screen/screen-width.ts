/**
 * Unicode width classification: combining marks and East Asian Width.
 * Ranges live in data/unicode-width.json.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

export type EastAsianWidthClass = 'H' | 'F' | 'W' | 'A' | 'Na' | 'N';

/** Display width in cells, -1 for ambiguous. */
export type WidthClass = 1 | 2 | -1;

type Range = { start: number; end: number };
type ClassRange = Range & { cls: EastAsianWidthClass };

type WidthTables = {
  combining: Range[];
  eastAsianWidth: ClassRange[];
};

const DATA_URL = new URL('../../data/unicode-width.json', import.meta.url);

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isClass(value: string | undefined): value is EastAsianWidthClass {
  return value === 'H' || value === 'F' || value === 'W' || value === 'A' || value === 'Na' || value === 'N';
}

function parseRange(row: string[]): Range {
  return { start: parseInt(row[0], 16), end: parseInt(row[1], 16) };
}

function parseTables(raw: unknown): WidthTables {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('unicode-width.json: expected an object');
  }
  const combining: unknown = Reflect.get(raw, 'combining');
  const eastAsianWidth: unknown = Reflect.get(raw, 'eastAsianWidth');
  if (!Array.isArray(combining) || !Array.isArray(eastAsianWidth)) {
    throw new Error('unicode-width.json: missing combining or eastAsianWidth table');
  }

  const tables: WidthTables = { combining: [], eastAsianWidth: [] };
  for (const row of combining) {
    if (!isStringArray(row) || row.length !== 2) {
      throw new Error(`unicode-width.json: bad combining range ${JSON.stringify(row)}`);
    }
    tables.combining.push(parseRange(row));
  }
  for (const row of eastAsianWidth) {
    if (!isStringArray(row) || row.length !== 3 || !isClass(row[2])) {
      throw new Error(`unicode-width.json: bad width range ${JSON.stringify(row)}`);
    }
    tables.eastAsianWidth.push({ ...parseRange(row), cls: row[2] });
  }
  return tables;
}

let tables: WidthTables | undefined;

function loadTables(): WidthTables {
  if (!tables) {
    tables = parseTables(JSON.parse(readFileSync(fileURLToPath(DATA_URL), 'utf-8')));
  }
  return tables;
}

function inRanges(cp: number, ranges: readonly Range[]): boolean {
  return ranges.some((r) => cp >= r.start && cp <= r.end);
}

export function isCombiningMark(cp: number): boolean {
  return inRanges(cp, loadTables().combining);
}

/** First matching range wins; unlisted code points are Neutral. */
export function eastAsianWidthClass(cp: number): EastAsianWidthClass {
  for (const r of loadTables().eastAsianWidth) {
    if (cp >= r.start && cp <= r.end) return r.cls;
  }
  return 'N';
}

export function eastAsianWidth(cp: number): WidthClass {
  switch (eastAsianWidthClass(cp)) {
    case 'F':
    case 'W':
      return 2;
    case 'A':
      return -1;
    default:
      return 1;
  }
}

/** Width class of the first code point of `ch`. */
export function charWidthClass(ch: string): WidthClass {
  const cp = ch.codePointAt(0);
  return cp === undefined ? 1 : eastAsianWidth(cp);
}
