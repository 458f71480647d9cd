import { AddressError } from './errors.js';
import type { Bounds, CellAddress, CellRange } from './types.js';

const A = 'A'.charCodeAt(0);
const A1_RE = /^\$?([A-Za-z]+)\$?([0-9]+)$/;

/** Excel's grid, used when a backend declares nothing narrower. */
export const EXCEL_BOUNDS: Bounds = {
  start: { column: 1, row: 1 },
  end: { column: 16384, row: 1048576 }
};

export function columnToLetters(column: number): string {
  let n = column, s = '';
  while (n > 0) { const rem = (n - 1) % 26; s = String.fromCharCode(A + rem) + s; n = Math.floor((n - 1) / 26); }
  return s;
}

export function lettersToColumn(letters: string): number {
  const L = letters.toUpperCase();
  let n = 0;
  for (let i = 0; i < L.length; i++) n = n * 26 + (L.charCodeAt(i) - A + 1);
  return n;
}

function isValidAddress(a: CellAddress): boolean {
  return Number.isInteger(a.column) && Number.isInteger(a.row) && a.column >= 1 && a.row >= 1;
}

export function parseAddress(text: string): CellAddress {
  const m = A1_RE.exec(text.trim());
  if (!m) throw new AddressError('malformed', text);
  const row = parseInt(m[2], 10);
  // Reject overflowing letter runs before they turn into Infinity
  if (m[1].length > 7 || row < 1 || !Number.isSafeInteger(row)) throw new AddressError('malformed', text);
  return { column: lettersToColumn(m[1]), row };
}

export function formatAddress(a: CellAddress): string {
  if (!isValidAddress(a)) throw new AddressError('malformed', `column=${a.column},row=${a.row}`);
  return columnToLetters(a.column) + a.row;
}

export function makeRange(a: CellAddress, b: CellAddress): CellRange {
  return {
    start: { column: Math.min(a.column, b.column), row: Math.min(a.row, b.row) },
    end: { column: Math.max(a.column, b.column), row: Math.max(a.row, b.row) }
  };
}

/** `B2:D9`; a lone address is a 1x1 range. Reversed corners are normalised. */
export function parseRange(text: string): CellRange {
  const parts = text.split(':');
  if (parts.length > 2) throw new AddressError('malformed', text);
  const a = parseAddress(parts[0]);
  const b = parts.length === 2 ? parseAddress(parts[1]) : a;
  return makeRange(a, b);
}

export function formatRange(r: CellRange): string {
  const s = formatAddress(r.start), e = formatAddress(r.end);
  return s === e ? s : `${s}:${e}`;
}

export function rangeContains(r: CellRange, a: CellAddress): boolean {
  return a.column >= r.start.column && a.column <= r.end.column && a.row >= r.start.row && a.row <= r.end.row;
}

/** Row-major list of every address in the range. */
export function expandRange(r: CellRange): CellAddress[] {
  const out: CellAddress[] = [];
  for (let row = r.start.row; row <= r.end.row; row++)
    for (let column = r.start.column; column <= r.end.column; column++) out.push({ column, row });
  return out;
}

export function assertWithinBounds(a: CellAddress, bounds: Bounds | null): void {
  if (bounds && !rangeContains(bounds, a)) {
    throw new AddressError('out_of_bounds', formatAddress(a), `Cell ${formatAddress(a)} lies outside ${formatRange(bounds)}`);
  }
}
