import { formatAddress, makeRange, parseAddress } from './address.js';
import type { CellAddress, CellContent, CellRange, CellValue } from './types.js';

export type StoredCell = {
  content: CellContent;
  /** Last value computed for a formula cell. */
  computed?: CellValue;
};

export type Sheet = {
  name: string;
  cells: Map<string, StoredCell>;
};

const EMPTY: CellValue = { kind: 'empty' };

/** In-memory cell grid of one workbook; every store variant keeps one per workbook. */
export class SheetModel {
  readonly sheets = new Map<string, Sheet>();
  private rev = 0;

  constructor(readonly id: string, sheetNames: string[] = ['Sheet1']) {
    for (const name of sheetNames) this.createSheet(name);
  }

  get revision(): number {
    return this.rev;
  }

  // ===== Sheets =====
  createSheet(name: string): Sheet {
    if (this.sheets.has(name)) throw new Error(`Sheet exists: ${name}`);
    const s: Sheet = { name, cells: new Map() };
    this.sheets.set(name, s);
    return s;
  }

  hasSheet(name: string): boolean {
    return this.sheets.has(name);
  }

  get firstSheet(): string | null {
    for (const name of this.sheets.keys()) return name;
    return null;
  }

  private getSheet(name: string): Sheet {
    const s = this.sheets.get(name);
    if (!s) throw new Error(`Sheet not found: ${name}`);
    return s;
  }

  // ===== Cells =====
  getContent(sheet: string, a: CellAddress): CellContent {
    return this.getSheet(sheet).cells.get(formatAddress(a))?.content ?? EMPTY;
  }

  getFormula(sheet: string, a: CellAddress): string | null {
    const c = this.getContent(sheet, a);
    return c.kind === 'formula' ? c.source : null;
  }

  /** Literal value, or the last computed value of a formula cell. */
  getValue(sheet: string, a: CellAddress): CellValue {
    const cell = this.getSheet(sheet).cells.get(formatAddress(a));
    if (!cell) return EMPTY;
    if (cell.content.kind === 'formula') return cell.computed ?? EMPTY;
    return cell.content;
  }

  setContent(sheet: string, a: CellAddress, content: CellContent): number {
    const s = this.getSheet(sheet);
    const key = formatAddress(a);
    if (content.kind === 'empty') s.cells.delete(key);
    else s.cells.set(key, { content });
    return ++this.rev;
  }

  setComputed(sheet: string, a: CellAddress, value: CellValue): void {
    const cell = this.getSheet(sheet).cells.get(formatAddress(a));
    if (!cell || cell.content.kind !== 'formula') return;
    cell.computed = value;
  }

  readRange(sheet: string, r: CellRange): CellValue[][] {
    const out: CellValue[][] = [];
    for (let row = r.start.row; row <= r.end.row; row++) {
      const line: CellValue[] = [];
      for (let column = r.start.column; column <= r.end.column; column++) line.push(this.getValue(sheet, { column, row }));
      out.push(line);
    }
    return out;
  }

  /** Smallest range covering every non-empty cell, or null for an empty sheet. */
  usedRange(sheet: string): CellRange | null {
    let range: CellRange | null = null;
    for (const key of this.getSheet(sheet).cells.keys()) {
      const a = parseAddress(key);
      range = range ? makeRange(
        { column: Math.min(range.start.column, a.column), row: Math.min(range.start.row, a.row) },
        { column: Math.max(range.end.column, a.column), row: Math.max(range.end.row, a.row) }
      ) : makeRange(a, a);
    }
    return range;
  }

  /** Stable text of every cell's content, for spotting edits made elsewhere. */
  fingerprint(sheet: string): string {
    const keys = [...this.getSheet(sheet).cells.keys()].sort();
    return JSON.stringify(keys.map(k => [k, this.getSheet(sheet).cells.get(k)?.content]));
  }
}
