import { promises as fs } from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import type { Logger } from 'pino';

import { EXCEL_BOUNDS, formatRange, makeRange, parseAddress, parseRange } from '../address.js';
import { BackendUnavailableError, ERR, errnoOf, isErrorCode, messageOf } from '../errors.js';
import { SheetModel } from '../sheet.js';
import type { CellContent, CellValue, ErrorCode } from '../types.js';
import { GridStore } from './store.js';

// BIFF error numbers SheetJS expects in `v` for error cells
const ERROR_NUMBERS: Record<ErrorCode, number> = {
  '#DIV/0!': 0x07,
  '#VALUE!': 0x0f,
  '#REF!': 0x17,
  '#NAME?': 0x1d,
  '#NUM!': 0x24,
  '#ERROR!': 0x0f
};

export function cellObjectToValue(cell: XLSX.CellObject): CellValue {
  switch (cell.t) {
    case 'n': return typeof cell.v === 'number' ? { kind: 'number', value: cell.v } : { kind: 'empty' };
    case 'b': return { kind: 'boolean', value: cell.v === true };
    case 's': return { kind: 'text', value: String(cell.v ?? '') };
    case 'd': return cell.v instanceof Date ? { kind: 'text', value: cell.v.toISOString() } : { kind: 'empty' };
    case 'e': return { kind: 'error', code: isErrorCode(cell.w) ? cell.w : ERR.VALUE };
    case 'z': return { kind: 'empty' };
  }
}

export function valueToCellObject(v: CellValue): XLSX.CellObject {
  switch (v.kind) {
    case 'number': return { t: 'n', v: v.value };
    case 'text': return { t: 's', v: v.value };
    case 'boolean': return { t: 'b', v: v.value };
    case 'error': return { t: 'e', v: ERROR_NUMBERS[v.code], w: v.code };
    case 'empty': return { t: 'z' };
  }
}

function cellObjectToContent(cell: XLSX.CellObject): CellContent {
  if (cell.f) return { kind: 'formula', source: `=${cell.f}` };
  return cellObjectToValue(cell);
}

export function bookToModel(id: string, book: XLSX.WorkBook): SheetModel {
  const model = new SheetModel(id, book.SheetNames);
  for (const name of book.SheetNames) {
    const ws = book.Sheets[name];
    for (const key of Object.keys(ws)) {
      if (key.startsWith('!')) continue;
      const cell: XLSX.CellObject = ws[key];
      const content = cellObjectToContent(cell);
      if (content.kind === 'empty') continue;
      const a = parseAddress(key);
      model.setContent(name, a, content);
      if (content.kind === 'formula') model.setComputed(name, a, cellObjectToValue(cell));
    }
  }
  return model;
}

/** Copies the model's cells into the book, keeping styles of cells that survive. */
export function applyModelToBook(model: SheetModel, book: XLSX.WorkBook): void {
  for (const [name, sheet] of model.sheets) {
    let ws = book.Sheets[name];
    if (!ws) {
      ws = {};
      XLSX.utils.book_append_sheet(book, ws, name);
    }
    for (const key of Object.keys(ws)) {
      if (!key.startsWith('!') && !sheet.cells.has(key)) delete ws[key];
    }
    for (const [key, cell] of sheet.cells) {
      const prev: XLSX.CellObject | undefined = ws[key];
      let next: XLSX.CellObject;
      if (cell.content.kind === 'formula') {
        const f = cell.content.source.replace(/^=/, '');
        // A formula never computed is written without a cached value
        next = cell.computed && cell.computed.kind !== 'empty' ? { ...valueToCellObject(cell.computed), f } : { t: 'n', f };
      } else {
        next = valueToCellObject(cell.content);
      }
      ws[key] = prev?.s !== undefined ? { ...next, s: prev.s } : next;
    }
    const used = model.usedRange(name);
    const declared = typeof ws['!ref'] === 'string' ? parseRange(ws['!ref']) : null;
    const ref = used && declared ? makeRange(
      { column: Math.min(used.start.column, declared.start.column), row: Math.min(used.start.row, declared.start.row) },
      { column: Math.max(used.end.column, declared.end.column), row: Math.max(used.end.row, declared.end.row) }
    ) : used ?? declared;
    if (ref) ws['!ref'] = formatRange(ref);
  }
}

type Loaded = { book: XLSX.WorkBook; mtimeMs: number };

export type XlsxStoreOptions = {
  /** Directory that workbook ids are resolved against. */
  baseDir: string;
  logger?: Logger;
};

/**
 * Local .xlsx files. Workbook ids are paths relative to `baseDir`. A file is
 * read on first open and kept in memory; `flush` writes it back. A file changed
 * on disk since it was loaded is reloaded and reported as an outside write.
 */
export class XlsxWorkbookStore extends GridStore {
  readonly kind = 'file' as const;
  private readonly baseDir: string;
  private readonly loaded = new Map<string, Loaded>();

  constructor(private readonly opts: XlsxStoreOptions) {
    super();
    this.baseDir = path.resolve(opts.baseDir);
  }

  resolvePath(workbookId: string): string {
    const full = path.resolve(this.baseDir, workbookId);
    if (!full.startsWith(this.baseDir + path.sep)) {
      throw new BackendUnavailableError(workbookId, 'not_found', `Workbook path escapes ${this.baseDir}`);
    }
    return full;
  }

  private async stat(workbookId: string, file: string) {
    try {
      return await fs.stat(file);
    } catch (e) {
      if (errnoOf(e) === 'ENOENT') {
        throw new BackendUnavailableError(workbookId, 'not_found', `Workbook file not found: ${workbookId}`, 1, { cause: e });
      }
      throw new BackendUnavailableError(workbookId, 'transport', `Cannot read workbook ${workbookId}: ${messageOf(e)}`, 1, { cause: e });
    }
  }

  protected async load(workbookId: string) {
    const file = this.resolvePath(workbookId);
    const st = await this.stat(workbookId, file);
    const prev = this.loaded.get(workbookId);
    const model = this.models.get(workbookId);
    if (prev && model && prev.mtimeMs === st.mtimeMs) return { model, bounds: EXCEL_BOUNDS };

    const bytes = await fs.readFile(file);
    const next = this.install(workbookId, bytes, st.mtimeMs);
    if (prev) {
      this.opts.logger?.info({ workbookId }, 'workbook changed on disk; reloaded');
      this.emit({ workbookId, sheet: null, origin: null, kind: 'replace', revision: next.revision });
    }
    return { model: next, bounds: EXCEL_BOUNDS };
  }

  private install(workbookId: string, bytes: Buffer, mtimeMs: number): SheetModel {
    let book: XLSX.WorkBook;
    try {
      book = XLSX.read(bytes, { type: 'buffer', cellFormula: true, cellStyles: true });
    } catch (e) {
      throw new BackendUnavailableError(workbookId, 'transport', `Not a readable workbook: ${messageOf(e)}`, 1, { cause: e });
    }
    const model = bookToModel(workbookId, book);
    this.loaded.set(workbookId, { book, mtimeMs });
    this.models.set(workbookId, model);
    return model;
  }

  protected async persistFlush(h: { workbookId: string }, model: SheetModel): Promise<void> {
    const entry = this.loaded.get(h.workbookId);
    if (!entry) return;
    applyModelToBook(model, entry.book);
    const file = this.resolvePath(h.workbookId);
    const out: Buffer = XLSX.write(entry.book, { type: 'buffer', bookType: 'xlsx' });
    await this.writeAtomic(h.workbookId, file, out);
    entry.mtimeMs = (await this.stat(h.workbookId, file)).mtimeMs;
  }

  /** Writes beside the target, then renames over it. */
  private async writeAtomic(workbookId: string, file: string, bytes: Buffer): Promise<void> {
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tmp, bytes);
      await fs.rename(tmp, file);
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw new BackendUnavailableError(workbookId, 'transport', `Cannot write workbook ${workbookId}: ${messageOf(e)}`, 1, { cause: e });
    }
  }

  /** Installs an uploaded workbook file, replacing whatever was there. */
  async replaceFile(workbookId: string, bytes: Buffer): Promise<void> {
    const file = this.resolvePath(workbookId);
    // Parse first so a broken upload never reaches disk
    XLSX.read(bytes, { type: 'buffer' });
    await fs.mkdir(path.dirname(file), { recursive: true });
    await this.writeAtomic(workbookId, file, bytes);
    const model = this.install(workbookId, bytes, (await this.stat(workbookId, file)).mtimeMs);
    this.opts.logger?.info({ workbookId, bytes: bytes.length }, 'workbook replaced');
    this.emit({ workbookId, sheet: null, origin: null, kind: 'replace', revision: model.revision });
  }

  /** Lists workbook files under the base directory, relative to it. */
  async listWorkbooks(): Promise<string[]> {
    const out: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      for (const ent of await fs.readdir(dir, { withFileTypes: true })) {
        const full = path.join(dir, ent.name);
        if (ent.isDirectory()) await walk(full);
        else if (/\.xlsx$/i.test(ent.name)) out.push(path.relative(this.baseDir, full).split(path.sep).join('/'));
      }
    };
    try {
      await walk(this.baseDir);
    } catch (e) {
      if (errnoOf(e) !== 'ENOENT') throw e;
    }
    return out.sort();
  }
}
