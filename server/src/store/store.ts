import { EventEmitter } from 'node:events';
import { assertWithinBounds, formatAddress } from '../address.js';
import { BackendUnavailableError, ImmutableCellError } from '../errors.js';
import { SheetModel } from '../sheet.js';
import type { Bounds, CellAddress, CellRange, CellValue, WorkbookHandle } from '../types.js';

export type StoreChange = {
  workbookId: string;
  sheet: string | null;
  /** Tag passed by the writer; null for writes from outside the engine. */
  origin: string | null;
  kind: 'write' | 'replace';
  revision: number;
};

export type WriteOptions = { origin?: string };

/**
 * Cell I/O over one backend. The engine only ever talks to this interface,
 * whichever backend sits behind it.
 */
export interface WorkbookStore {
  readonly kind: 'file' | 'remote' | 'memory';
  open(workbookId: string, sheet: string | null): Promise<WorkbookHandle>;
  readCell(h: WorkbookHandle, a: CellAddress): Promise<CellValue>;
  readFormula(h: WorkbookHandle, a: CellAddress): Promise<string | null>;
  /** Writes a literal. Rejects formula cells with `ImmutableCellError`. */
  writeCell(h: WorkbookHandle, a: CellAddress, value: CellValue, opts?: WriteOptions): Promise<void>;
  /** Records the value computed for a formula cell. */
  writeComputed(h: WorkbookHandle, a: CellAddress, value: CellValue): Promise<void>;
  readRange(h: WorkbookHandle, r: CellRange): Promise<CellValue[][]>;
  flush(h: WorkbookHandle): Promise<void>;
  revision(workbookId: string): number;
  onChange(listener: (change: StoreChange) => void): () => void;
}

/**
 * Shared implementation over per-workbook `SheetModel`s. Subclasses decide how a
 * model is loaded and how writes become durable.
 */
export abstract class GridStore implements WorkbookStore {
  abstract readonly kind: 'file' | 'remote' | 'memory';
  protected readonly models = new Map<string, SheetModel>();
  private readonly events = new EventEmitter();

  /** Returns the model for a workbook and the bounds it declares. */
  protected abstract load(workbookId: string, sheet: string | null): Promise<{ model: SheetModel; bounds: Bounds | null }>;

  /** Runs before a literal write lands in the model; a throw leaves the model untouched. */
  protected async persistWrite(_h: WorkbookHandle, _a: CellAddress, _value: CellValue): Promise<void> {}

  protected async persistFlush(_h: WorkbookHandle, _model: SheetModel): Promise<void> {}

  async open(workbookId: string, sheet: string | null): Promise<WorkbookHandle> {
    const { model, bounds } = await this.load(workbookId, sheet);
    const name = sheet ?? model.firstSheet;
    if (!name || !model.hasSheet(name)) {
      throw new BackendUnavailableError(workbookId, 'not_found', `Sheet not found in '${workbookId}': ${sheet ?? '(first)'}`);
    }
    return { workbookId, sheet: name, bounds };
  }

  protected model(h: WorkbookHandle): SheetModel {
    const m = this.models.get(h.workbookId);
    if (!m) throw new Error(`Workbook not open: ${h.workbookId}`);
    return m;
  }

  async readCell(h: WorkbookHandle, a: CellAddress): Promise<CellValue> {
    assertWithinBounds(a, h.bounds);
    return this.model(h).getValue(h.sheet, a);
  }

  async readFormula(h: WorkbookHandle, a: CellAddress): Promise<string | null> {
    assertWithinBounds(a, h.bounds);
    return this.model(h).getFormula(h.sheet, a);
  }

  async writeCell(h: WorkbookHandle, a: CellAddress, value: CellValue, opts: WriteOptions = {}): Promise<void> {
    assertWithinBounds(a, h.bounds);
    const m = this.model(h);
    if (m.getFormula(h.sheet, a) !== null) throw new ImmutableCellError(formatAddress(a));
    await this.persistWrite(h, a, value);
    const revision = m.setContent(h.sheet, a, value);
    this.emit({ workbookId: h.workbookId, sheet: h.sheet, origin: opts.origin ?? null, kind: 'write', revision });
  }

  async writeComputed(h: WorkbookHandle, a: CellAddress, value: CellValue): Promise<void> {
    this.model(h).setComputed(h.sheet, a, value);
  }

  async readRange(h: WorkbookHandle, r: CellRange): Promise<CellValue[][]> {
    assertWithinBounds(r.start, h.bounds);
    assertWithinBounds(r.end, h.bounds);
    return this.model(h).readRange(h.sheet, r);
  }

  async flush(h: WorkbookHandle): Promise<void> {
    await this.persistFlush(h, this.model(h));
  }

  revision(workbookId: string): number {
    return this.models.get(workbookId)?.revision ?? 0;
  }

  onChange(listener: (change: StoreChange) => void): () => void {
    this.events.on('change', listener);
    return () => { this.events.off('change', listener); };
  }

  protected emit(change: StoreChange): void {
    this.events.emit('change', change);
  }
}
