import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import * as XLSX from 'xlsx';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EXCEL_BOUNDS, parseAddress } from '../address.js';
import { BackendUnavailableError } from '../errors.js';
import type { StoreChange } from './store.js';
import { XlsxWorkbookStore, cellObjectToValue, valueToCellObject } from './xlsxStore.js';

function bookBytes(load: number): Buffer {
  const ws = XLSX.utils.aoa_to_sheet([['Load', load], ['Span', 6]]);
  ws['C1'] = { t: 'n', f: 'B1*B2' };
  ws['!ref'] = 'A1:C2';
  const book = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(book, ws, 'Calc');
  return XLSX.write(book, { type: 'buffer', bookType: 'xlsx' });
}

describe('XlsxWorkbookStore', () => {
  let dir: string;
  let store: XlsxWorkbookStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'workbooks-'));
    await fs.writeFile(path.join(dir, 'beam.xlsx'), bookBytes(10));
    store = new XlsxWorkbookStore({ baseDir: dir });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('opens a file with the Excel grid as bounds', async () => {
    const h = await store.open('beam.xlsx', null);
    expect(h).toEqual({ workbookId: 'beam.xlsx', sheet: 'Calc', bounds: EXCEL_BOUNDS });
    expect(await store.readCell(h, parseAddress('B1'))).toEqual({ kind: 'number', value: 10 });
    expect(await store.readCell(h, parseAddress('A2'))).toEqual({ kind: 'text', value: 'Span' });
    expect(await store.readFormula(h, parseAddress('C1'))).toBe('=B1*B2');
  });

  it('writes inputs and computed values back on flush', async () => {
    const h = await store.open('beam.xlsx', 'Calc');
    await store.writeCell(h, parseAddress('B1'), { kind: 'number', value: 20 });
    await store.writeComputed(h, parseAddress('C1'), { kind: 'number', value: 120 });
    await store.flush(h);

    const book = XLSX.read(await fs.readFile(path.join(dir, 'beam.xlsx')), { type: 'buffer', cellFormula: true });
    const ws = book.Sheets.Calc;
    expect(ws.B1.v).toBe(20);
    expect(ws.C1.f).toBe('B1*B2');
    expect(ws.C1.v).toBe(120);
  });

  it('replaces the file in one step and leaves no temporary file behind', async () => {
    const h = await store.open('beam.xlsx', null);
    await store.writeCell(h, parseAddress('B1'), { kind: 'number', value: 30 });
    await store.flush(h);
    expect(await fs.readdir(dir)).toEqual(['beam.xlsx']);
  });

  it('reports a failed write as an unavailable backend', async () => {
    const h = await store.open('beam.xlsx', null);
    await fs.rm(path.join(dir, 'beam.xlsx'));
    await fs.mkdir(path.join(dir, 'beam.xlsx', 'locked'), { recursive: true });

    let caught: unknown;
    try {
      await store.flush(h);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(BackendUnavailableError);
    expect(caught).toMatchObject({ workbookId: 'beam.xlsx', reason: 'transport' });
    expect(await fs.readdir(dir)).toEqual(['beam.xlsx']);
  });

  it('keeps the in-memory copy between opens', async () => {
    const h = await store.open('beam.xlsx', null);
    await store.writeCell(h, parseAddress('B2'), { kind: 'number', value: 8 });
    const again = await store.open('beam.xlsx', null);
    expect(await store.readCell(again, parseAddress('B2'))).toEqual({ kind: 'number', value: 8 });
  });

  it('reloads a file changed on disk and reports it as an outside write', async () => {
    await store.open('beam.xlsx', null);
    const changes: StoreChange[] = [];
    store.onChange(c => changes.push(c));

    const file = path.join(dir, 'beam.xlsx');
    await fs.writeFile(file, bookBytes(99));
    const later = new Date(Date.now() + 60_000);
    await fs.utimes(file, later, later);

    const h = await store.open('beam.xlsx', null);
    expect(await store.readCell(h, parseAddress('B1'))).toEqual({ kind: 'number', value: 99 });
    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({ workbookId: 'beam.xlsx', kind: 'replace', origin: null });
  });

  it('installs an uploaded file and announces it', async () => {
    await store.open('beam.xlsx', null);
    const changes: StoreChange[] = [];
    store.onChange(c => changes.push(c));

    await store.replaceFile('beam.xlsx', bookBytes(42));
    const h = await store.open('beam.xlsx', null);
    expect(await store.readCell(h, parseAddress('B1'))).toEqual({ kind: 'number', value: 42 });
    expect(changes.map(c => c.kind)).toEqual(['replace']);
  });

  it('rejects missing files and paths outside the base directory', async () => {
    await expect(store.open('missing.xlsx', null)).rejects.toMatchObject({ reason: 'not_found' });
    await expect(store.open('../beam.xlsx', null)).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  it('lists workbook files relative to the base directory', async () => {
    await fs.mkdir(path.join(dir, 'structural'));
    await fs.writeFile(path.join(dir, 'structural', 'column.xlsx'), bookBytes(1));
    await fs.writeFile(path.join(dir, 'readme.txt'), 'not a workbook');
    expect(await store.listWorkbooks()).toEqual(['beam.xlsx', 'structural/column.xlsx']);
  });
});

describe('cell conversion', () => {
  it('maps error cells through their display text', () => {
    expect(cellObjectToValue({ t: 'e', v: 0x07, w: '#DIV/0!' })).toEqual({ kind: 'error', code: '#DIV/0!' });
    expect(valueToCellObject({ kind: 'error', code: '#DIV/0!' })).toEqual({ t: 'e', v: 0x07, w: '#DIV/0!' });
  });

  it('maps booleans, text and blanks', () => {
    expect(cellObjectToValue({ t: 'b', v: true })).toEqual({ kind: 'boolean', value: true });
    expect(cellObjectToValue({ t: 's', v: 'PASS' })).toEqual({ kind: 'text', value: 'PASS' });
    expect(cellObjectToValue({ t: 'z' })).toEqual({ kind: 'empty' });
  });
});
