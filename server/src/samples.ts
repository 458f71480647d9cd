import { promises as fs } from 'fs';
import path from 'path';
import * as XLSX from 'xlsx';
import { z } from 'zod';

import { parseAddress } from './address.js';
import { SheetModel } from './sheet.js';
import { applyModelToBook } from './store/xlsxStore.js';
import type { CellContent } from './types.js';

const LayoutSchema = z.object({
  sheet: z.string().min(1),
  cells: z.record(z.union([z.string(), z.number(), z.boolean()]))
});

/** One sheet described cell by cell; strings starting with `=` are formulas. */
export type SampleLayout = z.infer<typeof LayoutSchema>;

/** Reads every `<name>.json` layout in `dir`, keyed by name. */
export async function readSampleLayouts(dir: string): Promise<Map<string, SampleLayout>> {
  const out = new Map<string, SampleLayout>();
  const files = (await fs.readdir(dir)).filter(f => f.endsWith('.json')).sort();
  for (const file of files) {
    const raw: unknown = JSON.parse(await fs.readFile(path.join(dir, file), 'utf8'));
    out.set(path.basename(file, '.json'), LayoutSchema.parse(raw));
  }
  return out;
}

function toContent(v: string | number | boolean): CellContent {
  if (typeof v === 'number') return { kind: 'number', value: v };
  if (typeof v === 'boolean') return { kind: 'boolean', value: v };
  return v.startsWith('=') ? { kind: 'formula', source: v } : { kind: 'text', value: v };
}

export function layoutToModel(id: string, layout: SampleLayout): SheetModel {
  const model = new SheetModel(id, [layout.sheet]);
  for (const [a1, v] of Object.entries(layout.cells)) model.setContent(layout.sheet, parseAddress(a1), toContent(v));
  return model;
}

export function layoutToBook(id: string, layout: SampleLayout): XLSX.WorkBook {
  const book = XLSX.utils.book_new();
  applyModelToBook(layoutToModel(id, layout), book);
  return book;
}

/**
 * Writes each layout as `<name>.xlsx` under `dir`. Existing files are left
 * alone unless `overwrite` is set. Returns the files written.
 */
export async function seedWorkbooks(dir: string, layouts: Map<string, SampleLayout>, overwrite = false): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const [name, layout] of layouts) {
    const file = path.join(dir, `${name}.xlsx`);
    if (!overwrite && (await fs.stat(file).then(() => true, () => false))) continue;
    const out: Buffer = XLSX.write(layoutToBook(`${name}.xlsx`, layout), { type: 'buffer', bookType: 'xlsx' });
    await fs.writeFile(file, out);
    written.push(file);
  }
  return written;
}
