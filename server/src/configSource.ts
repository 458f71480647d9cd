import { promises as fs } from 'fs';
import path from 'path';

import { ConfigError, errnoOf, messageOf } from './errors.js';

export type SourceReport = {
  records: unknown[];
  /** Files that could not be read or parsed at all. */
  errors: ConfigError[];
};

/**
 * Reads every `*.json` file in `dir` as one calculator record. The file stem is
 * the default name, and `sheet_id` is accepted as the older spelling of
 * `workbook`.
 */
export async function readCalculatorDir(dir: string): Promise<SourceReport> {
  let files: string[];
  try {
    files = (await fs.readdir(dir)).filter(f => f.toLowerCase().endsWith('.json')).sort();
  } catch (e) {
    if (errnoOf(e) === 'ENOENT') return { records: [], errors: [] };
    throw e;
  }

  const records: unknown[] = [];
  const errors: ConfigError[] = [];
  for (const file of files) {
    const stem = path.basename(file, path.extname(file));
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(path.join(dir, file), 'utf8'));
    } catch (e) {
      errors.push(new ConfigError(stem, `${file}: ${messageOf(e)}`, { cause: e }));
      continue;
    }
    records.push(normalizeRecord(stem, raw));
  }
  return { records, errors };
}

export function normalizeRecord(stem: string, raw: unknown): unknown {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) return raw;
  const rec: Record<string, unknown> = { ...raw };
  if (rec.name === undefined) rec.name = stem;
  if (rec.workbook === undefined && 'sheet_id' in rec) {
    rec.workbook = rec.sheet_id;
  }
  delete rec.sheet_id;
  return rec;
}
