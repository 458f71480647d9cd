import type { Logger } from 'pino';
import { z } from 'zod';

import { formatAddress } from '../address.js';
import { BackendUnavailableError, ERR, isErrorCode } from '../errors.js';
import { SheetModel } from '../sheet.js';
import type { Bounds, CellAddress, CellContent, CellValue, WorkbookHandle } from '../types.js';
import { withRetry } from './retry.js';
import { GridStore } from './store.js';

export type AccessTokenProvider = () => Promise<string>;

export const staticToken = (token: string): AccessTokenProvider => async () => token;

export type SheetsApiStoreOptions = {
  baseUrl?: string;
  token: AccessTokenProvider;
  maxRetries?: number;
  retryBaseMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

type RawCell = string | number | boolean | null | undefined;

const RawCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]).optional();

const SpreadsheetMeta = z.object({
  sheets: z.array(z.object({
    properties: z.object({
      title: z.string(),
      gridProperties: z.object({ rowCount: z.number().optional(), columnCount: z.number().optional() }).optional()
    })
  })).optional()
});

const ValueRange = z.object({
  range: z.string().optional(),
  values: z.array(z.array(RawCellSchema)).optional()
});

export function rawToValue(raw: RawCell): CellValue {
  if (raw === null || raw === undefined || raw === '') return { kind: 'empty' };
  if (typeof raw === 'number') return { kind: 'number', value: raw };
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw };
  if (isErrorCode(raw)) return { kind: 'error', code: raw };
  if (raw === '#N/A') return { kind: 'error', code: ERR.VALUE };
  return { kind: 'text', value: raw };
}

export function valueToRaw(v: CellValue): RawCell {
  switch (v.kind) {
    case 'number': case 'text': case 'boolean': return v.value;
    case 'error': return v.code;
    case 'empty': return '';
  }
}

function quoteSheet(sheet: string): string {
  return /^[A-Za-z0-9_]+$/.test(sheet) ? sheet : `'${sheet.replace(/'/g, "''")}'`;
}

/**
 * Remote spreadsheet over the Sheets v4 REST API. `open` pulls a fresh
 * snapshot (formulas and values) of the sheet; each literal write is a PUT and
 * durable on return. The provider recalculates its own formula cells, so
 * computed values stay in the local snapshot.
 */
export class SheetsApiWorkbookStore extends GridStore {
  readonly kind = 'remote' as const;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: SheetsApiStoreOptions) {
    super();
    this.baseUrl = (opts.baseUrl ?? 'https://sheets.googleapis.com').replace(/\/+$/, '');
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private async call<T>(workbookId: string, label: string, pathAndQuery: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, init: RequestInit = {}): Promise<T> {
    return withRetry<T>(label, async () => {
      const token = await this.opts.token();
      let res: Response;
      try {
        res = await this.fetchImpl(`${this.baseUrl}/v4/spreadsheets/${encodeURIComponent(workbookId)}${pathAndQuery}`, {
          ...init,
          headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${token}` }
        });
      } catch (e) {
        throw new BackendUnavailableError(workbookId, 'transport', `Could not reach spreadsheet API – ${String(e)}`, 1, { cause: e });
      }
      if (res.ok) {
        const parsed = schema.safeParse(await res.json());
        if (!parsed.success) throw new BackendUnavailableError(workbookId, 'transport', `${label}: unexpected response shape`, 1, { cause: parsed.error });
        return parsed.data;
      }
      const body = await res.text().catch(() => '');
      const detail = `${label} ${res.status}${body ? ` – ${body.slice(0, 200)}` : ''}`;
      if (res.status === 401 || res.status === 403) throw new BackendUnavailableError(workbookId, 'auth', detail);
      if (res.status === 404) throw new BackendUnavailableError(workbookId, 'not_found', detail);
      if (res.status === 429 || res.status >= 500) throw new BackendUnavailableError(workbookId, 'transport', detail);
      throw new BackendUnavailableError(workbookId, 'not_found', detail);
    }, {
      maxRetries: this.opts.maxRetries ?? 3,
      baseDelayMs: this.opts.retryBaseMs ?? 200,
      sleep: this.opts.sleep,
      logger: this.opts.logger
    });
  }

  protected async load(workbookId: string, sheet: string | null) {
    const meta = await this.call(workbookId, 'metadata', '?fields=sheets.properties', SpreadsheetMeta);
    const props = meta.sheets?.map(s => s.properties) ?? [];
    const target = sheet ? props.find(p => p.title === sheet) : props[0];
    if (!target) throw new BackendUnavailableError(workbookId, 'not_found', `Sheet not found in '${workbookId}': ${sheet ?? '(first)'}`);

    const range = encodeURIComponent(quoteSheet(target.title));
    const [formulas, values] = await Promise.all([
      this.call(workbookId, 'values', `/values/${range}?valueRenderOption=FORMULA`, ValueRange),
      this.call(workbookId, 'values', `/values/${range}?valueRenderOption=UNFORMATTED_VALUE`, ValueRange)
    ]);

    const model = new SheetModel(workbookId, [target.title]);
    (formulas.values ?? []).forEach((row, r) => row.forEach((raw, c) => {
      const a: CellAddress = { column: c + 1, row: r + 1 };
      const content: CellContent = typeof raw === 'string' && raw.startsWith('=') ? { kind: 'formula', source: raw } : rawToValue(raw);
      if (content.kind === 'empty') return;
      model.setContent(target.title, a, content);
      if (content.kind === 'formula') model.setComputed(target.title, a, rawToValue(values.values?.[r]?.[c]));
    }));
    const prev = this.models.get(workbookId);
    this.models.set(workbookId, model);
    if (prev?.hasSheet(target.title) && prev.fingerprint(target.title) !== model.fingerprint(target.title)) {
      this.opts.logger?.info({ workbookId, sheet: target.title }, 'remote sheet edited since last open');
      this.emit({ workbookId, sheet: target.title, origin: null, kind: 'replace', revision: model.revision });
    }

    const grid = target.gridProperties;
    const bounds: Bounds | null = grid?.rowCount && grid.columnCount
      ? { start: { column: 1, row: 1 }, end: { column: grid.columnCount, row: grid.rowCount } }
      : null;
    return { model, bounds };
  }

  protected async persistWrite(h: WorkbookHandle, a: CellAddress, value: CellValue): Promise<void> {
    const range = `${quoteSheet(h.sheet)}!${formatAddress(a)}`;
    await this.call(h.workbookId, 'update', `/values/${encodeURIComponent(range)}?valueInputOption=RAW`, z.unknown(), {
      method: 'PUT',
      body: JSON.stringify({ range, majorDimension: 'ROWS', values: [[valueToRaw(value)]] })
    });
  }
}
