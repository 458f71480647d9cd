import { describe, expect, it } from 'vitest';

import { parseAddress } from '../address.js';
import { BackendUnavailableError } from '../errors.js';
import { SheetsApiWorkbookStore, rawToValue, staticToken, valueToRaw } from './sheetsApiStore.js';
import type { StoreChange } from './store.js';

type Call = { method: string; url: string; auth: string | null; body: string | null };
type Reply = (call: Call) => Response;

const json = (data: unknown, status = 200) => new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });

const BASE = 'https://sheets.test';

/** In-process stand-in for the spreadsheet REST API. */
function fakeSheets() {
  const calls: Call[] = [];
  const state: { formulas: (string | number)[][]; values: (string | number)[][]; override: Reply | null } = {
    formulas: [['Load', 10, '=B1*2']],
    values: [['Load', 10, 20]],
    override: null
  };
  const fetchImpl = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const call: Call = {
      method: init?.method ?? 'GET',
      url: String(input),
      auth: new Headers(init?.headers).get('authorization'),
      body: typeof init?.body === 'string' ? init.body : null
    };
    calls.push(call);
    if (state.override) return state.override(call);
    const url = new URL(call.url);
    if (call.method === 'PUT') return json({ updatedCells: 1 });
    if (url.searchParams.get('fields') === 'sheets.properties') {
      return json({ sheets: [{ properties: { title: 'Calc', gridProperties: { rowCount: 20, columnCount: 10 } } }] });
    }
    if (url.searchParams.get('valueRenderOption') === 'FORMULA') return json({ range: 'Calc!A1:C1', values: state.formulas });
    return json({ range: 'Calc!A1:C1', values: state.values });
  };
  return { calls, state, fetchImpl };
}

function makeStore(api: ReturnType<typeof fakeSheets>, delays: number[] = [], maxRetries = 3) {
  return new SheetsApiWorkbookStore({
    baseUrl: BASE,
    token: staticToken('test-secret'),
    maxRetries,
    retryBaseMs: 200,
    fetchImpl: api.fetchImpl,
    sleep: async ms => { delays.push(ms); }
  });
}

describe('SheetsApiWorkbookStore', () => {
  it('loads grid bounds, formulas and values', async () => {
    const api = fakeSheets();
    const store = makeStore(api);
    const h = await store.open('sheet-1', null);
    expect(h).toEqual({ workbookId: 'sheet-1', sheet: 'Calc', bounds: { start: { column: 1, row: 1 }, end: { column: 10, row: 20 } } });
    expect(await store.readCell(h, parseAddress('B1'))).toEqual({ kind: 'number', value: 10 });
    expect(await store.readFormula(h, parseAddress('C1'))).toBe('=B1*2');
    expect(await store.readCell(h, parseAddress('C1'))).toEqual({ kind: 'number', value: 20 });
    expect(api.calls.every(c => c.auth === 'Bearer test-secret')).toBe(true);
    expect(api.calls[0].url).toBe(`${BASE}/v4/spreadsheets/sheet-1?fields=sheets.properties`);
  });

  it('writes each literal with a PUT', async () => {
    const api = fakeSheets();
    const store = makeStore(api);
    const h = await store.open('sheet-1', 'Calc');
    await store.writeCell(h, parseAddress('B1'), { kind: 'number', value: 25 });
    const put = api.calls[api.calls.length - 1];
    expect(put.method).toBe('PUT');
    expect(put.url).toBe(`${BASE}/v4/spreadsheets/sheet-1/values/Calc!B1?valueInputOption=RAW`);
    expect(JSON.parse(put.body ?? '')).toEqual({ range: 'Calc!B1', majorDimension: 'ROWS', values: [[25]] });
    expect(await store.readCell(h, parseAddress('B1'))).toEqual({ kind: 'number', value: 25 });
  });

  it('leaves the snapshot untouched when a write fails', async () => {
    const api = fakeSheets();
    const store = makeStore(api);
    const h = await store.open('sheet-1', null);
    api.state.override = () => new Response('forbidden', { status: 403 });
    await expect(store.writeCell(h, parseAddress('B1'), { kind: 'number', value: 1 })).rejects.toMatchObject({ reason: 'auth' });
    expect(await store.readCell(h, parseAddress('B1'))).toEqual({ kind: 'number', value: 10 });
  });

  it('retries transient failures with exponential backoff', async () => {
    const api = fakeSheets();
    const delays: number[] = [];
    const store = makeStore(api, delays);
    let failures = 2;
    api.state.override = () => {
      if (failures > 0) { failures--; return new Response('busy', { status: 503 }); }
      api.state.override = null;
      return json({ sheets: [{ properties: { title: 'Calc' } }] });
    };
    const h = await store.open('sheet-1', null);
    expect(h.sheet).toBe('Calc');
    expect(h.bounds).toBeNull();
    expect(delays).toEqual([200, 400]);
  });

  it('gives up after the retry budget with BackendUnavailableError', async () => {
    const api = fakeSheets();
    const delays: number[] = [];
    const store = makeStore(api, delays, 2);
    api.state.override = () => new Response('down', { status: 500 });
    let caught: unknown;
    try {
      await store.open('sheet-1', null);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(BackendUnavailableError);
    expect(caught).toMatchObject({ reason: 'transport', attempts: 3 });
    expect(api.calls).toHaveLength(3);
    expect(delays).toEqual([200, 400]);
  });

  it('treats network errors as transport failures', async () => {
    const api = fakeSheets();
    const store = makeStore(api, [], 1);
    api.state.override = () => { throw new TypeError('fetch failed'); };
    await expect(store.open('sheet-1', null)).rejects.toMatchObject({ reason: 'transport', attempts: 2 });
  });

  it('fails fast on auth errors', async () => {
    const api = fakeSheets();
    const delays: number[] = [];
    const store = makeStore(api, delays);
    api.state.override = () => new Response('unauthorised', { status: 401 });
    await expect(store.open('sheet-1', null)).rejects.toMatchObject({ reason: 'auth', attempts: 1 });
    expect(api.calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('maps 404 to not_found', async () => {
    const api = fakeSheets();
    const store = makeStore(api);
    api.state.override = () => new Response('missing', { status: 404 });
    await expect(store.open('sheet-1', null)).rejects.toMatchObject({ reason: 'not_found' });
  });

  it('announces edits made elsewhere when the sheet is reopened', async () => {
    const api = fakeSheets();
    const store = makeStore(api);
    const changes: StoreChange[] = [];
    store.onChange(c => changes.push(c));

    await store.open('sheet-1', null);
    await store.open('sheet-1', null);
    expect(changes).toEqual([]);

    api.state.formulas = [['Load', 10, '=B1*3']];
    await store.open('sheet-1', null);
    expect(changes).toHaveLength(1);
    expect(changes[0]).toMatchObject({ workbookId: 'sheet-1', sheet: 'Calc', origin: null, kind: 'replace' });
  });
});

describe('raw cell conversion', () => {
  it('maps API values to cell values', () => {
    expect(rawToValue('')).toEqual({ kind: 'empty' });
    expect(rawToValue('#DIV/0!')).toEqual({ kind: 'error', code: '#DIV/0!' });
    expect(rawToValue('PASS')).toEqual({ kind: 'text', value: 'PASS' });
    expect(rawToValue(true)).toEqual({ kind: 'boolean', value: true });
  });

  it('writes blanks as empty strings', () => {
    expect(valueToRaw({ kind: 'empty' })).toBe('');
    expect(valueToRaw({ kind: 'number', value: 3 })).toBe(3);
  });
});
