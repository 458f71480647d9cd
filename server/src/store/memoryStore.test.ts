import { describe, expect, it } from 'vitest';

import { parseAddress, parseRange } from '../address.js';
import { AddressError, BackendUnavailableError, ImmutableCellError } from '../errors.js';
import { SheetModel } from '../sheet.js';
import { MemoryWorkbookStore } from './memoryStore.js';
import type { StoreChange } from './store.js';

function beamModel(): SheetModel {
  const m = new SheetModel('beam', ['Calc']);
  m.setContent('Calc', parseAddress('B4'), { kind: 'number', value: 6 });
  m.setContent('Calc', parseAddress('D4'), { kind: 'formula', source: '=B5*B4/8' });
  return m;
}

describe('MemoryWorkbookStore', () => {
  it('opens the first sheet when none is named', async () => {
    const store = new MemoryWorkbookStore();
    store.put(beamModel());
    const h = await store.open('beam', null);
    expect(h).toEqual({ workbookId: 'beam', sheet: 'Calc', bounds: null });
  });

  it('reports a missing workbook or sheet as not found', async () => {
    const store = new MemoryWorkbookStore();
    store.put(beamModel());
    await expect(store.open('nope', null)).rejects.toMatchObject({ reason: 'not_found' });
    await expect(store.open('beam', 'Other')).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  it('reads literals, formulas and computed values', async () => {
    const store = new MemoryWorkbookStore();
    store.put(beamModel());
    const h = await store.open('beam', 'Calc');
    expect(await store.readCell(h, parseAddress('B4'))).toEqual({ kind: 'number', value: 6 });
    expect(await store.readFormula(h, parseAddress('D4'))).toBe('=B5*B4/8');
    expect(await store.readFormula(h, parseAddress('B4'))).toBeNull();
    expect(await store.readCell(h, parseAddress('D4'))).toEqual({ kind: 'empty' });

    await store.writeComputed(h, parseAddress('D4'), { kind: 'number', value: 7.5 });
    expect(await store.readCell(h, parseAddress('D4'))).toEqual({ kind: 'number', value: 7.5 });
    expect(await store.readRange(h, parseRange('B4:D4'))).toEqual([[
      { kind: 'number', value: 6 }, { kind: 'empty' }, { kind: 'number', value: 7.5 }
    ]]);
  });

  it('refuses to overwrite a formula cell', async () => {
    const store = new MemoryWorkbookStore();
    store.put(beamModel());
    const h = await store.open('beam', null);
    await expect(store.writeCell(h, parseAddress('D4'), { kind: 'number', value: 1 })).rejects.toBeInstanceOf(ImmutableCellError);
    expect(await store.readFormula(h, parseAddress('D4'))).toBe('=B5*B4/8');
  });

  it('announces writes with their origin and bumps the revision', async () => {
    const store = new MemoryWorkbookStore();
    store.put(beamModel());
    const changes: StoreChange[] = [];
    const off = store.onChange(c => changes.push(c));
    const h = await store.open('beam', null);
    const before = store.revision('beam');

    await store.writeCell(h, parseAddress('B5'), { kind: 'number', value: 10 }, { origin: 'engine-1' });
    await store.writeCell(h, parseAddress('B5'), { kind: 'number', value: 11 });
    expect(changes.map(c => [c.kind, c.origin])).toEqual([['write', 'engine-1'], ['write', null]]);
    expect(store.revision('beam')).toBe(before + 2);

    off();
    await store.writeCell(h, parseAddress('B5'), { kind: 'number', value: 12 });
    expect(changes).toHaveLength(2);
  });

  it('treats replacing a workbook as an outside write', () => {
    const store = new MemoryWorkbookStore();
    const changes: StoreChange[] = [];
    store.onChange(c => changes.push(c));
    store.put(beamModel());
    store.put(beamModel());
    expect(changes).toEqual([{ workbookId: 'beam', sheet: null, origin: null, kind: 'replace', revision: 2 }]);
  });

  it('checks addresses against declared bounds', async () => {
    const store = new MemoryWorkbookStore(parseRange('A1:D10'));
    store.put(beamModel());
    const h = await store.open('beam', null);
    await expect(store.readCell(h, parseAddress('E1'))).rejects.toBeInstanceOf(AddressError);
    await expect(store.writeCell(h, parseAddress('A11'), { kind: 'number', value: 1 })).rejects.toMatchObject({ kind: 'out_of_bounds' });
  });
});
