import { describe, expect, it } from 'vitest';

import { ResultCache, canonicalInputs } from './cache.js';
import type { CalculationResult } from './types.js';

function result(calculator: string): CalculationResult {
  return {
    calculator,
    inputsUsed: {},
    outputs: { x: 1 },
    units: { x: '' },
    failedOutputs: [],
    status: 'success',
    diagnostics: [],
    evaluatedCells: 1,
    cached: false,
    computedAt: 0
  };
}

describe('canonicalInputs', () => {
  it('ignores key order', () => {
    expect(canonicalInputs({ b: 2, a: 1 })).toBe(canonicalInputs({ a: 1, b: 2 }));
    expect(canonicalInputs({ a: 1 })).not.toBe(canonicalInputs({ a: '1' }));
  });
});

describe('ResultCache', () => {
  it('returns a stored result until it expires', () => {
    let now = 1000;
    const cache = new ResultCache({ ttlMs: 500, clock: () => now });
    const key = ResultCache.key('steel_beam', { beam_length: 8 });
    cache.set(key, 'steel_beam.xlsx', result('steel_beam'));
    now = 1499;
    expect(cache.get(key)?.calculator).toBe('steel_beam');
    now = 1500;
    expect(cache.get(key)).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('stores nothing when the TTL is zero', () => {
    const cache = new ResultCache({ ttlMs: 0 });
    cache.set('k', 'wb', result('c'));
    expect(cache.get('k')).toBeNull();
  });

  it('drops only the invalidated workbook', () => {
    const cache = new ResultCache({ ttlMs: 60_000 });
    cache.set('a1', 'wb-a', result('a'));
    cache.set('a2', 'wb-a', result('a'));
    cache.set('b1', 'wb-b', result('b'));
    expect(cache.invalidateWorkbook('wb-a')).toBe(2);
    expect(cache.get('a1')).toBeNull();
    expect(cache.get('b1')?.calculator).toBe('b');
  });

  it('can spare one calculator when invalidating', () => {
    const cache = new ResultCache({ ttlMs: 60_000 });
    cache.set('a1', 'wb', result('a'));
    cache.set('b1', 'wb', result('b'));
    expect(cache.invalidateWorkbook('wb', 'a')).toBe(1);
    expect(cache.get('a1')?.calculator).toBe('a');
    expect(cache.get('b1')).toBeNull();
  });

  it('hands out copies of stored results', () => {
    const cache = new ResultCache({ ttlMs: 60_000 });
    const stored = result('a');
    cache.set('k', 'wb', stored);
    stored.outputs.x = 'changed';

    const first = cache.get('k');
    if (!first) throw new Error('expected a hit');
    expect(first.outputs).toEqual({ x: 1 });
    first.outputs.x = 99;
    first.failedOutputs.push('x');
    expect(cache.get('k')).toMatchObject({ outputs: { x: 1 }, failedOutputs: [] });
  });

  it('evicts the oldest entry when full', () => {
    const cache = new ResultCache({ ttlMs: 60_000, maxEntries: 2 });
    cache.set('one', 'wb', result('1'));
    cache.set('two', 'wb', result('2'));
    cache.set('three', 'wb', result('3'));
    expect(cache.get('one')).toBeNull();
    expect(cache.size).toBe(2);
  });

  it('keys by calculator as well as inputs', () => {
    expect(ResultCache.key('a', { x: 1 })).not.toBe(ResultCache.key('b', { x: 1 }));
  });
});
