import type { CalculationResult, Scalar } from './types.js';

type Entry = {
  workbookId: string;
  result: CalculationResult;
  expiresAt: number;
};

export type ResultCacheOptions = {
  ttlMs: number;
  maxEntries?: number;
  clock?: () => number;
};

/** Sorted-key JSON, so `{a, b}` and `{b, a}` share a key. */
export function canonicalInputs(inputs: Record<string, Scalar>): string {
  const keys = Object.keys(inputs).sort();
  return JSON.stringify(keys.map(k => [k, inputs[k]]));
}

/**
 * Successful results keyed by calculator and canonical inputs. Entries die on
 * TTL expiry or when their workbook is invalidated. Results are copied in and
 * out, so callers never share an entry's arrays or records.
 */
export class ResultCache {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: () => number;

  constructor(opts: ResultCacheOptions) {
    this.ttlMs = opts.ttlMs;
    this.maxEntries = opts.maxEntries ?? 1000;
    this.clock = opts.clock ?? (() => Date.now());
  }

  static key(calculator: string, inputs: Record<string, Scalar>): string {
    return `${calculator}\u0000${canonicalInputs(inputs)}`;
  }

  get(key: string): CalculationResult | null {
    const e = this.entries.get(key);
    if (!e) return null;
    if (e.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return null;
    }
    return structuredClone(e.result);
  }

  set(key: string, workbookId: string, result: CalculationResult): void {
    if (this.ttlMs <= 0) return;
    this.entries.delete(key);
    if (this.entries.size >= this.maxEntries) {
      // Maps iterate in insertion order; drop the oldest
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { workbookId, result: structuredClone(result), expiresAt: this.clock() + this.ttlMs });
  }

  /** Drops the workbook's entries, except those of calculator `keep` when given. */
  invalidateWorkbook(workbookId: string, keep?: string): number {
    let n = 0;
    for (const [key, e] of this.entries) {
      if (e.workbookId === workbookId && e.result.calculator !== keep) { this.entries.delete(key); n++; }
    }
    return n;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
