import type { Logger } from 'pino';

import { assertWithinBounds, formatAddress } from './address.js';
import { ResultCache } from './cache.js';
import {
  ERR, ImmutableCellError, InputContractError, InvalidInputError, MissingInputError,
  NotExecutableError, UnknownInputError, type InputViolation
} from './errors.js';
import { evaluate } from './evaluator.js';
import { collectFormulaCells, evaluationOrder, type FormulaGraph, type FormulaNode } from './graph.js';
import { KeyedMutex } from './lock.js';
import { FormulaCache } from './parser.js';
import { CalculatorRegistry, summarize, type LoadReport } from './registry.js';
import type { WorkbookStore } from './store/store.js';
import type {
  CalculationResult, CalculationStatus, CalculatorConfig, CalculatorSummary, CellValue,
  Diagnostic, ErrorCode, Scalar, WorkbookHandle
} from './types.js';

function uuid() { return Math.random().toString(36).slice(2) + Date.now().toString(36); }

const EMPTY: CellValue = { kind: 'empty' };

const DESCRIBE: Record<ErrorCode, string> = {
  '#DIV/0!': 'Division by zero',
  '#VALUE!': 'Value of the wrong type',
  '#NAME?': 'Unsupported name or function',
  '#NUM!': 'Invalid numeric result',
  '#REF!': 'Invalid cell reference',
  '#ERROR!': 'Formula could not be parsed'
};

function toCellValue(v: Scalar): CellValue {
  if (v === null) return EMPTY;
  if (typeof v === 'number') return { kind: 'number', value: v };
  if (typeof v === 'boolean') return { kind: 'boolean', value: v };
  return { kind: 'text', value: v };
}

function toScalar(v: CellValue): Scalar {
  switch (v.kind) {
    case 'number': case 'text': case 'boolean': return v.value;
    case 'error': return v.code;
    case 'empty': return null;
  }
}

function isScalar(v: unknown): v is Scalar {
  return v === null || typeof v === 'string' || typeof v === 'boolean' || (typeof v === 'number' && Number.isFinite(v));
}

export type EngineOptions = {
  registry: CalculatorRegistry;
  store: WorkbookStore;
  /** Time-to-live of cached successful results; 0 disables caching. */
  cacheTtlMs: number;
  /** Default wait for a busy workbook before `LockTimeoutError`. */
  lockTimeoutMs?: number;
  logger?: Logger;
  clock?: () => number;
};

export type ExecuteOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

/**
 * Runs calculators: resolves the config, writes inputs, evaluates exactly the
 * formulas the outputs need and reads the outputs back. One run at a time per
 * workbook; successful results are cached.
 */
export class CalculationEngine {
  readonly registry: CalculatorRegistry;
  private readonly store: WorkbookStore;
  private readonly origin = `engine-${uuid()}`;
  private readonly locks = new KeyedMutex();
  private readonly cache: ResultCache;
  private readonly formulas = new FormulaCache();
  /** Bumped whenever a workbook is written from outside the engine. */
  private readonly generations = new Map<string, number>();
  private readonly lockTimeoutMs: number | undefined;
  private readonly logger: Logger | undefined;
  private readonly clock: () => number;
  private readonly unsubscribe: () => void;

  constructor(opts: EngineOptions) {
    this.registry = opts.registry;
    this.store = opts.store;
    this.lockTimeoutMs = opts.lockTimeoutMs;
    this.logger = opts.logger;
    this.clock = opts.clock ?? (() => Date.now());
    this.cache = new ResultCache({ ttlMs: opts.cacheTtlMs, clock: this.clock });
    this.unsubscribe = this.store.onChange(change => {
      if (change.origin === this.origin) return;
      this.generations.set(change.workbookId, (this.generations.get(change.workbookId) ?? 0) + 1);
      const dropped = this.cache.invalidateWorkbook(change.workbookId);
      this.logger?.debug({ workbookId: change.workbookId, kind: change.kind, dropped }, 'outside write; cache invalidated');
    });
  }

  list(): CalculatorSummary[] {
    return this.registry.list();
  }

  describe(name: string): CalculatorSummary {
    return summarize(this.registry.get(name));
  }

  /** Swaps in a new set of calculator records and forgets every cached result. */
  reload(records: unknown[]): LoadReport {
    const report = this.registry.loadAll(records);
    this.cache.clear();
    return report;
  }

  get cachedResults(): number {
    return this.cache.size;
  }

  /** Runs `fn` while holding the workbook's calculation lock. */
  withWorkbookLock<T>(workbookId: string, fn: () => Promise<T>, opts: ExecuteOptions = {}): Promise<T> {
    return this.locks.runExclusive(workbookId, fn, { timeoutMs: opts.timeoutMs ?? this.lockTimeoutMs, signal: opts.signal });
  }

  async execute(name: string, inputs: Record<string, unknown>, opts: ExecuteOptions = {}): Promise<CalculationResult> {
    const config = this.registry.get(name);
    if (config.status === 'template_only' || !config.workbookId) throw new NotExecutableError(name);
    const workbookId = config.workbookId;
    const inputsUsed = this.resolveInputs(config, inputs);

    const key = ResultCache.key(name, inputsUsed);
    const hit = this.cache.get(key);
    if (hit) {
      this.logger?.info({ calculator: name, workbookId }, 'calculation served from cache');
      return { ...hit, cached: true, evaluatedCells: 0 };
    }

    const started = this.clock();
    const result = await this.withWorkbookLock(workbookId, async () => {
      const generation = this.generations.get(workbookId) ?? 0;
      const r = await this.run(config, workbookId, inputsUsed);
      // Only cache what no outside write could have raced with
      if (r.status === 'success' && (this.generations.get(workbookId) ?? 0) === generation) this.cache.set(key, workbookId, r);
      return r;
    }, opts);
    this.logger?.info({
      calculator: name, workbookId, status: result.status, evaluatedCells: result.evaluatedCells,
      diagnostics: result.diagnostics.length, ms: this.clock() - started
    }, 'calculation executed');
    return result;
  }

  /** Checks the caller's inputs and fills declared defaults. Throws before any I/O. */
  private resolveInputs(config: CalculatorConfig, inputs: Record<string, unknown>): Record<string, Scalar> {
    const violations: InputViolation[] = [];
    const unknown = Object.keys(inputs).filter(k => !Object.prototype.hasOwnProperty.call(config.inputs, k));
    if (unknown.length) violations.push(new UnknownInputError(unknown));
    const missing = Object.entries(config.inputs).filter(([k, s]) => s.required && inputs[k] === undefined).map(([k]) => k);
    if (missing.length) violations.push(new MissingInputError(missing));
    const invalid = Object.keys(config.inputs).filter(k => inputs[k] !== undefined && !isScalar(inputs[k]));
    if (invalid.length) violations.push(new InvalidInputError(invalid));
    if (violations.length) throw new InputContractError(config.name, violations);

    const used: Record<string, Scalar> = {};
    for (const [k, spec] of Object.entries(config.inputs)) {
      const v = inputs[k];
      used[k] = isScalar(v) ? v : spec.defaultValue;
    }
    return used;
  }

  private async run(config: CalculatorConfig, workbookId: string, inputsUsed: Record<string, Scalar>): Promise<CalculationResult> {
    const h = await this.store.open(workbookId, config.sheet);
    const inputs = Object.entries(config.inputs);
    const outputs = Object.entries(config.outputs);
    for (const [, spec] of [...inputs, ...outputs]) assertWithinBounds(spec.address, h.bounds);

    // Formulas never change by writing inputs, so the graph (and any cycle) is known before the first write
    const outputKeys = outputs.map(([, s]) => formatAddress(s.address));
    const graph = await collectFormulaCells(outputs.map(([, s]) => s.address), {
      readFormula: a => this.store.readFormula(h, a),
      parse: src => this.formulas.parse(src),
      bounds: h.bounds
    });
    const order = evaluationOrder(graph, outputKeys);

    for (const [, spec] of inputs) {
      if ((await this.store.readFormula(h, spec.address)) !== null) throw new ImmutableCellError(formatAddress(spec.address));
    }
    // Other calculators on this workbook may read the cells written below
    const dropped = this.cache.invalidateWorkbook(workbookId, config.name);
    if (dropped) this.logger?.debug({ workbookId, calculator: config.name, dropped }, 'shared workbook written; cache invalidated');
    for (const [k, spec] of inputs) {
      await this.store.writeCell(h, spec.address, toCellValue(inputsUsed[k]), { origin: this.origin });
    }

    const values = new Map<string, CellValue>();
    for (const [key, address] of graph.leaves) values.set(key, await this.store.readCell(h, address));
    const diagnostics = await this.evaluateInOrder(h, graph, order, values);

    const out: Record<string, Scalar> = {};
    const units: Record<string, string> = {};
    const failedOutputs: string[] = [];
    for (const [k, spec] of outputs) {
      const v = await this.store.readCell(h, spec.address);
      out[k] = toScalar(v);
      units[k] = spec.unit;
      if (v.kind === 'error') failedOutputs.push(k);
    }
    await this.store.flush(h);

    const status: CalculationStatus = failedOutputs.length === 0 ? 'success'
      : failedOutputs.length === outputs.length ? 'failure' : 'partial';
    return {
      calculator: config.name,
      inputsUsed,
      outputs: out,
      units,
      failedOutputs,
      status,
      diagnostics,
      evaluatedCells: order.length,
      cached: false,
      computedAt: this.clock()
    };
  }

  private async evaluateInOrder(h: WorkbookHandle, graph: FormulaGraph, order: string[], values: Map<string, CellValue>): Promise<Diagnostic[]> {
    const lookup = (a: { column: number; row: number }) => values.get(formatAddress(a)) ?? EMPTY;
    const diagnostics: Diagnostic[] = [];
    for (const key of order) {
      const node = graph.nodes.get(key);
      if (!node) continue;
      const value: CellValue = node.expr
        ? evaluate(node.expr, lookup)
        : { kind: 'error', code: node.problem?.code ?? ERR.ERROR };
      values.set(key, value);
      await this.store.writeComputed(h, node.address, value);
      if (value.kind === 'error') diagnostics.push({ cell: key, code: value.code, message: this.explain(node, value.code, values) });
    }
    return diagnostics;
  }

  private explain(node: FormulaNode, code: ErrorCode, values: Map<string, CellValue>): string {
    if (node.problem) return node.problem.message;
    const from = node.deps.find(d => {
      const v = values.get(d);
      return v?.kind === 'error' && v.code === code;
    });
    return from ? `${code} propagated from ${from}` : `${DESCRIBE[code]} in ${node.source}`;
  }

  dispose(): void {
    this.unsubscribe();
  }
}
