import { expandRange, formatAddress, rangeContains } from './address.js';
import { CircularReferenceError, ERR, FormulaError } from './errors.js';
import { referencesOf, type Expr } from './parser.js';
import type { Bounds, CellAddress, ErrorCode } from './types.js';

export type FormulaProblem = { code: ErrorCode; message: string };

export type FormulaNode = {
  key: string;
  address: CellAddress;
  source: string;
  /** null when the formula could not be parsed; see `problem`. */
  expr: Expr | null;
  problem: FormulaProblem | null;
  deps: string[];
};

export type FormulaGraph = {
  /** Formula cells, in discovery order. */
  nodes: Map<string, FormulaNode>;
  /** Literal cells some formula reads. */
  leaves: Map<string, CellAddress>;
};

export type CollectOptions = {
  readFormula: (address: CellAddress) => Promise<string | null>;
  parse: (source: string) => Expr;
  bounds?: Bounds | null;
};

/**
 * Walks from `roots` through every formula they reach, reading and parsing each
 * one once. Cells no root reaches are never touched.
 */
export async function collectFormulaCells(roots: CellAddress[], opts: CollectOptions): Promise<FormulaGraph> {
  const nodes = new Map<string, FormulaNode>();
  const leaves = new Map<string, CellAddress>();
  const seen = new Set<string>();
  const queue: CellAddress[] = [...roots];

  while (queue.length) {
    const address = queue.shift();
    if (!address) break;
    const key = formatAddress(address);
    if (seen.has(key)) continue;
    seen.add(key);

    const source = await opts.readFormula(address);
    if (source === null) { leaves.set(key, address); continue; }

    const node: FormulaNode = { key, address, source, expr: null, problem: null, deps: [] };
    nodes.set(key, node);
    try {
      node.expr = opts.parse(source);
    } catch (e) {
      if (!(e instanceof FormulaError)) throw e;
      node.problem = { code: e.marker, message: e.message };
      continue;
    }

    const refs = referencesOf(node.expr);
    const deps = [...refs.cells, ...refs.ranges.flatMap(expandRange)];
    const outside = opts.bounds ? deps.find(d => opts.bounds && !rangeContains(opts.bounds, d)) : undefined;
    if (outside) {
      node.expr = null;
      node.problem = { code: ERR.REF, message: `Reference ${formatAddress(outside)} lies outside the sheet` };
      continue;
    }
    const depKeys = new Set<string>();
    for (const d of deps) {
      const k = formatAddress(d);
      if (depKeys.has(k)) continue;
      depKeys.add(k);
      queue.push(d);
    }
    node.deps = [...depKeys];
  }
  return { nodes, leaves };
}

/**
 * Depth-first post-order over the formula cells reachable from `roots`: every
 * cell comes after all the cells it reads. Throws `CircularReferenceError`
 * with the cycle in path order when a node is re-entered while still on the path.
 */
export function evaluationOrder(graph: FormulaGraph, roots: string[]): string[] {
  const state = new Map<string, 'active' | 'done'>();
  const order: string[] = [];

  for (const root of roots) {
    if (!graph.nodes.has(root) || state.has(root)) continue;
    const stack: { key: string; next: number }[] = [{ key: root, next: 0 }];
    state.set(root, 'active');

    while (stack.length) {
      const top = stack[stack.length - 1];
      const deps = graph.nodes.get(top.key)?.deps ?? [];
      if (top.next < deps.length) {
        const dep = deps[top.next++];
        if (!graph.nodes.has(dep)) continue;
        const s = state.get(dep);
        if (s === 'done') continue;
        if (s === 'active') {
          const from = stack.findIndex(f => f.key === dep);
          throw new CircularReferenceError(stack.slice(from).map(f => f.key));
        }
        state.set(dep, 'active');
        stack.push({ key: dep, next: 0 });
      } else {
        state.set(top.key, 'done');
        order.push(top.key);
        stack.pop();
      }
    }
  }
  return order;
}
