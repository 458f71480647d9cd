import { AddressError, FormulaError } from './errors.js';
import { makeRange, parseAddress } from './address.js';
import { acceptsRanges, resolveFunction, type FunctionName } from './functions.js';
import { tokenize, type ArithOp, type CompareOp, type Tok } from './tokenizer.js';
import type { CellAddress, CellRange } from './types.js';

export type Expr =
  | { type: 'num'; value: number }
  | { type: 'str'; value: string }
  | { type: 'bool'; value: boolean }
  | { type: 'ref'; address: CellAddress }
  | { type: 'range'; range: CellRange }
  | { type: 'neg'; operand: Expr }
  | { type: 'bin'; op: ArithOp; left: Expr; right: Expr }
  | { type: 'cmp'; op: CompareOp; left: Expr; right: Expr }
  | { type: 'call'; name: FunctionName; args: Expr[] };

const PREC: Record<ArithOp, number> = { '+': 1, '-': 1, '*': 2, '/': 2, '^': 3 };

function describe(tk: Tok): string {
  switch (tk.t) {
    case 'eof': return 'end of formula';
    case 'num': return String(tk.v);
    case 'str': return `"${tk.v}"`;
    case 'id': case 'op': case 'cmp': return tk.v;
    case 'colon': return ':';
    case 'comma': return ',';
    case 'lparen': return '(';
    case 'rparen': return ')';
  }
}

function toAddress(id: string): CellAddress | null {
  try {
    return parseAddress(id);
  } catch (e) {
    if (e instanceof AddressError) return null;
    throw e;
  }
}

/**
 * Parses a formula (leading `=` optional). Throws `FormulaError` with kind
 * `syntax` for malformed input and `unsupported` for unknown functions,
 * wrong argument counts or names that are not cell references.
 */
export function parseFormula(input: string): Expr {
  const src = input.trim();
  const toks = tokenize(src.startsWith('=') ? src.slice(1) : src);
  let pos = 0;
  const peek = () => toks[pos];
  const fail = (tk: Tok): never => { throw new FormulaError('syntax', `Unexpected ${describe(tk)} at ${tk.at}`, describe(tk)); };
  const expect = (t: Tok['t']) => { const tk = toks[pos]; if (tk.t !== t) fail(tk); pos++; return tk; };

  // Comparisons bind loosest and chain left to right
  function parseComparison(): Expr {
    let left = parseArith(1);
    for (let tk = peek(); tk.t === 'cmp'; tk = peek()) {
      pos++;
      left = { type: 'cmp', op: tk.v, left, right: parseArith(1) };
    }
    return left;
  }

  function parseArith(minPrec: number): Expr {
    let left = parseUnary();
    for (let tk = peek(); tk.t === 'op' && PREC[tk.v] >= minPrec; tk = peek()) {
      pos++;
      const right = parseArith(PREC[tk.v] + 1);
      left = { type: 'bin', op: tk.v, left, right };
    }
    return left;
  }

  function parseUnary(): Expr {
    const tk = peek();
    if (tk.t === 'op' && (tk.v === '-' || tk.v === '+')) {
      pos++;
      const operand = parseUnary();
      return tk.v === '-' ? { type: 'neg', operand } : operand;
    }
    return parsePrimary();
  }

  function parseArgs(): Expr[] {
    expect('lparen');
    const args: Expr[] = [];
    if (peek().t !== 'rparen') {
      args.push(parseComparison());
      while (peek().t === 'comma') { pos++; args.push(parseComparison()); }
    }
    expect('rparen');
    return args;
  }

  function parsePrimary(): Expr {
    const tk = peek();
    switch (tk.t) {
      case 'num': pos++; return { type: 'num', value: tk.v };
      case 'str': pos++; return { type: 'str', value: tk.v };
      case 'lparen': {
        pos++;
        const e = parseComparison();
        expect('rparen');
        return e;
      }
      case 'id': {
        pos++;
        if (peek().t === 'lparen') {
          const args = parseArgs();
          const name = resolveFunction(tk.v, args.length);
          if (!acceptsRanges(name)) {
            const bad = args.find(a => a.type === 'range');
            if (bad) throw new FormulaError('unsupported', `${name} does not accept a range argument`, name);
          }
          return { type: 'call', name, args };
        }
        if (tk.v === 'TRUE' || tk.v === 'FALSE') return { type: 'bool', value: tk.v === 'TRUE' };
        const address = toAddress(tk.v);
        if (!address) throw new FormulaError('unsupported', `Unsupported name ${tk.v}`, tk.v);
        if (peek().t === 'colon') {
          pos++;
          const endTok = peek();
          const end = endTok.t === 'id' ? toAddress(endTok.v) : null;
          if (!end) return fail(endTok);
          pos++;
          return { type: 'range', range: makeRange(address, end) };
        }
        return { type: 'ref', address };
      }
      default:
        return fail(tk);
    }
  }

  const expr = parseComparison();
  if (peek().t !== 'eof') fail(peek());
  if (expr.type === 'range') throw new FormulaError('unsupported', 'A range is only allowed as a function argument', ':');
  return expr;
}

export type References = { cells: CellAddress[]; ranges: CellRange[] };

/** Reference-extraction mode: every cell and range the expression reads. */
export function referencesOf(expr: Expr): References {
  const out: References = { cells: [], ranges: [] };
  const walk = (e: Expr): void => {
    switch (e.type) {
      case 'num': case 'str': case 'bool': return;
      case 'ref': out.cells.push(e.address); return;
      case 'range': out.ranges.push(e.range); return;
      case 'neg': walk(e.operand); return;
      case 'bin': case 'cmp': walk(e.left); walk(e.right); return;
      case 'call': e.args.forEach(walk); return;
    }
  };
  walk(expr);
  return out;
}

/** Parses by source text once and reuses the tree afterwards. */
export class FormulaCache {
  private parsed = new Map<string, Expr | FormulaError>();

  constructor(private readonly maxEntries = 10_000) {}

  parse(source: string): Expr {
    let hit = this.parsed.get(source);
    if (hit === undefined) {
      try {
        hit = parseFormula(source);
      } catch (e) {
        if (!(e instanceof FormulaError)) throw e;
        hit = e;
      }
      if (this.parsed.size >= this.maxEntries) this.parsed.clear();
      this.parsed.set(source, hit);
    }
    if (hit instanceof FormulaError) throw hit;
    return hit;
  }

  get size(): number {
    return this.parsed.size;
  }
}
