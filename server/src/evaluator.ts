import { expandRange } from './address.js';
import { ERR, errorValue } from './errors.js';
import type { Expr } from './parser.js';
import type { CompareOp } from './tokenizer.js';
import type { CellAddress, CellValue } from './types.js';

export type CellLookup = (address: CellAddress) => CellValue;

type ErrorValue = Extract<CellValue, { kind: 'error' }>;

const num = (value: number): CellValue => (Number.isFinite(value) ? { kind: 'number', value } : errorValue(ERR.NUM));

function toNumber(v: CellValue): number | ErrorValue {
  switch (v.kind) {
    case 'number': return v.value;
    case 'boolean': return v.value ? 1 : 0;
    case 'empty': return 0;
    case 'error': return v;
    case 'text': {
      const t = v.value.trim();
      const n = t === '' ? NaN : Number(t);
      return Number.isFinite(n) ? n : { kind: 'error', code: ERR.VALUE };
    }
  }
}

function toBoolean(v: CellValue): boolean | ErrorValue {
  switch (v.kind) {
    case 'boolean': return v.value;
    case 'number': return v.value !== 0;
    case 'empty': return false;
    case 'error': return v;
    case 'text': {
      const t = v.value.trim().toUpperCase();
      if (t === 'TRUE') return true;
      if (t === 'FALSE') return false;
      return { kind: 'error', code: ERR.VALUE };
    }
  }
}

const KIND_ORDER = { number: 0, text: 1, boolean: 2 } as const;

function compareValues(l: CellValue, r: CellValue): number | ErrorValue {
  if (l.kind === 'error') return l;
  if (r.kind === 'error') return r;
  // An empty cell takes the type of the other side
  const a: CellValue = l.kind === 'empty' ? blankLike(r) : l;
  const b: CellValue = r.kind === 'empty' ? blankLike(l) : r;
  if (a.kind === 'number' && b.kind === 'number') return Math.sign(a.value - b.value);
  if (a.kind === 'text' && b.kind === 'text') {
    const x = a.value.toLowerCase(), y = b.value.toLowerCase();
    return x < y ? -1 : x > y ? 1 : 0;
  }
  if (a.kind === 'boolean' && b.kind === 'boolean') return Number(a.value) - Number(b.value);
  if (a.kind === 'empty' || b.kind === 'empty' || a.kind === 'error' || b.kind === 'error') return 0;
  return Math.sign(KIND_ORDER[a.kind] - KIND_ORDER[b.kind]);
}

function blankLike(other: CellValue): CellValue {
  switch (other.kind) {
    case 'text': return { kind: 'text', value: '' };
    case 'boolean': return { kind: 'boolean', value: false };
    default: return { kind: 'number', value: 0 };
  }
}

function applyCompare(op: CompareOp, c: number): boolean {
  switch (op) {
    case '=': return c === 0;
    case '<>': return c !== 0;
    case '<': return c < 0;
    case '<=': return c <= 0;
    case '>': return c > 0;
    case '>=': return c >= 0;
  }
}

/**
 * Evaluates a parsed formula against already-computed cell values. Pure: the
 * only cells it sees are the ones `lookup` returns.
 */
export function evaluate(expr: Expr, lookup: CellLookup): CellValue {
  function numericArgs(args: Expr[]): number[] | ErrorValue {
    const nums: number[] = [];
    for (const a of args) {
      if (a.type === 'range') {
        // Inside a range only number cells count
        for (const addr of expandRange(a.range)) {
          const v = lookup(addr);
          if (v.kind === 'error') return v;
          if (v.kind === 'number') nums.push(v.value);
        }
        continue;
      }
      const n = toNumber(evalNode(a));
      if (typeof n !== 'number') return n;
      nums.push(n);
    }
    return nums;
  }

  function evalNode(n: Expr): CellValue {
    switch (n.type) {
      case 'num': return num(n.value);
      case 'str': return { kind: 'text', value: n.value };
      case 'bool': return { kind: 'boolean', value: n.value };
      case 'ref': return lookup(n.address);
      case 'range': return errorValue(ERR.VALUE);
      case 'neg': {
        const v = toNumber(evalNode(n.operand));
        return typeof v === 'number' ? num(-v) : v;
      }
      case 'bin': {
        const l = toNumber(evalNode(n.left));
        if (typeof l !== 'number') return l;
        const r = toNumber(evalNode(n.right));
        if (typeof r !== 'number') return r;
        switch (n.op) {
          case '+': return num(l + r);
          case '-': return num(l - r);
          case '*': return num(l * r);
          case '/': return r === 0 ? errorValue(ERR.DIV0) : num(l / r);
          case '^': return l === 0 && r < 0 ? errorValue(ERR.DIV0) : num(Math.pow(l, r));
        }
      }
      case 'cmp': {
        const c = compareValues(evalNode(n.left), evalNode(n.right));
        return typeof c === 'number' ? { kind: 'boolean', value: applyCompare(n.op, c) } : c;
      }
      case 'call': {
        switch (n.name) {
          case 'IF': {
            const cond = toBoolean(evalNode(n.args[0]));
            if (typeof cond !== 'boolean') return cond;
            if (cond) return evalNode(n.args[1]);
            return n.args.length > 2 ? evalNode(n.args[2]) : { kind: 'boolean', value: false };
          }
          case 'SQRT': {
            const x = toNumber(evalNode(n.args[0]));
            if (typeof x !== 'number') return x;
            return x < 0 ? errorValue(ERR.NUM) : num(Math.sqrt(x));
          }
          case 'ABS': {
            const x = toNumber(evalNode(n.args[0]));
            return typeof x === 'number' ? num(Math.abs(x)) : x;
          }
          case 'PI': return num(Math.PI);
          case 'MIN': case 'MAX': case 'SUM': {
            const nums = numericArgs(n.args);
            if (!Array.isArray(nums)) return nums;
            if (n.name === 'SUM') return num(nums.reduce((a, b) => a + b, 0));
            if (nums.length === 0) return num(0);
            return num(n.name === 'MIN' ? Math.min(...nums) : Math.max(...nums));
          }
        }
      }
    }
  }

  return evalNode(expr);
}
