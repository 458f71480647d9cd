import { FormulaError } from './errors.js';

/**
 * The closed set of functions a formula may call. Adding one means extending
 * this union, its arity entry and the evaluator's switch.
 */
export type FunctionName = 'IF' | 'SQRT' | 'MIN' | 'MAX' | 'SUM' | 'ABS' | 'PI';

type Arity = { min: number; max: number };

const ARITY: Record<FunctionName, Arity> = {
  IF: { min: 2, max: 3 },
  SQRT: { min: 1, max: 1 },
  MIN: { min: 1, max: 255 },
  MAX: { min: 1, max: 255 },
  SUM: { min: 1, max: 255 },
  ABS: { min: 1, max: 1 },
  PI: { min: 0, max: 0 }
};

function isFunctionName(id: string): id is FunctionName {
  return Object.prototype.hasOwnProperty.call(ARITY, id);
}

export function resolveFunction(id: string, argc: number): FunctionName {
  if (!isFunctionName(id)) throw new FormulaError('unsupported', `Unsupported function ${id}`, id);
  const { min, max } = ARITY[id];
  if (argc < min || argc > max) {
    const expected = min === max ? `${min}` : max === 255 ? `at least ${min}` : `${min} to ${max}`;
    throw new FormulaError('unsupported', `${id} expects ${expected} argument(s), got ${argc}`, id);
  }
  return id;
}

/** Functions whose arguments may be ranges. */
export function acceptsRanges(fn: FunctionName): boolean {
  return fn === 'MIN' || fn === 'MAX' || fn === 'SUM';
}
