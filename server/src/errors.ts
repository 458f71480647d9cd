import type { ErrorCode, CellValue } from './types.js';

export const ERR = {
  DIV0: '#DIV/0!',
  VALUE: '#VALUE!',
  NAME: '#NAME?',
  NUM: '#NUM!',
  REF: '#REF!',
  ERROR: '#ERROR!'
} as const satisfies Record<string, ErrorCode>;

export const ERROR_CODES: readonly ErrorCode[] = Object.values(ERR);

export function isErrorCode(v: unknown): v is ErrorCode {
  return typeof v === 'string' && (ERROR_CODES as readonly string[]).includes(v);
}

export function errorValue(code: ErrorCode): CellValue {
  return { kind: 'error', code };
}

export const messageOf = (e: unknown) => (e instanceof Error ? e.message : String(e));

/** The `code` of a Node system error such as `ENOENT`. */
export function errnoOf(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

/** Base of every error the engine reports to a host. */
export abstract class CalculationError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  details(): Record<string, unknown> {
    return {};
  }
}

export type AddressErrorKind = 'malformed' | 'out_of_bounds';

export class AddressError extends CalculationError {
  readonly code = 'ADDRESS_ERROR';

  constructor(readonly kind: AddressErrorKind, readonly text: string, message?: string) {
    super(message ?? (kind === 'malformed' ? `Malformed cell address: '${text}'` : `Cell address out of bounds: ${text}`));
  }

  details() { return { kind: this.kind, address: this.text }; }
}

export class ConfigError extends CalculationError {
  readonly code = 'CONFIG_ERROR';

  constructor(readonly calculator: string, readonly reason: string, options?: { cause?: unknown }) {
    super(`Invalid calculator '${calculator}': ${reason}`, options);
  }

  details() { return { calculator: this.calculator, reason: this.reason }; }
}

export class NotFoundError extends CalculationError {
  readonly code = 'NOT_FOUND';

  constructor(readonly calculator: string, readonly available: string[]) {
    super(`Calculator '${calculator}' not found`);
  }

  details() { return { calculator: this.calculator, available: this.available }; }
}

export class NotExecutableError extends CalculationError {
  readonly code = 'NOT_EXECUTABLE';

  constructor(readonly calculator: string) {
    super(`Calculator '${calculator}' is a template with no backing workbook`);
  }

  details() { return { calculator: this.calculator }; }
}

export class UnknownInputError extends CalculationError {
  readonly code = 'UNKNOWN_INPUT';

  constructor(readonly keys: string[]) {
    super(`Unknown input(s): ${keys.join(', ')}`);
  }

  details() { return { keys: this.keys }; }
}

export class MissingInputError extends CalculationError {
  readonly code = 'MISSING_INPUT';

  constructor(readonly keys: string[]) {
    super(`Missing required input(s): ${keys.join(', ')}`);
  }

  details() { return { keys: this.keys }; }
}

export class InvalidInputError extends CalculationError {
  readonly code = 'INVALID_INPUT';

  constructor(readonly keys: string[]) {
    super(`Input(s) must be a number, string, boolean or null: ${keys.join(', ')}`);
  }

  details() { return { keys: this.keys }; }
}

export type InputViolation = UnknownInputError | MissingInputError | InvalidInputError;

/** Every contract violation of one call, reported together. */
export class InputContractError extends CalculationError {
  readonly code = 'INPUT_CONTRACT';

  constructor(readonly calculator: string, readonly violations: InputViolation[]) {
    super(violations.map(v => v.message).join('; '));
  }

  get unknownKeys(): string[] {
    return this.violations.flatMap(v => (v instanceof UnknownInputError ? v.keys : []));
  }

  get missingKeys(): string[] {
    return this.violations.flatMap(v => (v instanceof MissingInputError ? v.keys : []));
  }

  details() {
    return {
      calculator: this.calculator,
      violations: this.violations.map(v => ({ code: v.code, keys: v.keys, message: v.message }))
    };
  }
}

export class ImmutableCellError extends CalculationError {
  readonly code = 'IMMUTABLE_CELL';

  constructor(readonly cell: string) {
    super(`Cell ${cell} holds a formula and cannot be written`);
  }

  details() { return { cell: this.cell }; }
}

export class CircularReferenceError extends CalculationError {
  readonly code = 'CIRCULAR_REFERENCE';

  constructor(readonly cells: string[]) {
    super(`Circular reference: ${[...cells, cells[0]].join(' -> ')}`);
  }

  details() { return { cells: this.cells }; }
}

export type FormulaErrorKind = 'syntax' | 'unsupported';

export class FormulaError extends CalculationError {
  readonly code = 'FORMULA_ERROR';

  constructor(readonly kind: FormulaErrorKind, message: string, readonly token?: string) {
    super(message);
  }

  /** Marker a cell shows when its formula cannot be parsed. */
  get marker(): ErrorCode {
    return this.kind === 'unsupported' ? ERR.NAME : ERR.ERROR;
  }

  details() { return { kind: this.kind, token: this.token ?? null }; }
}

export class LockTimeoutError extends CalculationError {
  readonly code = 'LOCK_TIMEOUT';

  constructor(readonly workbookId: string, readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for workbook '${workbookId}'`);
  }

  details() { return { workbookId: this.workbookId, timeoutMs: this.timeoutMs }; }
}

export class CancelledError extends CalculationError {
  readonly code = 'CANCELLED';

  constructor(readonly workbookId: string) {
    super(`Calculation cancelled while waiting for workbook '${workbookId}'`);
  }

  details() { return { workbookId: this.workbookId }; }
}

export type BackendFailure = 'transport' | 'auth' | 'not_found';

export class BackendUnavailableError extends CalculationError {
  readonly code = 'BACKEND_UNAVAILABLE';

  constructor(
    readonly workbookId: string,
    readonly reason: BackendFailure,
    message: string,
    readonly attempts = 1,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.reason === 'transport';
  }

  details() { return { workbookId: this.workbookId, reason: this.reason, attempts: this.attempts }; }
}

export type ErrorBody = {
  ok: false;
  error: { code: string; message: string } & Record<string, unknown>;
};

export function toErrorBody(e: unknown): ErrorBody {
  if (e instanceof CalculationError) {
    return { ok: false, error: { ...e.details(), code: e.code, message: e.message } };
  }
  return { ok: false, error: { code: 'INTERNAL', message: messageOf(e) } };
}
