/** 1-based column/row coordinate. Canonical text form is `B14`. */
export type CellAddress = { column: number; row: number };

/** Inclusive rectangle; `start` is top-left, `end` is bottom-right. */
export type CellRange = { start: CellAddress; end: CellAddress };

export type ErrorCode = '#DIV/0!' | '#VALUE!' | '#NAME?' | '#NUM!' | '#REF!' | '#ERROR!';

export type CellValue =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'error'; code: ErrorCode }
  | { kind: 'empty' };

export type CellContent = CellValue | { kind: 'formula'; source: string };

/** Plain value exchanged with callers. Error markers travel as their text. */
export type Scalar = number | string | boolean | null;

export type Bounds = CellRange;

export type WorkbookHandle = {
  workbookId: string;
  sheet: string;
  /** Grid declared by the backend, if any. */
  bounds: Bounds | null;
};

export type InputSpec = {
  address: CellAddress;
  description: string;
  unit: string;
  required: boolean;
  defaultValue: Scalar;
};

export type OutputSpec = {
  address: CellAddress;
  description: string;
  unit: string;
};

export type CalculatorStatus = 'ready' | 'template_only';

export type CalculatorConfig = {
  name: string;
  title: string;
  description: string;
  standard: string;
  workbookId: string | null;
  sheet: string | null;
  inputs: Readonly<Record<string, InputSpec>>;
  outputs: Readonly<Record<string, OutputSpec>>;
  status: CalculatorStatus;
};

export type Diagnostic = {
  cell: string;
  code: ErrorCode;
  message: string;
};

export type CalculationStatus = 'success' | 'partial' | 'failure';

export type CalculationResult = {
  calculator: string;
  inputsUsed: Record<string, Scalar>;
  outputs: Record<string, Scalar>;
  units: Record<string, string>;
  failedOutputs: string[];
  status: CalculationStatus;
  diagnostics: Diagnostic[];
  /** Number of formula cells evaluated in this run (0 on a cache hit). */
  evaluatedCells: number;
  cached: boolean;
  computedAt: number;
};

export type CalculatorSummary = {
  name: string;
  title: string;
  description: string;
  standard: string;
  status: CalculatorStatus;
  workbookId: string | null;
  inputs: { name: string; cell: string; unit: string; description: string; required: boolean }[];
  outputs: { name: string; cell: string; unit: string; description: string }[];
};
