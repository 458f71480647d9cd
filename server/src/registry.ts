import { z } from 'zod';
import type { Logger } from 'pino';

import { formatAddress, parseAddress } from './address.js';
import { AddressError, ConfigError, NotFoundError } from './errors.js';
import type { CalculatorConfig, CalculatorSummary, InputSpec, OutputSpec } from './types.js';

// ---- Zod schema for calculator records ----
const ScalarSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

const InputEntrySchema = z.union([
  z.string(),
  z.object({
    cell: z.string(),
    unit: z.string().default(''),
    description: z.string().default(''),
    required: z.boolean().optional(),
    default: ScalarSchema.optional()
  }).strict()
]);

const OutputEntrySchema = z.union([
  z.string(),
  z.object({
    cell: z.string(),
    unit: z.string().default(''),
    description: z.string().default('')
  }).strict()
]);

export const CalculatorRecordSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'letters, digits, "_", "." and "-" only'),
  title: z.string().optional(),
  description: z.string().default(''),
  standard: z.string().default(''),
  workbook: z.string().min(1).nullable().optional(),
  sheet: z.string().min(1).nullable().optional(),
  inputs: z.record(InputEntrySchema).default({}),
  outputs: z.record(OutputEntrySchema).refine(o => Object.keys(o).length > 0, 'at least one output is required')
});

export type CalculatorRecord = z.input<typeof CalculatorRecordSchema>;

export type LoadReport = {
  loaded: string[];
  templates: string[];
  errors: ConfigError[];
};

function recordLabel(record: unknown, index: number): string {
  if (record && typeof record === 'object' && 'name' in record && typeof record.name === 'string' && record.name) return record.name;
  return `record #${index + 1}`;
}

function cellOf(calculator: string, field: string, text: string) {
  try {
    return parseAddress(text);
  } catch (e) {
    if (e instanceof AddressError) throw new ConfigError(calculator, `${field}: ${e.message}`, { cause: e });
    throw e;
  }
}

/** Validates one record into a frozen config. Throws `ConfigError`. */
export function validateRecord(record: unknown, index = 0): CalculatorConfig {
  const label = recordLabel(record, index);
  const parsed = CalculatorRecordSchema.safeParse(record);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const at = issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(label, `${at}${issue.message}`, { cause: parsed.error });
  }
  const r = parsed.data;

  const inputs: Record<string, InputSpec> = {};
  const inputCells = new Map<string, string>();
  for (const [name, entry] of Object.entries(r.inputs)) {
    const e = typeof entry === 'string' ? { cell: entry, unit: '', description: '' } : entry;
    const address = cellOf(r.name, `input '${name}'`, e.cell);
    const key = formatAddress(address);
    const clash = inputCells.get(key);
    if (clash) throw new ConfigError(r.name, `inputs '${clash}' and '${name}' both map to ${key}`);
    inputCells.set(key, name);
    const defaultValue = 'default' in e && e.default !== undefined ? e.default : null;
    const required = 'required' in e && e.required !== undefined ? e.required : !('default' in e && e.default !== undefined);
    inputs[name] = Object.freeze({ address, unit: e.unit, description: e.description, required, defaultValue });
  }

  const outputs: Record<string, OutputSpec> = {};
  const outputCells = new Map<string, string>();
  for (const [name, entry] of Object.entries(r.outputs)) {
    const e = typeof entry === 'string' ? { cell: entry, unit: '', description: '' } : entry;
    const address = cellOf(r.name, `output '${name}'`, e.cell);
    const key = formatAddress(address);
    const clash = outputCells.get(key);
    if (clash) throw new ConfigError(r.name, `outputs '${clash}' and '${name}' both map to ${key}`);
    outputCells.set(key, name);
    outputs[name] = Object.freeze({ address, unit: e.unit, description: e.description });
  }

  const workbookId = r.workbook ?? null;
  const config: CalculatorConfig = {
    name: r.name,
    title: r.title ?? r.name,
    description: r.description,
    standard: r.standard,
    workbookId,
    sheet: r.sheet ?? null,
    inputs: Object.freeze(inputs),
    outputs: Object.freeze(outputs),
    status: workbookId ? 'ready' : 'template_only'
  };
  return Object.freeze(config);
}

export function summarize(c: CalculatorConfig): CalculatorSummary {
  return {
    name: c.name,
    title: c.title,
    description: c.description,
    standard: c.standard,
    status: c.status,
    workbookId: c.workbookId,
    inputs: Object.entries(c.inputs).map(([name, s]) => ({
      name, cell: formatAddress(s.address), unit: s.unit, description: s.description, required: s.required
    })),
    outputs: Object.entries(c.outputs).map(([name, s]) => ({
      name, cell: formatAddress(s.address), unit: s.unit, description: s.description
    }))
  };
}

/**
 * Named calculator definitions. A bad record is rejected on its own; the rest
 * of the set stays usable.
 */
export class CalculatorRegistry {
  private calculators = new Map<string, CalculatorConfig>();

  constructor(private readonly logger?: Logger) {}

  /** Replaces the whole registry with the valid records from `records`. */
  loadAll(records: unknown[]): LoadReport {
    const next = new Map<string, CalculatorConfig>();
    const errors: ConfigError[] = [];
    records.forEach((record, i) => {
      try {
        const config = validateRecord(record, i);
        if (next.has(config.name)) throw new ConfigError(config.name, 'duplicate calculator name');
        next.set(config.name, config);
      } catch (e) {
        if (!(e instanceof ConfigError)) throw e;
        errors.push(e);
        this.logger?.warn({ calculator: e.calculator, reason: e.reason }, 'calculator rejected');
      }
    });
    this.calculators = next;

    const report: LoadReport = {
      loaded: [...next.keys()],
      templates: [...next.values()].filter(c => c.status === 'template_only').map(c => c.name),
      errors
    };
    this.logger?.info({ loaded: report.loaded.length, templates: report.templates.length, rejected: errors.length }, 'calculators loaded');
    return report;
  }

  get(name: string): CalculatorConfig {
    const c = this.calculators.get(name);
    if (!c) throw new NotFoundError(name, this.names());
    return c;
  }

  has(name: string): boolean {
    return this.calculators.has(name);
  }

  names(): string[] {
    return [...this.calculators.keys()].sort();
  }

  list(): CalculatorSummary[] {
    return this.names().map(n => summarize(this.get(n)));
  }
}
