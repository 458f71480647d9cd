import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { readCalculatorDir } from './configSource.js';
import { CalculationEngine } from './engine.js';
import { CalculatorRegistry } from './registry.js';
import { layoutToModel, readSampleLayouts, seedWorkbooks } from './samples.js';
import { XlsxWorkbookStore } from './store/xlsxStore.js';

const CONFIGS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'configs');
const CALCULATORS_DIR = path.join(CONFIGS_DIR, 'calculators');
const SAMPLES_DIR = path.join(CONFIGS_DIR, 'samples');

describe('layoutToModel', () => {
  it('turns strings starting with = into formulas', () => {
    const m = layoutToModel('w', { sheet: 'S', cells: { A1: 'Label', B1: 2, C1: '=B1*2', D1: true } });
    expect(m.getContent('S', { column: 1, row: 1 })).toEqual({ kind: 'text', value: 'Label' });
    expect(m.getFormula('S', { column: 3, row: 1 })).toBe('=B1*2');
    expect(m.getContent('S', { column: 4, row: 1 })).toEqual({ kind: 'boolean', value: true });
  });
});

describe('sample workbooks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'samples-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('ships a layout per sample', async () => {
    const layouts = await readSampleLayouts(SAMPLES_DIR);
    expect([...layouts.keys()]).toEqual(['design_bending_capacity', 'reference_buckling_moment', 'steel_beam', 'timber_beam']);
  });

  it('seeds missing files only, unless told to overwrite', async () => {
    const layouts = await readSampleLayouts(SAMPLES_DIR);
    expect((await seedWorkbooks(dir, layouts)).map(f => path.basename(f))).toEqual([
      'design_bending_capacity.xlsx', 'reference_buckling_moment.xlsx', 'steel_beam.xlsx', 'timber_beam.xlsx'
    ]);
    expect(await seedWorkbooks(dir, layouts)).toEqual([]);
    expect(await seedWorkbooks(dir, layouts, true)).toHaveLength(4);
  });

  it('runs the shipped calculators against the seeded files', async () => {
    await seedWorkbooks(dir, await readSampleLayouts(SAMPLES_DIR));
    const store = new XlsxWorkbookStore({ baseDir: dir });
    const engine = new CalculationEngine({ registry: new CalculatorRegistry(), store, cacheTtlMs: 0 });
    const report = engine.reload((await readCalculatorDir(CALCULATORS_DIR)).records);
    expect(report.templates).toEqual(['concrete_column']);

    const steel = await engine.execute('steel_beam', { beam_length: 8, applied_load: 50 });
    expect(steel.outputs).toMatchObject({ max_moment: 50, bending_stress: 100, assessment: 'PASS' });

    const timber = await engine.execute('timber_beam', {
      width: 90, depth: 190, bending_strength: 42, design_moment: 10, application_category: 2, load_duration: 0.42
    });
    expect(timber.status).toBe('success');
    expect(timber.outputs.section_modulus).toBe(541500);
    expect(timber.outputs.capacity_factor).toBe(0.85);
    expect(timber.outputs.duration_factor).toBe(0.8);
    expect(timber.outputs.design_capacity).toBeCloseTo(15.46524, 6);
    expect(timber.outputs.utilization_ratio).toBeCloseTo(0.64661, 4);
    expect(timber.outputs.assessment).toBe('ADEQUATE');
  });

  it('evaluates PI() and powers in the buckling moment sheet', async () => {
    await seedWorkbooks(dir, await readSampleLayouts(SAMPLES_DIR));
    const engine = new CalculationEngine({ registry: new CalculatorRegistry(), store: new XlsxWorkbookStore({ baseDir: dir }), cacheTtlMs: 0 });
    engine.reload((await readCalculatorDir(CALCULATORS_DIR)).records);

    const r = await engine.execute('reference_buckling_moment', {
      second_moment_y: 1e7, torsion_constant: 2e5, warping_constant: 1e11, effective_length: 5000
    });
    expect(r.status).toBe('success');
    expect(r.inputsUsed).toMatchObject({ elastic_modulus: 200000, shear_modulus: 80000 });
    expect(r.units.reference_buckling_moment).toBe('Nmm');
    const mo = r.outputs.reference_buckling_moment;
    expect(typeof mo === 'number' ? mo / 1e6 : mo).toBeCloseTo(137.358201, 5);
  });

  it('multiplies the bending capacity factors', async () => {
    await seedWorkbooks(dir, await readSampleLayouts(SAMPLES_DIR));
    const engine = new CalculationEngine({ registry: new CalculatorRegistry(), store: new XlsxWorkbookStore({ baseDir: dir }), cacheTtlMs: 0 });
    engine.reload((await readCalculatorDir(CALCULATORS_DIR)).records);

    const r = await engine.execute('design_bending_capacity', { phi: 0.9, k1: 0.8, bending_strength: 40, section_modulus: 500000, k12: 0.5 });
    expect(r.status).toBe('success');
    expect(r.evaluatedCells).toBe(1);
    expect(r.outputs.design_capacity).toBeCloseTo(7200000, 3);
  });
});
