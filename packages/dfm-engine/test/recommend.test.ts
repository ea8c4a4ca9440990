import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  MachineCatalog, MaterialCatalog, RuleLoadError, canFit, machineMatchToJSON, matchMachines, matchMaterials,
  materialMatchToJSON, partSizeMm, spiderChart,
} from '../src/index.js';
import type { MachineRecord } from '../src/index.js';

const materials = MaterialCatalog.load();
const machines = MachineCatalog.load();

function machine(id: string): MachineRecord {
  const m = machines.machines.find((x) => x.id === id);
  if (!m) throw new Error(`missing machine ${id}`);
  return m;
}

// ─── Catalogs ─────────────────────────────────────────────────

describe('catalogs', () => {
  it('filters materials by process and category', () => {
    expect(materials.forProcess('sla').map((m) => m.id)).toEqual(['standard_resin', 'tough_resin']);
    expect(materials.byCategory('Metal').map((m) => m.id)).toEqual(['aluminum_6061', 'stainless_304']);
  });

  it('filters machines by process', () => {
    expect(machines.forProcess('cnc').map((m) => m.id)).toEqual(['tormach_1100', 'haas_vf2', 'haas_umc500']);
  });

  it('rejects a missing catalog', () => {
    const missing = path.join(os.tmpdir(), 'partcheck-no-such-materials.json');
    expect(() => MaterialCatalog.load(missing)).toThrow(RuleLoadError);
  });

  it('names the bad field of a malformed catalog', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'partcheck-'));
    const file = path.join(dir, 'machines.json');
    fs.writeFileSync(file, JSON.stringify({ machines: [{ ...machine('haas_vf2'), process: 'laser' }] }));
    try {
      expect(() => MachineCatalog.load(file)).toThrow(/^Malformed machine catalog .*: machines\.0\.process: /);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

// ─── Materials ────────────────────────────────────────────────

describe('matchMaterials', () => {
  it('maps properties onto 0..10 axes', () => {
    const [aluminum] = materials.byCategory('metal');
    const spider = spiderChart(aluminum);
    expect(spider.strength).toBeCloseTo(3.1, 9);
    expect(spider.heat_resistance).toBe(10);
    expect(spider.flexibility).toBeCloseTo(1.2, 9);
    expect(spider.cost).toBeCloseTo(9.4, 9);
    expect(spider.machinability).toBe(9);
  });

  it('ranks materials with the default weights', () => {
    const matches = matchMaterials(materials, 'sla');
    expect(matches.map((m) => m.material.id)).toEqual(['standard_resin', 'tough_resin']);
    expect(matches[0].score).toBeCloseTo(2.3933, 4);
    expect(matches[1].score).toBeCloseTo(1.2975, 9);
    expect(matches[0].highlights).toEqual(['Good Cost']);
    expect(matches[1].highlights).toEqual([]);
  });

  it('scores only the weighted axes', () => {
    const matches = matchMaterials(materials, 'cnc', { strength: 1 });
    expect(matches.map((m) => m.material.id)).toEqual([
      'stainless_304', 'aluminum_6061', 'pom', 'polycarbonate', 'abs',
    ]);
  });

  it('highlights the two strongest axes', () => {
    const aluminum = matchMaterials(materials, 'cnc').find((m) => m.material.id === 'aluminum_6061');
    expect(aluminum?.highlights).toEqual(['Excellent Heat Resistance', 'Excellent Cost']);
  });

  it('serializes with a rounded score', () => {
    const [best] = matchMaterials(materials, 'sla');
    expect(materialMatchToJSON(best)).toMatchObject({
      id: 'standard_resin',
      score: 2.4,
      spider_chart: { strength: 0.6, heat_resistance: 1.67, flexibility: 0.6, cost: 5, machinability: 3 },
    });
  });
});

// ─── Machines ─────────────────────────────────────────────────

describe('matchMachines', () => {
  it('converts a bounding box in cm to part extents in mm', () => {
    expect(partSizeMm({ min: [0, 0, 0], max: [4, 3, 1] })).toEqual([40, 30, 10]);
  });

  it('fits a part in any orientation', () => {
    expect(canFit(machine('elegoo_saturn'), [200, 120, 150])).toBe(true);
    expect(canFit(machine('formlabs_form3'), [200, 120, 150])).toBe(false);
  });

  it('ranks by speed, precision and price', () => {
    const matches = matchMachines(machines, 'sla', { partSizeMm: [40, 30, 10] });
    expect(matches.map((m) => m.machine.id)).toEqual(['formlabs_form3', 'elegoo_saturn']);
    expect(matches[0].score).toBeCloseTo(8.03, 9);
    expect(matches[1].score).toBeCloseTo(7.99, 9);
    expect(matches[0].reasons).toEqual(['Part fits easily with lots of headroom', 'Best for: Fine detail']);
  });

  it('puts machines that fit the part first', () => {
    const [first, second] = matchMachines(machines, 'sla', { partSizeMm: [200, 120, 150] });
    expect(first.machine.id).toBe('elegoo_saturn');
    expect(first.fitsPart).toBe(true);
    expect(first.reasons[0]).toBe('Part fits within build volume');
    expect(second.fitsPart).toBe(false);
    expect(second.warnings).toEqual(['Part (200x120x150mm) exceeds build volume (145x145x185mm)']);
  });

  it('checks the tolerance and honours custom priorities', () => {
    const byDefault = matchMachines(machines, 'cnc', { toleranceMm: 0.01 });
    expect(byDefault.map((m) => m.machine.id)).toEqual(['haas_vf2', 'tormach_1100', 'haas_umc500']);
    expect(byDefault[0].reasons[0]).toBe('Meets tolerance requirement (0.01mm <= 0.01mm)');
    expect(byDefault[1].warnings).toEqual(['Tolerance 0.025mm may not meet 0.01mm requirement']);

    const cheapest = matchMachines(machines, 'cnc', { priorities: { speed: 0, precision: 0, cost: 1 } });
    expect(cheapest.map((m) => m.machine.id)).toEqual(['tormach_1100', 'haas_vf2', 'haas_umc500']);
  });

  it('serializes the match', () => {
    const [vf2] = matchMachines(machines, 'cnc');
    expect(machineMatchToJSON(vf2)).toMatchObject({ id: 'haas_vf2', score: 7.2, fits_part: true, axes: 3 });
  });
});
