/**
 * Material and machine recommendation for a target process.
 *
 *   matchMaterials(materials, 'sla')                          →  best-scoring resin first
 *   matchMachines(machines, 'cnc', { partSizeMm: [40, 30, 10] })  →  machines that fit first
 *
 * Materials score on five 0-10 axes weighted by the caller's priorities;
 * machines on speed, precision and price.
 */

import type { MachineCatalog, MachineRecord, MaterialCatalog, MaterialRecord } from './catalogs.js';
import type { Process } from './rules.js';
import { round, type BoundingBox, type Vec3 } from './vec3.js';

// ─── Materials ──────────────────────────────────────────────────

export const MATERIAL_AXES = ['strength', 'heat_resistance', 'flexibility', 'cost', 'machinability'] as const;
export type MaterialAxis = typeof MATERIAL_AXES[number];
export type MaterialWeights = Partial<Record<MaterialAxis, number>>;

export const DEFAULT_MATERIAL_WEIGHTS: Readonly<Record<MaterialAxis, number>> = {
  strength: 0.25,
  heat_resistance: 0.2,
  flexibility: 0.1,
  cost: 0.25,
  machinability: 0.2,
};

export interface MaterialMatch {
  material: MaterialRecord;
  score: number;
  spider: Record<MaterialAxis, number>;
  highlights: string[];
}

/** Each property mapped onto 0..10; cheaper is higher. */
export function spiderChart(m: MaterialRecord): Record<MaterialAxis, number> {
  const p = m.properties;
  return {
    strength: Math.min(10, (p.tensile_strength_mpa ?? 0) / 100),
    heat_resistance: Math.min(10, (p.heat_deflection_c ?? 0) / 30),
    flexibility: Math.min(10, (p.elongation_pct ?? 0) / 10),
    cost: Math.max(0, 10 - (p.cost_per_kg_usd ?? 0) / 10),
    machinability: p.machinability_rating ?? 5,
  };
}

function axisLabel(axis: MaterialAxis): string {
  return axis.split('_').map((w) => w[0].toUpperCase() + w.slice(1)).join(' ');
}

/** "Excellent"/"Good" notes for the two strongest axes. */
function highlights(spider: Record<MaterialAxis, number>): string[] {
  const top = [...MATERIAL_AXES].sort((a, b) => spider[b] - spider[a]).slice(0, 2);
  const notes: string[] = [];
  for (const axis of top) {
    if (spider[axis] >= 7) notes.push(`Excellent ${axisLabel(axis)}`);
    else if (spider[axis] >= 5) notes.push(`Good ${axisLabel(axis)}`);
  }
  return notes;
}

/**
 * Materials usable with `process`, best first. Axes missing from
 * `weights` do not count; omitting `weights` uses the defaults.
 */
export function matchMaterials(
  catalog: MaterialCatalog,
  process: Process,
  weights: MaterialWeights = DEFAULT_MATERIAL_WEIGHTS,
): MaterialMatch[] {
  return catalog.forProcess(process)
    .map((material) => {
      const spider = spiderChart(material);
      const score = MATERIAL_AXES.reduce((sum, axis) => sum + spider[axis] * (weights[axis] ?? 0), 0);
      return { material, score, spider, highlights: highlights(spider) };
    })
    .sort((a, b) => b.score - a.score);
}

// ─── Machines ───────────────────────────────────────────────────

export interface MachinePriorities {
  speed: number;
  precision: number;
  cost: number;
}

export const DEFAULT_MACHINE_PRIORITIES: Readonly<MachinePriorities> = { speed: 0.3, precision: 0.4, cost: 0.3 };

/** Price that scores zero on cost. */
const PRICE_CEILING_USD = 150_000;

export interface MachineQuery {
  /** Part extents in mm; without it every machine counts as fitting. */
  partSizeMm?: Vec3;
  toleranceMm?: number;
  priorities?: Partial<MachinePriorities>;
}

export interface MachineMatch {
  machine: MachineRecord;
  score: number;
  fitsPart: boolean;
  reasons: string[];
  warnings: string[];
}

/** The part fits in some orientation: sorted extents compared pairwise. */
export function canFit(machine: MachineRecord, partSizeMm: Vec3): boolean {
  const { x, y, z } = machine.build_volume;
  const part = [...partSizeMm].sort((a, b) => a - b);
  const room = [x, y, z].sort((a, b) => a - b);
  return part.every((d, i) => d <= room[i]);
}

/** Bounding-box extents, cm → mm. */
export function partSizeMm(bb: BoundingBox): Vec3 {
  return [
    round((bb.max[0] - bb.min[0]) * 10, 6),
    round((bb.max[1] - bb.min[1]) * 10, 6),
    round((bb.max[2] - bb.min[2]) * 10, 6),
  ];
}

function scoreMachine(machine: MachineRecord, query: MachineQuery): MachineMatch {
  const reasons: string[] = [];
  const warnings: string[] = [];
  let fitsPart = true;

  const size = query.partSizeMm;
  if (size) {
    const { x, y, z } = machine.build_volume;
    if (canFit(machine, size)) {
      const headroom = Math.min((x - size[0]) / x, (y - size[1]) / y, (z - size[2]) / z);
      reasons.push(headroom > 0.5 ? 'Part fits easily with lots of headroom' : 'Part fits within build volume');
    } else {
      fitsPart = false;
      const dims = (v: readonly number[]) => v.map((d) => d.toFixed(0)).join('x');
      warnings.push(`Part (${dims(size)}mm) exceeds build volume (${dims([x, y, z])}mm)`);
    }
  }

  const tolerance = query.toleranceMm;
  if (tolerance !== undefined) {
    if (machine.tolerance_mm <= tolerance) {
      reasons.push(`Meets tolerance requirement (${machine.tolerance_mm}mm <= ${tolerance}mm)`);
    } else {
      warnings.push(`Tolerance ${machine.tolerance_mm}mm may not meet ${tolerance}mm requirement`);
    }
  }

  const w = { ...DEFAULT_MACHINE_PRIORITIES, ...query.priorities };
  const costScore = Math.max(0, 10 * (1 - machine.price_usd / PRICE_CEILING_USD));
  const score = machine.speed_rating * w.speed + machine.precision_rating * w.precision + costScore * w.cost;

  for (const use of machine.best_for) reasons.push(`Best for: ${use}`);
  return { machine, score, fitsPart, reasons, warnings };
}

/** Machines for `process`: those that fit the part first, then by score. */
export function matchMachines(catalog: MachineCatalog, process: Process, query: MachineQuery = {}): MachineMatch[] {
  return catalog.forProcess(process)
    .map((m) => scoreMachine(m, query))
    .sort((a, b) => Number(b.fitsPart) - Number(a.fitsPart) || b.score - a.score);
}

// ─── Wire form ──────────────────────────────────────────────────

export interface MaterialMatchJSON {
  id: string;
  name: string;
  category: string;
  score: number;
  spider_chart: Record<MaterialAxis, number>;
  highlights: string[];
  properties: MaterialRecord['properties'];
  advantages: string[];
  disadvantages: string[];
  typical_uses: string[];
}

export function materialMatchToJSON(m: MaterialMatch): MaterialMatchJSON {
  const spider = { ...m.spider };
  for (const axis of MATERIAL_AXES) spider[axis] = round(spider[axis], 2);
  return {
    id: m.material.id,
    name: m.material.name,
    category: m.material.category,
    score: round(m.score, 1),
    spider_chart: spider,
    highlights: m.highlights,
    properties: m.material.properties,
    advantages: m.material.advantages,
    disadvantages: m.material.disadvantages,
    typical_uses: m.material.typical_uses,
  };
}

export interface MachineMatchJSON {
  id: string;
  name: string;
  manufacturer: string;
  score: number;
  fits_part: boolean;
  build_volume: MachineRecord['build_volume'];
  tolerance_mm: number;
  price_usd: number;
  axes: number | null;
  reasons: string[];
  warnings: string[];
  limitations: string[];
}

export function machineMatchToJSON(m: MachineMatch): MachineMatchJSON {
  return {
    id: m.machine.id,
    name: m.machine.name,
    manufacturer: m.machine.manufacturer,
    score: round(m.score, 1),
    fits_part: m.fitsPart,
    build_volume: m.machine.build_volume,
    tolerance_mm: m.machine.tolerance_mm,
    price_usd: m.machine.price_usd,
    axes: m.machine.axes ?? null,
    reasons: m.reasons,
    warnings: m.warnings,
    limitations: m.machine.limitations,
  };
}
