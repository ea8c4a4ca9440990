/**
 * Material and machine catalogs, loaded from JSON like the drill catalog.
 * A missing or malformed catalog is a startup error.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { RuleLoadError, errorMessage } from './errors.js';
import { PROCESSES, type Process } from './rules.js';

export const DEFAULT_MATERIALS_PATH = fileURLToPath(new URL('../data/materials.json', import.meta.url));
export const DEFAULT_MACHINES_PATH = fileURLToPath(new URL('../data/machines.json', import.meta.url));

// ─── Schemas ────────────────────────────────────────────────────

const MaterialSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  category: z.string().min(1),
  processes: z.array(z.enum(PROCESSES)).min(1),
  properties: z.object({
    tensile_strength_mpa: z.number().nonnegative().optional(),
    yield_strength_mpa: z.number().nonnegative().optional(),
    elongation_pct: z.number().nonnegative().optional(),
    density_g_cm3: z.number().positive().optional(),
    heat_deflection_c: z.number().optional(),
    shore_hardness: z.string().optional(),
    cost_per_kg_usd: z.number().nonnegative().optional(),
    machinability_rating: z.number().int().min(1).max(10).optional(),
  }),
  advantages: z.array(z.string()).default([]),
  disadvantages: z.array(z.string()).default([]),
  typical_uses: z.array(z.string()).default([]),
});

const MachineSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  manufacturer: z.string().min(1),
  process: z.enum(PROCESSES),
  build_volume: z.object({ x: z.number().positive(), y: z.number().positive(), z: z.number().positive() }),
  tolerance_mm: z.number().positive(),
  materials: z.array(z.string()),
  price_usd: z.number().nonnegative(),
  speed_rating: z.number().int().min(1).max(10),
  precision_rating: z.number().int().min(1).max(10),
  axes: z.number().int().positive().optional(),
  layer_height_range: z.tuple([z.number(), z.number()]).optional(),
  nozzle_sizes: z.array(z.number().positive()).optional(),
  limitations: z.array(z.string()).default([]),
  best_for: z.array(z.string()).default([]),
});

export type MaterialRecord = z.infer<typeof MaterialSchema>;
export type MachineRecord = z.infer<typeof MachineSchema>;

function readCatalog<T>(path: string, label: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new RuleLoadError(`Cannot read ${label} catalog at ${path}: ${errorMessage(err)}`, path, { cause: err });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid';
    throw new RuleLoadError(`Malformed ${label} catalog ${path}: ${where}`, path);
  }
  return parsed.data;
}

// ─── Materials ──────────────────────────────────────────────────

export class MaterialCatalog {
  constructor(readonly materials: readonly MaterialRecord[]) {}

  static load(path: string = DEFAULT_MATERIALS_PATH): MaterialCatalog {
    const data = readCatalog(path, 'material', z.object({ materials: z.array(MaterialSchema) }));
    return new MaterialCatalog(data.materials);
  }

  forProcess(process: Process): MaterialRecord[] {
    return this.materials.filter((m) => m.processes.includes(process));
  }

  byCategory(category: string): MaterialRecord[] {
    const wanted = category.toLowerCase();
    return this.materials.filter((m) => m.category.toLowerCase() === wanted);
  }
}

// ─── Machines ───────────────────────────────────────────────────

export class MachineCatalog {
  constructor(readonly machines: readonly MachineRecord[]) {}

  static load(path: string = DEFAULT_MACHINES_PATH): MachineCatalog {
    const data = readCatalog(path, 'machine', z.object({ machines: z.array(MachineSchema) }));
    return new MachineCatalog(data.machines);
  }

  forProcess(process: Process): MachineRecord[] {
    return this.machines.filter((m) => m.process === process);
  }
}
