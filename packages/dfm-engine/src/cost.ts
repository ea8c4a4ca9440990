/**
 * Per-process cost estimates.
 *
 *   estimateCost('cnc', body, 100)   →  { materialCost, timeCost, setupCost, totalCost, ... }
 *
 * Additive processes price net part volume; CNC prices bounding-box stock
 * and the time to remove everything that is not the part; injection
 * molding pays a one-time tooling cost that is independent of quantity.
 * Body metrics are in cm³ / cm; money is USD.
 */

import type { Body } from './geometry.js';
import { PROCESSES, PROCESS_LABELS, type Process } from './rules.js';
import { boxVolume, round, type BoundingBox } from './vec3.js';

// ─── Constants ──────────────────────────────────────────────────

export const COST_CONSTANTS = {
  fdm: { materialPerCm3: 0.05, machinePerHr: 0.5, printRateCm3Hr: 15 },
  sla: { materialPerCm3: 0.15, machinePerHr: 1.0, printRateCm3Hr: 30 },
  cnc: {
    materialPerCm3: 0.01,
    machinePerHr: 80,
    setupCost: 50,
    removalRateCm3Hr: 50,
    minHoursPerPart: 0.25,
  },
  injection_molding: {
    baseTooling: 5000,
    toolingPerFace: 500,
    maxTooling: 50_000,
    materialPerCm3: 0.02,
    cycleBaseS: 15,
    cycleSPerCm3: 0.5,
    machinePerHr: 40,
  },
} as const;

/** Stock assumed when the host gave no bounding box: a 1 cm cube. */
const UNIT_CUBE: BoundingBox = { min: [0, 0, 0], max: [1, 1, 1] };

// ─── Types ──────────────────────────────────────────────────────

/** The body metrics the cost model needs. */
export type PartMetrics = Pick<Body, 'volumeCm3' | 'faceCount' | 'boundingBox'>;

export interface CostEstimate {
  process: Process;
  quantity: number;
  materialCost: number;
  machineTimeHrs: number;
  timeCost: number;
  /** One-time cost: CNC setup, injection-mold tooling. */
  setupCost: number;
  totalCost: number;
}

export function unitCost(estimate: CostEstimate): number {
  return estimate.totalCost / Math.max(estimate.quantity, 1);
}

// ─── Estimators ─────────────────────────────────────────────────

function additive(process: 'fdm' | 'sla', volumeCm3: number, quantity: number): CostEstimate {
  const c = COST_CONSTANTS[process];
  const materialCost = volumeCm3 * c.materialPerCm3 * quantity;
  const machineTimeHrs = (volumeCm3 / c.printRateCm3Hr) * quantity;
  const timeCost = machineTimeHrs * c.machinePerHr;
  return {
    process, quantity, materialCost, machineTimeHrs, timeCost,
    setupCost: 0,
    totalCost: materialCost + timeCost,
  };
}

function cnc(part: PartMetrics, quantity: number): CostEstimate {
  const c = COST_CONSTANTS.cnc;
  const stock = boxVolume(part.boundingBox ?? UNIT_CUBE);
  const removed = Math.max(0, stock - part.volumeCm3);
  const hoursPerPart = Math.max(removed / c.removalRateCm3Hr, c.minHoursPerPart);
  const materialCost = stock * c.materialPerCm3 * quantity;
  const machineTimeHrs = hoursPerPart * quantity;
  const timeCost = machineTimeHrs * c.machinePerHr;
  return {
    process: 'cnc', quantity, materialCost, machineTimeHrs, timeCost,
    setupCost: c.setupCost,
    totalCost: materialCost + timeCost + c.setupCost,
  };
}

function injectionMolding(part: PartMetrics, quantity: number): CostEstimate {
  const c = COST_CONSTANTS.injection_molding;
  const tooling = Math.min(c.baseTooling + part.faceCount * c.toolingPerFace, c.maxTooling);
  const cycleS = c.cycleBaseS + part.volumeCm3 * c.cycleSPerCm3;
  const materialCost = part.volumeCm3 * c.materialPerCm3 * quantity;
  const machineTimeHrs = (cycleS / 3600) * quantity;
  const timeCost = machineTimeHrs * c.machinePerHr;
  return {
    process: 'injection_molding', quantity, materialCost, machineTimeHrs, timeCost,
    setupCost: tooling,
    totalCost: materialCost + timeCost + tooling,
  };
}

export function estimateCost(process: Process, part: PartMetrics, quantity = 1): CostEstimate {
  if (!Number.isInteger(quantity) || quantity < 1) {
    throw new RangeError(`quantity must be a positive integer, got ${quantity}`);
  }
  switch (process) {
    case 'fdm':
    case 'sla':
      return additive(process, part.volumeCm3, quantity);
    case 'cnc':
      return cnc(part, quantity);
    case 'injection_molding':
      return injectionMolding(part, quantity);
  }
}

/** One estimate per process, in PROCESSES order. */
export function estimateAll(part: PartMetrics, quantity = 1): CostEstimate[] {
  return PROCESSES.map((p) => estimateCost(p, part, quantity));
}

export function unitCostAt(process: Process, part: PartMetrics, quantity: number): number {
  return unitCost(estimateCost(process, part, quantity));
}

// ─── Wire form ──────────────────────────────────────────────────

export interface CostEstimateJSON {
  process: string;
  quantity: number;
  material_cost: number;
  machine_time_hrs: number;
  time_cost: number;
  setup_cost: number;
  total_cost: number;
  unit_cost: number;
}

export function costToJSON(e: CostEstimate): CostEstimateJSON {
  return {
    process: PROCESS_LABELS[e.process],
    quantity: e.quantity,
    material_cost: round(e.materialCost, 2),
    machine_time_hrs: round(e.machineTimeHrs, 3),
    time_cost: round(e.timeCost, 2),
    setup_cost: round(e.setupCost, 2),
    total_cost: round(e.totalCost, 2),
    unit_cost: round(unitCost(e), 4),
  };
}
