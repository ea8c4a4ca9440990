/**
 * Cost-vs-quantity curves and crossover detection.
 *
 *   findCrossovers(part)
 *     →  [{ quantity: 403, from: 'cnc', to: 'injection_molding', message: '...' }]
 *
 * The crossover search assumes each pair of unit-cost curves crosses at
 * most once in [1, MAX_QUANTITY]. Every estimator here is a constant plus
 * a one-time cost over quantity, which holds that. A new estimator must
 * keep it, or the binary search lands on an arbitrary switch point.
 */

import { estimateCost, unitCost, unitCostAt, type PartMetrics } from './cost.js';
import { PROCESSES, PROCESS_LABELS, type Process } from './rules.js';
import { round } from './vec3.js';

export const STANDARD_QUANTITIES: readonly number[] = [1, 10, 50, 100, 500, 1000, 5000, 10_000];

export const MAX_QUANTITY = 10_000;

// ─── Curves ─────────────────────────────────────────────────────

export interface QuantityPoint {
  quantity: number;
  unitCost: number;
  totalCost: number;
}

export type QuantityCurves = Record<Process, QuantityPoint[]>;

export function quantityCurve(
  process: Process,
  part: PartMetrics,
  quantities: readonly number[] = STANDARD_QUANTITIES,
): QuantityPoint[] {
  return quantities.map((quantity) => {
    const e = estimateCost(process, part, quantity);
    return { quantity, unitCost: round(unitCost(e), 4), totalCost: round(e.totalCost, 2) };
  });
}

export function quantityCurves(
  part: PartMetrics,
  quantities: readonly number[] = STANDARD_QUANTITIES,
): QuantityCurves {
  return {
    fdm: quantityCurve('fdm', part, quantities),
    sla: quantityCurve('sla', part, quantities),
    cnc: quantityCurve('cnc', part, quantities),
    injection_molding: quantityCurve('injection_molding', part, quantities),
  };
}

// ─── Crossovers ─────────────────────────────────────────────────

export interface Crossover {
  /** First quantity at which `to` is strictly cheaper per unit than `from`. */
  quantity: number;
  from: Process;
  to: Process;
  message: string;
}

/**
 * Crossover for one pair, or null when the same process is cheaper at
 * both ends of the range.
 */
export function findCrossover(a: Process, b: Process, part: PartMetrics): Crossover | null {
  const aCheaper = (q: number) => unitCostAt(a, part, q) < unitCostAt(b, part, q);

  const aCheaperAtOne = aCheaper(1);
  if (aCheaperAtOne === aCheaper(MAX_QUANTITY)) return null;

  // Invariant: ranking at lo matches q=1, ranking at hi matches MAX_QUANTITY.
  let lo = 1;
  let hi = MAX_QUANTITY;
  while (hi - lo > 1) {
    const mid = Math.floor((lo + hi) / 2);
    if (aCheaper(mid) === aCheaperAtOne) lo = mid;
    else hi = mid;
  }

  const from = aCheaperAtOne ? a : b;
  const to = aCheaperAtOne ? b : a;
  return {
    quantity: hi,
    from,
    to,
    message: `${PROCESS_LABELS[to]} becomes cheaper than ${PROCESS_LABELS[from]} above ${hi} units`,
  };
}

/** Crossovers for every process pair, sorted by quantity. */
export function findCrossovers(part: PartMetrics): Crossover[] {
  const found: Crossover[] = [];
  for (let i = 0; i < PROCESSES.length; i++) {
    for (let j = i + 1; j < PROCESSES.length; j++) {
      const c = findCrossover(PROCESSES[i], PROCESSES[j], part);
      if (c) found.push(c);
    }
  }
  return found.sort((x, y) => x.quantity - y.quantity);
}
