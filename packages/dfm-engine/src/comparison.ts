/**
 * Side-by-side cost comparison: curves, crossovers, and which process to
 * pick at the requested quantity.
 */

import { costToJSON, estimateAll, unitCost, type CostEstimate, type CostEstimateJSON, type PartMetrics } from './cost.js';
import { findCrossovers, quantityCurves, type Crossover, type QuantityCurves } from './quantity.js';
import { PROCESS_LABELS, type Process } from './rules.js';

export interface CostComparison {
  quantity: number;
  estimates: CostEstimate[];
  curves: QuantityCurves;
  crossovers: Crossover[];
  cheapest: Process;
  /** Nearest crossover strictly above `quantity`, if any. */
  nextCrossover: Crossover | null;
  recommendation: string;
}

export function compareCosts(part: PartMetrics, quantity = 1): CostComparison {
  const estimates = estimateAll(part, quantity);
  const crossovers = findCrossovers(part);

  let best = estimates[0];
  for (const e of estimates) {
    if (e.totalCost < best.totalCost) best = e;
  }
  const nextCrossover = crossovers.find((c) => c.quantity > quantity) ?? null;

  const units = quantity === 1 ? 'unit' : 'units';
  let recommendation =
    `At ${quantity} ${units}, ${PROCESS_LABELS[best.process]} is cheapest at ` +
    `$${unitCost(best).toFixed(2)}/unit ($${best.totalCost.toFixed(2)} total).`;
  if (nextCrossover) {
    recommendation +=
      ` Note: ${PROCESS_LABELS[nextCrossover.to]} becomes cheaper above ${nextCrossover.quantity} units.`;
  }

  return {
    quantity,
    estimates,
    curves: quantityCurves(part),
    crossovers,
    cheapest: best.process,
    nextCrossover,
    recommendation,
  };
}

export interface CostComparisonJSON {
  quantity: number;
  estimates: CostEstimateJSON[];
  curves: Record<string, { quantity: number; unit_cost: number; total_cost: number }[]>;
  crossover_points: { quantity: number; from: string; to: string; message: string }[];
  cheapest: string;
  recommendation: string;
}

export function comparisonToJSON(c: CostComparison): CostComparisonJSON {
  const curves: CostComparisonJSON['curves'] = {};
  for (const [process, points] of Object.entries(c.curves)) {
    curves[process] = points.map((p) => ({
      quantity: p.quantity,
      unit_cost: p.unitCost,
      total_cost: p.totalCost,
    }));
  }
  return {
    quantity: c.quantity,
    estimates: c.estimates.map(costToJSON),
    curves,
    crossover_points: c.crossovers.map((x) => ({
      quantity: x.quantity,
      from: PROCESS_LABELS[x.from],
      to: PROCESS_LABELS[x.to],
      message: x.message,
    })),
    cheapest: PROCESS_LABELS[c.cheapest],
    recommendation: c.recommendation,
  };
}
