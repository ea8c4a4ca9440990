/**
 * Process-switch simulator.
 *
 * Analyzes one snapshot under two processes and diffs the violations by
 * (rule id, feature). Both runs share the snapshot, so face and edge
 * indices agree between them.
 */

import { estimateCost, costToJSON, type CostEstimate, type CostEstimateJSON } from './cost.js';
import type { DrillCatalog } from './drills.js';
import type { GeometrySnapshot } from './geometry.js';
import { planRedesign, stepToJSON, type RedesignStep, type RedesignStepJSON } from './redesign.js';
import type { RuleRegistry } from './registry.js';
import { PROCESS_LABELS, type Process } from './rules.js';
import { analyzeSnapshot } from './analyze.js';
import { round } from './vec3.js';
import { violationKey, violationToJSON, type Violation, type ViolationJSON } from './violation.js';

export interface ProcessSwitch {
  from: Process;
  to: Process;
  removed: Violation[];
  introduced: Violation[];
  persistent: Violation[];
  costBefore: CostEstimate;
  costAfter: CostEstimate;
  /** Per unit at quantity 1; positive means the new process costs more. */
  costDelta: number;
  redesignSteps: RedesignStep[];
  summary: string;
}

const NO_BODY = { volumeCm3: 0, faceCount: 0, boundingBox: undefined };

export function simulateSwitch(
  snapshot: GeometrySnapshot,
  from: Process,
  to: Process,
  rules: RuleRegistry,
  drills: DrillCatalog,
): ProcessSwitch {
  const before = analyzeSnapshot(snapshot, from, rules, drills).violations;
  const after = analyzeSnapshot(snapshot, to, rules, drills).violations;

  const beforeKeys = new Set(before.map(violationKey));
  const afterKeys = new Set(after.map(violationKey));

  const removed = before.filter((v) => !afterKeys.has(violationKey(v)));
  const introduced = after.filter((v) => !beforeKeys.has(violationKey(v)));
  const persistent = after.filter((v) => beforeKeys.has(violationKey(v)));

  const part = snapshot.body ?? NO_BODY;
  const costBefore = estimateCost(from, part, 1);
  const costAfter = estimateCost(to, part, 1);
  const costDelta = costAfter.totalCost - costBefore.totalCost;

  return {
    from,
    to,
    removed,
    introduced,
    persistent,
    costBefore,
    costAfter,
    costDelta,
    redesignSteps: planRedesign(introduced),
    summary: switchSummary(from, to, removed.length, introduced.length, costDelta),
  };
}

export function switchSummary(
  from: Process,
  to: Process,
  removed: number,
  introduced: number,
  costDelta: number,
): string {
  let s = `Switching from ${PROCESS_LABELS[from]} to ${PROCESS_LABELS[to]}: `;
  if (removed > 0) s += `${removed} violation(s) resolved. `;
  if (introduced > 0) s += `${introduced} new violation(s) introduced. `;
  if (removed === 0 && introduced === 0) s += 'No change in violations. ';

  if (costDelta < 0) s += `Saves $${Math.abs(costDelta).toFixed(2)} per unit.`;
  else if (costDelta > 0) s += `Costs $${costDelta.toFixed(2)} more per unit.`;
  else s += 'Same cost.';
  return s;
}

export interface ProcessSwitchJSON {
  from_process: string;
  to_process: string;
  removed_violations: ViolationJSON[];
  new_violations: ViolationJSON[];
  persistent_violations: ViolationJSON[];
  cost_before: CostEstimateJSON;
  cost_after: CostEstimateJSON;
  cost_delta: number;
  redesign_steps: RedesignStepJSON[];
  summary: string;
}

export function switchToJSON(s: ProcessSwitch): ProcessSwitchJSON {
  return {
    from_process: PROCESS_LABELS[s.from],
    to_process: PROCESS_LABELS[s.to],
    removed_violations: s.removed.map(violationToJSON),
    new_violations: s.introduced.map(violationToJSON),
    persistent_violations: s.persistent.map(violationToJSON),
    cost_before: costToJSON(s.costBefore),
    cost_after: costToJSON(s.costAfter),
    cost_delta: round(s.costDelta, 2),
    redesign_steps: s.redesignSteps.map(stepToJSON),
    summary: s.summary,
  };
}
