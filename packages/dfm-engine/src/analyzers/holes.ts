import type { DrillCatalog } from '../drills.js';
import type { FeatureRef } from '../feature-ref.js';
import type { Hole } from '../geometry.js';
import type { DfmRule } from '../rules.js';
import { checkRule } from '../rules.js';
import { violationOf, type Violation } from '../violation.js';

/**
 * Three independent checks per hole:
 *   hole_size      — minimum diameter
 *   hole_depth     — maximum depth:diameter, only when depth is known (> 0)
 *   standard_hole  — distance to the nearest standard drill
 */
export function checkHoles(
  holes: readonly Hole[],
  rules: readonly DfmRule[],
  drills: DrillCatalog,
  generation: number,
): Violation[] {
  const sizeRules = rules.filter((r) => r.category === 'hole_size');
  const depthRules = rules.filter((r) => r.category === 'hole_depth');
  const standardRules = rules.filter((r) => r.category === 'standard_hole');

  const violations: Violation[] = [];
  for (const hole of holes) {
    if (!Number.isFinite(hole.diameterMm) || hole.diameterMm <= 0) continue;
    const feature: FeatureRef = { kind: 'hole', face: hole.faceIndex, generation };

    for (const rule of sizeRules) {
      if (!checkRule(rule, hole.diameterMm)) {
        violations.push(violationOf(rule, feature, hole.diameterMm, hole.centroid));
      }
    }

    if (hole.depthMm > 0) {
      for (const rule of depthRules) {
        if (!checkRule(rule, hole.depthToDiameter)) {
          violations.push(violationOf(rule, feature, hole.depthToDiameter, hole.centroid));
        }
      }
    }

    if (standardRules.length > 0) {
      const nearest = drills.nearest(hole.diameterMm);
      const deviation = Math.abs(hole.diameterMm - nearest);
      for (const rule of standardRules) {
        if (checkRule(rule, deviation)) continue;
        violations.push({
          ...violationOf(rule, feature, hole.diameterMm, hole.centroid),
          message: `Hole diameter ${hole.diameterMm.toFixed(2)}mm is not a standard drill size (nearest: ${nearest}mm)`,
          requiredValue: nearest,
        });
      }
    }
  }
  return violations;
}
