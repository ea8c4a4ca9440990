import type { Wall } from '../geometry.js';
import type { DfmRule } from '../rules.js';
import { checkRule } from '../rules.js';
import { violationOf, type Violation } from '../violation.js';

/** One violation per failing wall_thickness rule per wall. */
export function checkWalls(walls: readonly Wall[], rules: readonly DfmRule[], generation: number): Violation[] {
  const wallRules = rules.filter((r) => r.category === 'wall_thickness');
  if (wallRules.length === 0) return [];

  const violations: Violation[] = [];
  for (const wall of walls) {
    if (!Number.isFinite(wall.thicknessMm)) continue;
    for (const rule of wallRules) {
      if (checkRule(rule, wall.thicknessMm)) continue;
      violations.push(violationOf(
        rule,
        { kind: 'wall', faces: wall.faces, generation },
        wall.thicknessMm,
        wall.centroid,
      ));
    }
  }
  return violations;
}
