import type { Face } from '../geometry.js';
import type { DfmRule } from '../rules.js';
import { checkRule } from '../rules.js';
import { violationOf, type Violation } from '../violation.js';

/**
 * Overhang of a planar face, in degrees from vertical, or null when the
 * face does not point downward. A face pointing straight down is 90°.
 *
 *   overhang = 90 − degrees(acos(clamp(−nz, −1, 1)))
 */
export function overhangAngle(face: Face): number | null {
  if (face.kind !== 'plane' || !face.normal) return null;
  const nz = face.normal[2];
  if (!Number.isFinite(nz) || nz >= 0) return null;
  const fromDown = Math.acos(Math.max(-1, Math.min(1, -nz))) * 180 / Math.PI;
  const angle = 90 - fromDown;
  return angle < 0 ? null : angle;
}

export function checkOverhangs(faces: readonly Face[], rules: readonly DfmRule[], generation: number): Violation[] {
  const overhangRules = rules.filter((r) => r.category === 'overhang');
  if (overhangRules.length === 0) return [];

  const violations: Violation[] = [];
  for (const face of faces) {
    const angle = overhangAngle(face);
    if (angle === null) continue;
    for (const rule of overhangRules) {
      if (checkRule(rule, angle)) continue;
      violations.push(violationOf(
        rule,
        { kind: 'face', face: face.index, generation },
        angle,
        face.centroid,
      ));
    }
  }
  return violations;
}
