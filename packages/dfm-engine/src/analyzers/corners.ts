import type { Edge } from '../geometry.js';
import type { DfmRule } from '../rules.js';
import { checkRule } from '../rules.js';
import { violationOf, type Violation } from '../violation.js';

/**
 * Effective fillet radius of a concave edge: 0 for a straight edge,
 * the measured radius for an arc or circle. Null when unmeasurable.
 */
export function cornerRadius(edge: Edge): number | null {
  if (edge.kind === 'line') return 0;
  if (edge.radiusMm === undefined || !Number.isFinite(edge.radiusMm)) return null;
  return edge.radiusMm;
}

/** Internal corners only — a convex edge never limits a cutter. */
export function checkCorners(edges: readonly Edge[], rules: readonly DfmRule[], generation: number): Violation[] {
  const cornerRules = rules.filter((r) => r.category === 'corner_radius');
  if (cornerRules.length === 0) return [];

  const violations: Violation[] = [];
  for (const edge of edges) {
    if (!edge.concave) continue;
    const radius = cornerRadius(edge);
    if (radius === null) continue;
    for (const rule of cornerRules) {
      if (checkRule(rule, radius)) continue;
      violations.push(violationOf(
        rule,
        { kind: 'edge', edge: edge.index, generation },
        radius,
        edge.start,
      ));
    }
  }
  return violations;
}
