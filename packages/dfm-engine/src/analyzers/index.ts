/**
 * Analyzer pipeline — pure functions from a snapshot and a rule set to
 * violations. Safe to run concurrently against the same snapshot.
 */

import type { DrillCatalog } from '../drills.js';
import type { GeometrySnapshot } from '../geometry.js';
import type { DfmRule } from '../rules.js';
import type { Violation } from '../violation.js';
import { checkWalls } from './walls.js';
import { checkCorners } from './corners.js';
import { checkHoles } from './holes.js';
import { checkOverhangs } from './overhangs.js';

export { checkWalls } from './walls.js';
export { checkCorners, cornerRadius } from './corners.js';
export { checkHoles } from './holes.js';
export { checkOverhangs, overhangAngle } from './overhangs.js';

/** Walls, then corners, then holes, then overhangs. */
export function runAnalyzers(
  snapshot: GeometrySnapshot,
  rules: readonly DfmRule[],
  drills: DrillCatalog,
): Violation[] {
  const g = snapshot.generation;
  return [
    ...checkWalls(snapshot.walls, rules, g),
    ...checkCorners(snapshot.edges, rules, g),
    ...checkHoles(snapshot.holes, rules, drills, g),
    ...checkOverhangs(snapshot.faces, rules, g),
  ];
}
