import type { Wall } from '../geometry.js';
import type { GeometrySession } from '../session.js';
import type { FixPlan } from './saga.js';

/** Slack allowed when reading back a thickened wall. */
export const WALL_MATCH_MM = 0.2;

export interface WallFixRequest {
  ruleId: string;
  feature: string;
  faces: [number, number];
  currentThicknessMm: number;
  targetThicknessMm: number;
}

/**
 * Thicken a wall by making the cut behind it shallower by the missing
 * amount. Passes when a wall on either face reaches the target, or when
 * the thinnest wall on the part does (the cut may have renumbered faces).
 */
export function wallFixPlan(session: GeometrySession, req: WallFixRequest): FixPlan<Wall[]> {
  const { currentThicknessMm: current, targetThicknessMm: target } = req;
  const increase = target - current;
  const [a, b] = req.faces;
  const reached = (w: Wall) => w.thicknessMm >= target - WALL_MATCH_MM;

  return {
    ruleId: req.ruleId,
    feature: req.feature,
    oldValue: current,
    newValue: target,
    changesTopology: false,

    snapshot: () => session.walls(),

    async apply() {
      const res = await session.host.adjustCutDepth({ increaseMm: increase });
      return res.fixed
        ? { applied: true }
        : {
            applied: false,
            reason:
              `Cannot auto-fix wall thickness (${current.toFixed(1)}mm -> ${target.toFixed(1)}mm). ` +
              `Manual fix: move the pocket ${increase.toFixed(1)}mm further from the outer face.`,
          };
    },

    async validate() {
      const walls = await session.walls();
      if (walls.some((w) => (w.faces.includes(a) || w.faces.includes(b)) && reached(w))) return true;
      const thinnest = Math.min(...walls.map((w) => w.thicknessMm));
      return walls.length > 0 && thinnest >= target - WALL_MATCH_MM;
    },

    succeeded: `Thickened wall from ${current.toFixed(2)}mm to ${target.toFixed(1)}mm`,
    notObserved:
      `Adjusted cut depth but the wall did not reach ${target.toFixed(1)}mm. ` +
      `Manual fix: reduce the pocket depth by ${increase.toFixed(1)}mm`,
  };
}
