import type { Hole } from '../geometry.js';
import type { GeometrySession } from '../session.js';
import type { FixPlan } from './saga.js';

/** A resized hole counts once it reads back within this of the target. */
export const HOLE_MATCH_MM = 0.2;
/** Closer than this to the target, the hole is left alone. */
export const HOLE_AT_TARGET_MM = 0.01;

export interface HoleFixRequest {
  ruleId: string;
  feature: string;
  currentDiameterMm: number;
  targetDiameterMm: number;
}

const isSame = (a: Hole, b: Hole) =>
  a.faceIndex === b.faceIndex && Math.abs(a.diameterMm - b.diameterMm) < HOLE_AT_TARGET_MM;

/**
 * Resize the sketch circle behind a hole. Validation looks for a hole
 * near the target diameter that was not already there before the edit.
 */
export function holeFixPlan(session: GeometrySession, req: HoleFixRequest): FixPlan<Hole[]> {
  const { currentDiameterMm: current, targetDiameterMm: target } = req;
  return {
    ruleId: req.ruleId,
    feature: req.feature,
    oldValue: current,
    newValue: target,
    changesTopology: false,

    snapshot: () => session.holes(),

    async apply() {
      const { found } = await session.host.resizeSketchCircle({
        currentRadiusMm: current / 2,
        targetRadiusMm: target / 2,
      });
      return found
        ? { applied: true }
        : {
            applied: false,
            reason:
              `No sketch circle found for the ${current.toFixed(2)}mm hole. ` +
              `Manual fix: change the hole to ${target.toFixed(1)}mm.`,
          };
    },

    async validate(before) {
      const after = await session.holes();
      return after.some(
        (h) => Math.abs(h.diameterMm - target) < HOLE_MATCH_MM && !before.some((b) => isSame(b, h)),
      );
    },

    succeeded: `Resized hole from ${current.toFixed(2)}mm to ${target.toFixed(1)}mm`,
    notObserved: 'Circle resized but hole geometry did not update',
  };
}
