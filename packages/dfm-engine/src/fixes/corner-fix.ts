import type { Edge } from '../geometry.js';
import type { GeometrySession } from '../session.js';
import type { FixPlan } from './saga.js';

/** Smallest fillet ever applied to an internal corner, mm. */
export const MIN_FILLET_MM = 1.5;

export interface CornerFixRequest {
  ruleId: string;
  feature: string;
  edge: number;
  radiusMm: number;
}

/**
 * Fillet one edge. The host reports no error when a fillet cannot be
 * computed, so the only evidence is the edge count changing. When it
 * never changes nothing was applied, and no undo is issued.
 */
export function cornerFixPlan(session: GeometrySession, req: CornerFixRequest): FixPlan<number> {
  const edgeCount = async () => (await session.edges()).length;

  return {
    ruleId: req.ruleId,
    feature: req.feature,
    oldValue: 0,
    newValue: req.radiusMm,
    changesTopology: true,

    snapshot: edgeCount,

    async apply() {
      await session.host.filletEdges({ edgeIndices: [req.edge], radiusMm: req.radiusMm });
      return { applied: true };
    },

    async validate(before) {
      return (await edgeCount()) !== before;
    },

    async compensate(before) {
      if ((await edgeCount()) === before) return false;
      await session.host.undo();
      return true;
    },

    succeeded: `Added ${req.radiusMm}mm fillet to edge ${req.edge}`,
    notObserved: `Fillet could not be applied to edge ${req.edge} (geometry constraint)`,
  };
}

/** Concave edges still sharper than `radiusMm`: straight, or arcs below it. */
export function sharpConcaveEdges(edges: readonly Edge[], radiusMm: number): number[] {
  return edges
    .filter((e) => e.concave)
    .filter((e) => e.kind === 'line' || (e.radiusMm ?? 0) < radiusMm)
    .map((e) => e.index);
}
