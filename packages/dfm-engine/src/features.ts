/**
 * Feature extraction — a readable inventory of what the part is made of.
 *
 *   extractFeatures(snapshot)
 *     →  [{ id: 'hole_12', kind: 'hole', subtype: 'blind', ... }, { id: 'wall_3_7', kind: 'wall', ... }]
 *
 * Holes are deep past 10:1 depth-to-diameter, blind when depth is known,
 * through otherwise. Fillets are arc/circle edges that already carry a radius.
 */

import { formatFeatureRef } from './feature-ref.js';
import type { GeometrySnapshot } from './geometry.js';
import { round, type Vec3 } from './vec3.js';

const DEEP_HOLE_RATIO = 10;

export type HoleSubtype = 'deep' | 'blind' | 'through';

export type PartFeature =
  | { id: string; kind: 'hole'; subtype: HoleSubtype; diameterMm: number; depthMm: number; location?: Vec3 }
  | { id: string; kind: 'wall'; thicknessMm: number; location?: Vec3 }
  | { id: string; kind: 'fillet'; radiusMm: number; location?: Vec3 };

export function holeSubtype(depthMm: number, depthToDiameter: number): HoleSubtype {
  if (depthToDiameter > DEEP_HOLE_RATIO) return 'deep';
  return depthMm > 0 ? 'blind' : 'through';
}

export function extractFeatures(snapshot: GeometrySnapshot): PartFeature[] {
  const g = snapshot.generation;
  const out: PartFeature[] = [];

  for (const h of snapshot.holes) {
    out.push({
      id: formatFeatureRef({ kind: 'hole', face: h.faceIndex, generation: g }),
      kind: 'hole',
      subtype: holeSubtype(h.depthMm, h.depthToDiameter),
      diameterMm: h.diameterMm,
      depthMm: h.depthMm,
      location: h.centroid,
    });
  }

  for (const w of snapshot.walls) {
    out.push({
      id: formatFeatureRef({ kind: 'wall', faces: w.faces, generation: g }),
      kind: 'wall',
      thicknessMm: w.thicknessMm,
      location: w.centroid,
    });
  }

  for (const e of snapshot.edges) {
    if (e.kind === 'line' || e.radiusMm === undefined || e.radiusMm <= 0) continue;
    out.push({
      id: formatFeatureRef({ kind: 'edge', edge: e.index, generation: g }),
      kind: 'fillet',
      radiusMm: e.radiusMm,
      location: e.start,
    });
  }

  return out;
}

/** Snake-case wire form, lengths rounded to 0.01 mm. */
export function featureToJSON(f: PartFeature): Record<string, unknown> {
  const location = f.location ?? null;
  switch (f.kind) {
    case 'hole':
      return {
        feature_id: f.id, type: 'hole', subtype: f.subtype,
        diameter_mm: round(f.diameterMm, 2), depth_mm: round(f.depthMm, 2), location,
      };
    case 'wall':
      return { feature_id: f.id, type: 'wall', thickness_mm: round(f.thicknessMm, 2), location };
    case 'fillet':
      return { feature_id: f.id, type: 'fillet', radius_mm: round(f.radiusMm, 2), location };
  }
}
