/**
 * Geometry Snapshot — typed facts about one solid body, as extracted by
 * the CAD host. No topology lives here, only scalar/vector summaries.
 *
 * Units: body metrics stay in host units (cm³, cm², cm) for the cost
 * model; every face/edge/hole/wall length and point is in mm.
 *
 * Face and edge indices are only meaningful inside the snapshot's
 * `generation`: a topology-changing edit renumbers them.
 */

import type { Vec3, BoundingBox } from './vec3.js';

// ─── Records ────────────────────────────────────────────────────

export type FaceKind = 'plane' | 'cylinder' | 'cone' | 'sphere' | 'torus';

export type EdgeKind = 'line' | 'circle' | 'arc';

export interface Body {
  name: string;
  volumeCm3: number;
  areaCm2: number;
  faceCount: number;
  edgeCount: number;
  /** In cm. Absent when the host could not compute it. */
  boundingBox?: BoundingBox;
}

export interface Face {
  index: number;
  kind: FaceKind;
  areaCm2: number;
  /** Unit normal, planar faces only. */
  normal?: Vec3;
  /** Curved faces only. */
  radiusMm?: number;
  centroid?: Vec3;
}

export interface Edge {
  index: number;
  kind: EdgeKind;
  lengthMm: number;
  radiusMm?: number;
  start?: Vec3;
  end?: Vec3;
  /** Re-entrant transition between its two faces. */
  concave: boolean;
}

/** Two parallel planar faces and the material between them. */
export interface Wall {
  /** Always ordered low index first. */
  faces: [number, number];
  thicknessMm: number;
  centroid?: Vec3;
}

export interface Hole {
  faceIndex: number;
  diameterMm: number;
  /** Non-positive when the host could not tell blind from through. */
  depthMm: number;
  depthToDiameter: number;
  centroid?: Vec3;
}

export interface GeometrySnapshot {
  generation: number;
  body: Body | null;
  faces: readonly Face[];
  edges: readonly Edge[];
  walls: readonly Wall[];
  holes: readonly Hole[];
}
