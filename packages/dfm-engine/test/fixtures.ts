import type {
  Body, Edge, Face, GeometrySnapshot, Hole, MemoryPart, RuleRecordInput, Wall,
} from '../src/index.js';

// ─── Shared test geometry ─────────────────────────────────────

/** 10 cm³ part in a 3×3×2 cm box, 6 faces. */
export const PLATE: Body = {
  name: 'Plate',
  volumeCm3: 10,
  areaCm2: 42,
  faceCount: 6,
  edgeCount: 12,
  boundingBox: { min: [0, 0, 0], max: [3, 3, 2] },
};

export function snapshotOf(parts: {
  body?: Body | null;
  faces?: Face[];
  edges?: Edge[];
  walls?: Wall[];
  holes?: Hole[];
  generation?: number;
}): GeometrySnapshot {
  return {
    generation: parts.generation ?? 0,
    body: parts.body === undefined ? PLATE : parts.body,
    faces: parts.faces ?? [],
    edges: parts.edges ?? [],
    walls: parts.walls ?? [],
    holes: parts.holes ?? [],
  };
}

export function sharpEdge(index: number, concave = true): Edge {
  return { index, kind: 'line', lengthMm: 20, concave, start: [0, 0, 0], end: [20, 0, 0] };
}

export function rule(overrides: Partial<RuleRecordInput> & Pick<RuleRecordInput, 'id'>): RuleRecordInput {
  return {
    name: 'Test rule',
    process: 'fdm',
    severity: 'warning',
    threshold: 1,
    unit: 'mm',
    comparison: 'min',
    message_template: 'Value {value:.2f} vs {threshold:.1f}',
    fixable: false,
    category: 'wall_thickness',
    ...overrides,
  };
}

/**
 * 40×30×10 mm plate for host-backed tests. Face 2 is a pocket floor
 * 1.2 mm above the bottom face (wall_0_2); edges 0 and 1 are sharp
 * pocket corners; hole_3 is 4.3 mm, off the standard drill sizes.
 */
export const TEST_PART: MemoryPart = {
  name: 'Test plate',
  volumeCm3: 10.2,
  areaCm2: 40.6,
  boundingBox: { min: [0, 0, 0], max: [4, 3, 1] },
  faces: [
    { type: 'plane', areaCm2: 12, normal: [0, 0, -1], centroidMm: [20, 15, 0] },
    { type: 'plane', areaCm2: 12, normal: [0, 0, 1], centroidMm: [20, 15, 10] },
    { type: 'plane', areaCm2: 4, normal: [0, 0, 1], centroidMm: [20, 15, 1.2] },
    { type: 'cylinder', areaCm2: 0.7, radiusMm: 2.15, centroidMm: [8, 8, 5] },
  ],
  edges: [
    { type: 'line', lengthMm: 20, startMm: [10, 5, 1.2], endMm: [30, 5, 1.2], concave: true },
    { type: 'line', lengthMm: 10, startMm: [10, 5, 1.2], endMm: [10, 15, 1.2], concave: true },
    { type: 'line', lengthMm: 40, startMm: [0, 0, 0], endMm: [40, 0, 0], concave: false },
    { type: 'circle', lengthMm: 13.5, radiusMm: 2.15, startMm: [8, 8, 10], endMm: [8, 8, 10], concave: false },
  ],
  holes: [{ faceIndex: 3, diameterMm: 4.3, depthMm: 10, centroidMm: [8, 8, 5] }],
  cuts: [{ name: 'Pocket depth', floorFace: 2, depthMm: 8.8 }],
};
