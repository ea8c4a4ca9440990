/**
 * Feature references — which face, edge, hole or wall a violation is about.
 *
 *   { kind: 'wall', faces: [5, 11], generation: 0 }  ⇄  "wall_5_11"
 *
 * A reference is only valid inside the geometry generation it was
 * issued in. The string form is for display and tool I/O.
 */

export type FeatureRef =
  | { kind: 'wall'; faces: [number, number]; generation: number }
  | { kind: 'edge'; edge: number; generation: number }
  | { kind: 'hole'; face: number; generation: number }
  | { kind: 'face'; face: number; generation: number }
  | { kind: 'part' };

export function formatFeatureRef(ref: FeatureRef): string {
  switch (ref.kind) {
    case 'wall': return `wall_${ref.faces[0]}_${ref.faces[1]}`;
    case 'edge': return `edge_${ref.edge}`;
    case 'hole': return `hole_${ref.face}`;
    case 'face': return `face_${ref.face}`;
    case 'part': return 'system';
  }
}

const WALL_RE = /^wall_(\d+)_(\d+)$/;
const INDEXED_RE = /^(edge|hole|face)_(\d+)$/;

/**
 * Parse the display form back into a reference stamped with `generation`.
 * Returns null for anything that is not a well-formed reference.
 */
export function parseFeatureRef(text: string, generation: number): FeatureRef | null {
  if (text === 'system') return { kind: 'part' };

  const wall = WALL_RE.exec(text);
  if (wall) {
    const a = Number(wall[1]);
    const b = Number(wall[2]);
    return { kind: 'wall', faces: a <= b ? [a, b] : [b, a], generation };
  }

  const indexed = INDEXED_RE.exec(text);
  if (!indexed) return null;
  const index = Number(indexed[2]);
  switch (indexed[1]) {
    case 'edge': return { kind: 'edge', edge: index, generation };
    case 'hole': return { kind: 'hole', face: index, generation };
    default: return { kind: 'face', face: index, generation };
  }
}

/** Generation of a reference; the part itself never goes stale. */
export function refGeneration(ref: FeatureRef): number | null {
  return ref.kind === 'part' ? null : ref.generation;
}
