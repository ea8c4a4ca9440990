/** Minimal 3D vectors — plain tuples, helpers for clarity. */
export type Vec3 = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(a: Vec3, s: number): Vec3 {
  return [a[0] * s, a[1] * s, a[2] * s];
}

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function midpoint(a: Vec3, b: Vec3): Vec3 {
  return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2, (a[2] + b[2]) / 2];
}

/** Box volume in the box's own units cubed. */
export function boxVolume(bb: BoundingBox): number {
  return Math.abs(
    (bb.max[0] - bb.min[0]) *
    (bb.max[1] - bb.min[1]) *
    (bb.max[2] - bb.min[2])
  );
}

export function round(value: number, places: number): number {
  const f = 10 ** places;
  return Math.round(value * f) / f;
}
