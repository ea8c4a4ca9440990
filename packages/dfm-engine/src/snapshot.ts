/**
 * Snapshot parsing and wall inference.
 *
 * Host payloads are parsed record by record: a malformed face, edge or
 * hole is logged and skipped, the rest of the part is still analyzed.
 */

import { z } from 'zod';
import type { Body, Edge, Face, GeometrySnapshot, Hole, Wall } from './geometry.js';
import type { HostPayload } from './host/host.js';
import { createLogger } from './log.js';
import { dot, midpoint, round, scale, sub, type Vec3 } from './vec3.js';

const log = createLogger('snapshot');

const CM_TO_MM = 10;

// ─── Wire schemas ───────────────────────────────────────────────

const Vec3Schema = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);

const BodyRecord = z.object({
  name: z.string().default('Unknown'),
  volume_cm3: z.number().nonnegative().default(0),
  area_cm2: z.number().nonnegative().default(0),
  face_count: z.number().int().nonnegative().default(0),
  edge_count: z.number().int().nonnegative().default(0),
  bounding_box: z.object({ min: Vec3Schema, max: Vec3Schema }).optional(),
});

const FaceRecord = z.object({
  index: z.number().int().nonnegative(),
  type: z.enum(['plane', 'cylinder', 'cone', 'sphere', 'torus']),
  area_cm2: z.number().nonnegative().default(0),
  normal: Vec3Schema.nullish(),
  radius_cm: z.number().nonnegative().nullish(),
  centroid: Vec3Schema.nullish(),
});

const EdgeRecord = z.object({
  index: z.number().int().nonnegative(),
  type: z.enum(['line', 'circle', 'arc']),
  length_cm: z.number().nonnegative().default(0),
  radius_cm: z.number().nonnegative().nullish(),
  start: Vec3Schema.nullish(),
  end: Vec3Schema.nullish(),
  is_concave: z.boolean().default(false),
});

const HoleRecord = z.object({
  face_index: z.number().int().nonnegative(),
  diameter_mm: z.number().positive(),
  depth_mm: z.number(),
  depth_to_diameter_ratio: z.number().nonnegative().optional(),
  centroid: Vec3Schema.nullish(),
});

/** Lengths and radii lose float noise from the cm round trip. */
const mm = (cm: number): number => round(cm * CM_TO_MM, 6);
const toMm = (p: Vec3 | null | undefined): Vec3 | undefined => (p ? scale(p, CM_TO_MM) : undefined);

/** Validate each element of `payload[key]`, skipping the bad ones. */
function parseList<S extends z.ZodTypeAny>(payload: HostPayload, key: string, schema: S): z.output<S>[] {
  const list = payload[key];
  if (!Array.isArray(list)) {
    log.warn(`Host payload has no "${key}" list; treating it as empty`);
    return [];
  }
  const out: z.output<S>[] = [];
  list.forEach((item: unknown, i) => {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      out.push(parsed.data);
    } else {
      log.warn(`Skipping malformed ${key} record #${i}`, { issue: parsed.error.issues[0]?.message });
    }
  });
  return out;
}

// ─── Record parsers ─────────────────────────────────────────────

export function parseBody(payload: HostPayload): Body | null {
  const [first] = parseList(payload, 'bodies', BodyRecord);
  if (!first) return null;
  return {
    name: first.name,
    volumeCm3: first.volume_cm3,
    areaCm2: first.area_cm2,
    faceCount: first.face_count,
    edgeCount: first.edge_count,
    boundingBox: first.bounding_box,
  };
}

export function parseFaces(payload: HostPayload): Face[] {
  return parseList(payload, 'faces', FaceRecord).map((f) => ({
    index: f.index,
    kind: f.type,
    areaCm2: f.area_cm2,
    normal: f.normal ?? undefined,
    radiusMm: f.radius_cm == null ? undefined : mm(f.radius_cm),
    centroid: toMm(f.centroid),
  }));
}

export function parseEdges(payload: HostPayload): Edge[] {
  return parseList(payload, 'edges', EdgeRecord).map((e) => ({
    index: e.index,
    kind: e.type,
    lengthMm: mm(e.length_cm),
    radiusMm: e.radius_cm == null ? undefined : mm(e.radius_cm),
    start: toMm(e.start),
    end: toMm(e.end),
    concave: e.is_concave,
  }));
}

export function parseHoles(payload: HostPayload): Hole[] {
  return parseList(payload, 'holes', HoleRecord).map((h) => ({
    faceIndex: h.face_index,
    diameterMm: h.diameter_mm,
    depthMm: h.depth_mm,
    depthToDiameter: h.depth_to_diameter_ratio ?? (h.depth_mm > 0 ? h.depth_mm / h.diameter_mm : 0),
    centroid: toMm(h.centroid),
  }));
}

// ─── Wall inference ─────────────────────────────────────────────

const PARALLEL_TOLERANCE = 0.05;
const MIN_WALL_MM = 0.01;

interface Partner {
  face: number;
  thicknessMm: number;
  centroid: Vec3;
}

/**
 * Pair each planar face with its closest parallel (or anti-parallel)
 * neighbour. Each pair is reported once, lower face index first.
 */
export function detectWalls(faces: readonly Face[]): Wall[] {
  const planar = faces.filter(
    (f): f is Face & { normal: Vec3; centroid: Vec3 } =>
      f.kind === 'plane' && f.normal !== undefined && f.centroid !== undefined,
  );

  const closest = new Map<number, Partner>();
  const offer = (face: number, partner: Partner) => {
    const current = closest.get(face);
    if (!current || partner.thicknessMm < current.thicknessMm) closest.set(face, partner);
  };

  for (let i = 0; i < planar.length; i++) {
    const f1 = planar[i];
    for (let j = i + 1; j < planar.length; j++) {
      const f2 = planar[j];
      if (Math.abs(Math.abs(dot(f1.normal, f2.normal)) - 1) > PARALLEL_TOLERANCE) continue;
      const thicknessMm = round(Math.abs(dot(f2.normal, sub(f1.centroid, f2.centroid))), 2);
      if (thicknessMm < MIN_WALL_MM) continue; // coplanar
      const centroid = midpoint(f1.centroid, f2.centroid);
      offer(f1.index, { face: f2.index, thicknessMm, centroid });
      offer(f2.index, { face: f1.index, thicknessMm, centroid });
    }
  }

  const walls: Wall[] = [];
  const seen = new Set<string>();
  for (const [face, partner] of closest) {
    const pair: [number, number] = face < partner.face ? [face, partner.face] : [partner.face, face];
    const key = `${pair[0]}_${pair[1]}`;
    if (seen.has(key)) continue;
    seen.add(key);
    walls.push({ faces: pair, thicknessMm: partner.thicknessMm, centroid: partner.centroid });
  }
  return walls;
}

// ─── Assembly ───────────────────────────────────────────────────

export interface SnapshotPayloads {
  body: HostPayload;
  faces: HostPayload;
  edges: HostPayload;
  holes: HostPayload;
}

export function buildSnapshot(payloads: SnapshotPayloads, generation: number): GeometrySnapshot {
  const faces = parseFaces(payloads.faces);
  return {
    generation,
    body: parseBody(payloads.body),
    faces,
    edges: parseEdges(payloads.edges),
    walls: detectWalls(faces),
    holes: parseHoles(payloads.holes),
  };
}
