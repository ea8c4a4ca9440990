/**
 * In-memory CAD host. Stands in for the real add-in offline and in tests.
 *
 *   const host = new MemoryCadHost(part);
 *   await host.filletEdges({ edgeIndices: [3], radiusMm: 1.5 });   // renumbers edges
 *   await host.undo();                                             // back to the original part
 *
 * Parts are described in mm; payloads come out in the add-in's units
 * (cm for body/face/edge metrics, mm for holes), same as the HTTP host.
 * Every command pushes the previous state onto an undo stack.
 */

import { HostError } from '../errors.js';
import { add, scale, type BoundingBox, type Vec3 } from '../vec3.js';
import type {
  AdjustCutDepthCommand, CadHost, FilletCommand, HostPayload, ResizeCircleCommand,
} from './host.js';

const MM_TO_CM = 0.1;
/** Sketch-circle match tolerance, mm of radius. */
const RADIUS_MATCH_MM = 0.05;

// ─── Part description ───────────────────────────────────────────

export interface MemoryFace {
  type: 'plane' | 'cylinder' | 'cone' | 'sphere' | 'torus';
  areaCm2: number;
  normal?: Vec3;
  radiusMm?: number;
  centroidMm?: Vec3;
}

export interface MemoryEdge {
  type: 'line' | 'circle' | 'arc';
  lengthMm: number;
  radiusMm?: number;
  startMm?: Vec3;
  endMm?: Vec3;
  concave: boolean;
}

export interface MemoryHole {
  faceIndex: number;
  diameterMm: number;
  depthMm: number;
  centroidMm?: Vec3;
}

/** A cut-extrude whose floor is `floorFace`; making it shallower moves that face along its normal. */
export interface MemoryCut {
  name: string;
  floorFace: number;
  depthMm: number;
}

export interface MemoryPart {
  name: string;
  volumeCm3: number;
  areaCm2: number;
  /** cm */
  boundingBox?: BoundingBox;
  faces: MemoryFace[];
  edges: MemoryEdge[];
  holes: MemoryHole[];
  cuts?: MemoryCut[];
}

export type MemoryCommand = 'resize_circle' | 'adjust_cut_depth' | 'fillet' | 'undo';

const cm = (p: Vec3 | undefined): Vec3 | null => (p ? scale(p, MM_TO_CM) : null);

// ─── Host ───────────────────────────────────────────────────────

export class MemoryCadHost implements CadHost {
  private part: MemoryPart;
  private readonly history: MemoryPart[] = [];
  /** Commands received, in order. */
  readonly commands: MemoryCommand[] = [];
  reachable = true;

  constructor(part: MemoryPart) {
    this.part = structuredClone(part);
  }

  /** Current state of the part. */
  get current(): MemoryPart {
    return structuredClone(this.part);
  }

  async probe(): Promise<boolean> {
    return this.reachable;
  }

  async bodyProperties(): Promise<HostPayload> {
    const p = this.part;
    return {
      bodies: [{
        name: p.name,
        volume_cm3: p.volumeCm3,
        area_cm2: p.areaCm2,
        face_count: p.faces.length,
        edge_count: p.edges.length,
        bounding_box: p.boundingBox,
      }],
    };
  }

  async faces(): Promise<HostPayload> {
    return {
      faces: this.part.faces.map((f, index) => ({
        index,
        type: f.type,
        area_cm2: f.areaCm2,
        normal: f.normal ?? null,
        radius_cm: f.radiusMm === undefined ? null : f.radiusMm * MM_TO_CM,
        centroid: cm(f.centroidMm),
      })),
    };
  }

  async edges(): Promise<HostPayload> {
    return {
      edges: this.part.edges.map((e, index) => ({
        index,
        type: e.type,
        length_cm: e.lengthMm * MM_TO_CM,
        radius_cm: e.radiusMm === undefined ? null : e.radiusMm * MM_TO_CM,
        start: cm(e.startMm),
        end: cm(e.endMm),
        is_concave: e.concave,
      })),
    };
  }

  async holes(): Promise<HostPayload> {
    return {
      holes: this.part.holes.map((h) => ({
        face_index: h.faceIndex,
        diameter_mm: h.diameterMm,
        depth_mm: h.depthMm,
        depth_to_diameter_ratio: h.depthMm > 0 ? h.depthMm / h.diameterMm : 0,
        centroid: cm(h.centroidMm),
      })),
    };
  }

  async resizeSketchCircle(cmd: ResizeCircleCommand): Promise<{ found: boolean }> {
    this.commands.push('resize_circle');
    const hole = this.part.holes.find(
      (h) => Math.abs(h.diameterMm / 2 - cmd.currentRadiusMm) < RADIUS_MATCH_MM,
    );
    if (!hole) return { found: false };
    this.checkpoint();
    hole.diameterMm = cmd.targetRadiusMm * 2;
    const face = this.part.faces[hole.faceIndex];
    if (face?.type === 'cylinder') face.radiusMm = cmd.targetRadiusMm;
    return { found: true };
  }

  async adjustCutDepth(cmd: AdjustCutDepthCommand): Promise<{ fixed: boolean; parameter?: string }> {
    this.commands.push('adjust_cut_depth');
    const cut = (this.part.cuts ?? []).find((c) => c.depthMm > cmd.increaseMm);
    if (!cut) return { fixed: false };
    const floor = this.part.faces[cut.floorFace];
    if (!floor?.normal || !floor.centroidMm) {
      throw new HostError(`Cut "${cut.name}" has no planar floor face`, 'execute_script');
    }
    this.checkpoint();
    cut.depthMm -= cmd.increaseMm;
    floor.centroidMm = add(floor.centroidMm, scale(floor.normal, cmd.increaseMm));
    return { fixed: true, parameter: cut.name };
  }

  /**
   * Each filleted edge becomes a concave arc of `radiusMm` plus two
   * tangent seam lines, appended after the untouched edges: every index
   * after the first filleted edge shifts.
   */
  async filletEdges(cmd: FilletCommand): Promise<void> {
    this.commands.push('fillet');
    if (!(cmd.radiusMm > 0)) {
      throw new HostError(`Fillet radius must be positive, got ${cmd.radiusMm}`, 'fillet_specific_edges');
    }
    const selected = new Set(cmd.edgeIndices);
    for (const i of selected) {
      if (!Number.isInteger(i) || i < 0 || i >= this.part.edges.length) {
        throw new HostError(`Edge index ${i} out of range`, 'fillet_specific_edges');
      }
    }
    this.checkpoint();

    const kept: MemoryEdge[] = [];
    const added: MemoryEdge[] = [];
    this.part.edges.forEach((e, i) => {
      if (!selected.has(i)) {
        kept.push(e);
        return;
      }
      added.push(
        { type: 'arc', lengthMm: e.lengthMm, radiusMm: cmd.radiusMm, startMm: e.startMm, endMm: e.endMm, concave: true },
        { type: 'line', lengthMm: e.lengthMm, startMm: e.startMm, endMm: e.endMm, concave: false },
        { type: 'line', lengthMm: e.lengthMm, startMm: e.startMm, endMm: e.endMm, concave: false },
      );
      this.part.faces.push({
        type: 'cylinder',
        areaCm2: (Math.PI / 2) * cmd.radiusMm * e.lengthMm * 0.01,
        radiusMm: cmd.radiusMm,
      });
    });
    this.part.edges = [...kept, ...added];
  }

  async undo(): Promise<void> {
    this.commands.push('undo');
    const previous = this.history.pop();
    if (!previous) throw new HostError('Nothing to undo', 'undo');
    this.part = previous;
  }

  private checkpoint(): void {
    this.history.push(structuredClone(this.part));
  }
}
