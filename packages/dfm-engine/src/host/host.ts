/**
 * CAD host interface — the only door to real geometry.
 *
 * Queries return the host's flat JSON payloads untouched; parsing and
 * per-record validation happen in the snapshot layer. Commands take mm.
 */

export type HostPayload = Record<string, unknown>;

export interface ResizeCircleCommand {
  currentRadiusMm: number;
  targetRadiusMm: number;
}

export interface AdjustCutDepthCommand {
  /** How much thicker the wall must get, in mm. */
  increaseMm: number;
}

export interface FilletCommand {
  edgeIndices: number[];
  radiusMm: number;
}

export interface CadHost {
  /** Reachability probe. Never throws. */
  probe(): Promise<boolean>;

  bodyProperties(): Promise<HostPayload>;
  faces(): Promise<HostPayload>;
  edges(): Promise<HostPayload>;
  holes(): Promise<HostPayload>;

  /** Resize the first sketch circle matching the current radius. */
  resizeSketchCircle(cmd: ResizeCircleCommand): Promise<{ found: boolean }>;
  /** Make a cut feature shallower so the wall behind it thickens. */
  adjustCutDepth(cmd: AdjustCutDepthCommand): Promise<{ fixed: boolean; parameter?: string }>;
  filletEdges(cmd: FilletCommand): Promise<void>;
  undo(): Promise<void>;
}
