/**
 * Server context — everything the tools share, built once from config.
 *
 * One session, one engine, one fix queue per server: tools that edit the
 * part never interleave, and every analysis reads the same generation
 * counter the fixes bump.
 */

import {
  DfmEngine, DrillCatalog, FixOrchestrator, GeometrySession, HttpCadHost, MachineCatalog, MaterialCatalog,
  MemoryCadHost, RuleRegistry,
  type CadHost, type Config, type MemoryPart,
} from '@partcheck/dfm-engine';

export interface ServerContext {
  hostKind: Config['host']['kind'];
  engine: DfmEngine;
  fixer: FixOrchestrator;
  materials: MaterialCatalog;
  machines: MachineCatalog;
}

/** Placeholder part for `CAD_HOST=memory`: a 40×30×10 mm plate with a pocket and a hole. */
export const DEMO_PART: MemoryPart = {
  name: 'Demo plate',
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

export function createHost(config: Config): CadHost {
  return config.host.kind === 'memory'
    ? new MemoryCadHost(DEMO_PART)
    : new HttpCadHost(config.host);
}

export function createContext(config: Config, host: CadHost = createHost(config)): ServerContext {
  const rules = RuleRegistry.load(config.rulesPath);
  const drills = DrillCatalog.load(config.drillsPath);
  const session = new GeometrySession(host);
  return {
    hostKind: config.host.kind,
    engine: new DfmEngine(session, rules, drills),
    fixer: new FixOrchestrator(session, rules, config.fix),
    materials: MaterialCatalog.load(config.materialsPath),
    machines: MachineCatalog.load(config.machinesPath),
  };
}
