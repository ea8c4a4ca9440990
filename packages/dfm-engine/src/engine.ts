/**
 * DFM Engine — the host-facing entry point.
 *
 *   const engine = new DfmEngine(session, RuleRegistry.load(), DrillCatalog.load());
 *   const report = await engine.analyze('cnc');
 *
 * Every operation probes the host first. A host that is unreachable or
 * refuses a geometry query yields a report holding one critical system
 * violation; it is never a partial analysis.
 */

import { analyzeSnapshot } from './analyze.js';
import { compareCosts, type CostComparison } from './comparison.js';
import { estimateAll, type CostEstimate } from './cost.js';
import type { DrillCatalog } from './drills.js';
import { HostConnectionError, HostError, errorMessage } from './errors.js';
import { extractFeatures, type PartFeature } from './features.js';
import type { Body, GeometrySnapshot } from './geometry.js';
import { createLogger } from './log.js';
import type { RuleRegistry } from './registry.js';
import { systemFailureReport, countBySeverity, type ViolationReport } from './report.js';
import type { Process, ProcessScope } from './rules.js';
import type { GeometrySession } from './session.js';
import { simulateSwitch, type ProcessSwitch } from './simulator.js';
import { sustainabilityReport, type SustainabilityReport } from './sustainability.js';

const log = createLogger('engine');

export class DfmEngine {
  constructor(
    readonly session: GeometrySession,
    readonly rules: RuleRegistry,
    readonly drills: DrillCatalog,
  ) {}

  /** Snapshot the part after a successful probe. Throws HostConnectionError. */
  async snapshot(): Promise<GeometrySnapshot> {
    await this.ensureReachable();
    return this.session.snapshot();
  }

  /** Body metrics after a successful probe; throws when the design has no body. */
  async body(): Promise<Body> {
    await this.ensureReachable();
    const body = await this.session.body();
    if (!body) throw new Error('No body found in the active design');
    return body;
  }

  private async ensureReachable(): Promise<void> {
    if (!(await this.session.host.probe())) {
      throw new HostConnectionError('CAD host did not answer the reachability probe');
    }
  }

  async analyze(process: ProcessScope = 'all'): Promise<ViolationReport> {
    let snapshot: GeometrySnapshot;
    try {
      snapshot = await this.snapshot();
    } catch (err) {
      if (!(err instanceof HostError)) throw err;
      log.error('Analysis aborted, geometry unavailable', { reason: err.message });
      return systemFailureReport(errorMessage(err));
    }

    const report = analyzeSnapshot(snapshot, process, this.rules, this.drills);
    log.info('Analysis complete', {
      process,
      generation: snapshot.generation,
      violations: report.violations.length,
      critical: countBySeverity(report, 'critical'),
    });
    return report;
  }

  async features(): Promise<PartFeature[]> {
    return extractFeatures(await this.snapshot());
  }

  async estimateCosts(quantity = 1): Promise<CostEstimate[]> {
    return estimateAll(await this.body(), quantity);
  }

  async compareCosts(quantity = 1): Promise<CostComparison> {
    return compareCosts(await this.body(), quantity);
  }

  async sustainability(): Promise<SustainabilityReport> {
    return sustainabilityReport(await this.body());
  }

  async simulateSwitch(from: Process, to: Process): Promise<ProcessSwitch> {
    const snapshot = await this.snapshot();
    return simulateSwitch(snapshot, from, to, this.rules, this.drills);
  }
}
