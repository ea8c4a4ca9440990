/**
 * Fix Orchestrator — turns fixable violations into host edits.
 *
 *   const fixer = new FixOrchestrator(session, rules, policy);
 *   const results = await fixer.fixAll(report.violations);
 *
 * Order is fixed: hole resizes, then wall edits (both keep topology),
 * then fillets, one edge at a time with a fresh edge query after each
 * success. Every command goes through one queue, so two callers never
 * interleave edits on the same part.
 */

import type { FixPolicy } from '../config.js';
import { HostConnectionError, StaleReferenceError, errorMessage } from '../errors.js';
import { formatFeatureRef } from '../feature-ref.js';
import { createLogger } from '../log.js';
import type { RuleRegistry } from '../registry.js';
import type { GeometrySession } from '../session.js';
import type { Violation } from '../violation.js';
import { MIN_FILLET_MM, cornerFixPlan, sharpConcaveEdges } from './corner-fix.js';
import { HOLE_AT_TARGET_MM, holeFixPlan } from './hole-fix.js';
import { failedFix, runSaga, type FixResult, type SagaContext } from './saga.js';
import { wallFixPlan } from './wall-fix.js';

const log = createLogger('fix-orchestrator');

type FixKind = 'hole' | 'wall' | 'corner';

function fixKindOf(v: Violation): FixKind | null {
  switch (v.category) {
    case 'hole_size':
    case 'standard_hole':
      return 'hole';
    case 'wall_thickness':
      return 'wall';
    case 'corner_radius':
      return 'corner';
    default:
      return null;
  }
}

/** Keep one violation per feature: the one demanding the larger value. */
function dedupeByFeature(violations: readonly Violation[]): Violation[] {
  const byFeature = new Map<string, Violation>();
  for (const v of violations) {
    const key = formatFeatureRef(v.feature);
    const seen = byFeature.get(key);
    if (!seen || v.requiredValue > seen.requiredValue) byFeature.set(key, v);
  }
  return [...byFeature.values()];
}

export class FixOrchestrator {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly ctx: SagaContext;

  constructor(
    private readonly session: GeometrySession,
    private readonly rules: RuleRegistry,
    policy: FixPolicy,
  ) {
    this.ctx = { host: session.host, session, policy };
  }

  /** Fix one violation. Stale or unsupported references fail without touching the host. */
  fixSingle(violation: Violation): Promise<FixResult> {
    return this.enqueue(() => this.fixOne(violation));
  }

  /**
   * Fix every fixable violation in the list. Holes and walls yield one
   * result each; the fillet batch yields one summary result.
   */
  fixAll(violations: readonly Violation[]): Promise<FixResult[]> {
    return this.enqueue(() => this.runAll(violations));
  }

  // ─── Queue ────────────────────────────────────────────────────

  private enqueue<T>(job: () => Promise<T>): Promise<T> {
    const run = this.queue.then(job, job);
    // The caller sees failures through `run`; the queue only tracks completion.
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  // ─── Single fixes ─────────────────────────────────────────────

  private async fixOne(v: Violation): Promise<FixResult> {
    const feature = formatFeatureRef(v.feature);
    const base = { ruleId: v.ruleId, feature, oldValue: v.currentValue, newValue: v.requiredValue };

    try {
      this.session.assertCurrent(v.feature);
    } catch (err) {
      if (!(err instanceof StaleReferenceError)) throw err;
      return failedFix(base, err.message);
    }

    switch (fixKindOf(v)) {
      case 'hole':
        return this.fixHole(v);
      case 'wall':
        return this.fixWall(v);
      case 'corner': {
        if (v.feature.kind !== 'edge') return failedFix(base, `Expected an edge reference, got ${feature}`);
        return runSaga(
          cornerFixPlan(this.session, {
            ruleId: v.ruleId,
            feature,
            edge: v.feature.edge,
            radiusMm: Math.max(MIN_FILLET_MM, v.requiredValue),
          }),
          this.ctx,
        );
      }
      case null:
        return failedFix({ ...base, oldValue: 0, newValue: 0 }, `No auto-fix available for ${v.ruleId}`);
    }
  }

  private async fixHole(v: Violation): Promise<FixResult> {
    const feature = formatFeatureRef(v.feature);
    if (Math.abs(v.currentValue - v.requiredValue) < HOLE_AT_TARGET_MM) {
      return {
        success: true, ruleId: v.ruleId, feature,
        message: 'Hole already at target size',
        oldValue: v.currentValue, newValue: v.requiredValue, rolledBack: false,
      };
    }
    return runSaga(
      holeFixPlan(this.session, {
        ruleId: v.ruleId,
        feature,
        currentDiameterMm: v.currentValue,
        targetDiameterMm: v.requiredValue,
      }),
      this.ctx,
    );
  }

  private async fixWall(v: Violation): Promise<FixResult> {
    const feature = formatFeatureRef(v.feature);
    const base = { ruleId: v.ruleId, feature, oldValue: v.currentValue, newValue: v.requiredValue };

    if (this.rules.get(v.ruleId)?.comparison === 'max') {
      return failedFix(base, `No auto-fix available for ${v.ruleId}: thinning a wall is a manual edit`);
    }
    if (v.feature.kind !== 'wall') return failedFix(base, `Expected a wall reference, got ${feature}`);
    if (v.requiredValue - v.currentValue <= 0) {
      return { ...failedFix(base, 'Wall already at target thickness'), success: true };
    }
    return runSaga(
      wallFixPlan(this.session, {
        ruleId: v.ruleId,
        feature,
        faces: v.feature.faces,
        currentThicknessMm: v.currentValue,
        targetThicknessMm: v.requiredValue,
      }),
      this.ctx,
    );
  }

  // ─── Batch ────────────────────────────────────────────────────

  private async runAll(violations: readonly Violation[]): Promise<FixResult[]> {
    const fixable = violations.filter((v) => v.fixable);
    const holes = dedupeByFeature(fixable.filter((v) => fixKindOf(v) === 'hole'));
    const walls = dedupeByFeature(fixable.filter((v) => fixKindOf(v) === 'wall'));
    const corners = fixable.filter((v) => fixKindOf(v) === 'corner' && v.currentValue <= 0);

    log.info('Fixing violations', { holes: holes.length, walls: walls.length, corners: corners.length });

    const results: FixResult[] = [];
    for (const v of [...holes, ...walls]) {
      results.push(await this.fixOne(v));
    }
    if (corners.length > 0) {
      const radius = Math.max(MIN_FILLET_MM, ...corners.map((v) => v.requiredValue));
      const ruleId = corners[0].ruleId;
      results.push(await this.filletBatch(ruleId, corners.length, radius));
    }
    return results;
  }

  /**
   * Round by round: query the sharp concave edges, try them in order
   * until one fillets, then re-query (indices have shifted). Stops when
   * no edge is left, when a whole round fails, or at the round cap.
   */
  private async filletBatch(ruleId: string, requested: number, radiusMm: number): Promise<FixResult> {
    const feature = `${requested}_edges`;
    let filleted = 0;
    let failed = 0;

    for (let round = 0; round < this.ctx.policy.maxFilletRounds; round++) {
      let sharp: number[];
      try {
        sharp = sharpConcaveEdges(await this.session.edges(), radiusMm);
      } catch (err) {
        if (err instanceof HostConnectionError) throw err;
        log.warn('Cannot query edges, ending fillet batch', { reason: errorMessage(err) });
        break;
      }
      if (sharp.length === 0) break;

      let roundSucceeded = false;
      for (const edge of sharp) {
        const result = await runSaga(
          cornerFixPlan(this.session, { ruleId, feature: `edge_${edge}`, edge, radiusMm }),
          this.ctx,
        );
        if (result.success) {
          filleted++;
          roundSucceeded = true;
          break;
        }
        failed++;
      }
      if (!roundSucceeded) break;
    }

    const base = { ruleId, feature, oldValue: 0, newValue: radiusMm };
    if (filleted === 0) return failedFix(base, `Could not fillet any edges at ${radiusMm}mm`);
    return {
      ...base,
      success: true,
      message: `Filleted ${filleted} edge(s) at ${radiusMm}mm (${failed} skipped)`,
      rolledBack: false,
    };
  }
}
