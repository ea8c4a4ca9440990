import { describe, it, expect } from 'vitest';
import {
  DrillCatalog, RuleRegistry, planRedesign, simulateSwitch, switchSummary, switchToJSON, violationOf,
} from '../src/index.js';
import type { FeatureRef, Violation } from '../src/index.js';
import { sharpEdge, snapshotOf } from './fixtures.js';

const registry = RuleRegistry.load();
const drills = DrillCatalog.load();

const cornerAndHole = snapshotOf({
  edges: [sharpEdge(5)],
  holes: [{ faceIndex: 8, diameterMm: 4.3, depthMm: 0, depthToDiameter: 0 }],
});

describe('simulateSwitch', () => {
  it('CNC to FDM resolves a sharp internal corner', () => {
    const s = simulateSwitch(snapshotOf({ edges: [sharpEdge(5)] }), 'cnc', 'fdm', registry, drills);
    expect(s.removed.map((v) => v.ruleId)).toEqual(['CNC-001']);
    expect(s.introduced).toEqual([]);
    expect(s.persistent).toEqual([]);
    expect(s.redesignSteps).toEqual([]);
    expect(s.costDelta).toBeCloseTo(0.8333 - 70.18, 3);
    expect(s.summary).toBe('Switching from CNC to FDM: 1 violation(s) resolved. Saves $69.35 per unit.');
  });

  it('splits violations into removed, introduced and persistent', () => {
    const s = simulateSwitch(cornerAndHole, 'cnc', 'fdm', registry, drills);
    expect(s.removed.map((v) => v.ruleId)).toEqual(['CNC-001']);
    expect(s.persistent.map((v) => v.ruleId)).toEqual(['GEN-001']);
    expect(s.introduced).toEqual([]);
  });

  it('plans redesign steps for what the new process introduces', () => {
    const s = simulateSwitch(cornerAndHole, 'fdm', 'cnc', registry, drills);
    expect(s.summary).toBe('Switching from FDM to CNC: 1 new violation(s) introduced. Costs $69.35 more per unit.');
    expect(s.redesignSteps).toEqual([{
      step: 1,
      action: 'Fillet internal corner',
      detail: 'Round the corner to at least 1.5mm. An end mill leaves its own radius in every internal corner.',
      effort: 'low',
      autoFixable: true,
      severity: 'critical',
      ruleId: 'CNC-001',
      featureId: 'edge_5',
    }]);
  });

  it('labels processes and rounds the delta in the wire form', () => {
    const json = switchToJSON(simulateSwitch(cornerAndHole, 'fdm', 'cnc', registry, drills));
    expect(json.from_process).toBe('FDM');
    expect(json.to_process).toBe('CNC');
    expect(json.cost_delta).toBe(69.35);
    expect(json.new_violations.map((v) => v.feature_id)).toEqual(['edge_5']);
    expect(json.persistent_violations.map((v) => v.rule_id)).toEqual(['GEN-001']);
    expect(json.redesign_steps[0].auto_fixable).toBe(true);
  });
});

describe('switchSummary', () => {
  it('reports no change and equal cost', () => {
    expect(switchSummary('sla', 'fdm', 0, 0, 0)).toBe('Switching from SLA to FDM: No change in violations. Same cost.');
  });

  it('reports both directions in one sentence', () => {
    expect(switchSummary('fdm', 'injection_molding', 2, 3, 7999.589))
      .toBe('Switching from FDM to Injection Molding: 2 violation(s) resolved. 3 new violation(s) introduced. Costs $7999.59 more per unit.');
  });
});

describe('planRedesign', () => {
  const face = (n: number): FeatureRef => ({ kind: 'face', face: n, generation: 0 });

  function v(ruleId: string, n: number, current = 0): Violation {
    const rule = registry.get(ruleId);
    if (!rule) throw new Error(`missing rule ${ruleId}`);
    return violationOf(rule, face(n), current);
  }

  it('orders by severity, then structural work first', () => {
    const steps = planRedesign([
      v('GEN-001', 1, 4.3), v('CNC-003', 2, 6), v('FDM-002', 3, 60), v('CNC-001', 4), v('FDM-001', 5, 1),
    ]);
    expect(steps.map((s) => [s.step, s.ruleId])).toEqual([
      [1, 'FDM-001'], [2, 'CNC-001'], [3, 'CNC-003'], [4, 'FDM-002'], [5, 'GEN-001'],
    ]);
    expect(steps[0].detail).toBe(
      'Thicken the wall from 1.0mm to at least 2.0mm. Walls thinner than about two extrusion widths print unreliably.',
    );
  });

  it('keeps discovery order among equal keys', () => {
    const steps = planRedesign([v('FDM-002', 9, 50), v('FDM-002', 3, 60)]);
    expect(steps.map((s) => s.featureId)).toEqual(['face_9', 'face_3']);
  });

  it('falls back to a generic step for rules without a template', () => {
    const custom: Violation = {
      ...v('FDM-001', 7, 1),
      ruleId: 'ACME-001',
      message: 'Custom wall check failed',
    };
    const steps = planRedesign([custom, v('CNC-001', 2)]);
    expect(steps.map((s) => s.ruleId)).toEqual(['CNC-001', 'ACME-001']);
    expect(steps[1]).toMatchObject({
      action: 'Address ACME-001 violation',
      detail: 'Custom wall check failed',
      effort: 'medium',
      autoFixable: true,
    });
  });
});
