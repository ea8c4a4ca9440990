import { describe, it, expect } from 'vitest';
import {
  RuleRegistry, buildReport, processScores, recommendProcess,
  reportToJSON, systemFailureReport, violationOf,
} from '../src/index.js';
import type { Violation } from '../src/index.js';
import { PLATE } from './fixtures.js';

const registry = RuleRegistry.load();

function violation(ruleId: string, face = 0): Violation {
  const rule = registry.get(ruleId);
  if (!rule) throw new Error(`missing rule ${ruleId}`);
  return violationOf(rule, { kind: 'face', face, generation: 0 }, 0);
}

describe('buildReport', () => {
  it('is manufacturable without violations', () => {
    const report = buildReport(PLATE, []);
    expect(report.isManufacturable).toBe(true);
    expect(report.partName).toBe('Plate');
    expect(report.volumeCm3).toBe(10);
    expect(report.recommendedProcess).toBe('fdm');
  });

  it('stays manufacturable with only warnings and suggestions', () => {
    const report = buildReport(PLATE, [violation('FDM-002'), violation('GEN-001')]);
    expect(report.isManufacturable).toBe(true);
  });

  it('a single critical violation makes the part unmanufacturable', () => {
    const report = buildReport(PLATE, [violation('GEN-001'), violation('CNC-001')]);
    expect(report.isManufacturable).toBe(false);
  });

  it('adding violations never restores manufacturability', () => {
    const extra = [violation('FDM-002'), violation('SLA-002'), violation('GEN-001')];
    let violations = [violation('IM-003')];
    for (const v of extra) {
      violations = [...violations, v];
      expect(buildReport(PLATE, violations).isManufacturable).toBe(false);
    }
  });

  it('falls back to a placeholder name without a body', () => {
    const report = buildReport(null, []);
    expect(report.partName).toBe('Unknown');
    expect(report.volumeCm3).toBe(0);
    expect(report.boundingBox).toBeUndefined();
  });

  it('is frozen', () => {
    const report = buildReport(PLATE, [violation('FDM-001')]);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.violations)).toBe(true);
  });
});

describe('recommendProcess', () => {
  it('weights severities and charges each process for its own rules', () => {
    const scores = processScores([violation('FDM-001'), violation('CNC-003'), violation('GEN-001')]);
    expect(scores).toEqual({ fdm: 11, sla: 1, cnc: 4 });
  });

  it('leaves injection molding out of the running', () => {
    expect(recommendProcess([violation('FDM-002'), violation('SLA-002'), violation('CNC-003')])).toBe('sla');
    expect(recommendProcess([violation('FDM-001'), violation('SLA-001'), violation('CNC-001')])).toBe('fdm');
    expect(processScores([violation('IM-001'), violation('IM-004')])).toEqual({ fdm: 0, sla: 0, cnc: 0 });
  });

  it('picks the lowest score, ties going to the earlier process', () => {
    expect(recommendProcess([violation('FDM-001')])).toBe('sla');
    expect(recommendProcess([violation('FDM-001'), violation('SLA-001')])).toBe('cnc');
    expect(recommendProcess([violation('GEN-001')])).toBe('fdm');
  });
});

describe('systemFailureReport', () => {
  it('carries one critical system violation', () => {
    const report = systemFailureReport('connection refused');
    expect(report.partName).toBe('Error');
    expect(report.isManufacturable).toBe(false);
    expect(report.violations).toHaveLength(1);

    const [v] = report.violations;
    expect(v.ruleId).toBe('SYS-001');
    expect(v.category).toBe('system');
    expect(v.severity).toBe('critical');
    expect(v.message).toBe('Cannot reach the CAD host: connection refused');
    expect(v.fixable).toBe(false);
  });
});

describe('reportToJSON', () => {
  it('counts by severity and labels the process', () => {
    const json = reportToJSON(buildReport(PLATE, [
      violation('FDM-001'), violation('FDM-002'), violation('GEN-001', 3),
    ]));
    expect(json.violation_count).toBe(3);
    expect(json.critical_count).toBe(1);
    expect(json.warning_count).toBe(1);
    expect(json.suggestion_count).toBe(1);
    expect(json.recommended_process).toBe('SLA');
    expect(json.violations[2].feature_id).toBe('face_3');
    expect(json.bounding_box).toEqual({ min: [0, 0, 0], max: [3, 3, 2] });
  });
});
