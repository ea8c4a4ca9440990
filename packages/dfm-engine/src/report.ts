/**
 * Violation Report — analyzer output plus the manufacturability verdict
 * and a recommended process.
 */

import type { Body } from './geometry.js';
import { PROCESS_LABELS, type Process, type Severity } from './rules.js';
import type { BoundingBox } from './vec3.js';
import { violationToJSON, type Violation, type ViolationJSON } from './violation.js';

export interface ViolationReport {
  readonly partName: string;
  readonly violations: readonly Violation[];
  /** False iff any violation is critical. */
  readonly isManufacturable: boolean;
  readonly recommendedProcess: RecommendableProcess;
  readonly volumeCm3: number;
  readonly areaCm2: number;
  readonly boundingBox?: BoundingBox;
}

export const SEVERITY_WEIGHT: Record<Severity, number> = {
  critical: 10,
  warning: 3,
  suggestion: 1,
};

/** Processes a report can recommend. Injection molding is priced and simulated, never recommended. */
export const RECOMMENDABLE_PROCESSES = ['fdm', 'sla', 'cnc'] as const;
export type RecommendableProcess = typeof RECOMMENDABLE_PROCESSES[number];

function isRecommendable(p: Process): p is RecommendableProcess {
  return p !== 'injection_molding';
}

/**
 * Lowest summed severity weight wins; rules scoped to every process
 * count against all of them and injection-molding rules against none.
 * Ties go to the earlier process in RECOMMENDABLE_PROCESSES.
 *
 * Scores are not normalized by how many rules each process has.
 */
export function processScores(violations: readonly Violation[]): Record<RecommendableProcess, number> {
  const scores: Record<RecommendableProcess, number> = { fdm: 0, sla: 0, cnc: 0 };
  for (const v of violations) {
    const weight = SEVERITY_WEIGHT[v.severity];
    if (v.process === 'all') {
      for (const p of RECOMMENDABLE_PROCESSES) scores[p] += weight;
    } else if (isRecommendable(v.process)) {
      scores[v.process] += weight;
    }
  }
  return scores;
}

export function recommendProcess(violations: readonly Violation[]): RecommendableProcess {
  const scores = processScores(violations);
  let best: RecommendableProcess = RECOMMENDABLE_PROCESSES[0];
  for (const p of RECOMMENDABLE_PROCESSES) {
    if (scores[p] < scores[best]) best = p;
  }
  return best;
}

export function buildReport(body: Body | null, violations: readonly Violation[]): ViolationReport {
  return Object.freeze({
    partName: body?.name ?? 'Unknown',
    violations: Object.freeze([...violations]),
    isManufacturable: !violations.some((v) => v.severity === 'critical'),
    recommendedProcess: recommendProcess(violations),
    volumeCm3: body?.volumeCm3 ?? 0,
    areaCm2: body?.areaCm2 ?? 0,
    boundingBox: body?.boundingBox,
  });
}

/** Stand-in report when the host is unreachable: one critical system violation. */
export function systemFailureReport(reason: string): ViolationReport {
  const violation: Violation = {
    ruleId: 'SYS-001',
    category: 'system',
    severity: 'critical',
    message: `Cannot reach the CAD host: ${reason}`,
    feature: { kind: 'part' },
    currentValue: 0,
    requiredValue: 0,
    fixable: false,
    process: 'all',
  };
  return { ...buildReport(null, [violation]), partName: 'Error', isManufacturable: false };
}

export function countBySeverity(report: ViolationReport, severity: Severity): number {
  return report.violations.filter((v) => v.severity === severity).length;
}

export interface ViolationReportJSON {
  part_name: string;
  violations: ViolationJSON[];
  violation_count: number;
  critical_count: number;
  warning_count: number;
  suggestion_count: number;
  is_manufacturable: boolean;
  recommended_process: string;
  body_volume_cm3: number;
  body_area_cm2: number;
  bounding_box: BoundingBox | null;
}

export function reportToJSON(report: ViolationReport): ViolationReportJSON {
  return {
    part_name: report.partName,
    violations: report.violations.map(violationToJSON),
    violation_count: report.violations.length,
    critical_count: countBySeverity(report, 'critical'),
    warning_count: countBySeverity(report, 'warning'),
    suggestion_count: countBySeverity(report, 'suggestion'),
    is_manufacturable: report.isManufacturable,
    recommended_process: PROCESS_LABELS[report.recommendedProcess],
    body_volume_cm3: Math.round(report.volumeCm3 * 10_000) / 10_000,
    body_area_cm2: Math.round(report.areaCm2 * 10_000) / 10_000,
    bounding_box: report.boundingBox ?? null,
  };
}
