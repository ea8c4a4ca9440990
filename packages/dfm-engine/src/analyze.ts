import { runAnalyzers } from './analyzers/index.js';
import type { DrillCatalog } from './drills.js';
import type { GeometrySnapshot } from './geometry.js';
import type { RuleRegistry } from './registry.js';
import { buildReport, type ViolationReport } from './report.js';
import type { ProcessScope } from './rules.js';

/** Run every analyzer against `snapshot` under the rules for `process`. No I/O. */
export function analyzeSnapshot(
  snapshot: GeometrySnapshot,
  process: ProcessScope,
  rules: RuleRegistry,
  drills: DrillCatalog,
): ViolationReport {
  const violations = runAnalyzers(snapshot, rules.forProcess(process), drills);
  return buildReport(snapshot.body, violations);
}
