/**
 * DFM rules — one numeric constraint, scoped to a process.
 *
 *   { id: 'FDM-001', category: 'wall_thickness', comparison: 'min', threshold: 2.0 }
 *   checkRule(rule, 1.2)  →  false   (violation)
 *
 * Severity, process, category and comparison are closed sets, validated
 * when the catalog is parsed so a typo fails loudly instead of matching
 * nothing.
 */

import { z } from 'zod';

// ─── Closed sets ────────────────────────────────────────────────

export const PROCESSES = ['fdm', 'sla', 'cnc', 'injection_molding'] as const;
export type Process = typeof PROCESSES[number];

/** A rule's scope, or the analysis target: one process or every process. */
export type ProcessScope = Process | 'all';

export const PROCESS_LABELS: Record<Process, string> = {
  fdm: 'FDM',
  sla: 'SLA',
  cnc: 'CNC',
  injection_molding: 'Injection Molding',
};

export const SEVERITIES = ['critical', 'warning', 'suggestion'] as const;
export type Severity = typeof SEVERITIES[number];

export const RULE_CATEGORIES = [
  'wall_thickness',
  'corner_radius',
  'hole_size',
  'hole_depth',
  'standard_hole',
  'overhang',
  'bridge',
  'feature_size',
  'undercut',
  'tool_access',
  'draft_angle',
  'wall_uniformity',
] as const;
export type RuleCategory = typeof RULE_CATEGORIES[number];

export type Comparison = 'min' | 'max';

// ─── Rule ───────────────────────────────────────────────────────

export interface DfmRule {
  readonly id: string;
  readonly name: string;
  readonly process: ProcessScope;
  readonly severity: Severity;
  readonly threshold: number;
  readonly unit: string;
  readonly comparison: Comparison;
  /** `{value}` and `{threshold}` placeholders, optional `:.Nf` precision. */
  readonly messageTemplate: string;
  readonly fixable: boolean;
  readonly category: RuleCategory;
  readonly priority: number;
}

/** True when `value` passes: ≥ threshold for 'min', ≤ threshold for 'max'. */
export function checkRule(rule: DfmRule, value: number): boolean {
  return rule.comparison === 'min' ? value >= rule.threshold : value <= rule.threshold;
}

export function ruleAppliesTo(rule: DfmRule, process: ProcessScope): boolean {
  return process === 'all' || rule.process === 'all' || rule.process === process;
}

const PLACEHOLDER_RE = /\{(value|threshold)(?::\.(\d)f)?\}/g;

/** Fill a message template with the measured value and the rule threshold. */
export function formatRuleMessage(rule: DfmRule, value: number): string {
  return rule.messageTemplate.replace(PLACEHOLDER_RE, (_match, key: string, places?: string) => {
    const n = key === 'value' ? value : rule.threshold;
    return places === undefined ? String(n) : n.toFixed(Number(places));
  });
}

// ─── Catalog schema ─────────────────────────────────────────────

const RuleRecordSchema = z.object({
  id: z.string().regex(/^[A-Z]+-\d{3}$/, 'rule id must look like "FDM-001"'),
  name: z.string().min(1),
  process: z.enum(['fdm', 'sla', 'cnc', 'injection_molding', 'all']),
  severity: z.enum(SEVERITIES),
  threshold: z.number().finite(),
  unit: z.string(),
  comparison: z.enum(['min', 'max']),
  message_template: z.string().min(1),
  fixable: z.boolean(),
  category: z.enum(RULE_CATEGORIES),
  priority: z.number().int().default(1),
});

export const RuleCatalogSchema = z.object({
  version: z.string().optional(),
  rules: z.array(RuleRecordSchema).min(1, 'rule catalog is empty'),
});

export type RuleRecord = z.infer<typeof RuleRecordSchema>;
/** Catalog record as written in JSON (priority optional). */
export type RuleRecordInput = z.input<typeof RuleRecordSchema>;

export function ruleFromRecord(r: RuleRecord): DfmRule {
  return Object.freeze({
    id: r.id,
    name: r.name,
    process: r.process,
    severity: r.severity,
    threshold: r.threshold,
    unit: r.unit,
    comparison: r.comparison,
    messageTemplate: r.message_template,
    fixable: r.fixable,
    category: r.category,
    priority: r.priority,
  });
}
