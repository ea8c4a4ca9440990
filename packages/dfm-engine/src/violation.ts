import type { FeatureRef } from './feature-ref.js';
import { formatFeatureRef } from './feature-ref.js';
import type { DfmRule, ProcessScope, RuleCategory, Severity } from './rules.js';
import { formatRuleMessage } from './rules.js';
import type { Vec3 } from './vec3.js';

export interface Violation {
  readonly ruleId: string;
  readonly category: RuleCategory | 'system';
  readonly severity: Severity;
  readonly message: string;
  readonly feature: FeatureRef;
  /** What was measured. */
  readonly currentValue: number;
  /** A value that would pass the rule. */
  readonly requiredValue: number;
  readonly fixable: boolean;
  readonly process: ProcessScope;
  readonly location?: Vec3;
}

/** Violation of `rule` measured at `value`, requiring the rule threshold. */
export function violationOf(
  rule: DfmRule,
  feature: FeatureRef,
  value: number,
  location?: Vec3,
): Violation {
  return Object.freeze({
    ruleId: rule.id,
    category: rule.category,
    severity: rule.severity,
    message: formatRuleMessage(rule, value),
    feature,
    currentValue: value,
    requiredValue: rule.threshold,
    fixable: rule.fixable,
    process: rule.process,
    location,
  });
}

/** Identity of a violation across analysis runs: rule + feature. */
export function violationKey(v: Violation): string {
  return `${v.ruleId}|${formatFeatureRef(v.feature)}`;
}

export interface ViolationJSON {
  rule_id: string;
  category: string;
  severity: Severity;
  message: string;
  feature_id: string;
  current_value: number;
  required_value: number;
  fixable: boolean;
  process: ProcessScope;
  location: Vec3 | null;
}

const r3 = (n: number) => Math.round(n * 1000) / 1000;

export function violationToJSON(v: Violation): ViolationJSON {
  return {
    rule_id: v.ruleId,
    category: v.category,
    severity: v.severity,
    message: v.message,
    feature_id: formatFeatureRef(v.feature),
    current_value: r3(v.currentValue),
    required_value: r3(v.requiredValue),
    fixable: v.fixable,
    process: v.process,
    location: v.location ?? null,
  };
}
