/**
 * Redesign planner — turns violations into an ordered list of steps.
 *
 * Steps sort by severity, then by category priority, so structural work
 * (walls, corners) always comes before holes, overhangs and access issues
 * regardless of the order the analyzers found them in.
 */

import { formatFeatureRef } from './feature-ref.js';
import type { RuleCategory, Severity } from './rules.js';
import type { Violation } from './violation.js';

export type Effort = 'low' | 'medium' | 'high';

export interface RedesignStep {
  step: number;
  action: string;
  detail: string;
  effort: Effort;
  autoFixable: boolean;
  severity: Severity;
  ruleId: string;
  featureId: string;
}

interface Template {
  action: string;
  detail: (current: number, required: number) => string;
  effort: Effort;
  autoFixable: boolean;
}

export const CATEGORY_PRIORITY: Record<RuleCategory, number> = {
  wall_thickness: 1,
  corner_radius: 2,
  hole_size: 3,
  hole_depth: 4,
  overhang: 5,
  draft_angle: 5,
  wall_uniformity: 6,
  bridge: 7,
  feature_size: 8,
  undercut: 9,
  tool_access: 10,
  standard_hole: 11,
};

const UNKNOWN_PRIORITY = 50;

const SEVERITY_ORDER: Record<Severity, number> = { critical: 0, warning: 1, suggestion: 2 };

const f = (n: number, places: number) => n.toFixed(places);

const thicken = (why: string): Template => ({
  action: 'Increase wall thickness',
  detail: (cur, req) => `Thicken the wall from ${f(cur, 1)}mm to at least ${f(req, 1)}mm. ${why}`,
  effort: 'low',
  autoFixable: true,
});

const TEMPLATES: Record<string, Template> = {
  'FDM-001': thicken('Walls thinner than about two extrusion widths print unreliably.'),
  'FDM-002': {
    action: 'Reduce overhang angle or plan for supports',
    detail: (cur, req) =>
      `A face overhangs at ${f(cur, 0)}°, past the ${f(req, 0)}° FDM limit. ` +
      'Reorient the part, chamfer the underside, split it into pieces, or accept support material.',
    effort: 'medium',
    autoFixable: false,
  },
  'FDM-003': {
    action: 'Enlarge hole diameter',
    detail: (cur, req) =>
      `Open the hole from ${f(cur, 1)}mm to at least ${f(req, 1)}mm; small printed holes close up.`,
    effort: 'low',
    autoFixable: true,
  },
  'FDM-004': {
    action: 'Shorten unsupported bridge',
    detail: (cur, req) =>
      `The ${f(cur, 1)}mm bridge exceeds the ${f(req, 1)}mm FDM maximum. Add a pillar or break up the span.`,
    effort: 'medium',
    autoFixable: false,
  },
  'SLA-001': thicken('Thinner resin walls warp or break during peel.'),
  'SLA-002': {
    action: 'Reduce overhang angle',
    detail: (cur, req) =>
      `A face overhangs at ${f(cur, 0)}°, past the ${f(req, 0)}° SLA guideline. Tilt the part or add supports.`,
    effort: 'medium',
    autoFixable: false,
  },
  'CNC-001': {
    action: 'Fillet internal corner',
    detail: (_cur, req) =>
      `Round the corner to at least ${f(req, 1)}mm. An end mill leaves its own radius in every internal corner.`,
    effort: 'low',
    autoFixable: true,
  },
  'CNC-002': {
    action: 'Enlarge small feature',
    detail: (cur, req) =>
      `The ${f(cur, 1)}mm feature is under the ${f(req, 1)}mm CNC minimum. Enlarge it or remove it.`,
    effort: 'medium',
    autoFixable: false,
  },
  'CNC-003': {
    action: 'Reduce hole depth or widen the hole',
    detail: (cur, req) =>
      `Depth-to-diameter ratio ${f(cur, 1)}:1 exceeds ${f(req, 1)}:1. Use a larger drill or make the hole shallower.`,
    effort: 'medium',
    autoFixable: false,
  },
  'CNC-004': {
    action: 'Remove undercut',
    detail: () =>
      'A 3-axis mill cannot reach the undercut. Redesign it away or budget for multi-axis machining.',
    effort: 'high',
    autoFixable: false,
  },
  'CNC-005': {
    action: 'Open up tool access',
    detail: (cur) => `A ${f(cur, 1)}:1 depth-to-width pocket is hard to reach. Widen it or make it shallower.`,
    effort: 'medium',
    autoFixable: false,
  },
  'IM-001': {
    action: 'Add draft to vertical faces',
    detail: (_cur, req) => `Give pulled faces at least ${f(req, 1)}° of draft so the part releases from the mold.`,
    effort: 'medium',
    autoFixable: false,
  },
  'IM-002': {
    action: 'Even out wall thickness',
    detail: (cur, req) =>
      `Wall thickness varies by ${f(cur, 0)}%, over the ${f(req, 0)}% limit. Core out thick sections to avoid sink and warp.`,
    effort: 'high',
    autoFixable: false,
  },
  'IM-003': thicken('Thin molded walls short-shot before the cavity fills.'),
  'IM-004': {
    action: 'Core out thick wall',
    detail: (cur, req) =>
      `The ${f(cur, 1)}mm wall exceeds the ${f(req, 1)}mm molding maximum. Shell it or add ribs instead.`,
    effort: 'medium',
    autoFixable: false,
  },
  'GEN-001': {
    action: 'Use a standard drill size',
    detail: (cur, req) => `Resize the hole from ${f(cur, 2)}mm to the standard ${f(req, 2)}mm drill.`,
    effort: 'low',
    autoFixable: true,
  },
};

function priorityOf(v: Violation): number {
  return v.category === 'system' ? UNKNOWN_PRIORITY : CATEGORY_PRIORITY[v.category];
}

export function planRedesign(violations: readonly Violation[]): RedesignStep[] {
  const ranked = violations.map((v) => {
    const t = TEMPLATES[v.ruleId];
    const step: RedesignStep = t
      ? {
          step: 0,
          action: t.action,
          detail: t.detail(v.currentValue, v.requiredValue),
          effort: t.effort,
          autoFixable: t.autoFixable,
          severity: v.severity,
          ruleId: v.ruleId,
          featureId: formatFeatureRef(v.feature),
        }
      : {
          step: 0,
          action: `Address ${v.ruleId} violation`,
          detail: v.message,
          effort: 'medium',
          autoFixable: v.fixable,
          severity: v.severity,
          ruleId: v.ruleId,
          featureId: formatFeatureRef(v.feature),
        };
    return { step, priority: t ? priorityOf(v) : UNKNOWN_PRIORITY };
  });

  // Array.prototype.sort is stable, so equal keys keep discovery order.
  ranked.sort((a, b) =>
    SEVERITY_ORDER[a.step.severity] - SEVERITY_ORDER[b.step.severity] || a.priority - b.priority
  );

  return ranked.map(({ step }, i) => ({ ...step, step: i + 1 }));
}

export interface RedesignStepJSON {
  step: number;
  action: string;
  detail: string;
  effort: Effort;
  auto_fixable: boolean;
  severity: Severity;
  rule_id: string;
  feature_id: string;
}

export function stepToJSON(s: RedesignStep): RedesignStepJSON {
  return {
    step: s.step,
    action: s.action,
    detail: s.detail,
    effort: s.effort,
    auto_fixable: s.autoFixable,
    severity: s.severity,
    rule_id: s.ruleId,
    feature_id: s.featureId,
  };
}
