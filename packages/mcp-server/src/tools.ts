/**
 * MCP Tool Registrations — 12 tools over the DFM engine.
 *
 * Every tool returns one JSON text block. Analysis results use the wire
 * form (snake_case, rounded); bad input and an unreachable host come back
 * as tool errors.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  PROCESSES, RULE_CATEGORIES, PROCESS_LABELS,
  MATERIAL_AXES,
  comparisonToJSON, costToJSON, featureToJSON, fixResultToJSON, formatFeatureRef,
  machineMatchToJSON, matchMachines, matchMaterials, materialMatchToJSON, partSizeMm,
  reportToJSON, sustainabilityToJSON, switchToJSON,
  type ViolationReport,
} from '@partcheck/dfm-engine';
import type { ServerContext } from './context.js';

const ProcessSchema = z.enum(PROCESSES);
const ScopeSchema = z.enum(['fdm', 'sla', 'cnc', 'injection_molding', 'all']);

function json(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

/** The fix tools need real geometry; a system report means there is none. */
function requireGeometry(report: ViolationReport): void {
  const system = report.violations.find((v) => v.category === 'system');
  if (system) throw new Error(system.message);
}

export function registerTools(server: McpServer, ctx: ServerContext): void {
  const { engine, fixer, materials, machines } = ctx;

  // ─── Host ───────────────────────────────────────────────────

  server.tool(
    'check_connection',
    'Check whether the CAD host is reachable. Every other tool needs it.',
    async () => {
      const connected = await engine.session.host.probe();
      return json({ connected, host: ctx.hostKind, generation: engine.session.generation });
    }
  );

  // ─── Analysis ───────────────────────────────────────────────

  server.tool(
    'analyze_part',
    'Check the active part against the DFM rules for a process. Returns violations, manufacturability and a recommended process.',
    {
      process: ScopeSchema.default('all').describe('fdm, sla, cnc, injection_molding, or all'),
    },
    async ({ process }) => json(reportToJSON(await engine.analyze(process)))
  );

  server.tool(
    'list_rules',
    'List the DFM rule catalog, optionally filtered by process and category.',
    {
      process: ScopeSchema.optional().describe('Only rules that apply to this process'),
      category: z.enum(RULE_CATEGORIES).optional().describe('Only rules in this category'),
    },
    async ({ process, category }) => {
      const rules = (process ? engine.rules.forProcess(process) : [...engine.rules.all()])
        .filter((r) => category === undefined || r.category === category);
      return json({
        count: rules.length,
        rules: rules.map((r) => ({
          id: r.id,
          name: r.name,
          process: r.process,
          severity: r.severity,
          category: r.category,
          comparison: r.comparison,
          threshold: r.threshold,
          unit: r.unit,
          fixable: r.fixable,
        })),
      });
    }
  );

  server.tool(
    'list_features',
    'List the holes, walls and existing fillets found on the active part.',
    async () => {
      const features = await engine.features();
      return json({
        generation: engine.session.generation,
        count: features.length,
        features: features.map(featureToJSON),
      });
    }
  );

  // ─── Costs ──────────────────────────────────────────────────

  server.tool(
    'estimate_cost',
    'Estimate manufacturing cost for every process at one quantity.',
    {
      quantity: z.number().int().min(1).max(1_000_000).default(1).describe('Number of parts'),
    },
    async ({ quantity }) => {
      const estimates = await engine.estimateCosts(quantity);
      return json({ quantity, estimates: estimates.map(costToJSON) });
    }
  );

  server.tool(
    'compare_costs',
    'Compare processes across quantities: cost curves, crossover quantities, and the cheapest process at the requested quantity.',
    {
      quantity: z.number().int().min(1).max(1_000_000).default(1).describe('Quantity the recommendation is for'),
    },
    async ({ quantity }) => json(comparisonToJSON(await engine.compareCosts(quantity)))
  );

  server.tool(
    'simulate_process_switch',
    'Show which violations a process switch resolves or introduces, the per-unit cost change, and ordered redesign steps.',
    {
      from: ProcessSchema.describe('Current process'),
      to: ProcessSchema.describe('Target process'),
    },
    async ({ from, to }) => {
      if (from === to) throw new Error(`Both processes are ${PROCESS_LABELS[from]}`);
      return json(switchToJSON(await engine.simulateSwitch(from, to)));
    }
  );

  // ─── Sustainability & recommendation ────────────────────────

  server.tool(
    'sustainability_report',
    'Estimate material waste, energy and CO2 per process, with a 1-100 green score and switching tips.',
    async () => json(sustainabilityToJSON(await engine.sustainability()))
  );

  server.tool(
    'recommend_materials',
    'Rank the materials usable with a process. Weights pick which properties matter; omitted axes do not count.',
    {
      process: ProcessSchema.describe('Target process'),
      weights: z.record(z.enum(MATERIAL_AXES), z.number().min(0)).optional()
        .describe('Property weights, e.g. {"strength": 0.5, "cost": 0.5}'),
    },
    async ({ process, weights }) => {
      const matches = matchMaterials(materials, process, weights);
      return json({
        process: PROCESS_LABELS[process],
        count: matches.length,
        materials: matches.map(materialMatchToJSON),
      });
    }
  );

  server.tool(
    'recommend_machines',
    'Rank the machines for a process against the active part: machines the part fits in first, then by speed, precision and price.',
    {
      process: ProcessSchema.describe('Target process'),
      tolerance_mm: z.number().positive().optional().describe('Tightest tolerance the part needs'),
      priorities: z.object({
        speed: z.number().min(0).optional(),
        precision: z.number().min(0).optional(),
        cost: z.number().min(0).optional(),
      }).optional().describe('Score weights; defaults speed 0.3, precision 0.4, cost 0.3'),
    },
    async ({ process, tolerance_mm, priorities }) => {
      const body = await engine.body();
      const size = body.boundingBox ? partSizeMm(body.boundingBox) : undefined;
      const matches = matchMachines(machines, process, { partSizeMm: size, toleranceMm: tolerance_mm, priorities });
      return json({
        process: PROCESS_LABELS[process],
        part_size_mm: size ?? null,
        count: matches.length,
        machines: matches.map(machineMatchToJSON),
      });
    }
  );

  // ─── Fixes ──────────────────────────────────────────────────

  server.tool(
    'fix_violation',
    'Apply the automated fix for one violation, validated and rolled back if it does not take. Re-analyzes first so feature ids are current.',
    {
      rule_id: z.string().regex(/^[A-Z]+-\d{3}$/).describe('Rule id, e.g. "CNC-001"'),
      feature: z.string().min(1).describe('Feature id from analyze_part, e.g. "edge_12" or "wall_3_7"'),
    },
    async ({ rule_id, feature }) => {
      const report = await engine.analyze('all');
      requireGeometry(report);
      const violation = report.violations.find(
        (v) => v.ruleId === rule_id && formatFeatureRef(v.feature) === feature,
      );
      if (!violation) {
        return json({
          success: false,
          rule_id,
          feature_id: feature,
          message: `No current ${rule_id} violation on ${feature}. Run analyze_part for fresh feature ids.`,
        });
      }
      return json(fixResultToJSON(await fixer.fixSingle(violation)));
    }
  );

  server.tool(
    'fix_all',
    'Apply every available automated fix for a process: holes, then walls, then fillets.',
    {
      process: ScopeSchema.default('all').describe('Process whose rules pick the violations to fix'),
    },
    async ({ process }) => {
      const report = await engine.analyze(process);
      requireGeometry(report);
      const results = await fixer.fixAll(report.violations);
      return json({
        process,
        fixed_count: results.filter((r) => r.success).length,
        failed_count: results.filter((r) => !r.success).length,
        results: results.map(fixResultToJSON),
      });
    }
  );
}
