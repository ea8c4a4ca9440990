import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { MemoryCadHost, loadConfig } from '@partcheck/dfm-engine';
import { DEMO_PART, createContext } from '../src/context.js';
import { registerTools } from '../src/tools.js';

let host: MemoryCadHost;
let client: Client;

beforeEach(async () => {
  host = new MemoryCadHost(DEMO_PART);
  const config = loadConfig({ CAD_HOST: 'memory', FIX_VALIDATION_DELAY_MS: '0' });
  const server = new McpServer({ name: 'partcheck-test', version: '0.0.0' });
  registerTools(server, createContext(config, host));

  client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
});

afterEach(async () => {
  await client.close();
});

async function callText(name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (!first || first.type !== 'text') throw new Error(`${name} returned no text block`);
  return { isError: result.isError === true, text: first.text };
}

async function callJSON(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const { isError, text } = await callText(name, args);
  if (isError) throw new Error(`${name} failed: ${text}`);
  return JSON.parse(text);
}

describe('MCP tools', () => {
  it('registers every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'analyze_part', 'check_connection', 'compare_costs', 'estimate_cost', 'fix_all',
      'fix_violation', 'list_features', 'list_rules', 'recommend_machines', 'recommend_materials',
      'simulate_process_switch', 'sustainability_report',
    ]);
  });

  it('check_connection reports the host and generation', async () => {
    expect(await callJSON('check_connection')).toEqual({ connected: true, host: 'memory', generation: 0 });
  });

  it('analyze_part returns the wire report', async () => {
    expect(await callJSON('analyze_part', { process: 'fdm' })).toMatchObject({
      part_name: 'Demo plate',
      violation_count: 3,
      critical_count: 1,
      is_manufacturable: false,
      recommended_process: 'SLA',
    });
  });

  it('analyze_part reports an unreachable host as a system violation', async () => {
    host.reachable = false;
    expect(await callJSON('analyze_part')).toMatchObject({
      part_name: 'Error',
      violations: [{ rule_id: 'SYS-001', severity: 'critical', feature_id: 'system' }],
    });
  });

  it('list_rules filters by process and category', async () => {
    expect(await callJSON('list_rules', { process: 'cnc' })).toMatchObject({ count: 6 });
    expect(await callJSON('list_rules', { category: 'wall_thickness' })).toMatchObject({
      count: 4,
      rules: [{ id: 'FDM-001' }, { id: 'SLA-001' }, { id: 'IM-003' }, { id: 'IM-004' }],
    });
  });

  it('list_features lists the part inventory', async () => {
    expect(await callJSON('list_features')).toMatchObject({
      generation: 0,
      count: 4,
      features: [
        { feature_id: 'hole_3', type: 'hole', subtype: 'blind' },
        { feature_id: 'wall_0_2', thickness_mm: 1.2 },
        { feature_id: 'wall_1_2', thickness_mm: 8.8 },
        { feature_id: 'edge_3', type: 'fillet', radius_mm: 2.15 },
      ],
    });
  });

  it('estimate_cost prices every process', async () => {
    expect(await callJSON('estimate_cost', { quantity: 10 })).toMatchObject({
      quantity: 10,
      estimates: [{ process: 'FDM' }, { process: 'SLA' }, { process: 'CNC' }, { process: 'Injection Molding' }],
    });
  });

  it('compare_costs names the cheapest process', async () => {
    expect(await callJSON('compare_costs', { quantity: 1 })).toMatchObject({ quantity: 1, cheapest: 'FDM' });
  });

  it('simulate_process_switch refuses a switch to the same process', async () => {
    const { isError, text } = await callText('simulate_process_switch', { from: 'fdm', to: 'fdm' });
    expect(isError).toBe(true);
    expect(text).toContain('Both processes are FDM');
  });

  it('simulate_process_switch diffs the two analyses', async () => {
    expect(await callJSON('simulate_process_switch', { from: 'fdm', to: 'cnc' })).toMatchObject({
      from_process: 'FDM',
      to_process: 'CNC',
      removed_violations: [{ rule_id: 'FDM-001' }, { rule_id: 'FDM-002' }],
      new_violations: [{ feature_id: 'edge_0' }, { feature_id: 'edge_1' }],
      persistent_violations: [{ rule_id: 'GEN-001' }],
    });
  });

  it('sustainability_report scores every process', async () => {
    const report = await callJSON('sustainability_report');
    expect(report).toMatchObject({ greenest_process: 'Injection Molding' });
    expect(report).toHaveProperty('green_scores.length', 4);
  });

  it('recommend_materials ranks materials for a process', async () => {
    expect(await callJSON('recommend_materials', { process: 'sla' })).toMatchObject({
      process: 'SLA',
      count: 2,
      materials: [{ id: 'standard_resin', score: 2.4 }, { id: 'tough_resin', score: 1.3 }],
    });
    const byStrength = await callJSON('recommend_materials', { process: 'cnc', weights: { strength: 1 } });
    expect(byStrength).toHaveProperty('materials.0.id', 'stainless_304');
  });

  it('recommend_machines sizes the active part', async () => {
    expect(await callJSON('recommend_machines', { process: 'sla', tolerance_mm: 0.05 })).toMatchObject({
      part_size_mm: [40, 30, 10],
      count: 2,
      machines: [
        { id: 'formlabs_form3', fits_part: true, warnings: [] },
        { id: 'elegoo_saturn', fits_part: true },
      ],
    });
  });

  it('recommend_machines fails as a tool error when the host is unreachable', async () => {
    host.reachable = false;
    const { isError, text } = await callText('recommend_machines', { process: 'cnc' });
    expect(isError).toBe(true);
    expect(text).toContain('did not answer');
  });

  it('fix_violation fixes a current violation', async () => {
    expect(await callJSON('fix_violation', { rule_id: 'GEN-001', feature: 'hole_3' })).toEqual({
      success: true,
      rule_id: 'GEN-001',
      feature_id: 'hole_3',
      message: 'Resized hole from 4.30mm to 4.5mm',
      old_value: 4.3,
      new_value: 4.5,
      rolled_back: false,
    });
  });

  it('fix_violation points at analyze_part for an unknown violation', async () => {
    expect(await callJSON('fix_violation', { rule_id: 'CNC-001', feature: 'edge_9' })).toEqual({
      success: false,
      rule_id: 'CNC-001',
      feature_id: 'edge_9',
      message: 'No current CNC-001 violation on edge_9. Run analyze_part for fresh feature ids.',
    });
  });

  it('fix_all applies hole and fillet fixes for CNC', async () => {
    expect(await callJSON('fix_all', { process: 'cnc' })).toMatchObject({
      process: 'cnc',
      fixed_count: 2,
      failed_count: 0,
      results: [{ rule_id: 'GEN-001' }, { rule_id: 'CNC-001', feature_id: '2_edges' }],
    });
    expect(await callJSON('check_connection')).toMatchObject({ generation: 2 });
  });

  it('fix_all fails as a tool error when the host is unreachable', async () => {
    host.reachable = false;
    const { isError, text } = await callText('fix_all', { process: 'cnc' });
    expect(isError).toBe(true);
    expect(text).toContain('Cannot reach the CAD host');
  });
});
