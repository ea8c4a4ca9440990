import { afterEach, describe, it, expect, vi } from 'vitest';
import { HostConnectionError, HostError, HttpCadHost } from '../src/index.js';

// ─── Scripted fetch ───────────────────────────────────────────

interface Call {
  url: string;
  method?: string;
  body?: unknown;
}

function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(...replies: (Response | Error)[]): Call[] {
  const calls: Call[] = [];
  vi.stubGlobal('fetch', vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    calls.push({
      url: String(input),
      method: init?.method,
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    });
    const next = replies.shift();
    if (next === undefined) throw new Error('unexpected fetch');
    if (next instanceof Error) throw next;
    return next;
  }));
  return calls;
}

const host = () => new HttpCadHost({
  baseUrl: 'http://cad.test/',
  timeoutMs: 1_000,
  retries: 3,
  retryDelayMs: 0,
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpCadHost', () => {
  it('queries geometry with GET', async () => {
    const calls = stubFetch(json({ bodies: [] }));
    await expect(host().bodyProperties()).resolves.toEqual({ bodies: [] });
    expect(calls).toEqual([{ url: 'http://cad.test/get_body_properties', method: 'GET', body: undefined }]);
  });

  it('retries server errors', async () => {
    const calls = stubFetch(json({}, 503), json({ faces: [] }));
    await expect(host().faces()).resolves.toEqual({ faces: [] });
    expect(calls).toHaveLength(2);
  });

  it('does not retry client errors', async () => {
    const calls = stubFetch(json({}, 404), json({ faces: [] }));
    const err = await host().faces().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HostError);
    expect(err).not.toBeInstanceOf(HostConnectionError);
    expect(err).toHaveProperty('message', 'HTTP 404 from CAD host on /get_faces_info');
    expect(calls).toHaveLength(1);
  });

  it('surfaces a host-reported error without retrying', async () => {
    const calls = stubFetch(json({ error: 'No active design' }));
    await expect(host().holes()).rejects.toThrow('No active design');
    expect(calls).toHaveLength(1);
  });

  it('gives up with a connection error after every attempt fails', async () => {
    const calls = stubFetch(new TypeError('fetch failed'), new TypeError('fetch failed'), new TypeError('fetch failed'));
    const err = await host().edges().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HostConnectionError);
    expect(err).toHaveProperty('message', 'Cannot connect to CAD host at http://cad.test: fetch failed');
    expect(calls).toHaveLength(3);
  });

  it('treats a timeout as a connection failure', async () => {
    const timeout = Object.assign(new Error('The operation timed out'), { name: 'TimeoutError' });
    stubFetch(timeout, timeout, timeout);
    await expect(host().edges()).rejects.toThrow('Request to /get_edges_info timed out after 1000ms');
  });

  it('rejects a payload that is not JSON', async () => {
    stubFetch(new Response('<html>', { status: 200 }));
    await expect(host().edges()).rejects.toThrow('CAD host returned invalid JSON on /get_edges_info');
  });

  it('sends fillet radii in cm', async () => {
    const calls = stubFetch(json({ success: true }));
    await host().filletEdges({ edgeIndices: [3, 7], radiusMm: 2 });
    expect(calls[0]).toEqual({
      url: 'http://cad.test/fillet_specific_edges',
      method: 'POST',
      body: { edge_indices: [3, 7], radius: 0.2 },
    });
  });

  it('runs the circle resize as a host script', async () => {
    const calls = stubFetch(json({ found: true }));
    await expect(host().resizeSketchCircle({ currentRadiusMm: 2, targetRadiusMm: 3 }))
      .resolves.toEqual({ found: true });
    expect(calls[0].url).toBe('http://cad.test/execute_script');
    expect(calls[0].body).toHaveProperty('code', expect.stringContaining("result['found'] = found"));
  });

  it('reads the adjusted parameter name', async () => {
    stubFetch(json({ fixed: true, param_name: 'd12' }));
    await expect(host().adjustCutDepth({ increaseMm: 1 })).resolves.toEqual({ fixed: true, parameter: 'd12' });
  });

  it('probes once and reports reachability', async () => {
    const calls = stubFetch(new TypeError('fetch failed'));
    await expect(host().probe()).resolves.toBe(false);
    expect(calls).toHaveLength(1);

    stubFetch(json({ success: true }));
    await expect(host().probe()).resolves.toBe(true);
  });
});
