/**
 * HTTP CAD host — talks to the CAD add-in's local JSON endpoints.
 *
 *   const host = new HttpCadHost({ baseUrl: 'http://localhost:5000', timeoutMs: 20_000, retries: 3, retryDelayMs: 1_000 });
 *
 * Each request gets a timeout and a fixed number of attempts with a fixed
 * delay between them. Connection failures, timeouts and 5xx responses are
 * retried; 4xx responses and payloads carrying an `error` field are not.
 * The add-in works in cm, so command arguments are converted on the way out.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { HostConfig } from '../config.js';
import { HostConnectionError, HostError, errorMessage } from '../errors.js';
import { createLogger } from '../log.js';
import type {
  AdjustCutDepthCommand, CadHost, FilletCommand, HostPayload, ResizeCircleCommand,
} from './host.js';

const log = createLogger('http-host');

const MM_TO_CM = 0.1;

export type HttpHostOptions = Omit<HostConfig, 'kind'>;

type Method = 'GET' | 'POST';

function isRecord(value: unknown): value is HostPayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
}

// ─── Host-side scripts ──────────────────────────────────────────
// Run inside the add-in with `rootComp` and a `result` dict in scope.

const resizeCircleScript = (currentCm: number, targetCm: number) => `
found = False
for si in range(rootComp.sketches.count):
    circles = rootComp.sketches.item(si).sketchCurves.sketchCircles
    for ci in range(circles.count):
        c = circles.item(ci)
        if abs(c.radius - ${currentCm}) < 0.005:
            c.radius = ${targetCm}
            found = True
            break
    if found:
        break
result['found'] = found
`;

const adjustCutDepthScript = (increaseCm: number) => `
fixed = False
extrudes = rootComp.features.extrudeFeatures
for ei in range(extrudes.count):
    ext = extrudes.item(ei)
    if ext.operation != 1 or not hasattr(ext.extentOne, 'distance'):
        continue
    param = ext.extentOne.distance
    old = param.value
    new = old + ${increaseCm} if old < 0 else old - ${increaseCm}
    param.value = new
    if abs(param.value - new) > 0.001:
        param.value = old
        continue
    fixed = True
    result['param_name'] = param.name
    break
result['fixed'] = fixed
`;

// ─── Client ─────────────────────────────────────────────────────

export class HttpCadHost implements CadHost {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpHostOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
  }

  async probe(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/test_connection`, {
        method: 'POST',
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      return res.status === 200;
    } catch (err) {
      log.debug('Probe failed', { reason: errorMessage(err) });
      return false;
    }
  }

  bodyProperties(): Promise<HostPayload> {
    return this.request('GET', '/get_body_properties');
  }

  faces(): Promise<HostPayload> {
    return this.request('GET', '/get_faces_info');
  }

  edges(): Promise<HostPayload> {
    return this.request('GET', '/get_edges_info');
  }

  holes(): Promise<HostPayload> {
    return this.request('GET', '/analyze_holes');
  }

  async resizeSketchCircle(cmd: ResizeCircleCommand): Promise<{ found: boolean }> {
    const res = await this.executeScript(
      resizeCircleScript(cmd.currentRadiusMm * MM_TO_CM, cmd.targetRadiusMm * MM_TO_CM),
    );
    return { found: res.found === true };
  }

  async adjustCutDepth(cmd: AdjustCutDepthCommand): Promise<{ fixed: boolean; parameter?: string }> {
    const res = await this.executeScript(adjustCutDepthScript(cmd.increaseMm * MM_TO_CM));
    return {
      fixed: res.fixed === true,
      parameter: typeof res.param_name === 'string' ? res.param_name : undefined,
    };
  }

  async filletEdges(cmd: FilletCommand): Promise<void> {
    await this.request('POST', '/fillet_specific_edges', {
      edge_indices: cmd.edgeIndices,
      radius: cmd.radiusMm * MM_TO_CM,
    });
  }

  async undo(): Promise<void> {
    await this.request('POST', '/undo');
  }

  private executeScript(code: string): Promise<HostPayload> {
    return this.request('POST', '/execute_script', { code });
  }

  private async request(method: Method, path: string, body?: HostPayload): Promise<HostPayload> {
    const { retries, retryDelayMs, timeoutMs } = this.options;
    let lastError: HostError = new HostError(`No attempt made for ${path}`, path);

    for (let attempt = 1; attempt <= retries; attempt++) {
      let res: Response;
      try {
        res = await fetch(`${this.baseUrl}${path}`, {
          method,
          headers: body ? { 'Content-Type': 'application/json' } : undefined,
          body: body ? JSON.stringify(body) : undefined,
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        lastError = isTimeout(err)
          ? new HostConnectionError(`Request to ${path} timed out after ${timeoutMs}ms`, path, { cause: err })
          : new HostConnectionError(
              `Cannot connect to CAD host at ${this.baseUrl}: ${errorMessage(err)}`, path, { cause: err },
            );
        if (attempt < retries) {
          log.warn(`${lastError.message} (attempt ${attempt}/${retries}), retrying`);
          await sleep(retryDelayMs);
        }
        continue;
      }

      if (!res.ok) {
        lastError = new HostError(`HTTP ${res.status} from CAD host on ${path}`, path);
        if (res.status < 500) break;
        if (attempt < retries) {
          log.warn(`${lastError.message} (attempt ${attempt}/${retries}), retrying`);
          await sleep(retryDelayMs);
        }
        continue;
      }

      let payload: unknown;
      try {
        payload = await res.json();
      } catch (err) {
        throw new HostError(`CAD host returned invalid JSON on ${path}`, path, { cause: err });
      }
      if (!isRecord(payload)) {
        throw new HostError(`CAD host returned a non-object payload on ${path}`, path);
      }
      if ('error' in payload) {
        throw new HostError(String(payload.error), path);
      }
      return payload;
    }

    throw lastError;
  }
}
