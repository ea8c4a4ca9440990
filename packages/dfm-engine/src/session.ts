/**
 * Geometry Session — reads snapshots from the host and owns the
 * geometry generation counter.
 *
 * Every reference handed out carries the generation it was read in.
 * A committed topology change bumps the counter, after which older
 * references are refused instead of silently pointing at the wrong edge.
 */

import type { FeatureRef } from './feature-ref.js';
import { formatFeatureRef, refGeneration } from './feature-ref.js';
import type { Body, Edge, GeometrySnapshot, Hole, Wall } from './geometry.js';
import type { CadHost } from './host/host.js';
import { StaleReferenceError } from './errors.js';
import { createLogger } from './log.js';
import { buildSnapshot, detectWalls, parseBody, parseEdges, parseFaces, parseHoles } from './snapshot.js';

const log = createLogger('session');

const SNAPSHOT_ATTEMPTS = 3;

export class GeometrySession {
  private gen = 0;

  constructor(readonly host: CadHost) {}

  get generation(): number {
    return this.gen;
  }

  /** Mark every previously issued face/edge index as stale. */
  invalidate(): void {
    this.gen++;
  }

  /** Throws StaleReferenceError when `ref` predates the current generation. */
  assertCurrent(ref: FeatureRef): void {
    const issued = refGeneration(ref);
    if (issued !== null && issued !== this.gen) {
      throw new StaleReferenceError(formatFeatureRef(ref), issued, this.gen);
    }
  }

  /**
   * Full snapshot: body, faces, edges, inferred walls, holes.
   *
   * The generation is read before the first query. A commit landing
   * mid-read forces a re-read; once the attempts run out the snapshot
   * keeps the older generation, so its references are refused.
   */
  async snapshot(): Promise<GeometrySnapshot> {
    for (let attempt = 1; ; attempt++) {
      const generation = this.gen;
      const body = await this.host.bodyProperties();
      const faces = await this.host.faces();
      const edges = await this.host.edges();
      const holes = await this.host.holes();
      if (this.gen === generation || attempt >= SNAPSHOT_ATTEMPTS) {
        return buildSnapshot({ body, faces, edges, holes }, generation);
      }
      log.debug('Geometry changed during snapshot, re-reading', { from: generation, to: this.gen });
    }
  }

  /** Body metrics alone; carries no face or edge indices. */
  async body(): Promise<Body | null> {
    return parseBody(await this.host.bodyProperties());
  }

  async edges(): Promise<Edge[]> {
    return parseEdges(await this.host.edges());
  }

  async walls(): Promise<Wall[]> {
    return detectWalls(parseFaces(await this.host.faces()));
  }

  async holes(): Promise<Hole[]> {
    return parseHoles(await this.host.holes());
  }
}
