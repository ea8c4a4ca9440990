/**
 * Standard drill catalog — sorted metric diameters.
 *
 *   nearest(4.3)  →  4.5     (ties go to the earlier, smaller size)
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { RuleLoadError, errorMessage } from './errors.js';

export const DEFAULT_DRILLS_PATH = fileURLToPath(new URL('../data/standard-drills.json', import.meta.url));

const DrillCatalogSchema = z.object({
  metric_mm: z.array(z.number().positive()).min(1),
});

export class DrillCatalog {
  readonly sizes: readonly number[];

  constructor(sizes: number[]) {
    if (sizes.length === 0) throw new Error('Drill catalog needs at least one size');
    this.sizes = Object.freeze([...sizes].sort((a, b) => a - b));
  }

  static load(path: string = DEFAULT_DRILLS_PATH): DrillCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new RuleLoadError(`Cannot read drill catalog at ${path}: ${errorMessage(err)}`, path, { cause: err });
    }
    const parsed = DrillCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RuleLoadError(`Malformed drill catalog ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, path);
    }
    return new DrillCatalog(parsed.data.metric_mm);
  }

  /** Closest standard size; first match wins on a tie. */
  nearest(diameterMm: number): number {
    let best = this.sizes[0];
    let bestDiff = Math.abs(best - diameterMm);
    for (const size of this.sizes) {
      const diff = Math.abs(size - diameterMm);
      if (diff < bestDiff) {
        best = size;
        bestDiff = diff;
      }
    }
    return best;
  }
}
