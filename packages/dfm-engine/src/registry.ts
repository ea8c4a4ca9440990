/**
 * Rule Registry — the immutable catalog every analyzer reads from.
 *
 * Constructed explicitly and passed around; there is no global instance.
 * Tests build one from a handful of records with `fromRecords`.
 */

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { RuleLoadError, errorMessage } from './errors.js';
import { createLogger } from './log.js';
import {
  RuleCatalogSchema, ruleFromRecord, ruleAppliesTo,
  type DfmRule, type ProcessScope, type RuleCategory, type RuleRecordInput,
} from './rules.js';

const log = createLogger('rules');

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../data/rules.json', import.meta.url));

export class RuleRegistry {
  private readonly rules: readonly DfmRule[];
  private readonly byId: ReadonlyMap<string, DfmRule>;

  private constructor(rules: DfmRule[], source: string) {
    const byId = new Map<string, DfmRule>();
    for (const rule of rules) {
      if (byId.has(rule.id)) {
        throw new RuleLoadError(`Duplicate rule id "${rule.id}"`, source);
      }
      byId.set(rule.id, rule);
    }
    this.rules = Object.freeze([...rules]);
    this.byId = byId;
  }

  /** Load and validate a JSON catalog. Any failure is a RuleLoadError. */
  static load(path: string = DEFAULT_RULES_PATH): RuleRegistry {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new RuleLoadError(`Cannot read rule catalog at ${path}: ${errorMessage(err)}`, path, { cause: err });
    }
    const registry = RuleRegistry.fromCatalog(raw, path);
    log.info(`Loaded ${registry.rules.length} DFM rules`, { path });
    return registry;
  }

  /** Validate an already-parsed catalog object. */
  static fromCatalog(raw: unknown, source = '<inline>'): RuleRegistry {
    const parsed = RuleCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      throw new RuleLoadError(`Malformed rule catalog ${source}: ${issues}`, source);
    }
    return new RuleRegistry(parsed.data.rules.map(ruleFromRecord), source);
  }

  static fromRecords(records: RuleRecordInput[]): RuleRegistry {
    return RuleRegistry.fromCatalog({ rules: records });
  }

  all(): readonly DfmRule[] {
    return this.rules;
  }

  get(id: string): DfmRule | undefined {
    return this.byId.get(id);
  }

  /** Rules scoped to `process`, plus every 'all' rule. 'all' returns everything. */
  forProcess(process: ProcessScope): DfmRule[] {
    return this.rules.filter((r) => ruleAppliesTo(r, process));
  }

  byCategory(category: RuleCategory): DfmRule[] {
    return this.rules.filter((r) => r.category === category);
  }

  fixable(): DfmRule[] {
    return this.rules.filter((r) => r.fixable);
  }
}
