/**
 * Fix saga — every automated fix runs the same four phases:
 *
 *   snapshot  →  apply  →  validate (polled)  →  commit | compensate
 *
 * An apply error means nothing changed: the fix fails without rollback.
 * A validation that never passes triggers the plan's compensation,
 * which by default is a single host undo. Only HostConnectionError
 * escapes; every other failure becomes a FixResult.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { FixPolicy } from '../config.js';
import { HostConnectionError, errorMessage } from '../errors.js';
import type { CadHost } from '../host/host.js';
import { createLogger } from '../log.js';
import type { GeometrySession } from '../session.js';
import { round } from '../vec3.js';

const log = createLogger('fix-saga');

// ─── Results ────────────────────────────────────────────────────

export interface FixResult {
  success: boolean;
  ruleId: string;
  feature: string;
  message: string;
  oldValue: number;
  newValue: number;
  rolledBack: boolean;
}

export interface FixResultJSON {
  success: boolean;
  rule_id: string;
  feature_id: string;
  message: string;
  old_value: number;
  new_value: number;
  rolled_back: boolean;
}

export function fixResultToJSON(r: FixResult): FixResultJSON {
  return {
    success: r.success,
    rule_id: r.ruleId,
    feature_id: r.feature,
    message: r.message,
    old_value: round(r.oldValue, 3),
    new_value: round(r.newValue, 3),
    rolled_back: r.rolledBack,
  };
}

// ─── Plans ──────────────────────────────────────────────────────

export type ApplyOutcome = { applied: true } | { applied: false; reason: string };

export interface FixPlan<S> {
  ruleId: string;
  feature: string;
  oldValue: number;
  newValue: number;
  /** Committing bumps the geometry generation. */
  changesTopology: boolean;

  snapshot(): Promise<S>;
  apply(before: S): Promise<ApplyOutcome>;
  validate(before: S): Promise<boolean>;
  /**
   * Undo whatever apply did. Resolves true when a rollback was issued.
   * Defaults to one host undo.
   */
  compensate?(before: S): Promise<boolean>;

  succeeded: string;
  /** Why validation failed; the saga appends the rollback outcome. */
  notObserved: string;
}

export interface SagaContext {
  host: CadHost;
  session: GeometrySession;
  policy: FixPolicy;
}

/** Plain failure, nothing applied. */
export function failedFix(
  plan: Pick<FixPlan<unknown>, 'ruleId' | 'feature' | 'oldValue' | 'newValue'>,
  message: string,
): FixResult {
  return {
    success: false,
    ruleId: plan.ruleId,
    feature: plan.feature,
    message,
    oldValue: plan.oldValue,
    newValue: plan.newValue,
    rolledBack: false,
  };
}

function rethrowConnection(err: unknown): void {
  if (err instanceof HostConnectionError) throw err;
}

/**
 * Poll `check` up to `retries` times, waiting `delayMs` before each poll.
 * A poll that throws counts as a failed attempt.
 */
export async function validateWithRetry(
  check: () => Promise<boolean>,
  policy: Pick<FixPolicy, 'validationRetries' | 'validationDelayMs'>,
): Promise<boolean> {
  for (let attempt = 1; attempt <= policy.validationRetries; attempt++) {
    await sleep(policy.validationDelayMs);
    try {
      if (await check()) return true;
    } catch (err) {
      rethrowConnection(err);
      log.warn(`Validation attempt ${attempt}/${policy.validationRetries} errored`, {
        reason: errorMessage(err),
      });
    }
  }
  return false;
}

export async function runSaga<S>(plan: FixPlan<S>, ctx: SagaContext): Promise<FixResult> {
  const tag = { rule: plan.ruleId, feature: plan.feature };

  let before: S;
  try {
    before = await plan.snapshot();
  } catch (err) {
    rethrowConnection(err);
    return failedFix(plan, `Cannot query geometry: ${errorMessage(err)}`);
  }

  let outcome: ApplyOutcome;
  try {
    outcome = await plan.apply(before);
  } catch (err) {
    rethrowConnection(err);
    log.warn('Apply failed', { ...tag, reason: errorMessage(err) });
    return failedFix(plan, `Fix command failed: ${errorMessage(err)}`);
  }
  if (!outcome.applied) {
    log.info('Nothing applied', tag);
    return failedFix(plan, outcome.reason);
  }
  log.debug('Applied, validating', tag);

  if (await validateWithRetry(() => plan.validate(before), ctx.policy)) {
    if (plan.changesTopology) ctx.session.invalidate();
    log.info('Fix committed', { ...tag, generation: ctx.session.generation });
    return {
      success: true,
      ruleId: plan.ruleId,
      feature: plan.feature,
      message: plan.succeeded,
      oldValue: plan.oldValue,
      newValue: plan.newValue,
      rolledBack: false,
    };
  }

  let rolledBack: boolean;
  try {
    if (plan.compensate) {
      rolledBack = await plan.compensate(before);
    } else {
      await ctx.host.undo();
      rolledBack = true;
    }
  } catch (err) {
    log.error('Rollback failed', { ...tag, reason: errorMessage(err) });
    return failedFix(plan, `${plan.notObserved}; rollback failed: ${errorMessage(err)}`);
  }

  if (!rolledBack) return failedFix(plan, plan.notObserved);
  log.warn('Validation failed, rolled back', tag);
  return { ...failedFix(plan, `${plan.notObserved}, rolled back`), rolledBack: true };
}
