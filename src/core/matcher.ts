import type { Plan, PlanLibrary } from '../schema/index.js';
import { planIds } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export interface MatchInput {
  /** Tag from the domain classifier; "" when unknown. */
  domain: string;
  message: string;
  /** When set, only these plan ids are considered. */
  allowedPlans?: readonly string[] | undefined;
}

export interface PlanMatch {
  planId: string;
  plan: Plan;
  score: number;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Pick the plan whose trigger keywords best match the message.
 *
 * A plan qualifies when at least `triggerThreshold` triggers occur in the
 * message and, if it declares domains, the domain tag is one of them.
 * Score is the hit count plus one for a declared-domain match; a plan
 * scoring 0 is never picked. Ties keep the plan listed first.
 */
export function matchPlan(library: PlanLibrary, input: MatchInput): PlanMatch | null {
  const message = input.message.trim().toLowerCase();
  const allowed = input.allowedPlans !== undefined ? new Set(input.allowedPlans) : null;

  let best: PlanMatch | null = null;

  for (const planId of planIds(library)) {
    if (allowed && !allowed.has(planId)) continue;
    const plan = library.plans[planId];
    if (!plan) continue;

    const tagged = plan.domains.length > 0;
    if (tagged && !plan.domains.includes(input.domain)) continue;

    const hits = countHits(plan.triggers, message);
    if (hits < plan.triggerThreshold) continue;

    const score = hits + (tagged ? 1 : 0);
    if (score > (best?.score ?? 0)) {
      best = { planId, plan, score };
    }
  }

  return best;
}

export function countHits(triggers: readonly string[], message: string): number {
  return triggers.filter((t) => message.includes(t.toLowerCase())).length;
}
