import type { EdgeCondition, PlanEdge, PlanGraph, VerifiedOutcome } from '../schema/index.js';
import { EDGE_CONDITIONS } from '../schema/index.js';

// ── Fallback chains ──────────────────────────────────────────
// Conditions tried in order; a generic "always" edge is the last resort
// for every chain.

export const ROUTES = {
  start: [EDGE_CONDITIONS.ALWAYS],
  checkpoint: [EDGE_CONDITIONS.ALWAYS],
  success: [EDGE_CONDITIONS.ON_SUCCESS, EDGE_CONDITIONS.ALWAYS],
  retry: [EDGE_CONDITIONS.ON_RETRY],
  exhaust: [EDGE_CONDITIONS.ON_EXHAUST, EDGE_CONDITIONS.ON_FAIL, EDGE_CONDITIONS.ALWAYS],
} as const satisfies Record<string, readonly EdgeCondition[]>;

export function decisionRoute(outcome: VerifiedOutcome): readonly EdgeCondition[] {
  return [`on_${outcome}`, EDGE_CONDITIONS.ALWAYS];
}

// ── Resolution ───────────────────────────────────────────────

export function outgoingEdges(graph: PlanGraph, from: string): PlanEdge[] {
  return graph.edges.filter((e) => e.from === from);
}

/**
 * First edge leaving `from` whose condition matches, trying `conditions`
 * in order and then "always". The first matching edge in document order
 * wins within a condition. Returns null when nothing matches (a stall).
 */
export function resolveEdge(
  graph: PlanGraph,
  from: string,
  conditions: readonly EdgeCondition[],
): PlanEdge | null {
  const candidates = outgoingEdges(graph, from);
  const chain = [...conditions, EDGE_CONDITIONS.ALWAYS];

  for (const condition of chain) {
    const edge = candidates.find((e) => e.condition === condition);
    if (edge) return edge;
  }

  return null;
}
