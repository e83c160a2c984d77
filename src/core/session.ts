import type {
  PaceLevel,
  PlanLibrary,
  TraversalEvent,
  TraversalState,
  TurnInput,
  TurnOutcome,
} from '../schema/index.js';
import { SESSION_DEFAULTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import {
  activatePlan,
  advancePlan,
  expireTraversal,
  hasGraph,
  isStale,
  tickTraversal,
} from './engine.js';
import type { EngineOptions, StepResult } from './engine.js';
import { matchPlan } from './matcher.js';

// ── Public types ─────────────────────────────────────────────

/**
 * Per-session value owned by the host loop and passed back in every turn.
 * At most one traversal is active at a time.
 */
export interface SessionState {
  traversal: TraversalState | null;
  paceLevel: PaceLevel;
}

export interface EscalationSignal {
  planId: string;
  planName: string;
  paceLevel: PaceLevel;
  reason: string;
  message: string;
  completedNodes: number;
  totalNodes: number;
}

export interface SessionOptions extends EngineOptions {
  /** Downstream consumer of escalations (severity/guidance systems). */
  onEscalation?: ((signal: EscalationSignal) => void) | undefined;
}

export interface TurnResult {
  session: SessionState;
  outcome: TurnOutcome;
  planId?: string | undefined;
  /** Status block or escalation message for the next reasoning step. */
  injection?: string | undefined;
  /** Event log after this turn; for terminal outcomes, the final trace. */
  events: TraversalEvent[];
  error?: string | undefined;
}

export interface ProgressSnapshot {
  planId: string;
  planName: string;
  currentNode: string;
  turnsSinceProgress: number;
  completedNodes: number;
  totalNodes: number;
}

// ── Session lifecycle ────────────────────────────────────────

export function createSession(): SessionState {
  return { traversal: null, paceLevel: SESSION_DEFAULTS.PACE_LEVEL };
}

/**
 * Run the plan engine for one host turn.
 *
 * With no active traversal, tries to match and activate a plan from the
 * user message. Otherwise advances the active traversal with this turn's
 * tool output. Never throws: an internal error is logged and the turn
 * passes through. The turn still counts against the active traversal's
 * staleness window, so a persistent error ends in expiry.
 */
export function runTurn(
  session: SessionState,
  library: PlanLibrary,
  input: TurnInput,
  options: SessionOptions = {},
): TurnResult {
  try {
    if (session.traversal) {
      const { planId } = session.traversal;
      const plan = Object.hasOwn(library.plans, planId) ? library.plans[planId] : undefined;
      const result = advancePlan(
        session.traversal,
        plan,
        { toolOutput: input.toolOutput, confirmed: input.confirmed },
        options,
      );
      return applyStep(session, result, 'active', options);
    }

    if (input.message.trim().length === 0) {
      return idle(session);
    }

    const match = matchPlan(library, {
      domain: input.domain,
      message: input.message,
      allowedPlans: input.allowedPlans,
    });
    if (!match) return idle(session);

    if (!hasGraph(match.plan)) {
      log.warn(`Plan '${match.planId}' matched but has no graph — skipped`);
      return idle(session);
    }

    const result = activatePlan(match.planId, match.plan, options);
    return applyStep(session, result, 'activated', options);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Plan engine error (passthrough): ${message}`);
    return passthrough(session, message);
  }
}

/** Progress view for a supervisor watching for stalls. */
export function progressSnapshot(session: SessionState): ProgressSnapshot | null {
  const t = session.traversal;
  if (!t) return null;
  return {
    planId: t.planId,
    planName: t.planName,
    currentNode: t.currentNode,
    turnsSinceProgress: t.turnsSinceProgress,
    completedNodes: t.completedNodes,
    totalNodes: t.totalNodes,
  };
}

// ── Result mapping ───────────────────────────────────────────

function applyStep(
  session: SessionState,
  result: StepResult,
  activeOutcome: 'active' | 'activated',
  options: SessionOptions,
): TurnResult {
  const { state } = result;
  const base = { planId: state.planId, events: state.events };

  switch (result.kind) {
    case 'active':
      return {
        ...base,
        session: { ...session, traversal: state },
        outcome: activeOutcome,
        injection: result.status,
      };
    case 'completed':
      return { ...base, session: { ...session, traversal: null }, outcome: 'completed' };
    case 'escalated':
      notifyEscalation(options, {
        planId: state.planId,
        planName: state.planName,
        paceLevel: result.paceLevel,
        reason: result.reason,
        message: result.message,
        completedNodes: state.completedNodes,
        totalNodes: state.totalNodes,
      });
      return {
        ...base,
        session: { traversal: null, paceLevel: result.paceLevel },
        outcome: 'escalated',
        injection: result.message,
      };
    case 'expired':
      return { ...base, session: { ...session, traversal: null }, outcome: 'expired' };
    case 'abandoned':
      return {
        ...base,
        session: { ...session, traversal: null },
        outcome: 'abandoned',
        error: result.reason,
      };
  }
}

/** The escalation has happened either way; a failing sink only warns. */
function notifyEscalation(options: SessionOptions, signal: EscalationSignal): void {
  try {
    options.onEscalation?.(signal);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Escalation sink failed: ${message}`);
  }
}

function passthrough(session: SessionState, error: string): TurnResult {
  const { traversal } = session;
  if (!traversal) {
    return { session, outcome: 'passthrough', events: [], error };
  }

  const ticked = tickTraversal(traversal);
  if (isStale(ticked)) {
    const expired = expireTraversal(ticked);
    return {
      session: { ...session, traversal: null },
      outcome: 'expired',
      planId: expired.planId,
      events: expired.events,
      error,
    };
  }

  return {
    session: { ...session, traversal: ticked },
    outcome: 'passthrough',
    planId: ticked.planId,
    events: ticked.events,
    error,
  };
}

function idle(session: SessionState): TurnResult {
  return { session, outcome: 'idle', events: [] };
}
