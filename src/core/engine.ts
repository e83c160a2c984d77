import type {
  ConfirmationMode,
  EdgeCondition,
  EscalateNode,
  EventInput,
  NodeVisit,
  PaceLevel,
  Plan,
  PlanGraph,
  TaskNode,
  TraversalState,
} from '../schema/index.js';
import { countTaskNodes, getNode, getVisit, nodeName } from '../schema/index.js';
import { LIMITS, PLAN_DEFAULTS } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { appendEvent, lastOutcome } from './eventLog.js';
import { ROUTES, decisionRoute, resolveEdge } from './edges.js';
import { renderEscalation, renderStatus } from './projector.js';
import { verifyOutput } from './verifier.js';

// ── Public types ─────────────────────────────────────────────

export type GraphPlan = Plan & { graph: PlanGraph };

export interface EngineOptions {
  confirmation?: ConfirmationMode | undefined;
  /** Staleness window for plans that do not declare their own. */
  staleAfterTurns?: number | undefined;
}

export interface AdvanceInput {
  toolOutput?: string | undefined;
  confirmed?: boolean | undefined;
}

/**
 * Outcome of one engine call. Terminal variants carry the final state
 * for diagnostics; the caller drops it from the session.
 */
export type StepResult =
  | { kind: 'active'; state: TraversalState; status: string }
  | {
      kind: 'completed';
      state: TraversalState;
      completedNodes: number;
      totalNodes: number;
    }
  | {
      kind: 'escalated';
      state: TraversalState;
      paceLevel: PaceLevel;
      reason: string;
      message: string;
    }
  | { kind: 'expired'; state: TraversalState }
  | { kind: 'abandoned'; state: TraversalState; reason: string };

export function hasGraph(plan: Plan): plan is GraphPlan {
  return plan.graph !== undefined;
}

// ── Activation ───────────────────────────────────────────────

/**
 * Start a traversal: enter the start node, follow its unconditional edge
 * and auto-route to the first node that needs action.
 */
export function activatePlan(
  planId: string,
  plan: GraphPlan,
  options: EngineOptions = {},
): StepResult {
  const draft = createTraversal(planId, plan, options);
  log.activated(draft.planName, draft.totalNodes);

  enterFromStart(draft, plan.graph);
  return settle(draft, plan);
}

export function createTraversal(
  planId: string,
  plan: GraphPlan,
  options: EngineOptions = {},
): TraversalState {
  const { graph } = plan;
  const state: TraversalState = {
    planId,
    planName: plan.name ?? planId,
    currentNode: graph.start,
    path: [graph.start],
    visited: {},
    turn: 0,
    turnsSinceTransition: 0,
    turnsSinceProgress: 0,
    completedNodes: 0,
    totalNodes: countTaskNodes(graph),
    staleAfterTurns:
      plan.staleAfterTurns ?? options.staleAfterTurns ?? PLAN_DEFAULTS.STALE_AFTER_TURNS,
    stepsCompleted: [],
    stepsFailed: [],
    events: [],
  };
  emit(state, { type: 'plan_activated', node: graph.start, plan: planId });
  return state;
}

// ── Per-turn driver ──────────────────────────────────────────

/**
 * Advance an active traversal by one host turn. The given state is not
 * modified; the next state is returned in the result.
 *
 * Without tool output a task node holds, but counters still move so a
 * traversal that never transitions eventually expires.
 */
export function advancePlan(
  state: TraversalState,
  plan: Plan | undefined,
  input: AdvanceInput = {},
  options: EngineOptions = {},
): StepResult {
  const draft = structuredClone(tickTraversal(state));

  if (isStale(draft)) {
    return { kind: 'expired', state: expireTraversal(draft) };
  }

  if (!plan || !hasGraph(plan)) {
    return abandon(draft, `plan "${draft.planId}" has no graph in the library`);
  }

  const node = getNode(plan.graph, draft.currentNode);
  if (!node) {
    return abandon(draft, `node "${draft.currentNode}" is not defined`);
  }

  switch (node.type) {
    case 'exit':
      return complete(draft);
    case 'escalate':
      return escalate(draft, node);
    case 'start':
      enterFromStart(draft, plan.graph);
      break;
    case 'task':
      if (input.toolOutput !== undefined) {
        runTask(draft, plan.graph, node, input.toolOutput, {
          confirmation: options.confirmation,
          confirmed: input.confirmed,
        });
      }
      break;
    case 'decision':
    case 'checkpoint':
      autoRoute(draft, plan.graph);
      break;
  }

  return settle(draft, plan);
}

// ── Turn accounting ──────────────────────────────────────────
// Kept apart from advancePlan so a turn that fails inside the engine
// still counts against the staleness window.

export function tickTraversal(state: TraversalState): TraversalState {
  return {
    ...state,
    turn: state.turn + 1,
    turnsSinceTransition: state.turnsSinceTransition + 1,
    turnsSinceProgress: state.turnsSinceProgress + 1,
  };
}

export function isStale(state: TraversalState): boolean {
  return state.turnsSinceTransition > state.staleAfterTurns;
}

export function expireTraversal(state: TraversalState): TraversalState {
  const next = { ...state };
  emit(next, { type: 'plan_expired', node: next.currentNode });
  log.expired(next.planName, next.staleAfterTurns);
  return next;
}

// ── Task verification ────────────────────────────────────────

function runTask(
  draft: TraversalState,
  graph: PlanGraph,
  node: TaskNode,
  output: string,
  verifyOptions: { confirmation: ConfirmationMode | undefined; confirmed: boolean | undefined },
): void {
  const nodeId = draft.currentNode;
  const visit: NodeVisit = { ...(getVisit(draft, nodeId) ?? freshVisit()) };
  visit.attempts += 1;
  draft.visited[nodeId] = visit;

  const passed = verifyOutput(node.verify, output, verifyOptions);
  emit(draft, { type: 'node_verified', node: nodeId, outcome: passed ? 'success' : 'fail' });
  log.verified(nodeName(graph, nodeId), passed, visit.attempts);

  if (passed) {
    visit.outcome = 'success';
    // Loops revisit nodes; only the first success counts as progress.
    if (!draft.stepsCompleted.includes(nodeId)) {
      draft.completedNodes += 1;
      draft.stepsCompleted.push(nodeId);
      draft.turnsSinceProgress = 0;
    }
    follow(draft, graph, ROUTES.success, 'success');
    return;
  }

  if (visit.attempts <= node.maxRetries) {
    emit(draft, { type: 'retry_triggered', node: nodeId, attempt: visit.attempts });
    const edge = resolveEdge(graph, nodeId, ROUTES.retry);
    if (edge) {
      moveTo(draft, edge.from, edge.to, edge.condition);
      autoRoute(draft, graph);
    }
    return;
  }

  visit.outcome = 'fail';
  if (!draft.stepsFailed.includes(nodeId)) {
    draft.stepsFailed.push(nodeId);
  }
  follow(draft, graph, ROUTES.exhaust, 'exhaust');
}

function follow(
  draft: TraversalState,
  graph: PlanGraph,
  conditions: readonly EdgeCondition[],
  label: string,
): void {
  const edge = resolveEdge(graph, draft.currentNode, conditions);
  if (!edge) {
    log.stalled(draft.currentNode, label);
    return;
  }
  moveTo(draft, edge.from, edge.to, edge.condition);
  autoRoute(draft, graph);
}

// ── Routing ──────────────────────────────────────────────────

function enterFromStart(draft: TraversalState, graph: PlanGraph): void {
  const startId = graph.start;
  draft.currentNode = startId;
  draft.visited[startId] = freshVisit();
  emit(draft, { type: 'node_entered', node: startId });

  const edge = resolveEdge(graph, startId, ROUTES.start);
  if (!edge) {
    log.stalled(startId, 'start');
    return;
  }
  moveTo(draft, edge.from, edge.to, edge.condition);
  autoRoute(draft, graph);
}

/**
 * Follow edges through start, decision and checkpoint nodes until a
 * task, exit or escalate node is reached. Capped at MAX_ROUTE_DEPTH
 * moves so a cyclic decision graph still ends the turn.
 */
function autoRoute(draft: TraversalState, graph: PlanGraph): void {
  for (let depth = 0; depth < LIMITS.MAX_ROUTE_DEPTH; depth++) {
    const nodeId = draft.currentNode;
    const node = getNode(graph, nodeId);
    if (!node) return;

    let conditions: readonly EdgeCondition[];
    switch (node.type) {
      case 'start':
        conditions = ROUTES.start;
        break;
      case 'checkpoint':
        conditions = ROUTES.checkpoint;
        break;
      case 'decision':
        conditions = decisionRoute(lastOutcome(draft.events));
        break;
      default:
        return;
    }

    const edge = resolveEdge(graph, nodeId, conditions);
    if (!edge) {
      log.stalled(nodeId, conditions[0] ?? 'always');
      return;
    }
    if (node.type === 'decision') {
      draft.visited[nodeId] = { outcome: 'success', attempts: 0 };
    }
    moveTo(draft, nodeId, edge.to, edge.condition);
  }
}

/** Every entry starts the node with a fresh retry budget. */
function moveTo(
  draft: TraversalState,
  from: string,
  to: string,
  condition: EdgeCondition,
): void {
  draft.currentNode = to;
  draft.path.push(to);
  draft.turnsSinceTransition = 0;
  draft.visited[to] = freshVisit();

  emit(draft, { type: 'edge_followed', from, to, condition });
  emit(draft, { type: 'node_entered', node: to });
}

// ── Terminal handling ────────────────────────────────────────

/** Exit and escalate nodes are handled the turn they are reached. */
function settle(draft: TraversalState, plan: GraphPlan): StepResult {
  const node = getNode(plan.graph, draft.currentNode);
  if (node?.type === 'exit') return complete(draft);
  if (node?.type === 'escalate') return escalate(draft, node);
  return { kind: 'active', state: draft, status: renderStatus(draft, plan) };
}

function complete(draft: TraversalState): StepResult {
  emit(draft, { type: 'plan_completed', node: draft.currentNode });
  log.completed(draft.planName, draft.completedNodes, draft.totalNodes);
  return {
    kind: 'completed',
    state: draft,
    completedNodes: draft.completedNodes,
    totalNodes: draft.totalNodes,
  };
}

function escalate(draft: TraversalState, node: EscalateNode): StepResult {
  const { paceLevel, reason } = node;
  emit(draft, {
    type: 'plan_escalated',
    node: draft.currentNode,
    reason,
    paceLevel,
  });
  log.escalated(draft.planName, paceLevel, reason);
  return {
    kind: 'escalated',
    state: draft,
    paceLevel,
    reason,
    message: renderEscalation(draft, reason, paceLevel),
  };
}

function abandon(draft: TraversalState, reason: string): StepResult {
  log.warn(`Abandoning plan '${draft.planName}': ${reason}`);
  return { kind: 'abandoned', state: draft, reason };
}

// ── Helpers ──────────────────────────────────────────────────

function freshVisit(): NodeVisit {
  return { outcome: 'pending', attempts: 0 };
}

function emit(draft: TraversalState, event: EventInput): void {
  draft.events = appendEvent(draft.events, event, draft.turn);
}
