/**
 * Core orchestration module.
 * Matcher → engine → verifier → projector, driven once per host turn.
 * Pure logic — no IO, no CLI.
 */

export { matchPlan, countHits } from './matcher.js';
export type { MatchInput, PlanMatch } from './matcher.js';
export { verifyOutput, describeVerification } from './verifier.js';
export type { VerifyOptions } from './verifier.js';
export { appendEvent, lastOutcome, eventsOfType } from './eventLog.js';
export { ROUTES, decisionRoute, outgoingEdges, resolveEdge } from './edges.js';
export {
  activatePlan,
  advancePlan,
  createTraversal,
  expireTraversal,
  hasGraph,
  isStale,
  tickTraversal,
} from './engine.js';
export type { AdvanceInput, EngineOptions, GraphPlan, StepResult } from './engine.js';
export { renderStatus, renderEscalation } from './projector.js';
export { createSession, runTurn, progressSnapshot } from './session.js';
export type {
  EscalationSignal,
  ProgressSnapshot,
  SessionOptions,
  SessionState,
  TurnResult,
} from './session.js';
export { lastUserMessage, lastToolOutput } from './history.js';
export { runScript, exitCodeFor } from './simulate.js';
export type { SimulationConfig, SimulationResult } from './simulate.js';
