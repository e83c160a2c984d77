import { z } from 'zod';

import { paceLevelSchema } from './plan.js';

// ── Node visit ────────────────────────────────────────────────

export const visitOutcomeSchema = z.enum(['pending', 'success', 'fail']);

export type VisitOutcome = z.infer<typeof visitOutcomeSchema>;

export const verifiedOutcomeSchema = z.enum(['success', 'fail']);

export type VerifiedOutcome = z.infer<typeof verifiedOutcomeSchema>;

export const nodeVisitSchema = z.object({
  outcome: visitOutcomeSchema,
  attempts: z.number().int().nonnegative(),
});

export type NodeVisit = z.infer<typeof nodeVisitSchema>;

// ── Traversal events ──────────────────────────────────────────

const eventBase = {
  turn: z.number().int().nonnegative(),
};

const planActivatedEventSchema = z.object({
  ...eventBase,
  type: z.literal('plan_activated'),
  node: z.string(),
  plan: z.string(),
});

const nodeEnteredEventSchema = z.object({
  ...eventBase,
  type: z.literal('node_entered'),
  node: z.string(),
});

const nodeVerifiedEventSchema = z.object({
  ...eventBase,
  type: z.literal('node_verified'),
  node: z.string(),
  outcome: verifiedOutcomeSchema,
});

const retryTriggeredEventSchema = z.object({
  ...eventBase,
  type: z.literal('retry_triggered'),
  node: z.string(),
  attempt: z.number().int().positive(),
});

const edgeFollowedEventSchema = z.object({
  ...eventBase,
  type: z.literal('edge_followed'),
  from: z.string(),
  to: z.string(),
  condition: z.string(),
});

const planExpiredEventSchema = z.object({
  ...eventBase,
  type: z.literal('plan_expired'),
  node: z.string(),
});

const planCompletedEventSchema = z.object({
  ...eventBase,
  type: z.literal('plan_completed'),
  node: z.string(),
});

const planEscalatedEventSchema = z.object({
  ...eventBase,
  type: z.literal('plan_escalated'),
  node: z.string(),
  reason: z.string(),
  paceLevel: paceLevelSchema,
});

export const traversalEventSchema = z.discriminatedUnion('type', [
  planActivatedEventSchema,
  nodeEnteredEventSchema,
  nodeVerifiedEventSchema,
  retryTriggeredEventSchema,
  edgeFollowedEventSchema,
  planExpiredEventSchema,
  planCompletedEventSchema,
  planEscalatedEventSchema,
]);

export type TraversalEvent = z.infer<typeof traversalEventSchema>;

export type TraversalEventType = TraversalEvent['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Event payload as emitted; the log stamps the turn. */
export type EventInput = DistributiveOmit<TraversalEvent, 'turn'>;

// ── Traversal state ───────────────────────────────────────────

export const traversalStateSchema = z.object({
  planId: z.string().min(1),
  planName: z.string().min(1),
  currentNode: z.string().min(1),
  path: z.array(z.string()),
  visited: z.record(z.string(), nodeVisitSchema),
  turn: z.number().int().nonnegative(),
  turnsSinceTransition: z.number().int().nonnegative(),
  turnsSinceProgress: z.number().int().nonnegative(),
  completedNodes: z.number().int().nonnegative(),
  totalNodes: z.number().int().nonnegative(),
  staleAfterTurns: z.number().int().positive(),
  stepsCompleted: z.array(z.string()),
  stepsFailed: z.array(z.string()),
  events: z.array(traversalEventSchema),
});

export type TraversalState = z.infer<typeof traversalStateSchema>;

// ── Validators ────────────────────────────────────────────────

/** Validate a traversal state restored from outside the process. */
export function parseTraversalState(data: unknown): TraversalState {
  return traversalStateSchema.parse(data);
}

// ── Lookups ───────────────────────────────────────────────────

export function getVisit(state: TraversalState, nodeId: string): NodeVisit | undefined {
  return Object.hasOwn(state.visited, nodeId) ? state.visited[nodeId] : undefined;
}
