import { z } from 'zod';

import { PLAN_DEFAULTS } from '../config/defaults.js';

// ── Verification spec ─────────────────────────────────────────

export const verificationTypeSchema = z.enum([
  'output_contains',
  'output_not_contains',
  'exit_code_zero',
  'any_output',
  'file_exists',
  'manual',
]);

export type VerificationType = z.infer<typeof verificationTypeSchema>;

export const verificationSpecSchema = z.object({
  type: verificationTypeSchema,
  value: z.string().optional().default(''),
});

export type VerificationSpec = z.infer<typeof verificationSpecSchema>;

// ── Pace level ────────────────────────────────────────────────

export const paceLevelSchema = z.enum([
  'primary',
  'alternate',
  'contingent',
  'emergency',
]);

export type PaceLevel = z.infer<typeof paceLevelSchema>;

// ── Node type discriminator ───────────────────────────────────

export const nodeTypeSchema = z.enum([
  'start',
  'task',
  'decision',
  'checkpoint',
  'exit',
  'escalate',
]);

export type NodeType = z.infer<typeof nodeTypeSchema>;

// ── Individual node schemas ───────────────────────────────────

const baseFields = {
  name: z.string().min(1).optional(),
};

export const startNodeSchema = z.object({
  ...baseFields,
  type: z.literal('start'),
});

export const taskNodeSchema = z.object({
  ...baseFields,
  type: z.literal('task'),
  action: z.string().min(1),
  tool: z.string().min(1).optional(),
  toolHint: z.string().min(1).optional(),
  verify: verificationSpecSchema.optional(),
  maxRetries: z.number().int().nonnegative().optional().default(PLAN_DEFAULTS.MAX_RETRIES),
});

export const decisionNodeSchema = z.object({
  ...baseFields,
  type: z.literal('decision'),
  description: z.string().min(1).optional(),
});

export const checkpointNodeSchema = z.object({
  ...baseFields,
  type: z.literal('checkpoint'),
});

export const exitNodeSchema = z.object({
  ...baseFields,
  type: z.literal('exit'),
});

export const escalateNodeSchema = z.object({
  ...baseFields,
  type: z.literal('escalate'),
  paceLevel: paceLevelSchema.optional().default(PLAN_DEFAULTS.PACE_LEVEL),
  reason: z.string().min(1).optional().default(PLAN_DEFAULTS.ESCALATION_REASON),
});

// ── Union schema ──────────────────────────────────────────────

export const planNodeSchema = z.discriminatedUnion('type', [
  startNodeSchema,
  taskNodeSchema,
  decisionNodeSchema,
  checkpointNodeSchema,
  exitNodeSchema,
  escalateNodeSchema,
]);

export type PlanNode = z.infer<typeof planNodeSchema>;

export type StartNode = z.infer<typeof startNodeSchema>;
export type TaskNode = z.infer<typeof taskNodeSchema>;
export type DecisionNode = z.infer<typeof decisionNodeSchema>;
export type CheckpointNode = z.infer<typeof checkpointNodeSchema>;
export type ExitNode = z.infer<typeof exitNodeSchema>;
export type EscalateNode = z.infer<typeof escalateNodeSchema>;

// ── Edges ─────────────────────────────────────────────────────
// Conditions are "always" or "on_<outcome>". The outcome part is open so
// decision nodes can branch on any recorded outcome.

export const EDGE_CONDITIONS = {
  ALWAYS: 'always',
  ON_SUCCESS: 'on_success',
  ON_RETRY: 'on_retry',
  ON_EXHAUST: 'on_exhaust',
  ON_FAIL: 'on_fail',
} as const;

export const edgeConditionSchema = z
  .string()
  .regex(/^(always|on_[a-z0-9_]+)$/, 'Condition must be "always" or "on_<outcome>"');

export type EdgeCondition = z.infer<typeof edgeConditionSchema>;

export const planEdgeSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  condition: edgeConditionSchema.optional().default(EDGE_CONDITIONS.ALWAYS),
});

export type PlanEdge = z.infer<typeof planEdgeSchema>;

// ── Graph ─────────────────────────────────────────────────────

export const planGraphSchema = z
  .object({
    start: z.string().min(1),
    nodes: z.record(z.string().min(1), planNodeSchema),
    edges: z.array(planEdgeSchema).optional().default([]),
  })
  .superRefine((graph, ctx) => {
    if (!Object.hasOwn(graph.nodes, graph.start)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['start'],
        message: `Start node "${graph.start}" is not defined`,
      });
    }

    graph.edges.forEach((edge, index) => {
      for (const end of ['from', 'to'] as const) {
        if (!Object.hasOwn(graph.nodes, edge[end])) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['edges', index, end],
            message: `Edge references undefined node "${edge[end]}"`,
          });
        }
      }
    });
  });

export type PlanGraph = z.infer<typeof planGraphSchema>;

// ── Plan ──────────────────────────────────────────────────────

export const planSchema = z.object({
  name: z.string().min(1).optional(),
  domains: z.array(z.string().min(1)).optional().default([]),
  triggers: z.array(z.string().min(1)).optional().default([]),
  triggerThreshold: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .default(PLAN_DEFAULTS.TRIGGER_THRESHOLD),
  staleAfterTurns: z.number().int().positive().optional(),
  graph: planGraphSchema.optional(),
});

export type Plan = z.infer<typeof planSchema>;

// ── Library ───────────────────────────────────────────────────

export const planLibrarySchema = z.object({
  plans: z.record(z.string().min(1), planSchema),
  /**
   * Plan ids in document order. Object keys list integer-like ids first,
   * so the loader records the order the file declares.
   */
  order: z.array(z.string().min(1)).optional(),
});

export type PlanLibrary = z.infer<typeof planLibrarySchema>;

/** Plan ids in declaration order; ids missing from `order` follow in key order. */
export function planIds(library: PlanLibrary): string[] {
  const keys = Object.keys(library.plans);
  if (!library.order) return keys;
  const listed = library.order.filter((id) => Object.hasOwn(library.plans, id));
  return [...new Set([...listed, ...keys])];
}

// ── Parser ────────────────────────────────────────────────────

export function parsePlanLibrary(data: unknown): PlanLibrary {
  return planLibrarySchema.parse(data);
}

// ── Type guards ───────────────────────────────────────────────

export function isTaskNode(node: PlanNode): node is TaskNode {
  return node.type === 'task';
}

export function isDecisionNode(node: PlanNode): node is DecisionNode {
  return node.type === 'decision';
}

export function isEscalateNode(node: PlanNode): node is EscalateNode {
  return node.type === 'escalate';
}

/** Nodes the engine routes through without waiting for a tool call. */
export function isPassThroughNode(node: PlanNode): boolean {
  return node.type === 'start' || node.type === 'decision' || node.type === 'checkpoint';
}

// ── Lookups ───────────────────────────────────────────────────

export function getNode(graph: PlanGraph, nodeId: string): PlanNode | undefined {
  return Object.hasOwn(graph.nodes, nodeId) ? graph.nodes[nodeId] : undefined;
}

/** Display name of a node, falling back to its id. */
export function nodeName(graph: PlanGraph, nodeId: string): string {
  return getNode(graph, nodeId)?.name ?? nodeId;
}

export function countTaskNodes(graph: PlanGraph): number {
  return Object.values(graph.nodes).filter(isTaskNode).length;
}
