import { z } from 'zod';

import { paceLevelSchema } from './plan.js';
import { traversalEventSchema } from './state.js';

// ── Turn outcome ──────────────────────────────────────────────

export const turnOutcomeSchema = z.enum([
  'idle',
  'activated',
  'active',
  'completed',
  'escalated',
  'expired',
  'abandoned',
  'passthrough',
]);

export type TurnOutcome = z.infer<typeof turnOutcomeSchema>;

// ── TurnReport ────────────────────────────────────────────────

export const turnReportSchema = z.object({
  index: z.number().int().nonnegative(),
  outcome: turnOutcomeSchema,
  planId: z.string().optional(),
  currentNode: z.string().optional(),
  toolOutput: z.string().optional(),
  injection: z.string().optional(),
  error: z.string().optional(),
});

export type TurnReport = z.infer<typeof turnReportSchema>;

// ── SimulationRun ─────────────────────────────────────────────

export const simulationRunSchema = z.object({
  runId: z.string().min(1),
  script: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
  turns: z.array(turnReportSchema),
  finalOutcome: turnOutcomeSchema,
  paceLevel: paceLevelSchema,
  activePlan: z.string().optional(),
  events: z.array(traversalEventSchema),
});

export type SimulationRun = z.infer<typeof simulationRunSchema>;

// ── Deterministic run verdict ────────────────────────────────
// The last non-idle turn decides the run.

export function computeFinalOutcome(turns: readonly TurnReport[]): TurnOutcome {
  let last: TurnOutcome = 'idle';
  for (const turn of turns) {
    if (turn.outcome !== 'idle') last = turn.outcome;
  }
  return last;
}

// ── Validators ────────────────────────────────────────────────

export function parseSimulationRun(data: unknown): SimulationRun {
  return simulationRunSchema.parse(data);
}
