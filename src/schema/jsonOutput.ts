import { z } from 'zod';

import { paceLevelSchema } from './plan.js';
import { turnOutcomeSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Turn output ─────────────────────────────────────────────

export const jsonOutputTurnSchema = z.object({
  index: z.number().int().nonnegative(),
  outcome: turnOutcomeSchema,
  plan: z.string(),
  node: z.string(),
  error: z.string(),
});

export type JsonOutputTurn = z.infer<typeof jsonOutputTurnSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  script: z.string(),
  outcome: turnOutcomeSchema,
  paceLevel: paceLevelSchema,
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  eventCount: z.number().int().nonnegative(),
  turns: z.array(jsonOutputTurnSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
