import { z } from 'zod';

// ── Turn history records ─────────────────────────────────────
// Shape of the host's turn history. Only user messages and tool
// results are read; assistant turns are skipped.

const userTurnSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
});

const assistantTurnSchema = z.object({
  role: z.literal('assistant'),
  content: z.string(),
});

const toolTurnSchema = z.object({
  role: z.literal('tool'),
  toolName: z.string().min(1),
  output: z.string(),
});

export const turnRecordSchema = z.discriminatedUnion('role', [
  userTurnSchema,
  assistantTurnSchema,
  toolTurnSchema,
]);

export type TurnRecord = z.infer<typeof turnRecordSchema>;
export type UserTurn = z.infer<typeof userTurnSchema>;
export type ToolTurn = z.infer<typeof toolTurnSchema>;

// ── Per-turn engine input ────────────────────────────────────

export const turnInputSchema = z.object({
  domain: z.string().optional().default(''),
  message: z.string().optional().default(''),
  toolOutput: z.string().optional(),
  confirmed: z.boolean().optional(),
  allowedPlans: z.array(z.string()).optional(),
});

export type TurnInput = z.infer<typeof turnInputSchema>;

// ── Simulation script ────────────────────────────────────────

export const simulationScriptSchema = z.object({
  name: z.string().min(1).optional(),
  domain: z.string().optional().default(''),
  allowedPlans: z.array(z.string()).optional(),
  turns: z.array(turnInputSchema.partial()).min(1),
});

export type SimulationScript = z.infer<typeof simulationScriptSchema>;

export function parseSimulationScript(data: unknown): SimulationScript {
  return simulationScriptSchema.parse(data);
}
