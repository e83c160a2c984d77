import { z } from 'zod';

// ── Confirmation policy ─────────────────────────────────────
// "assume": file_exists/manual checks pass on any output.
// "require": they pass only when the turn carries an external confirmation.

export const confirmationModeSchema = z.enum(['assume', 'require']);

export type ConfirmationMode = z.infer<typeof confirmationModeSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  library: z.string().min(1).optional(),
  confirmation: confirmationModeSchema.optional().default('assume'),
  staleAfterTurns: z.number().int().positive().optional(),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
