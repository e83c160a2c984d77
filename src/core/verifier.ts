import type { ConfirmationMode, VerificationSpec } from '../schema/index.js';

// ── Public types ─────────────────────────────────────────────

export interface VerifyOptions {
  confirmation?: ConfirmationMode | undefined;
  /** External confirmation for file_exists / manual checks. */
  confirmed?: boolean | undefined;
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Decide whether a tool output satisfies a node's verification spec.
 * Substring checks are case-insensitive. A node without a spec passes.
 */
export function verifyOutput(
  spec: VerificationSpec | undefined,
  output: string,
  options: VerifyOptions = {},
): boolean {
  if (!spec) return true;

  const haystack = output.toLowerCase();
  const needle = spec.value.toLowerCase();

  switch (spec.type) {
    case 'output_contains':
      return haystack.includes(needle);
    case 'output_not_contains':
      return !haystack.includes(needle);
    case 'exit_code_zero':
      // Heuristic: tool wrappers report failures in the text.
      return !haystack.includes('error') && !haystack.includes('exit code');
    case 'any_output':
      return output.trim().length > 0;
    case 'file_exists':
    case 'manual':
      return options.confirmation === 'require' ? options.confirmed === true : true;
  }
}

/** Short human description, e.g. `output_contains: passed`. */
export function describeVerification(spec: VerificationSpec): string {
  return spec.value ? `${spec.type}: ${spec.value}` : spec.type;
}
