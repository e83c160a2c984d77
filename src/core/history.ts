import type { TurnRecord } from '../schema/index.js';

/** Most recent user message, trimmed and lower-cased; "" when none. */
export function lastUserMessage(turns: readonly TurnRecord[]): string {
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (turn?.role === 'user') return turn.content.trim().toLowerCase();
  }
  return '';
}

/**
 * Most recent tool result, scanning backward. `undefined` means no tool
 * has run yet, which is not the same as an empty output.
 */
export function lastToolOutput(turns: readonly TurnRecord[]): string | undefined {
  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (turn?.role === 'tool') return turn.output;
  }
  return undefined;
}
