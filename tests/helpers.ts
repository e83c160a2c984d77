import { vi } from 'vitest';

import { planSchema } from '../src/schema/index.js';
import { hasGraph } from '../src/core/index.js';
import type { GraphPlan } from '../src/core/index.js';

/** Parse a plan document through the real schema so defaults apply. */
export function graphPlan(doc: unknown): GraphPlan {
  const plan = planSchema.parse(doc);
  if (!hasGraph(plan)) throw new Error('fixture plan has no graph');
  return plan;
}

/** Swallow logger output and expose the lines written to stderr. */
export function captureStderr(): { lines: () => string[]; restore: () => void } {
  const spy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  return {
    lines: () => spy.mock.calls.map((call) => String(call[0]).replace(/\n$/, '')),
    restore: () => spy.mockRestore(),
  };
}

// ── Shared plans ─────────────────────────────────────────────

/** start → A (contains "done", 1 retry) → exit */
export function singleTaskPlan(extraEdges: unknown[] = [], extraNodes: object = {}): GraphPlan {
  return graphPlan({
    name: 'Single Task',
    graph: {
      start: 'S',
      nodes: {
        S: { type: 'start' },
        A: {
          type: 'task',
          action: 'Do A',
          verify: { type: 'output_contains', value: 'done' },
          maxRetries: 1,
        },
        END: { type: 'exit' },
        ...extraNodes,
      },
      edges: [
        { from: 'S', to: 'A' },
        { from: 'A', to: 'END', condition: 'on_success' },
        ...extraEdges,
      ],
    },
  });
}
