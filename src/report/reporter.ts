import type { SimulationRun, TurnOutcome, TurnReport } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput, JsonOutputTurn } from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputTurn };

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(run: SimulationRun, exitCode: number): JsonOutput {
  return {
    version: JSON_OUTPUT_VERSION,
    runId: run.runId,
    script: run.script,
    outcome: run.finalOutcome,
    paceLevel: run.paceLevel,
    durationMs: run.durationMs,
    exitCode,
    eventCount: run.events.length,
    turns: run.turns.map(turnToJSON),
  };
}

function turnToJSON(turn: TurnReport): JsonOutputTurn {
  return {
    index: turn.index,
    outcome: turn.outcome,
    plan: turn.planId ?? '',
    node: turn.currentNode ?? '',
    error: turn.error ?? '',
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(run: SimulationRun): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# Plan Simulation Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Script** | ${escapeMarkdownCell(run.script)} |`);
  lines.push(`| **Run ID** | \`${run.runId}\` |`);
  lines.push(`| **Started** | ${run.startedAt} |`);
  lines.push(`| **Finished** | ${run.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(run.durationMs)} |`);
  lines.push(`| **Outcome** | **${run.finalOutcome}** ${outcomeIcon(run.finalOutcome)} |`);
  lines.push(`| **PACE level** | ${run.paceLevel} |`);
  if (run.activePlan) {
    lines.push(`| **Active plan** | ${run.activePlan} |`);
  }
  lines.push('');

  // Turn summary table
  lines.push(`## Turns`);
  lines.push('');
  lines.push(`| # | Outcome | Plan | Node | Tool output |`);
  lines.push(`|---|---------|------|------|-------------|`);

  for (const turn of run.turns) {
    lines.push(
      `| ${String(turn.index)} | ${turn.outcome} ${outcomeIcon(turn.outcome)} | ${turn.planId ?? ''} | ${turn.currentNode ?? ''} | ${escapeMarkdownCell(truncate(turn.toolOutput ?? '', 60))} |`,
    );
  }

  lines.push('');

  // Injected status blocks
  const injected = run.turns.filter((t) => t.injection !== undefined);
  if (injected.length > 0) {
    lines.push(`## Injected Context`);
    lines.push('');
    for (const turn of injected) {
      lines.push(`### Turn ${String(turn.index)}`);
      lines.push('');
      lines.push('```');
      lines.push(turn.injection ?? '');
      lines.push('```');
      lines.push('');
    }
  }

  // Event trace
  if (run.events.length > 0) {
    lines.push(`## Event Trace`);
    lines.push('');
    for (const event of run.events) {
      lines.push(`- ${describeEvent(event)}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function describeEvent(event: SimulationRun['events'][number]): string {
  const prefix = `turn ${String(event.turn)}: ${event.type}`;
  switch (event.type) {
    case 'plan_activated':
      return `${prefix} ${event.plan}`;
    case 'edge_followed':
      return `${prefix} ${event.from} → ${event.to} (${event.condition})`;
    case 'node_verified':
      return `${prefix} ${event.node} ${event.outcome}`;
    case 'retry_triggered':
      return `${prefix} ${event.node} attempt ${String(event.attempt)}`;
    case 'plan_escalated':
      return `${prefix} ${event.paceLevel}: ${event.reason}`;
    case 'node_entered':
    case 'plan_expired':
    case 'plan_completed':
      return `${prefix} ${event.node}`;
  }
}

function outcomeIcon(outcome: TurnOutcome): string {
  switch (outcome) {
    case 'completed':
      return '[DONE]';
    case 'escalated':
    case 'expired':
    case 'abandoned':
    case 'passthrough':
      return '[STOP]';
    case 'activated':
    case 'active':
      return '[RUN]';
    case 'idle':
      return '';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
