import { randomUUID } from 'node:crypto';

import type {
  PlanLibrary,
  SimulationRun,
  SimulationScript,
  TurnReport,
} from '../schema/index.js';
import { computeFinalOutcome } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { createSession, runTurn } from './session.js';
import type { SessionOptions, SessionState } from './session.js';

// ── Public types ─────────────────────────────────────────────

export interface SimulationConfig extends SessionOptions {
  /** Label for the report; defaults to the script's own name. */
  scriptName?: string | undefined;
  /** Start from an existing session instead of a fresh one. */
  session?: SessionState | undefined;
}

export interface SimulationResult {
  run: SimulationRun;
  session: SessionState;
}

// ── Main loop ────────────────────────────────────────────────

/**
 * Drive a scripted conversation through the engine, one `runTurn` per
 * entry, the way a host loop would.
 */
export function runScript(
  library: PlanLibrary,
  script: SimulationScript,
  config: SimulationConfig = {},
): SimulationResult {
  const runId = randomUUID();
  const startedAt = new Date();
  const scriptName = config.scriptName ?? script.name ?? 'script';

  let session = config.session ?? createSession();
  let lastEvents: SimulationRun['events'] = [];
  const turns: TurnReport[] = [];

  log.section(`Simulating ${scriptName} (${String(script.turns.length)} turns)`);

  script.turns.forEach((entry, index) => {
    const result = runTurn(
      session,
      library,
      {
        domain: entry.domain ?? script.domain,
        message: entry.message ?? '',
        toolOutput: entry.toolOutput,
        confirmed: entry.confirmed,
        allowedPlans: entry.allowedPlans ?? script.allowedPlans,
      },
      config,
    );

    session = result.session;
    if (result.outcome !== 'idle') lastEvents = result.events;

    turns.push({
      index,
      outcome: result.outcome,
      ...(result.planId !== undefined ? { planId: result.planId } : {}),
      ...(session.traversal ? { currentNode: session.traversal.currentNode } : {}),
      ...(entry.toolOutput !== undefined ? { toolOutput: entry.toolOutput } : {}),
      ...(result.injection !== undefined ? { injection: result.injection } : {}),
      ...(result.error !== undefined ? { error: result.error } : {}),
    });
  });

  const finishedAt = new Date();

  return {
    run: {
      runId,
      script: scriptName,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      turns,
      finalOutcome: computeFinalOutcome(turns),
      paceLevel: session.paceLevel,
      ...(session.traversal ? { activePlan: session.traversal.planId } : {}),
      events: lastEvents,
    },
    session,
  };
}

/** 0 completed, 1 escalated/expired/abandoned, 2 still running or idle. */
export function exitCodeFor(run: SimulationRun): number {
  switch (run.finalOutcome) {
    case 'completed':
      return 0;
    case 'escalated':
    case 'expired':
    case 'abandoned':
    case 'passthrough':
      return 1;
    case 'idle':
    case 'active':
    case 'activated':
      return 2;
  }
}
