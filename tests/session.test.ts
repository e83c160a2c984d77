import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createSession, progressSnapshot, runTurn } from '../src/core/index.js';
import type { EscalationSignal, SessionOptions, SessionState } from '../src/core/index.js';
import { parseLibraryDocument } from '../src/library/index.js';
import { turnInputSchema } from '../src/schema/index.js';
import type { TurnInput } from '../src/schema/index.js';
import { captureStderr } from './helpers.js';

const library = parseLibraryDocument({
  plans: {
    deploy: {
      name: 'Deploy',
      triggers: ['deploy', 'release'],
      graph: {
        start: 'S',
        nodes: {
          S: { type: 'start' },
          build: { type: 'task', action: 'Build', verify: { type: 'output_contains', value: 'built' } },
          END: { type: 'exit' },
          HELP: { type: 'escalate', paceLevel: 'alternate', reason: 'Build broken' },
        },
        edges: [
          { from: 'S', to: 'build' },
          { from: 'build', to: 'END', condition: 'on_success' },
          { from: 'build', to: 'HELP', condition: 'on_fail' },
        ],
      },
    },
    notes: { triggers: ['meeting', 'notes'] },
  },
});

const turn = (fields: Partial<TurnInput>): TurnInput => turnInputSchema.parse(fields);

let stderr: ReturnType<typeof captureStderr>;

beforeEach(() => {
  stderr = captureStderr();
});

afterEach(() => {
  stderr.restore();
});

function activated(options: SessionOptions = {}): SessionState {
  const result = runTurn(createSession(), library, turn({ message: 'Please deploy the release' }), options);
  if (result.outcome !== 'activated') throw new Error(result.outcome);
  return result.session;
}

describe('runTurn', () => {
  it('stays idle on an empty or unmatched message', () => {
    const session = createSession();

    const empty = runTurn(session, library, turn({ message: '   ' }));
    expect(empty.outcome).toBe('idle');
    expect(empty.session).toBe(session);

    expect(runTurn(session, library, turn({ message: 'hello there' })).outcome).toBe('idle');
  });

  it('activates the matched plan and injects its status', () => {
    const result = runTurn(createSession(), library, turn({ message: 'Please deploy the release' }));

    expect(result.outcome).toBe('activated');
    expect(result.planId).toBe('deploy');
    expect(result.session.traversal?.currentNode).toBe('build');
    expect(result.injection?.split('\n')[0]).toBe('[WORKFLOW: Deploy]');
  });

  it('advances the active traversal instead of matching again', () => {
    const session = activated();

    const result = runTurn(session, library, turn({ message: 'meeting notes', toolOutput: 'still going' }));

    // Verification fails and the on_fail edge escalates.
    expect(result.outcome).toBe('escalated');
    expect(result.planId).toBe('deploy');
  });

  it('clears the traversal when the plan completes', () => {
    const result = runTurn(activated(), library, turn({ toolOutput: 'built in 3s' }));

    expect(result.outcome).toBe('completed');
    expect(result.session.traversal).toBeNull();
    expect(result.session.paceLevel).toBe('primary');
    expect(result.events.at(-1)).toEqual({ type: 'plan_completed', node: 'END', turn: 1 });
  });

  it('signals escalations and raises the session PACE level', () => {
    const onEscalation = vi.fn<(signal: EscalationSignal) => void>();

    const result = runTurn(activated(), library, turn({ toolOutput: 'boom' }), { onEscalation });

    expect(result.outcome).toBe('escalated');
    expect(result.session).toEqual({ traversal: null, paceLevel: 'alternate' });
    expect(result.injection?.split('\n')[0]).toBe('[WORKFLOW ESCALATED: Deploy]');
    expect(onEscalation).toHaveBeenCalledWith({
      planId: 'deploy',
      planName: 'Deploy',
      paceLevel: 'alternate',
      reason: 'Build broken',
      message: result.injection,
      completedNodes: 0,
      totalNodes: 1,
    });
  });

  it('still escalates when the escalation sink throws', () => {
    const onEscalation = (): void => {
      throw new Error('sink down');
    };

    const result = runTurn(activated(), library, turn({ toolOutput: 'boom' }), { onEscalation });

    expect(result.outcome).toBe('escalated');
    expect(result.session).toEqual({ traversal: null, paceLevel: 'alternate' });
    expect(stderr.lines()).toContain('⚠️  Escalation sink failed: sink down');
  });

  it('counts failing turns against the staleness window until the plan expires', () => {
    const options = { staleAfterTurns: 3 };
    const session = activated(options);
    if (!session.traversal) throw new Error('no traversal');
    // A function cannot be cloned, so every advance throws inside the engine.
    let current: SessionState = {
      ...session,
      traversal: Object.assign({}, session.traversal, { onTick: () => undefined }),
    };

    const outcomes: string[] = [];
    const stalls: number[] = [];
    for (let i = 0; i < 4; i++) {
      const result = runTurn(current, library, turn({ toolOutput: 'boom' }), options);
      outcomes.push(result.outcome);
      expect(result.error).toBeDefined();
      if (result.session.traversal) stalls.push(result.session.traversal.turnsSinceTransition);
      current = result.session;
    }

    expect(outcomes).toEqual(['passthrough', 'passthrough', 'passthrough', 'expired']);
    expect(stalls).toEqual([1, 2, 3]);
    expect(current.traversal).toBeNull();
    expect(stderr.lines()).toContain("⌛ Plan 'Deploy' expired (no transition for 3 turns)");
  });

  it('passes through without a traversal when activation throws', () => {
    const session = createSession();
    const onEscalation = vi.fn<(signal: EscalationSignal) => void>();
    const broken = parseLibraryDocument({
      plans: {
        deploy: {
          triggers: ['deploy', 'release'],
          graph: {
            start: 'S',
            nodes: { S: { type: 'start' }, HELP: { type: 'escalate' } },
            edges: [{ from: 'S', to: 'HELP' }],
          },
        },
      },
    });
    // Counting task nodes at activation reads this getter.
    Object.defineProperty(broken.plans['deploy']?.graph?.nodes ?? {}, 'S', {
      get: () => {
        throw new Error('corrupt node table');
      },
    });

    const result = runTurn(session, broken, turn({ message: 'deploy the release' }), { onEscalation });

    expect(result.outcome).toBe('passthrough');
    expect(result.session).toBe(session);
    expect(result.error).toBe('corrupt node table');
    expect(onEscalation).not.toHaveBeenCalled();
  });

  it('skips a matched plan that has no graph', () => {
    const result = runTurn(createSession(), library, turn({ message: 'Meeting notes from today' }));

    expect(result.outcome).toBe('idle');
    expect(stderr.lines()).toContain("⚠️  Plan 'notes' matched but has no graph — skipped");
  });

  it('abandons a traversal whose plan left the library', () => {
    const session = activated();
    const empty = parseLibraryDocument({ plans: {} });

    const result = runTurn(session, empty, turn({ toolOutput: 'built' }));

    expect(result.outcome).toBe('abandoned');
    expect(result.error).toBe('plan "deploy" has no graph in the library');
    expect(result.session.traversal).toBeNull();
  });
});

describe('progressSnapshot', () => {
  it('is null without an active traversal', () => {
    expect(progressSnapshot(createSession())).toBeNull();
  });

  it('summarises the active traversal', () => {
    expect(progressSnapshot(activated())).toEqual({
      planId: 'deploy',
      planName: 'Deploy',
      currentNode: 'build',
      turnsSinceProgress: 0,
      completedNodes: 0,
      totalNodes: 1,
    });
  });
});
