import { fileURLToPath } from 'node:url';

import { afterEach, describe, expect, it } from 'vitest';

import {
  LibraryError,
  clearLibraryCache,
  loadPlanLibrary,
  parseLibraryDocument,
} from '../src/library/index.js';
import { matchPlan } from '../src/core/index.js';
import { planIds } from '../src/schema/index.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
const bundled = fileURLToPath(new URL('../plans/library.yaml', import.meta.url));

afterEach(() => {
  clearLibraryCache();
});

function plan(graph: unknown): unknown {
  return { plans: { p: { graph } } };
}

describe('parseLibraryDocument', () => {
  it('fills in plan, node and edge defaults', () => {
    const library = parseLibraryDocument(
      plan({
        start: 's',
        nodes: { s: { type: 'start' }, t: { type: 'task', action: 'Act' }, x: { type: 'escalate' } },
        edges: [{ from: 's', to: 't' }],
      }),
    );

    const p = library.plans['p'];
    expect(p?.domains).toEqual([]);
    expect(p?.triggers).toEqual([]);
    expect(p?.triggerThreshold).toBe(2);
    expect(p?.graph?.edges).toEqual([{ from: 's', to: 't', condition: 'always' }]);
    expect(p?.graph?.nodes['t']).toEqual({ type: 'task', action: 'Act', maxRetries: 0 });
    expect(p?.graph?.nodes['x']).toEqual({
      type: 'escalate',
      paceLevel: 'contingent',
      reason: 'Plan escalated',
    });
  });

  it('rejects a start node that is not defined', () => {
    expect(() => parseLibraryDocument(plan({ start: 'nowhere', nodes: { s: { type: 'start' } } }))).toThrow(
      new LibraryError('Invalid plan library (inline): plans.p.graph.start: Start node "nowhere" is not defined'),
    );
  });

  it('rejects edges to undefined nodes', () => {
    const doc = plan({
      start: 's',
      nodes: { s: { type: 'start' } },
      edges: [{ from: 's', to: 'ghost' }],
    });

    expect(() => parseLibraryDocument(doc, 'plans.yaml')).toThrow(
      'Invalid plan library plans.yaml: plans.p.graph.edges.0.to: Edge references undefined node "ghost"',
    );
  });

  it('rejects a malformed edge condition', () => {
    const doc = plan({
      start: 's',
      nodes: { s: { type: 'start' } },
      edges: [{ from: 's', to: 's', condition: 'sometimes' }],
    });

    expect(() => parseLibraryDocument(doc)).toThrow(
      'plans.p.graph.edges.0.condition: Condition must be "always" or "on_<outcome>"',
    );
  });

  it('rejects unknown node types', () => {
    const doc = plan({ start: 's', nodes: { s: { type: 'teleport' } } });
    expect(() => parseLibraryDocument(doc)).toThrow(LibraryError);
  });

  it('accepts plans without a graph', () => {
    const library = parseLibraryDocument({ plans: { chat: { triggers: ['hello'] } } });
    expect(library.plans['chat']?.graph).toBeUndefined();
  });
});

describe('loadPlanLibrary', () => {
  it('loads a YAML library from disk', async () => {
    const library = await loadPlanLibrary(fixture('library.yaml'));

    expect(Object.keys(library.plans)).toEqual(['triage']);
    expect(library.plans['triage']?.graph?.nodes['close']).toEqual({
      type: 'escalate',
      paceLevel: 'contingent',
      reason: 'Plan escalated',
    });
  });

  it('returns the cached library for the same path', async () => {
    const first = await loadPlanLibrary(fixture('library.yaml'));
    const second = await loadPlanLibrary(fixture('library.yaml'));
    expect(second).toBe(first);
  });

  it('loads the bundled plan library', async () => {
    const library = await loadPlanLibrary(bundled);
    expect(Object.keys(library.plans)).toEqual(['bug_fix', 'dependency_install', 'research_summary']);
  });

  it('records plan ids in the order the file declares them', async () => {
    const library = await loadPlanLibrary(fixture('numeric-ids.yaml'));

    expect(Object.keys(library.plans)).toEqual(['10', '20']);
    expect(library.order).toEqual(['20', '10']);
    expect(planIds(library)).toEqual(['20', '10']);
    expect(matchPlan(library, { domain: '', message: 'restart after the outage' })?.planId).toBe('20');
  });

  it('reports a missing file', async () => {
    const missing = fixture('missing.yaml');
    await expect(loadPlanLibrary(missing)).rejects.toThrow(`Cannot read plan library ${missing}:`);
  });

  it('reports unparseable YAML', async () => {
    const malformed = fixture('malformed.yaml');
    await expect(loadPlanLibrary(malformed)).rejects.toThrow(`Cannot parse plan library ${malformed}:`);
  });
});
