import type { Plan, PlanGraph, PaceLevel, TraversalState } from '../schema/index.js';
import { getNode, getVisit, nodeName } from '../schema/index.js';
import { outgoingEdges } from './edges.js';
import { describeVerification } from './verifier.js';

// ── Status block ─────────────────────────────────────────────

/**
 * Render the traversal as the status block injected before the next
 * reasoning step. This is the only channel carrying traversal state to
 * the agent.
 */
export function renderStatus(state: TraversalState, plan: Plan): string {
  const graph = plan.graph;
  const lines = [`[WORKFLOW: ${state.planName}]`];
  if (!graph) return lines.join('\n');

  const trace = renderTrace(state, graph);
  if (trace) lines.push(`  ${trace}`);

  const current = getNode(graph, state.currentNode);

  if (current?.type === 'task') {
    lines.push(`    Action: ${current.action}`);
    if (current.tool) lines.push(`    Tool: ${current.tool}`);
    if (current.toolHint) lines.push(`    Hint: ${current.toolHint}`);
    if (current.verify && current.verify.type !== 'manual') {
      lines.push(`    Verify: ${describeVerification(current.verify)}`);
    }

    for (const edge of outgoingEdges(graph, state.currentNode)) {
      const target = nodeName(graph, edge.to);
      const escalates = getNode(graph, edge.to)?.type === 'escalate';
      lines.push(
        escalates
          ? `    On ${edge.condition} → escalate: ${target}`
          : `    On ${edge.condition} → ${target}`,
      );
    }
  } else if (current?.type === 'decision') {
    lines.push(`    Decision: ${current.description ?? nodeName(graph, state.currentNode)}`);
  }

  lines.push('');
  lines.push('Execute the current step. Do not skip ahead.');

  return lines.join('\n');
}

function renderTrace(state: TraversalState, graph: PlanGraph): string {
  const parts: string[] = [];
  const seen = new Set<string>();

  for (const nodeId of state.path) {
    if (seen.has(nodeId)) continue;
    seen.add(nodeId);

    const node = getNode(graph, nodeId);
    if (!node || node.type === 'start' || node.type === 'checkpoint') continue;

    const name = nodeName(graph, nodeId);
    const visit = getVisit(state, nodeId);

    if (nodeId === state.currentNode) {
      const maxRetries = node.type === 'task' ? node.maxRetries : 0;
      const attempt = maxRetries > 0
        ? ` (attempt ${String((visit?.attempts ?? 0) + 1)}/${String(maxRetries + 1)})`
        : '';
      parts.push(`${name} << CURRENT${attempt}`);
    } else if (visit?.outcome === 'success') {
      parts.push(`${name} [DONE]`);
    } else if (visit?.outcome === 'fail') {
      parts.push(`${name} [FAILED]`);
    } else if (visit?.outcome === 'pending') {
      parts.push(`${name} [...]`);
    }
  }

  return parts.join(' → ');
}

// ── Escalation message ───────────────────────────────────────

export function renderEscalation(
  state: TraversalState,
  reason: string,
  paceLevel: PaceLevel,
): string {
  return [
    `[WORKFLOW ESCALATED: ${state.planName}]`,
    `  Reason: ${reason}`,
    `  PACE level: ${paceLevel}`,
    `  Completed: ${String(state.completedNodes)}/${String(state.totalNodes)} nodes`,
    '',
    'The current approach has failed. Change strategy or ask the user for guidance.',
  ].join('\n');
}
