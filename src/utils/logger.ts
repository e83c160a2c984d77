/**
 * Traversal logger. Writes to stderr only; stdout carries the JSON
 * report when `--json` is set.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

// ── Traversal lines ─────────────────────────────────────────

export function activated(planName: string, taskCount: number): void {
  write(`🧭 Plan activated: ${planName} (${String(taskCount)} task nodes)`);
}

export function verified(nodeName: string, success: boolean, attempt: number): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} ${nodeName} (attempt ${String(attempt)})`);
}

export function completed(planName: string, done: number, total: number): void {
  write(`🏁 Plan '${planName}' completed (${String(done)}/${String(total)} nodes)`);
}

export function expired(planName: string, window: number): void {
  write(`⌛ Plan '${planName}' expired (no transition for ${String(window)} turns)`);
}

export function escalated(planName: string, paceLevel: string, reason: string): void {
  write(`🚨 Plan '${planName}' escalated to PACE ${paceLevel}: ${reason}`);
}

export function stalled(nodeId: string, outcome: string): void {
  warn(`No edge from '${nodeId}' on ${outcome} — holding`);
}
