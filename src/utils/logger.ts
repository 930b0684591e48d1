/**
 * Live execution logger for socflow.
 *
 * All output goes to stderr so stdout stays clean for JSON audit output.
 * Emoji prefixes give instant visual context in the terminal.
 * Set SOCFLOW_QUIET=1 to silence it (tests do).
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  if (process.env['SOCFLOW_QUIET'] === '1') return;
  process.stderr.write(message + '\n');
}

function tag(taskId: string): string {
  return `[${taskId.slice(0, 8)}]`;
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

export function transition(taskId: string, from: string, to: string): void {
  write(`🔀 ${tag(taskId)} ${from} → ${to}`);
}

export function dispatch(taskId: string, agentId: string, action: string): void {
  write(`📤 ${tag(taskId)} ${agentId}: ${action}`);
}

export function invocationResult(
  taskId: string,
  agentId: string,
  success: boolean,
  message: string,
): void {
  const icon = success ? '✅' : '❌';
  write(`${icon} ${tag(taskId)} ${agentId}: ${message}`);
}

export function planned(taskId: string, stepCount: number, decisionCount: number): void {
  write(
    `🧠 ${tag(taskId)} Planner: ${String(stepCount)} steps, ${String(decisionCount)} decision points`,
  );
}

export function branch(taskId: string, label: string, outcome: boolean): void {
  write(`🔱 ${tag(taskId)} ${label} → ${outcome ? 'yes' : 'no'}`);
}

export function escalation(taskId: string, reason: string, detailText: string): void {
  write(`🚨 ${tag(taskId)} Escalated (${reason}): ${detailText}`);
}

export function audit(taskId: string, finalState: string): void {
  write(`🗄️  ${tag(taskId)} Audit record emitted (${finalState})`);
}
