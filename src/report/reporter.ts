import type { AuditRecord, TerminalState } from '../schema/audit.js';
import type { AgentInvocationRecord } from '../schema/agent.js';
import { stableStringify } from '../utils/json.js';

// ── JSON ─────────────────────────────────────────────────────

export function serializeAuditJSON(record: AuditRecord): string {
  return stableStringify(record, 2);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(record: AuditRecord): string {
  const lines: string[] = [];

  // Header + metadata
  lines.push(`# Task Audit: ${escapeMarkdownCell(record.description)}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Task ID** | \`${record.taskId}\` |`);
  lines.push(`| **Type** | ${record.taskType} |`);
  if (record.alertId !== undefined) {
    lines.push(`| **Alert** | \`${record.alertId}\` |`);
  }
  if (record.riskTier !== undefined) {
    lines.push(`| **Risk Tier** | ${record.riskTier} |`);
  }
  lines.push(`| **Started** | ${record.startedAt} |`);
  lines.push(`| **Finished** | ${record.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(record.durationMs)} |`);
  lines.push(`| **Final State** | **${record.finalState}** ${stateIcon(record.finalState)} |`);
  lines.push(`| **Final Decision** | ${record.finalDecision ?? '-'} |`);
  lines.push(`| **Reason** | ${escapeMarkdownCell(record.terminationReason)} |`);
  lines.push('');

  // Invocation table
  lines.push(`## Invocations`);
  lines.push('');
  if (record.previousActions.length === 0) {
    lines.push('_No agents were invoked._');
  } else {
    lines.push(`| # | Agent | Step | Status | Attempts | Decision | Duration |`);
    lines.push(`|---|-------|------|--------|----------|----------|----------|`);
    for (const r of record.previousActions) {
      lines.push(
        `| ${String(r.sequence + 1)} | ${r.agentId} | ${r.stepId} | ${statusCell(r)} | ${String(r.attempts)} | ${r.response?.decision ?? '-'} | ${formatDuration(r.durationMs)} |`,
      );
    }
  }
  lines.push('');

  // Summary
  const { keyFindings, openRisks } = record.summary;
  lines.push(`## Key Findings`);
  lines.push('');
  for (const finding of keyFindings) lines.push(`- ${finding}`);
  if (keyFindings.length === 0) lines.push('_None._');
  lines.push('');

  if (openRisks.length > 0) {
    lines.push(`## Open Risks`);
    lines.push('');
    for (const risk of openRisks) lines.push(`- ${risk}`);
    lines.push('');
  }

  if (record.branches.length > 0) {
    lines.push(`## Decision Points`);
    lines.push('');
    for (const b of record.branches) {
      lines.push(`- ${b.label} → ${b.outcome ? 'yes' : 'no'} (${b.decidedBy})`);
    }
    lines.push('');
  }

  if (record.escalations.length > 0) {
    lines.push(`## Escalations`);
    lines.push('');
    for (const { event, resolution } of record.escalations) {
      lines.push(`### [${event.severity.toUpperCase()}] ${event.reason}`);
      lines.push('');
      lines.push(event.detail);
      lines.push('');
      lines.push(
        resolution !== undefined
          ? `**Resolution:** ${resolution.action} by ${resolution.reviewer} at ${resolution.decidedAt}${resolution.note !== undefined ? `: ${resolution.note}` : ''}`
          : '**Resolution:** none',
      );
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function statusCell(r: AgentInvocationRecord): string {
  if (r.status === 'succeeded') return '[OK]';
  return `[FAIL: ${r.error?.kind ?? 'unknown'}]`;
}

function stateIcon(state: TerminalState): string {
  switch (state) {
    case 'Done':
      return '[DONE]';
    case 'Escalated-Resolved':
      return '[RESOLVED]';
    case 'Aborted':
      return '[ABORTED]';
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
