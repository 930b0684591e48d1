import type { AgentDecision, AgentInvocationRecord } from '../schema/agent.js';
import { AUDIT_RECORD_VERSION } from '../schema/audit.js';
import type {
  AuditEscalation,
  AuditRecord,
  BranchRecord,
  TerminalState,
  TransitionRecord,
} from '../schema/audit.js';
import type { RiskTier } from '../schema/plan.js';
import type { Task } from '../schema/task.js';
import { synthesize } from '../core/synthesis.js';
import { deepFreeze } from '../utils/freeze.js';

// ── Input ────────────────────────────────────────────────────

export interface AuditInput {
  task: Task;
  finalState: TerminalState;
  terminationReason: string;
  riskTier?: RiskTier | undefined;
  records: readonly AgentInvocationRecord[];
  escalations: readonly AuditEscalation[];
  branches: readonly BranchRecord[];
  transitions: readonly TransitionRecord[];
  finishedAt: Date;
}

// ── Builder ──────────────────────────────────────────────────

function lastDecision(records: readonly AgentInvocationRecord[]): AgentDecision | null {
  for (let i = records.length - 1; i >= 0; i--) {
    const decision = records[i]?.response?.decision;
    if (decision !== undefined) return decision;
  }
  return null;
}

/**
 * The one audit record of a finished task. Deep-frozen and detached
 * from the engine's own state.
 */
export function buildAuditRecord(input: AuditInput): AuditRecord {
  const { task, finishedAt } = input;
  const startedAt = new Date(task.receivedAt);
  const records = structuredClone([...input.records]);

  const record: AuditRecord = {
    version: AUDIT_RECORD_VERSION,
    taskId: task.id,
    taskType: task.type,
    description: task.description,
    alertId: task.alert?.alertId,
    finalState: input.finalState,
    finalDecision: input.finalState === 'Aborted' ? 'Abort' : lastDecision(records),
    terminationReason: input.terminationReason,
    riskTier: input.riskTier,
    summary: synthesize(records, input.riskTier),
    previousActions: records,
    escalations: structuredClone([...input.escalations]),
    branches: [...input.branches],
    transitions: [...input.transitions],
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
  };
  return deepFreeze(record);
}
