import type {
  AgentId,
  AgentInvocationRecord,
  AgentResponse,
  ProviderErrorKind,
} from '../schema/agent.js';
import type { PlanStep } from '../schema/plan.js';
import type { ContextView } from '../providers/client.js';
import { deepFreeze } from '../utils/freeze.js';
import { stableStringify } from '../utils/json.js';

// ── Outcomes ─────────────────────────────────────────────────
// What the dispatcher hands back for one step dispatch.

interface OutcomeBase {
  step: PlanStep;
  dispatch: number;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
}

export type InvocationOutcome = OutcomeBase &
  (
    | { status: 'succeeded'; response: AgentResponse }
    | { status: 'failed'; error: { kind: ProviderErrorKind; message: string } }
  );

export class ContextConflictError extends Error {
  constructor(stepId: string, dispatch: number) {
    super(`A different result is already recorded for ${stepId} (dispatch ${String(dispatch)})`);
    this.name = 'ContextConflictError';
  }
}

// ── Store ────────────────────────────────────────────────────

/**
 * Per-task accumulator. `previousActions` only ever grows; a record
 * is never rewritten once committed.
 */
export class TaskContext {
  private readonly records: AgentInvocationRecord[] = [];
  private readonly incidents: Set<string>;

  constructor(
    readonly taskId: string,
    relatedIncidents: readonly string[] = [],
  ) {
    this.incidents = new Set(relatedIncidents);
  }

  get previousActions(): readonly AgentInvocationRecord[] {
    return this.records;
  }

  get relatedIncidents(): readonly string[] {
    return [...this.incidents];
  }

  /**
   * Commit the outcomes of one dispatch group together. Re-committing
   * an identical outcome is a no-op; a differing one is rejected before
   * anything is written. Returns the records actually appended.
   */
  commitGroup(outcomes: readonly InvocationOutcome[]): AgentInvocationRecord[] {
    const fresh: InvocationOutcome[] = [];

    for (const outcome of outcomes) {
      const existing = this.find(outcome.step.id, outcome.dispatch);
      if (existing === undefined) {
        fresh.push(outcome);
        continue;
      }
      if (resultKey(existing) !== resultKey(outcome)) {
        throw new ContextConflictError(outcome.step.id, outcome.dispatch);
      }
    }

    const partial = outcomes.length > 1 && outcomes.some((o) => o.status === 'failed');
    const committed = fresh.map((outcome, i) =>
      toRecord(outcome, this.records.length + i, partial ? 'partial-failure' : 'complete'),
    );

    this.records.push(...committed);
    for (const record of committed) {
      for (const id of record.response?.correlatedAlertIds ?? []) this.incidents.add(id);
    }
    return committed;
  }

  dispatchCount(stepId: string): number {
    return this.records.filter((r) => r.stepId === stepId).length;
  }

  /** Total time spent waiting on one agent within this task. */
  waitedMs(agentId: AgentId): number {
    return this.records
      .filter((r) => r.agentId === agentId)
      .reduce((sum, r) => sum + r.durationMs, 0);
  }

  view(): ContextView {
    return deepFreeze(
      structuredClone({
        taskId: this.taskId,
        previousActions: this.records,
        relatedIncidents: [...this.incidents],
      }),
    );
  }

  private find(stepId: string, dispatch: number): AgentInvocationRecord | undefined {
    return this.records.find((r) => r.stepId === stepId && r.dispatch === dispatch);
  }
}

// ── Helpers ──────────────────────────────────────────────────

function toRecord(
  outcome: InvocationOutcome,
  sequence: number,
  groupStatus: AgentInvocationRecord['groupStatus'],
): AgentInvocationRecord {
  const base = {
    sequence,
    stepId: outcome.step.id,
    dispatch: outcome.dispatch,
    agentId: outcome.step.agentId,
    action: outcome.step.action,
    parallelGroup: outcome.step.parallelGroup,
    groupStatus,
    attempts: outcome.attempts,
    startedAt: outcome.startedAt.toISOString(),
    finishedAt: outcome.finishedAt.toISOString(),
    durationMs: Math.max(0, outcome.finishedAt.getTime() - outcome.startedAt.getTime()),
  };

  return outcome.status === 'succeeded'
    ? { ...base, status: 'succeeded', response: outcome.response }
    : { ...base, status: 'failed', error: outcome.error };
}

interface ResultShape {
  status: string;
  response?: AgentResponse | undefined;
  error?: { kind: ProviderErrorKind; message: string } | undefined;
}

function resultKey({ status, response, error }: ResultShape): string {
  return stableStringify({ status, response, error });
}
