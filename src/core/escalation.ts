import type { AgentId, AgentInvocationRecord } from '../schema/agent.js';
import type { Entity } from '../schema/alert.js';
import type { EscalationPolicy } from '../schema/config.js';
import type {
  EscalationEvent,
  EscalationReason,
  EscalationSeverity,
  HumanDecision,
} from '../schema/escalation.js';
import type { PlanStep } from '../schema/plan.js';
import type { Task } from '../schema/task.js';
import type { ProviderRegistry } from '../providers/client.js';
import type { TaskContext } from './context.js';
import type { TaskSnapshot } from './engine.js';

// ── Triggers ─────────────────────────────────────────────────

export interface EscalationTrigger {
  reason: EscalationReason;
  detail: string;
  triggeringStep?: PlanStep | undefined;
}

const SEVERITY: Record<EscalationReason, EscalationSeverity> = {
  'critical-containment': 'Critical',
  'decision-conflict': 'High',
  'provider-timeout': 'High',
  'provider-unavailable': 'High',
  'provider-malformed': 'High',
  'wait-budget-exceeded': 'High',
  'unevaluable-decision': 'Medium',
  'risk-unavailable': 'Medium',
};

export function severityOf(reason: EscalationReason): EscalationSeverity {
  return SEVERITY[reason];
}

export function toEscalationEvent(
  taskId: string,
  trigger: EscalationTrigger,
  id: string,
  raisedAt: Date,
): EscalationEvent {
  return {
    id,
    taskId,
    reason: trigger.reason,
    triggeringStep: trigger.triggeringStep,
    severity: severityOf(trigger.reason),
    detail: trigger.detail,
    raisedAt: raisedAt.toISOString(),
  };
}

// ── Pre-dispatch ─────────────────────────────────────────────

/** Entities of the task that sit on a critical system. */
export function criticalEntities(
  task: Task,
  categories: readonly string[],
): Entity[] {
  return (task.alert?.entities ?? []).filter(
    (e) => e.category !== undefined && categories.includes(e.category),
  );
}

/**
 * Containment steps of a group that need a human before dispatch.
 * Every member is checked before any member goes out.
 */
export function gatedSteps(
  group: readonly PlanStep[],
  task: Task,
  approved: ReadonlySet<string>,
  categories: readonly string[],
): PlanStep[] {
  if (criticalEntities(task, categories).length === 0) return [];
  return group.filter((s) => s.containment && !approved.has(s.id));
}

export function criticalContainment(
  steps: readonly PlanStep[],
  task: Task,
  categories: readonly string[],
): EscalationTrigger {
  const systems = criticalEntities(task, categories)
    .map((e) => `${e.value} (${e.category ?? 'unknown'})`)
    .join(', ');
  return {
    reason: 'critical-containment',
    detail: `Containment (${steps.map((s) => s.id).join(', ')}) would touch critical systems: ${systems}`,
    triggeringStep: steps[0],
  };
}

// ── Post-commit ──────────────────────────────────────────────

const ACTIONABLE = new Set(['Escalate', 'Investigate']);

/**
 * Actionable decisions (Escalate, Investigate) alongside a Dismiss,
 * where at least one side of the pair was just committed.
 */
export function checkDecisionConflict(
  all: readonly AgentInvocationRecord[],
  fresh: readonly AgentInvocationRecord[],
): EscalationTrigger | undefined {
  const freshIds = new Set(fresh.map((r) => r.sequence));
  const decided = all.filter((r) => r.status === 'succeeded' && r.response?.decision !== undefined);
  const actionable = decided.filter((r) => ACTIONABLE.has(r.response?.decision ?? ''));
  const dismissing = decided.filter((r) => r.response?.decision === 'Dismiss');

  for (const a of actionable) {
    for (const d of dismissing) {
      if (!freshIds.has(a.sequence) && !freshIds.has(d.sequence)) continue;
      return {
        reason: 'decision-conflict',
        detail: `${a.agentId} (${a.stepId}) says ${a.response?.decision ?? ''} but ${d.agentId} (${d.stepId}) says Dismiss`,
      };
    }
  }
  return undefined;
}

const FAILURE_REASON = {
  timeout: 'provider-timeout',
  unavailable: 'provider-unavailable',
  malformed: 'provider-malformed',
} as const;

/** Trigger for a failed invocation; cancelled calls raise nothing. */
export function providerFailure(
  record: AgentInvocationRecord,
  step: PlanStep,
): EscalationTrigger | undefined {
  if (record.status !== 'failed' || record.error === undefined) return undefined;
  if (record.error.kind === 'cancelled') return undefined;
  const attempts = record.attempts === 1 ? '1 attempt' : `${String(record.attempts)} attempts`;
  return {
    reason: FAILURE_REASON[record.error.kind],
    detail: `${record.agentId} failed after ${attempts}: ${record.error.message}`,
    triggeringStep: step,
  };
}

/**
 * First agent among `agents` whose aggregate wait in this task is
 * over budget and has not been reported yet.
 */
export function checkWaitBudget(
  context: Pick<TaskContext, 'waitedMs'>,
  agents: Iterable<AgentId>,
  registry: ProviderRegistry,
  reported: ReadonlySet<AgentId>,
): { agentId: AgentId; trigger: EscalationTrigger } | undefined {
  for (const agentId of agents) {
    if (reported.has(agentId)) continue;
    const entry = registry.get(agentId);
    if (entry === undefined) continue;
    const waited = context.waitedMs(agentId);
    if (waited > entry.waitBudgetMs) {
      return {
        agentId,
        trigger: {
          reason: 'wait-budget-exceeded',
          detail: `${agentId} has taken ${String(waited)}ms in this task (budget ${String(entry.waitBudgetMs)}ms)`,
        },
      };
    }
  }
  return undefined;
}

export function unevaluableDecision(
  label: string,
  agentId: AgentId,
  field: string,
  step?: PlanStep,
): EscalationTrigger {
  return {
    reason: 'unevaluable-decision',
    detail: `Cannot decide "${label}": ${agentId} gave no ${field}`,
    triggeringStep: step,
  };
}

export function riskUnavailable(step: PlanStep, attempts: number): EscalationTrigger {
  return {
    reason: 'risk-unavailable',
    detail: `Triage returned no risk score in ${String(attempts)} responses`,
    triggeringStep: step,
  };
}

// ── Sinks ────────────────────────────────────────────────────

/**
 * Where escalations go. A returned decision is applied at once;
 * `undefined` leaves the task suspended until a decision arrives
 * some other way.
 */
export interface EscalationSink {
  raise(event: EscalationEvent, snapshot: TaskSnapshot): Promise<HumanDecision | undefined>;
}

/** Holds raised events for an external reviewer to pick up. */
export class QueueEscalationSink implements EscalationSink {
  private readonly queue: EscalationEvent[] = [];

  get pending(): readonly EscalationEvent[] {
    return this.queue;
  }

  async raise(event: EscalationEvent): Promise<undefined> {
    this.queue.push(event);
    return undefined;
  }

  /** Remove and return everything queued so far. */
  drain(): EscalationEvent[] {
    return this.queue.splice(0, this.queue.length);
  }
}

const MAX_AUTO_PROCEEDS = 3;

// Never auto-proceeded.
const HUMAN_ONLY = new Set<EscalationReason>([
  'unevaluable-decision',
  'risk-unavailable',
  'decision-conflict',
  'critical-containment',
  'provider-malformed',
]);

/**
 * Fixed-policy reviewer for unattended runs. Under `proceed` it only
 * answers transient provider failures and wait overruns; everything
 * in HUMAN_ONLY is held.
 */
export class PolicyEscalationSink implements EscalationSink {
  private readonly proceeded = new Map<string, number>();

  constructor(
    readonly policy: EscalationPolicy,
    readonly reviewer = 'policy',
  ) {}

  async raise(event: EscalationEvent): Promise<HumanDecision | undefined> {
    switch (this.policy) {
      case 'hold':
        return undefined;
      case 'abort':
        return { action: 'Abort', reviewer: this.reviewer, note: `Aborted on ${event.reason}` };
      case 'proceed': {
        if (HUMAN_ONLY.has(event.reason)) return undefined;
        const count = this.proceeded.get(event.taskId) ?? 0;
        if (count >= MAX_AUTO_PROCEEDS) return undefined;
        this.proceeded.set(event.taskId, count + 1);
        return { action: 'Proceed', reviewer: this.reviewer, note: `Proceeded past ${event.reason}` };
      }
    }
  }
}
