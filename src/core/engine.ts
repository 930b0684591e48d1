import { randomUUID } from 'node:crypto';

import { LIMITS } from '../config/defaults.js';
import type { AgentId, AgentInvocationRecord } from '../schema/agent.js';
import type {
  AuditEscalation,
  AuditRecord,
  BranchRecord,
  TaskState,
  TerminalState,
  TransitionRecord,
} from '../schema/audit.js';
import { humanDecisionSchema } from '../schema/escalation.js';
import type { EscalationEvent, HumanDecision } from '../schema/escalation.js';
import type { DecisionPoint, Plan, PlanNode, PlanStep, RiskTier } from '../schema/plan.js';
import type { Task, TaskType } from '../schema/task.js';
import type { ContextView, ProviderRegistry } from '../providers/client.js';
import { buildAuditRecord } from '../report/audit.js';
import type { AuditSink } from '../report/sinks.js';
import { deepFreeze } from '../utils/freeze.js';
import * as log from '../utils/logger.js';
import { TaskContext } from './context.js';
import type { InvocationOutcome } from './context.js';
import { evaluateCondition } from './decisions.js';
import { dispatchGroup, dispatchStep } from './dispatcher.js';
import type { DispatchOptions } from './dispatcher.js';
import { IllegalTransitionError, InvalidDecisionError, TaskAbortedError } from './errors.js';
import {
  checkDecisionConflict,
  checkWaitBudget,
  criticalContainment,
  gatedSteps,
  providerFailure,
  riskUnavailable,
  toEscalationEvent,
  unevaluableDecision,
} from './escalation.js';
import type { EscalationSink, EscalationTrigger } from './escalation.js';
import { TRIAGE_STEP, buildPlan, planAgents, planFromSteps, toNodes } from './planner.js';
import { classifyRisk } from './risk.js';

// ── State machine ────────────────────────────────────────────

const INTERRUPTS: readonly TaskState[] = ['Escalated', 'AwaitingInformation', 'Aborted'];
const RESUMES: readonly TaskState[] = ['TriagePending', 'Planning', 'Dispatching', 'Synthesizing', 'Aborted'];

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  Received: ['TriageCheck', ...INTERRUPTS],
  TriageCheck: ['TriagePending', 'Planning', ...INTERRUPTS],
  TriagePending: ['TriageDone', ...INTERRUPTS],
  TriageDone: ['Planning', 'TriagePending', ...INTERRUPTS],
  Planning: ['Dispatching', 'Synthesizing', ...INTERRUPTS],
  Dispatching: ['StepAwaiting', 'Synthesizing', ...INTERRUPTS],
  StepAwaiting: ['Dispatching', 'Synthesizing', ...INTERRUPTS],
  Synthesizing: ['Done', 'Escalated-Resolved', ...INTERRUPTS],
  Escalated: RESUMES,
  AwaitingInformation: RESUMES,
  Done: [],
  'Escalated-Resolved': [],
  Aborted: [],
};

export function isTerminalState(state: TaskState): state is TerminalState {
  return state === 'Done' || state === 'Escalated-Resolved' || state === 'Aborted';
}

// ── Public types ─────────────────────────────────────────────

export type SuspendedState = 'Escalated' | 'AwaitingInformation';

export type TaskOutcome =
  | { status: 'terminal'; state: TerminalState; record: AuditRecord }
  | { status: 'suspended'; state: SuspendedState; escalation: EscalationEvent };

export interface TaskSnapshot {
  taskId: string;
  taskType: TaskType;
  state: TaskState;
  riskTier?: RiskTier | undefined;
  planRevision: number;
  remaining: PlanNode[];
  escalation?: EscalationEvent | undefined;
  context: ContextView;
}

export type EngineEvent =
  | { type: 'transition'; taskId: string; from: TaskState; to: TaskState; at: string }
  | { type: 'triage-complete'; taskId: string; riskScore?: number | undefined; tier: RiskTier }
  | { type: 'high-risk-alert'; taskId: string; alertId?: string | undefined; riskScore: number }
  | { type: 'invocation-recorded'; taskId: string; record: AgentInvocationRecord }
  | { type: 'escalation-raised'; taskId: string; event: EscalationEvent }
  | { type: 'task-finished'; taskId: string; record: AuditRecord };

export interface EngineDeps {
  registry: ProviderRegistry;
  escalationSink: EscalationSink;
  auditSink: AuditSink;
  criticalSystemCategories: readonly string[];
  retryBackoffMs: number;
  now?: () => Date;
  onEvent?: (event: EngineEvent) => void;
  idFactory?: () => string;
}

// What a Proceed decision resumes.
type Suspension =
  | { kind: 'triage' }
  | { kind: 'risk' }
  | { kind: 'approve'; steps: PlanStep[] }
  | { kind: 'retry'; steps: PlanStep[] }
  | { kind: 'decision'; point: DecisionPoint }
  | { kind: 'continue'; resume?: 'Planning' | undefined };

// ── Engine ───────────────────────────────────────────────────

/**
 * Drives one task from receipt to a terminal state. Owns the task's
 * context exclusively; providers only ever see frozen views of it.
 */
export class OrchestrationEngine {
  private state: TaskState = 'Received';
  private readonly context: TaskContext;
  private readonly controller = new AbortController();
  private readonly now: () => Date;
  private readonly newId: () => string;

  private queue: PlanNode[] = [];
  private revision = 0;
  private planNote: string | undefined;
  private tier: RiskTier | undefined;
  private suspension: Suspension | undefined;
  private running = false;
  private outcome: Extract<TaskOutcome, { status: 'terminal' }> | undefined;

  private readonly approved = new Set<string>();
  private readonly decisionRetries = new Map<string, number>();
  private readonly waitReported = new Set<AgentId>();
  private readonly stepsById = new Map<string, PlanStep>();
  private readonly escalations: AuditEscalation[] = [];
  private readonly branches: BranchRecord[] = [];
  private readonly transitions: TransitionRecord[] = [];
  private riskMisses = 0;
  private resolvedEscalations = 0;

  constructor(
    readonly task: Task,
    private readonly deps: EngineDeps,
  ) {
    this.context = new TaskContext(task.id, task.relatedIncidents);
    this.now = deps.now ?? ((): Date => new Date());
    this.newId = deps.idFactory ?? randomUUID;
  }

  // ── Public API ─────────────────────────────────────────────

  get currentState(): TaskState {
    return this.state;
  }

  isTerminal(): boolean {
    return isTerminalState(this.state);
  }

  /** Drive the task until it is terminal or waiting on a human. */
  async run(): Promise<TaskOutcome> {
    if (this.state !== 'Received') {
      throw new Error(`Task ${this.task.id} has already started`);
    }
    log.info(`Task ${this.task.id} received (${this.task.type})`);
    this.transition('TriageCheck');

    if (this.task.type === 'alert_analysis') {
      if (!this.deps.registry.has(TRIAGE_STEP.agentId)) {
        await this.finalize('Aborted', 'No provider registered for triage');
        return this.currentOutcome();
      }
      this.transition('TriagePending');
    } else {
      this.transition('Planning');
    }
    return this.drive();
  }

  /**
   * Record a human decision for the current escalation and resume.
   * A decision that does not fit the escalation rejects before
   * anything changes.
   */
  async resolve(input: unknown): Promise<TaskOutcome> {
    if (this.running) {
      throw new InvalidDecisionError(`Task ${this.task.id} is running`);
    }
    if (this.state !== 'Escalated' && this.state !== 'AwaitingInformation') {
      throw new InvalidDecisionError(
        `Task ${this.task.id} is not waiting for a decision (state ${this.state})`,
      );
    }
    const parsed = humanDecisionSchema.safeParse(input);
    if (!parsed.success) throw InvalidDecisionError.fromZod(parsed.error);
    this.check(parsed.data);

    return this.resume(parsed.data);
  }

  private async resume(decision: HumanDecision): Promise<TaskOutcome> {
    this.running = true;
    try {
      await this.apply(decision);
    } finally {
      this.running = false;
    }
    return this.drive();
  }

  /** Cancel all outstanding calls and terminate. */
  async abort(reason = 'Aborted by request'): Promise<TaskOutcome> {
    await this.finalize('Aborted', reason);
    return this.currentOutcome();
  }

  snapshot(): TaskSnapshot {
    return deepFreeze(
      structuredClone({
        taskId: this.task.id,
        taskType: this.task.type,
        state: this.state,
        riskTier: this.tier,
        planRevision: this.revision,
        remaining: this.queue,
        escalation: this.openEscalation(),
        context: this.context.view(),
      }),
    );
  }

  // ── Loop ───────────────────────────────────────────────────

  private async drive(): Promise<TaskOutcome> {
    this.running = true;
    try {
      for (;;) {
        switch (this.state) {
          case 'TriagePending':
            await this.triage();
            break;
          case 'Planning':
            await this.plan();
            break;
          case 'Dispatching':
          case 'StepAwaiting':
            await this.advance();
            break;
          case 'Synthesizing':
            await this.complete();
            break;
          default:
            return this.currentOutcome();
        }
      }
    } finally {
      this.running = false;
    }
  }

  private currentOutcome(): TaskOutcome {
    if (this.outcome) return this.outcome;
    const escalation = this.openEscalation();
    const state = this.state;
    if ((state === 'Escalated' || state === 'AwaitingInformation') && escalation) {
      return { status: 'suspended', state, escalation };
    }
    throw new Error(`Task ${this.task.id} stopped in ${state}`);
  }

  // ── Triage ─────────────────────────────────────────────────

  private async triage(): Promise<void> {
    this.stepsById.set(TRIAGE_STEP.id, TRIAGE_STEP);
    const dispatch = this.context.dispatchCount(TRIAGE_STEP.id) + 1;
    const outcome = await dispatchStep(TRIAGE_STEP, dispatch, this.dispatchOptions());
    if (this.isTerminal()) return;

    const [record] = this.commit([outcome]);
    this.transition('TriageDone');
    if (record === undefined) return;

    const failure = providerFailure(record, TRIAGE_STEP);
    if (failure) {
      await this.escalate(failure, { kind: 'triage' });
      return;
    }

    const riskScore = record.response?.riskScore;
    if (riskScore === undefined) {
      this.riskMisses++;
      if (this.riskMisses <= LIMITS.MAX_TRIAGE_RISK_RETRIES) {
        log.warn(`Triage returned no risk score; asking again`);
        this.transition('TriagePending');
        return;
      }
      await this.escalate(
        riskUnavailable(TRIAGE_STEP, this.riskMisses),
        { kind: 'risk' },
        'AwaitingInformation',
      );
      return;
    }

    this.setTier(classifyRisk(riskScore), riskScore);

    const overrun = this.overBudget([TRIAGE_STEP.agentId]);
    if (overrun) {
      await this.escalate(overrun, { kind: 'continue', resume: 'Planning' });
      return;
    }
    this.transition('Planning');
  }

  private setTier(tier: RiskTier, riskScore?: number): void {
    this.tier = tier;
    this.emit({ type: 'triage-complete', taskId: this.task.id, riskScore, tier });
    if (tier === 'High' && riskScore !== undefined) {
      this.emit({
        type: 'high-risk-alert',
        taskId: this.task.id,
        alertId: this.task.alert?.alertId,
        riskScore,
      });
    }
  }

  // ── Planning ───────────────────────────────────────────────

  private async plan(): Promise<void> {
    const plan = buildPlan(this.task.type, this.tier);
    const missing = this.unregistered(plan);
    if (missing.length > 0) {
      await this.finalize('Aborted', `No provider registered for ${missing.join(', ')}`);
      return;
    }
    this.load(plan);
  }

  private load(plan: Plan): void {
    this.revision = plan.revision;
    this.planNote = plan.note;
    this.queue = toNodes(plan);
    log.planned(this.task.id, plan.steps.length, plan.decisionPoints.length);
    this.transition(this.queue.length === 0 ? 'Synthesizing' : 'Dispatching');
  }

  private unregistered(plan: Plan): AgentId[] {
    return [...planAgents(plan)].filter((id) => !this.deps.registry.has(id));
  }

  // ── Dispatch ───────────────────────────────────────────────

  private async advance(): Promise<void> {
    const node = this.queue[0];
    if (node === undefined) {
      this.transition('Synthesizing');
      return;
    }
    if (node.kind === 'decision') {
      await this.evaluate(node.point);
      return;
    }

    const group = this.nextGroup();
    const gated = gatedSteps(group, this.task, this.approved, this.deps.criticalSystemCategories);
    if (gated.length > 0) {
      await this.escalate(
        criticalContainment(gated, this.task, this.deps.criticalSystemCategories),
        { kind: 'approve', steps: gated },
      );
      return;
    }

    this.queue.splice(0, group.length);
    if (this.state === 'StepAwaiting') this.transition('Dispatching');

    for (const step of group) this.stepsById.set(step.id, step);
    const outcomes = await dispatchGroup(
      group.map((step) => ({ step, dispatch: this.context.dispatchCount(step.id) + 1 })),
      this.dispatchOptions(),
    );
    if (this.isTerminal()) return;

    const fresh = this.commit(outcomes);
    this.transition('StepAwaiting');
    await this.afterCommit(group, fresh);
  }

  /** Leading steps of the queue that share a parallel group. */
  private nextGroup(): PlanStep[] {
    const group: PlanStep[] = [];
    for (const node of this.queue) {
      if (node.kind !== 'step') break;
      const first = group[0];
      if (first !== undefined) {
        if (first.parallelGroup === undefined || node.step.parallelGroup !== first.parallelGroup) break;
      }
      group.push(node.step);
    }
    return group;
  }

  private async afterCommit(
    group: readonly PlanStep[],
    fresh: readonly AgentInvocationRecord[],
  ): Promise<void> {
    const failed: PlanStep[] = [];
    const triggers: EscalationTrigger[] = [];
    for (const record of fresh) {
      const step = group.find((s) => s.id === record.stepId);
      if (step === undefined) continue;
      const trigger = providerFailure(record, step);
      if (trigger) {
        failed.push(step);
        triggers.push(trigger);
      }
    }
    const [firstFailure] = triggers;
    if (firstFailure) {
      const detail = triggers.map((t) => t.detail).join('; ');
      await this.escalate({ ...firstFailure, detail }, { kind: 'retry', steps: failed });
      return;
    }

    const conflict = checkDecisionConflict(this.context.previousActions, fresh);
    if (conflict) {
      await this.escalate(conflict, { kind: 'continue' });
      return;
    }

    const overrun = this.overBudget(group.map((s) => s.agentId));
    if (overrun) {
      await this.escalate(overrun, { kind: 'continue' });
    }
  }

  private overBudget(agents: readonly AgentId[]): EscalationTrigger | undefined {
    const hit = checkWaitBudget(
      this.context,
      agents,
      this.deps.registry,
      this.waitReported,
    );
    if (hit === undefined) return undefined;
    this.waitReported.add(hit.agentId);
    return hit.trigger;
  }

  // ── Decision points ────────────────────────────────────────

  private async evaluate(point: DecisionPoint): Promise<void> {
    const result = evaluateCondition(point.condition, this.context.previousActions);

    if (result.status === 'resolved') {
      this.takeBranch(point, result.value, 'engine');
      return;
    }

    const producer = this.lastStepOf(result.agentId);
    const retries = this.decisionRetries.get(point.id) ?? 0;
    if (producer && retries < LIMITS.MAX_DECISION_RETRIES) {
      this.decisionRetries.set(point.id, retries + 1);
      log.warn(`"${point.label}" needs ${result.field} from ${result.agentId}; asking again`);
      this.queue.unshift({ kind: 'step', step: producer });
      return;
    }

    await this.escalate(
      unevaluableDecision(point.label, result.agentId, result.field, producer),
      { kind: 'decision', point },
      'AwaitingInformation',
    );
  }

  private takeBranch(point: DecisionPoint, outcome: boolean, decidedBy: BranchRecord['decidedBy']): void {
    const head = this.queue[0];
    if (head?.kind === 'decision' && head.point.id === point.id) this.queue.shift();

    this.branches.push({ decisionPointId: point.id, label: point.label, outcome, decidedBy });
    log.branch(this.task.id, point.label, outcome);
    this.queue.unshift(...toNodes(outcome ? point.whenTrue : point.whenFalse));
  }

  private lastStepOf(agentId: AgentId): PlanStep | undefined {
    const records = this.context.previousActions;
    for (let i = records.length - 1; i >= 0; i--) {
      const record = records[i];
      if (record?.agentId === agentId) return this.stepsById.get(record.stepId);
    }
    return undefined;
  }

  // ── Escalation ─────────────────────────────────────────────

  private async escalate(
    trigger: EscalationTrigger,
    suspension: Suspension,
    target: SuspendedState = 'Escalated',
  ): Promise<void> {
    const event = toEscalationEvent(this.task.id, trigger, this.newId(), this.now());
    this.escalations.push({ event });
    this.suspension = suspension;
    this.transition(target);
    log.escalation(this.task.id, event.reason, event.detail);
    this.emit({ type: 'escalation-raised', taskId: this.task.id, event });

    const decision = await this.deps.escalationSink.raise(event, this.snapshot());
    if (decision === undefined || this.isTerminal()) return;
    await this.apply(decision);
  }

  private openEscalation(): EscalationEvent | undefined {
    const last = this.escalations[this.escalations.length - 1];
    return last !== undefined && last.resolution === undefined ? last.event : undefined;
  }

  /** Throws if the decision cannot answer the open escalation. */
  private check(decision: HumanDecision): { open: AuditEscalation; suspension: Suspension } {
    const suspension = this.suspension;
    const open = this.escalations[this.escalations.length - 1];
    if (suspension === undefined || open === undefined || open.resolution !== undefined) {
      throw new InvalidDecisionError(`Task ${this.task.id} has no open escalation`);
    }

    if (decision.action === 'Modify-plan') {
      if (this.task.type === 'alert_analysis' && this.tier === undefined) {
        throw new InvalidDecisionError('The plan cannot be modified before triage completes');
      }
      if (this.revision >= LIMITS.MAX_PLAN_REVISIONS) {
        throw new InvalidDecisionError(`Plan already revised ${String(this.revision)} times`);
      }
      const missing = this.unregistered(planFromSteps(decision.steps, this.revision + 1));
      if (missing.length > 0) {
        throw new InvalidDecisionError(`No provider registered for ${missing.join(', ')}`);
      }
    }

    if (decision.action === 'Proceed') {
      if (suspension.kind === 'risk' && decision.riskTier === undefined) {
        throw new InvalidDecisionError('Proceed needs a riskTier: triage gave no risk score');
      }
      if (suspension.kind === 'decision' && decision.branch === undefined) {
        throw new InvalidDecisionError(
          `Proceed needs a branch: "${suspension.point.label}" could not be evaluated`,
        );
      }
    }

    return { open, suspension };
  }

  private async apply(decision: HumanDecision): Promise<void> {
    const { open, suspension } = this.check(decision);

    if (decision.action === 'Abort') {
      this.record(open, decision);
      const note = decision.note !== undefined ? `: ${decision.note}` : '';
      await this.finalize('Aborted', `Aborted by ${decision.reviewer}${note}`);
      return;
    }

    if (decision.action === 'Modify-plan') {
      this.record(open, decision);
      this.load(planFromSteps(decision.steps, this.revision + 1));
      return;
    }

    switch (suspension.kind) {
      case 'triage':
        this.record(open, decision);
        this.transition('TriagePending');
        return;
      case 'risk':
        if (decision.riskTier === undefined) return;
        this.record(open, decision);
        this.setTier(decision.riskTier);
        this.transition('Planning');
        return;
      case 'approve':
        this.record(open, decision);
        for (const step of suspension.steps) this.approved.add(step.id);
        this.transition('Dispatching');
        return;
      case 'retry':
        this.record(open, decision);
        this.queue.unshift(...suspension.steps.map((step): PlanNode => ({ kind: 'step', step })));
        this.transition('Dispatching');
        return;
      case 'decision':
        if (decision.branch === undefined) return;
        this.record(open, decision);
        this.takeBranch(suspension.point, decision.branch, 'reviewer');
        this.transition('Dispatching');
        return;
      case 'continue':
        this.record(open, decision);
        this.transition(
          suspension.resume ?? (this.queue.length === 0 ? 'Synthesizing' : 'Dispatching'),
        );
        return;
    }
  }

  private record(open: AuditEscalation, decision: HumanDecision): void {
    open.resolution = { ...decision, decidedAt: this.now().toISOString() };
    this.suspension = undefined;
    if (decision.action !== 'Abort') this.resolvedEscalations++;
    log.detail(`${decision.action} by ${decision.reviewer}`);
  }

  // ── Completion ─────────────────────────────────────────────

  private async complete(): Promise<void> {
    if (this.resolvedEscalations > 0) {
      const n = this.resolvedEscalations;
      await this.finalize(
        'Escalated-Resolved',
        `Plan completed after ${String(n)} resolved escalation${n === 1 ? '' : 's'}`,
      );
      return;
    }
    await this.finalize('Done', this.planNote ?? 'Plan completed');
  }

  private async finalize(state: TerminalState, reason: string): Promise<void> {
    if (this.isTerminal()) return;
    this.transition(state);
    if (state === 'Aborted') {
      this.controller.abort(new TaskAbortedError(this.task.id, reason));
    }

    const record = buildAuditRecord({
      task: this.task,
      finalState: state,
      terminationReason: reason,
      riskTier: this.tier,
      records: this.context.previousActions,
      escalations: this.escalations,
      branches: this.branches,
      transitions: this.transitions,
      finishedAt: this.now(),
    });
    this.outcome = { status: 'terminal', state, record };

    log.audit(this.task.id, state);
    try {
      await this.deps.auditSink.emit(record);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Audit sink failed for task ${this.task.id}: ${message}`);
    }
    this.emit({ type: 'task-finished', taskId: this.task.id, record });
  }

  // ── Plumbing ───────────────────────────────────────────────

  private transition(to: TaskState): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new IllegalTransitionError(from, to);
    }
    this.state = to;
    const at = this.now().toISOString();
    this.transitions.push({ from, to, at });
    log.transition(this.task.id, from, to);
    this.emit({ type: 'transition', taskId: this.task.id, from, to, at });
  }

  private commit(outcomes: readonly InvocationOutcome[]): AgentInvocationRecord[] {
    const fresh = this.context.commitGroup(outcomes);
    for (const record of fresh) {
      this.emit({ type: 'invocation-recorded', taskId: this.task.id, record });
    }
    return fresh;
  }

  private emit(event: EngineEvent): void {
    this.deps.onEvent?.(event);
  }

  private dispatchOptions(): DispatchOptions {
    return {
      registry: this.deps.registry,
      task: this.task,
      context: this.context.view(),
      signal: this.controller.signal,
      retryBackoffMs: this.deps.retryBackoffMs,
      now: this.now,
    };
  }
}
