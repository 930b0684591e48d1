import { randomUUID } from 'node:crypto';

import { taskInputSchema } from '../schema/task.js';
import type { Task } from '../schema/task.js';
import type { AuditRecord, TaskState } from '../schema/audit.js';
import type { ProviderRegistry } from '../providers/client.js';
import type { AuditSink } from '../report/sinks.js';
import { deepFreeze } from '../utils/freeze.js';
import * as log from '../utils/logger.js';
import { OrchestrationEngine } from './engine.js';
import type { EngineEvent, TaskOutcome, TaskSnapshot } from './engine.js';
import { InvalidDecisionError, InvalidTaskError, UnknownTaskError } from './errors.js';
import { MetricsCollector } from './metrics.js';
import type { OrchestrationMetrics } from './metrics.js';
import type { EscalationSink } from './escalation.js';

// ── Types ────────────────────────────────────────────────────

export interface OrchestratorOptions {
  registry: ProviderRegistry;
  escalationSink: EscalationSink;
  auditSink: AuditSink;
  criticalSystemCategories: readonly string[];
  retryBackoffMs: number;
  now?: () => Date;
  idFactory?: () => string;
}

export type OrchestratorEvent = EngineEvent | { type: 'task-archived'; taskId: string; record: AuditRecord };

export type OrchestratorListener = (event: OrchestratorEvent) => void;

export interface TaskStatus {
  taskId: string;
  state: TaskState;
  archived: boolean;
}

interface LiveTask {
  engine: OrchestrationEngine;
  // Settles whenever the engine stops driving: terminal or suspended.
  pending: Promise<TaskOutcome>;
}

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Front door for many tasks. Each task gets its own engine and
 * context; nothing is shared between them.
 */
export class Orchestrator {
  private readonly live = new Map<string, LiveTask>();
  private readonly archive = new Map<string, AuditRecord>();
  private readonly listeners = new Set<OrchestratorListener>();
  private readonly collector = new MetricsCollector();
  private readonly now: () => Date;

  constructor(private readonly options: OrchestratorOptions) {
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Validate and accept a task. Returns its id at once; the task is
   * driven in the background.
   */
  submit(input: unknown): string {
    const parsed = taskInputSchema.safeParse(input);
    if (!parsed.success) throw InvalidTaskError.fromZod(parsed.error);

    const { id = randomUUID(), type, description, alert, relatedIncidents } = parsed.data;
    if (this.live.has(id) || this.archive.has(id)) {
      throw new InvalidTaskError(`Duplicate task id ${id}`);
    }

    const task: Task = deepFreeze({
      id,
      type,
      description,
      alert,
      relatedIncidents,
      receivedAt: this.now().toISOString(),
    });

    const engine = new OrchestrationEngine(task, {
      registry: this.options.registry,
      escalationSink: this.options.escalationSink,
      auditSink: this.options.auditSink,
      criticalSystemCategories: this.options.criticalSystemCategories,
      retryBackoffMs: this.options.retryBackoffMs,
      now: this.options.now,
      idFactory: this.options.idFactory,
      onEvent: (event) => this.handle(event),
    });

    this.track(id, engine, engine.run());
    return id;
  }

  status(taskId: string): TaskStatus {
    const archived = this.archive.get(taskId);
    if (archived) return { taskId, state: archived.finalState, archived: true };
    return { taskId, state: this.get(taskId).engine.currentState, archived: false };
  }

  snapshot(taskId: string): TaskSnapshot {
    return this.get(taskId).engine.snapshot();
  }

  /** Resolves once the task is terminal or waiting on a human. */
  async waitFor(taskId: string): Promise<TaskOutcome> {
    const archived = this.archive.get(taskId);
    if (archived) return { status: 'terminal', state: archived.finalState, record: archived };
    return this.get(taskId).pending;
  }

  /**
   * Record a human decision for a suspended task and resume it. A
   * rejected decision leaves the task waiting on its open escalation.
   */
  async decide(taskId: string, decision: unknown): Promise<TaskOutcome> {
    const { engine, pending: previous } = this.get(taskId);
    const pending = engine.resolve(decision);
    this.track(
      taskId,
      engine,
      pending.catch((err: unknown) => {
        if (err instanceof InvalidDecisionError) return previous;
        throw err;
      }),
    );
    return pending;
  }

  async abort(taskId: string, reason?: string): Promise<TaskOutcome> {
    const archived = this.archive.get(taskId);
    if (archived) return { status: 'terminal', state: archived.finalState, record: archived };
    return this.get(taskId).engine.abort(reason);
  }

  list(): TaskStatus[] {
    return [
      ...[...this.live.keys()].map((taskId) => this.status(taskId)),
      ...[...this.archive.keys()].map((taskId) => this.status(taskId)),
    ];
  }

  records(): AuditRecord[] {
    return [...this.archive.values()];
  }

  /** Counters and agent latencies across every task submitted here. */
  metrics(): OrchestrationMetrics {
    return this.collector.getMetrics();
  }

  onEvent(listener: OrchestratorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ── Internals ──────────────────────────────────────────────

  private get(taskId: string): LiveTask {
    const live = this.live.get(taskId);
    if (!live) throw new UnknownTaskError(taskId);
    return live;
  }

  private track(taskId: string, engine: OrchestrationEngine, pending: Promise<TaskOutcome>): void {
    this.live.set(taskId, { engine, pending });
    void pending.catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Task ${taskId} failed: ${message}`);
    });
  }

  private handle(event: EngineEvent): void {
    this.collector.record(event);
    this.publish(event);
    if (event.type === 'task-finished') {
      this.live.delete(event.taskId);
      this.archive.set(event.taskId, event.record);
      this.publish({ type: 'task-archived', taskId: event.taskId, record: event.record });
    }
  }

  private publish(event: OrchestratorEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}
