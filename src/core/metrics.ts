import type { AgentInvocationRecord } from '../schema/agent.js';
import type { EngineEvent } from './engine.js';

// ── Snapshot ─────────────────────────────────────────────────

export interface InvocationStats {
  count: number;
  failed: number;
  totalMs: number;
  averageMs: number;
  maxMs: number;
}

export interface OrchestrationMetrics {
  /** Tasks that reached a terminal state, by that state */
  tasksByFinalState: Record<string, number>;
  /** Escalations raised, by reason */
  escalationsByReason: Record<string, number>;
  /** Alerts triaged into the High tier */
  highRiskAlerts: number;
  /** Committed invocations per agent */
  invocationsByAgent: Record<string, InvocationStats>;
}

// ── Collector ────────────────────────────────────────────────

/**
 * Counters and latency totals for one orchestrator, fed from the
 * events its engines publish.
 */
export class MetricsCollector {
  private readonly finalStates = new Map<string, number>();
  private readonly escalations = new Map<string, number>();
  private readonly invocations = new Map<string, InvocationStats>();
  private highRisk = 0;

  record(event: EngineEvent): void {
    switch (event.type) {
      case 'task-finished':
        increment(this.finalStates, event.record.finalState);
        break;
      case 'escalation-raised':
        increment(this.escalations, event.event.reason);
        break;
      case 'high-risk-alert':
        this.highRisk++;
        break;
      case 'invocation-recorded':
        this.observe(event.record);
        break;
      default:
        break;
    }
  }

  getMetrics(): OrchestrationMetrics {
    return {
      tasksByFinalState: Object.fromEntries(this.finalStates),
      escalationsByReason: Object.fromEntries(this.escalations),
      highRiskAlerts: this.highRisk,
      invocationsByAgent: Object.fromEntries(
        [...this.invocations].map(([agentId, stats]) => [agentId, { ...stats }]),
      ),
    };
  }

  reset(): void {
    this.finalStates.clear();
    this.escalations.clear();
    this.invocations.clear();
    this.highRisk = 0;
  }

  private observe(record: AgentInvocationRecord): void {
    const stats = this.invocations.get(record.agentId) ?? {
      count: 0,
      failed: 0,
      totalMs: 0,
      averageMs: 0,
      maxMs: 0,
    };
    stats.count++;
    if (record.status === 'failed') stats.failed++;
    stats.totalMs += record.durationMs;
    stats.averageMs = stats.totalMs / stats.count;
    stats.maxMs = Math.max(stats.maxMs, record.durationMs);
    this.invocations.set(record.agentId, stats);
  }
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}
