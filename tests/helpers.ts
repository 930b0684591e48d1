import { alertSchema } from '../src/schema/alert.js';
import type { Alert, AlertInput } from '../src/schema/alert.js';
import { agentResponseSchema } from '../src/schema/agent.js';
import type {
  AgentInvocationRecord,
  AgentResponse,
  AgentResponseInput,
} from '../src/schema/agent.js';
import type { PlanStep } from '../src/schema/plan.js';
import type { Task } from '../src/schema/task.js';
import { ProviderRegistry } from '../src/providers/client.js';
import type { CapabilityProvider, ProviderLimits } from '../src/providers/client.js';
import type { EngineDeps, EngineEvent } from '../src/core/engine.js';
import { QueueEscalationSink } from '../src/core/escalation.js';
import type { EscalationSink } from '../src/core/escalation.js';
import { MemoryAuditSink } from '../src/report/sinks.js';

// ── Clock ────────────────────────────────────────────────────

export const T0 = new Date('2026-01-15T10:00:00.000Z');

export function fixedClock(): () => Date {
  return () => new Date(T0);
}

// ── Fixtures ─────────────────────────────────────────────────

export function makeAlert(overrides: Partial<AlertInput> = {}): Alert {
  return alertSchema.parse({
    alertId: 'ALERT-T1',
    name: 'Test alert',
    severity: 'Medium',
    entities: [{ type: 'host', value: 'ws-01' }],
    ...overrides,
  });
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    type: 'alert_analysis',
    description: 'Investigate test alert',
    alert: makeAlert(),
    relatedIncidents: [],
    receivedAt: T0.toISOString(),
    ...overrides,
  };
}

export function makeStep(overrides: Partial<PlanStep> = {}): PlanStep {
  return {
    id: 'step-1',
    agentId: 'intel',
    action: 'Enrich',
    rationale: 'Test',
    containment: false,
    ...overrides,
  };
}

export function response(input: AgentResponseInput): AgentResponse {
  return agentResponseSchema.parse(input);
}

export function makeRecord(overrides: Partial<AgentInvocationRecord> = {}): AgentInvocationRecord {
  return {
    sequence: 0,
    stepId: 'step-1',
    dispatch: 1,
    agentId: 'intel',
    action: 'Enrich',
    status: 'succeeded',
    groupStatus: 'complete',
    attempts: 1,
    response: response({ agentId: 'intel', findings: 'ok' }),
    startedAt: T0.toISOString(),
    finishedAt: T0.toISOString(),
    durationMs: 0,
    ...overrides,
  };
}

// ── Wiring ───────────────────────────────────────────────────

export const FAST_LIMITS: ProviderLimits = { timeoutMs: 20, waitBudgetMs: 1_000 };

export function registryOf(
  providers: readonly CapabilityProvider[],
  limits: ProviderLimits = FAST_LIMITS,
): ProviderRegistry {
  const registry = new ProviderRegistry();
  for (const provider of providers) registry.register(provider, limits);
  return registry;
}

export interface EngineHarness {
  deps: EngineDeps;
  audit: MemoryAuditSink;
  events: EngineEvent[];
}

export function harness(
  providers: readonly CapabilityProvider[],
  options: {
    sink?: EscalationSink;
    categories?: readonly string[];
    limits?: ProviderLimits;
  } = {},
): EngineHarness {
  const audit = new MemoryAuditSink();
  const events: EngineEvent[] = [];
  let n = 0;
  return {
    audit,
    events,
    deps: {
      registry: registryOf(providers, options.limits),
      escalationSink: options.sink ?? new QueueEscalationSink(),
      auditSink: audit,
      criticalSystemCategories: options.categories ?? ['domain-controller'],
      retryBackoffMs: 0,
      now: fixedClock(),
      idFactory: () => `esc-${String(++n)}`,
      onEvent: (event) => events.push(event),
    },
  };
}
