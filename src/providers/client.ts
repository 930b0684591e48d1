import type { AgentId, AgentInvocationRecord } from '../schema/agent.js';
import type { PlanStep } from '../schema/plan.js';
import type { Task } from '../schema/task.js';

// ── Context view ────────────────────────────────────────────
// Deep-frozen snapshot handed to providers; the engine's own
// context is never shared.

export interface ContextView {
  readonly taskId: string;
  readonly previousActions: readonly AgentInvocationRecord[];
  readonly relatedIncidents: readonly string[];
}

// ── CapabilityProvider interface ────────────────────────────

export interface InvocationRequest {
  agentId: AgentId;
  task: Task;
  context: ContextView;
  step: PlanStep;
}

export interface InvokeOptions {
  signal: AbortSignal;
}

/**
 * A specialized responder (triage, hunting, response, intel).
 * Returns an untrusted payload; the engine validates it against
 * the AgentResponse schema.
 */
export interface CapabilityProvider {
  readonly agentId: AgentId;
  invoke(request: InvocationRequest, options: InvokeOptions): Promise<unknown>;
}

// ── Errors ──────────────────────────────────────────────────

export type ProviderFailureKind = 'timeout' | 'unavailable' | 'malformed';

export abstract class ProviderError extends Error {
  abstract readonly kind: ProviderFailureKind;

  constructor(
    readonly agentId: AgentId,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.kind !== 'malformed';
  }
}

export class ProviderTimeoutError extends ProviderError {
  readonly kind = 'timeout';

  constructor(agentId: AgentId, timeoutMs: number, options?: { cause?: unknown }) {
    super(agentId, `${agentId} did not respond within ${String(timeoutMs)}ms`, options);
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderUnavailableError extends ProviderError {
  readonly kind = 'unavailable';

  constructor(agentId: AgentId, message: string, options?: { cause?: unknown }) {
    super(agentId, message, options);
    this.name = 'ProviderUnavailableError';
  }
}

export class ProviderMalformedResponseError extends ProviderError {
  readonly kind = 'malformed';

  constructor(agentId: AgentId, message: string, options?: { cause?: unknown }) {
    super(agentId, message, options);
    this.name = 'ProviderMalformedResponseError';
  }
}

// ── Registry ────────────────────────────────────────────────

export interface ProviderLimits {
  timeoutMs: number;
  waitBudgetMs: number;
}

export interface RegisteredProvider extends ProviderLimits {
  provider: CapabilityProvider;
}

export class ProviderRegistry {
  private readonly entries = new Map<AgentId, RegisteredProvider>();

  register(provider: CapabilityProvider, limits: ProviderLimits): this {
    if (limits.waitBudgetMs < limits.timeoutMs) {
      throw new RangeError(
        `${provider.agentId}: wait budget (${String(limits.waitBudgetMs)}ms) is shorter than its timeout (${String(limits.timeoutMs)}ms)`,
      );
    }
    this.entries.set(provider.agentId, { provider, ...limits });
    return this;
  }

  get(agentId: AgentId): RegisteredProvider | undefined {
    return this.entries.get(agentId);
  }

  has(agentId: AgentId): boolean {
    return this.entries.has(agentId);
  }

  list(): AgentId[] {
    return [...this.entries.keys()];
  }
}
