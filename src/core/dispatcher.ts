import { LIMITS } from '../config/defaults.js';
import { agentResponseSchema } from '../schema/agent.js';
import type { AgentId, AgentResponse, ProviderErrorKind } from '../schema/agent.js';
import type { PlanStep } from '../schema/plan.js';
import type { Task } from '../schema/task.js';
import {
  ProviderError,
  ProviderMalformedResponseError,
  ProviderTimeoutError,
} from '../providers/client.js';
import type { ContextView, ProviderRegistry, RegisteredProvider } from '../providers/client.js';
import { abortableDelay, rejectOnAbort } from '../utils/delay.js';
import * as log from '../utils/logger.js';
import type { InvocationOutcome } from './context.js';

// ── Options ──────────────────────────────────────────────────

export interface DispatchOptions {
  registry: ProviderRegistry;
  task: Task;
  context: ContextView;
  /** Task-wide signal; aborting it cancels every outstanding call. */
  signal: AbortSignal;
  retryBackoffMs: number;
  now?: () => Date;
}

interface Failure {
  kind: ProviderErrorKind;
  message: string;
  retryable: boolean;
}

// ── Validation ───────────────────────────────────────────────

export function validateResponse(agentId: AgentId, payload: unknown): AgentResponse {
  const parsed = agentResponseSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ');
    throw new ProviderMalformedResponseError(agentId, `${agentId} returned an invalid response: ${issues}`);
  }
  if (parsed.data.agentId !== agentId) {
    throw new ProviderMalformedResponseError(
      agentId,
      `${agentId} answered as ${parsed.data.agentId}`,
    );
  }
  return parsed.data;
}

// ── Single attempt ───────────────────────────────────────────

async function attempt(
  entry: RegisteredProvider,
  step: PlanStep,
  options: DispatchOptions,
): Promise<AgentResponse> {
  const { agentId } = entry.provider;
  const controller = new AbortController();
  const onTaskAbort = (): void => controller.abort(options.signal.reason);
  options.signal.addEventListener('abort', onTaskAbort, { once: true });
  const timer = setTimeout(
    () => controller.abort(new ProviderTimeoutError(agentId, entry.timeoutMs)),
    entry.timeoutMs,
  );

  try {
    const payload = await Promise.race([
      entry.provider.invoke(
        { agentId, task: options.task, context: options.context, step },
        { signal: controller.signal },
      ),
      rejectOnAbort(controller.signal),
    ]);
    return validateResponse(agentId, payload);
  } catch (err) {
    // Whatever the provider threw on abort, the abort reason wins.
    if (controller.signal.aborted) throw controller.signal.reason;
    throw err;
  } finally {
    clearTimeout(timer);
    options.signal.removeEventListener('abort', onTaskAbort);
  }
}

function classify(err: unknown, taskSignal: AbortSignal): Failure {
  if (taskSignal.aborted) {
    return { kind: 'cancelled', message: describe(taskSignal.reason), retryable: false };
  }
  if (err instanceof ProviderError) {
    return { kind: err.kind, message: err.message, retryable: err.retryable };
  }
  return { kind: 'unavailable', message: describe(err), retryable: true };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Invoke the provider for one step. Transient failures are retried
 * once after the backoff; malformed responses are not. Never rejects:
 * every failure comes back as a failed outcome.
 */
export async function dispatchStep(
  step: PlanStep,
  dispatch: number,
  options: DispatchOptions,
): Promise<InvocationOutcome> {
  const now = options.now ?? ((): Date => new Date());
  const startedAt = now();
  const base = { step, dispatch, startedAt };

  const entry = options.registry.get(step.agentId);
  if (entry === undefined) {
    return {
      ...base,
      attempts: 0,
      finishedAt: now(),
      status: 'failed',
      error: { kind: 'unavailable', message: `No provider registered for ${step.agentId}` },
    };
  }

  log.dispatch(options.task.id, step.agentId, step.action);

  let attempts = 0;
  const failed = (failure: Failure): InvocationOutcome => {
    log.invocationResult(options.task.id, step.agentId, false, failure.message);
    return {
      ...base,
      attempts,
      finishedAt: now(),
      status: 'failed',
      error: { kind: failure.kind, message: failure.message },
    };
  };

  for (;;) {
    attempts++;
    try {
      const response = await attempt(entry, step, options);
      log.invocationResult(options.task.id, step.agentId, true, response.findings);
      return { ...base, attempts, finishedAt: now(), status: 'succeeded', response };
    } catch (err) {
      const failure = classify(err, options.signal);

      if (failure.retryable && attempts <= LIMITS.MAX_PROVIDER_RETRIES) {
        log.warn(`${step.agentId}: ${failure.message}; retrying in ${String(options.retryBackoffMs)}ms`);
        try {
          await abortableDelay(options.retryBackoffMs, options.signal);
          continue;
        } catch (abortErr) {
          return failed(classify(abortErr, options.signal));
        }
      }

      return failed(failure);
    }
  }
}

/** Dispatch every step of a group concurrently and await them all. */
export function dispatchGroup(
  steps: readonly { step: PlanStep; dispatch: number }[],
  options: DispatchOptions,
): Promise<InvocationOutcome[]> {
  return Promise.all(steps.map(({ step, dispatch }) => dispatchStep(step, dispatch, options)));
}
