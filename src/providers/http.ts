import type { AgentId } from '../schema/agent.js';
import {
  ProviderMalformedResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from './client.js';
import type { CapabilityProvider, InvocationRequest, InvokeOptions } from './client.js';

// ── Status classification ────────────────────────────────────

const TIMEOUT_STATUSES = new Set([408, 504]);

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

// ── Provider factory ─────────────────────────────────────────

export interface HttpProviderOptions {
  url: string;
  headers?: Record<string, string> | undefined;
  fetchImpl?: typeof fetch | undefined;
}

/**
 * Provider backed by a remote agent endpoint.
 * POSTs `{ agentId, step, task, context }` and expects an AgentResponse body.
 */
export function createHttpProvider(
  agentId: AgentId,
  options: HttpProviderOptions,
): CapabilityProvider {
  const doFetch = options.fetchImpl ?? fetch;

  return {
    agentId,
    async invoke(request: InvocationRequest, { signal }: InvokeOptions): Promise<unknown> {
      let response: Response;
      try {
        response = await doFetch(options.url, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
            ...options.headers,
          },
          body: JSON.stringify({
            agentId: request.agentId,
            step: request.step,
            task: request.task,
            context: request.context,
          }),
          signal,
        });
      } catch (err) {
        if (isAbortError(err)) throw err;
        const message = err instanceof Error ? err.message : String(err);
        throw new ProviderUnavailableError(agentId, `${agentId} endpoint unreachable: ${message}`, {
          cause: err,
        });
      }

      if (TIMEOUT_STATUSES.has(response.status)) {
        throw new ProviderTimeoutError(agentId, 0);
      }

      if (response.status === 429 || response.status >= 500) {
        throw new ProviderUnavailableError(
          agentId,
          `${agentId} endpoint error (${String(response.status)})`,
        );
      }

      const raw = await response.text();

      if (!response.ok) {
        throw new ProviderMalformedResponseError(
          agentId,
          `${agentId} endpoint rejected the request (${String(response.status)}): ${raw.slice(0, 200)}`,
        );
      }

      try {
        const body: unknown = JSON.parse(raw);
        return body;
      } catch (err) {
        throw new ProviderMalformedResponseError(agentId, `${agentId} returned invalid JSON`, {
          cause: err,
        });
      }
    },
  };
}
