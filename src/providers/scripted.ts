import type { AgentId } from '../schema/agent.js';
import { abortableDelay } from '../utils/delay.js';
import {
  ProviderMalformedResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from './client.js';
import type {
  CapabilityProvider,
  InvocationRequest,
  InvokeOptions,
  ProviderFailureKind,
} from './client.js';

// ── Script entries ───────────────────────────────────────────

export type ScriptedReply =
  | { kind: 'respond'; payload: unknown; delayMs?: number | undefined }
  | { kind: 'fail'; error: ProviderFailureKind; message?: string | undefined }
  | { kind: 'hang' };

export function respond(payload: unknown, delayMs?: number): ScriptedReply {
  return { kind: 'respond', payload, delayMs };
}

export function fail(error: ProviderFailureKind, message?: string): ScriptedReply {
  return { kind: 'fail', error, message };
}

/** Never answers; settles only when the caller aborts. */
export function hang(): ScriptedReply {
  return { kind: 'hang' };
}

export interface ScriptedProvider extends CapabilityProvider {
  readonly calls: readonly InvocationRequest[];
}

/**
 * Scripted provider for tests and demos.
 * Plays the replies in order, falling back to a minimal response.
 */
export function createScriptedProvider(
  agentId: AgentId,
  replies: readonly ScriptedReply[] = [],
): ScriptedProvider {
  const calls: InvocationRequest[] = [];

  return {
    agentId,
    calls,
    async invoke(request: InvocationRequest, options: InvokeOptions): Promise<unknown> {
      const reply = replies[calls.length] ?? respond({ agentId, findings: 'scripted' });
      calls.push(request);

      switch (reply.kind) {
        case 'respond':
          if (reply.delayMs !== undefined && reply.delayMs > 0) {
            await abortableDelay(reply.delayMs, options.signal);
          }
          return reply.payload;
        case 'fail':
          throw toError(agentId, reply.error, reply.message);
        case 'hang':
          await abortableDelay(Number.POSITIVE_INFINITY, options.signal);
          throw new ProviderUnavailableError(agentId, `${agentId} hung`);
      }
    },
  };
}

function toError(agentId: AgentId, kind: ProviderFailureKind, message?: string): Error {
  switch (kind) {
    case 'timeout':
      return new ProviderTimeoutError(agentId, 0);
    case 'unavailable':
      return new ProviderUnavailableError(agentId, message ?? `${agentId} unavailable`);
    case 'malformed':
      return new ProviderMalformedResponseError(agentId, message ?? `${agentId} sent garbage`);
  }
}
