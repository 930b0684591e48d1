import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import Anthropic from '@anthropic-ai/sdk';

import type { AgentId } from '../schema/agent.js';
import {
  ProviderMalformedResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from './client.js';
import type { CapabilityProvider, InvocationRequest, InvokeOptions } from './client.js';

// ── Constants ────────────────────────────────────────────────

const DEFAULT_MODEL = 'claude-sonnet-4-5-20250929';
const MAX_TOKENS = 2048;

// ── Template paths ───────────────────────────────────────────
// Sources live in src/providers, compiled output in dist/src/providers.

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR =
  [path.join(THIS_DIR, '..', '..', 'prompts'), path.join(THIS_DIR, '..', '..', '..', 'prompts')].find(
    (dir) => existsSync(dir),
  ) ?? path.join(THIS_DIR, '..', '..', 'prompts');

// ── Error mapping ────────────────────────────────────────────

function toProviderError(agentId: AgentId, err: unknown): unknown {
  if (err instanceof Anthropic.APIUserAbortError) return err;
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new ProviderTimeoutError(agentId, 0, { cause: err });
  }
  if (err instanceof Anthropic.APIError) {
    return new ProviderUnavailableError(agentId, `${agentId} model call failed: ${err.message}`, {
      cause: err,
    });
  }
  return err;
}

// ── Prompt rendering ─────────────────────────────────────────

export async function buildSystemPrompt(request: InvocationRequest): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, `${request.agentId}.txt`), 'utf-8');
  const { task, step, context } = request;

  const history = context.previousActions
    .map((r) =>
      r.response
        ? `- ${r.agentId} (${r.action}): ${r.response.findings}`
        : `- ${r.agentId} (${r.action}): failed`,
    )
    .join('\n');

  const values: Record<string, string> = {
    action: step.action,
    rationale: step.rationale,
    taskType: task.type,
    alert: task.alert ? JSON.stringify(task.alert, null, 2) : 'none',
    history: history || 'none',
    relatedIncidents: context.relatedIncidents.join(', ') || 'none',
  };

  // Single pass with a replacer function: values are inserted verbatim.
  return template.replace(
    /\{\{(\w+)\}\}/g,
    (placeholder: string, key: string) => values[key] ?? placeholder,
  );
}

// ── JSON extraction ──────────────────────────────────────────

export function extractJSON(raw: string): string {
  // Strip markdown fences if present
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  // Find outermost object braces
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

// The model tends to leave out the agent id it was asked to answer as.
function fixupRawResponse(agentId: AgentId, parsed: unknown): unknown {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return parsed;
  return 'agentId' in parsed ? parsed : { ...parsed, agentId };
}

// ── Provider factory ─────────────────────────────────────────

/** The slice of the Messages API the provider calls. */
export interface MessageCreator {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal },
  ): Promise<{ content: readonly { type: string; text?: string }[] }>;
}

export function createAnthropicProvider(
  agentId: AgentId,
  apiKey: string,
  model?: string,
  messages?: MessageCreator,
): CapabilityProvider {
  const resolvedModel = model ?? DEFAULT_MODEL;
  // Retries belong to the engine, which retries once with backoff.
  const api = messages ?? new Anthropic({ apiKey, maxRetries: 0 }).messages;

  return {
    agentId,
    async invoke(request: InvocationRequest, { signal }: InvokeOptions): Promise<unknown> {
      const systemPrompt = await buildSystemPrompt(request);

      const response = await api
        .create(
          {
            model: resolvedModel,
            max_tokens: MAX_TOKENS,
            system: systemPrompt,
            messages: [{ role: 'user', content: request.task.description }],
            temperature: 0,
          },
          { signal },
        )
        .catch((err: unknown) => {
          throw toProviderError(agentId, err);
        });

      const firstBlock = response.content[0];
      if (firstBlock?.type !== 'text' || firstBlock.text === undefined) {
        throw new ProviderMalformedResponseError(agentId, 'Anthropic API returned no text content');
      }

      try {
        return fixupRawResponse(agentId, JSON.parse(extractJSON(firstBlock.text)));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ProviderMalformedResponseError(agentId, `Invalid JSON from model: ${message}`, {
          cause: err,
        });
      }
    },
  };
}
