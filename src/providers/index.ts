/**
 * Capability provider module.
 * Uniform request/response contract for the specialized agents.
 * Only module allowed to talk to a provider backend.
 */

import type { EnvConfig } from '../config/env.js';
import { AGENT_IDS } from '../schema/agent.js';
import type { AgentId } from '../schema/agent.js';
import type { FileConfig, ProviderConfig } from '../schema/config.js';
import { ProviderRegistry } from './client.js';
import type { CapabilityProvider, ProviderLimits } from './client.js';
import { createAnthropicProvider } from './anthropic.js';
import { createHttpProvider } from './http.js';
import { createRuleProvider } from './rules.js';

export * from './client.js';
export { buildSystemPrompt, createAnthropicProvider, extractJSON } from './anthropic.js';
export type { MessageCreator } from './anthropic.js';
export { createHttpProvider } from './http.js';
export type { HttpProviderOptions } from './http.js';
export { createRuleProvider, scoreAlert, priorityFor, triageDecisionFor } from './rules.js';
export { createScriptedProvider, respond, fail, hang } from './scripted.js';
export type { ScriptedProvider, ScriptedReply } from './scripted.js';

// ── Provider factory ─────────────────────────────────────────

export function createProvider(
  agentId: AgentId,
  entry: ProviderConfig,
  env: EnvConfig,
  config: Pick<FileConfig, 'criticalSystemCategories' | 'model'>,
): CapabilityProvider {
  switch (entry.kind) {
    case 'rules':
      return createRuleProvider(agentId, {
        criticalSystemCategories: config.criticalSystemCategories,
      });
    case 'http': {
      if (entry.url === undefined) {
        throw new Error(`providers.${agentId}.url is required for the http provider`);
      }
      return createHttpProvider(agentId, { url: entry.url });
    }
    case 'anthropic': {
      if (!env.anthropicApiKey) {
        throw new Error('ANTHROPIC_API_KEY is required when using the anthropic provider');
      }
      return createAnthropicProvider(
        agentId,
        env.anthropicApiKey,
        entry.model ?? config.model ?? env.model,
      );
    }
  }
}

/**
 * Per-invocation timeout and aggregate wait budget of one agent. The
 * budget defaults to the timeout itself.
 */
export function providerLimits(config: FileConfig, agentId: AgentId): ProviderLimits {
  const entry = config.providers[agentId];
  const timeoutMs = entry.timeoutMs ?? config.timeoutMs;
  return { timeoutMs, waitBudgetMs: entry.waitBudgetMs ?? timeoutMs };
}

/**
 * Build a registry holding one provider per agent id, with the
 * per-invocation timeout and aggregate wait budget of each.
 */
export function createRegistryFromConfig(config: FileConfig, env: EnvConfig): ProviderRegistry {
  const registry = new ProviderRegistry();

  for (const agentId of AGENT_IDS) {
    const entry = config.providers[agentId];
    registry.register(createProvider(agentId, entry, env, config), providerLimits(config, agentId));
  }

  return registry;
}
