import type { AgentId, AgentInvocationRecord, AgentResponse } from '../schema/agent.js';
import type { DecisionCondition } from '../schema/plan.js';
import { classifyRisk, compareTiers } from './risk.js';

// ── Result ───────────────────────────────────────────────────

export type ConditionResult =
  | { status: 'resolved'; value: boolean; source: AgentInvocationRecord }
  | { status: 'missing'; agentId: AgentId; field: string };

// ── Lookup ───────────────────────────────────────────────────

/** Latest successful response of an agent, newest record first. */
export function latestResponse(
  records: readonly AgentInvocationRecord[],
  agentId: AgentId,
): { record: AgentInvocationRecord; response: AgentResponse } | undefined {
  for (let i = records.length - 1; i >= 0; i--) {
    const record = records[i];
    if (record?.agentId === agentId && record.status === 'succeeded' && record.response) {
      return { record, response: record.response };
    }
  }
  return undefined;
}

function conditionField(condition: DecisionCondition): string {
  switch (condition.kind) {
    case 'flag':
      return condition.flag;
    case 'risk-at-least':
      return 'riskScore';
    case 'decision-in':
      return 'decision';
  }
}

// ── Evaluation ───────────────────────────────────────────────

/**
 * Evaluate a decision predicate. A missing response or a missing
 * field is reported as such; it never falls back to a default.
 */
export function evaluateCondition(
  condition: DecisionCondition,
  records: readonly AgentInvocationRecord[],
): ConditionResult {
  const missing: ConditionResult = {
    status: 'missing',
    agentId: condition.agentId,
    field: conditionField(condition),
  };

  const latest = latestResponse(records, condition.agentId);
  if (!latest) return missing;
  const { record, response } = latest;

  switch (condition.kind) {
    case 'flag': {
      const value = response[condition.flag];
      return value === undefined ? missing : { status: 'resolved', value, source: record };
    }
    case 'risk-at-least': {
      if (response.riskScore === undefined) return missing;
      const tier = classifyRisk(response.riskScore);
      return { status: 'resolved', value: compareTiers(tier, condition.tier) >= 0, source: record };
    }
    case 'decision-in': {
      if (response.decision === undefined) return missing;
      return {
        status: 'resolved',
        value: condition.decisions.includes(response.decision),
        source: record,
      };
    }
  }
}
