import type { AgentInvocationRecord } from '../schema/agent.js';
import type { Synthesis } from '../schema/audit.js';
import type { RiskTier } from '../schema/plan.js';

/**
 * Aggregate the invocation history of a task into key findings,
 * the decisions each agent reached and the risks left open.
 */
export function synthesize(
  records: readonly AgentInvocationRecord[],
  tier?: RiskTier,
): Synthesis {
  const keyFindings: string[] = [];
  const decisions: Synthesis['decisions'] = [];
  const openRisks: string[] = [];

  for (const record of records) {
    if (record.status === 'failed' || record.response === undefined) {
      openRisks.push(
        `${record.agentId} (${record.stepId}) failed: ${record.error?.message ?? 'no response'}`,
      );
      continue;
    }

    const { response } = record;
    keyFindings.push(`${record.agentId}: ${response.findings}`);
    if (response.decision !== undefined) {
      decisions.push({ agentId: record.agentId, stepId: record.stepId, decision: response.decision });
    }
    if (response.aptConfirmed === true) {
      openRisks.push(`APT activity confirmed by ${record.agentId}`);
    }
  }

  const contained = records.some((r) => r.agentId === 'response' && r.status === 'succeeded');
  if (tier === 'High' && !contained) {
    openRisks.push('High-risk alert closed without a containment response');
  }

  return { keyFindings, decisions, openRisks };
}
