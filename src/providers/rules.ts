import type { AgentDecision, AgentId, AgentResponse, Priority } from '../schema/agent.js';
import type { Alert, AlertSeverity } from '../schema/alert.js';
import type { CapabilityProvider, ContextView, InvocationRequest } from './client.js';

// Deterministic local providers. They need no network and give the
// engine realistic, repeatable responses for demos and dry runs.

export interface RuleProviderOptions {
  criticalSystemCategories?: readonly string[] | undefined;
}

// ── Triage scoring ───────────────────────────────────────────

const SEVERITY_POINTS: Record<AlertSeverity, number> = {
  Critical: 40,
  High: 30,
  Medium: 20,
  Low: 10,
  Informational: 5,
};

const ASSET_BASELINE = 15;
const CRITICAL_ASSET = 20;
const USER_RISK_BASELINE = 5;

/**
 * Risk score (0-100) for an alert.
 *
 * Severity (up to 40), entity count (2 each, up to 10), MITRE
 * techniques (5 each, up to 20), asset criticality (15, or 20 when an
 * entity sits on a critical system), user risk (5), and a tenth of the
 * alert's own confidence (up to 10).
 */
export function scoreAlert(
  alert: Alert,
  criticalSystemCategories: readonly string[] = [],
): number {
  let score = SEVERITY_POINTS[alert.severity];
  score += Math.min(alert.entities.length * 2, 10);
  score += Math.min(alert.techniques.length * 5, 20);
  score += alert.entities.some(
    (e) => e.category !== undefined && criticalSystemCategories.includes(e.category),
  )
    ? CRITICAL_ASSET
    : ASSET_BASELINE;
  score += USER_RISK_BASELINE;
  score += Math.floor((alert.confidence ?? 0) / 10);
  return Math.min(score, 100);
}

export function priorityFor(riskScore: number): Priority {
  if (riskScore >= 80) return 'P1';
  if (riskScore >= 60) return 'P2';
  if (riskScore >= 40) return 'P3';
  if (riskScore >= 20) return 'P4';
  return 'P5';
}

export function triageDecisionFor(
  riskScore: number,
  correlatedCount: number,
): AgentDecision {
  if (riskScore >= 70) return 'Escalate';
  if (riskScore >= 40 && correlatedCount > 0) return 'Investigate';
  if (riskScore < 30) return 'Dismiss';
  return 'Monitor';
}

function threatSignals(context: ContextView): number {
  return context.previousActions.filter((r) => r.response?.threatsFound === true).length;
}

function triage(request: InvocationRequest, options: RuleProviderOptions): AgentResponse {
  const { task, context } = request;
  const correlated = [...context.relatedIncidents];

  // Without an alert the only evidence is what earlier agents reported.
  const riskScore = task.alert
    ? scoreAlert(task.alert, options.criticalSystemCategories)
    : Math.min(40 + 15 * threatSignals(context), 100);

  const decision = triageDecisionFor(riskScore, correlated.length);
  const subject = task.alert ? `alert "${task.alert.name}"` : `task "${task.description}"`;

  return {
    agentId: 'triage',
    findings: `Scored ${subject} at ${String(riskScore)}/100 (${decision}).`,
    riskScore,
    priority: priorityFor(riskScore),
    decision,
    correlatedAlertIds: correlated,
    recommendedActions: decision === 'Escalate' ? ['Open an incident'] : [],
  };
}

// ── Hunting ─────────────────────────────────────────────────

function hunting(request: InvocationRequest): AgentResponse {
  const alert = request.task.alert;
  const techniques = alert?.techniques ?? [];
  const threatsFound = techniques.length > 0 || threatSignals(request.context) > 0;

  return {
    agentId: 'hunting',
    findings: threatsFound
      ? `Hunt matched activity for ${techniques.length > 0 ? techniques.join(', ') : 'previously reported threats'}.`
      : 'Hunt returned no matching activity.',
    threatsFound,
    decision: threatsFound ? 'Investigate' : 'Monitor',
    correlatedAlertIds: [],
    recommendedActions: [],
  };
}

// ── Response ────────────────────────────────────────────────

const CONTAINMENT_VERBS: Record<string, string> = {
  host: 'Isolate endpoint',
  account: 'Disable account',
  ip: 'Block IP',
  url: 'Block URL',
  file: 'Quarantine file',
  process: 'Kill process',
};

function response(request: InvocationRequest): AgentResponse {
  const entities = request.task.alert?.entities ?? [];
  const actions = entities.flatMap((e) => {
    const verb = CONTAINMENT_VERBS[e.type];
    return verb === undefined ? [] : [`${verb} ${e.value}`];
  });

  return {
    agentId: 'response',
    findings:
      actions.length > 0
        ? `Prepared ${String(actions.length)} containment actions.`
        : 'No containable entities in scope.',
    decision: actions.length > 0 ? 'Investigate' : 'Monitor',
    correlatedAlertIds: [],
    recommendedActions: actions,
  };
}

// ── Intelligence ─────────────────────────────────────────────

function intel(request: InvocationRequest): AgentResponse {
  const alert = request.task.alert;
  const techniques = alert?.techniques ?? [];
  const tactics = alert?.tactics ?? [];
  const aptConfirmed = techniques.length >= 3 && tactics.includes('LateralMovement');
  const threatsFound = techniques.length > 0;

  return {
    agentId: 'intel',
    findings: aptConfirmed
      ? `Technique set (${techniques.join(', ')}) with lateral movement matches a tracked intrusion set.`
      : threatsFound
        ? `Enriched ${String(techniques.length)} techniques; no actor attribution.`
        : 'No current threat activity relevant to this request.',
    threatsFound,
    aptConfirmed,
    correlatedAlertIds: [],
    recommendedActions: [],
  };
}

// ── Factory ─────────────────────────────────────────────────

export function createRuleProvider(
  agentId: AgentId,
  options: RuleProviderOptions = {},
): CapabilityProvider {
  return {
    agentId,
    async invoke(request: InvocationRequest): Promise<unknown> {
      switch (agentId) {
        case 'triage':
          return triage(request, options);
        case 'hunting':
          return hunting(request);
        case 'response':
          return response(request);
        case 'intel':
          return intel(request);
      }
    },
  };
}
