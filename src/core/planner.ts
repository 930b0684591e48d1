import type { AgentId } from '../schema/agent.js';
import type {
  DecisionCondition,
  DecisionPoint,
  Plan,
  PlanNode,
  PlanStep,
  RiskTier,
} from '../schema/plan.js';
import type { TaskType } from '../schema/task.js';
import { branchPolicy } from './risk.js';

// ── Error ────────────────────────────────────────────────────

export class PlannerError extends Error {
  readonly exitCode = 4;

  constructor(message: string) {
    super(message);
    this.name = 'PlannerError';
  }
}

// ── Builders ─────────────────────────────────────────────────

interface StepExtras {
  parallelGroup?: number;
  containment?: boolean;
}

function step(
  id: string,
  agentId: AgentId,
  action: string,
  rationale: string,
  extras: StepExtras = {},
): PlanStep {
  return {
    id,
    agentId,
    action,
    rationale,
    parallelGroup: extras.parallelGroup,
    containment: extras.containment ?? false,
  };
}

function plan(steps: PlanStep[], decisionPoints: DecisionPoint[] = [], note?: string): Plan {
  return { revision: 0, steps, decisionPoints, note };
}

function decision(
  id: string,
  label: string,
  condition: DecisionCondition,
  after: number,
  whenTrue: Plan,
  whenFalse: Plan = plan([]),
): DecisionPoint {
  return { id, label, condition, after, whenTrue, whenFalse };
}

// The step that opens every alert task. Not part of any plan: the
// engine dispatches it before a plan can exist.
export const TRIAGE_STEP: PlanStep = step(
  'triage',
  'triage',
  'Triage the alert: score risk, assign priority and a decision',
  'Alert work always starts with triage',
);

// ── Policy table ─────────────────────────────────────────────

function alertPlan(tier: RiskTier): Plan {
  const policy = branchPolicy(tier);

  switch (tier) {
    case 'High':
      return plan(
        [
          step('response-contain', 'response', 'Contain affected entities', policy.description, {
            parallelGroup: 1,
            containment: true,
          }),
          step('intel-enrich', 'intel', 'Enrich indicators and attribute the activity', policy.description, {
            parallelGroup: 1,
          }),
        ],
        [
          decision(
            'apt-confirmed',
            'APT confirmed?',
            { kind: 'flag', agentId: 'intel', flag: 'aptConfirmed' },
            2,
            plan([
              step(
                'hunting-apt',
                'hunting',
                'Hunt for related APT activity across the estate',
                'Intelligence attributed the activity to a tracked APT',
              ),
            ]),
          ),
        ],
      );
    case 'Medium':
      return plan([
        step('hunting-investigate', 'hunting', 'Investigate related activity', policy.description, {
          parallelGroup: 1,
        }),
        step('intel-context', 'intel', 'Provide threat context', policy.description, {
          parallelGroup: 1,
        }),
      ]);
    case 'Low':
      return plan([], [], 'Low risk: alert recorded for monitoring');
  }
}

function threatHuntPlan(): Plan {
  return plan(
    [
      step(
        'hunting-execute',
        'hunting',
        'Generate and execute hunting queries',
        'Threat hunts start with the hunting agent',
      ),
    ],
    [
      decision(
        'hunt-findings',
        'Findings?',
        { kind: 'flag', agentId: 'hunting', flag: 'threatsFound' },
        1,
        plan(
          [
            step('triage-findings', 'triage', 'Triage hunt findings', 'The hunt returned matching activity'),
            step('intel-context', 'intel', 'Provide threat context for the findings', 'Findings need context'),
          ],
          [
            decision(
              'findings-high-risk',
              'High risk?',
              { kind: 'risk-at-least', agentId: 'triage', tier: 'High' },
              1,
              plan([
                step(
                  'response-contain',
                  'response',
                  'Contain entities involved in the findings',
                  'Triage rated the findings high risk',
                  { containment: true },
                ),
              ]),
            ),
          ],
        ),
      ),
    ],
  );
}

function threatBriefPlan(): Plan {
  return plan(
    [
      step(
        'intel-briefing',
        'intel',
        'Produce a threat briefing',
        'Briefings start with current intelligence',
      ),
    ],
    [
      decision(
        'emerging-threats',
        'Emerging threats?',
        { kind: 'flag', agentId: 'intel', flag: 'threatsFound' },
        1,
        plan(
          [
            step(
              'hunting-emerging',
              'hunting',
              'Hunt for the emerging threats in the environment',
              'The briefing reported emerging threats',
            ),
          ],
          [
            decision(
              'threats-found',
              'Threats found?',
              { kind: 'flag', agentId: 'hunting', flag: 'threatsFound' },
              1,
              plan([
                step(
                  'triage-threats',
                  'triage',
                  'Triage threats found in the environment',
                  'The hunt found the emerging threats locally',
                ),
              ]),
            ),
          ],
        ),
      ),
    ],
  );
}

function incidentResponsePlan(): Plan {
  return plan(
    [
      step('triage-assess', 'triage', 'Assess the incident', 'Incident response starts with an assessment'),
      step('response-contain', 'response', 'Contain the incident', 'Limit the blast radius', {
        containment: true,
      }),
      step('intel-attribution', 'intel', 'Attribute the incident', 'Attribution informs recovery'),
    ],
    [
      decision(
        'investigate-further',
        'Investigate further?',
        { kind: 'decision-in', agentId: 'response', decisions: ['Escalate', 'Investigate'] },
        2,
        plan([
          step(
            'hunting-incident',
            'hunting',
            'Hunt for further incident activity',
            'Response recommended further investigation',
          ),
        ]),
      ),
    ],
  );
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Build the plan for a task type. Alert tasks need the risk tier
 * from triage; every other type ignores it.
 */
export function buildPlan(taskType: TaskType, tier?: RiskTier): Plan {
  switch (taskType) {
    case 'alert_analysis':
      if (tier === undefined) {
        throw new PlannerError('Alert plans need a risk tier from triage');
      }
      return alertPlan(tier);
    case 'threat_hunt':
      return threatHuntPlan();
    case 'threat_brief':
      return threatBriefPlan();
    case 'incident_response':
      return incidentResponsePlan();
  }
}

/** Plan made of reviewer-supplied steps (Modify-plan). */
export function planFromSteps(steps: readonly PlanStep[], revision: number): Plan {
  return { revision, steps: [...steps], decisionPoints: [], note: 'Plan modified by reviewer' };
}

// ── Flattening ───────────────────────────────────────────────

/**
 * Linear dispatch order of a plan: each decision point sits after
 * the number of top-level steps given by its `after`.
 */
export function toNodes(p: Plan): PlanNode[] {
  const nodes: PlanNode[] = [];

  for (let i = 0; i <= p.steps.length; i++) {
    for (const point of p.decisionPoints) {
      if (Math.min(point.after, p.steps.length) === i) {
        nodes.push({ kind: 'decision', point });
      }
    }
    const s = p.steps[i];
    if (s !== undefined) nodes.push({ kind: 'step', step: s });
  }

  return nodes;
}

/** Every agent a plan can reach, through either branch of every decision. */
export function planAgents(p: Plan): Set<AgentId> {
  const agents = new Set<AgentId>(p.steps.map((s) => s.agentId));
  for (const point of p.decisionPoints) {
    agents.add(point.condition.agentId);
    for (const id of planAgents(point.whenTrue)) agents.add(id);
    for (const id of planAgents(point.whenFalse)) agents.add(id);
  }
  return agents;
}

/** Every step a plan can reach, through either branch of every decision. */
export function planSteps(p: Plan): PlanStep[] {
  return [
    ...p.steps,
    ...p.decisionPoints.flatMap((point) => [...planSteps(point.whenTrue), ...planSteps(point.whenFalse)]),
  ];
}

// ── Rendering ────────────────────────────────────────────────

export function describeCondition(condition: DecisionCondition): string {
  switch (condition.kind) {
    case 'flag':
      return `${condition.agentId}.${condition.flag}`;
    case 'risk-at-least':
      return `${condition.agentId} risk ≥ ${condition.tier}`;
    case 'decision-in':
      return `${condition.agentId}.decision ∈ {${condition.decisions.join(', ')}}`;
  }
}

export function describePlan(p: Plan, indent = ''): string[] {
  const lines: string[] = [];
  if (p.note !== undefined) lines.push(`${indent}(${p.note})`);

  let n = 0;
  for (const node of toNodes(p)) {
    if (node.kind === 'step') {
      n++;
      const s = node.step;
      const group = s.parallelGroup !== undefined ? ` ∥${String(s.parallelGroup)}` : '';
      const flag = s.containment ? ' [containment]' : '';
      lines.push(`${indent}${String(n)}. [${s.agentId}] ${s.action}${group}${flag}`);
    } else {
      const point = node.point;
      lines.push(`${indent}◆ ${point.label} (${describeCondition(point.condition)})`);
      lines.push(`${indent}  yes:`);
      lines.push(...describePlan(point.whenTrue, `${indent}    `));
      lines.push(`${indent}  no:`);
      lines.push(...describePlan(point.whenFalse, `${indent}    `));
    }
  }

  if (lines.length === 0) lines.push(`${indent}(nothing)`);
  return lines;
}
