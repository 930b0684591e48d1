import { describe, it, expect } from 'vitest';

import { Orchestrator } from '../src/core/orchestrator.js';
import type { OrchestratorEvent, OrchestratorOptions } from '../src/core/orchestrator.js';
import { InvalidDecisionError, InvalidTaskError, UnknownTaskError } from '../src/core/errors.js';
import { QueueEscalationSink } from '../src/core/escalation.js';
import { AGENT_IDS } from '../src/schema/agent.js';
import { createRuleProvider } from '../src/providers/rules.js';
import { createScriptedProvider, respond } from '../src/providers/scripted.js';
import { MemoryAuditSink } from '../src/report/sinks.js';
import { fixedClock, registryOf } from './helpers.js';

const categories = ['domain-controller'];

function ruleOrchestrator(overrides: Partial<OrchestratorOptions> = {}): {
  orchestrator: Orchestrator;
  audit: MemoryAuditSink;
} {
  const audit = new MemoryAuditSink();
  const orchestrator = new Orchestrator({
    registry: registryOf(
      AGENT_IDS.map((id) => createRuleProvider(id, { criticalSystemCategories: categories })),
      { timeoutMs: 1_000, waitBudgetMs: 3_000 },
    ),
    escalationSink: new QueueEscalationSink(),
    auditSink: audit,
    criticalSystemCategories: categories,
    retryBackoffMs: 0,
    now: fixedClock(),
    ...overrides,
  });
  return { orchestrator, audit };
}

const lsassAlert = {
  alertId: 'ALERT-1001',
  name: 'Suspicious LSASS access',
  severity: 'Critical',
  tactics: ['CredentialAccess', 'LateralMovement'],
  techniques: ['T1003', 'T1021', 'T1078'],
  entities: [
    { type: 'host', value: 'ws-0142' },
    { type: 'account', value: 'svc-backup' },
    { type: 'ip', value: '10.0.0.15' },
  ],
  confidence: 90,
};

describe('Orchestrator.submit', () => {
  it('rejects an alert task without an alert', () => {
    const { orchestrator } = ruleOrchestrator();

    expect(() => orchestrator.submit({ type: 'alert_analysis', description: 'No alert' })).toThrow(
      new InvalidTaskError('Invalid task', ['alert: alert is required when type is alert_analysis']),
    );
  });

  it('rejects a duplicate task id', async () => {
    const { orchestrator } = ruleOrchestrator();
    const input = { id: 'hunt-1', type: 'threat_hunt', description: 'Hunt' };
    orchestrator.submit(input);

    expect(() => orchestrator.submit(input)).toThrow('Duplicate task id hunt-1');
    await orchestrator.waitFor('hunt-1');
    expect(() => orchestrator.submit(input)).toThrow('Duplicate task id hunt-1');
  });

  it('assigns an id when none is given', async () => {
    const { orchestrator } = ruleOrchestrator();

    const id = orchestrator.submit({ type: 'threat_brief', description: 'Briefing' });

    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    await orchestrator.waitFor(id);
  });
});

describe('rule-driven runs', () => {
  it('contains, enriches and hunts a confirmed APT', async () => {
    const { orchestrator, audit } = ruleOrchestrator();

    const id = orchestrator.submit({
      id: 'alert-1',
      type: 'alert_analysis',
      description: 'Credential dumping followed by lateral movement',
      alert: lsassAlert,
    });
    const outcome = await orchestrator.waitFor(id);

    expect(outcome.state).toBe('Done');
    const record = audit.get('alert-1');
    expect(record?.previousActions.map((r) => r.stepId)).toEqual([
      'triage',
      'response-contain',
      'intel-enrich',
      'hunting-apt',
    ]);
    expect(record?.previousActions[0]?.response?.riskScore).toBe(90);
    expect(record?.finalDecision).toBe('Investigate');
    expect(orchestrator.status(id)).toEqual({ taskId: 'alert-1', state: 'Done', archived: true });
  });

  it('keeps concurrent tasks apart', async () => {
    const { orchestrator, audit } = ruleOrchestrator();

    const ids = [
      orchestrator.submit({ id: 'brief-1', type: 'threat_brief', description: 'Briefing' }),
      orchestrator.submit({ id: 'hunt-1', type: 'threat_hunt', description: 'Hunt' }),
    ];
    await Promise.all(ids.map((id) => orchestrator.waitFor(id)));

    expect(audit.get('brief-1')?.previousActions.map((r) => r.stepId)).toEqual(['intel-briefing']);
    expect(audit.get('hunt-1')?.previousActions.map((r) => r.stepId)).toEqual(['hunting-execute']);
    expect(orchestrator.records()).toHaveLength(2);
  });
});

const criticalTask = {
  id: 'dc-1',
  type: 'alert_analysis',
  description: 'Suspicious logon on a domain controller',
  alert: {
    alertId: 'ALERT-3001',
    name: 'Suspicious logon',
    severity: 'High',
    entities: [{ type: 'host', value: 'dc-01', category: 'domain-controller' }],
  },
};

function scriptedOrchestrator(): Orchestrator {
  return ruleOrchestrator({
    registry: registryOf(
      [
        createScriptedProvider('triage', [
          respond({ agentId: 'triage', findings: 'critical host', riskScore: 85 }),
        ]),
        createScriptedProvider('response'),
        createScriptedProvider('intel', [
          respond({ agentId: 'intel', findings: 'no actor', aptConfirmed: false }),
        ]),
        createScriptedProvider('hunting'),
      ],
      { timeoutMs: 1_000, waitBudgetMs: 3_000 },
    ),
  }).orchestrator;
}

describe('human decisions', () => {
  it('suspends for approval and resumes on decide', async () => {
    const orchestrator = scriptedOrchestrator();
    const id = orchestrator.submit(criticalTask);

    const suspended = await orchestrator.waitFor(id);
    expect(suspended.state).toBe('Escalated');
    expect(orchestrator.status(id)).toEqual({ taskId: 'dc-1', state: 'Escalated', archived: false });

    const outcome = await orchestrator.decide(id, { action: 'Proceed', reviewer: 'analyst-1' });

    expect(outcome.state).toBe('Escalated-Resolved');
    expect((await orchestrator.waitFor(id)).state).toBe('Escalated-Resolved');
  });

  it('rejects an invalid decision and stays suspended', async () => {
    const orchestrator = scriptedOrchestrator();
    const id = orchestrator.submit(criticalTask);
    await orchestrator.waitFor(id);

    await expect(orchestrator.decide(id, { action: 'Proceed' })).rejects.toThrow(InvalidDecisionError);
    expect(orchestrator.status(id).state).toBe('Escalated');
    expect((await orchestrator.waitFor(id)).state).toBe('Escalated');
  });

  it('aborts a suspended task', async () => {
    const orchestrator = scriptedOrchestrator();
    const id = orchestrator.submit(criticalTask);
    await orchestrator.waitFor(id);

    const outcome = await orchestrator.abort(id, 'Out of scope');

    expect(outcome.state).toBe('Aborted');
    if (outcome.status !== 'terminal') return;
    expect(outcome.record.terminationReason).toBe('Out of scope');
  });
});

describe('audit sink failures', () => {
  it('still archives the task when the sink throws', async () => {
    const { orchestrator } = ruleOrchestrator({
      auditSink: {
        emit: async () => {
          throw new Error('disk full');
        },
      },
    });

    const id = orchestrator.submit({ id: 'hunt-1', type: 'threat_hunt', description: 'Hunt' });
    const outcome = await orchestrator.waitFor(id);

    expect(outcome.state).toBe('Done');
    expect(orchestrator.status(id)).toEqual({ taskId: 'hunt-1', state: 'Done', archived: true });
    expect(orchestrator.records().map((r) => r.taskId)).toEqual(['hunt-1']);
  });
});

describe('metrics', () => {
  it('counts outcomes, high-risk alerts and agent calls', async () => {
    const { orchestrator } = ruleOrchestrator();

    await orchestrator.waitFor(
      orchestrator.submit({
        id: 'alert-1',
        type: 'alert_analysis',
        description: 'Credential dumping followed by lateral movement',
        alert: lsassAlert,
      }),
    );

    const stats = { count: 1, failed: 0, totalMs: 0, averageMs: 0, maxMs: 0 };
    expect(orchestrator.metrics()).toEqual({
      tasksByFinalState: { Done: 1 },
      escalationsByReason: {},
      highRiskAlerts: 1,
      invocationsByAgent: { triage: stats, response: stats, intel: stats, hunting: stats },
    });
  });

  it('counts escalations by reason', async () => {
    const orchestrator = scriptedOrchestrator();
    await orchestrator.waitFor(orchestrator.submit(criticalTask));

    expect(orchestrator.metrics().escalationsByReason).toEqual({ 'critical-containment': 1 });
    expect(orchestrator.metrics().tasksByFinalState).toEqual({});
  });
});

describe('events', () => {
  it('publishes transitions and archives finished tasks', async () => {
    const { orchestrator } = ruleOrchestrator();
    const seen: OrchestratorEvent['type'][] = [];
    const unsubscribe = orchestrator.onEvent((event) => seen.push(event.type));

    const id = orchestrator.submit({ type: 'threat_hunt', description: 'Hunt' });
    await orchestrator.waitFor(id);
    unsubscribe();

    expect(seen[0]).toBe('transition');
    expect(seen.slice(-2)).toEqual(['task-finished', 'task-archived']);

    orchestrator.submit({ type: 'threat_hunt', description: 'Another hunt' });
    expect(seen.at(-1)).toBe('task-archived');
  });

  it('reports unknown tasks', () => {
    const { orchestrator } = ruleOrchestrator();

    expect(() => orchestrator.status('missing')).toThrow(new UnknownTaskError('missing'));
  });
});
