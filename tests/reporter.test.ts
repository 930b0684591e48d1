import { mkdtemp, readFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, it, expect } from 'vitest';

import { buildAuditRecord } from '../src/report/audit.js';
import { formatDuration, generateMarkdown, serializeAuditJSON } from '../src/report/reporter.js';
import { FileAuditSink } from '../src/report/sinks.js';
import { parseAuditRecord } from '../src/schema/audit.js';
import type { AuditRecord } from '../src/schema/audit.js';
import { T0, makeRecord, makeStep, makeTask, response } from './helpers.js';

function sampleRecord(overrides: Partial<Parameters<typeof buildAuditRecord>[0]> = {}): AuditRecord {
  return buildAuditRecord({
    task: makeTask({ description: 'Investigate | test alert' }),
    finalState: 'Escalated-Resolved',
    terminationReason: 'Plan completed after 1 resolved escalation',
    riskTier: 'High',
    records: [
      makeRecord({
        sequence: 0,
        stepId: 'triage',
        agentId: 'triage',
        response: response({ agentId: 'triage', findings: 'Scored 92', riskScore: 92, decision: 'Escalate' }),
      }),
      makeRecord({
        sequence: 1,
        stepId: 'response-contain',
        agentId: 'response',
        status: 'failed',
        attempts: 2,
        response: undefined,
        error: { kind: 'timeout', message: 'response did not respond within 20ms' },
      }),
    ],
    escalations: [
      {
        event: {
          id: 'esc-1',
          taskId: 'task-1',
          reason: 'provider-timeout',
          severity: 'High',
          detail: 'response failed after 2 attempts: response did not respond within 20ms',
          raisedAt: T0.toISOString(),
          triggeringStep: makeStep({ id: 'response-contain', agentId: 'response' }),
        },
        resolution: { action: 'Proceed', reviewer: 'analyst-1', decidedAt: T0.toISOString() },
      },
    ],
    branches: [{ decisionPointId: 'apt-confirmed', label: 'APT confirmed?', outcome: false, decidedBy: 'engine' }],
    transitions: [],
    finishedAt: new Date(T0.getTime() + 2_500),
    ...overrides,
  });
}

describe('buildAuditRecord', () => {
  it('produces a valid, frozen record', () => {
    const record = sampleRecord();

    expect(parseAuditRecord(record)).toEqual(record);
    expect(Object.isFrozen(record.previousActions)).toBe(true);
    expect(record.durationMs).toBe(2_500);
    expect(record.finalDecision).toBe('Escalate');
  });

  it('summarises findings, decisions and open risks', () => {
    expect(sampleRecord().summary).toEqual({
      keyFindings: ['triage: Scored 92'],
      decisions: [{ agentId: 'triage', stepId: 'triage', decision: 'Escalate' }],
      openRisks: [
        'response (response-contain) failed: response did not respond within 20ms',
        'High-risk alert closed without a containment response',
      ],
    });
  });

  it('records Abort as the final decision of an aborted task', () => {
    expect(sampleRecord({ finalState: 'Aborted' }).finalDecision).toBe('Abort');
  });
});

describe('serializeAuditJSON', () => {
  it('sorts keys', () => {
    const lines = serializeAuditJSON(sampleRecord()).split('\n');

    expect(lines[1]).toBe('  "alertId": "ALERT-T1",');
    expect(lines[2]).toBe('  "branches": [');
  });
});

describe('generateMarkdown', () => {
  it('renders the metadata table and invocation rows', () => {
    const lines = generateMarkdown(sampleRecord()).split('\n');

    expect(lines[0]).toBe('# Task Audit: Investigate \\| test alert');
    expect(lines).toContain('| **Final State** | **Escalated-Resolved** [RESOLVED] |');
    expect(lines).toContain('| **Duration** | 2.5s |');
    expect(lines).toContain('| 1 | triage | triage | [OK] | 1 | Escalate | 0ms |');
    expect(lines).toContain('| 2 | response | response-contain | [FAIL: timeout] | 2 | - | 0ms |');
  });

  it('lists branches and escalations with their resolution', () => {
    const lines = generateMarkdown(sampleRecord()).split('\n');

    expect(lines).toContain('- APT confirmed? → no (engine)');
    expect(lines).toContain('### [HIGH] provider-timeout');
    expect(lines).toContain('**Resolution:** Proceed by analyst-1 at 2026-01-15T10:00:00.000Z');
  });
});

describe('formatDuration', () => {
  it('switches to seconds from one second', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(1_000)).toBe('1.0s');
  });
});

describe('FileAuditSink', () => {
  it('writes JSON and Markdown under a safe file name', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'socflow-audit-'));
    const record = sampleRecord({ task: makeTask({ id: 'tenant/alert 1' }) });

    await new FileAuditSink(dir).emit(record);

    const json = await readFile(path.join(dir, 'tenant_alert_1.json'), 'utf-8');
    expect(JSON.parse(json)).toMatchObject({ taskId: 'tenant/alert 1', finalState: 'Escalated-Resolved' });
    const markdown = await readFile(path.join(dir, 'tenant_alert_1.md'), 'utf-8');
    expect(markdown.startsWith('# Task Audit: Investigate test alert')).toBe(true);
  });
});
