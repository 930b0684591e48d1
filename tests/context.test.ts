import { describe, it, expect } from 'vitest';

import { ContextConflictError, TaskContext } from '../src/core/context.js';
import type { InvocationOutcome } from '../src/core/context.js';
import type { PlanStep } from '../src/schema/plan.js';
import { T0, makeStep, response } from './helpers.js';

function succeeded(step: PlanStep, findings: string, extra: { correlatedAlertIds?: string[] } = {}): InvocationOutcome {
  return {
    step,
    dispatch: 1,
    attempts: 1,
    startedAt: T0,
    finishedAt: new Date(T0.getTime() + 120),
    status: 'succeeded',
    response: response({ agentId: step.agentId, findings, ...extra }),
  };
}

function failed(step: PlanStep): InvocationOutcome {
  return {
    step,
    dispatch: 1,
    attempts: 2,
    startedAt: T0,
    finishedAt: new Date(T0.getTime() + 40),
    status: 'failed',
    error: { kind: 'timeout', message: `${step.agentId} did not respond within 20ms` },
  };
}

const hunt = makeStep({ id: 'hunt', agentId: 'hunting', parallelGroup: 1 });
const enrich = makeStep({ id: 'enrich', agentId: 'intel', parallelGroup: 1 });

describe('TaskContext.commitGroup', () => {
  it('appends records in order with sequence numbers and durations', () => {
    const context = new TaskContext('t1');

    const records = context.commitGroup([succeeded(hunt, 'a'), succeeded(enrich, 'b')]);

    expect(records.map((r) => [r.sequence, r.stepId, r.groupStatus, r.durationMs])).toEqual([
      [0, 'hunt', 'complete', 120],
      [1, 'enrich', 'complete', 120],
    ]);
    expect(context.previousActions).toHaveLength(2);
  });

  it('ignores a repeated identical commit', () => {
    const context = new TaskContext('t1');
    context.commitGroup([succeeded(hunt, 'a')]);

    expect(context.commitGroup([succeeded(hunt, 'a')])).toEqual([]);
    expect(context.previousActions).toHaveLength(1);
  });

  it('rejects a differing result for the same dispatch without writing anything', () => {
    const context = new TaskContext('t1');
    context.commitGroup([succeeded(hunt, 'a')]);

    expect(() => context.commitGroup([succeeded(enrich, 'b'), succeeded(hunt, 'changed')])).toThrow(
      new ContextConflictError('hunt', 1),
    );
    expect(context.previousActions.map((r) => r.stepId)).toEqual(['hunt']);
  });

  it('marks every record of a group with a failed member as partial-failure', () => {
    const context = new TaskContext('t1');

    const records = context.commitGroup([succeeded(hunt, 'a'), failed(enrich)]);

    expect(records.map((r) => [r.status, r.groupStatus])).toEqual([
      ['succeeded', 'partial-failure'],
      ['failed', 'partial-failure'],
    ]);
  });

  it('keeps a lone failure complete', () => {
    const context = new TaskContext('t1');

    const [record] = context.commitGroup([failed(hunt)]);

    expect(record?.groupStatus).toBe('complete');
    expect(record?.error?.kind).toBe('timeout');
  });

  it('collects correlated alerts into the related incidents', () => {
    const context = new TaskContext('t1', ['INC-1']);

    context.commitGroup([succeeded(hunt, 'a', { correlatedAlertIds: ['ALERT-9', 'INC-1'] })]);

    expect(context.relatedIncidents).toEqual(['INC-1', 'ALERT-9']);
  });
});

describe('TaskContext lookups', () => {
  it('counts dispatches and waits per step and agent', () => {
    const context = new TaskContext('t1');
    context.commitGroup([failed(hunt)]);
    context.commitGroup([{ ...succeeded(hunt, 'retry'), dispatch: 2 }]);

    expect(context.dispatchCount('hunt')).toBe(2);
    expect(context.waitedMs('hunting')).toBe(160);
    expect(context.waitedMs('intel')).toBe(0);
  });
});

describe('TaskContext.view', () => {
  it('returns a frozen copy detached from the store', () => {
    const context = new TaskContext('t1');
    context.commitGroup([succeeded(hunt, 'a')]);

    const view = context.view();
    context.commitGroup([succeeded(enrich, 'b')]);

    expect(Object.isFrozen(view)).toBe(true);
    expect(Object.isFrozen(view.previousActions[0])).toBe(true);
    expect(view.previousActions).toHaveLength(1);
  });
});
