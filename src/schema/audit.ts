import { z } from 'zod';

import { agentDecisionSchema, agentIdSchema, invocationRecordSchema } from './agent.js';
import {
  escalationReasonSchema,
  escalationSeveritySchema,
  humanDecisionSchema,
} from './escalation.js';
import { planStepSchema, riskTierSchema } from './plan.js';
import { taskTypeSchema } from './task.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the audit contract changes.

export const AUDIT_RECORD_VERSION = '1.0' as const;

// ── Task states ─────────────────────────────────────────────

export const taskStateSchema = z.enum([
  'Received',
  'TriageCheck',
  'TriagePending',
  'TriageDone',
  'Planning',
  'Dispatching',
  'StepAwaiting',
  'Synthesizing',
  'Escalated',
  'AwaitingInformation',
  'Done',
  'Escalated-Resolved',
  'Aborted',
]);

export type TaskState = z.infer<typeof taskStateSchema>;

export const terminalStateSchema = z.enum(['Done', 'Escalated-Resolved', 'Aborted']);

export type TerminalState = z.infer<typeof terminalStateSchema>;

// ── Pieces ──────────────────────────────────────────────────

export const synthesisSchema = z.object({
  keyFindings: z.array(z.string()),
  decisions: z.array(
    z.object({
      agentId: agentIdSchema,
      stepId: z.string(),
      decision: agentDecisionSchema,
    }),
  ),
  openRisks: z.array(z.string()),
});

export type Synthesis = z.infer<typeof synthesisSchema>;

export const auditEscalationSchema = z.object({
  event: z.object({
    id: z.string(),
    taskId: z.string(),
    reason: escalationReasonSchema,
    triggeringStep: planStepSchema.optional(),
    severity: escalationSeveritySchema,
    detail: z.string(),
    raisedAt: z.string().datetime(),
  }),
  resolution: humanDecisionSchema
    .and(z.object({ decidedAt: z.string().datetime() }))
    .optional(),
});

export type AuditEscalation = z.infer<typeof auditEscalationSchema>;

export const branchRecordSchema = z.object({
  decisionPointId: z.string(),
  label: z.string(),
  outcome: z.boolean(),
  decidedBy: z.enum(['engine', 'reviewer']),
});

export type BranchRecord = z.infer<typeof branchRecordSchema>;

export const transitionRecordSchema = z.object({
  from: taskStateSchema,
  to: taskStateSchema,
  at: z.string().datetime(),
});

export type TransitionRecord = z.infer<typeof transitionRecordSchema>;

// ── Root record ─────────────────────────────────────────────

export const auditRecordSchema = z.object({
  version: z.literal(AUDIT_RECORD_VERSION),
  taskId: z.string().min(1),
  taskType: taskTypeSchema,
  description: z.string(),
  alertId: z.string().optional(),
  finalState: terminalStateSchema,
  finalDecision: z.union([agentDecisionSchema, z.literal('Abort')]).nullable(),
  terminationReason: z.string().min(1),
  riskTier: riskTierSchema.optional(),
  summary: synthesisSchema,
  previousActions: z.array(invocationRecordSchema),
  escalations: z.array(auditEscalationSchema),
  branches: z.array(branchRecordSchema),
  transitions: z.array(transitionRecordSchema),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type AuditRecord = z.infer<typeof auditRecordSchema>;

export function parseAuditRecord(data: unknown): AuditRecord {
  return auditRecordSchema.parse(data);
}
