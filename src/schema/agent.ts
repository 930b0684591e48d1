import { z } from 'zod';

// ── Agent identity ────────────────────────────────────────────

export const agentIdSchema = z.enum(['triage', 'hunting', 'response', 'intel']);

export type AgentId = z.infer<typeof agentIdSchema>;

export const AGENT_IDS: readonly AgentId[] = agentIdSchema.options;

// ── Response fields ───────────────────────────────────────────

export const prioritySchema = z.enum(['P1', 'P2', 'P3', 'P4', 'P5']);

export type Priority = z.infer<typeof prioritySchema>;

export const agentDecisionSchema = z.enum([
  'Escalate',
  'Investigate',
  'Monitor',
  'Dismiss',
]);

export type AgentDecision = z.infer<typeof agentDecisionSchema>;

// ── AgentResponse ─────────────────────────────────────────────
// The only channel through which a provider can affect control flow.

export const agentResponseSchema = z.object({
  agentId: agentIdSchema,
  findings: z.string(),
  riskScore: z.number().int().min(0).max(100).optional(),
  priority: prioritySchema.optional(),
  decision: agentDecisionSchema.optional(),
  correlatedAlertIds: z.array(z.string().min(1)).default([]),
  threatsFound: z.boolean().optional(),
  aptConfirmed: z.boolean().optional(),
  recommendedActions: z.array(z.string()).default([]),
});

export type AgentResponse = z.infer<typeof agentResponseSchema>;
export type AgentResponseInput = z.input<typeof agentResponseSchema>;

// ── Invocation record ─────────────────────────────────────────

export const providerErrorKindSchema = z.enum([
  'timeout',
  'unavailable',
  'malformed',
  'cancelled',
]);

export type ProviderErrorKind = z.infer<typeof providerErrorKindSchema>;

export const invocationRecordSchema = z.object({
  sequence: z.number().int().nonnegative(),
  stepId: z.string().min(1),
  dispatch: z.number().int().positive(),
  agentId: agentIdSchema,
  action: z.string().min(1),
  parallelGroup: z.number().int().nonnegative().optional(),
  status: z.enum(['succeeded', 'failed']),
  groupStatus: z.enum(['complete', 'partial-failure']),
  attempts: z.number().int().nonnegative(),
  response: agentResponseSchema.optional(),
  error: z
    .object({
      kind: providerErrorKindSchema,
      message: z.string(),
    })
    .optional(),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type AgentInvocationRecord = z.infer<typeof invocationRecordSchema>;
