import { z } from 'zod';

import { planStepSchema, riskTierSchema } from './plan.js';
import type { PlanStep } from './plan.js';

// ── EscalationEvent ───────────────────────────────────────────

export const escalationReasonSchema = z.enum([
  'critical-containment',
  'decision-conflict',
  'unevaluable-decision',
  'risk-unavailable',
  'provider-timeout',
  'provider-unavailable',
  'provider-malformed',
  'wait-budget-exceeded',
]);

export type EscalationReason = z.infer<typeof escalationReasonSchema>;

export const escalationSeveritySchema = z.enum(['Critical', 'High', 'Medium']);

export type EscalationSeverity = z.infer<typeof escalationSeveritySchema>;

export interface EscalationEvent {
  readonly id: string;
  readonly taskId: string;
  readonly reason: EscalationReason;
  readonly triggeringStep?: PlanStep | undefined;
  readonly severity: EscalationSeverity;
  readonly detail: string;
  readonly raisedAt: string;
}

// ── HumanDecision ─────────────────────────────────────────────

const reviewerFields = {
  reviewer: z.string().min(1),
  note: z.string().optional(),
};

export const proceedDecisionSchema = z.object({
  ...reviewerFields,
  action: z.literal('Proceed'),
  // Required when resuming an unevaluable decision point.
  branch: z.boolean().optional(),
  // Required when resuming a triage result that carried no risk score.
  riskTier: riskTierSchema.optional(),
});

export const abortDecisionSchema = z.object({
  ...reviewerFields,
  action: z.literal('Abort'),
});

export const modifyPlanDecisionSchema = z.object({
  ...reviewerFields,
  action: z.literal('Modify-plan'),
  steps: z.array(planStepSchema),
});

export const humanDecisionSchema = z.discriminatedUnion('action', [
  proceedDecisionSchema,
  abortDecisionSchema,
  modifyPlanDecisionSchema,
]);

export type HumanDecision = z.infer<typeof humanDecisionSchema>;
