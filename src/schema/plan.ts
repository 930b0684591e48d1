import { z } from 'zod';

import { agentIdSchema } from './agent.js';
import type { AgentDecision, AgentId } from './agent.js';

// ── Risk tier ─────────────────────────────────────────────────

export const riskTierSchema = z.enum(['Low', 'Medium', 'High']);

export type RiskTier = z.infer<typeof riskTierSchema>;

// ── PlanStep ──────────────────────────────────────────────────

export const planStepSchema = z.object({
  id: z.string().min(1),
  agentId: agentIdSchema,
  action: z.string().min(1),
  rationale: z.string().min(1),
  parallelGroup: z.number().int().nonnegative().optional(),
  containment: z.boolean().default(false),
});

export type PlanStep = z.infer<typeof planStepSchema>;

// ── Decision points ───────────────────────────────────────────

export type ResponseFlag = 'threatsFound' | 'aptConfirmed';

export type DecisionCondition =
  | { kind: 'flag'; agentId: AgentId; flag: ResponseFlag }
  | { kind: 'risk-at-least'; agentId: AgentId; tier: RiskTier }
  | { kind: 'decision-in'; agentId: AgentId; decisions: readonly AgentDecision[] };

export interface DecisionPoint {
  id: string;
  label: string;
  condition: DecisionCondition;
  /** Number of top-level plan steps that precede this decision point. */
  after: number;
  whenTrue: Plan;
  whenFalse: Plan;
}

// ── Plan ──────────────────────────────────────────────────────

export interface Plan {
  revision: number;
  steps: PlanStep[];
  decisionPoints: DecisionPoint[];
  note?: string | undefined;
}

export type PlanNode =
  | { kind: 'step'; step: PlanStep }
  | { kind: 'decision'; point: DecisionPoint };
