import { RISK_THRESHOLDS } from '../config/defaults.js';
import type { RiskTier } from '../schema/plan.js';

// ── Tier order ───────────────────────────────────────────────

const TIER_RANK: Record<RiskTier, number> = {
  Low: 0,
  Medium: 1,
  High: 2,
};

export function compareTiers(a: RiskTier, b: RiskTier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

// ── Classifier ───────────────────────────────────────────────

/**
 * Map a provider-reported risk score to a tier.
 * Boundary values belong to the higher tier: 80 is High, 50 is Medium.
 */
export function classifyRisk(riskScore: number): RiskTier {
  if (!Number.isInteger(riskScore) || riskScore < 0 || riskScore > 100) {
    throw new RangeError(`Risk score must be an integer in [0, 100], got ${String(riskScore)}`);
  }
  if (riskScore >= RISK_THRESHOLDS.HIGH) return 'High';
  if (riskScore >= RISK_THRESHOLDS.MEDIUM) return 'Medium';
  return 'Low';
}

// ── Branch policy ────────────────────────────────────────────

export interface BranchPolicy {
  tier: RiskTier;
  label: string;
  containment: boolean;
  description: string;
}

const BRANCH_POLICIES: Record<RiskTier, BranchPolicy> = {
  High: {
    tier: 'High',
    label: 'contain-and-enrich',
    containment: true,
    description: 'Contain immediately while enriching; hunt if an APT is confirmed',
  },
  Medium: {
    tier: 'Medium',
    label: 'investigate',
    containment: false,
    description: 'Investigate and gather context in parallel',
  },
  Low: {
    tier: 'Low',
    label: 'record-and-monitor',
    containment: false,
    description: 'Record the alert and keep monitoring',
  },
};

export function branchPolicy(tier: RiskTier): BranchPolicy {
  return BRANCH_POLICIES[tier];
}
