/**
 * Default configuration values.
 * All values are overridable via config file.
 */

export const TIMEOUTS = {
  PROVIDER_TIMEOUT: 30_000,
  RETRY_BACKOFF: 1_000,
} as const;

export const LIMITS = {
  MAX_PROVIDER_RETRIES: 1,
  MAX_DECISION_RETRIES: 1,
  MAX_TRIAGE_RISK_RETRIES: 1,
  MAX_PLAN_REVISIONS: 5,
} as const;

// Inclusive lower bounds: 80 is High, 50 is Medium.
export const RISK_THRESHOLDS = {
  HIGH: 80,
  MEDIUM: 50,
} as const;
