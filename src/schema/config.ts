import { z } from 'zod';

import { TIMEOUTS } from '../config/defaults.js';
import { taskInputSchema } from './task.js';

// ── Provider entry ──────────────────────────────────────────

export const providerKindSchema = z.enum(['rules', 'http', 'anthropic']);

export const providerConfigSchema = z
  .object({
    kind: providerKindSchema.default('rules'),
    url: z.string().url().optional(),
    model: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
    waitBudgetMs: z.number().int().positive().optional(),
  })
  .superRefine((entry, ctx) => {
    if (entry.kind === 'http' && entry.url === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['url'],
        message: 'url is required for http providers',
      });
    }
  });

export type ProviderConfig = z.infer<typeof providerConfigSchema>;

// ── Escalation policy ───────────────────────────────────────

export const escalationPolicySchema = z.enum(['hold', 'proceed', 'abort']);

export type EscalationPolicy = z.infer<typeof escalationPolicySchema>;

// ── Full config file ────────────────────────────────────────

const defaultProvider = { kind: 'rules' } as const;

export const fileConfigSchema = z.object({
  providers: z
    .object({
      triage: providerConfigSchema.default(defaultProvider),
      hunting: providerConfigSchema.default(defaultProvider),
      response: providerConfigSchema.default(defaultProvider),
      intel: providerConfigSchema.default(defaultProvider),
    })
    .default({}),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .default(TIMEOUTS.PROVIDER_TIMEOUT),
  retryBackoffMs: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .default(TIMEOUTS.RETRY_BACKOFF),
  criticalSystemCategories: z
    .array(z.string().min(1))
    .optional()
    .default(['domain-controller', 'identity-provider', 'scada', 'payment-gateway']),
  auditDir: z.string().min(1).optional().default('.audit'),
  onEscalation: escalationPolicySchema.optional().default('hold'),
  model: z.string().min(1).optional(),
  tasks: z.array(taskInputSchema).optional().default([]),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
