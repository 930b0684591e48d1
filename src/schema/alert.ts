import { z } from 'zod';

// ── Severity ──────────────────────────────────────────────────

export const alertSeveritySchema = z.enum([
  'Critical',
  'High',
  'Medium',
  'Low',
  'Informational',
]);

export type AlertSeverity = z.infer<typeof alertSeveritySchema>;

// ── Entity ────────────────────────────────────────────────────

export const entitySchema = z.object({
  type: z.string().min(1),
  value: z.string().min(1),
  // Asset class, e.g. "domain-controller". Matched against the
  // configured critical-system categories before containment.
  category: z.string().min(1).optional(),
});

export type Entity = z.infer<typeof entitySchema>;

// ── Alert ─────────────────────────────────────────────────────

const stringSetSchema = z
  .array(z.string().min(1))
  .default([])
  .transform((values) => [...new Set(values)]);

export const alertSchema = z.object({
  alertId: z.string().min(1),
  name: z.string().min(1),
  severity: alertSeveritySchema,
  description: z.string().default(''),
  tactics: stringSetSchema,
  techniques: stringSetSchema,
  entities: z.array(entitySchema).default([]),
  confidence: z.number().min(0).max(100).optional(),
});

export type Alert = z.infer<typeof alertSchema>;
export type AlertInput = z.input<typeof alertSchema>;
