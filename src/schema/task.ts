import { z } from 'zod';

import { alertSchema } from './alert.js';
import type { Alert } from './alert.js';

// ── Task type ─────────────────────────────────────────────────

export const taskTypeSchema = z.enum([
  'alert_analysis',
  'threat_hunt',
  'incident_response',
  'threat_brief',
]);

export type TaskType = z.infer<typeof taskTypeSchema>;

// ── Submission shape ──────────────────────────────────────────

export const taskInputSchema = z
  .object({
    id: z.string().min(1).optional(),
    type: taskTypeSchema,
    description: z.string().min(1),
    alert: alertSchema.optional(),
    relatedIncidents: z.array(z.string().min(1)).default([]),
  })
  .superRefine((input, ctx) => {
    if (input.type === 'alert_analysis' && input.alert === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['alert'],
        message: 'alert is required when type is alert_analysis',
      });
    }
  });

export type TaskInput = z.input<typeof taskInputSchema>;

// ── Accepted task ─────────────────────────────────────────────
// Frozen on acceptance; nothing downstream may change it.

export interface Task {
  readonly id: string;
  readonly type: TaskType;
  readonly description: string;
  readonly alert?: Readonly<Alert> | undefined;
  readonly relatedIncidents: readonly string[];
  readonly receivedAt: string;
}
