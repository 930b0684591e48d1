import { z } from 'zod';

// ── Environment ──────────────────────────────────────────────

export const envConfigSchema = z.object({
  anthropicApiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return envConfigSchema.parse({
    anthropicApiKey: env['ANTHROPIC_API_KEY'] || undefined,
    model: env['SOCFLOW_MODEL'] || undefined,
  });
}
