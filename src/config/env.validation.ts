import { z } from 'zod';

/**
 * Environment schema, applied by ConfigModule.forRoot({ validate }).
 * Defaults here are the only place a setting's default lives.
 */
const resolutionPolicy = z.enum(['permissive', 'strict']);

export const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  /** Only one process should synchronize the schema. */
  SYNC_DATABASE: z.enum(['true', 'false']).default('true'),
  PORT: z.coerce.number().int().positive().default(3000),
  SWAGGER_PATH: z.string().min(1).default('docs'),

  STEP_RUNNER: z.enum(['simulated', 'shell']).default('simulated'),
  PIPELINE_MAX_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  PIPELINE_STEP_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
  PIPELINE_HISTORY_LIMIT: z.coerce.number().int().min(1).default(1000),
  PIPELINE_DEPENDENCY_POLICY: resolutionPolicy.default('permissive'),
  PIPELINE_VARIABLE_POLICY: resolutionPolicy.default('permissive'),
  DEPLOY_LOCK_POLL_MS: z.coerce.number().int().positive().default(1000),
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

export function validateEnv(raw: Record<string, unknown>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
