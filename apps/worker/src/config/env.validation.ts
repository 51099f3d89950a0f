import { z } from 'zod';

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Redis (queue, configuration store, alert history)
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().min(0).default(0),

  // Worker concurrency
  WORKER_CONCURRENCY_ALERTS: z.coerce.number().int().positive().default(10),

  // Slack Web API
  SLACK_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SLACK_MAX_RETRIES: z.coerce.number().int().min(0).default(0),
  SLACK_MAX_IMAGES: z.coerce.number().int().min(0).max(10).default(5),

  // Links rendered into alerts
  PUBLIC_BASE_URL: z.string().url().default('http://localhost'),
  JENKINS_URL: z.string().url().optional(),

  // Alert history
  ALERT_HISTORY_LIMIT: z.coerce.number().int().positive().default(100),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
