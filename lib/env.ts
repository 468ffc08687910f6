import { z } from 'zod';

const EnvSchema = z.object({
  // Redis (BullMQ)
  REDIS_URL: z.string().url().optional(),
  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),

  // Queue
  QUEUE_NAME: z.string().min(1).default('forecast-runs'),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(3),

  // Company bundles (JSON: historical + config)
  COMPANY_DATA_DIR: z.string().min(1).default('data/companies'),

  NODE_ENV: z.enum(['development', 'test', 'production']).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    console.error('[Env] ❌ Invalid environment:', parsed.error.flatten().fieldErrors);
    throw new Error('Invalid environment variables (see logs).');
  }
  return parsed.data;
}

export function getRedisUrl(env: Env = loadEnv()): string {
  if (env.REDIS_URL) {
    return env.REDIS_URL;
  }
  return `redis://${env.REDIS_HOST}:${env.REDIS_PORT}`;
}
