import Redis from 'ioredis';
import { getRedisUrl, loadEnv } from './env';

const env = loadEnv();

const globalForRedis = globalThis as unknown as { redis: Redis | undefined };

export const redis =
  globalForRedis.redis ??
  new Redis(getRedisUrl(env), {
    maxRetriesPerRequest: null, // Required for BullMQ
  });

if (env.NODE_ENV !== 'production') globalForRedis.redis = redis;
