import { Queue } from 'bullmq';
import { redis } from './redis';
import { loadEnv } from './env';
import type { ForecastJobData, ForecastJobResult } from './jobs/forecast-job';

export const FORECAST_QUEUE_NAME = loadEnv().QUEUE_NAME;

// 큐 생성 (Producer용)
export const forecastQueue = new Queue<ForecastJobData, ForecastJobResult>(FORECAST_QUEUE_NAME, {
  connection: redis,
  defaultJobOptions: {
    attempts: 3,
    backoff: {
      type: 'exponential',
      delay: 1000,
    },
    removeOnComplete: 100, // 성공한 작업 로그 100개 유지
    removeOnFail: 500, // 실패한 작업 로그 500개 유지
  },
});
