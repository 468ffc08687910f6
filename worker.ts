/**
 * Forecast Worker (BullMQ)
 *
 * Job Types:
 * - RunForecastJob: one company bundle -> ForecastSummary
 */

import { Worker, Job } from 'bullmq';
import { redis } from './lib/redis';
import { loadEnv } from './lib/env';
import { forecastQueue, FORECAST_QUEUE_NAME } from './lib/queue';
import { isForecastError } from './lib/forecast/errors';
import {
  processForecastJob,
  RUN_FORECAST_JOB,
  type ForecastJobData,
  type ForecastJobResult,
} from './lib/jobs/forecast-job';

const env = loadEnv();

console.log('[Worker] Starting Forecast Worker...');
console.log(`[Worker] Queue: ${FORECAST_QUEUE_NAME}`);
console.log(`[Worker] Concurrency: ${env.WORKER_CONCURRENCY}`);

// ============================================================================
// Worker Definition
// ============================================================================

const worker = new Worker<ForecastJobData, ForecastJobResult>(
  FORECAST_QUEUE_NAME,
  async (job: Job<ForecastJobData, ForecastJobResult>) => {
    console.log(`[Worker] 🔄 Processing Job: ${job.name} (ID: ${job.id})`);

    try {
      switch (job.name) {
        case RUN_FORECAST_JOB: {
          console.log(`[Worker] 📈 Forecasting: ${job.data.companyFile}`);
          const result = await processForecastJob(job.data);
          console.log(
            `[Worker] ✅ ${result.companyName}: FY${result.years[0]}-FY${result.years[result.years.length - 1]}, ` +
              `${result.warnings.length} warning(s), balanced: ${result.checks.balanced}`
          );
          return result;
        }

        default:
          throw new Error(`Unknown job type: ${job.name}`);
      }
    } catch (error) {
      if (isForecastError(error)) {
        console.error(`[Worker] ❌ Job ${job.name} rejected (${error.code}): ${error.message}`);
      } else {
        console.error(`[Worker] ❌ Job ${job.name} failed:`, error);
      }
      throw error;
    }
  },
  {
    connection: redis,
    concurrency: env.WORKER_CONCURRENCY,
  }
);

// ============================================================================
// Event Handlers
// ============================================================================

worker.on('completed', (job) => {
  console.log(`[Worker] ✅ Job ${job.id} (${job.name}) completed!`);
});

worker.on('failed', (job, err) => {
  console.error(`[Worker] ❌ Job ${job?.id} (${job?.name}) failed: ${err.message}`);
});

worker.on('error', (err) => {
  console.error('[Worker] ⚠️  Worker error:', err);
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

async function shutdown(signal: string): Promise<void> {
  console.log(`[Worker] 🛑 ${signal} received, shutting down gracefully...`);
  await worker.close();
  await forecastQueue.close();
  await redis.quit();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error) => {
    console.error('[Worker] ❌ Shutdown failed:', error);
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error) => {
    console.error('[Worker] ❌ Shutdown failed:', error);
    process.exit(1);
  });
});

console.log(`[Worker] ✅ Worker listening on queue: ${FORECAST_QUEUE_NAME}`);
console.log(`[Worker] 📝 Available job types: ${RUN_FORECAST_JOB}`);
