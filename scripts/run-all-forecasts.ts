/**
 * Batch Forecast Script
 *
 * Enqueues one RunForecastJob per company bundle in COMPANY_DATA_DIR.
 * The worker (npm run worker) runs them in parallel.
 *
 * Usage:
 *   npm run forecast:all
 *   npm run forecast:all -- --limit 10         # First 10 bundles
 *   npm run forecast:all -- --base-year 2023   # Backtest against later actuals
 *   npm run forecast:all -- --years 5          # Forecast horizon
 *   npm run forecast:all -- --dry-run
 */

import { loadEnv } from '../lib/env';
import { redis } from '../lib/redis';
import { forecastQueue, FORECAST_QUEUE_NAME } from '../lib/queue';
import { listCompanyBundles } from '../lib/forecast/company-file';
import type { CompanyConfigInput } from '../lib/forecast/config';
import { RUN_FORECAST_JOB } from '../lib/jobs/forecast-job';

interface BatchOptions {
  limit?: number;
  baseYear?: number;
  forecastYears?: number;
  dryRun: boolean;
}

function parseArgs(): BatchOptions {
  const args = process.argv.slice(2);
  const options: BatchOptions = { dryRun: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--limit' && args[i + 1]) {
      options.limit = parseInt(args[i + 1], 10);
      i++;
    } else if (arg === '--base-year' && args[i + 1]) {
      options.baseYear = parseInt(args[i + 1], 10);
      i++;
    } else if (arg === '--years' && args[i + 1]) {
      options.forecastYears = parseInt(args[i + 1], 10);
      i++;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    }
  }

  return options;
}

async function main() {
  const env = loadEnv();
  const options = parseArgs();

  console.log('='.repeat(60));
  console.log('Batch Forecast Script');
  console.log('='.repeat(60));
  console.log('Configuration:');
  console.log(`  Data Dir: ${env.COMPANY_DATA_DIR}`);
  console.log(`  Base Year: ${options.baseYear ?? 'latest'}`);
  console.log(`  Forecast Years: ${options.forecastYears ?? 'per company config'}`);
  console.log(`  Limit: ${options.limit ?? 'No limit'}`);
  console.log(`  Dry Run: ${options.dryRun}`);
  console.log(`  Queue: ${FORECAST_QUEUE_NAME}`);
  console.log('='.repeat(60));

  const files = (await listCompanyBundles(env.COMPANY_DATA_DIR)).slice(0, options.limit);
  console.log(`\nFound ${files.length} company bundles`);

  const configOverrides: CompanyConfigInput = {};
  if (options.baseYear !== undefined) configOverrides.baseYear = options.baseYear;
  if (options.forecastYears !== undefined) configOverrides.forecastYears = options.forecastYears;

  const runTag = new Date().toISOString().slice(0, 10);
  let jobsQueued = 0;

  for (const companyFile of files) {
    if (options.dryRun) {
      console.log(`[DRY RUN] Would queue: ${companyFile}`);
      jobsQueued++;
      continue;
    }

    await forecastQueue.add(
      RUN_FORECAST_JOB,
      { companyFile, configOverrides },
      { jobId: `forecast-${runTag}-${companyFile.replace(/[^a-zA-Z0-9]+/g, '-')}-${options.baseYear ?? 'latest'}` }
    );
    jobsQueued++;
  }

  console.log('\n' + '='.repeat(60));
  console.log(`Jobs queued: ${jobsQueued}`);
  console.log('='.repeat(60));

  await forecastQueue.close();
  await redis.quit();
}

main().catch((error) => {
  console.error('❌ Batch forecast failed:', error);
  process.exit(1);
});
