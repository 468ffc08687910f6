// lib/jobs/forecast-job.ts
// RunForecastJob: load a company bundle, apply per-job overrides, run, summarize

import { withConfigOverrides, type CompanyConfigInput } from '../forecast/config';
import { loadCompanyBundle } from '../forecast/company-file';
import { runForecast } from '../forecast/full-forecast-builder';
import { summarizeForecast, type ForecastSummary } from '../forecast/summary';

export const RUN_FORECAST_JOB = 'RunForecastJob';

export type ForecastJobData = {
  companyFile: string; // path to the bundle JSON
  configOverrides?: CompanyConfigInput;
};

export type ForecastJobResult = ForecastSummary & {
  companyFile: string;
  buildDurationMs: number;
};

export async function processForecastJob(data: ForecastJobData): Promise<ForecastJobResult> {
  const context = await loadCompanyBundle(data.companyFile);
  const config = data.configOverrides ? withConfigOverrides(context.config, data.configOverrides) : context.config;

  const run = runForecast({ historical: context.historical, config });

  return {
    ...summarizeForecast(run),
    companyFile: data.companyFile,
    buildDurationMs: run.buildDurationMs,
  };
}
