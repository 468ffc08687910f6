import test from "node:test";
import assert from "node:assert/strict";
import { processForecastJob, RUN_FORECAST_JOB } from "../lib/jobs/forecast-job";
import { InvalidConfigError } from "../lib/forecast/errors";

const SAMPLE = "data/companies/sample-co.json";

test("job name", () => {
  assert.equal(RUN_FORECAST_JOB, "RunForecastJob");
});

test("processForecastJob runs the sample company from its latest year", async () => {
  const result = await processForecastJob({ companyFile: SAMPLE });

  assert.equal(result.companyFile, SAMPLE);
  assert.equal(result.companyName, "Sample Manufacturing Co");
  assert.equal(result.baseYear, 2024);
  assert.deepEqual(result.years, [2025, 2026, 2027]);
  assert.equal(result.periods.length, 3);
  assert.equal(result.backtest, null);
  assert.deepEqual(result.checks, { ppeRollForward: true, debtRollForward: true, cashTieOut: true, balanced: true });
  assert.equal(result.assumptions.length, 17);
  assert.ok(result.buildDurationMs >= 0);
});

test("processForecastJob applies per-job overrides and backtests a historical base year", async () => {
  const result = await processForecastJob({
    companyFile: SAMPLE,
    configOverrides: { baseYear: 2023, forecastYears: 1 },
  });

  assert.deepEqual(result.years, [2024]);
  assert.ok(result.backtest);
  assert.deepEqual(result.backtest.years, [2024]);

  const revenue = result.backtest.lines.find((l) => l.line === "revenue");
  assert.ok(revenue);
  assert.equal(revenue.actual, 1260);
});

test("processForecastJob rejects invalid overrides", async () => {
  await assert.rejects(
    processForecastJob({ companyFile: SAMPLE, configOverrides: { pctFinancingWithDebt: 2 } }),
    InvalidConfigError
  );
});
