import test from "node:test";
import assert from "node:assert/strict";
import { decayPath, resolveAssumptions } from "../lib/forecast/assumption-resolver";
import { parseCompanyConfig, type CompanyConfigInput } from "../lib/forecast/config";
import { InsufficientHistoryError, MissingDataError } from "../lib/forecast/errors";
import { averageGrowthRate, ratioAverage, selectHistoryWindow } from "../lib/forecast/historical";
import type { HistoricalFinancials } from "../lib/forecast/types";
import { approxEqual, makeHistory } from "./helpers";

function resolve(historical: HistoricalFinancials, input: CompanyConfigInput = {}) {
  const config = parseCompanyConfig({ forecastYears: 2, inputYears: 3, ...input });
  return resolveAssumptions(selectHistoryWindow(historical, config), config);
}

test("selectHistoryWindow takes the trailing window ending at the base year", () => {
  const config = parseCompanyConfig({ inputYears: 2, baseYear: 2023 });
  const history = selectHistoryWindow(makeHistory([90, 95, 100, 105]), config);

  assert.equal(history.baseYear, 2023);
  assert.deepEqual(
    history.window.map((y) => y.year),
    [2022, 2023]
  );
  assert.deepEqual(
    history.actuals.map((y) => y.year),
    [2024]
  );
});

test("selectHistoryWindow rejects short history and unknown base years", () => {
  assert.throws(
    () => selectHistoryWindow(makeHistory([90, 95]), parseCompanyConfig({ inputYears: 3 })),
    (error: unknown) => error instanceof InsufficientHistoryError && error.required === 3 && error.available === 2
  );
  assert.throws(
    () => selectHistoryWindow(makeHistory([90, 95, 100]), parseCompanyConfig({ baseYear: 2030 })),
    (error: unknown) => error instanceof MissingDataError && error.message === "Missing historical.year for 2030"
  );
});

test("selectHistoryWindow rejects a window year missing a required line", () => {
  const historical = makeHistory([90, 95, 100]);
  delete historical.years[1].incomeStatement.cogs;

  assert.throws(
    () => selectHistoryWindow(historical, parseCompanyConfig({ inputYears: 3 })),
    (error: unknown) =>
      error instanceof MissingDataError &&
      error.code === "MISSING_DATA" &&
      error.year === 2022 &&
      error.line === "cogs"
  );
});

test("ratio helpers skip zero denominators", () => {
  const window = makeHistory([0, 100]).years;
  approxEqual(ratioAverage(window, (y) => y.balanceSheet.cash ?? 0, (y) => y.incomeStatement.revenue ?? 0) ?? NaN, 0.5);
  assert.equal(averageGrowthRate([0, 0, 0]), null);
  approxEqual(averageGrowthRate([100, 110, 121]) ?? NaN, 0.1);
});

test("revenue growth is the averaged historical rate", () => {
  const a = resolve(makeHistory([90, 99, 108.9]));

  assert.equal(a.revenueGrowth.source, "derived");
  assert.equal(a.revenueGrowth.value.length, 2);
  approxEqual(a.revenueGrowth.value[0], 0.1);
  approxEqual(a.revenueGrowth.value[1], 0.1);
});

test("revenue growth is clamped to bounds", () => {
  const a = resolve(makeHistory([100, 150, 225]));

  assert.equal(a.revenueGrowth.source, "derived");
  assert.deepEqual(a.revenueGrowth.value, [0.15, 0.15]);
});

test("revenue growth overrides win and short paths repeat the last rate", () => {
  const single = resolve(makeHistory([100, 150, 225]), { overrides: { revenueGrowth: 0.04 } });
  assert.equal(single.revenueGrowth.source, "overridden");
  assert.deepEqual(single.revenueGrowth.value, [0.04, 0.04]);

  const path = resolve(makeHistory([100, 150, 225]), { forecastYears: 3, overrides: { revenueGrowth: [0.1] } });
  assert.deepEqual(path.revenueGrowth.value, [0.1, 0.1, 0.1]);
});

test("decayPath tapers growth linearly", () => {
  assert.deepEqual(decayPath(0.1, 0.5, 3), [0.1, 0.05, 0]);
  assert.deepEqual(decayPath(0.05, 0, 2), [0.05, 0.05]);
});

test("operating ratios, tax and rates derive from history", () => {
  const a = resolve(makeHistory([90, 95, 100]));

  assert.equal(a.cogsPctRevenue.source, "derived");
  approxEqual(a.cogsPctRevenue.value, 0.6);
  approxEqual(a.sgaPctRevenue.value, 0.1);
  approxEqual(a.capexPctRevenue.value, 0.05);
  approxEqual(a.depreciationRate.value, 0.1);
  approxEqual(a.taxRate.value, 0.25);
  approxEqual(a.payoutRatio.value, 0.4);
  assert.equal(a.costOfDebt.source, "derived");
  approxEqual(a.costOfDebt.value, 0.05);
  approxEqual(a.daysInventoryOutstanding.value, (15 / 57 + 15 / 54 + 15 / 60) / 3 * 365, 1e-6);
});

test("return on cash falls back to just below the cost of debt", () => {
  const a = resolve(makeHistory([90, 95, 100]));

  assert.equal(a.returnOnCash.source, "default");
  approxEqual(a.returnOnCash.value, 0.04);
});

test("repurchases default when the history reports none", () => {
  const a = resolve(makeHistory([90, 95, 100]));

  assert.equal(a.repurchasePctNetIncome.source, "default");
  assert.equal(a.repurchasePctNetIncome.value, 0);
});

test("tax rate is clamped to bounds", () => {
  const historical = makeHistory([90, 95, 100]);
  for (const year of historical.years) {
    const pretax = year.incomeStatement.pretaxIncome ?? 0;
    year.incomeStatement.taxProvision = pretax * 0.5;
  }

  const a = resolve(historical);
  assert.equal(a.taxRate.source, "derived");
  assert.equal(a.taxRate.value, 0.4);
});

test("zero revenue history falls back to defaults", () => {
  const a = resolve(makeHistory([0, 0, 0]));

  assert.equal(a.revenueGrowth.source, "default");
  assert.deepEqual(a.revenueGrowth.value, [0.03, 0.03]);
  assert.equal(a.cogsPctRevenue.source, "default");
  assert.equal(a.cogsPctRevenue.value, 0.6);
  assert.equal(a.payoutRatio.source, "default");
  assert.equal(a.payoutRatio.value, 0.5);
});

test("minimum cash follows threshold, then percentage override, then history", () => {
  const absolute = resolve(makeHistory([90, 95, 100]), { minimumCashThreshold: 75 });
  assert.deepEqual(absolute.minimumCash, { value: { kind: "absolute", amount: 75 }, source: "overridden" });

  const pct = resolve(makeHistory([90, 95, 100]), { overrides: { minCashPctRevenue: 0.1 } });
  assert.deepEqual(pct.minimumCash, { value: { kind: "pctRevenue", pct: 0.1 }, source: "overridden" });

  const derived = resolve(makeHistory([100, 100, 100]));
  assert.deepEqual(derived.minimumCash, { value: { kind: "pctRevenue", pct: 0.5 }, source: "derived" });
});

test("financing policy comes from config", () => {
  const a = resolve(makeHistory([90, 95, 100]), { pctFinancingWithDebt: 0.6, ltLoanYears: 5 });

  assert.deepEqual(a.pctFinancingWithDebt, { value: 0.6, source: "overridden" });
  assert.deepEqual(a.ltLoanYears, { value: 5, source: "overridden" });
  assert.equal(a.existingLtDebtYears.source, "default");
  approxEqual(a.existingLtDebtYears.value, 3.5);

  const explicit = resolve(makeHistory([90, 95, 100]), { existingLtDebtYears: 4 });
  assert.deepEqual(explicit.existingLtDebtYears, { value: 4, source: "overridden" });
});

test("financing policy left out of config is tagged as a default", () => {
  const a = resolve(makeHistory([90, 95, 100]));

  assert.deepEqual(a.pctFinancingWithDebt, { value: 0.7, source: "default" });
  assert.deepEqual(a.ltLoanYears, { value: 10, source: "default" });
  assert.equal(a.existingLtDebtYears.source, "default");
  approxEqual(a.existingLtDebtYears.value, 7);

  const tuned = resolve(makeHistory([90, 95, 100]), { defaults: { pctFinancingWithDebt: 0.5, ltLoanYears: 4 } });
  assert.deepEqual(tuned.pctFinancingWithDebt, { value: 0.5, source: "default" });
  assert.deepEqual(tuned.ltLoanYears, { value: 4, source: "default" });
});

test("a single-year window cannot derive growth", () => {
  assert.throws(
    () => resolve(makeHistory([90, 95, 100]), { inputYears: 1 }),
    (error: unknown) => error instanceof InsufficientHistoryError && error.required === 2 && error.available === 1
  );

  const a = resolve(makeHistory([90, 95, 100]), { inputYears: 1, overrides: { revenueGrowth: 0.02 } });
  assert.deepEqual(a.revenueGrowth.value, [0.02, 0.02]);
});
