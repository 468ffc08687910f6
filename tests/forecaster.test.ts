import test from "node:test";
import assert from "node:assert/strict";
import { Decimal } from "../lib/math";
import { runForecast } from "../lib/forecast/full-forecast-builder";
import { checkBalance, effectiveTolerance } from "../lib/forecast/balance-check";
import {
  BalanceCheckFailure,
  InsufficientHistoryError,
  InvalidConfigError,
  MissingDataError,
  NegativeDebtError,
} from "../lib/forecast/errors";
import { summarizeForecast } from "../lib/forecast/summary";
import { approxEqual, makeContext } from "./helpers";

test("every forecast period balances and ties out", () => {
  const run = runForecast(makeContext([90, 95, 100], { forecastYears: 3 }));

  assert.equal(run.baseYear, 2023);
  assert.deepEqual(run.years, [2024, 2025, 2026]);
  assert.equal(run.incomeStatements.length, 3);
  assert.equal(run.balanceSheets.length, 3);

  for (const check of run.balanceChecks) {
    assert.equal(check.passed, true);
    assert.ok(check.residual.abs().lt(1e-9));
  }
  assert.equal(run.checks.ppeRollForward.passed, true);
  assert.equal(run.checks.debtRollForward.passed, true);
  assert.equal(run.checks.cashTieOut.passed, true);
  assert.equal(run.backtest, null);
});

test("balance sheet cash is the cash budget's ending cash", () => {
  const run = runForecast(makeContext([90, 95, 100]));

  run.balanceSheets.forEach((bs, i) => {
    assert.equal(bs.cash, run.cashBudgets[i].endingCash);
    assert.ok(bs.shortTermDebt.eq(run.debtSchedules[i].shortTerm.ending));
    assert.ok(bs.longTermDebt.eq(run.debtSchedules[i].longTerm.ending));
  });
  assert.ok(run.cashBudgets[1].beginningCash.eq(run.cashBudgets[0].endingCash));
});

test("interest comes from balances entering the period", () => {
  const low = runForecast(makeContext([90, 95, 100], { minimumCashThreshold: 0 }));
  const high = runForecast(makeContext([90, 95, 100], { minimumCashThreshold: 500 }));
  const rate = high.assumptions.costOfDebt.value;

  // Opening debt is 20 short-term + 80 long-term in both runs
  assert.ok(low.incomeStatements[0].interestExpense.eq(high.incomeStatements[0].interestExpense));
  approxEqual(high.incomeStatements[0].interestExpense.toNumber(), 100 * rate, 1e-9);

  approxEqual(high.cashBudgets[0].endingCash.toNumber(), 500, 1e-9);
  approxEqual(
    high.incomeStatements[1].interestExpense.toNumber(),
    high.debtSchedules[0].totalDebt.toNumber() * rate,
    1e-9
  );
  assert.ok(high.incomeStatements[1].interestExpense.gt(low.incomeStatements[1].interestExpense));
});

test("capacity-limited shortfalls split between long-term debt and equity", () => {
  const run = runForecast(
    makeContext([90, 95, 100], { minimumCashThreshold: 500, shortTermDebtCapacity: 20, pctFinancingWithDebt: 0.6 })
  );
  const first = run.debtSchedules[0];

  assert.ok(first.shortTerm.draw.isZero());
  assert.ok(first.longTerm.draw.gt(0));
  assert.ok(first.newEquity.gt(0));
  approxEqual(first.longTerm.draw.toNumber(), first.longTerm.draw.plus(first.newEquity).toNumber() * 0.6, 1e-9);
  assert.ok(first.longTerm.tranches.some((t) => t.id === "lt-2024"));
  assert.ok(run.balanceChecks.every((c) => c.passed));

  const budget = run.cashBudgets[0];
  assert.ok(budget.financing.eq(first.longTerm.draw.minus(first.longTerm.amortization)));
  assert.ok(budget.external.eq(budget.detail.newEquity.minus(budget.detail.dividends).minus(budget.detail.repurchases)));
  assert.ok(budget.external.gt(0));
  assert.equal(run.checks.cashTieOut.passed, true);
});

test("an oversized amortization on existing debt is recorded, and the run completes", () => {
  // Existing debt amortizes over 0.7 x 3 = 2.1 years, so the third payment overshoots
  const run = runForecast(makeContext([90, 95, 100], { forecastYears: 3, ltLoanYears: 3 }));
  const negative = run.warnings.filter((w) => w instanceof NegativeDebtError);

  assert.equal(negative.length, 1);
  assert.equal(negative[0].year, 2026);
  assert.equal(negative[0].code, "NEGATIVE_DEBT");
  assert.ok(run.debtSchedules[2].longTerm.ending.isZero());
  assert.ok(run.balanceChecks.every((c) => c.passed));
});

test("a base year missing from the data fails before any projection", () => {
  assert.throws(
    () => runForecast(makeContext([90, 95, 100], { baseYear: 2030 })),
    (error: unknown) => error instanceof MissingDataError && error.year === 2030
  );
});

test("a one-year window cannot derive growth, so the run aborts", () => {
  assert.throws(() => runForecast(makeContext([90, 95, 100], { inputYears: 1 })), InsufficientHistoryError);
});

test("negative historical debt is rejected before any projection", () => {
  const context = makeContext([90, 95, 100]);
  context.historical.years[2].balanceSheet.longTermDebt = -10;

  assert.throws(
    () => runForecast(context),
    (error: unknown) =>
      error instanceof InvalidConfigError &&
      error.issues.length === 1 &&
      error.issues[0] === "historical.2023.balanceSheet.longTermDebt: debt balance must not be negative"
  );
});

test("identical inputs give identical output", () => {
  const a = summarizeForecast(runForecast(makeContext([90, 95, 100], { forecastYears: 3 })));
  const b = summarizeForecast(runForecast(makeContext([90, 95, 100], { forecastYears: 3 })));

  assert.deepEqual(a, b);
  assert.equal(a.periods.length, 3);
  assert.equal(a.checks.balanced, true);
});

test("checkBalance records a failure outside tolerance", () => {
  const run = runForecast(makeContext([90, 95, 100]));
  const sheet = { ...run.balanceSheets[0], totalAssets: run.balanceSheets[0].totalAssets.plus(1) };

  const { result, failure } = checkBalance(sheet, { absolute: 0.01, relative: 1e-9 });
  assert.equal(result.passed, false);
  assert.ok(failure instanceof BalanceCheckFailure);
  assert.equal(failure.code, "BALANCE_CHECK_FAILURE");
  assert.equal(failure.residual, "1.00");
});

test("effectiveTolerance scales with total assets", () => {
  const tolerance = { absolute: 0.01, relative: 1e-9 };

  assert.ok(effectiveTolerance(new Decimal(1000), tolerance).eq(0.01));
  assert.ok(effectiveTolerance(new Decimal(1e9), tolerance).eq(1));
});
