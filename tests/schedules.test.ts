import test from "node:test";
import assert from "node:assert/strict";
import { Decimal } from "../lib/math";
import { calculateCAGR, forecastRevenue } from "../lib/forecast/revenue-forecast";
import { calculateGrossMargin, forecastCOGS, forecastSGA } from "../lib/forecast/cost-forecast";
import { buildPPESchedule, verifyPPERollForward } from "../lib/forecast/ppe-schedule";
import { buildWorkingCapitalSchedule } from "../lib/forecast/working-capital";
import { calculateEBITDA, projectIncomeStatement } from "../lib/forecast/income-statement";
import { approxEqual } from "./helpers";

const d = (value: Decimal.Value) => new Decimal(value);

test("forecastRevenue compounds the growth path", () => {
  const revenue = forecastRevenue({ baseRevenue: d(100), years: [2024, 2025], growth: [0.1, 0.05] });

  assert.ok(revenue.get(2024)?.eq(110));
  assert.ok(revenue.get(2025)?.eq(115.5));
  assert.throws(() => forecastRevenue({ baseRevenue: d(100), years: [2024, 2025], growth: [0.1] }), /Growth path/);
});

test("cost lines scale with revenue", () => {
  const revenue = new Map([
    [2024, d(110)],
    [2025, d(115.5)],
  ]);
  const cogs = forecastCOGS({ revenue, percentOfRevenue: 0.6 });
  const sga = forecastSGA({ revenue, percentOfRevenue: 0.2 });

  assert.ok(cogs.get(2024)?.eq(66));
  assert.ok(cogs.get(2025)?.eq(69.3));
  assert.ok(sga.get(2025)?.eq(23.1));
  assert.equal(calculateGrossMargin(d(110), d(66)), 0.4);
  assert.equal(calculateGrossMargin(d(0), d(0)), 0);
});

test("calculateCAGR", () => {
  approxEqual(calculateCAGR(d(100), d(121), 2), 0.1);
  assert.equal(calculateCAGR(d(0), d(121), 2), 0);
});

test("PP&E depreciates beginning net PP&E and rolls forward", () => {
  const schedule = buildPPESchedule({
    years: [2024, 2025],
    revenue: new Map([
      [2024, d(110)],
      [2025, d(120)],
    ]),
    capexPctRevenue: 0.1,
    depreciationRate: 0.1,
    opening: { grossPPE: d(150), accumDep: d(50) },
  });

  assert.ok(schedule.beginningNet[0].eq(100));
  assert.ok(schedule.capex[0].eq(11));
  assert.ok(schedule.depExpense[0].eq(10));
  assert.ok(schedule.endingGross[0].eq(161));
  assert.ok(schedule.endingAccumDep[0].eq(60));
  assert.ok(schedule.netPPE[0].eq(101));

  assert.ok(schedule.beginningNet[1].eq(101));
  assert.ok(schedule.capex[1].eq(12));
  assert.ok(schedule.depExpense[1].eq(10.1));
  assert.ok(schedule.netPPE[1].eq(102.9));

  assert.equal(verifyPPERollForward(schedule).passed, true);
});

test("verifyPPERollForward flags a broken schedule", () => {
  const schedule = buildPPESchedule({
    years: [2024],
    revenue: new Map([[2024, d(100)]]),
    capexPctRevenue: 0.1,
    depreciationRate: 0.1,
    opening: { grossPPE: d(100), accumDep: d(0) },
  });
  schedule.netPPE[0] = schedule.netPPE[0].plus(1);

  const result = verifyPPERollForward(schedule);
  assert.equal(result.passed, false);
  assert.ok(result.error.eq(1));
});

test("working capital follows the day-count drivers", () => {
  const schedule = buildWorkingCapitalSchedule({
    years: [2024],
    revenue: new Map([[2024, d(365)]]),
    cogs: new Map([[2024, d(182.5)]]),
    days: { dso: 36.5, dio: 73, dpo: 36.5 },
    opening: { accountsReceivable: d(30), inventory: d(30), accountsPayable: d(20) },
  });

  assert.ok(schedule.accountsReceivable[0].eq(36.5));
  assert.ok(schedule.inventory[0].eq(36.5));
  assert.ok(schedule.accountsPayable[0].eq(18.25));
  assert.ok(schedule.nwc[0].eq(54.75));
  assert.ok(schedule.changeInNwc[0].eq(14.75));
});

test("income statement runs from revenue to payouts", () => {
  const is = projectIncomeStatement({
    year: 2024,
    revenue: d(200),
    cogs: d(100),
    sga: d(40),
    depreciation: d(10),
    interestExpense: d(5),
    interestIncome: d(5),
    taxRate: 0.2,
    payoutRatio: 0.3,
    repurchasePctNetIncome: 0.075,
  });

  assert.ok(is.grossProfit.eq(100));
  assert.ok(is.operatingIncome.eq(50));
  assert.ok(is.pretaxIncome.eq(50));
  assert.ok(is.incomeTax.eq(10));
  assert.ok(is.netIncome.eq(40));
  assert.ok(is.dividends.eq(12));
  assert.ok(is.repurchases.eq(3));
  assert.ok(calculateEBITDA(is).eq(60));
});

test("a loss pays no tax and no dividends", () => {
  const is = projectIncomeStatement({
    year: 2024,
    revenue: d(100),
    cogs: d(80),
    sga: d(30),
    depreciation: d(10),
    interestExpense: d(5),
    interestIncome: d(0),
    taxRate: 0.25,
    payoutRatio: 0.5,
    repurchasePctNetIncome: 0.1,
  });

  assert.ok(is.pretaxIncome.eq(-25));
  assert.ok(is.incomeTax.isZero());
  assert.ok(is.netIncome.eq(-25));
  assert.ok(is.dividends.isZero());
  assert.ok(is.repurchases.isZero());
});
