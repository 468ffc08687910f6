import assert from "node:assert/strict";
import { parseCompanyConfig, type CompanyConfigInput } from "../lib/forecast/config";
import type { ForecastContext, HistoricalFinancials, HistoricalYear } from "../lib/forecast/types";

export const approxEqual = (actual: number, expected: number, tolerance = 1e-6) => {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `Expected ${actual} to be within ${tolerance} of ${expected}`
  );
};

/**
 * One reported year: cost lines scale with revenue, balance sheet fixed and balanced
 * (assets 250 = liabilities 150 + equity 100).
 */
export function makeYear(year: number, revenue: number): HistoricalYear {
  const cogs = revenue * 0.6;
  const sga = revenue * 0.1;
  const depreciation = 10;
  const interestExpense = 5;
  const pretaxIncome = revenue - cogs - sga - depreciation - interestExpense;
  const taxProvision = pretaxIncome * 0.25;
  const netIncome = pretaxIncome - taxProvision;

  return {
    year,
    incomeStatement: { revenue, cogs, sga, depreciation, interestExpense, pretaxIncome, taxProvision, netIncome },
    balanceSheet: {
      cash: 50,
      accountsReceivable: 20,
      inventory: 15,
      totalCurrentAssets: 100,
      grossPPE: 150,
      netPPE: 100,
      totalAssets: 250,
      accountsPayable: 10,
      shortTermDebt: 20,
      totalCurrentLiabilities: 50,
      longTermDebt: 80,
      totalLiabilities: 150,
      retainedEarnings: 60,
      totalEquity: 100,
    },
    cashFlow: { capitalExpenditure: -revenue * 0.05, dividendsPaid: -netIncome * 0.4 },
  };
}

export function makeHistory(revenues: number[], startYear = 2021): HistoricalFinancials {
  return {
    companyName: "Test Co",
    years: revenues.map((revenue, i) => makeYear(startYear + i, revenue)),
  };
}

export function makeContext(revenues: number[], config: CompanyConfigInput = {}): ForecastContext {
  return {
    historical: makeHistory(revenues),
    config: parseCompanyConfig({ forecastYears: 2, inputYears: 3, ...config }),
  };
}
