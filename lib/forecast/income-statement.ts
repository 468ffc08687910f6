// lib/forecast/income-statement.ts
// Income Statement Projector (revenue through net income, one period)

import { Decimal } from '@/lib/math';
import type { IncomeStatementPeriod } from './types';

/**
 * Project one period's income statement.
 * Every input is already known when this runs: interest comes from beginning balances,
 * depreciation from beginning net PP&E.
 */
export function projectIncomeStatement(params: {
  year: number;
  revenue: Decimal;
  cogs: Decimal;
  sga: Decimal;
  depreciation: Decimal;
  interestExpense: Decimal;
  interestIncome: Decimal;
  taxRate: number;
  payoutRatio: number;
  repurchasePctNetIncome: number;
}): IncomeStatementPeriod {
  const { year, revenue, cogs, sga, depreciation, interestExpense, interestIncome } = params;

  const grossProfit = revenue.minus(cogs);
  const operatingIncome = grossProfit.minus(sga).minus(depreciation);
  const pretaxIncome = operatingIncome.minus(interestExpense).plus(interestIncome);

  // No tax credit on losses
  const incomeTax = Decimal.max(pretaxIncome.times(params.taxRate), 0);
  const netIncome = pretaxIncome.minus(incomeTax);

  // Paid in the same year; nothing paid out of a loss
  const dividends = Decimal.max(netIncome.times(params.payoutRatio), 0);
  const repurchases = Decimal.max(netIncome.times(params.repurchasePctNetIncome), 0);

  return {
    year,
    revenue,
    cogs,
    grossProfit,
    sga,
    depreciation,
    operatingIncome,
    interestExpense,
    interestIncome,
    pretaxIncome,
    incomeTax,
    netIncome,
    dividends,
    repurchases,
  };
}

/**
 * EBITDA = operating income + depreciation
 */
export function calculateEBITDA(period: IncomeStatementPeriod): Decimal {
  return period.operatingIncome.plus(period.depreciation);
}
