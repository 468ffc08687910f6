// lib/forecast/backtest.ts
// Backtest Comparator: forecast vs. later actuals when the base year is historical

import { Decimal } from '@/lib/math';
import type {
  BacktestLine,
  BacktestResult,
  BalanceSheetLine,
  BalanceSheetPeriod,
  HistoricalYear,
  IncomeStatementLine,
  IncomeStatementPeriod,
} from './types';

type ComparableIncomeLine = Exclude<keyof IncomeStatementPeriod, 'year'>;
type ComparableBalanceLine = Exclude<keyof BalanceSheetPeriod, 'year'>;

// forecast line -> reported line
export const INCOME_STATEMENT_COMPARISONS: ReadonlyArray<[ComparableIncomeLine, IncomeStatementLine]> = [
  ['revenue', 'revenue'],
  ['cogs', 'cogs'],
  ['sga', 'sga'],
  ['depreciation', 'depreciation'],
  ['interestExpense', 'interestExpense'],
  ['pretaxIncome', 'pretaxIncome'],
  ['incomeTax', 'taxProvision'],
  ['netIncome', 'netIncome'],
];

export const BALANCE_SHEET_COMPARISONS: ReadonlyArray<[ComparableBalanceLine, BalanceSheetLine]> = [
  ['cash', 'cash'],
  ['accountsReceivable', 'accountsReceivable'],
  ['inventory', 'inventory'],
  ['netPPE', 'netPPE'],
  ['totalAssets', 'totalAssets'],
  ['accountsPayable', 'accountsPayable'],
  ['shortTermDebt', 'shortTermDebt'],
  ['longTermDebt', 'longTermDebt'],
  ['totalLiabilities', 'totalLiabilities'],
  ['totalEquity', 'totalEquity'],
];

/**
 * variance = forecast - actual; variancePct = variance / actual × 100 (null when actual is 0)
 */
export function compareLine(forecast: Decimal, actual: Decimal): Pick<BacktestLine, 'variance' | 'variancePct'> {
  const variance = forecast.minus(actual);
  const variancePct = actual.isZero() ? null : variance.div(actual).times(100);
  return { variance, variancePct };
}

/**
 * Compare every forecast year that has a reported actual. Returns null when there is nothing to compare.
 */
export function runBacktest(params: {
  baseYear: number;
  actuals: readonly HistoricalYear[];
  incomeStatements: readonly IncomeStatementPeriod[];
  balanceSheets: readonly BalanceSheetPeriod[];
}): BacktestResult | null {
  const { baseYear, actuals, incomeStatements, balanceSheets } = params;

  if (actuals.length === 0) {
    return null;
  }

  const actualByYear = new Map(actuals.map((a) => [a.year, a]));
  const lines: BacktestLine[] = [];
  const years: number[] = [];

  for (const is of incomeStatements) {
    const actual = actualByYear.get(is.year);
    if (!actual) continue;
    years.push(is.year);

    for (const [forecastLine, reportedLine] of INCOME_STATEMENT_COMPARISONS) {
      const reported = actual.incomeStatement[reportedLine];
      if (reported === undefined) continue;
      const forecast = is[forecastLine];
      const actualValue = new Decimal(reported);
      lines.push({
        year: is.year,
        statement: 'incomeStatement',
        line: forecastLine,
        forecast,
        actual: actualValue,
        ...compareLine(forecast, actualValue),
      });
    }
  }

  for (const bs of balanceSheets) {
    const actual = actualByYear.get(bs.year);
    if (!actual) continue;

    for (const [forecastLine, reportedLine] of BALANCE_SHEET_COMPARISONS) {
      const reported = actual.balanceSheet[reportedLine];
      if (reported === undefined) continue;
      const forecast = bs[forecastLine];
      const actualValue = new Decimal(reported);
      lines.push({
        year: bs.year,
        statement: 'balanceSheet',
        line: forecastLine,
        forecast,
        actual: actualValue,
        ...compareLine(forecast, actualValue),
      });
    }
  }

  if (years.length === 0) {
    console.log(`[Backtest] No actuals overlap the forecast years after ${baseYear}`);
    return null;
  }

  console.log(`[Backtest] Base ${baseYear}: ${lines.length} line items compared across [${years.join(', ')}]`);

  return { baseYear, years, lines };
}

/**
 * Mean absolute percentage error for one line across the compared years
 */
export function meanAbsolutePctError(result: BacktestResult, line: string): number | null {
  const pcts = result.lines.flatMap((l) =>
    l.line === line && l.variancePct !== null ? [l.variancePct.abs().toNumber()] : []
  );
  if (pcts.length === 0) return null;
  return pcts.reduce((sum, p) => sum + p, 0) / pcts.length;
}
