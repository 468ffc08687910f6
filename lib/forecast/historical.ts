// lib/forecast/historical.ts
// Historical window: base year selection, required-field validation, ratio helpers

import { Decimal, ZERO } from '@/lib/math';
import type { CompanyConfig } from './config';
import { InsufficientHistoryError, InvalidConfigError, MissingDataError } from './errors';
import type {
  BalanceSheetLine,
  CashFlowLine,
  HistoricalFinancials,
  HistoricalYear,
  IncomeStatementLine,
  OpeningBalances,
} from './types';

export const REQUIRED_INCOME_LINES: readonly IncomeStatementLine[] = [
  'revenue',
  'cogs',
  'sga',
  'depreciation',
  'interestExpense',
  'pretaxIncome',
  'taxProvision',
  'netIncome',
];

export const REQUIRED_BALANCE_LINES: readonly BalanceSheetLine[] = [
  'cash',
  'accountsReceivable',
  'inventory',
  'netPPE',
  'accountsPayable',
  'shortTermDebt',
  'longTermDebt',
];

// Opening debt position is read from these; negative balances are rejected
export const DEBT_LINES: readonly BalanceSheetLine[] = ['shortTermDebt', 'longTermDebt'];

export const REQUIRED_CASH_FLOW_LINES: readonly CashFlowLine[] = ['capitalExpenditure', 'dividendsPaid'];

// Opening balance sheet is built from these totals
export const REQUIRED_BASE_YEAR_LINES: readonly BalanceSheetLine[] = [
  'totalCurrentAssets',
  'totalAssets',
  'totalCurrentLiabilities',
  'totalLiabilities',
  'retainedEarnings',
  'totalEquity',
];

export interface HistoryWindow {
  companyName: string;
  baseYear: number;
  window: HistoricalYear[]; // ascending, ends at the base year
  base: HistoricalYear;
  actuals: HistoricalYear[]; // years after the base year (backtest)
}

/**
 * Select base year and the trailing `inputYears` window, validating required lines.
 * Throws before any projection happens.
 */
export function selectHistoryWindow(historical: HistoricalFinancials, config: CompanyConfig): HistoryWindow {
  const sorted = [...historical.years].sort((a, b) => a.year - b.year);

  if (sorted.length === 0) {
    throw new InsufficientHistoryError(`No historical years for ${historical.companyName}`, config.inputYears, 0);
  }

  const latest = sorted[sorted.length - 1];
  const baseYear = config.baseYear ?? latest.year;
  const baseIdx = sorted.findIndex((y) => y.year === baseYear);

  if (baseIdx < 0) {
    const available = sorted.map((y) => y.year).join(', ');
    console.error(`[History] Base year ${baseYear} not available (have: ${available})`);
    throw new MissingDataError('historical', 'year', baseYear);
  }

  const available = baseIdx + 1;
  if (available < config.inputYears) {
    throw new InsufficientHistoryError(
      `${historical.companyName}: ${config.inputYears} input years requested, ${available} available up to ${baseYear}`,
      config.inputYears,
      available
    );
  }

  const window = sorted.slice(available - config.inputYears, available);
  const base = sorted[baseIdx];

  for (const year of window) {
    requireLines(year, 'incomeStatement', year.incomeStatement, REQUIRED_INCOME_LINES);
    requireLines(year, 'balanceSheet', year.balanceSheet, REQUIRED_BALANCE_LINES);
    requireLines(year, 'cashFlow', year.cashFlow, REQUIRED_CASH_FLOW_LINES);
  }
  requireLines(base, 'balanceSheet', base.balanceSheet, REQUIRED_BASE_YEAR_LINES);

  const negativeDebt = window.flatMap((y) =>
    DEBT_LINES.filter((line) => lineValue(y.balanceSheet, line) < 0).map(
      (line) => `historical.${y.year}.balanceSheet.${line}: debt balance must not be negative`
    )
  );
  if (negativeDebt.length > 0) {
    throw new InvalidConfigError(negativeDebt);
  }

  console.log(
    `[History] ${historical.companyName}: base ${baseYear}, window [${window.map((y) => y.year).join(', ')}]`
  );

  return {
    companyName: historical.companyName,
    baseYear,
    window,
    base,
    actuals: sorted.slice(baseIdx + 1),
  };
}

function requireLines<K extends string>(
  year: HistoricalYear,
  statement: string,
  values: Partial<Record<K, number>>,
  lines: readonly K[]
): void {
  for (const line of lines) {
    const value = values[line];
    if (value === undefined || !Number.isFinite(value)) {
      throw new MissingDataError(statement, line, year.year);
    }
  }
}

/**
 * Read a line that was validated present (absent optional lines read as 0)
 */
export function lineValue<K extends string>(values: Partial<Record<K, number>>, line: K): number {
  return values[line] ?? 0;
}

/**
 * Mean of per-year ratios, skipping years with a zero denominator. null if none usable.
 */
export function ratioAverage(
  window: readonly HistoricalYear[],
  numerator: (y: HistoricalYear) => number,
  denominator: (y: HistoricalYear) => number,
  accept: (ratio: number, year: HistoricalYear) => boolean = () => true
): number | null {
  const ratios: number[] = [];
  for (const year of window) {
    const den = denominator(year);
    if (den === 0) continue;
    const ratio = numerator(year) / den;
    if (Number.isFinite(ratio) && accept(ratio, year)) {
      ratios.push(ratio);
    }
  }
  if (ratios.length === 0) return null;
  return ratios.reduce((sum, r) => sum + r, 0) / ratios.length;
}

/**
 * Mean of consecutive year-over-year changes, skipping zero prior values. null if none usable.
 */
export function averageGrowthRate(values: readonly number[]): number | null {
  const rates: number[] = [];
  for (let i = 1; i < values.length; i++) {
    const prev = values[i - 1];
    if (prev === 0) continue;
    rates.push((values[i] - prev) / Math.abs(prev));
  }
  if (rates.length === 0) return null;
  return rates.reduce((sum, r) => sum + r, 0) / rates.length;
}

/**
 * Base-year balance sheet with the lines the forecast carries.
 * Other* lines are whatever the reported totals hold beyond the modeled lines.
 */
export function buildOpeningBalances(base: HistoricalYear): OpeningBalances {
  const is = base.incomeStatement;
  const bs = base.balanceSheet;
  const d = (value: number) => new Decimal(value);

  const cash = d(lineValue(bs, 'cash'));
  const accountsReceivable = d(lineValue(bs, 'accountsReceivable'));
  const inventory = d(lineValue(bs, 'inventory'));
  const netPPE = d(lineValue(bs, 'netPPE'));
  const accountsPayable = d(lineValue(bs, 'accountsPayable'));
  const shortTermDebt = d(lineValue(bs, 'shortTermDebt'));
  const longTermDebt = d(lineValue(bs, 'longTermDebt'));
  const totalCurrentAssets = d(lineValue(bs, 'totalCurrentAssets'));
  const totalAssets = d(lineValue(bs, 'totalAssets'));
  const totalCurrentLiabilities = d(lineValue(bs, 'totalCurrentLiabilities'));
  const totalLiabilities = d(lineValue(bs, 'totalLiabilities'));
  const retainedEarnings = d(lineValue(bs, 'retainedEarnings'));
  const totalEquity = d(lineValue(bs, 'totalEquity'));

  // Gross / accumulated: reported gross when available, else net with no accumulated depreciation
  let grossPPE = netPPE;
  let accumulatedDepreciation = ZERO;
  if (bs.grossPPE !== undefined) {
    grossPPE = d(bs.grossPPE);
    accumulatedDepreciation = grossPPE.minus(netPPE);
  } else if (bs.accumulatedDepreciation !== undefined) {
    accumulatedDepreciation = d(Math.abs(bs.accumulatedDepreciation));
    grossPPE = netPPE.plus(accumulatedDepreciation);
  }

  return {
    year: base.year,
    revenue: d(lineValue(is, 'revenue')),
    cogs: d(lineValue(is, 'cogs')),
    cash,
    accountsReceivable,
    inventory,
    otherCurrentAssets: totalCurrentAssets.minus(cash).minus(accountsReceivable).minus(inventory),
    grossPPE,
    accumulatedDepreciation,
    netPPE,
    otherNonCurrentAssets: totalAssets.minus(totalCurrentAssets).minus(netPPE),
    accountsPayable,
    shortTermDebt,
    otherCurrentLiabilities: totalCurrentLiabilities.minus(accountsPayable).minus(shortTermDebt),
    longTermDebt,
    otherNonCurrentLiabilities: totalLiabilities.minus(totalCurrentLiabilities).minus(longTermDebt),
    retainedEarnings,
    otherEquity: totalEquity.minus(retainedEarnings),
    minorityInterest: d(lineValue(bs, 'minorityInterest')),
  };
}
