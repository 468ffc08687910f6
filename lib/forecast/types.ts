// lib/forecast/types.ts
// Forecast Engine - Type Definitions

import type { Decimal } from '@/lib/math';
import type { CompanyConfig } from './config';
import type { ForecastError } from './errors';

// ============================================================================
// Historical Financials (input, read-only)
// ============================================================================

export const INCOME_STATEMENT_LINES = [
  'revenue',
  'cogs',
  'sga',
  'depreciation',
  'interestExpense',
  'interestIncome',
  'pretaxIncome',
  'taxProvision',
  'netIncome',
] as const;

export const BALANCE_SHEET_LINES = [
  'cash',
  'accountsReceivable',
  'inventory',
  'totalCurrentAssets',
  'grossPPE',
  'accumulatedDepreciation',
  'netPPE',
  'totalAssets',
  'accountsPayable',
  'shortTermDebt',
  'totalCurrentLiabilities',
  'longTermDebt',
  'totalLiabilities',
  'retainedEarnings',
  'totalEquity',
  'minorityInterest',
] as const;

// Sign-insensitive: outflows may be reported negative
export const CASH_FLOW_LINES = ['operatingCashFlow', 'capitalExpenditure', 'dividendsPaid', 'stockRepurchase'] as const;

export type IncomeStatementLine = (typeof INCOME_STATEMENT_LINES)[number];
export type BalanceSheetLine = (typeof BALANCE_SHEET_LINES)[number];
export type CashFlowLine = (typeof CASH_FLOW_LINES)[number];

export type StatementKind = 'incomeStatement' | 'balanceSheet' | 'cashFlow';

export interface HistoricalYear {
  year: number;
  incomeStatement: Partial<Record<IncomeStatementLine, number>>;
  balanceSheet: Partial<Record<BalanceSheetLine, number>>;
  cashFlow: Partial<Record<CashFlowLine, number>>;
}

export interface HistoricalFinancials {
  companyName: string;
  years: HistoricalYear[];
}

/**
 * Everything one forecast run reads. Passed explicitly; no shared registry.
 */
export interface ForecastContext {
  historical: HistoricalFinancials;
  config: CompanyConfig;
}

// ============================================================================
// Resolved Assumptions
// ============================================================================

export type AssumptionSource = 'overridden' | 'derived' | 'default';

export interface Assumption<T = number> {
  value: T;
  source: AssumptionSource;
}

export type MinimumCashPolicy =
  | { kind: 'absolute'; amount: number }
  | { kind: 'pctRevenue'; pct: number };

export interface ForecastAssumptions {
  revenueGrowth: Assumption<number[]>; // one rate per forecast year
  cogsPctRevenue: Assumption;
  sgaPctRevenue: Assumption;
  capexPctRevenue: Assumption;
  depreciationRate: Assumption; // on beginning net PP&E
  daysSalesOutstanding: Assumption;
  daysInventoryOutstanding: Assumption;
  daysPayableOutstanding: Assumption;
  taxRate: Assumption;
  payoutRatio: Assumption;
  repurchasePctNetIncome: Assumption;
  costOfDebt: Assumption;
  returnOnCash: Assumption;
  minimumCash: Assumption<MinimumCashPolicy>;
  pctFinancingWithDebt: Assumption;
  ltLoanYears: Assumption;
  existingLtDebtYears: Assumption;
}

export type AssumptionKey = keyof ForecastAssumptions;

// ============================================================================
// Opening Position (base-year balance sheet, "other" lines derived from totals)
// ============================================================================

export interface OpeningBalances {
  year: number;
  revenue: Decimal;
  cogs: Decimal;
  cash: Decimal;
  accountsReceivable: Decimal;
  inventory: Decimal;
  otherCurrentAssets: Decimal;
  grossPPE: Decimal;
  accumulatedDepreciation: Decimal;
  netPPE: Decimal;
  otherNonCurrentAssets: Decimal;
  accountsPayable: Decimal;
  shortTermDebt: Decimal;
  otherCurrentLiabilities: Decimal;
  longTermDebt: Decimal;
  otherNonCurrentLiabilities: Decimal;
  retainedEarnings: Decimal;
  otherEquity: Decimal;
  minorityInterest: Decimal;
}

// ============================================================================
// Schedules (array per forecast year, index-aligned with `years`)
// ============================================================================

export interface WorkingCapitalSchedule {
  years: number[];
  accountsReceivable: Decimal[];
  inventory: Decimal[];
  accountsPayable: Decimal[];
  nwc: Decimal[];
  changeInNwc: Decimal[];
}

export interface PPESchedule {
  years: number[];
  beginningGross: Decimal[];
  capex: Decimal[];
  endingGross: Decimal[];
  beginningAccumDep: Decimal[];
  depExpense: Decimal[];
  endingAccumDep: Decimal[];
  beginningNet: Decimal[];
  netPPE: Decimal[];
}

// ============================================================================
// Period Statements
// ============================================================================

export interface IncomeStatementPeriod {
  year: number;
  revenue: Decimal;
  cogs: Decimal;
  grossProfit: Decimal;
  sga: Decimal;
  depreciation: Decimal;
  operatingIncome: Decimal;
  interestExpense: Decimal;
  interestIncome: Decimal;
  pretaxIncome: Decimal;
  incomeTax: Decimal;
  netIncome: Decimal;
  dividends: Decimal;
  repurchases: Decimal;
}

export interface CashBudgetDetail {
  netIncome: Decimal;
  depreciation: Decimal;
  changeInNwc: Decimal;
  capex: Decimal;
  dividends: Decimal;
  repurchases: Decimal;
  newLongTermDebt: Decimal;
  newEquity: Decimal;
  longTermAmortization: Decimal;
  shortTermDraw: Decimal;
  shortTermRepayment: Decimal;
}

/**
 * Cash position before the financing decision
 */
export interface PreFinancingBudget {
  year: number;
  beginningCash: Decimal;
  operating: Decimal;
  investing: Decimal;
  external: Decimal;
  preFinancingCash: Decimal;
  minimumCash: Decimal;
}

/**
 * `external` here also carries new equity; `preFinancingCash` keeps the payouts-only figure
 */
export interface CashBudgetPeriod extends PreFinancingBudget {
  financing: Decimal;
  discretionary: Decimal;
  netChange: Decimal;
  endingCash: Decimal;
  detail: CashBudgetDetail;
}

export interface LoanTranche {
  id: string;
  originYear: number;
  principal: Decimal;
  termYears: number;
  annualPayment: Decimal;
  outstanding: Decimal;
}

/**
 * Debt balances entering a period
 */
export interface DebtPosition {
  shortTerm: Decimal;
  tranches: readonly LoanTranche[];
}

export interface DebtScheduleState {
  year: number;
  costOfDebt: number;
  shortTerm: {
    beginning: Decimal;
    draw: Decimal;
    repayment: Decimal;
    ending: Decimal;
    interest: Decimal;
  };
  longTerm: {
    beginning: Decimal;
    draw: Decimal;
    amortization: Decimal;
    ending: Decimal;
    interest: Decimal;
    tranches: readonly LoanTranche[];
  };
  newEquity: Decimal;
  totalDebt: Decimal;
  totalInterest: Decimal;
}

export interface BalanceSheetPeriod {
  year: number;
  cash: Decimal;
  accountsReceivable: Decimal;
  inventory: Decimal;
  otherCurrentAssets: Decimal;
  totalCurrentAssets: Decimal;
  grossPPE: Decimal;
  accumulatedDepreciation: Decimal;
  netPPE: Decimal;
  otherNonCurrentAssets: Decimal;
  totalAssets: Decimal;
  accountsPayable: Decimal;
  shortTermDebt: Decimal;
  otherCurrentLiabilities: Decimal;
  totalCurrentLiabilities: Decimal;
  longTermDebt: Decimal;
  otherNonCurrentLiabilities: Decimal;
  totalLiabilities: Decimal;
  retainedEarnings: Decimal;
  otherEquity: Decimal;
  totalEquity: Decimal;
  minorityInterest: Decimal;
  totalLiabilitiesAndEquity: Decimal;
}

export interface BalanceCheckResult {
  year: number;
  totalAssets: Decimal;
  totalLiabilitiesAndEquity: Decimal;
  residual: Decimal;
  tolerance: Decimal;
  passed: boolean;
}

// ============================================================================
// Backtest
// ============================================================================

export interface BacktestLine {
  year: number;
  statement: Exclude<StatementKind, 'cashFlow'>;
  line: string;
  forecast: Decimal;
  actual: Decimal;
  variance: Decimal; // forecast - actual
  variancePct: Decimal | null; // null when actual is zero
}

export interface BacktestResult {
  baseYear: number;
  years: number[];
  lines: BacktestLine[];
}

// ============================================================================
// Run Output
// ============================================================================

export interface CheckResult {
  passed: boolean;
  error: Decimal;
}

export interface ForecastRun {
  companyName: string;
  baseYear: number;
  years: number[];
  assumptions: ForecastAssumptions;
  opening: OpeningBalances;
  incomeStatements: IncomeStatementPeriod[];
  ppeSchedule: PPESchedule;
  workingCapitalSchedule: WorkingCapitalSchedule;
  cashBudgets: CashBudgetPeriod[];
  debtSchedules: DebtScheduleState[];
  balanceSheets: BalanceSheetPeriod[];
  balanceChecks: BalanceCheckResult[];
  backtest: BacktestResult | null;
  checks: {
    ppeRollForward: CheckResult;
    debtRollForward: CheckResult;
    cashTieOut: CheckResult;
  };
  warnings: ForecastError[];
  buildDurationMs: number;
}
