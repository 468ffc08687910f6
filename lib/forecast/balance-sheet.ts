// lib/forecast/balance-sheet.ts
// Balance Sheet Assembler. Cash comes from the cash budget as-is; no line is a plug.

import type { Decimal } from '@/lib/math';
import type {
  BalanceSheetPeriod,
  CashBudgetPeriod,
  DebtScheduleState,
  IncomeStatementPeriod,
  OpeningBalances,
} from './types';

/**
 * The carried balances a period starts from (opening balance sheet, or the prior period)
 */
export type CarriedBalances = Pick<
  BalanceSheetPeriod,
  | 'otherCurrentAssets'
  | 'otherNonCurrentAssets'
  | 'otherCurrentLiabilities'
  | 'otherNonCurrentLiabilities'
  | 'retainedEarnings'
  | 'otherEquity'
  | 'minorityInterest'
>;

export function carriedFromOpening(opening: OpeningBalances): CarriedBalances {
  return {
    otherCurrentAssets: opening.otherCurrentAssets,
    otherNonCurrentAssets: opening.otherNonCurrentAssets,
    otherCurrentLiabilities: opening.otherCurrentLiabilities,
    otherNonCurrentLiabilities: opening.otherNonCurrentLiabilities,
    retainedEarnings: opening.retainedEarnings,
    otherEquity: opening.otherEquity,
    minorityInterest: opening.minorityInterest,
  };
}

/**
 * Assemble one period's balance sheet from the statements already computed for it
 */
export function assembleBalanceSheet(params: {
  year: number;
  prior: CarriedBalances;
  cashBudget: CashBudgetPeriod;
  incomeStatement: IncomeStatementPeriod;
  debt: DebtScheduleState;
  workingCapital: {
    accountsReceivable: Decimal;
    inventory: Decimal;
    accountsPayable: Decimal;
  };
  ppe: {
    grossPPE: Decimal;
    accumulatedDepreciation: Decimal;
    netPPE: Decimal;
  };
}): BalanceSheetPeriod {
  const { year, prior, cashBudget, incomeStatement, debt, workingCapital, ppe } = params;

  // ========================================================================
  // Assets
  // ========================================================================
  const cash = cashBudget.endingCash;
  const totalCurrentAssets = cash
    .plus(workingCapital.accountsReceivable)
    .plus(workingCapital.inventory)
    .plus(prior.otherCurrentAssets);
  const totalAssets = totalCurrentAssets.plus(ppe.netPPE).plus(prior.otherNonCurrentAssets);

  // ========================================================================
  // Liabilities
  // ========================================================================
  const shortTermDebt = debt.shortTerm.ending;
  const longTermDebt = debt.longTerm.ending;
  const totalCurrentLiabilities = workingCapital.accountsPayable.plus(shortTermDebt).plus(prior.otherCurrentLiabilities);
  const totalLiabilities = totalCurrentLiabilities.plus(longTermDebt).plus(prior.otherNonCurrentLiabilities);

  // ========================================================================
  // Equity roll-forward
  // ========================================================================
  const retainedEarnings = prior.retainedEarnings.plus(incomeStatement.netIncome).minus(incomeStatement.dividends);
  const otherEquity = prior.otherEquity.plus(debt.newEquity).minus(incomeStatement.repurchases);
  const totalEquity = retainedEarnings.plus(otherEquity);

  const totalLiabilitiesAndEquity = totalLiabilities.plus(totalEquity).plus(prior.minorityInterest);

  return {
    year,
    cash,
    accountsReceivable: workingCapital.accountsReceivable,
    inventory: workingCapital.inventory,
    otherCurrentAssets: prior.otherCurrentAssets,
    totalCurrentAssets,
    grossPPE: ppe.grossPPE,
    accumulatedDepreciation: ppe.accumulatedDepreciation,
    netPPE: ppe.netPPE,
    otherNonCurrentAssets: prior.otherNonCurrentAssets,
    totalAssets,
    accountsPayable: workingCapital.accountsPayable,
    shortTermDebt,
    otherCurrentLiabilities: prior.otherCurrentLiabilities,
    totalCurrentLiabilities,
    longTermDebt,
    otherNonCurrentLiabilities: prior.otherNonCurrentLiabilities,
    totalLiabilities,
    retainedEarnings,
    otherEquity,
    totalEquity,
    minorityInterest: prior.minorityInterest,
    totalLiabilitiesAndEquity,
  };
}
