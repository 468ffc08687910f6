// lib/forecast/cash-budget.ts
// Cash Budget: pre-financing position, then final budget once the debt decision is made

import { Decimal } from '@/lib/math';
import type { CashBudgetPeriod, CheckResult, DebtScheduleState, IncomeStatementPeriod, PreFinancingBudget } from './types';

/**
 * Operating, investing and external flows, and the cash position before financing
 */
export function buildPreFinancingBudget(params: {
  year: number;
  beginningCash: Decimal;
  incomeStatement: IncomeStatementPeriod;
  changeInNwc: Decimal;
  capex: Decimal;
  minimumCash: Decimal;
}): PreFinancingBudget {
  const { year, beginningCash, incomeStatement, changeInNwc, capex, minimumCash } = params;

  // Operating = NI + D&A - ΔNWC
  const operating = incomeStatement.netIncome.plus(incomeStatement.depreciation).minus(changeInNwc);
  const investing = capex.negated();
  // Paid to shareholders
  const external = incomeStatement.dividends.plus(incomeStatement.repurchases).negated();

  const preFinancingCash = beginningCash.plus(operating).plus(investing).plus(external);

  return {
    year,
    beginningCash,
    operating,
    investing,
    external,
    preFinancingCash,
    minimumCash,
  };
}

/**
 * Close the budget with the debt schedule's decision.
 * ending = beginning + operating + investing + financing + external + discretionary
 */
export function finalizeCashBudget(params: {
  pre: PreFinancingBudget;
  debt: DebtScheduleState;
  incomeStatement: IncomeStatementPeriod;
  changeInNwc: Decimal;
  capex: Decimal;
}): CashBudgetPeriod {
  const { pre, debt, incomeStatement, changeInNwc, capex } = params;

  if (pre.year !== debt.year) {
    throw new Error(`[CashBudget] Debt schedule FY${debt.year} does not match budget FY${pre.year}`);
  }

  // Long-term draws net of scheduled amortization
  const financing = debt.longTerm.draw.minus(debt.longTerm.amortization);
  // Owner flows: payouts plus any share issuance
  const external = pre.external.plus(debt.newEquity);
  // Short-term facility
  const discretionary = debt.shortTerm.draw.minus(debt.shortTerm.repayment);

  const netChange = pre.operating.plus(pre.investing).plus(financing).plus(external).plus(discretionary);
  const endingCash = pre.beginningCash.plus(netChange);

  if (endingCash.lt(pre.minimumCash.minus(0.01))) {
    console.warn(
      `[CashBudget] ⚠️  FY${pre.year} ending cash ${endingCash.toFixed(0)} below minimum ${pre.minimumCash.toFixed(0)}`
    );
  }

  return {
    ...pre,
    external,
    financing,
    discretionary,
    netChange,
    endingCash,
    detail: {
      netIncome: incomeStatement.netIncome,
      depreciation: incomeStatement.depreciation,
      changeInNwc,
      capex,
      dividends: incomeStatement.dividends,
      repurchases: incomeStatement.repurchases,
      newLongTermDebt: debt.longTerm.draw,
      newEquity: debt.newEquity,
      longTermAmortization: debt.longTerm.amortization,
      shortTermDraw: debt.shortTerm.draw,
      shortTermRepayment: debt.shortTerm.repayment,
    },
  };
}

/**
 * Verify the cash identity and period-to-period continuity
 */
export function verifyCashTieOut(
  budgets: CashBudgetPeriod[],
  openingCash: Decimal,
  tolerance: Decimal.Value = 0.01
): CheckResult {
  let maxError = new Decimal(0);
  let expectedBeginning = openingCash;

  for (const budget of budgets) {
    const identity = budget.beginningCash
      .plus(budget.operating)
      .plus(budget.investing)
      .plus(budget.financing)
      .plus(budget.external)
      .plus(budget.discretionary);

    const identityError = budget.endingCash.minus(identity).abs();
    const continuityError = budget.beginningCash.minus(expectedBeginning).abs();

    maxError = Decimal.max(maxError, identityError, continuityError);
    expectedBeginning = budget.endingCash;
  }

  return { passed: maxError.lte(tolerance), error: maxError };
}
