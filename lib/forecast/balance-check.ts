// lib/forecast/balance-check.ts
// Balance Checker: Assets - (Liabilities + Equity + Minority Interest)

import { Decimal, FinMath } from '@/lib/math';
import { BalanceCheckFailure } from './errors';
import type { BalanceCheckResult, BalanceSheetPeriod } from './types';

export interface BalanceTolerance {
  absolute: number;
  relative: number;
}

/**
 * max(absolute, relative × |total assets|)
 */
export function effectiveTolerance(totalAssets: Decimal, tolerance: BalanceTolerance): Decimal {
  return Decimal.max(tolerance.absolute, totalAssets.abs().times(tolerance.relative));
}

export function checkBalance(
  sheet: BalanceSheetPeriod,
  tolerance: BalanceTolerance
): { result: BalanceCheckResult; failure: BalanceCheckFailure | null } {
  const liabilitiesAndEquity = sheet.totalLiabilities.plus(sheet.minorityInterest);
  const residual = FinMath.residual(sheet.totalAssets, liabilitiesAndEquity, sheet.totalEquity);
  const limit = effectiveTolerance(sheet.totalAssets, tolerance);
  const passed = FinMath.isBalanced(sheet.totalAssets, liabilitiesAndEquity, sheet.totalEquity, limit);

  const result: BalanceCheckResult = {
    year: sheet.year,
    totalAssets: sheet.totalAssets,
    totalLiabilitiesAndEquity: sheet.totalLiabilitiesAndEquity,
    residual,
    tolerance: limit,
    passed,
  };

  if (passed) {
    return { result, failure: null };
  }

  const failure = new BalanceCheckFailure(sheet.year, residual.toFixed(2), limit.toString());
  console.error(`[BalanceCheck] ❌ ${failure.message}`);
  return { result, failure };
}
