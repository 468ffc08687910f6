// lib/forecast/debt-schedule.ts
// Debt Schedule: interest on beginning balances, tranche amortization, discretionary financing

import { Decimal, ZERO, sumDecimals } from '@/lib/math';
import { NegativeDebtError } from './errors';
import type { CheckResult, DebtPosition, DebtScheduleState, LoanTranche } from './types';

/**
 * Opening position from the base-year balance sheet.
 * Existing long-term debt becomes one tranche amortizing over `existingLtDebtYears`.
 */
export function openDebtPosition(params: {
  baseYear: number;
  shortTermDebt: Decimal;
  longTermDebt: Decimal;
  existingLtDebtYears: number;
}): DebtPosition {
  const { baseYear, shortTermDebt, longTermDebt, existingLtDebtYears } = params;

  const tranches: LoanTranche[] = [];
  if (longTermDebt.gt(0)) {
    tranches.push(createTranche(`existing-${baseYear}`, baseYear, longTermDebt, existingLtDebtYears));
  }

  return { shortTerm: shortTermDebt, tranches };
}

function createTranche(id: string, originYear: number, principal: Decimal, termYears: number): LoanTranche {
  return {
    id,
    originYear,
    principal,
    termYears,
    annualPayment: principal.div(termYears),
    outstanding: principal,
  };
}

/**
 * Interest for a period from the balances entering it. Nothing decided during the period
 * can change this figure.
 */
export function calculateInterest(
  position: DebtPosition,
  costOfDebt: number
): { shortTerm: Decimal; longTerm: Decimal; total: Decimal } {
  const shortTerm = Decimal.max(position.shortTerm, 0).times(costOfDebt);
  const longTerm = sumDecimals(position.tranches.map((t) => t.outstanding)).times(costOfDebt);
  return { shortTerm, longTerm, total: shortTerm.plus(longTerm) };
}

/**
 * Scheduled principal for each outstanding tranche originated before `year`.
 * A payment within `tolerance` of the balance retires the tranche; a larger one is
 * clamped to the balance and recorded.
 */
export function amortizeTranches(params: {
  year: number;
  tranches: readonly LoanTranche[];
  tolerance: Decimal;
}): { tranches: LoanTranche[]; amortization: Decimal; warnings: NegativeDebtError[] } {
  const { year, tranches, tolerance } = params;

  const warnings: NegativeDebtError[] = [];
  let amortization = ZERO;

  const next = tranches.map((tranche): LoanTranche => {
    if (tranche.originYear >= year || tranche.outstanding.lte(0)) {
      return tranche;
    }

    let payment = tranche.annualPayment;
    if (payment.gt(tranche.outstanding.plus(tolerance))) {
      const warning = new NegativeDebtError({
        year,
        trancheId: tranche.id,
        scheduled: payment.toFixed(2),
        outstanding: tranche.outstanding.toFixed(2),
      });
      console.warn(`[DebtSchedule] ⚠️  ${warning.message}`);
      warnings.push(warning);
      payment = tranche.outstanding;
    } else if (payment.gte(tranche.outstanding.minus(tolerance))) {
      payment = tranche.outstanding;
    }

    amortization = amortization.plus(payment);
    return { ...tranche, outstanding: tranche.outstanding.minus(payment) };
  });

  return { tranches: next, amortization, warnings };
}

/**
 * Schedule one period's debt.
 *
 * Shortfall below minimum cash: short-term draw up to remaining capacity, then the
 * residual split between a new long-term tranche (`pctFinancingWithDebt`) and new equity.
 * Surplus: repays short-term debt, the rest stays in cash. Long-term debt is never prepaid.
 */
export function scheduleDebt(params: {
  year: number;
  opening: DebtPosition;
  preFinancingCash: Decimal;
  minimumCash: Decimal;
  costOfDebt: number;
  pctFinancingWithDebt: number;
  ltLoanYears: number;
  shortTermCapacity: Decimal | null; // null = unlimited
  tolerance: Decimal;
}): { state: DebtScheduleState; closing: DebtPosition; warnings: NegativeDebtError[] } {
  const { year, opening, preFinancingCash, minimumCash, costOfDebt } = params;

  // ========================================================================
  // Interest (beginning balances only)
  // ========================================================================
  const interest = calculateInterest(opening, costOfDebt);

  // ========================================================================
  // Scheduled long-term amortization
  // ========================================================================
  const amortized = amortizeTranches({ year, tranches: opening.tranches, tolerance: params.tolerance });
  const tranches = amortized.tranches;
  const available = preFinancingCash.minus(amortized.amortization);

  // ========================================================================
  // Discretionary financing
  // ========================================================================
  let shortTermDraw = ZERO;
  let shortTermRepayment = ZERO;
  let newLongTermDebt = ZERO;
  let newEquity = ZERO;

  if (available.lt(minimumCash)) {
    const shortfall = minimumCash.minus(available);
    const headroom =
      params.shortTermCapacity === null
        ? shortfall
        : Decimal.max(params.shortTermCapacity.minus(opening.shortTerm), 0);
    shortTermDraw = Decimal.min(shortfall, headroom);

    const residual = shortfall.minus(shortTermDraw);
    if (residual.gt(0)) {
      newLongTermDebt = residual.times(params.pctFinancingWithDebt);
      newEquity = residual.minus(newLongTermDebt);
      console.log(
        `[DebtSchedule] FY${year}: short-term capacity exhausted, ` +
          `${newLongTermDebt.toFixed(0)} long-term debt + ${newEquity.toFixed(0)} equity`
      );
      if (newLongTermDebt.gt(0)) {
        tranches.push(createTranche(`lt-${year}`, year, newLongTermDebt, params.ltLoanYears));
      }
    }
  } else if (available.gt(minimumCash)) {
    const surplus = available.minus(minimumCash);
    shortTermRepayment = Decimal.min(surplus, Decimal.max(opening.shortTerm, 0));
  }

  // ========================================================================
  // Balances
  // ========================================================================
  const shortTermEnding = opening.shortTerm.plus(shortTermDraw).minus(shortTermRepayment);
  const longTermBeginning = sumDecimals(opening.tranches.map((t) => t.outstanding));
  const longTermEnding = sumDecimals(tranches.map((t) => t.outstanding));
  const liveTranches = tranches.filter((t) => t.outstanding.gt(0));

  const state: DebtScheduleState = {
    year,
    costOfDebt,
    shortTerm: {
      beginning: opening.shortTerm,
      draw: shortTermDraw,
      repayment: shortTermRepayment,
      ending: shortTermEnding,
      interest: interest.shortTerm,
    },
    longTerm: {
      beginning: longTermBeginning,
      draw: newLongTermDebt,
      amortization: amortized.amortization,
      ending: longTermEnding,
      interest: interest.longTerm,
      tranches: liveTranches,
    },
    newEquity,
    totalDebt: shortTermEnding.plus(longTermEnding),
    totalInterest: interest.total,
  };

  return {
    state,
    closing: { shortTerm: shortTermEnding, tranches: liveTranches },
    warnings: amortized.warnings,
  };
}

/**
 * Verify Debt roll-forward consistency
 */
export function verifyDebtRollForward(schedule: DebtScheduleState[], tolerance: Decimal.Value = 0.01): CheckResult {
  let maxError = new Decimal(0);

  for (let i = 0; i < schedule.length; i++) {
    const { shortTerm, longTerm } = schedule[i];

    // Ending = Beginning + Draw - Repayment
    const stError = shortTerm.ending.minus(shortTerm.beginning.plus(shortTerm.draw).minus(shortTerm.repayment)).abs();
    const ltError = longTerm.ending.minus(longTerm.beginning.plus(longTerm.draw).minus(longTerm.amortization)).abs();

    // Tranches add up to the long-term balance
    const trancheError = sumDecimals(longTerm.tranches.map((t) => t.outstanding)).minus(longTerm.ending).abs();

    // Total Debt = ST + LT
    const totalError = schedule[i].totalDebt.minus(shortTerm.ending.plus(longTerm.ending)).abs();

    // Never negative
    const negativeError = Decimal.max(shortTerm.ending.negated(), longTerm.ending.negated(), 0);

    // Continuity
    const continuityError =
      i > 0
        ? shortTerm.beginning
            .minus(schedule[i - 1].shortTerm.ending)
            .abs()
            .plus(longTerm.beginning.minus(schedule[i - 1].longTerm.ending).abs())
        : new Decimal(0);

    maxError = Decimal.max(maxError, stError, ltError, trancheError, totalError, negativeError, continuityError);
  }

  return { passed: maxError.lte(tolerance), error: maxError };
}

/**
 * Calculate Debt Service Coverage Ratio (DSCR)
 * DSCR = (EBITDA - Capex - Taxes) / (Interest + Principal Repayment)
 */
export function calculateDSCR(params: {
  ebitda: Decimal;
  capex: Decimal;
  taxes: Decimal;
  interest: Decimal;
  principalRepayment: Decimal;
}): number | null {
  const { ebitda, capex, taxes, interest, principalRepayment } = params;

  const numerator = ebitda.minus(capex).minus(taxes);
  const denominator = interest.plus(principalRepayment);

  if (denominator.isZero()) return null; // no debt service

  return numerator.div(denominator).toNumber();
}

/**
 * Net Debt = Total Debt - Cash
 */
export function calculateNetDebt(totalDebt: Decimal, cash: Decimal): Decimal {
  return totalDebt.minus(cash);
}
