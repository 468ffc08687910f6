// lib/forecast/full-forecast-builder.ts
// Forecaster: runs every component in a fixed order, one period at a time

import { Decimal } from '@/lib/math';
import { resolveAssumptions } from './assumption-resolver';
import { runBacktest } from './backtest';
import { checkBalance, effectiveTolerance } from './balance-check';
import { assembleBalanceSheet, carriedFromOpening, type CarriedBalances } from './balance-sheet';
import { buildPreFinancingBudget, finalizeCashBudget, verifyCashTieOut } from './cash-budget';
import { forecastCOGS, forecastSGA } from './cost-forecast';
import { calculateInterest, openDebtPosition, scheduleDebt, verifyDebtRollForward } from './debt-schedule';
import type { ForecastError } from './errors';
import { buildOpeningBalances, selectHistoryWindow } from './historical';
import { projectIncomeStatement } from './income-statement';
import { buildPPESchedule, verifyPPERollForward } from './ppe-schedule';
import { forecastRevenue } from './revenue-forecast';
import type {
  BalanceCheckResult,
  BalanceSheetPeriod,
  CashBudgetPeriod,
  DebtScheduleState,
  ForecastContext,
  ForecastRun,
  IncomeStatementPeriod,
  MinimumCashPolicy,
  OpeningBalances,
} from './types';
import { buildWorkingCapitalSchedule } from './working-capital';

function minimumCashFor(policy: MinimumCashPolicy, revenue: Decimal): Decimal {
  return policy.kind === 'absolute' ? new Decimal(policy.amount) : revenue.times(policy.pct);
}

function checkOpeningBalance(opening: OpeningBalances): { totalAssets: Decimal; residual: Decimal } {
  const assets = opening.cash
    .plus(opening.accountsReceivable)
    .plus(opening.inventory)
    .plus(opening.otherCurrentAssets)
    .plus(opening.netPPE)
    .plus(opening.otherNonCurrentAssets);
  const liabilities = opening.accountsPayable
    .plus(opening.shortTermDebt)
    .plus(opening.otherCurrentLiabilities)
    .plus(opening.longTermDebt)
    .plus(opening.otherNonCurrentLiabilities);
  const equity = opening.retainedEarnings.plus(opening.otherEquity).plus(opening.minorityInterest);
  return { totalAssets: assets, residual: assets.minus(liabilities).minus(equity) };
}

/**
 * Run a full forecast. Synchronous; all state lives in this call.
 * Throws InsufficientHistoryError / MissingDataError before any period is projected.
 */
export function runForecast(context: ForecastContext): ForecastRun {
  const startTime = Date.now();
  const { historical, config } = context;

  console.log('[Forecaster] ═══════════════════════════════════════════════════');
  console.log(`[Forecaster] Company: ${historical.companyName}`);
  console.log(`[Forecaster] ${config.inputYears} input years, ${config.forecastYears} forecast years`);
  console.log('[Forecaster] ═══════════════════════════════════════════════════');

  // ============================================================================
  // Step 1: History & Assumptions
  // ============================================================================
  console.log('\n[Forecaster] Step 1/6: History & Assumptions');

  const history = selectHistoryWindow(historical, config);
  const assumptions = resolveAssumptions(history, config);
  const opening = buildOpeningBalances(history.base);
  const baseYear = history.baseYear;

  const openingCheck = checkOpeningBalance(opening);
  if (openingCheck.residual.abs().gt(effectiveTolerance(openingCheck.totalAssets, config.balanceTolerance))) {
    console.warn(
      `[Forecaster] ⚠️  Base year ${baseYear} balance sheet is off by ${openingCheck.residual.toFixed(2)}; ` +
        'forecast periods will carry it'
    );
  }

  const years: number[] = [];
  for (let i = 1; i <= config.forecastYears; i++) {
    years.push(baseYear + i);
  }
  console.log(`[Forecaster] Forecast years: [${years.join(', ')}]`);

  // ============================================================================
  // Step 2: Revenue & Costs
  // ============================================================================
  console.log('\n[Forecaster] Step 2/6: Revenue & Costs');

  const revenue = forecastRevenue({ baseRevenue: opening.revenue, years, growth: assumptions.revenueGrowth.value });
  const cogs = forecastCOGS({ revenue, percentOfRevenue: assumptions.cogsPctRevenue.value });
  const sga = forecastSGA({ revenue, percentOfRevenue: assumptions.sgaPctRevenue.value });

  // ============================================================================
  // Step 3: PP&E & Working Capital (independent of financing)
  // ============================================================================
  console.log('\n[Forecaster] Step 3/6: PP&E & Working Capital Schedules');

  const ppeSchedule = buildPPESchedule({
    years,
    revenue,
    capexPctRevenue: assumptions.capexPctRevenue.value,
    depreciationRate: assumptions.depreciationRate.value,
    opening: { grossPPE: opening.grossPPE, accumDep: opening.accumulatedDepreciation },
  });

  const workingCapitalSchedule = buildWorkingCapitalSchedule({
    years,
    revenue,
    cogs,
    days: {
      dso: assumptions.daysSalesOutstanding.value,
      dio: assumptions.daysInventoryOutstanding.value,
      dpo: assumptions.daysPayableOutstanding.value,
    },
    opening: {
      accountsReceivable: opening.accountsReceivable,
      inventory: opening.inventory,
      accountsPayable: opening.accountsPayable,
    },
  });

  // ============================================================================
  // Step 4: Period loop (IS -> pre-financing cash -> debt -> cash -> BS -> check)
  // ============================================================================
  console.log('\n[Forecaster] Step 4/6: Statements by period');

  const costOfDebt = assumptions.costOfDebt.value;
  const tolerance = new Decimal(config.balanceTolerance.absolute);
  const shortTermCapacity =
    config.shortTermDebtCapacity === undefined ? null : new Decimal(config.shortTermDebtCapacity);

  const incomeStatements: IncomeStatementPeriod[] = [];
  const cashBudgets: CashBudgetPeriod[] = [];
  const debtSchedules: DebtScheduleState[] = [];
  const balanceSheets: BalanceSheetPeriod[] = [];
  const balanceChecks: BalanceCheckResult[] = [];
  const warnings: ForecastError[] = [];

  let position = openDebtPosition({
    baseYear,
    shortTermDebt: opening.shortTermDebt,
    longTermDebt: opening.longTermDebt,
    existingLtDebtYears: assumptions.existingLtDebtYears.value,
  });
  let beginningCash = opening.cash;
  let carried: CarriedBalances = carriedFromOpening(opening);

  years.forEach((year, i) => {
    const rev = revenue.get(year);
    const cogsVal = cogs.get(year);
    const sgaVal = sga.get(year);
    if (rev === undefined || cogsVal === undefined || sgaVal === undefined) {
      throw new Error(`[Forecaster] Revenue or cost lines missing for FY${year}`);
    }

    // Interest from balances entering the period
    const interest = calculateInterest(position, costOfDebt);
    const interestIncome = Decimal.max(beginningCash, 0).times(assumptions.returnOnCash.value);

    const incomeStatement = projectIncomeStatement({
      year,
      revenue: rev,
      cogs: cogsVal,
      sga: sgaVal,
      depreciation: ppeSchedule.depExpense[i],
      interestExpense: interest.total,
      interestIncome,
      taxRate: assumptions.taxRate.value,
      payoutRatio: assumptions.payoutRatio.value,
      repurchasePctNetIncome: assumptions.repurchasePctNetIncome.value,
    });

    const changeInNwc = workingCapitalSchedule.changeInNwc[i];
    const capex = ppeSchedule.capex[i];

    const pre = buildPreFinancingBudget({
      year,
      beginningCash,
      incomeStatement,
      changeInNwc,
      capex,
      minimumCash: minimumCashFor(assumptions.minimumCash.value, rev),
    });

    const debt = scheduleDebt({
      year,
      opening: position,
      preFinancingCash: pre.preFinancingCash,
      minimumCash: pre.minimumCash,
      costOfDebt,
      pctFinancingWithDebt: assumptions.pctFinancingWithDebt.value,
      ltLoanYears: assumptions.ltLoanYears.value,
      shortTermCapacity,
      tolerance,
    });
    warnings.push(...debt.warnings);

    const cashBudget = finalizeCashBudget({ pre, debt: debt.state, incomeStatement, changeInNwc, capex });

    const balanceSheet = assembleBalanceSheet({
      year,
      prior: carried,
      cashBudget,
      incomeStatement,
      debt: debt.state,
      workingCapital: {
        accountsReceivable: workingCapitalSchedule.accountsReceivable[i],
        inventory: workingCapitalSchedule.inventory[i],
        accountsPayable: workingCapitalSchedule.accountsPayable[i],
      },
      ppe: {
        grossPPE: ppeSchedule.endingGross[i],
        accumulatedDepreciation: ppeSchedule.endingAccumDep[i],
        netPPE: ppeSchedule.netPPE[i],
      },
    });

    const check = checkBalance(balanceSheet, config.balanceTolerance);
    if (check.failure) {
      warnings.push(check.failure);
    }

    // Publish the period only once all statements exist
    incomeStatements.push(Object.freeze(incomeStatement));
    cashBudgets.push(Object.freeze(cashBudget));
    debtSchedules.push(Object.freeze(debt.state));
    balanceSheets.push(Object.freeze(balanceSheet));
    balanceChecks.push(Object.freeze(check.result));

    console.log(
      `[Forecaster] FY${year}: Revenue ${rev.toFixed(0)}, NI ${incomeStatement.netIncome.toFixed(0)}, ` +
        `Cash ${cashBudget.endingCash.toFixed(0)}, Debt ${debt.state.totalDebt.toFixed(0)}, ` +
        `Residual ${check.result.residual.toFixed(2)}`
    );

    position = debt.closing;
    beginningCash = cashBudget.endingCash;
    carried = balanceSheet;
  });

  // ============================================================================
  // Step 5: Backtest
  // ============================================================================
  console.log('\n[Forecaster] Step 5/6: Backtest');

  const backtest = runBacktest({ baseYear, actuals: history.actuals, incomeStatements, balanceSheets });
  if (!backtest) {
    console.log('[Forecaster] Base year is the latest reported year; no backtest');
  }

  // ============================================================================
  // Step 6: Checks
  // ============================================================================
  console.log('\n[Forecaster] Step 6/6: Model Checks');

  const ppeRollForward = verifyPPERollForward(ppeSchedule, tolerance);
  const debtRollForward = verifyDebtRollForward(debtSchedules, tolerance);
  const cashTieOut = verifyCashTieOut(cashBudgets, opening.cash, tolerance);
  const balanced = balanceChecks.every((c) => c.passed);

  console.log(`[Forecaster] ✅ PP&E Check: ${ppeRollForward.passed ? 'PASS' : 'FAIL'} (error: ${ppeRollForward.error.toFixed(4)})`);
  console.log(`[Forecaster] ✅ Debt Check: ${debtRollForward.passed ? 'PASS' : 'FAIL'} (error: ${debtRollForward.error.toFixed(4)})`);
  console.log(`[Forecaster] ✅ Cash Tie-out: ${cashTieOut.passed ? 'PASS' : 'FAIL'} (error: ${cashTieOut.error.toFixed(4)})`);
  console.log(`[Forecaster] ✅ Balance Check: ${balanced ? 'PASS' : 'FAIL'}`);
  if (warnings.length > 0) {
    console.warn(`[Forecaster] ⚠️  ${warnings.length} warning(s) recorded`);
  }

  const buildDurationMs = Date.now() - startTime;

  console.log('[Forecaster] ═══════════════════════════════════════════════════');
  console.log(`[Forecaster] ✅ Forecast Complete (${buildDurationMs}ms)`);
  console.log('[Forecaster] ═══════════════════════════════════════════════════');

  return {
    companyName: historical.companyName,
    baseYear,
    years,
    assumptions,
    opening,
    incomeStatements,
    ppeSchedule,
    workingCapitalSchedule,
    cashBudgets,
    debtSchedules,
    balanceSheets,
    balanceChecks,
    backtest,
    checks: { ppeRollForward, debtRollForward, cashTieOut },
    warnings,
    buildDurationMs,
  };
}
