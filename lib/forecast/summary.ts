// lib/forecast/summary.ts
// Plain-number view of a forecast run (job results, terminal output)

import { ASSUMPTION_KEYS } from './assumption-resolver';
import { meanAbsolutePctError } from './backtest';
import { calculateGrossMargin } from './cost-forecast';
import { calculateDSCR, calculateNetDebt } from './debt-schedule';
import { calculateEBITDA } from './income-statement';
import { calculateCAGR } from './revenue-forecast';
import type { AssumptionKey, AssumptionSource, ForecastRun, MinimumCashPolicy } from './types';

export interface ForecastPeriodSummary {
  year: number;
  revenue: number;
  grossMargin: number;
  ebitda: number;
  netIncome: number;
  endingCash: number;
  minimumCash: number;
  shortTermDebt: number;
  longTermDebt: number;
  netDebt: number;
  dscr: number | null;
  totalAssets: number;
  residual: number;
  balanced: boolean;
}

export interface ForecastSummary {
  companyName: string;
  baseYear: number;
  years: number[];
  assumptions: Array<{
    key: AssumptionKey;
    value: number | number[] | MinimumCashPolicy;
    source: AssumptionSource;
  }>;
  periods: ForecastPeriodSummary[];
  revenueCagr: number;
  backtest: {
    years: number[];
    revenueMape: number | null;
    lines: Array<{
      year: number;
      statement: string;
      line: string;
      forecast: number;
      actual: number;
      variance: number;
      variancePct: number | null;
    }>;
  } | null;
  checks: {
    ppeRollForward: boolean;
    debtRollForward: boolean;
    cashTieOut: boolean;
    balanced: boolean;
  };
  warnings: Array<{ code: string; year: number | null; message: string }>;
}

export function summarizeForecast(run: ForecastRun): ForecastSummary {
  const periods = run.years.map((year, i): ForecastPeriodSummary => {
    const is = run.incomeStatements[i];
    const cb = run.cashBudgets[i];
    const debt = run.debtSchedules[i];
    const bs = run.balanceSheets[i];
    const check = run.balanceChecks[i];
    const ebitda = calculateEBITDA(is);

    return {
      year,
      revenue: is.revenue.toNumber(),
      grossMargin: calculateGrossMargin(is.revenue, is.cogs),
      ebitda: ebitda.toNumber(),
      netIncome: is.netIncome.toNumber(),
      endingCash: cb.endingCash.toNumber(),
      minimumCash: cb.minimumCash.toNumber(),
      shortTermDebt: bs.shortTermDebt.toNumber(),
      longTermDebt: bs.longTermDebt.toNumber(),
      netDebt: calculateNetDebt(debt.totalDebt, bs.cash).toNumber(),
      dscr: calculateDSCR({
        ebitda,
        capex: run.ppeSchedule.capex[i],
        taxes: is.incomeTax,
        interest: debt.totalInterest,
        principalRepayment: debt.longTerm.amortization.plus(debt.shortTerm.repayment),
      }),
      totalAssets: bs.totalAssets.toNumber(),
      residual: check.residual.toNumber(),
      balanced: check.passed,
    };
  });

  const lastRevenue = run.incomeStatements[run.incomeStatements.length - 1]?.revenue ?? run.opening.revenue;

  return {
    companyName: run.companyName,
    baseYear: run.baseYear,
    years: run.years,
    assumptions: ASSUMPTION_KEYS.map((key) => ({
      key,
      value: run.assumptions[key].value,
      source: run.assumptions[key].source,
    })),
    periods,
    revenueCagr: calculateCAGR(run.opening.revenue, lastRevenue, run.years.length),
    backtest: run.backtest
      ? {
          years: run.backtest.years,
          revenueMape: meanAbsolutePctError(run.backtest, 'revenue'),
          lines: run.backtest.lines.map((l) => ({
            year: l.year,
            statement: l.statement,
            line: l.line,
            forecast: l.forecast.toNumber(),
            actual: l.actual.toNumber(),
            variance: l.variance.toNumber(),
            variancePct: l.variancePct === null ? null : l.variancePct.toNumber(),
          })),
        }
      : null,
    checks: {
      ppeRollForward: run.checks.ppeRollForward.passed,
      debtRollForward: run.checks.debtRollForward.passed,
      cashTieOut: run.checks.cashTieOut.passed,
      balanced: run.balanceChecks.every((c) => c.passed),
    },
    warnings: run.warnings.map((w) => ({ code: w.code, year: w.year, message: w.message })),
  };
}
