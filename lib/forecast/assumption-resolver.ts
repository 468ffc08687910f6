// lib/forecast/assumption-resolver.ts
// Resolve every forecast assumption up front: override > historical ratio > default

import { FinMath } from '@/lib/math';
import type { CompanyConfig } from './config';
import { InsufficientHistoryError } from './errors';
import { averageGrowthRate, lineValue, ratioAverage, type HistoryWindow } from './historical';
import type { Assumption, AssumptionKey, ForecastAssumptions, HistoricalYear, MinimumCashPolicy } from './types';

const DAYS_PER_YEAR = 365;

const overridden = <T>(value: T): Assumption<T> => ({ value, source: 'overridden' });
const derived = <T>(value: T): Assumption<T> => ({ value, source: 'derived' });
const fallback = <T>(value: T): Assumption<T> => ({ value, source: 'default' });

/**
 * Pick override, else derived ratio (when history supports it), else default
 */
function pick(override: number | undefined, ratio: number | null, defaultValue: number): Assumption {
  if (override !== undefined) return overridden(override);
  if (ratio !== null) return derived(ratio);
  return fallback(defaultValue);
}

// Line accessors (absolute values for sign-insensitive cash flow lines)
const revenue = (y: HistoricalYear) => lineValue(y.incomeStatement, 'revenue');
const cogs = (y: HistoricalYear) => lineValue(y.incomeStatement, 'cogs');
const totalDebt = (y: HistoricalYear) =>
  lineValue(y.balanceSheet, 'shortTermDebt') + lineValue(y.balanceSheet, 'longTermDebt');

/**
 * Build the fully resolved assumption set for a run. Pure.
 */
export function resolveAssumptions(history: HistoryWindow, config: CompanyConfig): ForecastAssumptions {
  const { window } = history;
  const { overrides, defaults, bounds } = config;

  // --------------------------------------------------------------------------
  // Revenue growth (per forecast year)
  // --------------------------------------------------------------------------
  let revenueGrowth: Assumption<number[]>;
  if (overrides.revenueGrowth !== undefined) {
    revenueGrowth = overridden(expandGrowthPath(overrides.revenueGrowth, config.forecastYears));
  } else {
    if (window.length < 2) {
      throw new InsufficientHistoryError(
        `${history.companyName}: revenue growth needs at least 2 historical years, window has ${window.length}`,
        2,
        window.length
      );
    }
    const growth = averageGrowthRate(window.map(revenue));
    if (growth === null) {
      revenueGrowth = fallback(decayPath(defaults.revenueGrowth, config.revenueGrowthDecay, config.forecastYears));
    } else {
      const clamped = FinMath.clamp(growth, bounds.minRevenueGrowth, bounds.maxRevenueGrowth);
      if (clamped !== growth) {
        console.warn(
          `[Assumptions] Revenue growth ${(growth * 100).toFixed(2)}% clamped to ${(clamped * 100).toFixed(2)}%`
        );
      }
      revenueGrowth = derived(decayPath(clamped, config.revenueGrowthDecay, config.forecastYears));
    }
  }

  // --------------------------------------------------------------------------
  // Operating ratios
  // --------------------------------------------------------------------------
  const cogsPctRevenue = pick(overrides.cogsPctRevenue, ratioAverage(window, cogs, revenue), defaults.cogsPctRevenue);
  const sgaPctRevenue = pick(
    overrides.sgaPctRevenue,
    ratioAverage(window, (y) => lineValue(y.incomeStatement, 'sga'), revenue),
    defaults.sgaPctRevenue
  );
  const capexPctRevenue = pick(
    overrides.capexPctRevenue,
    ratioAverage(window, (y) => Math.abs(lineValue(y.cashFlow, 'capitalExpenditure')), revenue),
    defaults.capexPctRevenue
  );
  const depreciationRate = pick(
    overrides.depreciationRate,
    ratioAverage(
      window,
      (y) => lineValue(y.incomeStatement, 'depreciation'),
      (y) => lineValue(y.balanceSheet, 'netPPE'),
      (ratio) => ratio >= 0
    ),
    defaults.depreciationRate
  );

  // --------------------------------------------------------------------------
  // Working capital days
  // --------------------------------------------------------------------------
  const dsoRatio = ratioAverage(window, (y) => lineValue(y.balanceSheet, 'accountsReceivable'), revenue);
  const dioRatio = ratioAverage(window, (y) => lineValue(y.balanceSheet, 'inventory'), cogs);
  const dpoRatio = ratioAverage(window, (y) => lineValue(y.balanceSheet, 'accountsPayable'), cogs);

  const daysSalesOutstanding = pick(
    overrides.daysSalesOutstanding,
    dsoRatio === null ? null : dsoRatio * DAYS_PER_YEAR,
    defaults.daysSalesOutstanding
  );
  const daysInventoryOutstanding = pick(
    overrides.daysInventoryOutstanding,
    dioRatio === null ? null : dioRatio * DAYS_PER_YEAR,
    defaults.daysInventoryOutstanding
  );
  const daysPayableOutstanding = pick(
    overrides.daysPayableOutstanding,
    dpoRatio === null ? null : dpoRatio * DAYS_PER_YEAR,
    defaults.daysPayableOutstanding
  );

  // --------------------------------------------------------------------------
  // Tax, payout, repurchases
  // --------------------------------------------------------------------------
  const taxRatio = ratioAverage(
    window,
    (y) => lineValue(y.incomeStatement, 'taxProvision'),
    (y) => lineValue(y.incomeStatement, 'pretaxIncome'),
    (ratio, y) => lineValue(y.incomeStatement, 'pretaxIncome') > 0 && ratio > 0 && ratio < 1
  );
  const taxRate = pick(
    overrides.taxRate,
    taxRatio === null ? null : FinMath.clamp(taxRatio, bounds.minTaxRate, bounds.maxTaxRate),
    defaults.taxRate
  );

  const payoutRatioRaw = ratioAverage(
    window,
    (y) => Math.abs(lineValue(y.cashFlow, 'dividendsPaid')),
    (y) => lineValue(y.incomeStatement, 'netIncome'),
    (_ratio, y) => lineValue(y.incomeStatement, 'netIncome') > 0
  );
  const payoutRatio = pick(
    overrides.payoutRatio,
    payoutRatioRaw === null ? null : FinMath.clamp(payoutRatioRaw, 0, 1),
    defaults.payoutRatio
  );

  const hasRepurchases = window.some((y) => y.cashFlow.stockRepurchase !== undefined);
  const repurchaseRaw = hasRepurchases
    ? ratioAverage(
        window,
        (y) => Math.abs(lineValue(y.cashFlow, 'stockRepurchase')),
        (y) => lineValue(y.incomeStatement, 'netIncome'),
        (_ratio, y) => lineValue(y.incomeStatement, 'netIncome') > 0
      )
    : null;
  const repurchasePctNetIncome = pick(
    overrides.repurchasePctNetIncome,
    repurchaseRaw === null ? null : FinMath.clamp(repurchaseRaw, 0, 1),
    defaults.repurchasePctNetIncome
  );

  // --------------------------------------------------------------------------
  // Rates
  // --------------------------------------------------------------------------
  const costRatio = ratioAverage(
    window,
    (y) => lineValue(y.incomeStatement, 'interestExpense'),
    totalDebt,
    (ratio) => ratio > 0
  );
  const costOfDebt = pick(
    overrides.costOfDebt,
    costRatio === null ? null : FinMath.clamp(costRatio, bounds.minCostOfDebt, bounds.maxCostOfDebt),
    defaults.costOfDebt
  );

  const cashReturnRatio = ratioAverage(
    window,
    (y) => lineValue(y.incomeStatement, 'interestIncome'),
    (y) => lineValue(y.balanceSheet, 'cash'),
    (ratio) => ratio > 0
  );
  // Without history: slightly below cost of debt
  const returnOnCash = pick(
    overrides.returnOnCash,
    cashReturnRatio === null
      ? null
      : FinMath.clamp(cashReturnRatio, bounds.minReturnOnCash, bounds.maxReturnOnCash),
    FinMath.clamp(costOfDebt.value - 0.01, bounds.minReturnOnCash, bounds.maxReturnOnCash)
  );

  // --------------------------------------------------------------------------
  // Minimum cash & financing policy
  // --------------------------------------------------------------------------
  let minimumCash: Assumption<MinimumCashPolicy>;
  if (config.minimumCashThreshold !== undefined) {
    minimumCash = overridden({ kind: 'absolute', amount: config.minimumCashThreshold });
  } else if (overrides.minCashPctRevenue !== undefined) {
    minimumCash = overridden({ kind: 'pctRevenue', pct: overrides.minCashPctRevenue });
  } else {
    const cashRatio = ratioAverage(window, (y) => lineValue(y.balanceSheet, 'cash'), revenue, (r) => r >= 0);
    minimumCash =
      cashRatio === null
        ? fallback({ kind: 'pctRevenue', pct: defaults.minCashPctRevenue })
        : derived({ kind: 'pctRevenue', pct: cashRatio });
  }

  const pctFinancingWithDebt =
    config.pctFinancingWithDebt !== undefined
      ? overridden(config.pctFinancingWithDebt)
      : fallback(defaults.pctFinancingWithDebt);
  const ltLoanYears =
    config.ltLoanYears !== undefined ? overridden(config.ltLoanYears) : fallback(defaults.ltLoanYears);
  const existingLtDebtYears =
    config.existingLtDebtYears !== undefined
      ? overridden(config.existingLtDebtYears)
      : fallback(ltLoanYears.value * 0.7); // existing debt assumed 30% amortized

  const assumptions: ForecastAssumptions = {
    revenueGrowth,
    cogsPctRevenue,
    sgaPctRevenue,
    capexPctRevenue,
    depreciationRate,
    daysSalesOutstanding,
    daysInventoryOutstanding,
    daysPayableOutstanding,
    taxRate,
    payoutRatio,
    repurchasePctNetIncome,
    costOfDebt,
    returnOnCash,
    minimumCash,
    pctFinancingWithDebt,
    ltLoanYears,
    existingLtDebtYears,
  };

  logAssumptions(assumptions);

  return assumptions;
}

/**
 * growth_i = base × (1 - decay × i)
 */
export function decayPath(base: number, decay: number, years: number): number[] {
  const path: number[] = [];
  for (let i = 0; i < years; i++) {
    path.push(base * (1 - decay * i));
  }
  return path;
}

/**
 * Override as a single rate or a per-year path (short paths repeat their last rate)
 */
function expandGrowthPath(value: number | number[], years: number): number[] {
  if (typeof value === 'number') {
    return Array.from({ length: years }, () => value);
  }
  const last = value[value.length - 1];
  return Array.from({ length: years }, (_, i) => (i < value.length ? value[i] : last));
}

export const ASSUMPTION_KEYS: readonly AssumptionKey[] = [
  'revenueGrowth',
  'cogsPctRevenue',
  'sgaPctRevenue',
  'capexPctRevenue',
  'depreciationRate',
  'daysSalesOutstanding',
  'daysInventoryOutstanding',
  'daysPayableOutstanding',
  'taxRate',
  'payoutRatio',
  'repurchasePctNetIncome',
  'costOfDebt',
  'returnOnCash',
  'minimumCash',
  'pctFinancingWithDebt',
  'ltLoanYears',
  'existingLtDebtYears',
];

function logAssumptions(assumptions: ForecastAssumptions): void {
  const counts = { overridden: 0, derived: 0, default: 0 };
  for (const key of ASSUMPTION_KEYS) {
    counts[assumptions[key].source]++;
  }
  console.log(
    `[Assumptions] Resolved: ${counts.derived} derived, ${counts.overridden} overridden, ${counts.default} default`
  );
}
