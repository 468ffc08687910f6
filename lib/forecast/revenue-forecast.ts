// lib/forecast/revenue-forecast.ts
// Revenue path from the resolved growth rates

import { Decimal } from '@/lib/math';

/**
 * Compound growth: Revenue[t] = Revenue[t-1] × (1 + g[t])
 */
export function forecastRevenue(params: {
  baseRevenue: Decimal;
  years: number[];
  growth: number[]; // index-aligned with years
}): Map<number, Decimal> {
  const { baseRevenue, years, growth } = params;

  if (growth.length < years.length) {
    throw new Error(`Growth path has ${growth.length} rates for ${years.length} forecast years`);
  }

  if (baseRevenue.isZero() || baseRevenue.isNegative()) {
    console.warn(`[RevenueForecast] Base revenue is ${baseRevenue.toFixed(0)}; forecast revenue stays there`);
  }

  const result = new Map<number, Decimal>();
  let currentRevenue = baseRevenue;

  years.forEach((year, i) => {
    currentRevenue = currentRevenue.times(new Decimal(1).plus(growth[i]));
    result.set(year, currentRevenue);
  });

  console.log(
    `[RevenueForecast] Base ${baseRevenue.toFixed(0)}, ` +
      `FY${years[years.length - 1]} ${currentRevenue.toFixed(0)} ` +
      `(growth ${growth.slice(0, years.length).map((g) => (g * 100).toFixed(1) + '%').join(', ')})`
  );

  return result;
}

/**
 * Compound annual growth rate between two amounts
 */
export function calculateCAGR(start: Decimal, end: Decimal, years: number): number {
  if (start.isZero() || years <= 0) return 0;
  return end.div(start).pow(new Decimal(1).div(years)).minus(1).toNumber();
}
