// lib/forecast/cost-forecast.ts
// Cost lines as a percent of revenue (COGS, SG&A)

import { Decimal } from '@/lib/math';

function percentOfRevenue(revenue: Map<number, Decimal>, percent: number): Map<number, Decimal> {
  const result = new Map<number, Decimal>();
  for (const [year, rev] of revenue.entries()) {
    result.set(year, rev.times(percent));
  }
  return result;
}

/**
 * Forecast COGS (Cost of Goods Sold)
 */
export function forecastCOGS(params: { revenue: Map<number, Decimal>; percentOfRevenue: number }): Map<number, Decimal> {
  console.log(`[COGSForecast] ${(params.percentOfRevenue * 100).toFixed(1)}% of revenue`);
  return percentOfRevenue(params.revenue, params.percentOfRevenue);
}

/**
 * Forecast SG&A (Selling, General & Administrative)
 */
export function forecastSGA(params: { revenue: Map<number, Decimal>; percentOfRevenue: number }): Map<number, Decimal> {
  console.log(`[SGAForecast] ${(params.percentOfRevenue * 100).toFixed(1)}% of revenue`);
  return percentOfRevenue(params.revenue, params.percentOfRevenue);
}

/**
 * Gross margin = (Revenue - COGS) / Revenue
 */
export function calculateGrossMargin(revenue: Decimal, cogs: Decimal): number {
  if (revenue.isZero()) return 0;
  return revenue.minus(cogs).div(revenue).toNumber();
}
