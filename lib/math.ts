import { Decimal } from 'decimal.js';

// Re-export Decimal for convenience
export { Decimal };

export const ZERO = new Decimal(0);

/**
 * Sum of a list of amounts (empty list sums to zero)
 */
export function sumDecimals(values: readonly Decimal[]): Decimal {
  return values.reduce((sum, v) => sum.plus(v), ZERO);
}

export const FinMath = {
  // Assets - (Liabilities + Equity)
  residual: (assets: Decimal.Value, liab: Decimal.Value, equity: Decimal.Value) =>
    new Decimal(assets).minus(new Decimal(liab).plus(equity)),

  // Check if Assets = Liabilities + Equity (with tolerance)
  isBalanced: (assets: Decimal.Value, liab: Decimal.Value, equity: Decimal.Value, tolerance: Decimal.Value = 0.01) =>
    new Decimal(assets).minus(new Decimal(liab).plus(equity)).abs().lessThanOrEqualTo(tolerance),

  clamp: (value: number, min: number, max: number) => Math.max(min, Math.min(max, value)),
};
