// lib/forecast/config.ts
// Company forecast configuration (validated)

import { z } from 'zod';
import { InvalidConfigError } from './errors';

const rate = z.number().finite();
const fraction = z.number().min(0).max(1);
const days = z.number().min(0);

export const BoundsSchema = z
  .object({
    minRevenueGrowth: rate.default(-0.1),
    maxRevenueGrowth: rate.default(0.15),
    minTaxRate: fraction.default(0.1),
    maxTaxRate: fraction.default(0.4),
    minCostOfDebt: rate.default(0.03),
    maxCostOfDebt: rate.default(0.15),
    minReturnOnCash: rate.default(0.01),
    maxReturnOnCash: rate.default(0.08),
  })
  .refine((b) => b.minRevenueGrowth <= b.maxRevenueGrowth, 'minRevenueGrowth must not exceed maxRevenueGrowth')
  .refine((b) => b.minTaxRate <= b.maxTaxRate, 'minTaxRate must not exceed maxTaxRate')
  .refine((b) => b.minCostOfDebt <= b.maxCostOfDebt, 'minCostOfDebt must not exceed maxCostOfDebt')
  .refine((b) => b.minReturnOnCash <= b.maxReturnOnCash, 'minReturnOnCash must not exceed maxReturnOnCash');

// Used when history gives no usable ratio
export const DefaultsSchema = z.object({
  revenueGrowth: rate.default(0.03),
  cogsPctRevenue: fraction.default(0.6),
  sgaPctRevenue: fraction.default(0.2),
  capexPctRevenue: fraction.default(0.05),
  depreciationRate: fraction.default(0.1),
  daysSalesOutstanding: days.default(29.2),
  daysInventoryOutstanding: days.default(18.25),
  daysPayableOutstanding: days.default(36.5),
  taxRate: fraction.default(0.21),
  payoutRatio: fraction.default(0.5),
  repurchasePctNetIncome: fraction.default(0),
  costOfDebt: rate.default(0.05),
  minCashPctRevenue: fraction.default(0.05),
  pctFinancingWithDebt: fraction.default(0.7),
  ltLoanYears: z.number().positive().default(10),
});

export const OverridesSchema = z
  .object({
    revenueGrowth: z.union([rate, z.array(rate).min(1)]),
    cogsPctRevenue: fraction,
    sgaPctRevenue: fraction,
    capexPctRevenue: fraction,
    depreciationRate: fraction,
    daysSalesOutstanding: days,
    daysInventoryOutstanding: days,
    daysPayableOutstanding: days,
    taxRate: fraction,
    payoutRatio: fraction,
    repurchasePctNetIncome: fraction,
    costOfDebt: z.number().min(0),
    returnOnCash: z.number().min(0),
    minCashPctRevenue: fraction,
  })
  .partial()
  .strict();

export const CompanyConfigSchema = z
  .object({
    companyName: z.string().min(1).optional(),
    baseYear: z.number().int().optional(),
    forecastYears: z.number().int().positive().default(2),
    inputYears: z.number().int().positive().default(3),

    // Financing
    ltLoanYears: z.number().positive().optional(),
    existingLtDebtYears: z.number().positive().optional(), // default: ltLoanYears × 0.7
    pctFinancingWithDebt: fraction.optional(),
    minimumCashThreshold: z.number().min(0).optional(), // absolute; otherwise % of revenue
    shortTermDebtCapacity: z.number().min(0).optional(), // unlimited when absent

    revenueGrowthDecay: z.number().min(0).max(1).default(0),

    balanceTolerance: z
      .object({
        absolute: z.number().positive().default(0.01),
        relative: z.number().min(0).default(1e-9),
      })
      .default({}),

    bounds: BoundsSchema.default({}),
    defaults: DefaultsSchema.default({}),
    overrides: OverridesSchema.default({}),
  })
  .strict();

export type CompanyConfig = z.infer<typeof CompanyConfigSchema>;
export type CompanyConfigInput = z.input<typeof CompanyConfigSchema>;
export type AssumptionOverrides = z.infer<typeof OverridesSchema>;

/**
 * Validate raw config, filling defaults
 */
export function parseCompanyConfig(input: unknown): CompanyConfig {
  const parsed = CompanyConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidConfigError(issues);
  }
  return parsed.data;
}

/**
 * Merge per-run overrides onto a validated config and re-validate
 */
export function withConfigOverrides(config: CompanyConfig, patch: CompanyConfigInput): CompanyConfig {
  return parseCompanyConfig({
    ...config,
    ...patch,
    overrides: { ...config.overrides, ...(patch.overrides ?? {}) },
  });
}
