// lib/forecast/company-file.ts
// Company bundle loader: { historical, config } JSON validated into a ForecastContext

import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { parseCompanyConfig } from './config';
import { InvalidConfigError } from './errors';
import { DEBT_LINES } from './historical';
import {
  BALANCE_SHEET_LINES,
  CASH_FLOW_LINES,
  INCOME_STATEMENT_LINES,
  type ForecastContext,
  type HistoricalFinancials,
} from './types';

const amount = z.number().finite();

const HistoricalYearSchema = z
  .object({
    year: z.number().int(),
    incomeStatement: z.record(z.enum(INCOME_STATEMENT_LINES), amount).default({}),
    balanceSheet: z.record(z.enum(BALANCE_SHEET_LINES), amount).default({}),
    cashFlow: z.record(z.enum(CASH_FLOW_LINES), amount).default({}),
  })
  .superRefine((y, ctx) => {
    for (const line of DEBT_LINES) {
      const value = y.balanceSheet[line];
      if (value !== undefined && value < 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'debt balance must not be negative',
          path: ['balanceSheet', line],
        });
      }
    }
  });

export const HistoricalFinancialsSchema = z
  .object({
    companyName: z.string().min(1),
    years: z.array(HistoricalYearSchema).min(1),
  })
  .refine((h) => new Set(h.years.map((y) => y.year)).size === h.years.length, {
    message: 'duplicate fiscal year',
    path: ['years'],
  });

const CompanyBundleSchema = z.object({
  historical: HistoricalFinancialsSchema,
  config: z.unknown().optional(),
});

/**
 * Validate an already-parsed bundle
 */
export function parseCompanyBundle(input: unknown): ForecastContext {
  const parsed = CompanyBundleSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const historical: HistoricalFinancials = parsed.data.historical;
  const config = parseCompanyConfig(parsed.data.config ?? {});

  return { historical, config };
}

/**
 * Read and validate a company bundle file
 */
export async function loadCompanyBundle(filePath: string): Promise<ForecastContext> {
  const resolved = path.resolve(filePath);
  const raw = await readFile(resolved, 'utf-8');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`[CompanyFile] ${resolved} is not valid JSON: ${reason}`);
  }

  const context = parseCompanyBundle(json);
  console.log(
    `[CompanyFile] Loaded ${context.historical.companyName} (${context.historical.years.length} years) from ${resolved}`
  );
  return context;
}

/**
 * Bundle files (*.json) in a directory, sorted by name
 */
export async function listCompanyBundles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith('.json'))
    .map((e) => path.join(dir, e.name))
    .sort();
}
