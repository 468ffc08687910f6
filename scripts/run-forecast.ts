// scripts/run-forecast.ts
// Run one company bundle in-process and print the statements
//
// Usage:
//   npm run forecast -- data/companies/sample-co.json
//   npm run forecast -- data/companies/sample-co.json --base-year 2023 --years 3

import type { Decimal } from '../lib/math';
import {
  ASSUMPTION_KEYS,
  loadCompanyBundle,
  runForecast,
  withConfigOverrides,
  type CompanyConfigInput,
} from '../lib/forecast';

const separator = '='.repeat(80);

function parseArgs(): { file: string; overrides: CompanyConfigInput } {
  const args = process.argv.slice(2);
  let file = 'data/companies/sample-co.json';
  const overrides: CompanyConfigInput = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--base-year' && args[i + 1]) {
      overrides.baseYear = parseInt(args[i + 1], 10);
      i++;
    } else if (arg === '--years' && args[i + 1]) {
      overrides.forecastYears = parseInt(args[i + 1], 10);
      i++;
    } else if (!arg.startsWith('--')) {
      file = arg;
    }
  }

  return { file, overrides };
}

function fmt(value: Decimal): string {
  return value.toNumber().toLocaleString('en-US', { maximumFractionDigits: 1 }).padStart(12);
}

async function main() {
  const { file, overrides } = parseArgs();
  const context = await loadCompanyBundle(file);
  const run = runForecast({ historical: context.historical, config: withConfigOverrides(context.config, overrides) });

  console.log('\n' + separator);
  console.log(`FORECAST: ${run.companyName} (base FY${run.baseYear})`);
  console.log(separator);

  console.log('\n📋 Assumptions:');
  for (const key of ASSUMPTION_KEYS) {
    const assumption = run.assumptions[key];
    console.log(`   ${key.padEnd(26)} ${JSON.stringify(assumption.value).padEnd(40)} ${assumption.source}`);
  }

  console.log('\n📊 Income Statement:');
  console.log('Period   |   Revenue    |     EBIT     |   Interest   |  Net Income  |  Dividends');
  console.log('---------|--------------|--------------|--------------|--------------|-------------');
  for (const is of run.incomeStatements) {
    console.log(
      `FY${is.year}   | ${fmt(is.revenue)} | ${fmt(is.operatingIncome)} | ${fmt(is.interestExpense)} | ` +
        `${fmt(is.netIncome)} | ${fmt(is.dividends)}`
    );
  }

  console.log('\n💵 Cash Budget:');
  console.log('Period   |  Beginning   |  Operating   |  Investing   |   External   | Pre-Finance  |  Financing   | Discretion.  |    Ending');
  console.log('---------|--------------|--------------|--------------|--------------|--------------|--------------|--------------|-------------');
  for (const cb of run.cashBudgets) {
    console.log(
      `FY${cb.year}   | ${fmt(cb.beginningCash)} | ${fmt(cb.operating)} | ${fmt(cb.investing)} | ${fmt(cb.external)} | ` +
        `${fmt(cb.preFinancingCash)} | ${fmt(cb.financing)} | ${fmt(cb.discretionary)} | ${fmt(cb.endingCash)}`
    );
  }

  console.log('\n💰 Debt Schedule:');
  console.log('Period   |  ST Ending   |  LT Ending   |  Total Debt  |   Interest   | New Equity');
  console.log('---------|--------------|--------------|--------------|--------------|-------------');
  for (const d of run.debtSchedules) {
    console.log(
      `FY${d.year}   | ${fmt(d.shortTerm.ending)} | ${fmt(d.longTerm.ending)} | ${fmt(d.totalDebt)} | ` +
        `${fmt(d.totalInterest)} | ${fmt(d.newEquity)}`
    );
  }

  console.log('\n🏢 Balance Sheet:');
  console.log('Period   |     Cash     | Total Assets |  Total Liab  | Total Equity |   Residual');
  console.log('---------|--------------|--------------|--------------|--------------|-------------');
  run.balanceSheets.forEach((bs, i) => {
    console.log(
      `FY${bs.year}   | ${fmt(bs.cash)} | ${fmt(bs.totalAssets)} | ${fmt(bs.totalLiabilities)} | ` +
        `${fmt(bs.totalEquity)} | ${run.balanceChecks[i].residual.toFixed(6).padStart(12)}`
    );
  });

  if (run.backtest) {
    console.log('\n🔍 Backtest (forecast vs. actual):');
    console.log('Year  | Line                  |   Forecast   |    Actual    |   Variance   |   Var %');
    console.log('------|-----------------------|--------------|--------------|--------------|--------');
    for (const l of run.backtest.lines) {
      const pct = l.variancePct === null ? 'N/A' : `${l.variancePct.toFixed(2)}%`;
      console.log(
        `${l.year}  | ${l.line.padEnd(21)} | ${fmt(l.forecast)} | ${fmt(l.actual)} | ${fmt(l.variance)} | ${pct.padStart(7)}`
      );
    }
  }

  console.log('\n✅ Model Checks:');
  console.log(`   PP&E Roll-forward: ${run.checks.ppeRollForward.passed ? '✅ PASS' : '❌ FAIL'}`);
  console.log(`   Debt Roll-forward: ${run.checks.debtRollForward.passed ? '✅ PASS' : '❌ FAIL'}`);
  console.log(`   Cash Tie-out:      ${run.checks.cashTieOut.passed ? '✅ PASS' : '❌ FAIL'}`);
  console.log(`   Balance Check:     ${run.balanceChecks.every((c) => c.passed) ? '✅ PASS' : '❌ FAIL'}`);

  if (run.warnings.length > 0) {
    console.log('\n⚠️  Warnings:');
    for (const w of run.warnings) {
      console.log(`   [${w.code}] ${w.message}`);
    }
  }

  console.log('\n' + separator);
  console.log(`Build Duration: ${run.buildDurationMs}ms`);
  console.log(separator);
}

main().catch((error) => {
  console.error('❌ Forecast failed:', error);
  process.exit(1);
});
