// lib/forecast/ppe-schedule.ts
// PP&E & Capex Schedule with Depreciation on beginning net PP&E

import { Decimal, sumDecimals } from '@/lib/math';
import type { CheckResult, PPESchedule } from './types';

/**
 * Build PP&E schedule. Capex = revenue × pct, depreciation = beginning net PP&E × rate,
 * so nothing here depends on the same period's financing.
 */
export function buildPPESchedule(params: {
  years: number[];
  revenue: Map<number, Decimal>;
  capexPctRevenue: number;
  depreciationRate: number;
  opening: {
    grossPPE: Decimal;
    accumDep: Decimal;
  };
}): PPESchedule {
  const { years, revenue, capexPctRevenue, depreciationRate, opening } = params;

  console.log('[PPESchedule] Building PP&E schedule...');

  const schedule: PPESchedule = {
    years,
    beginningGross: [],
    capex: [],
    endingGross: [],
    beginningAccumDep: [],
    depExpense: [],
    endingAccumDep: [],
    beginningNet: [],
    netPPE: [],
  };

  let prevGrossPPE = opening.grossPPE;
  let prevAccumDep = opening.accumDep;

  for (const year of years) {
    const rev = revenue.get(year);
    if (rev === undefined) {
      throw new Error(`[PPESchedule] No revenue for FY${year}`);
    }

    // ========================================================================
    // Gross PP&E Roll-forward
    // ========================================================================
    const capex = rev.times(capexPctRevenue);
    const beginningGross = prevGrossPPE;
    const endingGross = beginningGross.plus(capex);

    // ========================================================================
    // Depreciation (declining balance on opening net)
    // ========================================================================
    const beginningAccumDep = prevAccumDep;
    const beginningNet = beginningGross.minus(beginningAccumDep);
    const depExpense = Decimal.max(beginningNet, 0).times(depreciationRate);
    const endingAccumDep = beginningAccumDep.plus(depExpense);

    schedule.beginningGross.push(beginningGross);
    schedule.capex.push(capex);
    schedule.endingGross.push(endingGross);
    schedule.beginningAccumDep.push(beginningAccumDep);
    schedule.depExpense.push(depExpense);
    schedule.endingAccumDep.push(endingAccumDep);
    schedule.beginningNet.push(beginningNet);
    schedule.netPPE.push(endingGross.minus(endingAccumDep));

    prevGrossPPE = endingGross;
    prevAccumDep = endingAccumDep;
  }

  if (years.length > 0) {
    console.log(
      `[PPESchedule] Net PP&E: Beginning ${schedule.beginningNet[0].toFixed(0)}, ` +
        `Ending ${schedule.netPPE[schedule.netPPE.length - 1].toFixed(0)}`
    );
  }
  console.log(`[PPESchedule] Total Capex: ${sumDecimals(schedule.capex).toFixed(0)}`);
  console.log(`[PPESchedule] Total D&A: ${sumDecimals(schedule.depExpense).toFixed(0)}`);

  return schedule;
}

/**
 * Verify PP&E roll-forward consistency
 */
export function verifyPPERollForward(schedule: PPESchedule, tolerance: Decimal.Value = 0.01): CheckResult {
  let maxError = new Decimal(0);

  for (let i = 0; i < schedule.years.length; i++) {
    // Ending Gross = Beginning Gross + Capex
    const grossError = schedule.endingGross[i].minus(schedule.beginningGross[i].plus(schedule.capex[i])).abs();

    // Ending Accum Dep = Beginning Accum Dep + Dep Expense
    const depError = schedule.endingAccumDep[i]
      .minus(schedule.beginningAccumDep[i].plus(schedule.depExpense[i]))
      .abs();

    // Net PPE = Ending Gross - Ending Accum Dep = Beginning Net + Capex - Dep
    const netError = schedule.netPPE[i]
      .minus(schedule.beginningNet[i].plus(schedule.capex[i]).minus(schedule.depExpense[i]))
      .abs();

    // Continuity: this period's opening is last period's close
    const continuityError =
      i > 0 ? schedule.beginningNet[i].minus(schedule.netPPE[i - 1]).abs() : new Decimal(0);

    maxError = Decimal.max(maxError, grossError, depError, netError, continuityError);
  }

  return { passed: maxError.lte(tolerance), error: maxError };
}
