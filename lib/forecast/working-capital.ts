// lib/forecast/working-capital.ts
// Working Capital Schedule (DSO/DIO/DPO)

import { Decimal } from '@/lib/math';
import type { WorkingCapitalSchedule } from './types';

const DAYS_PER_YEAR = 365;

/**
 * Build Working Capital schedule from day-count drivers
 */
export function buildWorkingCapitalSchedule(params: {
  years: number[];
  revenue: Map<number, Decimal>;
  cogs: Map<number, Decimal>;
  days: {
    dso: number;
    dio: number;
    dpo: number;
  };
  opening: {
    accountsReceivable: Decimal;
    inventory: Decimal;
    accountsPayable: Decimal;
  };
}): WorkingCapitalSchedule {
  const { years, revenue, cogs, days, opening } = params;

  console.log(
    `[WCSchedule] Building Working Capital schedule (DSO ${days.dso.toFixed(1)}, ` +
      `DIO ${days.dio.toFixed(1)}, DPO ${days.dpo.toFixed(1)})...`
  );

  const schedule: WorkingCapitalSchedule = {
    years,
    accountsReceivable: [],
    inventory: [],
    accountsPayable: [],
    nwc: [],
    changeInNwc: [],
  };

  // Previous period NWC (for ΔNWC)
  let prevNWC = opening.accountsReceivable.plus(opening.inventory).minus(opening.accountsPayable);

  for (const year of years) {
    const rev = revenue.get(year);
    const cogsVal = cogs.get(year);
    if (rev === undefined || cogsVal === undefined) {
      throw new Error(`[WCSchedule] Missing revenue or COGS for FY${year}`);
    }

    // AR = (Revenue / 365) × DSO
    const ar = rev.div(DAYS_PER_YEAR).times(days.dso);
    // Inventory = (COGS / 365) × DIO
    const inventory = cogsVal.div(DAYS_PER_YEAR).times(days.dio);
    // AP = (COGS / 365) × DPO
    const ap = cogsVal.div(DAYS_PER_YEAR).times(days.dpo);

    const nwc = ar.plus(inventory).minus(ap);
    // Increase in NWC uses cash
    const changeInNwc = nwc.minus(prevNWC);

    schedule.accountsReceivable.push(ar);
    schedule.inventory.push(inventory);
    schedule.accountsPayable.push(ap);
    schedule.nwc.push(nwc);
    schedule.changeInNwc.push(changeInNwc);

    prevNWC = nwc;
  }

  if (years.length > 0) {
    console.log(
      `[WCSchedule] NWC: First ${schedule.nwc[0].toFixed(0)}, ` +
        `Last ${schedule.nwc[schedule.nwc.length - 1].toFixed(0)}`
    );
  }

  return schedule;
}
