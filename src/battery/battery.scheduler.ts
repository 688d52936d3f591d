import _ from 'lodash';
import { TimeSlot, compareSlots, slotHour } from '../common/utils/time-slot.util';
import { DerivedPriceSet } from '../pricing/models/pricing.model';
import { BatteryPlan } from './models/battery.model';

const CHEAPEST_WINDOW = 4;
const EXPENSIVE_WINDOW = 20;
const CHARGING_GRACE = 1.1;
const LOOKAHEAD_WINDOW = 4;
const LATE_TODAY = [20, 20 + LOOKAHEAD_WINDOW] as const;
const EARLY_TOMORROW = [0, LOOKAHEAD_WINDOW] as const;
const FIRST_LATE_HOUR = 20;

export interface BatterySchedulerOptions {
  batteryKwhPrice: number;
}

/**
 * Decides when a home battery should charge and discharge today
 *
 * Charges in the 4 cheapest slots and every slot within 10 % of the most
 * expensive of them, discharges where the total price exceeds that price plus
 * batteryKwhPrice. With tomorrow's prices known, late evening charging is
 * dropped when tomorrow's cheapest slots beat today's late ones.
 */
export function planBattery(
  today: DerivedPriceSet,
  tomorrow: DerivedPriceSet | null,
  options: BatterySchedulerOptions
): BatteryPlan {
  const sorted = today.totalSorted.entries;
  const values = sorted.map(entry => entry.value);

  const maxCheapest = _.max(values.slice(0, CHEAPEST_WINDOW)) ?? 0;
  const maxExpensive = _.max(values.slice(0, EXPENSIVE_WINDOW)) ?? 0;

  const charging = new Set<TimeSlot>(sorted.slice(0, CHEAPEST_WINDOW).map(entry => entry.slot));
  const dischargingSlots = sorted
    .filter(entry => entry.value > maxCheapest + options.batteryKwhPrice)
    .map(entry => entry.slot);

  if (charging.size > 0) {
    for (const entry of sorted) {
      if (entry.value <= maxCheapest * CHARGING_GRACE) {
        charging.add(entry.slot);
      }
    }
  }

  if (tomorrow) {
    const lateToday = windowMean(values.slice(...LATE_TODAY));
    const earlyTomorrow = windowMean(tomorrow.totalSorted.entries.slice(...EARLY_TOMORROW).map(entry => entry.value));

    if (lateToday > earlyTomorrow) {
      for (const slot of [...charging]) {
        if (slotHour(slot) >= FIRST_LATE_HOUR) {
          charging.delete(slot);
        }
      }
    }
  }

  const chargingSlots = [...charging].sort(compareSlots);
  const isViable = dischargingSlots.length > 0;

  return {
    diff: maxExpensive - maxCheapest,
    isViable,
    chargingSlots,
    isChargingSlot: isViable && chargingSlots.length > 0 ? chargingSlots.includes(today.evaluationSlot) : false,
    dischargingSlots: dischargingSlots.sort(compareSlots),
    isDischargingSlot: isViable ? dischargingSlots.includes(today.evaluationSlot) : false,
    totalPrice: today.totalSorted
  };
}

// short days leave the window partly empty; missing slots count as 0
function windowMean(values: number[]): number {
  return _.sum(values) / LOOKAHEAD_WINDOW;
}
