import { TimeSlot, detectGranularity, resolveSlot, slotHour } from '../common/utils/time-slot.util';
import { DerivedPriceSet, PriceEntry, PriceSeries, PriceSetInput } from './models/pricing.model';

/**
 * Derives the spot, total, sell and sorted total views of a day from raw market prices
 *
 * converted = EUR/MWh * rate / 1000 (CZK/kWh)
 * total     = (converted + low or high tariff fee) * vat
 * sell      = converted - sell fee
 */
export function derivePriceSet(input: PriceSetInput): DerivedPriceSet {
  const { tariff, conversionRate } = input;
  const isToday = input.date === input.evaluationDate;
  const evaluationSlot = resolveSlot(
    input.evaluationSlot,
    detectGranularity(input.rawPrices.map(point => point.slot))
  );

  const spot: PriceEntry[] = [];
  const total: PriceEntry[] = [];
  const sell: PriceEntry[] = [];

  for (const point of input.rawPrices) {
    const converted = (point.value * conversionRate) / 1000;
    const kwhFees = tariff.lowTariffHours.includes(slotHour(point.slot)) ? tariff.kwhFeesLow : tariff.kwhFeesHigh;

    spot.push({ slot: point.slot, value: converted });
    total.push({ slot: point.slot, value: (converted + kwhFees) * tariff.vat });
    sell.push({ slot: point.slot, value: converted - tariff.sellFees });
  }

  return {
    date: input.date,
    isToday,
    evaluationSlot,
    spot: toSeries(spot, isToday, evaluationSlot),
    total: toSeries(total, isToday, evaluationSlot),
    sell: toSeries(sell, isToday, evaluationSlot),
    totalSorted: toSeries(sortAscending(total), isToday, evaluationSlot)
  };
}

/**
 * Ascending by price; Array.prototype.sort is stable so equal prices keep slot order
 */
export function sortAscending(entries: readonly PriceEntry[]): PriceEntry[] {
  return [...entries].sort((a, b) => a.value - b.value);
}

function toSeries(entries: readonly PriceEntry[], isToday: boolean, evaluationSlot: TimeSlot): PriceSeries {
  const current = isToday ? entries.find(entry => entry.slot === evaluationSlot) : undefined;
  return {
    entries,
    now: current ? current.value : null
  };
}
