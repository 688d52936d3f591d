import { slotKey } from '../utils/time-slot.util';
import { PriceSeries } from '../../pricing/models/pricing.model';

/**
 * Price series as returned by the API: slot key to CZK/kWh, plus the current slot price
 */
export interface PriceSeriesDTO {
  hours: Record<string, number>;
  now: number | null;
}

/**
 * Sorted series; JSON objects list integer-like keys numerically, so the price order is carried separately
 */
export interface SortedPriceSeriesDTO extends PriceSeriesDTO {
  order: string[];
}

export function toPriceSeriesDTO(series: PriceSeries): PriceSeriesDTO {
  const hours: Record<string, number> = {};
  for (const entry of series.entries) {
    hours[slotKey(entry.slot)] = entry.value;
  }
  return { hours, now: series.now };
}

export function toSortedPriceSeriesDTO(series: PriceSeries): SortedPriceSeriesDTO {
  return {
    ...toPriceSeriesDTO(series),
    order: series.entries.map(entry => slotKey(entry.slot))
  };
}
