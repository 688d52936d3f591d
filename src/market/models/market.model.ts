import { TimeSlot } from '../../common/utils/time-slot.util';

/**
 * One day-ahead price point as published by the market, in EUR/MWh
 */
export interface RawPricePoint {
  slot: TimeSlot;
  value: number;
}

export interface MarketFetchOptions {
  /** Skip the cache lookup and refresh the cached entry from the source */
  noCache?: boolean;
}

/**
 * OTE day-ahead chart endpoint response structure
 */
export interface OteChartResponse {
  data: {
    dataLine: OteDataLine[];
  };
}

export interface OteDataLine {
  title?: string;
  point: OtePoint[];
}

export interface OtePoint {
  x: string | number;
  y: number;
}

/**
 * Number of slots in a complete market day, hourly or quarter-hourly
 */
export const COMPLETE_DAY_SLOTS = [24, 96] as const;

/**
 * Quarter-hour count on the day clocks go back; the repeated 02:00-02:45 block sits at indexes 8-11
 */
export const LONG_DAY_QUARTERS = 100;
