import { QuarterSlot, TimeSlot } from '../../common/utils/time-slot.util';
import { RawPricePoint } from '../../market/models/market.model';

/**
 * Price of one slot in CZK/kWh
 */
export interface PriceEntry {
  readonly slot: TimeSlot;
  readonly value: number;
}

/**
 * Slot prices of one market day in insertion order
 */
export interface PriceSeries {
  readonly entries: readonly PriceEntry[];
  /** Price of the evaluation slot, only set when the series is for today */
  readonly now: number | null;
}

/**
 * All price views derived for one market day
 */
export interface DerivedPriceSet {
  readonly date: string;
  readonly isToday: boolean;
  /** Evaluation slot mapped onto the granularity of this day's data */
  readonly evaluationSlot: TimeSlot;
  /** Spot price converted to CZK/kWh */
  readonly spot: PriceSeries;
  /** Spot price with distribution fees and VAT */
  readonly total: PriceSeries;
  /** Spot price minus the sell fee */
  readonly sell: PriceSeries;
  /** total, stable-sorted ascending by price */
  readonly totalSorted: PriceSeries;
}

/**
 * Per-kWh fees, without VAT
 */
export interface TariffOptions {
  kwhFeesLow: number;
  kwhFeesHigh: number;
  sellFees: number;
  /** Multiplier, 1.21 for 21 % */
  vat: number;
  /** Hours of day billed at the low distribution tariff */
  lowTariffHours: readonly number[];
}

export interface PriceSetInput {
  date: string;
  evaluationDate: string;
  evaluationSlot: QuarterSlot;
  tariff: TariffOptions;
  rawPrices: readonly RawPricePoint[];
  /** CZK per unit of the market currency */
  conversionRate: number;
}

export interface RankingOptions {
  cheapestCount: number;
  mostExpensiveCount: number;
  /** Number of cheapest slots averaged for the threshold based sets */
  averageWindow: number;
  /** Slots cheaper than average * threshold count as cheap */
  averageThreshold: number;
}

export interface RankedSlots {
  readonly slots: readonly TimeSlot[];
  /** Whether the evaluation slot is in the set; null when the day is not today */
  readonly isMember: boolean | null;
}

export interface PriceRanking {
  readonly cheapest: RankedSlots;
  readonly mostExpensive: RankedSlots;
  readonly cheapestByAverage: RankedSlots;
  /** Complement of cheapestByAverage, unordered */
  readonly mostExpensiveByAverage: RankedSlots;
}

export interface PriceSetOptions {
  /** Defaults to the current slot */
  evaluationSlot?: QuarterSlot;
  tariff: TariffOptions;
  noCache?: boolean;
}

export interface DayPriceOptions extends PriceSetOptions {
  monthlyFees: number;
  dailyFees: number;
  ranking: RankingOptions;
}

/**
 * Price overview of one day, fees already including VAT
 */
export interface DayPrice {
  date: string;
  hour: QuarterSlot;
  monthlyFees: number;
  monthlyFeesHour: number;
  kwhFeesLow: number;
  kwhFeesHigh: number;
  sellFees: number;
  lowTariffHours: readonly number[];
  vat: number;
  priceSet: DerivedPriceSet;
  ranking: PriceRanking;
}
