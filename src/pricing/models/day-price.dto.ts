import { TimeSlot } from '../../common/utils/time-slot.util';
import { PriceSeriesDTO, SortedPriceSeriesDTO } from '../../common/dto/price-series.dto';

export interface CheapestHoursDTO {
  hours: TimeSlot[];
  is_cheapest: boolean | null;
}

export interface MostExpensiveHoursDTO {
  hours: TimeSlot[];
  is_the_most_expensive: boolean | null;
}

/**
 * Day price as returned by the API
 * Field names are what home automation REST sensors read (total.now, cheapest_hours.is_cheapest, ...)
 */
export interface DayPriceDTO {
  date: string;
  monthly_fees: number;
  monthly_fees_hour: number;
  kwh_fees_low: number;
  kwh_fees_high: number;
  sell_fees: number;
  low_tariff_hours: number[];
  hour: string;
  vat: number;
  spot: PriceSeriesDTO;
  total: PriceSeriesDTO;
  total_sorted: SortedPriceSeriesDTO;
  sell: PriceSeriesDTO;
  cheapest_hours: CheapestHoursDTO;
  most_expensive_hours: MostExpensiveHoursDTO;
  cheapest_hours_by_average: CheapestHoursDTO;
  most_expensive_hours_by_average: MostExpensiveHoursDTO;
}
