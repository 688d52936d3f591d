import { TimeSlot } from '../../common/utils/time-slot.util';
import { PriceSeries, TariffOptions } from '../../pricing/models/pricing.model';
import { SortedPriceSeriesDTO } from '../../common/dto/price-series.dto';

/**
 * Charging and discharging recommendation for today
 */
export interface BatteryPlan {
  /** Most expensive of the 20 cheapest slots minus most expensive of the 4 cheapest */
  readonly diff: number;
  /** Whether any slot is worth discharging today */
  readonly isViable: boolean;
  readonly chargingSlots: readonly TimeSlot[];
  readonly isChargingSlot: boolean;
  readonly dischargingSlots: readonly TimeSlot[];
  readonly isDischargingSlot: boolean;
  /** Today's total price, sorted ascending */
  readonly totalPrice: PriceSeries;
}

export interface BatteryPlanOptions {
  tariff: TariffOptions;
  /** Spread over the cheapest charging price (CZK/kWh) from which discharging pays off */
  batteryKwhPrice: number;
  noCache?: boolean;
}

/**
 * Battery plan as returned by the API
 */
export interface BatteryPlanDTO {
  diff: number;
  is_viable: boolean;
  charging_hours: TimeSlot[];
  is_charging_hour: boolean;
  discharging_hours: TimeSlot[];
  is_discharging_hour: boolean;
  total_price: SortedPriceSeriesDTO;
}
