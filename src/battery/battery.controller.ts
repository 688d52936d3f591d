import { Controller, Get, Inject, Query } from '@nestjs/common';
import { Constants } from '../constants';
import { toSortedPriceSeriesDTO } from '../common/dto/price-series.dto';
import { toHttpException } from '../common/errors/http-error.util';
import { LoggingService } from '../common/logging.service';
import { parseBooleanParam, parseHoursParam, parseNumberParam } from '../common/utils/query.util';
import { BatteryService } from './battery.service';
import { BatteryPlan, BatteryPlanDTO, BatteryPlanOptions } from './models/battery.model';

/**
 * Controller exposing the battery charging plan
 *
 * Endpoints:
 * - GET /battery/charging - Today's charging and discharging slots
 *
 * Query parameters: kwh_fees_low, kwh_fees_high, sell_fees, battery_kwh_price,
 * low_tariff_hours, no_cache
 */
@Controller('battery')
export class BatteryController {
  private readonly context = BatteryController.name;

  @Inject(BatteryService)
  private readonly batteryService!: BatteryService;

  @Inject(LoggingService)
  private readonly logger!: LoggingService;

  /**
   * Retrieves when it is viable to charge or discharge the battery today
   * @param {Record<string, unknown>} query - Fee, tariff and threshold parameters
   * @returns {Promise<BatteryPlanDTO>} Battery plan
   */
  @Get('charging')
  public async getChargingPlan(@Query() query: Record<string, unknown>): Promise<BatteryPlanDTO> {
    const options: BatteryPlanOptions = {
      batteryKwhPrice: parseNumberParam('battery_kwh_price', query.battery_kwh_price, Constants.BATTERY.KWH_PRICE),
      noCache: parseBooleanParam('no_cache', query.no_cache, false),
      tariff: {
        kwhFeesLow: parseNumberParam('kwh_fees_low', query.kwh_fees_low, Constants.TARIFF.KWH_FEES_LOW),
        kwhFeesHigh: parseNumberParam('kwh_fees_high', query.kwh_fees_high, Constants.TARIFF.KWH_FEES_HIGH),
        sellFees: parseNumberParam('sell_fees', query.sell_fees, Constants.TARIFF.SELL_FEES),
        vat: Constants.TARIFF.VAT,
        lowTariffHours: parseHoursParam('low_tariff_hours', query.low_tariff_hours, Constants.TARIFF.LOW_TARIFF_HOURS)
      }
    };

    try {
      const plan = await this.batteryService.getChargingPlan(options);
      return this.convertToBatteryPlanDTO(plan);
    } catch (error) {
      throw toHttpException(error, 'get battery charging plan', this.logger, this.context);
    }
  }

  private convertToBatteryPlanDTO(plan: BatteryPlan): BatteryPlanDTO {
    return {
      diff: plan.diff,
      is_viable: plan.isViable,
      charging_hours: [...plan.chargingSlots],
      is_charging_hour: plan.isChargingSlot,
      discharging_hours: [...plan.dischargingSlots],
      is_discharging_hour: plan.isDischargingSlot,
      total_price: toSortedPriceSeriesDTO(plan.totalPrice)
    };
  }
}
