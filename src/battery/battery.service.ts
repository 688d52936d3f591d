import { Inject, Injectable } from '@nestjs/common';
import { ClockService, nextDay } from '../common/clock.service';
import { isPriceNotFound } from '../common/errors/price.errors';
import { LoggingService } from '../common/logging.service';
import { DerivedPriceSet, PriceSetOptions } from '../pricing/models/pricing.model';
import { PricingService } from '../pricing/pricing.service';
import { planBattery } from './battery.scheduler';
import { BatteryPlan, BatteryPlanOptions } from './models/battery.model';

/**
 * Service producing today's battery charging plan
 *
 * Today's prices are mandatory. Tomorrow's prices refine late evening charging
 * when the market has already published them; until then the plan is built
 * from today alone.
 */
@Injectable()
export class BatteryService {
  private readonly context = BatteryService.name;

  @Inject(PricingService) private readonly pricingService!: PricingService;
  @Inject(ClockService) private readonly clock!: ClockService;
  @Inject(LoggingService) private readonly logger!: LoggingService;

  /**
   * Computes the charging plan for the current market day and slot
   * @param {BatteryPlanOptions} options - Tariff, discharge threshold and cache options
   * @returns {Promise<BatteryPlan>} Charging and discharging slots
   */
  public async getChargingPlan(options: BatteryPlanOptions): Promise<BatteryPlan> {
    const today = this.clock.today();
    const priceSetOptions: PriceSetOptions = {
      evaluationSlot: this.clock.currentSlot(),
      tariff: options.tariff,
      noCache: options.noCache
    };

    const todaySet = await this.pricingService.buildPriceSet(today, priceSetOptions);
    const tomorrowSet = await this.fetchLookahead(nextDay(today), priceSetOptions);

    const plan = planBattery(todaySet, tomorrowSet, { batteryKwhPrice: options.batteryKwhPrice });

    this.logger.log(
      `Battery plan for ${today}: viable=${plan.isViable}, diff=${plan.diff.toFixed(3)}, ` +
        `charging=[${plan.chargingSlots.join(', ')}], discharging=[${plan.dischargingSlots.join(', ')}]`,
      this.context
    );

    return plan;
  }

  /**
   * Gets tomorrow's price set, or null when the market has not published it yet
   */
  private async fetchLookahead(date: string, options: PriceSetOptions): Promise<DerivedPriceSet | null> {
    try {
      return await this.pricingService.buildPriceSet(date, options);
    } catch (error) {
      if (isPriceNotFound(error)) {
        this.logger.debug(`No prices for ${date} yet, planning without lookahead`, this.context);
        return null;
      }
      throw error;
    }
  }
}
