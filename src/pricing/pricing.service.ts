import { Inject, Injectable } from '@nestjs/common';
import { ClockService, daysInMonth } from '../common/clock.service';
import { PriceError } from '../common/errors/price.errors';
import { LoggingService } from '../common/logging.service';
import { ExchangeRateService } from '../market/exchange-rate.service';
import { SpotMarketService } from '../market/spot-market.service';
import { DayPrice, DayPriceOptions, DerivedPriceSet, PriceSetOptions } from './models/pricing.model';
import { derivePriceSet } from './price-series.builder';
import { rankPriceSet } from './ranking.engine';

/**
 * Service turning market data into fee-loaded price views and rankings
 *
 * Fetches the day's spot prices and conversion rate through the market
 * services, then runs the pure builder and ranking engine on them. The
 * evaluation date is always the clock's market day, so "now" prices only
 * appear for today.
 */
@Injectable()
export class PricingService {
  private readonly context = PricingService.name;

  @Inject(SpotMarketService) private readonly spotMarketService!: SpotMarketService;
  @Inject(ExchangeRateService) private readonly exchangeRateService!: ExchangeRateService;
  @Inject(ClockService) private readonly clock!: ClockService;
  @Inject(LoggingService) private readonly logger!: LoggingService;

  /**
   * Builds the derived price views of a market day
   * @param {string} date - Market day (YYYY-MM-DD)
   * @param {PriceSetOptions} options - Tariff, evaluation slot and cache options
   * @returns {Promise<DerivedPriceSet>} Spot, total, sell and sorted total series
   */
  public async buildPriceSet(date: string, options: PriceSetOptions): Promise<DerivedPriceSet> {
    const rawPrices = await this.spotMarketService.fetchPrices(date, { noCache: options.noCache });
    if (rawPrices.length === 0) {
      throw PriceError.priceNotFound(date);
    }

    const conversionRate = await this.exchangeRateService.fetchConversionRate(date, { noCache: options.noCache });

    this.logger.debug(`Building price set for ${date}: ${rawPrices.length} slots, rate ${conversionRate}`, this.context);

    return derivePriceSet({
      date,
      evaluationDate: this.clock.today(),
      evaluationSlot: options.evaluationSlot ?? this.clock.currentSlot(),
      tariff: options.tariff,
      rawPrices,
      conversionRate
    });
  }

  /**
   * Gets the price overview of a day, with fixed fees spread over the month
   * @param {string | undefined} date - Market day (YYYY-MM-DD), today when omitted
   * @param {DayPriceOptions} options - Tariff, ranking and cache options
   * @returns {Promise<DayPrice>} Price views, rankings and VAT-loaded fees
   */
  public async getDayPrice(date: string | undefined, options: DayPriceOptions): Promise<DayPrice> {
    const day = date ?? this.clock.today();
    const hour = options.evaluationSlot ?? this.clock.currentSlot();
    const { vat } = options.tariff;

    const priceSet = await this.buildPriceSet(day, { ...options, evaluationSlot: hour });
    const ranking = rankPriceSet(priceSet, options.ranking);

    const days = daysInMonth(day);
    const monthlyFees = options.monthlyFees + options.dailyFees * days;

    return {
      date: day,
      hour,
      monthlyFees: monthlyFees * vat,
      monthlyFeesHour: (monthlyFees / days / 24) * vat,
      kwhFeesLow: options.tariff.kwhFeesLow * vat,
      kwhFeesHigh: options.tariff.kwhFeesHigh * vat,
      sellFees: options.tariff.sellFees,
      lowTariffHours: options.tariff.lowTariffHours,
      vat,
      priceSet,
      ranking
    };
  }
}
