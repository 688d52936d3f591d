import { Controller, Get, HttpException, HttpStatus, Inject, Param, Query } from '@nestjs/common';
import { Constants } from '../constants';
import { isIsoDate } from '../common/clock.service';
import { toPriceSeriesDTO, toSortedPriceSeriesDTO } from '../common/dto/price-series.dto';
import { toHttpException } from '../common/errors/http-error.util';
import { LoggingService } from '../common/logging.service';
import {
  parseBooleanParam,
  parseCountParam,
  parseHoursParam,
  parseNumberParam,
  parseSlotParam
} from '../common/utils/query.util';
import { DayPriceDTO } from './models/day-price.dto';
import { DayPrice, DayPriceOptions } from './models/pricing.model';
import { PricingService } from './pricing.service';

/**
 * Controller exposing day prices with all fees included
 *
 * Endpoints:
 * - GET /price/day - Today's prices
 * - GET /price/day/:date - Prices of a given day (YYYY-MM-DD)
 *
 * Query parameters (all optional, defaults from configuration):
 * hour, monthly_fees, daily_fees, kwh_fees_low, kwh_fees_high, sell_fees,
 * low_tariff_hours, no_cache, num_cheapest_hours, num_most_expensive_hours,
 * average_hours, average_hours_threshold
 */
@Controller('price')
export class PricingController {
  private readonly context = PricingController.name;

  @Inject(PricingService)
  private readonly pricingService!: PricingService;

  @Inject(LoggingService)
  private readonly logger!: LoggingService;

  /**
   * Retrieves spot, total and sell prices of a day with cheapest and most expensive slots
   * @param {string} date - Optional market day (YYYY-MM-DD), today when omitted
   * @param {Record<string, unknown>} query - Fee, tariff and ranking parameters
   * @returns {Promise<DayPriceDTO>} Day price overview
   */
  @Get(['day', 'day/:date'])
  public async getDayPrice(
    @Param('date') date: string | undefined,
    @Query() query: Record<string, unknown>
  ): Promise<DayPriceDTO> {
    if (date !== undefined && !isIsoDate(date)) {
      throw new HttpException('date must be in YYYY-MM-DD format', HttpStatus.BAD_REQUEST);
    }

    const options = this.parseOptions(query);

    try {
      const dayPrice = await this.pricingService.getDayPrice(date, options);
      return this.convertToDayPriceDTO(dayPrice);
    } catch (error) {
      throw toHttpException(error, `get day price for ${date ?? 'today'}`, this.logger, this.context);
    }
  }

  private parseOptions(query: Record<string, unknown>): DayPriceOptions {
    return {
      evaluationSlot: parseSlotParam('hour', query.hour),
      monthlyFees: parseNumberParam('monthly_fees', query.monthly_fees, Constants.TARIFF.MONTHLY_FEES),
      dailyFees: parseNumberParam('daily_fees', query.daily_fees, Constants.TARIFF.DAILY_FEES),
      noCache: parseBooleanParam('no_cache', query.no_cache, false),
      tariff: {
        kwhFeesLow: parseNumberParam('kwh_fees_low', query.kwh_fees_low, Constants.TARIFF.KWH_FEES_LOW),
        kwhFeesHigh: parseNumberParam('kwh_fees_high', query.kwh_fees_high, Constants.TARIFF.KWH_FEES_HIGH),
        sellFees: parseNumberParam('sell_fees', query.sell_fees, Constants.TARIFF.SELL_FEES),
        vat: Constants.TARIFF.VAT,
        lowTariffHours: parseHoursParam('low_tariff_hours', query.low_tariff_hours, Constants.TARIFF.LOW_TARIFF_HOURS)
      },
      ranking: {
        cheapestCount: parseCountParam('num_cheapest_hours', query.num_cheapest_hours, Constants.RANKING.CHEAPEST_COUNT),
        mostExpensiveCount: parseCountParam(
          'num_most_expensive_hours',
          query.num_most_expensive_hours,
          Constants.RANKING.MOST_EXPENSIVE_COUNT
        ),
        averageWindow: parseCountParam('average_hours', query.average_hours, Constants.RANKING.AVERAGE_WINDOW),
        averageThreshold: parseNumberParam(
          'average_hours_threshold',
          query.average_hours_threshold,
          Constants.RANKING.AVERAGE_THRESHOLD
        )
      }
    };
  }

  /**
   * Converts DayPrice (domain) to DayPriceDTO (API response)
   * @param {DayPrice} dayPrice - Computed day price
   * @returns {DayPriceDTO} DTO for API response
   */
  private convertToDayPriceDTO(dayPrice: DayPrice): DayPriceDTO {
    const { priceSet, ranking } = dayPrice;

    return {
      date: dayPrice.date,
      monthly_fees: dayPrice.monthlyFees,
      monthly_fees_hour: dayPrice.monthlyFeesHour,
      kwh_fees_low: dayPrice.kwhFeesLow,
      kwh_fees_high: dayPrice.kwhFeesHigh,
      sell_fees: dayPrice.sellFees,
      low_tariff_hours: [...dayPrice.lowTariffHours],
      hour: dayPrice.hour,
      vat: dayPrice.vat,
      spot: toPriceSeriesDTO(priceSet.spot),
      total: toPriceSeriesDTO(priceSet.total),
      total_sorted: toSortedPriceSeriesDTO(priceSet.totalSorted),
      sell: toPriceSeriesDTO(priceSet.sell),
      cheapest_hours: {
        hours: [...ranking.cheapest.slots],
        is_cheapest: ranking.cheapest.isMember
      },
      most_expensive_hours: {
        hours: [...ranking.mostExpensive.slots],
        is_the_most_expensive: ranking.mostExpensive.isMember
      },
      cheapest_hours_by_average: {
        hours: [...ranking.cheapestByAverage.slots],
        is_cheapest: ranking.cheapestByAverage.isMember
      },
      most_expensive_hours_by_average: {
        hours: [...ranking.mostExpensiveByAverage.slots],
        is_the_most_expensive: ranking.mostExpensiveByAverage.isMember
      }
    };
  }
}
