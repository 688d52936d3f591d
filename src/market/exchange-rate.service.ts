import { Inject, Injectable } from '@nestjs/common';
import dayjs from 'dayjs';
import { Constants } from '../constants';
import { CACHE_TOKENS } from '../common/cache/price-cache.constants';
import { IPriceCache, PriceCacheKey } from '../common/cache/price-cache.interface';
import { PriceError } from '../common/errors/price.errors';
import { LoggingService } from '../common/logging.service';
import { FetchRetryUtil } from '../common/utils/fetch-retry.util';
import { MarketFetchOptions } from './models/market.model';

/**
 * ExchangeRateService reads the CNB daily fixing and returns CZK per unit of the market currency
 *
 * The fixing is a pipe separated text file:
 *   19.10.2026 #201
 *   země|měna|množství|kód|kurz
 *   EMU|euro|1|EUR|24,335
 */
@Injectable()
export class ExchangeRateService {
  private readonly context = ExchangeRateService.name;

  @Inject(CACHE_TOKENS.PRICE_CACHE) private readonly cache!: IPriceCache;
  @Inject(LoggingService) private readonly logger!: LoggingService;

  /**
   * Gets the conversion rate valid for a market day
   * @param date - Market day (YYYY-MM-DD)
   * @param options - Cache options
   * @returns CZK for one unit of MARKET_CURRENCY
   * @throws PriceError CONVERSION_RATE_UNAVAILABLE when the fixing has no row for the currency
   */
  public async fetchConversionRate(date: string, options: MarketFetchOptions = {}): Promise<number> {
    const key: PriceCacheKey = { date, kind: 'rate' };
    const currency = Constants.MARKET.CURRENCY;

    if (!options.noCache) {
      const cached = await this.cache.read(key);
      const cachedRate = cached === null ? NaN : Number(cached);
      if (Number.isFinite(cachedRate) && cachedRate > 0) {
        return cachedRate;
      }
    }

    const fixing = await FetchRetryUtil.executeWithRetry(
      () => this.requestFixing(date),
      `Fetching ${currency} rate for ${date}`,
      this.logger,
      this.context,
      { maxRetries: Constants.MARKET.RETRY_COUNT, initialDelay: Constants.MARKET.RETRY_DELAY }
    );

    const rate = this.parseFixing(fixing, currency);
    if (rate === null) {
      this.logger.warn(`${currency} not found in exchange rate fixing for ${date}`, this.context);
      throw PriceError.conversionRateUnavailable(date, currency);
    }

    try {
      await this.cache.write(key, String(rate));
    } catch (error) {
      this.logger.error(`Failed to cache ${currency} rate for ${date}`, error, this.context);
    }

    return rate;
  }

  private async requestFixing(date: string): Promise<string> {
    const url = `${Constants.MARKET.RATE_URL}?date=${dayjs(date).format('D.M.YYYY')}`;
    this.logger.debug(`Fetching exchange rates from: ${url}`, this.context);

    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`CNB API error: ${response.status} ${response.statusText}`);
    }
    return response.text();
  }

  /**
   * Finds the currency row and normalises the rate to a single unit
   */
  private parseFixing(fixing: string, currency: string): number | null {
    for (const line of fixing.split('\n')) {
      if (!line.includes('|')) {
        continue;
      }

      const columns = line.trim().split('|');
      if (columns.length < 5 || columns[3] !== currency) {
        continue;
      }

      const amount = Number(columns[2]) || 1;
      const rate = Number(columns[4].replace(',', '.'));
      if (Number.isFinite(rate) && rate > 0) {
        return rate / amount;
      }
    }

    return null;
  }
}
