import { Inject, Injectable } from '@nestjs/common';
import { Constants } from '../constants';
import { CACHE_TOKENS } from '../common/cache/price-cache.constants';
import { IPriceCache, PriceCacheKey } from '../common/cache/price-cache.interface';
import { PriceError } from '../common/errors/price.errors';
import { LoggingService } from '../common/logging.service';
import { FetchRetryUtil } from '../common/utils/fetch-retry.util';
import { parseSlotKey, slotKey, toQuarterSlot } from '../common/utils/time-slot.util';
import {
  COMPLETE_DAY_SLOTS,
  LONG_DAY_QUARTERS,
  MarketFetchOptions,
  OteChartResponse,
  OteDataLine,
  OtePoint,
  RawPricePoint
} from './models/market.model';

/**
 * SpotMarketService reads day-ahead electricity prices from the OTE chart endpoint
 *
 * The endpoint answers with hourly points (24 per day) or quarter-hour points
 * (96 per day, 92 or 100 on clock change days). Complete days are cached;
 * partial days are returned but never stored, so a later call fetches again.
 */
@Injectable()
export class SpotMarketService {
  private readonly context = SpotMarketService.name;

  @Inject(CACHE_TOKENS.PRICE_CACHE) private readonly cache!: IPriceCache;
  @Inject(LoggingService) private readonly logger!: LoggingService;

  /**
   * Gets the day-ahead prices of a market day
   * @param date - Market day (YYYY-MM-DD)
   * @param options - Cache options
   * @returns Price points in EUR/MWh, in slot order
   * @throws PriceError PRICE_NOT_FOUND when the market has not published the day
   */
  public async fetchPrices(date: string, options: MarketFetchOptions = {}): Promise<RawPricePoint[]> {
    const key: PriceCacheKey = { date, kind: 'prices' };

    if (!options.noCache) {
      const cached = await this.cache.read(key);
      if (cached !== null) {
        const points = this.parseCachedPrices(cached);
        if (points) {
          this.logger.debug(`Using cached prices for ${date} (${points.length} slots)`, this.context);
          return points;
        }
        this.logger.warn(`Ignoring unreadable cached prices for ${date}`, this.context);
      }
    }

    const response = await FetchRetryUtil.executeWithRetry(
      () => this.requestChartData(date),
      `Fetching prices for ${date}`,
      this.logger,
      this.context,
      { maxRetries: Constants.MARKET.RETRY_COUNT, initialDelay: Constants.MARKET.RETRY_DELAY }
    );

    const points = this.parseChartData(date, response);

    if (COMPLETE_DAY_SLOTS.some(count => count === points.length)) {
      await this.storePrices(key, points);
    } else {
      this.logger.warn(`Prices for ${date} are incomplete (${points.length} slots), not caching`, this.context);
    }

    return points;
  }

  private async requestChartData(date: string): Promise<OteChartResponse> {
    const url = `${Constants.MARKET.PRICE_URL}?${new URLSearchParams({ report_date: date }).toString()}`;
    this.logger.debug(`Fetching prices from: ${url}`, this.context);

    const response = await fetch(url);
    if (!response.ok) {
      throw new Error(`OTE API error: ${response.status} ${response.statusText}`);
    }

    const body: unknown = await response.json();
    if (!SpotMarketService.isChartResponse(body)) {
      throw new Error(`OTE API returned an unexpected payload for ${date}`);
    }
    return body;
  }

  /**
   * Converts chart points into slots: hourly points are keyed by hour, anything
   * else is laid out as consecutive quarter hours from midnight
   */
  private parseChartData(date: string, response: OteChartResponse): RawPricePoint[] {
    const priceLine: OteDataLine | undefined = response.data.dataLine[1];
    if (!priceLine || priceLine.point.length === 0) {
      throw PriceError.priceNotFound(date);
    }

    let data: OtePoint[] = priceLine.point;

    if (data.length === 24) {
      return data.map(point => ({ slot: Number(point.x) - 1, value: point.y }));
    }

    if (data.length === LONG_DAY_QUARTERS) {
      data = [...data.slice(0, 8), ...data.slice(12)];
    }

    return data.map((point, index) => ({
      slot: toQuarterSlot(Math.floor(index / 4), (index % 4) * 15),
      value: point.y
    }));
  }

  private parseCachedPrices(cached: string): RawPricePoint[] | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(cached);
    } catch {
      return null;
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return null;
    }

    const points: RawPricePoint[] = [];
    for (const [key, value] of Object.entries(parsed)) {
      const slot = parseSlotKey(key);
      if (slot === null || typeof value !== 'number') {
        return null;
      }
      points.push({ slot, value });
    }

    return points.length > 0 ? points : null;
  }

  private async storePrices(key: PriceCacheKey, points: RawPricePoint[]): Promise<void> {
    const document: Record<string, number> = {};
    for (const point of points) {
      document[slotKey(point.slot)] = point.value;
    }

    try {
      await this.cache.write(key, JSON.stringify(document));
    } catch (error) {
      this.logger.error(`Failed to cache prices for ${key.date}`, error, this.context);
    }
  }

  private static isChartResponse(value: unknown): value is OteChartResponse {
    if (typeof value !== 'object' || value === null || !('data' in value)) {
      return false;
    }
    const data = value.data;
    if (typeof data !== 'object' || data === null || !('dataLine' in data) || !Array.isArray(data.dataLine)) {
      return false;
    }

    return data.dataLine.every(
      (line: unknown) =>
        typeof line === 'object' &&
        line !== null &&
        'point' in line &&
        Array.isArray(line.point) &&
        line.point.every(
          (point: unknown) =>
            typeof point === 'object' &&
            point !== null &&
            'x' in point &&
            'y' in point &&
            (typeof point.x === 'number' || (typeof point.x === 'string' && point.x.trim() !== '')) &&
            Number.isInteger(Number(point.x)) &&
            typeof point.y === 'number'
        )
    );
  }
}
